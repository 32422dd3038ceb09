import React from "react";
import { Box, Text } from "ink";
import type { LogLevel } from "../config";
import { formatLogLine, type LogEntry } from "../logger";

const LEVEL_COLORS: Record<LogLevel, string | undefined> = {
	debug: "gray",
	info: undefined,
	warn: "yellow",
	error: "red",
};

type LogsPanelProps = {
	entries: readonly LogEntry[];
	verify: { passed: boolean; summary: string } | null;
	maxLines?: number;
};

export const LogsPanel: React.FC<LogsPanelProps> = ({ entries, verify, maxLines = 15 }) => (
	<Box flexDirection="column" borderStyle="round" borderColor="gray" paddingX={1}>
		<Text bold>
			Logs <Text color="gray">(Esc to close)</Text>
		</Text>
		{verify && (
			<Text color={verify.passed ? "green" : "red"}>
				{verify.passed ? "✓" : "✗"} {verify.summary}
			</Text>
		)}
		{entries.length === 0 ? (
			<Text color="gray">Nothing logged yet.</Text>
		) : (
			entries.slice(-maxLines).map((entry, idx) => (
				<Text key={idx} color={LEVEL_COLORS[entry.level]}>
					{formatLogLine(entry)}
				</Text>
			))
		)}
	</Box>
);
