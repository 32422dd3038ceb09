import React from "react";
import { Box, Text } from "ink";

function lineColor(line: string): string | undefined {
	if (line.startsWith("+++") || line.startsWith("---")) return "gray";
	if (line.startsWith("@@")) return "cyan";
	if (line.startsWith("+")) return "green";
	if (line.startsWith("-")) return "red";
	return undefined;
}

export const DiffLines: React.FC<{ diff: string; maxLines?: number }> = ({
	diff,
	maxLines,
}) => {
	const lines = diff.replace(/\n$/, "").split("\n");
	const shown = maxLines !== undefined ? lines.slice(0, maxLines) : lines;
	const hidden = lines.length - shown.length;
	return (
		<Box flexDirection="column">
			{shown.map((line, idx) => (
				<Text key={idx} color={lineColor(line)}>
					{line || " "}
				</Text>
			))}
			{hidden > 0 && <Text color="gray">… {hidden} more lines</Text>}
		</Box>
	);
};

type DiffPanelProps = {
	diff: { diff: string; path: string } | null;
	maxLines?: number;
};

export const DiffPanel: React.FC<DiffPanelProps> = ({ diff, maxLines = 40 }) => (
	<Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
		<Text color="cyan" bold>
			Diff{diff?.path ? `: ${diff.path}` : ""} <Text color="gray">(Esc to close)</Text>
		</Text>
		{diff ? (
			<DiffLines diff={diff.diff} maxLines={maxLines} />
		) : (
			<Text color="gray">No approved changes yet.</Text>
		)}
	</Box>
);
