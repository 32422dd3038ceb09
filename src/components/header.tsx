import React from "react";
import { Box, Text } from "ink";
import type { AgentState } from "../events/types";
import type { SafetyMode } from "../safety/gate";
import type { RiskCategory } from "../tools/profiles";

type HeaderProps = {
	mode: SafetyMode;
	agentStatus: AgentState;
	model: string;
	approved: readonly RiskCategory[];
	ctxPct: number;
	tokensPerSec: number;
	activeTask: string;
	activity: string | null;
};

const MODE_COLORS: Record<SafetyMode, string> = {
	SAFE: "green",
	ARMED: "red",
	ARMED_PENDING: "yellow",
};

const STATUS_COLORS: Record<AgentState, string> = {
	idle: "gray",
	thinking: "yellow",
	acting: "cyan",
	verifying: "magenta",
};

export const Header: React.FC<HeaderProps> = ({
	mode,
	agentStatus,
	model,
	approved,
	ctxPct,
	tokensPerSec,
	activeTask,
	activity,
}) => (
	<Box flexDirection="column" flexShrink={0}>
		<Box flexDirection="row" justifyContent="space-between">
			<Text>
				<Text bold>tollgate</Text> <Text color="gray">{model}</Text>{" "}
				<Text color={MODE_COLORS[mode]} bold>
					[{mode}]
				</Text>{" "}
				<Text color={STATUS_COLORS[agentStatus]}>{agentStatus}</Text>
			</Text>
			<Text color="gray">
				{tokensPerSec > 0 ? `${tokensPerSec.toFixed(1)} tok/s · ` : ""}ctx {ctxPct}%
			</Text>
		</Box>
		{approved.length > 0 && (
			<Text color="yellow">auto-approved: {approved.join(", ")}</Text>
		)}
		{activeTask && (
			<Text color="gray">
				{activity ?? "Working"}: {activeTask}
			</Text>
		)}
	</Box>
);
