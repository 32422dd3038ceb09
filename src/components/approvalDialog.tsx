import React from "react";
import { Box, Text, useInput } from "ink";
import { summarizeArguments } from "../agent/loop";
import type { ConfirmationDecision, DecisionRequest } from "../safety/gate";
import { DiffLines } from "./diffView";

type ApprovalDialogProps = {
	request: DecisionRequest;
	onDecision: (decision: ConfirmationDecision) => void;
};

const SEVERITY_COLORS = { High: "red", Medium: "yellow", Low: "gray" } as const;

export const ApprovalDialog: React.FC<ApprovalDialogProps> = ({ request, onDecision }) => {
	useInput((input, key) => {
		if (key.escape) {
			onDecision("deny");
			return;
		}
		switch (input.toLowerCase()) {
			case "y":
				onDecision("approve_once");
				return;
			case "a":
				onDecision("approve_category");
				return;
			case "n":
				onDecision("deny");
				return;
		}
	});

	return (
		<Box flexDirection="column" borderStyle="double" borderColor="yellow" paddingX={1}>
			<Text bold color="yellow">
				Approve {request.toolName}?
			</Text>
			<Text>
				<Text color={SEVERITY_COLORS[request.severity]}>[{request.severity}]</Text>{" "}
				{request.reason} <Text color="gray">({request.category})</Text>
			</Text>
			<Text color="gray">{summarizeArguments(request.arguments, 200)}</Text>
			{request.diff ? (
				<Box marginTop={1}>
					<DiffLines diff={request.diff} maxLines={20} />
				</Box>
			) : null}
			<Box marginTop={1}>
				<Text>
					<Text color="green">y</Text> approve once · <Text color="green">a</Text> approve all{" "}
					{request.category} · <Text color="red">n</Text>/Esc deny
				</Text>
			</Box>
		</Box>
	);
};
