import React from "react";
import { Box, Text } from "ink";
import { summarizeArguments } from "../agent/loop";
import type { DecisionOutcome } from "../safety/gate";
import type { Card } from "../ui/timeline";
import { DiffLines } from "./diffView";
import { Markdown } from "./markdown";

const OUTCOME_TEXT: Record<DecisionOutcome, { text: string; color: string }> = {
	approved: { text: "approved once", color: "green" },
	approved_category: { text: "approved (category)", color: "green" },
	denied: { text: "denied", color: "red" },
	armed_required: { text: "blocked: ARMED mode required", color: "yellow" },
};

function firstLines(text: string, max: number): string {
	const lines = text.split("\n");
	if (lines.length <= max) return text;
	return `${lines.slice(0, max).join("\n")}\n… ${lines.length - max} more lines`;
}

type LabelFor = (toolName: string) => string;

const CardView: React.FC<{ card: Card; labelFor: LabelFor }> = ({ card, labelFor }) => {
	switch (card.kind) {
		case "user":
			return (
				<Box flexDirection="row">
					<Text color="magenta">{"> "}</Text>
					<Text>{card.text}</Text>
				</Box>
			);
		case "assistant": {
			const color = card.state === "error" ? "red" : undefined;
			return (
				<Box flexDirection="column">
					{card.text ? <Markdown content={card.text} color={color} /> : null}
					{card.state === "streaming" && <Text color="gray">…</Text>}
				</Box>
			);
		}
		case "action": {
			const label = labelFor(card.toolName);
			return (
				<Box
					flexDirection="column"
					borderStyle="round"
					borderColor={card.isError ? "red" : "gray"}
					paddingX={1}
				>
					<Text>
						<Text color={card.isError ? "red" : "cyan"} bold>
							{card.isError ? "✗" : "✓"} {label}
						</Text>{" "}
						<Text color="gray">{summarizeArguments(card.arguments)}</Text>
					</Text>
					<Text color={card.isError ? "red" : undefined}>{firstLines(card.content, 12)}</Text>
					{card.diff ? <DiffLines diff={card.diff} maxLines={12} /> : null}
				</Box>
			);
		}
		case "decision": {
			const { text, color } = OUTCOME_TEXT[card.outcome];
			return (
				<Text>
					<Text color={color}>◆ {card.toolName}</Text> <Text color="gray">{text}</Text>
				</Text>
			);
		}
		case "plan":
			return (
				<Box flexDirection="column">
					<Text color="yellow" bold>
						Plan
					</Text>
					<Text>{card.content}</Text>
				</Box>
			);
		case "verify":
			return (
				<Box flexDirection="column">
					<Text color={card.passed ? "green" : "red"} bold>
						{card.passed ? "✓" : "✗"} {card.summary}
					</Text>
					{card.errors.map((line, idx) => (
						<Text key={idx} color="red">
							{line}
						</Text>
					))}
				</Box>
			);
	}
};

type TimelineViewProps = {
	cards: readonly Card[];
	/** Only the newest cards are drawn; the terminal keeps the rest in scrollback. */
	limit?: number;
	labelFor?: LabelFor;
};

export const TimelineView: React.FC<TimelineViewProps> = ({
	cards,
	limit = 30,
	labelFor = (name) => name,
}) => {
	if (cards.length === 0) {
		return <Text color="gray">No messages yet. Describe a change to get started.</Text>;
	}
	return (
		<Box flexDirection="column" gap={1}>
			{cards.slice(-limit).map((card) => (
				<CardView key={card.id} card={card} labelFor={labelFor} />
			))}
		</Box>
	);
};
