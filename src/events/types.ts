import type { DecisionOutcome } from "../safety/gate";
import type { ToolArguments } from "../tools/types";

export type EventSource = "agent" | "ui" | "system";

export type AgentState = "idle" | "thinking" | "acting" | "verifying";

export type EventPayloads = {
	message: { role: "assistant"; delta: string };
	tool_result: {
		tool_name: string;
		content: string;
		is_error: boolean;
		arguments: ToolArguments;
	};
	plan: { content: string };
	status: { status: "processing" | "ready" };
	diff: { diff: string; path: string };
	context: { ctx_pct: number; pinned: string[] };
	stream_end: Record<string, never>;
	agent_state: { state: AgentState };
	verify_result: {
		passed: boolean;
		summary: string;
		errors: string[];
		full_output: string;
	};
	decision: { tool_name: string; arguments: ToolArguments; outcome: DecisionOutcome };
};

export type UIEventType = keyof EventPayloads;

type EventOf<T extends UIEventType> = {
	eventId: string;
	type: T;
	timestamp: number;
	sessionId: string;
	source: EventSource;
	payload: EventPayloads[T];
	/** Turn that produced the event; the render loop drops events of a cancelled turn. */
	turnId?: number;
};

export type UIEvent = { [T in UIEventType]: EventOf<T> }[UIEventType];
