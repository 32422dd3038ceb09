import type { DecisionOutcome } from "../safety/gate";
import type { ToolArguments } from "../tools/types";

export type StreamState = "streaming" | "done" | "interrupted" | "error";

export type Card =
	| { kind: "user"; id: number; text: string }
	| { kind: "assistant"; id: number; text: string; state: StreamState }
	| {
			kind: "action";
			id: number;
			toolName: string;
			arguments: ToolArguments;
			content: string;
			isError: boolean;
			diff?: string;
	  }
	| {
			kind: "decision";
			id: number;
			toolName: string;
			arguments: ToolArguments;
			outcome: DecisionOutcome;
	  }
	| { kind: "plan"; id: number; content: string }
	| {
			kind: "verify";
			id: number;
			passed: boolean;
			summary: string;
			errors: string[];
	  };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type NewCard = DistributiveOmit<Card, "id">;

export const INTERRUPTED_MARKER = "[Interrupted]";

/**
 * Ordered transcript plus the in-flight streaming buffer. Deltas collect in
 * the buffer and reach the open assistant card only on flush; inserting any
 * other card flushes and closes the stream first, so text that arrived
 * before a card always renders above it.
 */
export class Timeline {
	private list: Card[] = [];
	private nextId = 1;
	private buffer = "";
	private streamId: number | null = null;

	get cards(): readonly Card[] {
		return this.list;
	}

	get pending(): string {
		return this.buffer;
	}

	get isStreaming(): boolean {
		return this.streamId !== null;
	}

	appendDelta(delta: string): void {
		if (this.streamId === null) {
			this.streamId = this.push({ kind: "assistant", text: "", state: "streaming" });
		}
		this.buffer += delta;
	}

	/** Moves buffered text into the open card. Returns whether anything changed. */
	flush(): boolean {
		if (this.buffer === "" || this.streamId === null) return false;
		const text = this.buffer;
		this.buffer = "";
		this.updateStream((card) => ({ ...card, text: card.text + text }));
		return true;
	}

	closeStream(state: Exclude<StreamState, "streaming"> = "done"): void {
		this.flush();
		if (this.streamId === null) return;
		this.updateStream((card) => ({ ...card, state }));
		this.streamId = null;
	}

	/** Marks the open stream (or a fresh card) with the interruption marker. */
	interrupt(): void {
		this.flush();
		if (this.streamId === null) {
			this.streamId = this.push({ kind: "assistant", text: "", state: "streaming" });
		}
		this.updateStream((card) => ({
			...card,
			text: card.text ? `${card.text}\n${INTERRUPTED_MARKER}` : INTERRUPTED_MARKER,
		}));
		this.closeStream("interrupted");
	}

	/** Appends a failure notice to the open stream, or to a new error card. */
	fail(message: string): void {
		this.flush();
		if (this.streamId === null) {
			this.streamId = this.push({ kind: "assistant", text: "", state: "streaming" });
		}
		this.updateStream((card) => ({
			...card,
			text: card.text ? `${card.text}\n${message}` : message,
		}));
		this.closeStream("error");
	}

	add(card: NewCard): number {
		this.closeStream();
		return this.push(card);
	}

	clear(): void {
		this.list = [];
		this.buffer = "";
		this.streamId = null;
	}

	private push(card: NewCard): number {
		const id = this.nextId++;
		this.list = [...this.list, { ...card, id }];
		return id;
	}

	private updateStream(
		fn: (card: Extract<Card, { kind: "assistant" }>) => Extract<Card, { kind: "assistant" }>
	): void {
		const id = this.streamId;
		this.list = this.list.map((card) =>
			card.id === id && card.kind === "assistant" ? fn(card) : card
		);
	}
}
