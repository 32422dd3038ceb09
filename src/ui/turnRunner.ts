import type { AgentChunk } from "../agent/loop";
import { criticalFailure, describeError } from "../errors";
import { createEvent, type EventInit, type UIEventBus } from "../events/bus";
import type { EventSource } from "../events/types";
import { silentLogger, type Logger } from "../logger";
import type { DecisionRecord } from "../safety/gate";
import type { RenderLoop } from "./renderLoop";

export interface TurnAgent {
	run(userText: string, signal: AbortSignal): AsyncIterable<AgentChunk>;
}

export type TurnRunnerOptions = {
	bus: UIEventBus;
	agent: TurnAgent;
	renderLoop: RenderLoop;
	sessionId?: string;
	/** Context usage reported after each completed turn. */
	contextPercent?: () => number;
	logger?: Logger;
};

const FILE_TOOLS = new Set(["write_file", "str_replace", "read_file"]);

/**
 * Owns the single in-flight turn: the processing flag, its AbortController
 * and the background task that feeds the bus. Every turn ends with exactly
 * one stream_end, however it finishes.
 */
export class TurnRunner {
	private turnId = 0;
	private controller: AbortController | null = null;
	private task: Promise<void> = Promise.resolve();
	private settled = true;
	private activeText = "";
	private readonly pinned = new Set<string>();
	private readonly logger: Logger;

	constructor(private readonly options: TurnRunnerOptions) {
		this.logger = (options.logger ?? silentLogger).child("turn");
	}

	get processing(): boolean {
		return this.controller !== null;
	}

	/**
	 * True until the last turn's task has finished, which after an interrupt
	 * can be later than `processing` going false (a tool still running).
	 */
	get busy(): boolean {
		return this.processing || !this.settled;
	}

	/** First line of the request being worked on, for the header. */
	get activeTask(): string {
		return this.activeText;
	}

	get currentTurn(): number {
		return this.turnId;
	}

	/** Returns false, and does nothing, while a turn or its cancelled task is in flight. */
	submit(text: string): boolean {
		const trimmed = text.trim();
		if (!trimmed || this.busy) return false;

		const turnId = ++this.turnId;
		const controller = new AbortController();
		this.controller = controller;
		this.settled = false;
		this.activeText = (trimmed.split("\n")[0] ?? "").slice(0, 60);
		this.options.renderLoop.beginTurn(turnId, trimmed);
		this.publish(turnId, { type: "status", payload: { status: "processing" } }, "ui");
		this.logger.info(`turn ${turnId} started`, { text: trimmed.slice(0, 80) });
		this.task = this.process(trimmed, turnId, controller);
		return true;
	}

	/** Cancels the in-flight turn synchronously. */
	interrupt(): boolean {
		const controller = this.controller;
		if (!controller) return false;
		controller.abort();
		this.release();
		this.options.renderLoop.interrupt();
		return true;
	}

	recordDecision(record: DecisionRecord): void {
		this.publish(this.turnId, {
			type: "decision",
			payload: {
				tool_name: record.toolName,
				arguments: record.arguments,
				outcome: record.outcome,
			},
		});
	}

	clearPinned(): void {
		this.pinned.clear();
	}

	/** Resolves when the current background task has finished. */
	idle(): Promise<void> {
		return this.task;
	}

	private async process(
		text: string,
		turnId: number,
		controller: AbortController
	): Promise<void> {
		const { signal } = controller;
		try {
			for await (const chunk of this.options.agent.run(text, signal)) {
				if (signal.aborted) break;
				this.publishChunk(turnId, chunk);
			}
			if (!signal.aborted) {
				this.publish(turnId, { type: "status", payload: { status: "ready" } }, "ui");
				this.publishContext(turnId);
			}
		} catch (err) {
			if (signal.aborted) {
				this.logger.info(`turn ${turnId} cancelled`);
			} else {
				this.logger.error(`turn ${turnId} failed`, { error: describeError(err) });
				this.publish(
					turnId,
					{
						type: "tool_result",
						payload: {
							tool_name: "system",
							content: criticalFailure(err),
							is_error: true,
							arguments: {},
						},
					},
					"system"
				);
				this.publish(turnId, { type: "status", payload: { status: "ready" } }, "ui");
			}
		} finally {
			if (this.controller === controller) this.release();
			this.settled = true;
			this.publish(turnId, { type: "stream_end", payload: {} });
		}
	}

	private publishChunk(turnId: number, chunk: AgentChunk): void {
		switch (chunk.kind) {
			case "text":
				this.publish(turnId, {
					type: "message",
					payload: { role: "assistant", delta: chunk.text },
				});
				return;
			case "plan":
				this.publish(turnId, { type: "plan", payload: { content: chunk.content } });
				return;
			case "tool_result": {
				const path = chunk.arguments["path"];
				if (!chunk.isError && FILE_TOOLS.has(chunk.toolName) && typeof path === "string") {
					this.pinned.add(path);
				}
				this.publish(turnId, {
					type: "tool_result",
					payload: {
						tool_name: chunk.toolName,
						content: chunk.content,
						is_error: chunk.isError,
						arguments: chunk.arguments,
					},
				});
				return;
			}
		}
	}

	private publishContext(turnId: number): void {
		this.publish(
			turnId,
			{
				type: "context",
				payload: {
					ctx_pct: this.options.contextPercent?.() ?? 0,
					pinned: Array.from(this.pinned),
				},
			},
			"ui"
		);
	}

	private publish(turnId: number, init: EventInit, source: EventSource = "agent"): void {
		this.options.bus.publish(
			createEvent(init, { source, turnId, sessionId: this.options.sessionId })
		);
	}

	private release(): void {
		this.controller = null;
		this.activeText = "";
	}
}
