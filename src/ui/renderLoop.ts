import { CRITICAL_FAILURE_PREFIX, describeError } from "../errors";
import type { UIEventBus } from "../events/bus";
import type { AgentState, EventPayloads, UIEvent } from "../events/types";
import { silentLogger, type Logger } from "../logger";
import type { ToolArguments } from "../tools/types";
import { Timeline } from "./timeline";
import { detectVerify, type VerifyResult } from "./verify";

export type DiffSource = (toolName: string, args: ToolArguments) => string | undefined;

export type RenderState = {
	agentStatus: AgentState;
	activity: string | null;
	ctxPct: number;
	pinned: string[];
	diff: { diff: string; path: string } | null;
	verify: Pick<VerifyResult, "passed" | "summary"> | null;
	tokensReceived: number;
	streamStartedAt: number;
};

export type RenderLoopOptions = {
	bus: UIEventBus;
	timeline?: Timeline;
	tickMs: number;
	frameMs: number;
	drainLimit: number;
	diffSource?: DiffSource;
	logger?: Logger;
	now?: () => number;
};

const INITIAL_STATE: RenderState = {
	agentStatus: "idle",
	activity: null,
	ctxPct: 0,
	pinned: [],
	diff: null,
	verify: null,
	tokensReceived: 0,
	streamStartedAt: 0,
};

function pathArg(args: ToolArguments): string {
	const value = args["path"];
	return typeof value === "string" ? value : "";
}

/**
 * Sole consumer of the event bus. Every tick drains a bounded batch, applies
 * it in arrival order and flushes streamed text at most once per frame.
 */
export class RenderLoop {
	readonly timeline: Timeline;
	private state: RenderState = INITIAL_STATE;
	private readonly listeners = new Set<() => void>();
	private timer: ReturnType<typeof setInterval> | null = null;
	private lastFlush = Number.NEGATIVE_INFINITY;
	private acceptedTurn: number | null = null;
	private readonly logger: Logger;
	private readonly now: () => number;

	constructor(private readonly options: RenderLoopOptions) {
		this.timeline = options.timeline ?? new Timeline();
		this.logger = (options.logger ?? silentLogger).child("render");
		this.now = options.now ?? Date.now;
	}

	get snapshot(): RenderState {
		return this.state;
	}

	subscribe(listener: () => void): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	start(): void {
		if (this.timer) return;
		this.timer = setInterval(() => this.tick(), this.options.tickMs);
	}

	stop(): void {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	tokensPerSecond(): number {
		const { tokensReceived, streamStartedAt } = this.state;
		if (!streamStartedAt || tokensReceived === 0) return 0;
		const seconds = (this.now() - streamStartedAt) / 1000;
		return seconds > 0 ? tokensReceived / seconds : 0;
	}

	/** Called synchronously when a turn is submitted. */
	beginTurn(turnId: number, userText: string): void {
		this.acceptedTurn = turnId;
		this.timeline.add({ kind: "user", text: userText });
		this.update({
			agentStatus: "thinking",
			tokensReceived: 0,
			streamStartedAt: this.now(),
		});
		this.notify();
	}

	/** Synchronous cancellation; later events of the cancelled turn are dropped. */
	interrupt(): void {
		this.acceptedTurn = null;
		this.timeline.interrupt();
		this.update({ agentStatus: "idle", activity: null, tokensReceived: 0, streamStartedAt: 0 });
		this.logger.info("turn interrupted");
		this.notify();
	}

	clear(): void {
		this.timeline.clear();
		this.update({ diff: null, verify: null, pinned: [], ctxPct: 0 });
		this.notify();
	}

	tick(): void {
		try {
			let changed = false;
			const events = this.options.bus.drain(this.options.drainLimit);
			for (const event of events) {
				if (this.apply(event)) changed = true;
			}
			const now = this.now();
			if (this.timeline.pending && now - this.lastFlush >= this.options.frameMs) {
				this.timeline.flush();
				this.lastFlush = now;
				changed = true;
			}
			if (changed) this.notify();
		} catch (err) {
			this.logger.error("drain failed", { error: describeError(err) });
		}
	}

	private apply(event: UIEvent): boolean {
		if (event.turnId !== undefined && event.turnId !== this.acceptedTurn) return false;

		switch (event.type) {
			case "message": {
				const { delta } = event.payload;
				const words = delta.split(/\s+/).filter(Boolean).length;
				const agentStatus: AgentState =
					this.state.agentStatus === "thinking" ? "acting" : this.state.agentStatus;
				this.update({ tokensReceived: this.state.tokensReceived + words, agentStatus });
				this.timeline.appendDelta(delta);
				return true;
			}
			case "tool_result":
				this.applyToolResult(event.payload, event.source === "system");
				return true;
			case "decision":
				this.timeline.add({
					kind: "decision",
					toolName: event.payload.tool_name,
					arguments: event.payload.arguments,
					outcome: event.payload.outcome,
				});
				return true;
			case "stream_end":
				this.timeline.closeStream("done");
				this.update({
					agentStatus: "idle",
					activity: null,
					tokensReceived: 0,
					streamStartedAt: 0,
				});
				return true;
			case "status":
				this.update({
					activity: event.payload.status === "processing" ? "Processing request..." : null,
				});
				return true;
			case "context":
				this.update({ ctxPct: event.payload.ctx_pct, pinned: event.payload.pinned });
				return true;
			case "diff":
				if (!event.payload.diff) return false;
				this.update({ diff: event.payload });
				return true;
			case "plan":
				if (!event.payload.content) return false;
				this.timeline.add({ kind: "plan", content: event.payload.content });
				return true;
			case "agent_state":
				this.update({ agentStatus: event.payload.state });
				return true;
			case "verify_result":
				this.applyVerify(event.payload);
				return true;
		}
	}

	private applyToolResult(payload: EventPayloads["tool_result"], fromSystem: boolean): void {
		const { tool_name: toolName, content, is_error: isError, arguments: args } = payload;

		if (fromSystem && content.startsWith(CRITICAL_FAILURE_PREFIX)) {
			this.timeline.fail(content);
			this.update({ activity: null });
			this.logger.error(`system failure: ${content}`);
			return;
		}

		const diff = this.options.diffSource?.(toolName, args);
		this.timeline.add({
			kind: "action",
			toolName,
			arguments: args,
			content,
			isError,
			...(diff ? { diff } : {}),
		});
		this.update({ agentStatus: "acting", activity: null });
		if (diff) this.update({ diff: { diff, path: pathArg(args) } });

		const preview = content.length > 200 ? `${content.slice(0, 200)}…` : content;
		if (isError) this.logger.warn(`tool ${toolName} -> ${preview}`);
		else this.logger.info(`tool ${toolName} -> ${preview}`);

		const verify = detectVerify(toolName, args, content, isError);
		if (verify) {
			this.update({ agentStatus: "verifying" });
			this.applyVerify(verify);
		}
	}

	private applyVerify(result: VerifyResult): void {
		this.timeline.add({
			kind: "verify",
			passed: result.passed,
			summary: result.summary,
			errors: result.errors,
		});
		this.update({ verify: { passed: result.passed, summary: result.summary } });
		this.logger.info(result.summary, { passed: result.passed });
	}

	private update(patch: Partial<RenderState>): void {
		this.state = { ...this.state, ...patch };
	}

	private notify(): void {
		for (const listener of this.listeners) listener();
	}
}
