import { randomUUID } from "node:crypto";
import { Conversation } from "./agent/conversation";
import { AgentLoop } from "./agent/loop";
import type { LlmProvider } from "./agent/provider";
import type { AppConfig } from "./config";
import { UIEventBus } from "./events/bus";
import { silentLogger, type Logger } from "./logger";
import { ConfirmationGate } from "./safety/gate";
import { createToolRegistry } from "./tools";
import type { SpawnFn } from "./tools/process";
import type { ToolRegistry } from "./tools/registry";
import { RenderLoop } from "./ui/renderLoop";
import { TurnRunner } from "./ui/turnRunner";

export type SessionOptions = {
	cfg: AppConfig;
	workspace: string;
	provider: LlmProvider;
	logger?: Logger;
	armed?: boolean;
	registry?: ToolRegistry;
	spawnFn?: SpawnFn;
	now?: () => number;
};

export type Session = {
	readonly id: string;
	readonly cfg: AppConfig;
	readonly workspace: string;
	readonly model: string;
	readonly bus: UIEventBus;
	readonly registry: ToolRegistry;
	readonly conversation: Conversation;
	readonly gate: ConfirmationGate;
	readonly agent: AgentLoop;
	readonly renderLoop: RenderLoop;
	readonly runner: TurnRunner;
	/** Empties the transcript and history and forgets category approvals. */
	clear(): boolean;
};

/** Wires the producer (turn runner) and consumer (render loop) around one bus. */
export function createSession(options: SessionOptions): Session {
	const { cfg, workspace, provider } = options;
	const logger = options.logger ?? silentLogger;
	const id = randomUUID();
	const bus = new UIEventBus();
	const registry = options.registry ?? createToolRegistry(cfg, workspace, options.spawnFn);
	const conversation = new Conversation();
	const lookup = (name: string) => registry.profileOf(name);

	const gate = new ConfirmationGate({
		workspace,
		lookup,
		initialMode: options.armed ? "ARMED" : "SAFE",
		onDecision: (record) => runner.recordDecision(record),
		logger,
	});

	const agent = new AgentLoop({
		provider,
		registry,
		conversation,
		onConfirmation: (toolName, args) => gate.confirm(toolName, args),
		isSafeMode: () => gate.mode === "SAFE",
		maxIterations: cfg.agent.maxIterations,
		logger,
	});

	const renderLoop = new RenderLoop({
		bus,
		tickMs: cfg.ui.tickMs,
		frameMs: cfg.ui.frameMs,
		drainLimit: cfg.ui.drainLimit,
		diffSource: (toolName, args) => gate.takePendingDiff(toolName, args),
		logger,
		now: options.now,
	});

	const runner = new TurnRunner({
		bus,
		agent,
		renderLoop,
		sessionId: id,
		contextPercent: () => conversation.contextPercent(cfg.context.maxTokens),
		logger,
	});

	return {
		id,
		cfg,
		workspace,
		model: provider.model,
		bus,
		registry,
		conversation,
		gate,
		agent,
		renderLoop,
		runner,
		clear() {
			if (runner.busy) return false;
			renderLoop.clear();
			conversation.clear();
			runner.clearPinned();
			gate.resetApprovals();
			logger.info("transcript cleared; approvals reset");
			return true;
		},
	};
}
