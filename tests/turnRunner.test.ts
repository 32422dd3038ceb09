import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { Conversation } from "../src/agent/conversation";
import { AgentLoop, type AgentChunk } from "../src/agent/loop";
import { UIEventBus } from "../src/events/bus";
import type { UIEvent } from "../src/events/types";
import { RenderLoop } from "../src/ui/renderLoop";
import { ToolRegistry } from "../src/tools/registry";
import { defineTool } from "../src/tools/types";
import { TurnRunner, type TurnAgent } from "../src/ui/turnRunner";
import { call, ScriptedProvider, text } from "./helpers/scriptedProvider";

type Script = (signal: AbortSignal) => AsyncGenerator<AgentChunk>;

function setup(script: Script) {
	const bus = new UIEventBus();
	const renderLoop = new RenderLoop({ bus, tickMs: 50, frameMs: 0, drainLimit: 100, now: () => 0 });
	const agent: TurnAgent = { run: (_text, signal) => script(signal) };
	const runner = new TurnRunner({
		bus,
		agent,
		renderLoop,
		sessionId: "session-1",
		contextPercent: () => 12,
	});
	return { bus, renderLoop, runner };
}

function types(events: readonly UIEvent[]): string[] {
	return events.map((e) => e.type);
}

function waitForAbort(signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal.aborted) resolve();
		else signal.addEventListener("abort", () => resolve(), { once: true });
	});
}

describe("TurnRunner", () => {
	it("publishes the turn's events in order and always ends with stream_end", async () => {
		const { bus, runner } = setup(async function* () {
			yield { kind: "text", text: "Hi" };
			yield {
				kind: "tool_result",
				toolName: "write_file",
				callId: "c1",
				content: "Wrote a.txt",
				isError: false,
				arguments: { path: "a.txt", content: "x" },
			};
		});

		expect(runner.submit("first line\nsecond")).toBe(true);
		expect(runner.processing).toBe(true);
		expect(runner.activeTask).toBe("first line");
		await runner.idle();

		const events = bus.drain(100);
		expect(types(events)).toEqual([
			"status",
			"message",
			"tool_result",
			"status",
			"context",
			"stream_end",
		]);
		expect(events.every((e) => e.turnId === 1 && e.sessionId === "session-1")).toBe(true);
		expect(events[4]?.payload).toEqual({ ctx_pct: 12, pinned: ["a.txt"] });
		expect(runner.processing).toBe(false);
		expect(runner.activeTask).toBe("");
	});

	it("refuses blank input and a second submit while processing", async () => {
		let release = () => {};
		const { runner } = setup(async function* () {
			await new Promise<void>((resolve) => {
				release = resolve;
			});
			yield { kind: "text", text: "done" };
		});

		expect(runner.submit("   ")).toBe(false);
		expect(runner.submit("go")).toBe(true);
		expect(runner.submit("again")).toBe(false);
		expect(runner.currentTurn).toBe(1);
		release();
		await runner.idle();
		expect(runner.submit("again")).toBe(true);
		expect(runner.currentTurn).toBe(2);
		await runner.idle();
	});

	it("turns an agent exception into a CRITICAL_FAILURE tool result", async () => {
		const { bus, runner, renderLoop } = setup(async function* () {
			yield { kind: "text", text: "Starting" };
			throw new Error("connection reset");
		});

		runner.submit("go");
		await runner.idle();
		const events = bus.drain(100);
		expect(types(events)).toEqual(["status", "message", "tool_result", "status", "stream_end"]);
		const failure = events[2];
		expect(failure?.source).toBe("system");
		expect(failure?.payload).toEqual({
			tool_name: "system",
			content: "CRITICAL_FAILURE: connection reset",
			is_error: true,
			arguments: {},
		});
		expect(runner.processing).toBe(false);

		for (const event of events) bus.publish(event);
		renderLoop.tick();
		expect(renderLoop.timeline.cards.at(-1)).toMatchObject({
			kind: "assistant",
			text: "Starting\nCRITICAL_FAILURE: connection reset",
			state: "error",
		});
	});

	it("interrupts synchronously and drops the cancelled turn's late events", async () => {
		const { bus, runner, renderLoop } = setup(async function* (signal) {
			yield { kind: "text", text: "partial" };
			await waitForAbort(signal);
			yield { kind: "text", text: " late" };
		});

		runner.submit("long task");
		await new Promise((resolve) => setTimeout(resolve, 0));
		renderLoop.tick();

		expect(runner.interrupt()).toBe(true);
		expect(runner.processing).toBe(false);
		expect(renderLoop.snapshot.agentStatus).toBe("idle");
		await runner.idle();
		renderLoop.tick();

		expect(bus.size).toBe(0);
		expect(renderLoop.timeline.cards.map((c) => (c.kind === "assistant" ? c.text : c.kind))).toEqual([
			"user",
			"partial\n[Interrupted]",
		]);
		expect(runner.interrupt()).toBe(false);
		expect(runner.submit("next")).toBe(true);
		expect(runner.currentTurn).toBe(2);
		runner.interrupt();
		await runner.idle();
	});

	it("publishes gate decisions under the current turn", () => {
		const { bus, runner } = setup(async function* () {});
		runner.submit("go");
		runner.recordDecision({
			toolName: "run_command",
			arguments: { command: "ls" },
			outcome: "approved",
			category: "shell_exec",
		});
		const decision = bus.drain(100).find((e) => e.type === "decision");
		expect(decision?.turnId).toBe(1);
		expect(decision?.payload).toEqual({
			tool_name: "run_command",
			arguments: { command: "ls" },
			outcome: "approved",
		});
	});

	it("keeps the history answerable when a turn is interrupted mid-tool", async () => {
		const started: string[] = [];
		let finishTool = () => {};
		const registry = new ToolRegistry();
		registry.register(
			defineTool({
				name: "slow_lookup",
				description: "waits until released",
				parameters: z.object({ key: z.string() }),
				async execute({ key }) {
					started.push(key);
					await new Promise<void>((resolve) => {
						finishTool = resolve;
					});
					return `value of ${key}`;
				},
			})
		);
		const provider = new ScriptedProvider([
			[call("slow_lookup", { key: "a" }, "c1"), call("slow_lookup", { key: "b" }, "c2")],
			[text("Fresh start.")],
		]);
		const conversation = new Conversation("sys");
		const bus = new UIEventBus();
		const renderLoop = new RenderLoop({ bus, tickMs: 50, frameMs: 0, drainLimit: 100, now: () => 0 });
		const runner = new TurnRunner({
			bus,
			renderLoop,
			agent: new AgentLoop({ provider, registry, conversation, maxIterations: 5 }),
		});

		runner.submit("first");
		await vi.waitFor(() => expect(started).toEqual(["a"]));
		expect(runner.interrupt()).toBe(true);
		expect(runner.processing).toBe(false);
		expect(runner.busy).toBe(true);
		expect(runner.submit("second")).toBe(false);

		finishTool();
		await runner.idle();
		expect(runner.busy).toBe(false);
		expect(started).toEqual(["a"]);

		expect(runner.submit("second")).toBe(true);
		await runner.idle();

		const sent = provider.requests[1]?.messages ?? [];
		expect(sent.map((m) => m.role)).toEqual(["system", "user", "assistant", "tool", "tool", "user"]);
		expect(sent.filter((m) => m.role === "tool")).toEqual([
			{
				role: "tool",
				callId: "c1",
				content: "Interrupted by the user. The call ran, but its result was discarded.",
			},
			{ role: "tool", callId: "c2", content: "Cancelled by the user before it ran." },
		]);
		expect(conversation.messages.at(-1)).toEqual({ role: "assistant", content: "Fresh start." });
	});
});
