import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import React from "react";
import { render } from "ink-testing-library";
import { App } from "../src/app";
import { DEFAULT_CONFIG } from "../src/config";
import { Logger, MemorySink } from "../src/logger";
import { createSession, type Session } from "../src/session";
import { stripAnsi, tick } from "./helpers/ansi";
import { call, ScriptedProvider, text, type ScriptedReply } from "./helpers/scriptedProvider";
import { createTempWorkspace, type TempWorkspace } from "./helpers/tempWorkspace";

let ws: TempWorkspace;

beforeEach(async () => {
	ws = await createTempWorkspace();
});

afterEach(async () => {
	await ws.release();
});

function mount(replies: ScriptedReply[]) {
	const memory = new MemorySink();
	const session: Session = createSession({
		cfg: DEFAULT_CONFIG,
		workspace: ws.dir,
		provider: new ScriptedProvider(replies),
		logger: new Logger("info", [memory]),
	});
	const ui = render(<App session={session} logs={memory} autoStart={false} />);
	const frame = () => stripAnsi(ui.lastFrame());
	const type = async (input: string) => {
		ui.stdin.write(input);
		await tick();
	};
	// Runs the turn to completion, then drains the bus the way the timer would.
	const settle = async () => {
		await session.runner.idle();
		session.renderLoop.tick();
		await tick();
	};
	return { session, ui, frame, type, settle };
}

describe("App", () => {
	it("blocks side effects in SAFE mode and explains how to arm", async () => {
		const { session, frame, type, settle, ui } = mount([
			[call("write_file", { path: "a.txt", content: "hello\n" })],
			[text("I need ARMED mode for that.")],
		]);
		await tick();
		expect(frame()).toContain("[SAFE]");

		await type("create a.txt");
		await type("\r");
		await settle();

		await vi.waitFor(() => expect(frame()).toContain("I need ARMED mode for that."));
		expect(frame()).toContain("write_file needs ARMED mode. Press Alt+A to arm the session.");
		expect(frame()).toContain("◆ write_file blocked: ARMED mode required");
		await expect(ws.read("a.txt")).rejects.toThrow();
		expect(session.gate.mode).toBe("SAFE");
		ui.unmount();
	});

	it("arms the session and applies an approved write with its diff", async () => {
		const { session, frame, type, settle, ui } = mount([
			[call("write_file", { path: "a.txt", content: "hello\n" })],
			[text("Created a.txt.")],
		]);
		await tick();

		await type("\u001Ba");
		await vi.waitFor(() => expect(frame()).toContain("Arm the session?"));
		await tick();
		await type("y");
		expect(session.gate.mode).toBe("ARMED");
		await vi.waitFor(() => expect(frame()).toContain("[ARMED]"));

		await type("create a.txt");
		await type("\r");
		await vi.waitFor(() => expect(frame()).toContain("Approve write_file?"));
		expect(session.gate.mode).toBe("ARMED_PENDING");
		expect(frame()).toContain("+hello");
		await tick();
		await type("y");
		await settle();

		expect(await ws.read("a.txt")).toBe("hello\n");
		expect(session.gate.mode).toBe("ARMED");
		await vi.waitFor(() => expect(frame()).toContain("Created a.txt."));
		expect(frame()).toContain("◆ write_file approved once");
		expect(frame()).toContain("✓ Write file");
		ui.unmount();
	});

	it("denies the pending approval when the user presses n", async () => {
		const { session, frame, type, settle, ui } = mount([
			[call("run_command", { command: "ls" })],
			[text("Okay, not running it.")],
		]);
		session.gate.arm();
		await tick();

		await type("list files");
		await type("\r");
		await vi.waitFor(() => expect(frame()).toContain("Approve run_command?"));
		await tick();
		await type("n");
		await settle();

		await vi.waitFor(() => expect(frame()).toContain("Okay, not running it."));
		expect(frame()).toContain("◆ run_command denied");
		expect(frame()).not.toContain("Approve run_command?");
		ui.unmount();
	});

	it("offers to clear only when the transcript has cards", async () => {
		const { frame, type, settle, ui } = mount([[text("Hello there.")]]);
		await tick();

		await type("\u000C");
		await tick();
		expect(frame()).not.toContain("Clear the transcript?");

		await type("hi");
		await type("\r");
		await settle();
		await vi.waitFor(() => expect(frame()).toContain("Hello there."));

		await type("\u000C");
		await vi.waitFor(() => expect(frame()).toContain("Clear the transcript?"));
		expect(frame()).toContain("2 card(s) will be removed and category approvals reset.");
		ui.unmount();
	});
});
