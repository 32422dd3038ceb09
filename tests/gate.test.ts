import { describe, it, expect, vi } from "vitest";
import { applyPatch } from "diff";
import { ApprovalCategoryTracker } from "../src/safety/approvals";
import { buildDiffPreview, unifiedDiff } from "../src/safety/diffPreview";
import {
	ConfirmationGate,
	type ConfirmationDecision,
	type ConfirmationSurface,
	type DecisionRecord,
	type DecisionRequest,
} from "../src/safety/gate";
import { withTempWorkspace } from "./helpers/tempWorkspace";

function scriptedSurface(...decisions: ConfirmationDecision[]) {
	const requests: DecisionRequest[] = [];
	const modesSeen: string[] = [];
	let gate: ConfirmationGate | null = null;
	const surface = {
		isAvailable: () => true,
		requestDecision: vi.fn(async (request: DecisionRequest) => {
			requests.push(request);
			if (gate) modesSeen.push(gate.mode);
			return decisions.shift() ?? "deny";
		}),
		notifyArmedRequired: vi.fn((_toolName: string) => undefined),
	} satisfies ConfirmationSurface;
	return {
		surface,
		requests,
		modesSeen,
		bind: (g: ConfirmationGate) => {
			gate = g;
		},
	};
}

function armedGate(workspace: string, ...decisions: ConfirmationDecision[]) {
	const scripted = scriptedSurface(...decisions);
	const records: DecisionRecord[] = [];
	const gate = new ConfirmationGate({
		workspace,
		surface: scripted.surface,
		initialMode: "ARMED",
		onDecision: (r) => records.push(r),
	});
	scripted.bind(gate);
	return { gate, records, ...scripted };
}

describe("ApprovalCategoryTracker", () => {
	it("classifies built-in tools and defaults unknown ones to other", () => {
		const tracker = new ApprovalCategoryTracker();
		expect(tracker.classify("write_file")).toBe("file_write");
		expect(tracker.classify("str_replace")).toBe("file_write");
		expect(tracker.classify("run_command")).toBe("shell_exec");
		expect(tracker.classify("git_commit")).toBe("git_op");
		expect(tracker.classify("git_add")).toBe("git_op");
		expect(tracker.classify("mystery_tool")).toBe("other");
	});

	it("does not treat Object.prototype names as built-in tools", () => {
		const tracker = new ApprovalCategoryTracker();
		expect(tracker.classify("constructor")).toBe("other");
		expect(tracker.classify("toString")).toBe("other");
		expect(tracker.classify("__proto__")).toBe("other");
		expect(tracker.classify("hasOwnProperty")).toBe("other");
	});

	it("prefers the registration-time profile", () => {
		const tracker = new ApprovalCategoryTracker((name) =>
			name === "deploy" ? { category: "shell_exec", label: "Deploy" } : undefined
		);
		expect(tracker.classify("deploy")).toBe("shell_exec");
		expect(tracker.classify("write_file")).toBe("file_write");
	});

	it("approves idempotently and resets", () => {
		const tracker = new ApprovalCategoryTracker();
		tracker.approve("file_write");
		tracker.approve("file_write");
		expect(tracker.approved()).toEqual(["file_write"]);
		expect(tracker.isApproved("shell_exec")).toBe(false);
		tracker.reset();
		expect(tracker.isApproved("file_write")).toBe(false);
	});
});

describe("ConfirmationGate", () => {
	it("denies every gated call in SAFE mode without opening a dialog", async () => {
		const scripted = scriptedSurface("approve_once");
		const records: DecisionRecord[] = [];
		const gate = new ConfirmationGate({
			workspace: "/tmp",
			surface: scripted.surface,
			onDecision: (r) => records.push(r),
		});
		expect(gate.mode).toBe("SAFE");
		expect(await gate.confirm("write_file", { path: "a.txt", content: "x" })).toBe(false);
		expect(gate.mode).toBe("SAFE");
		expect(scripted.surface.requestDecision).not.toHaveBeenCalled();
		expect(scripted.surface.notifyArmedRequired).toHaveBeenCalledWith("write_file");
		expect(records.map((r) => r.outcome)).toEqual(["armed_required"]);
	});

	it("asks once, then auto-approves the category", async () => {
		await withTempWorkspace(async ({ dir }) => {
			const { gate, records, requests, modesSeen } = armedGate(dir, "approve_category");
			expect(await gate.confirm("write_file", { path: "a.txt", content: "1" })).toBe(true);
			expect(await gate.confirm("write_file", { path: "b.txt", content: "2" })).toBe(true);
			expect(await gate.confirm("str_replace", { path: "a.txt", old_str: "1", new_str: "2" })).toBe(true);
			expect(requests).toHaveLength(1);
			expect(modesSeen).toEqual(["ARMED_PENDING"]);
			expect(gate.mode).toBe("ARMED");
			expect(gate.tracker.approved()).toEqual(["file_write"]);
			expect(records.map((r) => r.outcome)).toEqual([
				"approved_category",
				"approved_category",
				"approved_category",
			]);
		});
	});

	it("keeps asking after approve_once and stays armed after a denial", async () => {
		await withTempWorkspace(async ({ dir }) => {
			const { gate, records, requests } = armedGate(dir, "approve_once", "deny");
			expect(await gate.confirm("run_command", { command: "ls" })).toBe(true);
			expect(await gate.confirm("run_command", { command: "ls" })).toBe(false);
			expect(requests).toHaveLength(2);
			expect(gate.mode).toBe("ARMED");
			expect(gate.tracker.approved()).toEqual([]);
			expect(records.map((r) => r.outcome)).toEqual(["approved", "denied"]);
		});
	});

	it("describes the risk in the dialog request", async () => {
		await withTempWorkspace(async ({ dir }) => {
			const { gate, requests } = armedGate(dir, "deny");
			await gate.confirm("git_commit", { message: "wip" });
			expect(requests[0]).toEqual({
				toolName: "git_commit",
				arguments: { message: "wip" },
				diff: "",
				reason: "Changes repository state",
				severity: "Medium",
				category: "git_op",
			});
		});
	});

	it("fails closed without a usable surface", async () => {
		const detached = new ConfirmationGate({ workspace: "/tmp", initialMode: "ARMED" });
		expect(await detached.confirm("write_file", { path: "a", content: "" })).toBe(false);

		const unavailable = new ConfirmationGate({
			workspace: "/tmp",
			initialMode: "ARMED",
			surface: {
				isAvailable: () => false,
				requestDecision: async () => "approve_once",
				notifyArmedRequired: () => undefined,
			},
		});
		expect(await unavailable.confirm("write_file", { path: "a", content: "" })).toBe(false);

		const throwing = new ConfirmationGate({
			workspace: "/tmp",
			initialMode: "ARMED",
			surface: {
				isAvailable: () => true,
				requestDecision: async () => {
					throw new Error("terminal went away");
				},
				notifyArmedRequired: () => undefined,
			},
		});
		expect(await throwing.confirm("run_command", { command: "ls" })).toBe(false);
		expect(throwing.mode).toBe("ARMED");
	});

	it("forgets category approvals on disarm and on reset", async () => {
		await withTempWorkspace(async ({ dir }) => {
			const { gate, requests } = armedGate(dir, "approve_category", "approve_category", "deny");
			await gate.confirm("run_command", { command: "ls" });
			gate.resetApprovals();
			expect(gate.tracker.approved()).toEqual([]);
			await gate.confirm("run_command", { command: "ls" });
			gate.disarm();
			expect(gate.mode).toBe("SAFE");
			expect(gate.tracker.approved()).toEqual([]);
			gate.arm();
			expect(await gate.confirm("run_command", { command: "ls" })).toBe(false);
			expect(requests).toHaveLength(3);
		});
	});

	it("notifies subscribers on mode changes", () => {
		const gate = new ConfirmationGate({ workspace: "/tmp" });
		const listener = vi.fn();
		const unsubscribe = gate.subscribe(listener);
		gate.arm();
		gate.disarm();
		unsubscribe();
		gate.arm();
		expect(listener).toHaveBeenCalledTimes(2);
	});

	it("queues the approved diff for the matching tool result", async () => {
		await withTempWorkspace(async ({ dir, write }) => {
			await write("notes.txt", "alpha\nbeta\n");
			const { gate, requests } = armedGate(dir, "approve_once");
			const args = { path: "notes.txt", old_str: "beta", new_str: "gamma" };
			expect(await gate.confirm("str_replace", args)).toBe(true);
			const diff = requests[0]?.diff ?? "";
			expect(diff).toContain("-beta");
			expect(gate.takePendingDiff("str_replace", args)).toBe(diff);
			expect(gate.takePendingDiff("str_replace", args)).toBeUndefined();
		});
	});
});

describe("buildDiffPreview", () => {
	it("previews a write that applyPatch turns into the new content", async () => {
		await withTempWorkspace(async ({ dir, write, read }) => {
			await write("a.txt", "alpha\nbeta\n");
			const diff = await buildDiffPreview(dir, "write_file", { path: "a.txt", content: "alpha\ngamma\n" });
			expect(diff).toContain("-beta");
			expect(diff).toContain("+gamma");
			expect(applyPatch("alpha\nbeta\n", diff)).toBe("alpha\ngamma\n");
			expect(await read("a.txt")).toBe("alpha\nbeta\n");
		});
	});

	it("treats a missing file as empty for writes", async () => {
		await withTempWorkspace(async ({ dir }) => {
			const diff = await buildDiffPreview(dir, "write_file", { path: "new.txt", content: "hello\n" });
			expect(diff).toContain("+hello");
			expect(applyPatch("", diff)).toBe("hello\n");
		});
	});

	it("previews only the first replacement", async () => {
		await withTempWorkspace(async ({ dir, write }) => {
			await write("r.txt", "x\ny\nx\n");
			const diff = await buildDiffPreview(dir, "str_replace", { path: "r.txt", old_str: "x", new_str: "z" });
			expect(applyPatch("x\ny\nx\n", diff)).toBe("z\ny\nx\n");
		});
	});

	it("returns an empty preview when there is nothing to show", async () => {
		await withTempWorkspace(async ({ dir, write }) => {
			await write("same.txt", "keep\n");
			expect(await buildDiffPreview(dir, "write_file", { path: "same.txt", content: "keep\n" })).toBe("");
			expect(await buildDiffPreview(dir, "str_replace", { path: "missing.txt", old_str: "a", new_str: "b" })).toBe("");
			expect(await buildDiffPreview(dir, "str_replace", { path: "same.txt", old_str: "absent", new_str: "b" })).toBe("");
			expect(await buildDiffPreview(dir, "run_command", { command: "ls" })).toBe("");
			expect(await buildDiffPreview(dir, "write_file", { path: "../out.txt", content: "x" })).toBe("");
		});
	});

	it("diffs identical strings to nothing", () => {
		expect(unifiedDiff("f.txt", "a\n", "a\n")).toBe("");
	});
});
