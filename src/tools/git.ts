import { z } from "zod";
import { runCommand, type SpawnFn } from "./process";
import { defineTool, toolError, toolResult, type ToolResult } from "./types";
import { resolveWithin } from "./workspace";

export type GitToolOptions = {
	workspace: string;
	timeoutMs?: number;
	spawnFn?: SpawnFn;
};

async function git(args: string[], options: GitToolOptions): Promise<ToolResult> {
	const outcome = await runCommand("git", args, {
		cwd: options.workspace,
		timeoutMs: options.timeoutMs ?? 15_000,
		spawnFn: options.spawnFn,
	});
	if (outcome.spawnError?.code === "ENOENT") {
		return toolError("git executable not found", "install git and make sure it is on PATH");
	}
	if (outcome.timedOut) {
		return toolError(`git ${args[0]} timed out`, "retry once the repository is idle");
	}
	const text = [outcome.stdout.trim(), outcome.stderr.trim()]
		.filter(Boolean)
		.join("\n");
	if (outcome.code !== 0) {
		return toolResult(`git ${args[0]} failed (exit ${outcome.code}):\n${text}`, true);
	}
	return toolResult(text || `git ${args[0]}: ok`);
}

export function gitStatusTool(options: GitToolOptions) {
	return defineTool({
		name: "git_status",
		description: "Show the working tree status in short format.",
		parameters: z.object({}),
		async execute() {
			return await git(["status", "--short", "--branch"], options);
		},
	});
}

export function gitAddTool(options: GitToolOptions) {
	return defineTool({
		name: "git_add",
		description: "Stage files for the next commit.",
		parameters: z.object({
			paths: z.array(z.string().min(1)).min(1, "at least one path"),
		}),
		dangerous: true,
		async execute({ paths }) {
			for (const p of paths) {
				if (!(await resolveWithin(options.workspace, p))) {
					return toolError(`Path '${p}' escapes the workspace`, "stage files inside the workspace");
				}
			}
			return await git(["add", "--", ...paths], options);
		},
	});
}

export function gitCommitTool(options: GitToolOptions) {
	return defineTool({
		name: "git_commit",
		description: "Commit staged changes with a message.",
		parameters: z.object({
			message: z.string().min(1, "message required"),
		}),
		dangerous: true,
		async execute({ message }) {
			return await git(["commit", "-m", message], options);
		},
	});
}
