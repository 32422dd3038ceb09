import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { runCommand, type SpawnFn } from "./process";
import { ShellSyntaxError, splitShellWords } from "./shellWords";
import { resolveWithin } from "./workspace";
import {
	toolError,
	toolResult,
	type Tool,
	type ToolDefinition,
	type ToolResult,
} from "./types";

// Checked longest-first so the message names "&&" rather than "&".
export const SHELL_METACHARACTERS = [
	"&&",
	"||",
	">>",
	"$(",
	"|",
	";",
	"`",
	">",
	"<",
	"&",
	"\n",
	"\r",
] as const;

export const DEFAULT_ALLOWED_COMMANDS = [
	"ls",
	"cat",
	"grep",
	"git",
	"npm",
	"echo",
	"pwd",
	"mkdir",
	"touch",
] as const;

export const DEFAULT_BLOCKED_PATTERNS = ["rm -rf", "sudo", "/dev/"] as const;

const parameters = z.object({
	command: z.string().min(1, "command required").describe("Command to execute"),
	cwd: z
		.string()
		.optional()
		.describe("Working directory, relative to the workspace root"),
});

export type ShellToolOptions = {
	workspace: string;
	allowed?: readonly string[];
	blocked?: readonly string[];
	timeoutSec?: number;
	spawnFn?: SpawnFn;
};

export class ShellTool implements Tool<typeof parameters> {
	readonly definition: ToolDefinition<typeof parameters>;
	private readonly workspace: string;
	private readonly allowed: ReadonlySet<string>;
	private readonly blocked: readonly string[];
	private readonly timeoutSec: number;
	private readonly spawnFn?: SpawnFn;

	constructor(options: ShellToolOptions) {
		this.workspace = path.resolve(options.workspace);
		this.allowed = new Set(options.allowed ?? DEFAULT_ALLOWED_COMMANDS);
		this.blocked = options.blocked ?? DEFAULT_BLOCKED_PATTERNS;
		this.timeoutSec = options.timeoutSec ?? 30;
		this.spawnFn = options.spawnFn;
		this.definition = {
			name: "run_command",
			description: `Run a command in the workspace without a shell. Pipes, redirection and chaining are rejected. Allowed: ${this.allowedList()}`,
			parameters,
			dangerous: true,
		};
	}

	allowedList(): string {
		return Array.from(this.allowed).sort().join(", ");
	}

	async execute({ command, cwd }: z.infer<typeof parameters>): Promise<ToolResult> {
		for (const pattern of this.blocked) {
			if (pattern && command.includes(pattern)) {
				return toolError(
					`Command blocked because it contains blocked pattern '${pattern}'`,
					"use a narrower command or a filesystem tool such as read_file/write_file"
				);
			}
		}

		for (const meta of SHELL_METACHARACTERS) {
			if (command.includes(meta)) {
				return toolError(
					`Command blocked because it contains shell metacharacter ${JSON.stringify(meta)} which can chain or redirect execution`,
					`remove ${JSON.stringify(meta)} and run one command at a time, or use filesystem tools like read_file/write_file`
				);
			}
		}

		let argv: string[];
		try {
			argv = splitShellWords(command);
		} catch (err) {
			const reason = err instanceof ShellSyntaxError ? err.message : String(err);
			return toolError(
				`Invalid command syntax: ${reason}`,
				"balance the quotes in the command"
			);
		}

		const [base, ...args] = argv;
		if (base === undefined || base === "") {
			return toolError("Empty command", "pass a command such as 'ls'");
		}

		if (!this.allowed.has(base)) {
			return toolError(
				`Command '${base}' not allowed because it's not in the allowlist`,
				`use allowed commands (${this.allowedList()}) or add '${base}' to shell.allowed in .tollgate.json`
			);
		}

		let workDir = this.workspace;
		if (cwd) {
			const resolved = await resolveWithin(this.workspace, cwd);
			if (!resolved) {
				return toolError(
					`Working directory '${cwd}' escapes the workspace`,
					"pass a cwd inside the workspace root"
				);
			}
			const stat = await fs.stat(resolved).catch(() => null);
			if (!stat?.isDirectory()) {
				return toolError(
					`Working directory '${cwd}' does not exist or is not a directory`,
					"pass an existing directory inside the workspace, or omit cwd"
				);
			}
			workDir = resolved;
		}

		const outcome = await runCommand(base, args, {
			cwd: workDir,
			timeoutMs: this.timeoutSec * 1000,
			spawnFn: this.spawnFn,
		});

		if (outcome.spawnError?.code === "ENOENT") {
			return toolError(
				`Command '${base}' failed because executable not found`,
				`check if the command exists with 'which ${base}' or install the required package`
			);
		}
		if (outcome.timedOut) {
			return toolError(
				`Command timed out after ${this.timeoutSec}s`,
				"run a narrower command or raise shell.timeoutSec"
			);
		}
		if (outcome.spawnError) {
			return toolError(
				`Command '${command}' failed because: ${outcome.spawnError.message}`,
				"verify the command syntax and working directory"
			);
		}

		const parts: string[] = [];
		if (outcome.stdout) parts.push(`STDOUT:\n${outcome.stdout}`);
		if (outcome.stderr) parts.push(`STDERR:\n${outcome.stderr}`);
		if (outcome.truncated) parts.push("[output truncated]");
		const output = parts.join("\n") || "(no output)";

		if (outcome.code !== 0) {
			return toolResult(`Command failed (exit ${outcome.code}):\n${output}`, true);
		}
		return toolResult(output);
	}
}
