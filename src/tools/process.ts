import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";

export type SpawnFn = (
	command: string,
	args: readonly string[],
	options: SpawnOptions
) => ChildProcess;

export type RunOptions = {
	cwd: string;
	timeoutMs: number;
	maxBytes?: number;
	spawnFn?: SpawnFn;
};

export type RunOutcome = {
	code: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	truncated: boolean;
	durationMs: number;
	spawnError?: NodeJS.ErrnoException;
};

const DEFAULT_MAX_BYTES = 200_000;

/**
 * Runs an argument vector without a shell. The child is killed with SIGKILL
 * once the timeout elapses; the promise settles only after the child closes
 * (or failed to spawn), so a resolved outcome never leaves a process behind.
 */
export async function runCommand(
	cmd: string,
	args: readonly string[],
	options: RunOptions
): Promise<RunOutcome> {
	const start = Date.now();
	const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
	const spawnFn = options.spawnFn ?? spawn;
	let out = "";
	let err = "";
	let timedOut = false;
	let truncated = false;

	const add = (acc: string, chunk: Buffer | string) => {
		const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
		const remaining = Math.max(0, maxBytes - acc.length);
		if (s.length > remaining) truncated = true;
		return acc + s.slice(0, remaining);
	};

	return await new Promise<RunOutcome>((resolve) => {
		let child: ChildProcess;
		try {
			child = spawnFn(cmd, args, {
				cwd: options.cwd,
				env: process.env,
				shell: false,
				stdio: ["ignore", "pipe", "pipe"],
			});
		} catch (spawnErr) {
			const error: NodeJS.ErrnoException =
				spawnErr instanceof Error ? spawnErr : new Error(String(spawnErr));
			resolve({
				code: -1,
				stdout: "",
				stderr: error.message,
				timedOut: false,
				truncated: false,
				durationMs: Date.now() - start,
				spawnError: error,
			});
			return;
		}

		child.stdout?.on("data", (d: Buffer | string) => {
			out = add(out, d);
		});
		child.stderr?.on("data", (d: Buffer | string) => {
			err = add(err, d);
		});

		let settled = false;
		const finish = (code: number, spawnError?: NodeJS.ErrnoException) => {
			if (settled) return;
			settled = true;
			clearTimeout(timeout);
			resolve({
				code,
				stdout: out,
				stderr: err,
				timedOut,
				truncated,
				durationMs: Date.now() - start,
				spawnError,
			});
		};

		const timeout = setTimeout(() => {
			timedOut = true;
			child.kill("SIGKILL");
		}, options.timeoutMs);

		child.once("error", (spawnErr: NodeJS.ErrnoException) => {
			err = add(err, `${spawnErr.message}\n`);
			finish(-1, spawnErr);
		});

		child.once("close", (code: number | null) => {
			finish(code ?? -1);
		});
	});
}
