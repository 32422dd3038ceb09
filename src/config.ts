import fs from "node:fs/promises";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type AppConfig = {
	ai: {
		provider: "openai" | "ollama";
		model: string;
		baseUrl: string; // e.g. http://localhost:11434/v1 for Ollama
		apiKey: string; // empty means fall back to OPENAI_API_KEY
		maxTokens: number;
	};
	shell: {
		allowed: string[]; // base command names that may run at all
		blocked: string[]; // literal substrings rejected anywhere in a command
		timeoutSec: number;
	};
	agent: {
		maxIterations: number; // model round-trips per turn
	};
	context: {
		maxTokens: number;
	};
	ui: {
		tickMs: number; // event drain period
		frameMs: number; // minimum gap between streamed text renders
		drainLimit: number; // events applied per tick
	};
	logging: {
		level: LogLevel;
		file: string; // relative to the workspace; empty disables the file sink
	};
};

export const DEFAULT_CONFIG: AppConfig = {
	ai: {
		provider: "openai",
		model: "gpt-4o-mini",
		baseUrl: "",
		apiKey: "",
		maxTokens: 4096,
	},
	shell: {
		allowed: ["ls", "cat", "grep", "git", "npm", "echo", "pwd", "mkdir", "touch"],
		blocked: ["rm -rf", "sudo", "/dev/"],
		timeoutSec: 30,
	},
	agent: { maxIterations: 20 },
	context: { maxTokens: 100_000 },
	ui: { tickMs: 50, frameMs: 50, drainLimit: 100 },
	logging: { level: "info", file: "" },
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

const FILE_NAME = ".tollgate.json";

let configPathOverride: string | null = null;

export function setConfigPathOverride(p: string | null): void {
	configPathOverride = p && p.trim().length > 0 ? p.trim() : null;
}

export async function getConfigPath(cwd = process.cwd()): Promise<string> {
	if (!configPathOverride) return path.resolve(cwd, FILE_NAME);
	const target = path.resolve(cwd, configPathOverride);
	const stat = await fs.stat(target).catch(() => null);
	return stat?.isDirectory() ? path.join(target, FILE_NAME) : target;
}

export async function loadConfig(file?: string): Promise<AppConfig> {
	const target = file ?? (await getConfigPath());
	try {
		const raw = await fs.readFile(target, "utf8");
		return normalizeConfig(JSON.parse(raw));
	} catch (err) {
		if (isMissingFile(err)) return normalizeConfig({});
		throw err;
	}
}

export async function saveConfig(cfg: AppConfig, file?: string): Promise<void> {
	const target = file ?? (await getConfigPath());
	const data = JSON.stringify(normalizeConfig(cfg), null, 2);
	await fs.writeFile(target, data, "utf8");
}

function isMissingFile(err: unknown): boolean {
	if (!(err instanceof Error) || !("code" in err)) return false;
	return err.code === "ENOENT" || err.code === "ENOTDIR";
}

function section(input: unknown, key: string): Record<string, unknown> {
	if (!isRecord(input)) return {};
	const value = input[key];
	return isRecord(value) ? value : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function normalizeConfig(input: unknown): AppConfig {
	const ai = section(input, "ai");
	const shell = section(input, "shell");
	const agent = section(input, "agent");
	const context = section(input, "context");
	const ui = section(input, "ui");
	const logging = section(input, "logging");
	const provider = ai["provider"] === "ollama" ? "ollama" : "openai";

	return {
		ai: {
			provider,
			model: normalizeString(
				ai["model"],
				provider === "ollama" ? "llama3.1:8b" : DEFAULT_CONFIG.ai.model
			),
			baseUrl: typeof ai["baseUrl"] === "string" ? ai["baseUrl"].trim() : "",
			apiKey: typeof ai["apiKey"] === "string" ? ai["apiKey"].trim() : "",
			maxTokens: clampInt(ai["maxTokens"], 256, 32_768, DEFAULT_CONFIG.ai.maxTokens),
		},
		shell: {
			allowed: normalizeList(shell["allowed"], DEFAULT_CONFIG.shell.allowed),
			blocked: normalizeList(shell["blocked"], DEFAULT_CONFIG.shell.blocked),
			timeoutSec: clampInt(shell["timeoutSec"], 1, 600, DEFAULT_CONFIG.shell.timeoutSec),
		},
		agent: {
			maxIterations: clampInt(
				agent["maxIterations"],
				1,
				100,
				DEFAULT_CONFIG.agent.maxIterations
			),
		},
		context: {
			maxTokens: clampInt(
				context["maxTokens"],
				1_000,
				2_000_000,
				DEFAULT_CONFIG.context.maxTokens
			),
		},
		ui: {
			tickMs: clampInt(ui["tickMs"], 10, 1_000, DEFAULT_CONFIG.ui.tickMs),
			frameMs: clampInt(ui["frameMs"], 16, 1_000, DEFAULT_CONFIG.ui.frameMs),
			drainLimit: clampInt(ui["drainLimit"], 1, 10_000, DEFAULT_CONFIG.ui.drainLimit),
		},
		logging: {
			level: LOG_LEVELS.find((l) => l === logging["level"]) ?? DEFAULT_CONFIG.logging.level,
			file: typeof logging["file"] === "string" ? logging["file"].trim() : "",
		},
	};
}

function clampInt(v: unknown, min: number, max: number, def: number): number {
	const n = Number(v);
	if (v === undefined || v === null || !Number.isInteger(n)) return def;
	return Math.max(min, Math.min(max, n));
}

function normalizeString(value: unknown, fallback: string): string {
	if (typeof value === "string" && value.trim().length > 0) {
		return value.trim();
	}
	return fallback;
}

// A missing list takes the default; an explicit list (even empty) is kept.
function normalizeList(value: unknown, fallback: readonly string[]): string[] {
	if (!Array.isArray(value)) return [...fallback];
	const items = value
		.map((s) => (typeof s === "string" ? s.trim() : ""))
		.filter((s) => s.length > 0);
	return Array.from(new Set(items));
}
