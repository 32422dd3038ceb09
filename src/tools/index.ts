import type { AppConfig } from "../config";
import { readFileTool, strReplaceTool, writeFileTool } from "./filesystem";
import { gitAddTool, gitCommitTool, gitStatusTool } from "./git";
import type { SpawnFn } from "./process";
import { ToolRegistry } from "./registry";
import { ShellTool } from "./shell";

export function createToolRegistry(
	cfg: AppConfig,
	workspace: string,
	spawnFn?: SpawnFn
): ToolRegistry {
	const registry = new ToolRegistry();
	registry.register(readFileTool(workspace));
	registry.register(writeFileTool(workspace));
	registry.register(strReplaceTool(workspace));
	registry.register(
		new ShellTool({
			workspace,
			allowed: cfg.shell.allowed,
			blocked: cfg.shell.blocked,
			timeoutSec: cfg.shell.timeoutSec,
			spawnFn,
		})
	);
	const git = { workspace, timeoutMs: cfg.shell.timeoutSec * 1000, spawnFn };
	registry.register(gitStatusTool(git));
	registry.register(gitAddTool(git));
	registry.register(gitCommitTool(git));
	return registry;
}
