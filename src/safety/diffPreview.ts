import fs from "node:fs/promises";
import { createTwoFilesPatch, structuredPatch } from "diff";
import { replaceFirst } from "../tools/filesystem";
import type { ToolArguments } from "../tools/types";
import { resolveWithin } from "../tools/workspace";
import { profileFor, type ProfileLookup } from "./approvals";

async function readOrNull(abs: string): Promise<string | null> {
	try {
		return await fs.readFile(abs, "utf8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
		throw err;
	}
}

function stringArg(args: ToolArguments, key: string): string | undefined {
	const value = args[key];
	return typeof value === "string" ? value : undefined;
}

export function unifiedDiff(file: string, before: string, after: string): string {
	if (structuredPatch(file, file, before, after).hunks.length === 0) return "";
	return createTwoFilesPatch(file, file, before, after);
}

/**
 * Previews what a file-mutating tool call would change. Returns "" for tools
 * without a diff builder, for paths outside the workspace and when nothing
 * would change. Read-only: the target file is never written.
 */
export async function buildDiffPreview(
	workspace: string,
	toolName: string,
	args: ToolArguments,
	lookup?: ProfileLookup
): Promise<string> {
	const kind = profileFor(toolName, lookup).diff;
	const rel = stringArg(args, "path");
	if (!kind || !rel) return "";

	const abs = await resolveWithin(workspace, rel);
	if (!abs) return "";

	let current: string | null;
	try {
		current = await readOrNull(abs);
	} catch {
		return "";
	}

	if (kind === "write") {
		return unifiedDiff(rel, current ?? "", stringArg(args, "content") ?? "");
	}

	const oldStr = stringArg(args, "old_str");
	if (current === null || !oldStr) return "";
	const updated = replaceFirst(current, oldStr, stringArg(args, "new_str") ?? "");
	return updated === null ? "" : unifiedDiff(rel, current, updated);
}
