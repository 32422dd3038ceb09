import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { describeError } from "../errors";
import { defineTool, toolError } from "./types";
import { resolveWithin } from "./workspace";

const OUTSIDE = "Access outside the workspace is not allowed";

export function truncateUtf8(text: string, maxBytes: number): string {
	if (Buffer.byteLength(text, "utf8") <= maxBytes) return text;
	let used = 0;
	let result = "";
	for (const ch of text) {
		const size = Buffer.byteLength(ch, "utf8");
		if (used + size > maxBytes) {
			return `${result}\n[truncated to ${maxBytes} bytes]`;
		}
		result += ch;
		used += size;
	}
	return result;
}

// Returns null when `search` does not occur in `content`.
export function replaceFirst(
	content: string,
	search: string,
	replacement: string
): string | null {
	const index = content.indexOf(search);
	if (index === -1) return null;
	return content.slice(0, index) + replacement + content.slice(index + search.length);
}

export function readFileTool(workspace: string) {
	return defineTool({
		name: "read_file",
		description: "Read a UTF-8 text file inside the workspace.",
		parameters: z.object({
			path: z.string().min(1, "path required"),
			maxBytes: z.number().int().positive().max(200_000).default(50_000),
		}),
		async execute({ path: rel, maxBytes }) {
			const abs = await resolveWithin(workspace, rel);
			if (!abs) return toolError(OUTSIDE, "pass a path relative to the workspace root");
			try {
				const raw = await fs.readFile(abs, "utf8");
				return truncateUtf8(raw, maxBytes);
			} catch (err) {
				return toolError(
					`Unable to read ${rel}: ${describeError(err)}`,
					"list the directory with run_command 'ls' to check the path"
				);
			}
		},
	});
}

export function writeFileTool(workspace: string) {
	return defineTool({
		name: "write_file",
		description:
			"Write a UTF-8 text file inside the workspace, replacing its content. Creates parent directories if needed.",
		parameters: z.object({
			path: z.string().min(1, "path required"),
			content: z.string().default(""),
		}),
		dangerous: true,
		async execute({ path: rel, content }) {
			const abs = await resolveWithin(workspace, rel);
			if (!abs) return toolError(OUTSIDE, "pass a path relative to the workspace root");
			const stat = await fs.stat(abs).catch(() => null);
			if (stat?.isDirectory()) {
				return toolError(`${rel} is a directory`, "pass a file path");
			}
			await fs.mkdir(path.dirname(abs), { recursive: true });
			await fs.writeFile(abs, content, "utf8");
			return `Wrote ${Buffer.byteLength(content, "utf8")} bytes to ${path.relative(workspace, abs)}`;
		},
	});
}

export function strReplaceTool(workspace: string) {
	return defineTool({
		name: "str_replace",
		description:
			"Replace the first occurrence of old_str with new_str in a workspace file.",
		parameters: z.object({
			path: z.string().min(1, "path required"),
			old_str: z.string().min(1, "old_str required"),
			new_str: z.string().default(""),
		}),
		dangerous: true,
		async execute({ path: rel, old_str, new_str }) {
			const abs = await resolveWithin(workspace, rel);
			if (!abs) return toolError(OUTSIDE, "pass a path relative to the workspace root");
			let content: string;
			try {
				content = await fs.readFile(abs, "utf8");
			} catch (err) {
				return toolError(
					`Unable to read ${rel}: ${describeError(err)}`,
					"use write_file to create a new file"
				);
			}
			const updated = replaceFirst(content, old_str, new_str);
			if (updated === null) {
				return toolError(
					`old_str not found in ${rel}`,
					"read the file first and copy the exact text to replace"
				);
			}
			await fs.writeFile(abs, updated, "utf8");
			return `Replaced 1 occurrence in ${path.relative(workspace, abs)}`;
		},
	});
}
