import type { EventPayloads } from "../events/types";
import type { ToolArguments } from "../tools/types";

export type VerifyResult = EventPayloads["verify_result"];

export const VERIFY_PATTERN = /\b(pytest|npm test|ruff|cargo test|jest|vitest|mypy|tox)\b/;

const MAX_ERROR_LINES = 10;

export function isVerifyCommand(command: string): boolean {
	return VERIFY_PATTERN.test(command);
}

/** Last line that reports a count of passed/failed tests, if any. */
export function parseVerifySummary(output: string, passed: boolean): string {
	const lines = output.split(/\r?\n/).reverse();
	for (const raw of lines) {
		const line = raw.trim();
		const lower = line.toLowerCase();
		if ((lower.includes("passed") || lower.includes("failed")) && /\d/.test(line)) {
			return `Tests: ${line}`;
		}
	}
	return passed ? "Tests: passed" : "Tests: FAILED";
}

export function extractErrorLines(output: string): string[] {
	return output
		.split(/\r?\n/)
		.filter((line) => line.includes("FAILED") || line.toLowerCase().includes("error"))
		.slice(0, MAX_ERROR_LINES);
}

/** Recognizes a test-runner invocation among run_command results. */
export function detectVerify(
	toolName: string,
	args: ToolArguments,
	content: string,
	isError: boolean
): VerifyResult | null {
	if (toolName !== "run_command") return null;
	const command = args["command"];
	if (typeof command !== "string" || !isVerifyCommand(command)) return null;
	const passed = !isError;
	return {
		passed,
		summary: parseVerifySummary(content, passed),
		errors: isError && content ? extractErrorLines(content) : [],
		full_output: content,
	};
}
