export type RiskCategory = "file_write" | "shell_exec" | "git_op" | "other";

export type RiskSeverity = "High" | "Medium" | "Low";

// How a tool's prospective change is previewed before approval.
export type DiffBuilderKind = "write" | "replace";

export type ToolProfile = {
	category: RiskCategory;
	label: string;
	diff?: DiffBuilderKind;
};

export type RiskReason = {
	reason: string;
	severity: RiskSeverity;
};

export const RISK_REASONS: Record<RiskCategory, RiskReason> = {
	file_write: { reason: "Modifies workspace files", severity: "High" },
	shell_exec: { reason: "Executes shell commands", severity: "High" },
	git_op: { reason: "Changes repository state", severity: "Medium" },
	other: { reason: "Tool execution", severity: "Low" },
};

export const BUILTIN_PROFILES: Readonly<Record<string, ToolProfile>> = {
	write_file: { category: "file_write", label: "Write file", diff: "write" },
	str_replace: { category: "file_write", label: "Edit file", diff: "replace" },
	run_command: { category: "shell_exec", label: "Run command" },
	git_add: { category: "git_op", label: "Stage files" },
	git_commit: { category: "git_op", label: "Commit" },
	read_file: { category: "other", label: "Read file" },
	git_status: { category: "other", label: "Git status" },
};

export const DEFAULT_PROFILE: ToolProfile = { category: "other", label: "Tool" };

/** Own-property lookup, so names like "constructor" are not mistaken for rows. */
export function builtinProfile(toolName: string): ToolProfile | undefined {
	return Object.hasOwn(BUILTIN_PROFILES, toolName) ? BUILTIN_PROFILES[toolName] : undefined;
}

export function isSideEffecting(category: RiskCategory): boolean {
	return category !== "other";
}
