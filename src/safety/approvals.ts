import {
	builtinProfile,
	DEFAULT_PROFILE,
	type RiskCategory,
	type ToolProfile,
} from "../tools/profiles";

export type ProfileLookup = (toolName: string) => ToolProfile | undefined;

export function profileFor(toolName: string, lookup?: ProfileLookup): ToolProfile {
	return lookup?.(toolName) ?? builtinProfile(toolName) ?? DEFAULT_PROFILE;
}

/**
 * Categories the user has blanket-approved for the rest of the session.
 * Cleared on transcript clear and when the session drops back to SAFE.
 */
export class ApprovalCategoryTracker {
	private readonly approvedSet = new Set<RiskCategory>();

	constructor(private readonly lookup?: ProfileLookup) {}

	// Unknown tools land in "other", which is never pre-approved by default.
	classify(toolName: string): RiskCategory {
		return profileFor(toolName, this.lookup).category;
	}

	isApproved(category: RiskCategory): boolean {
		return this.approvedSet.has(category);
	}

	approve(category: RiskCategory): void {
		this.approvedSet.add(category);
	}

	reset(): void {
		this.approvedSet.clear();
	}

	approved(): RiskCategory[] {
		return Array.from(this.approvedSet);
	}
}
