import { describeError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import {
	RISK_REASONS,
	type RiskCategory,
	type RiskSeverity,
} from "../tools/profiles";
import type { ToolArguments } from "../tools/types";
import { ApprovalCategoryTracker, type ProfileLookup } from "./approvals";
import { buildDiffPreview } from "./diffPreview";

export type SafetyMode = "SAFE" | "ARMED" | "ARMED_PENDING";

export type ConfirmationDecision = "approve_once" | "approve_category" | "deny";

export type DecisionOutcome =
	| "approved"
	| "approved_category"
	| "denied"
	| "armed_required";

export type DecisionRequest = {
	toolName: string;
	arguments: ToolArguments;
	diff: string;
	reason: string;
	severity: RiskSeverity;
	category: RiskCategory;
};

export type DecisionRecord = {
	toolName: string;
	arguments: ToolArguments;
	outcome: DecisionOutcome;
	category: RiskCategory;
};

/** The UI side of the gate: the dialog that asks the human. */
export interface ConfirmationSurface {
	isAvailable(): boolean;
	requestDecision(request: DecisionRequest): Promise<ConfirmationDecision>;
	notifyArmedRequired(toolName: string): void;
}

export type GateOptions = {
	workspace: string;
	tracker?: ApprovalCategoryTracker;
	lookup?: ProfileLookup;
	surface?: ConfirmationSurface | null;
	initialMode?: "SAFE" | "ARMED";
	onDecision?: (record: DecisionRecord) => void;
	logger?: Logger;
};

export function diffKey(toolName: string, args: ToolArguments): string {
	return `${toolName}:${JSON.stringify(args)}`;
}

export class ConfirmationGate {
	readonly tracker: ApprovalCategoryTracker;
	private currentMode: SafetyMode;
	private surface: ConfirmationSurface | null;
	private readonly workspace: string;
	private readonly lookup?: ProfileLookup;
	private readonly onDecision?: (record: DecisionRecord) => void;
	private readonly logger: Logger;
	private readonly pendingDiffs = new Map<string, string>();
	private readonly listeners = new Set<() => void>();

	constructor(options: GateOptions) {
		this.workspace = options.workspace;
		this.lookup = options.lookup;
		this.tracker = options.tracker ?? new ApprovalCategoryTracker(options.lookup);
		this.surface = options.surface ?? null;
		this.currentMode = options.initialMode ?? "SAFE";
		this.onDecision = options.onDecision;
		this.logger = (options.logger ?? silentLogger).child("gate");
	}

	get mode(): SafetyMode {
		return this.currentMode;
	}

	attach(surface: ConfirmationSurface | null): void {
		this.surface = surface;
	}

	subscribe(listener: () => void): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/** SAFE → ARMED, after the user confirmed the arm dialog. */
	arm(): void {
		if (this.currentMode !== "SAFE") return;
		this.setMode("ARMED");
		this.logger.info("armed");
	}

	disarm(): void {
		this.tracker.reset();
		this.setMode("SAFE");
		this.logger.info("disarmed; category approvals cleared");
	}

	resetApprovals(): void {
		this.tracker.reset();
		this.notify();
	}

	takePendingDiff(toolName: string, args: ToolArguments): string | undefined {
		const key = diffKey(toolName, args);
		const diff = this.pendingDiffs.get(key);
		this.pendingDiffs.delete(key);
		return diff;
	}

	/** Resolves true when the call may execute. Never rejects. */
	async confirm(toolName: string, args: ToolArguments): Promise<boolean> {
		const category = this.tracker.classify(toolName);

		if (this.currentMode === "SAFE") {
			try {
				this.surface?.notifyArmedRequired(toolName);
			} catch (err) {
				this.logger.warn("armed-required notice failed", { error: describeError(err) });
			}
			this.record(toolName, args, category, "armed_required");
			return false;
		}

		if (this.tracker.isApproved(category)) {
			await this.queueDiff(toolName, args);
			this.record(toolName, args, category, "approved_category");
			return true;
		}

		const surface = this.surface;
		if (!surface || !surface.isAvailable()) {
			this.logger.warn("no confirmation surface; denying", { tool: toolName });
			this.record(toolName, args, category, "denied");
			return false;
		}

		this.setMode("ARMED_PENDING");
		let decision: ConfirmationDecision = "deny";
		let diff = "";
		try {
			diff = await buildDiffPreview(this.workspace, toolName, args, this.lookup);
			const { reason, severity } = RISK_REASONS[category];
			decision = await surface.requestDecision({
				toolName,
				arguments: args,
				diff,
				reason,
				severity,
				category,
			});
		} catch (err) {
			this.logger.error("confirmation dialog failed; denying", {
				tool: toolName,
				error: describeError(err),
			});
			decision = "deny";
		} finally {
			if (this.currentMode === "ARMED_PENDING") this.setMode("ARMED");
		}

		if (decision === "deny") {
			this.record(toolName, args, category, "denied");
			return false;
		}
		if (decision === "approve_category") {
			this.tracker.approve(category);
			this.notify();
		}
		if (diff) this.pendingDiffs.set(diffKey(toolName, args), diff);
		this.record(
			toolName,
			args,
			category,
			decision === "approve_category" ? "approved_category" : "approved"
		);
		return true;
	}

	private async queueDiff(toolName: string, args: ToolArguments): Promise<void> {
		try {
			const diff = await buildDiffPreview(this.workspace, toolName, args, this.lookup);
			if (diff) this.pendingDiffs.set(diffKey(toolName, args), diff);
		} catch (err) {
			this.logger.debug("diff preview unavailable", { error: describeError(err) });
		}
	}

	private record(
		toolName: string,
		args: ToolArguments,
		category: RiskCategory,
		outcome: DecisionOutcome
	): void {
		this.logger.info(`decision ${outcome} ${toolName}`, { category });
		this.onDecision?.({ toolName, arguments: args, outcome, category });
	}

	private setMode(mode: SafetyMode): void {
		if (this.currentMode === mode) return;
		this.currentMode = mode;
		this.notify();
	}

	private notify(): void {
		for (const listener of this.listeners) listener();
	}
}
