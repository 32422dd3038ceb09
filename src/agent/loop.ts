import { describeError, isAbortError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { DEFAULT_PROFILE, isSideEffecting } from "../tools/profiles";
import type { ToolRegistry } from "../tools/registry";
import type { ToolArguments, ToolCall, ToolResult } from "../tools/types";
import type { Conversation } from "./conversation";
import type { LlmProvider } from "./provider";

export type AgentChunk =
	| { kind: "text"; text: string }
	| {
			kind: "tool_result";
			toolName: string;
			callId: string;
			content: string;
			isError: boolean;
			arguments: ToolArguments;
	  }
	| { kind: "plan"; content: string };

export type ConfirmationCallback = (
	toolName: string,
	args: ToolArguments
) => Promise<boolean>;

export type AgentLoopOptions = {
	provider: LlmProvider;
	registry: ToolRegistry;
	conversation: Conversation;
	/** Awaited before every gated call; a missing callback denies. */
	onConfirmation?: ConfirmationCallback;
	/** Lets denial messages say whether the session is still SAFE. */
	isSafeMode?: () => boolean;
	maxIterations: number;
	logger?: Logger;
};

export function summarizeArguments(args: ToolArguments, max = 80): string {
	const text = Object.entries(args)
		.map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
		.join(" ")
		.replace(/\s+/g, " ");
	return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export class AgentLoop {
	private readonly logger: Logger;

	constructor(private readonly options: AgentLoopOptions) {
		this.logger = (options.logger ?? silentLogger).child("agent");
	}

	/** True when the call must pass the confirmation gate before running. */
	isGated(toolName: string): boolean {
		const { registry } = this.options;
		const profile = registry.profileOf(toolName) ?? DEFAULT_PROFILE;
		const dangerous = registry.get(toolName)?.definition.dangerous ?? false;
		return dangerous || isSideEffecting(profile.category);
	}

	async *run(userText: string, signal: AbortSignal): AsyncGenerator<AgentChunk> {
		const { provider, registry, conversation, maxIterations } = this.options;
		conversation.addUser(userText);

		for (let iteration = 0; iteration < maxIterations; iteration++) {
			if (signal.aborted) return;

			let text = "";
			const calls: ToolCall[] = [];
			try {
				for await (const part of provider.stream(
					{ messages: conversation.messages, tools: registry.specs() },
					signal
				)) {
					if (signal.aborted) return;
					if (part.type === "text") {
						text += part.text;
						yield { kind: "text", text: part.text };
					} else if (part.type === "tool_call") {
						calls.push(part.call);
					} else {
						conversation.recordUsage(part.promptTokens + part.completionTokens);
					}
				}
			} catch (err) {
				if (signal.aborted || isAbortError(err)) return;
				throw err;
			}
			if (signal.aborted) return;

			conversation.add({
				role: "assistant",
				content: text,
				...(calls.length > 0 ? { toolCalls: calls } : {}),
			});
			if (calls.length === 0) return;

			if (calls.length > 1) {
				yield { kind: "plan", content: this.describePlan(calls) };
			}

			// Every call gets exactly one answer, however the generator ends:
			// an abort, or the consumer returning early at a yield.
			let answered = 0;
			let ran: ToolCall | null = null;
			try {
				for (const call of calls) {
					if (signal.aborted) return;
					const result = await this.executeCall(call);
					if (signal.aborted) {
						ran = call;
						return;
					}
					conversation.add({ role: "tool", callId: call.callId, content: result.content });
					answered++;
					yield {
						kind: "tool_result",
						toolName: call.toolName,
						callId: call.callId,
						content: result.content,
						isError: result.isError,
						arguments: call.arguments,
					};
				}
			} finally {
				this.closeUnanswered(calls.slice(answered), ran);
			}
		}

		this.logger.warn(`stopped after ${maxIterations} iterations`);
		yield {
			kind: "text",
			text: `\n\nStopped after ${maxIterations} tool iterations without a final answer.`,
		};
	}

	private async executeCall(call: ToolCall): Promise<ToolResult> {
		const { registry, onConfirmation } = this.options;
		if (this.isGated(call.toolName)) {
			let approved = false;
			try {
				approved = onConfirmation ? await onConfirmation(call.toolName, call.arguments) : false;
			} catch (err) {
				this.logger.error("confirmation callback failed", { error: describeError(err) });
			}
			if (!approved) return this.denied(call);
		}
		const result = await registry.execute(call.toolName, call.arguments, call.callId);
		this.logger.info(`tool ${call.toolName} ${result.isError ? "failed" : "ok"}`);
		return result;
	}

	private denied(call: ToolCall): ToolResult {
		this.logger.info(`tool ${call.toolName} denied`);
		const content = this.options.isSafeMode?.()
			? `Tool call denied: ${call.toolName} requires ARMED mode. The session is in SAFE mode; ask the user to arm it and approve the call.`
			: `Tool call denied by the user: ${call.toolName}. Do not retry it without asking.`;
		return { callId: call.callId, content, isError: true };
	}

	private closeUnanswered(pending: readonly ToolCall[], ran: ToolCall | null): void {
		for (const call of pending) {
			this.options.conversation.add({
				role: "tool",
				callId: call.callId,
				content:
					call === ran
						? "Interrupted by the user. The call ran, but its result was discarded."
						: "Cancelled by the user before it ran.",
			});
		}
	}

	private describePlan(calls: readonly ToolCall[]): string {
		const { registry } = this.options;
		return calls
			.map((call, i) => {
				const label = registry.profileOf(call.toolName)?.label ?? call.toolName;
				return `${i + 1}. ${label}: ${summarizeArguments(call.arguments, 60)}`;
			})
			.join("\n");
	}
}
