import type { ToolCall } from "../tools/types";

export type ChatMessage =
	| { role: "system"; content: string }
	| { role: "user"; content: string }
	| { role: "assistant"; content: string; toolCalls?: ToolCall[] }
	| { role: "tool"; callId: string; content: string };

export const DEFAULT_SYSTEM_PROMPT = [
	"You are a coding assistant working inside the user's workspace.",
	"Use the provided tools to read, edit and run things; prefer str_replace for small edits.",
	"Side-effecting tools need the user's approval and may be denied. When a call is denied, explain what you wanted to do and stop.",
	"Shell commands run without a shell: no pipes, redirects or chaining.",
].join("\n");

function messageChars(message: ChatMessage): number {
	let total = message.content.length;
	if (message.role === "assistant" && message.toolCalls) {
		for (const call of message.toolCalls) {
			total += call.toolName.length + JSON.stringify(call.arguments).length;
		}
	}
	return total;
}

/**
 * Message history for one session. Token usage is an estimate (four
 * characters per token) until the provider reports real numbers.
 */
export class Conversation {
	private items: ChatMessage[];
	private reportedTokens: number | null = null;

	constructor(private readonly systemPrompt = DEFAULT_SYSTEM_PROMPT) {
		this.items = [{ role: "system", content: systemPrompt }];
	}

	get messages(): readonly ChatMessage[] {
		return this.items;
	}

	add(message: ChatMessage): void {
		this.items.push(message);
	}

	addUser(content: string): void {
		this.add({ role: "user", content });
	}

	/** Records the provider's prompt+completion count for the latest request. */
	recordUsage(totalTokens: number): void {
		if (Number.isFinite(totalTokens) && totalTokens > 0) this.reportedTokens = totalTokens;
	}

	estimateTokens(): number {
		const estimated = Math.ceil(
			this.items.reduce((sum, m) => sum + messageChars(m), 0) / 4
		);
		return Math.max(estimated, this.reportedTokens ?? 0);
	}

	contextPercent(maxTokens: number): number {
		if (maxTokens <= 0) return 0;
		return Math.min(100, Math.round((this.estimateTokens() / maxTokens) * 100));
	}

	clear(): void {
		this.items = [{ role: "system", content: this.systemPrompt }];
		this.reportedTokens = null;
	}
}
