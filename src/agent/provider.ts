import OpenAI from "openai";
import type { ToolSpec } from "../tools/registry";
import type { ToolArguments, ToolCall } from "../tools/types";
import type { ChatMessage } from "./conversation";

export type LlmRequest = {
	messages: readonly ChatMessage[];
	tools: readonly ToolSpec[];
};

export type StreamPart =
	| { type: "text"; text: string }
	| { type: "tool_call"; call: ToolCall }
	| { type: "usage"; promptTokens: number; completionTokens: number };

export interface LlmProvider {
	readonly model: string;
	stream(request: LlmRequest, signal: AbortSignal): AsyncIterable<StreamPart>;
}

type PendingCall = { id: string; name: string; args: string };

function parseArguments(raw: string): ToolArguments {
	if (raw.trim() === "") return {};
	try {
		const parsed: unknown = JSON.parse(raw);
		if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
			return Object.fromEntries(Object.entries(parsed));
		}
	} catch {
		// Malformed JSON from the model is reported by argument validation.
		return {};
	}
	return {};
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
	switch (message.role) {
		case "system":
			return { role: "system", content: message.content };
		case "user":
			return { role: "user", content: message.content };
		case "tool":
			return { role: "tool", tool_call_id: message.callId, content: message.content };
		case "assistant": {
			const calls = message.toolCalls ?? [];
			return {
				role: "assistant",
				content: message.content.length > 0 ? message.content : null,
				...(calls.length > 0
					? {
							tool_calls: calls.map((call) => ({
								id: call.callId,
								type: "function" as const,
								function: {
									name: call.toolName,
									arguments: JSON.stringify(call.arguments),
								},
							})),
						}
					: {}),
			};
		}
	}
}

function toOpenAITool(spec: ToolSpec): OpenAI.Chat.ChatCompletionTool {
	return {
		type: "function",
		function: {
			name: spec.name,
			description: spec.description,
			parameters: spec.parameters,
		},
	};
}

export type OpenAIProviderOptions = {
	apiKey: string;
	baseUrl?: string;
	model: string;
	maxTokens: number;
};

/** Chat Completions streaming; works against OpenAI and Ollama's compatible endpoint. */
export class OpenAIProvider implements LlmProvider {
	readonly model: string;
	private readonly client: OpenAI;
	private readonly maxTokens: number;

	constructor(options: OpenAIProviderOptions) {
		this.model = options.model;
		this.maxTokens = options.maxTokens;
		this.client = new OpenAI({
			apiKey: options.apiKey,
			...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
		});
	}

	async *stream(request: LlmRequest, signal: AbortSignal): AsyncIterable<StreamPart> {
		const tools = request.tools.map(toOpenAITool);
		const stream = await this.client.chat.completions.create(
			{
				model: this.model,
				messages: request.messages.map(toOpenAIMessage),
				max_tokens: this.maxTokens,
				stream: true,
				stream_options: { include_usage: true },
				...(tools.length > 0 ? { tools } : {}),
			},
			{ signal }
		);

		const pending = new Map<number, PendingCall>();
		for await (const chunk of stream) {
			if (chunk.usage) {
				yield {
					type: "usage",
					promptTokens: chunk.usage.prompt_tokens,
					completionTokens: chunk.usage.completion_tokens,
				};
			}
			const delta = chunk.choices[0]?.delta;
			if (!delta) continue;
			if (delta.content) yield { type: "text", text: delta.content };
			for (const part of delta.tool_calls ?? []) {
				const entry = pending.get(part.index) ?? { id: "", name: "", args: "" };
				if (part.id) entry.id = part.id;
				if (part.function?.name) entry.name += part.function.name;
				if (part.function?.arguments) entry.args += part.function.arguments;
				pending.set(part.index, entry);
			}
		}

		const ordered = Array.from(pending.entries()).sort(([a], [b]) => a - b);
		for (const [index, entry] of ordered) {
			yield {
				type: "tool_call",
				call: {
					toolName: entry.name,
					arguments: parseArguments(entry.args),
					callId: entry.id || `call_${index}`,
				},
			};
		}
	}
}
