import type { z } from "zod";

export type ToolArguments = Readonly<Record<string, unknown>>;

export type ToolResult = {
	callId: string;
	content: string;
	isError: boolean;
};

export type ToolDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> = {
	name: string;
	description: string;
	parameters: TSchema;
	// Forces confirmation even when the profile category is "other".
	dangerous: boolean;
};

export interface Tool<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
	readonly definition: ToolDefinition<TSchema>;
	execute(args: z.infer<TSchema>): Promise<ToolResult>;
}

export type ToolCall = {
	readonly toolName: string;
	readonly arguments: ToolArguments;
	readonly callId: string;
};

export function toolResult(content: string, isError = false, callId = ""): ToolResult {
	return { callId, content, isError };
}

export function toolError(cause: string, remedy?: string): ToolResult {
	return toolResult(remedy ? `${cause}. Try: ${remedy}` : cause, true);
}

export function defineTool<TSchema extends z.ZodTypeAny>(spec: {
	name: string;
	description: string;
	parameters: TSchema;
	dangerous?: boolean;
	execute: (args: z.infer<TSchema>) => Promise<ToolResult | string>;
}): Tool<TSchema> {
	return {
		definition: {
			name: spec.name,
			description: spec.description,
			parameters: spec.parameters,
			dangerous: spec.dangerous ?? false,
		},
		async execute(args) {
			const out = await spec.execute(args);
			return typeof out === "string" ? toolResult(out) : out;
		},
	};
}
