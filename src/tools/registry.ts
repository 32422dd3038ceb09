import { z } from "zod";
import { describeError } from "../errors";
import {
	builtinProfile,
	DEFAULT_PROFILE,
	type ToolProfile,
} from "./profiles";
import type { Tool, ToolArguments, ToolResult } from "./types";

export type JsonSchema = Record<string, unknown>;

export type ToolSpec = {
	name: string;
	description: string;
	parameters: JsonSchema;
	dangerous: boolean;
};

/**
 * Converts the subset of zod used by tool parameter schemas into JSON Schema
 * for the model's function-calling interface.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
	const described = (out: JsonSchema): JsonSchema =>
		schema.description ? { ...out, description: schema.description } : out;

	if (schema instanceof z.ZodObject) {
		const properties: Record<string, JsonSchema> = {};
		const required: string[] = [];
		const shape: z.ZodRawShape = schema.shape;
		for (const [key, value] of Object.entries(shape)) {
			properties[key] = zodToJsonSchema(value);
			if (!value.isOptional()) required.push(key);
		}
		return described({
			type: "object",
			properties,
			...(required.length > 0 ? { required } : {}),
		});
	}
	if (schema instanceof z.ZodString) return described({ type: "string" });
	if (schema instanceof z.ZodNumber) return described({ type: "number" });
	if (schema instanceof z.ZodBoolean) return described({ type: "boolean" });
	if (schema instanceof z.ZodArray) {
		return described({ type: "array", items: zodToJsonSchema(schema.element) });
	}
	if (schema instanceof z.ZodEnum) {
		return described({ type: "string", enum: [...schema.options] });
	}
	if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
		return described(zodToJsonSchema(schema.unwrap()));
	}
	if (schema instanceof z.ZodDefault) {
		return described(zodToJsonSchema(schema.removeDefault()));
	}
	return described({ type: "string" });
}

type Registered = {
	tool: Tool;
	profile: ToolProfile;
};

export class ToolRegistry {
	private readonly tools = new Map<string, Registered>();

	register(tool: Tool, profile?: ToolProfile): void {
		const { name } = tool.definition;
		if (this.tools.has(name)) {
			throw new Error(`Tool "${name}" is already registered`);
		}
		this.tools.set(name, {
			tool,
			profile: profile ?? builtinProfile(name) ?? DEFAULT_PROFILE,
		});
	}

	get(name: string): Tool | undefined {
		return this.tools.get(name)?.tool;
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	list(): string[] {
		return Array.from(this.tools.keys());
	}

	profileOf(name: string): ToolProfile | undefined {
		return this.tools.get(name)?.profile;
	}

	specs(): ToolSpec[] {
		return Array.from(this.tools.values()).map(({ tool }) => ({
			name: tool.definition.name,
			description: tool.definition.description,
			parameters: zodToJsonSchema(tool.definition.parameters),
			dangerous: tool.definition.dangerous,
		}));
	}

	async execute(
		name: string,
		args: ToolArguments,
		callId = ""
	): Promise<ToolResult> {
		const entry = this.tools.get(name);
		if (!entry) {
			return {
				callId,
				content: `Unknown tool: ${name}. Available tools: ${this.list().join(", ")}`,
				isError: true,
			};
		}
		const parsed = entry.tool.definition.parameters.safeParse(args);
		if (!parsed.success) {
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
				.join("; ");
			return {
				callId,
				content: `Invalid arguments for ${name}: ${issues}`,
				isError: true,
			};
		}
		try {
			const result = await entry.tool.execute(parsed.data);
			return { ...result, callId };
		} catch (err) {
			return {
				callId,
				content: `Tool ${name} failed: ${describeError(err)}`,
				isError: true,
			};
		}
	}
}
