import type { AppConfig } from "./config";
import { OpenAIProvider } from "./agent/provider";

export type ProviderSettings = {
	model: string;
	baseUrl: string;
	apiKey: string;
};

// Ollama speaks the Chat Completions protocol on its /v1 endpoint.
export function resolveProviderSettings(
	cfg: AppConfig,
	env: NodeJS.ProcessEnv = process.env
): ProviderSettings {
	const { provider, model } = cfg.ai;
	const baseUrl =
		cfg.ai.baseUrl ||
		(provider === "ollama" ? "http://localhost:11434/v1" : env["OPENAI_BASE_URL"] ?? "");
	const apiKey =
		cfg.ai.apiKey || env["OPENAI_API_KEY"] || (provider === "ollama" ? "ollama" : "");
	return { model, baseUrl, apiKey };
}

export function createProvider(cfg: AppConfig, env: NodeJS.ProcessEnv = process.env): OpenAIProvider {
	const settings = resolveProviderSettings(cfg, env);
	return new OpenAIProvider({
		apiKey: settings.apiKey,
		baseUrl: settings.baseUrl || undefined,
		model: settings.model,
		maxTokens: cfg.ai.maxTokens,
	});
}
