import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, type AppConfig } from "../src/config";
import { createProvider, resolveProviderSettings } from "../src/llm";

function withAi(ai: Partial<AppConfig["ai"]>): AppConfig {
	return { ...DEFAULT_CONFIG, ai: { ...DEFAULT_CONFIG.ai, ...ai } };
}

describe("resolveProviderSettings", () => {
	it("prefers explicit config values over the environment", () => {
		const settings = resolveProviderSettings(
			withAi({ model: "custom-model", baseUrl: "https://example.test", apiKey: "test-secret" }),
			{ OPENAI_API_KEY: "env-key", OPENAI_BASE_URL: "https://env.test" }
		);
		expect(settings).toEqual({
			model: "custom-model",
			baseUrl: "https://example.test",
			apiKey: "test-secret",
		});
	});

	it("falls back to OPENAI_* variables for the openai provider", () => {
		const settings = resolveProviderSettings(withAi({}), {
			OPENAI_API_KEY: "env-key",
			OPENAI_BASE_URL: "https://env.test",
		});
		expect(settings).toEqual({ model: "gpt-4o-mini", baseUrl: "https://env.test", apiKey: "env-key" });
	});

	it("targets the local Ollama endpoint with a placeholder key", () => {
		const settings = resolveProviderSettings(withAi({ provider: "ollama", model: "llama3.1:8b" }), {});
		expect(settings).toEqual({
			model: "llama3.1:8b",
			baseUrl: "http://localhost:11434/v1",
			apiKey: "ollama",
		});
	});

	it("leaves the base URL empty when nothing configures it", () => {
		expect(resolveProviderSettings(withAi({}), {}).baseUrl).toBe("");
	});
});

describe("createProvider", () => {
	it("exposes the configured model name", () => {
		const provider = createProvider(withAi({ model: "tiny-model", apiKey: "test-secret" }), {});
		expect(provider.model).toBe("tiny-model");
	});
});
