import { describe, it, expect } from "vitest";
import {
  AnthropicProvider,
  LiteLLMProvider,
  MockProvider,
  OpenAIProvider,
  createProvider,
  isProviderName,
} from "../providers/index.js";

describe("createProvider", () => {
  it("creates a LiteLLM provider", () => {
    const provider = createProvider({ provider: "litellm", apiUrl: "http://litellm.test", model: "gpt-4o" });
    expect(provider).toBeInstanceOf(LiteLLMProvider);
    expect(provider.name).toBe("litellm");
    expect(provider.model).toBe("gpt-4o");
  });

  it("requires an api url for LiteLLM", () => {
    expect(() => createProvider({ provider: "litellm" })).toThrow("apiUrl is required for LiteLLM provider");
  });

  it("creates SDK providers with their default models", () => {
    const openai = createProvider({ provider: "openai", apiKey: "test-secret" });
    expect(openai).toBeInstanceOf(OpenAIProvider);
    expect(openai.model).toBe("gpt-4o");

    const anthropic = createProvider({ provider: "anthropic", apiKey: "test-secret" });
    expect(anthropic).toBeInstanceOf(AnthropicProvider);
    expect(anthropic.model).toBe("claude-3-5-sonnet-20240620");
  });

  it("requires api keys for SDK providers", () => {
    expect(() => createProvider({ provider: "openai" })).toThrow("apiKey is required for OpenAI provider");
    expect(() => createProvider({ provider: "anthropic" })).toThrow("apiKey is required for Anthropic provider");
  });

  it("creates the mock provider without credentials", () => {
    expect(createProvider({ provider: "mock" })).toBeInstanceOf(MockProvider);
  });
});

describe("isProviderName", () => {
  it("accepts only known providers", () => {
    expect(isProviderName("litellm")).toBe(true);
    expect(isProviderName("mock")).toBe(true);
    expect(isProviderName("ollama")).toBe(false);
  });
});

describe("MockProvider", () => {
  it("matches responses on the user message", async () => {
    const provider = new MockProvider([
      { match: "summary", text: "Summary reply" },
      { text: "Fallback reply" },
    ]);

    const summary = await provider.complete({ messages: [{ role: "user", content: "write a summary" }] });
    const other = await provider.complete({ messages: [{ role: "user", content: "something else" }] });

    expect(summary.text).toBe("Summary reply");
    expect(other.text).toBe("Fallback reply");
    expect(provider.callCount).toBe(2);
  });

  it("answers with the no-issues reply by default", async () => {
    const result = await new MockProvider().complete({ messages: [{ role: "user", content: "x" }] });
    expect(result.text).toBe("No issues found.");
  });
});
