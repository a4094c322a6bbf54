/**
 * Provider factory.
 *
 * Creates the appropriate AIProvider from the `llm` config section.
 */

import type { AIProvider } from "../provider.js";
import { LiteLLMProvider } from "./litellm.js";
import { OpenAIProvider } from "./openai.js";
import { AnthropicProvider } from "./anthropic.js";
import { MockProvider } from "./mock.js";

export const PROVIDER_NAMES = ["litellm", "openai", "anthropic", "mock"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

export interface CreateProviderOptions {
  provider: ProviderName;
  apiKey?: string;
  model?: string;
  /** Base URL of the LiteLLM proxy, or an OpenAI-compatible endpoint for openai. */
  apiUrl?: string;
  timeoutMs?: number;
}

/**
 * Create an AIProvider from a config object.
 *
 * ```ts
 * const provider = createProvider({ provider: "litellm", apiUrl: "http://localhost:4000" });
 * ```
 */
export function createProvider(options: CreateProviderOptions): AIProvider {
  switch (options.provider) {
    case "litellm": {
      if (!options.apiUrl) throw new Error("apiUrl is required for LiteLLM provider");
      return new LiteLLMProvider({
        apiUrl: options.apiUrl,
        apiKey: options.apiKey,
        model: options.model,
        timeoutMs: options.timeoutMs,
      });
    }
    case "openai": {
      if (!options.apiKey) throw new Error("apiKey is required for OpenAI provider");
      return new OpenAIProvider(options.apiKey, options.model, options.apiUrl);
    }
    case "anthropic": {
      if (!options.apiKey) throw new Error("apiKey is required for Anthropic provider");
      return new AnthropicProvider(options.apiKey, options.model);
    }
    case "mock": {
      return new MockProvider();
    }
  }
}

export { LiteLLMProvider, type LiteLLMProviderOptions } from "./litellm.js";
export { OpenAIProvider } from "./openai.js";
export { AnthropicProvider } from "./anthropic.js";
export { MockProvider, type MockResponse } from "./mock.js";
