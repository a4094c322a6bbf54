/**
 * LiteLLM provider.
 *
 * Talks to a LiteLLM proxy (or any OpenAI-compatible endpoint) over its
 * `/chat/completions` route using native fetch, with transport-level retries.
 */

import type { AIProvider, AICompleteParams, AICompleteResult } from "../provider.js";
import { ChatCompletionResponseSchema, firstChoiceText } from "../schemas.js";
import { fetchWithRetry, type FetchRetryOptions } from "../retry.js";
import { LLMHttpError } from "../../errors.js";
import { logger } from "../../logger.js";

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TIMEOUT_MS = 120_000;

export interface LiteLLMProviderOptions {
  apiUrl: string;
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  retry?: Omit<FetchRetryOptions, "timeoutMs">;
}

export class LiteLLMProvider implements AIProvider {
  readonly name = "litellm";
  readonly model: string;
  private baseUrl: string;
  private apiKey: string | undefined;
  private timeoutMs: number;
  private retry: Omit<FetchRetryOptions, "timeoutMs">;

  constructor(options: LiteLLMProviderOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? {};
  }

  async complete(params: AICompleteParams): Promise<AICompleteResult> {
    const url = `${this.baseUrl}/chat/completions`;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    // undefined fields drop out of the JSON body
    const body = JSON.stringify({
      model: params.model ?? this.model,
      messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: params.maxTokens,
      temperature: params.temperature,
    });

    logger.debug(`POST ${url}`);
    const response = await fetchWithRetry(
      url,
      { method: "POST", headers, body },
      { ...this.retry, timeoutMs: this.timeoutMs },
    );
    logger.debug(`POST ${url} -> ${response.status}`);

    const text = await response.text();
    if (!response.ok) {
      throw new LLMHttpError(response.status, text, "LiteLLM");
    }

    const data = ChatCompletionResponseSchema.parse(JSON.parse(text));
    return {
      text: firstChoiceText(data),
      usage: data.usage && {
        totalTokens: data.usage.total_tokens,
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
      },
    };
  }
}
