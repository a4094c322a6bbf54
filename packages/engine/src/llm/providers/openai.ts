/**
 * OpenAI provider.
 *
 * Loads the `openai` SDK on first use so other providers do not pay for it.
 */

import type OpenAI from "openai";
import type { AIProvider, AICompleteParams, AICompleteResult, AIMessage } from "../provider.js";
import { withRetry, type RetryOptions } from "../retry.js";

const DEFAULT_MODEL = "gpt-4o";

function toOpenAIMessage(message: AIMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class OpenAIProvider implements AIProvider {
  readonly name = "openai";
  readonly model: string;
  private apiKey: string;
  private baseUrl: string | undefined;
  private retry: RetryOptions;

  constructor(apiKey: string, model?: string, baseUrl?: string, retry: RetryOptions = {}) {
    this.apiKey = apiKey;
    this.model = model ?? DEFAULT_MODEL;
    this.baseUrl = baseUrl;
    this.retry = retry;
  }

  async complete(params: AICompleteParams): Promise<AICompleteResult> {
    const { default: OpenAIClient } = await import("openai");
    const client = new OpenAIClient({ apiKey: this.apiKey, baseURL: this.baseUrl, maxRetries: 0 });

    const response = await withRetry(
      () =>
        client.chat.completions.create({
          model: params.model ?? this.model,
          max_tokens: params.maxTokens,
          temperature: params.temperature,
          messages: params.messages.map(toOpenAIMessage),
        }),
      this.retry,
    );

    const text = (response.choices[0]?.message.content ?? "").trim();
    const usage = response.usage;
    return {
      text,
      usage: usage && {
        totalTokens: usage.total_tokens,
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
      },
    };
  }
}
