/**
 * Anthropic (Claude) provider.
 *
 * Loads `@anthropic-ai/sdk` on first use.
 */

import type { AIProvider, AICompleteParams, AICompleteResult } from "../provider.js";
import { withRetry, type RetryOptions } from "../retry.js";

const DEFAULT_MODEL = "claude-3-5-sonnet-20240620";
/** The Messages API requires max_tokens. */
const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider implements AIProvider {
  readonly name = "anthropic";
  readonly model: string;
  private apiKey: string;
  private retry: RetryOptions;

  constructor(apiKey: string, model?: string, retry: RetryOptions = {}) {
    this.apiKey = apiKey;
    this.model = model ?? DEFAULT_MODEL;
    this.retry = retry;
  }

  async complete(params: AICompleteParams): Promise<AICompleteResult> {
    const { default: Anthropic } = await import("@anthropic-ai/sdk");
    const client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });

    // System messages travel separately from the conversation
    const system = params.messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");
    const conversation: Array<{ role: "user" | "assistant"; content: string }> = [];
    for (const m of params.messages) {
      if (m.role === "system") continue;
      conversation.push({ role: m.role, content: m.content });
    }

    const response = await withRetry(
      () =>
        client.messages.create({
          model: params.model ?? this.model,
          max_tokens: params.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: params.temperature,
          system: system || undefined,
          messages: conversation,
        }),
      this.retry,
    );

    let text = "";
    for (const block of response.content) {
      if (block.type === "text") {
        text = block.text.trim();
        break;
      }
    }

    const { input_tokens, output_tokens } = response.usage;
    return {
      text,
      usage: {
        totalTokens: input_tokens + output_tokens,
        promptTokens: input_tokens,
        completionTokens: output_tokens,
      },
    };
  }
}
