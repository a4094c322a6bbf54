/**
 * Review LLM gateway.
 *
 * The single entry point for sending a prepared prompt pair to the model:
 * measures it, logs it, runs the chat hooks and hands back the reply text.
 */

import { logger } from "../logger.js";
import type { AIProvider, AICompleteResult } from "./provider.js";
import { getTokenizer, type Tokenizer } from "./tokenizer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ChatHooks {
  onChatStart?(prompt: string, systemPrompt: string): void | Promise<void>;
  onChatComplete?(result: AICompleteResult): void | Promise<void>;
  onChatError?(prompt: string, systemPrompt: string, error: unknown): void | Promise<void>;
}

export interface ReviewLLMGatewayOptions {
  provider: AIProvider;
  maxTokens?: number;
  temperature?: number;
  /** Prompts above this many tokens (system + user) are logged as oversized. */
  maxPromptTokens?: number;
  tokenizer?: Tokenizer;
  hooks?: ChatHooks;
}

export interface PromptTokenCount {
  prompt: number;
  system: number;
  total: number;
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export class ReviewLLMGateway {
  private provider: AIProvider;
  private maxTokens: number | undefined;
  private temperature: number | undefined;
  private maxPromptTokens: number | undefined;
  private tokenizer: Tokenizer;
  private hooks: ChatHooks;

  constructor(options: ReviewLLMGatewayOptions) {
    this.provider = options.provider;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.maxPromptTokens = options.maxPromptTokens;
    this.tokenizer = options.tokenizer ?? getTokenizer(options.provider.model);
    this.hooks = options.hooks ?? {};
  }

  countPromptTokens(prompt: string, systemPrompt: string): PromptTokenCount {
    const promptTokens = this.tokenizer.countTokens(prompt);
    const systemTokens = this.tokenizer.countTokens(systemPrompt);
    return { prompt: promptTokens, system: systemTokens, total: promptTokens + systemTokens };
  }

  /**
   * Send `prompt` with `systemPrompt` and return the reply text.
   * Failures are logged, reported to `onChatError` and re-thrown.
   */
  async ask(prompt: string, systemPrompt: string): Promise<string> {
    try {
      const tokens = this.countPromptTokens(prompt, systemPrompt);

      logger.debug(`LLM Prompt System: ${systemPrompt}`);
      logger.debug(`LLM Prompt: ${prompt}`);
      logger.debug(
        `Prompt token count: prompt=${tokens.prompt}, system=${tokens.system}, total=${tokens.total}`,
      );

      if (this.maxPromptTokens !== undefined && tokens.total > this.maxPromptTokens) {
        logger.warn(`Prompt exceeds maximum token limit: ${tokens.total} > ${this.maxPromptTokens}`);
      }

      await this.hooks.onChatStart?.(prompt, systemPrompt);

      const result = await this.provider.complete({
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: prompt },
        ],
        maxTokens: this.maxTokens,
        temperature: this.temperature,
      });

      logger.debug(`LLM Response: ${result.text}`);
      if (!result.text) {
        logger.warn(
          `LLM returned an empty response (prompt length=${prompt.length} chars, tokens=${tokens.total})`,
        );
      }
      if (result.usage) {
        logger.info(
          `${this.provider.name}/${this.provider.model} usage: prompt=${result.usage.promptTokens}, completion=${result.usage.completionTokens}, total=${result.usage.totalTokens}`,
        );
      }

      await this.hooks.onChatComplete?.(result);
      return result.text;
    } catch (err) {
      logger.error(`LLM request failed: ${err instanceof Error ? err.message : String(err)}`);
      await this.hooks.onChatError?.(prompt, systemPrompt, err);
      throw err;
    }
  }
}
