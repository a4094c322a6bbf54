/**
 * Pluggable LLM provider interface.
 *
 * Any backend that can perform message-based completions implements this
 * interface. The gateway never imports a specific SDK directly; it goes
 * through an AIProvider.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AIMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface AICompleteParams {
  messages: AIMessage[];
  maxTokens?: number;
  temperature?: number;
  /** Overrides the provider's configured model for one call. */
  model?: string;
}

export interface AIUsage {
  totalTokens: number;
  promptTokens: number;
  completionTokens: number;
}

export interface AICompleteResult {
  text: string;
  usage?: AIUsage;
}

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface AIProvider {
  /** Human-readable name for logs, e.g. "litellm", "openai", "anthropic". */
  readonly name: string;
  /** Default model used when a call does not name one. */
  readonly model: string;

  /**
   * Send a chat completion request and return the assistant's text response.
   * Implementations handle their own retry/rate-limit logic.
   */
  complete(params: AICompleteParams): Promise<AICompleteResult>;
}
