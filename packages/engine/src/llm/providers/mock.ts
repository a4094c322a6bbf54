/**
 * Mock provider for tests and dry runs.
 *
 * Returns canned responses. No network calls, no dependencies.
 */

import type { AIProvider, AICompleteParams, AICompleteResult } from "../provider.js";

export interface MockResponse {
  /** Substring match on the user message to trigger this response. */
  match?: string;
  /** The response text to return. */
  text: string;
}

/** Default reply: the summary template's no-issues answer. */
const DEFAULT_RESPONSE = "No issues found.";

export class MockProvider implements AIProvider {
  readonly name = "mock";
  readonly model = "mock";
  private responses: MockResponse[];
  /** Record of all calls for assertion. */
  public calls: AICompleteParams[] = [];

  constructor(responses?: MockResponse[]) {
    this.responses = responses ?? [];
  }

  get callCount(): number {
    return this.calls.length;
  }

  async complete(params: AICompleteParams): Promise<AICompleteResult> {
    this.calls.push(params);

    const userContent = params.messages
      .filter((m) => m.role === "user")
      .map((m) => m.content)
      .join("\n");

    const text =
      this.responses.find((r) => !r.match || userContent.includes(r.match))?.text ?? DEFAULT_RESPONSE;

    const promptChars = params.messages.reduce((n, m) => n + m.content.length, 0);
    const promptTokens = Math.ceil(promptChars / 4);
    const completionTokens = Math.ceil(text.length / 4);
    return {
      text,
      usage: { totalTokens: promptTokens + completionTokens, promptTokens, completionTokens },
    };
  }
}
