/**
 * Error taxonomy of the engine.
 *
 * Every error is surfaced to the caller as-is; nothing here is retried or
 * recovered locally.
 */

/** Unknown template identifier. */
export class NotFoundError extends Error {
  readonly templateId: string;

  constructor(templateId: string) {
    super(`Unknown template: "${templateId}"`);
    this.name = "NotFoundError";
    this.templateId = templateId;
  }
}

/** One or more placeholders had neither a context value nor a default. */
export class MissingVariableError extends Error {
  readonly templateId: string;
  readonly variables: string[];

  constructor(templateId: string, variables: string[]) {
    super(
      `Template "${templateId}" is missing ${variables.length === 1 ? "a value" : "values"} for: ${variables.join(", ")}`,
    );
    this.name = "MissingVariableError";
    this.templateId = templateId;
    this.variables = variables;
  }
}

/** A prompt source could not be read, or uses an unsupported scheme. */
export class PromptSourceError extends Error {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Failed to load prompt source ${source}: ${reason}`);
    this.name = "PromptSourceError";
    this.source = source;
  }
}

/** Non-2xx response from an LLM HTTP endpoint. */
export class LLMHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, provider = "LLM") {
    super(`${provider} API error ${status}: ${body.slice(0, 200)}`);
    this.name = "LLMHttpError";
    this.status = status;
    this.body = body;
  }
}
