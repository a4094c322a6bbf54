import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  createProvider,
  isProviderName,
  resolveConfig,
  PromptService,
  ReviewLLMGateway,
  type AIProvider,
  type ReviewPromptsConfig,
} from "@review-prompts/engine";

/** Flags every command accepts. */
export interface GlobalOptions {
  /** Directory holding `.review-prompts.yml`; defaults to the working directory. */
  configDir?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  apiUrl?: string;
}

/** Seams for tests: a provider replaces the one the config would create. */
export interface CommandDeps {
  provider?: AIProvider;
}

export function loadRunConfig(options: GlobalOptions): ReviewPromptsConfig {
  const config = resolveConfig(resolve(options.configDir ?? "."));
  const llm = { ...config.llm };

  if (options.provider !== undefined) {
    if (!isProviderName(options.provider)) {
      throw new Error(`Unknown provider "${options.provider}"`);
    }
    llm.provider = options.provider;
  }
  if (options.model !== undefined) llm.model = options.model;
  if (options.apiKey !== undefined) llm.api_key = options.apiKey;
  if (options.apiUrl !== undefined) llm.api_url = options.apiUrl;

  return { ...config, llm };
}

export function createPromptService(config: ReviewPromptsConfig): Promise<PromptService> {
  return PromptService.fromConfig(config.prompt);
}

export function createGateway(config: ReviewPromptsConfig, deps: CommandDeps = {}): ReviewLLMGateway {
  const provider =
    deps.provider ??
    createProvider({
      provider: config.llm.provider,
      apiKey: config.llm.api_key,
      model: config.llm.model,
      apiUrl: config.llm.api_url,
      timeoutMs: config.llm.timeout * 1000,
    });

  return new ReviewLLMGateway({
    provider,
    maxTokens: config.llm.max_tokens,
    temperature: config.llm.temperature,
    maxPromptTokens: config.llm.max_prompt_tokens,
  });
}

export function readInputFile(path: string): string {
  try {
    return readFileSync(resolve(path), "utf-8");
  } catch (err) {
    throw new Error(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
