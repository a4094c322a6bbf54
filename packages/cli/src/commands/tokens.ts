import { getTokenizer, splitPrompt } from "@review-prompts/engine";
import { formatTokenReport } from "../formatter.js";
import { loadRunConfig, readInputFile, type GlobalOptions } from "./shared.js";

export interface TokensOptions extends GlobalOptions {
  file: string;
  maxTokens?: number;
}

export function runTokens(options: TokensOptions): void {
  if (!options.file) throw new Error("tokens needs a file, e.g. `review-prompts tokens prompt.md`");
  if (options.maxTokens !== undefined && (!Number.isInteger(options.maxTokens) || options.maxTokens <= 0)) {
    throw new Error("--max-tokens must be a positive integer");
  }

  const config = loadRunConfig(options);
  const model = config.llm.model ?? "default";
  const tokenizer = getTokenizer(model);
  const text = readInputFile(options.file);

  const chunks =
    options.maxTokens !== undefined ? splitPrompt(text, { maxTokens: options.maxTokens, tokenizer }).length : undefined;

  process.stdout.write(
    formatTokenReport({
      file: options.file,
      model,
      tokens: tokenizer.countTokens(text),
      maxTokens: options.maxTokens,
      chunks,
    }),
  );
}
