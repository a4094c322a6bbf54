/**
 * Token counting for prompt budgets.
 *
 * Uses js-tiktoken's BPE encodings. When an encoding cannot be loaded or a
 * text cannot be encoded, counting falls back to ~4 characters per token.
 */

import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import { logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Tokenizer {
  countTokens(text: string): number;
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

const FALLBACK_CHARS_PER_TOKEN = 4;

function approximateTokens(text: string, charsPerToken: number): number {
  return Math.floor(text.length / charsPerToken) + 1;
}

/** Character-count approximation. */
export class SimpleTokenizer implements Tokenizer {
  readonly averageCharsPerToken: number;

  constructor(averageCharsPerToken = FALLBACK_CHARS_PER_TOKEN) {
    this.averageCharsPerToken = averageCharsPerToken;
  }

  countTokens(text: string): number {
    return approximateTokens(text, this.averageCharsPerToken);
  }
}

export class TiktokenTokenizer implements Tokenizer {
  readonly encoding: TiktokenEncoding;
  private encoder: Tiktoken | undefined;

  constructor(encoding: TiktokenEncoding = "cl100k_base") {
    this.encoding = encoding;
    try {
      this.encoder = getEncoding(encoding);
    } catch (err) {
      logger.warn(
        `Failed to initialize tiktoken with encoding ${encoding}: ${err instanceof Error ? err.message : String(err)}, using fallback`,
      );
    }
  }

  /** False when the encoding failed to load and counts are approximate. */
  get exact(): boolean {
    return this.encoder !== undefined;
  }

  countTokens(text: string): number {
    if (this.encoder) {
      try {
        return this.encoder.encode(text).length;
      } catch (err) {
        logger.warn(`Tokenization failed: ${err instanceof Error ? err.message : String(err)}, using fallback`);
      }
    }
    return approximateTokens(text, FALLBACK_CHARS_PER_TOKEN);
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Model-name keywords -> encoding. Claude, Gemini and Llama 3 count close enough to cl100k. */
const MODEL_ENCODINGS: Array<{ keywords: string[]; encoding: TiktokenEncoding }> = [
  { keywords: ["gpt", "openai", "azure"], encoding: "cl100k_base" },
  { keywords: ["claude", "anthropic"], encoding: "cl100k_base" },
  { keywords: ["gemini"], encoding: "cl100k_base" },
  { keywords: ["llama", "ollama", "litellm"], encoding: "cl100k_base" },
];

const DEFAULT_ENCODING: TiktokenEncoding = "cl100k_base";

const cache = new Map<TiktokenEncoding, TiktokenTokenizer>();

export function encodingForModel(model: string): TiktokenEncoding {
  const name = model.toLowerCase();
  const entry = MODEL_ENCODINGS.find((e) => e.keywords.some((k) => name.includes(k)));
  if (!entry) {
    logger.debug(`No specific tokenizer for model '${model}', using default`);
    return DEFAULT_ENCODING;
  }
  return entry.encoding;
}

/** Tokenizer for a model name; instances are shared per encoding. */
export function getTokenizer(model = "default"): TiktokenTokenizer {
  const encoding = model === "default" ? DEFAULT_ENCODING : encodingForModel(model);
  let tokenizer = cache.get(encoding);
  if (!tokenizer) {
    tokenizer = new TiktokenTokenizer(encoding);
    cache.set(encoding, tokenizer);
  }
  return tokenizer;
}

export function countTokens(text: string, model = "default"): number {
  return getTokenizer(model).countTokens(text);
}
