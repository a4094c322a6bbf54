/**
 * Prompt splitter.
 *
 * Splits an oversized prompt into chunks that each fit a token budget, so
 * they can be sent to the model one at a time. File sections (lines starting
 * with `# File:`) are kept whole where possible; an oversized section is cut
 * line-wise with its header repeated on every piece.
 */

import { logger } from "../logger.js";
import { getTokenizer, type Tokenizer } from "../llm/tokenizer.js";
import { FILE_HEADER_PREFIX } from "./format.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SplitPromptOptions {
  /** Total token limit per request. */
  maxTokens: number;
  /** Sent with every chunk, so its tokens come off the budget. */
  systemPrompt?: string;
  tokenizer?: Tokenizer;
  /** Headroom kept free for the completion. */
  reserveTokens?: number;
}

const DEFAULT_RESERVE_TOKENS = 100;
const CHARS_PER_TOKEN = 4;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isFileHeader(line: string): boolean {
  return line.startsWith(FILE_HEADER_PREFIX);
}

/** Cut one long line into slices of at most ~`maxTokens` tokens each. */
export function splitLargeLine(line: string, maxTokens: number): string[] {
  const maxChars = Math.max(1, (maxTokens - 1) * CHARS_PER_TOKEN);
  const pieces: string[] = [];
  for (let at = 0; at < line.length; at += maxChars) {
    pieces.push(line.slice(at, at + maxChars));
  }
  return pieces;
}

/** Split one section line-wise, repeating its `# File:` header on every piece. */
export function splitLargeSection(section: string, maxTokens: number, tokenizer: Tokenizer): string[] {
  const lines = section.split("\n");
  const header = lines.length > 0 && isFileHeader(lines[0]) ? lines[0] : undefined;
  const headerTokens = header !== undefined ? tokenizer.countTokens(header) : 0;

  const chunks: string[] = [];
  let current: string[] = [];
  let currentTokens = 0;

  const flush = (): void => {
    const headerOnly = header !== undefined && current.length === 1 && current[0] === header;
    if (current.length > 0 && !headerOnly) chunks.push(current.join("\n"));
    current = [];
    currentTokens = 0;
  };

  const startWithHeader = (): void => {
    if (header === undefined) return;
    current = [header];
    currentTokens = headerTokens;
  };

  lines.forEach((line, index) => {
    const lineTokens = tokenizer.countTokens(line);

    if (currentTokens + lineTokens <= maxTokens) {
      current.push(line);
      currentTokens += lineTokens;
      return;
    }

    if (current.length > 0) {
      flush();
      if (index > 0) startWithHeader();
    }

    if (lineTokens <= maxTokens) {
      if (current.length === 0) startWithHeader();
      current.push(line);
      currentTokens += lineTokens;
      return;
    }

    // Single line over budget: slice it, leaving room for the header.
    const budget = header !== undefined ? Math.max(1, maxTokens - headerTokens) : maxTokens;
    for (const piece of splitLargeLine(line, budget)) {
      chunks.push(header !== undefined ? `${header}\n${piece}` : piece);
    }
  });

  flush();
  return chunks;
}

// ---------------------------------------------------------------------------
// Splitter
// ---------------------------------------------------------------------------

export function splitPrompt(prompt: string, options: SplitPromptOptions): string[] {
  const tokenizer = options.tokenizer ?? getTokenizer();
  const systemTokens = options.systemPrompt ? tokenizer.countTokens(options.systemPrompt) : 0;
  const available = options.maxTokens - systemTokens - (options.reserveTokens ?? DEFAULT_RESERVE_TOKENS);

  if (available <= 0) {
    logger.warn("System prompt exceeds max token limit, returning empty chunks");
    return [];
  }

  if (tokenizer.countTokens(prompt) <= available) return [prompt];

  const lines = prompt.split("\n");
  const chunks: string[] = [];
  let current: string[] = [];
  let currentTokens = 0;

  const flush = (): void => {
    if (current.length > 0) chunks.push(current.join("\n"));
    current = [];
    currentTokens = 0;
  };

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];

    if (isFileHeader(line)) {
      flush();

      const section = [line];
      i++;
      while (i < lines.length && !isFileHeader(lines[i])) {
        section.push(lines[i]);
        i++;
      }

      const sectionText = section.join("\n");
      const sectionTokens = tokenizer.countTokens(sectionText);
      if (sectionTokens <= available) {
        chunks.push(sectionText);
      } else {
        logger.warn(`File section too large (${sectionTokens} tokens), splitting further`);
        chunks.push(...splitLargeSection(sectionText, available, tokenizer));
      }
      continue;
    }

    const lineTokens = tokenizer.countTokens(line);
    if (currentTokens + lineTokens <= available) {
      current.push(line);
      currentTokens += lineTokens;
      i++;
    } else if (current.length > 0) {
      // Retry this line against an empty chunk.
      flush();
    } else {
      logger.warn(`Line too long (${lineTokens} tokens), splitting`);
      chunks.push(...splitLargeLine(line, available));
      i++;
    }
  }

  flush();
  return chunks;
}
