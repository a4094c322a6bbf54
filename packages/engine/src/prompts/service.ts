/**
 * Prompt service.
 *
 * Builds complete review requests: a rendered (and optionally normalized)
 * template followed by the diff and conversation sections. Diff and thread
 * text is appended after rendering and never scanned for placeholders.
 */

import { TemplateRegistry } from "../templates/registry.js";
import { TemplateRenderer } from "../templates/renderer.js";
import { systemTemplateId, type PromptKind } from "../templates/template.js";
import { getTokenizer, type Tokenizer } from "../llm/tokenizer.js";
import { PROMPT_CONTEXT_DEFAULTS, toRenderContext, type PromptContext } from "./context.js";
import {
  formatFile,
  formatFiles,
  formatThread,
  type ReviewDiffFile,
  type ReviewThread,
} from "./format.js";
import { normalizePrompt } from "./normalize.js";
import type { PromptConfig } from "./settings.js";
import type { PromptSourceLoader } from "./sources.js";
import { splitPrompt } from "./splitter.js";

export interface PromptServiceOptions {
  normalize?: boolean;
}

export interface RequestBudget {
  /** Total token limit per request, system prompt included. */
  maxTokens: number;
  systemPrompt?: string;
  tokenizer?: Tokenizer;
}

export class PromptService {
  readonly renderer: TemplateRenderer;
  private normalize: boolean;

  constructor(renderer: TemplateRenderer, options: PromptServiceOptions = {}) {
    this.renderer = renderer;
    this.normalize = options.normalize ?? true;
  }

  /** Load the templates a prompt config names and wire a renderer over them. */
  static async fromConfig(config: PromptConfig, loader?: PromptSourceLoader): Promise<PromptService> {
    const registry = await TemplateRegistry.fromConfig(config, loader);
    const renderer = new TemplateRenderer(registry, {
      placeholder: config.context_placeholder,
      defaults: { ...PROMPT_CONTEXT_DEFAULTS, ...config.context },
    });
    return new PromptService(renderer, { normalize: config.normalize_prompts });
  }

  preparePrompt(templateId: string, context: PromptContext = {}): string {
    const prompt = this.renderer.render(templateId, toRenderContext(context));
    return this.normalize ? normalizePrompt(prompt) : prompt;
  }

  // -------------------------------------------------------------------------
  // User requests
  // -------------------------------------------------------------------------

  buildInlineRequest(diff: ReviewDiffFile, context?: PromptContext): string {
    const prompt = this.preparePrompt("inline", context);
    return `${prompt}\n\n## Diff\n\n${formatFile(diff)}`;
  }

  buildSummaryRequest(diffs: ReviewDiffFile[], context?: PromptContext): string {
    const prompt = this.preparePrompt("summary", context);
    return `${prompt}\n\n## Changes\n\n${formatFiles(diffs)}\n`;
  }

  /**
   * Summary requests that each fit the budget. Only the changes are split;
   * every request carries the whole rendered template ahead of its chunk.
   * Returns `[]` when the template and system prompt alone leave no room.
   */
  buildSummaryRequests(diffs: ReviewDiffFile[], context: PromptContext | undefined, budget: RequestBudget): string[] {
    const tokenizer = budget.tokenizer ?? getTokenizer();
    const head = `${this.preparePrompt("summary", context)}\n\n## Changes\n\n`;
    const chunks = splitPrompt(`${formatFiles(diffs)}\n`, {
      maxTokens: budget.maxTokens - tokenizer.countTokens(head),
      systemPrompt: budget.systemPrompt,
      tokenizer,
    });
    return chunks.map((chunk) => `${head}${chunk}`);
  }

  buildContextRequest(diffs: ReviewDiffFile[], context?: PromptContext): string {
    const prompt = this.preparePrompt("context", context);
    return `${prompt}\n\n## Diff\n\n${formatFiles(diffs)}\n`;
  }

  buildInlineReplyRequest(diff: ReviewDiffFile, thread: ReviewThread, context?: PromptContext): string {
    const prompt = this.preparePrompt("inline_reply", context);
    return (
      `${prompt}\n\n` +
      `## Conversation\n\n${formatThread(thread)}\n\n` +
      `## Diff\n\n${formatFile(diff)}`
    );
  }

  buildSummaryReplyRequest(diffs: ReviewDiffFile[], thread: ReviewThread, context?: PromptContext): string {
    const prompt = this.preparePrompt("summary_reply", context);
    return (
      `${prompt}\n\n` +
      `## Conversation\n\n${formatThread(thread)}\n\n` +
      `## Changes\n\n${formatFiles(diffs)}`
    );
  }

  // -------------------------------------------------------------------------
  // System requests
  // -------------------------------------------------------------------------

  buildSystemRequest(kind: PromptKind, context?: PromptContext): string {
    return this.preparePrompt(systemTemplateId(kind), context);
  }

  // -------------------------------------------------------------------------
  // Budgets
  // -------------------------------------------------------------------------

  splitPrompt(prompt: string, maxTokens: number, systemPrompt = "", tokenizer?: Tokenizer): string[] {
    return splitPrompt(prompt, { maxTokens, systemPrompt, tokenizer });
  }
}
