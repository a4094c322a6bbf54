/**
 * Prompt settings: which sources make up each template, how placeholders
 * look, and which default values they fall back to.
 */

import { builtinPromptPath, defaultPromptFile } from "./builtin.js";
import { DEFAULT_PLACEHOLDER_PATTERN } from "../templates/placeholder.js";
import {
  PROMPT_KINDS,
  systemTemplateId,
  type PromptKind,
  type TemplateId,
} from "../templates/template.js";

export interface PromptConfig {
  /** Default placeholder values, used when a render context lacks a name. */
  context: Record<string, string>;
  normalize_prompts: boolean;
  context_placeholder: string;
  /** Replacement sources for a kind's user template. */
  files: Partial<Record<PromptKind, string[]>>;
  /** Extra or replacement sources for a kind's system template. */
  system_files: Partial<Record<PromptKind, string[]>>;
  /** Keep the built-in system template in front of configured system files. */
  include_system: Record<PromptKind, boolean>;
}

export function defaultPromptConfig(): PromptConfig {
  return {
    context: {},
    normalize_prompts: true,
    context_placeholder: DEFAULT_PLACEHOLDER_PATTERN,
    files: {},
    system_files: {},
    include_system: {
      inline: true,
      context: true,
      summary: true,
      inline_reply: true,
      summary_reply: true,
    },
  };
}

export function resolvePromptFiles(files: string[] | undefined, defaultFile: string): string[] {
  if (files && files.length > 0) return files;
  return [builtinPromptPath(defaultFile)];
}

export function resolveSystemPromptFiles(
  files: string[] | undefined,
  include: boolean,
  defaultFile: string,
): string[] {
  const global = [builtinPromptPath(defaultFile)];

  if (files === undefined) return global;
  if (include) return [...global, ...files];
  return files;
}

/** Ordered sources for every built-in template id. */
export function templateSources(config: PromptConfig): Map<TemplateId, string[]> {
  const sources = new Map<TemplateId, string[]>();

  for (const kind of PROMPT_KINDS) {
    sources.set(kind, resolvePromptFiles(config.files[kind], defaultPromptFile(kind)));

    const systemId = systemTemplateId(kind);
    sources.set(
      systemId,
      resolveSystemPromptFiles(
        config.system_files[kind],
        config.include_system[kind],
        defaultPromptFile(systemId),
      ),
    );
  }

  return sources;
}
