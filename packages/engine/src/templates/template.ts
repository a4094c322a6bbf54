/**
 * Template identifiers and shapes.
 */

export const PROMPT_KINDS = [
  "inline",
  "context",
  "summary",
  "inline_reply",
  "summary_reply",
] as const;

export type PromptKind = (typeof PROMPT_KINDS)[number];

export type SystemTemplateId = `system_${PromptKind}`;

export type TemplateId = PromptKind | SystemTemplateId;

export function isPromptKind(value: string): value is PromptKind {
  return (PROMPT_KINDS as readonly string[]).includes(value);
}

export function systemTemplateId(kind: PromptKind): SystemTemplateId {
  return `system_${kind}`;
}

/** Every built-in template id: each kind followed by its system counterpart. */
export const TEMPLATE_IDS: readonly TemplateId[] = PROMPT_KINDS.flatMap(
  (kind): TemplateId[] => [kind, systemTemplateId(kind)],
);

export interface Template {
  readonly id: string;
  /** Raw template text, placeholders unresolved. */
  readonly text: string;
  /** File paths or URLs the text was read from, in join order. */
  readonly sources: readonly string[];
}

/** Placeholder name -> value. Built per render call. */
export type RenderContext = Readonly<Record<string, string>>;
