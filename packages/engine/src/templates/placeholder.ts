/**
 * Placeholder syntax.
 *
 * A placeholder pattern is any string containing `{value}` exactly once,
 * e.g. the default `<<{value}>>`, which makes `<<review_title>>` a
 * placeholder named `review_title`.
 */

export const DEFAULT_PLACEHOLDER_PATTERN = "<<{value}>>";

const VALUE_MARKER = "{value}";
const NAME = "[A-Za-z_][A-Za-z0-9_.-]*";

export interface PlaceholderSyntax {
  readonly pattern: string;
  readonly prefix: string;
  readonly suffix: string;
  /** Fresh global regex; group 1 is the placeholder name. */
  regex(): RegExp;
  /** The literal token for a name, e.g. `<<name>>`. */
  token(name: string): string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function isValidPlaceholderPattern(pattern: string): boolean {
  const first = pattern.indexOf(VALUE_MARKER);
  if (first === -1) return false;
  if (pattern.indexOf(VALUE_MARKER, first + 1) !== -1) return false;
  return pattern.length > VALUE_MARKER.length;
}

export function compilePlaceholder(pattern: string = DEFAULT_PLACEHOLDER_PATTERN): PlaceholderSyntax {
  if (!isValidPlaceholderPattern(pattern)) {
    throw new Error(
      `Invalid placeholder pattern "${pattern}": it must contain {value} exactly once and some delimiter around it`,
    );
  }

  const at = pattern.indexOf(VALUE_MARKER);
  const prefix = pattern.slice(0, at);
  const suffix = pattern.slice(at + VALUE_MARKER.length);
  const source = `${escapeRegExp(prefix)}(${NAME})${escapeRegExp(suffix)}`;

  return {
    pattern,
    prefix,
    suffix,
    regex: () => new RegExp(source, "g"),
    token: (name) => `${prefix}${name}${suffix}`,
  };
}

/** Distinct placeholder names in order of first appearance. */
export function listPlaceholders(text: string, syntax: PlaceholderSyntax): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(syntax.regex())) {
    seen.add(match[1]);
  }
  return [...seen];
}
