/**
 * Whitespace normalization applied to prepared prompts.
 *
 * Line endings become `\n`, trailing whitespace is dropped from every line,
 * runs of blank lines collapse to one, and the result is trimmed.
 */
export function normalizePrompt(prompt: string): string {
  return prompt
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
