import { join } from "node:path";
import { fileURLToPath } from "node:url";

/** Directory holding the shipped `default_*.md` templates. */
export const BUILTIN_PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

export function builtinPromptPath(fileName: string): string {
  return join(BUILTIN_PROMPTS_DIR, fileName);
}

export function defaultPromptFile(templateId: string): string {
  return `default_${templateId}.md`;
}
