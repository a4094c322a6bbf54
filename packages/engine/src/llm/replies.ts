/**
 * Parsers for model replies to the summary and inline-reply templates.
 *
 * The renderer never validates output; these are the downstream consumers
 * that hold the model to each template's contract.
 */

import { InlineReplySchema, type InlineReply } from "./schemas.js";
import { logger } from "../logger.js";

/** The exact reply the summary template asks for when nothing is wrong. */
export const NO_ISSUES_SUMMARY = "No issues found.";

export interface SummaryReply {
  text: string;
  noIssues: boolean;
}

export function parseSummaryReply(raw: string): SummaryReply {
  const text = raw.trim();
  return { text, noIssues: text === NO_ISSUES_SUMMARY };
}

/**
 * Extract and validate the `{ message, suggestion }` object.
 * Markdown fences or stray prose around the object are tolerated; extra keys
 * and an empty message are not. Returns null when no valid object is found.
 */
export function parseInlineReply(raw: string): InlineReply | null {
  const rawText = raw.trim();
  if (!rawText) {
    logger.error("Inline reply is empty");
    return null;
  }

  let jsonStr = rawText;
  const fenceMatch = rawText.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenceMatch) {
    jsonStr = fenceMatch[1].trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    // Fall back to the outermost object in the text
    const objectMatch = rawText.match(/\{[\s\S]*\}/);
    if (!objectMatch) {
      logger.error("No JSON found in inline reply");
      return null;
    }
    try {
      parsed = JSON.parse(objectMatch[0]);
    } catch {
      logger.error("Failed to parse inline reply as JSON");
      return null;
    }
  }

  const result = InlineReplySchema.safeParse(parsed);
  if (!result.success) {
    logger.error(`Inline reply failed schema validation: ${result.error.message}`);
    return null;
  }

  return result.data;
}
