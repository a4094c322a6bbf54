/**
 * Structured review metadata and its mapping to placeholder names.
 */

import type { RenderContext } from "../templates/template.js";

export interface PromptContext {
  reviewTitle?: string;
  reviewDescription?: string;
  reviewAuthor?: string;
  sourceBranch?: string;
  targetBranch?: string;
  labels?: string[];
  changedFiles?: string[];
  /** Free-form values, exposed under their own names. */
  extra?: Record<string, string>;
}

/**
 * Empty values for every named field. The prompt service renders with these
 * underneath the configured defaults, so the shipped templates render with
 * an empty context.
 */
export const PROMPT_CONTEXT_DEFAULTS: RenderContext = Object.freeze({
  review_title: "",
  review_description: "",
  review_author: "",
  source_branch: "",
  target_branch: "",
  labels: "",
  changed_files: "",
});

/** Only fields that are set end up in the result. */
export function toRenderContext(context: PromptContext = {}): RenderContext {
  const values: Record<string, string> = { ...context.extra };

  if (context.reviewTitle !== undefined) values.review_title = context.reviewTitle;
  if (context.reviewDescription !== undefined) values.review_description = context.reviewDescription;
  if (context.reviewAuthor !== undefined) values.review_author = context.reviewAuthor;
  if (context.sourceBranch !== undefined) values.source_branch = context.sourceBranch;
  if (context.targetBranch !== undefined) values.target_branch = context.targetBranch;
  if (context.labels !== undefined) values.labels = context.labels.join(", ");
  if (context.changedFiles !== undefined) values.changed_files = context.changedFiles.join(", ");

  return values;
}
