/**
 * Plain-text formatting of diffs and discussion threads for review requests.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReviewDiffFile {
  /** Path of the file in the new revision. */
  file: string;
  /** Unified-diff text for this file. */
  diff: string;
}

export interface ThreadComment {
  author: string;
  body: string;
}

export interface ReviewThread {
  file?: string;
  line?: number;
  comments: ThreadComment[];
}

// ---------------------------------------------------------------------------
// Formatters
// ---------------------------------------------------------------------------

/** Prefix marking the start of a file section; the splitter keys on it. */
export const FILE_HEADER_PREFIX = "# File:";

export function formatFile(diff: ReviewDiffFile): string {
  return `${FILE_HEADER_PREFIX} ${diff.file}\n${diff.diff}`;
}

export function formatFiles(diffs: ReviewDiffFile[]): string {
  return diffs.map(formatFile).join("\n\n");
}

function formatComment(comment: ThreadComment): string {
  const [first = "", ...rest] = comment.body.trim().split("\n");
  const continuation = rest.map((line) => (line ? `  ${line}` : ""));
  return [`- ${comment.author}: ${first}`, ...continuation].join("\n");
}

export function formatThread(thread: ReviewThread): string {
  const lines: string[] = [];

  if (thread.file) {
    lines.push(thread.line !== undefined ? `File: ${thread.file}, line ${thread.line}` : `File: ${thread.file}`);
  }

  for (const comment of thread.comments) {
    lines.push(formatComment(comment));
  }

  return lines.join("\n");
}
