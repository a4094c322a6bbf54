/**
 * Splits the unified diff produced by `git diff` into one entry per file,
 * keeping each file's `---`/`+++` lines and hunks as raw text for the
 * review requests.
 */

import type { ReviewDiffFile } from "../prompts/format.js";

const DIFF_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;
const NEW_PATH = /^\+\+\+ (?:b\/)?(.+)$/;
const OLD_PATH = /^--- (?:a\/)?(.+)$/;

const DEV_NULL = "/dev/null";

/** Extended header lines (index, mode, rename, similarity) are dropped. */
function isBodyLine(line: string): boolean {
  return (
    line.startsWith("--- ") ||
    line.startsWith("+++ ") ||
    line.startsWith("@@") ||
    line.startsWith("Binary files ")
  );
}

function finishBody(lines: string[]): string {
  const start = lines.findIndex(isBodyLine);
  const body = start === -1 ? [] : lines.slice(start);
  while (body.length > 0 && body[body.length - 1].trim() === "") body.pop();
  return body.join("\n");
}

/** Path a header-less diff refers to, from its `+++`/`---` lines. */
function pathFromMarkers(lines: string[]): string | undefined {
  const newPath = lines.map((l) => NEW_PATH.exec(l)?.[1]).find((p) => p !== undefined && p !== DEV_NULL);
  if (newPath) return newPath;
  return lines.map((l) => OLD_PATH.exec(l)?.[1]).find((p) => p !== undefined && p !== DEV_NULL);
}

export function splitDiffByFile(raw: string): ReviewDiffFile[] {
  const lines = raw.replace(/\r\n/g, "\n").split("\n");
  const files: ReviewDiffFile[] = [];

  let current: { file: string; lines: string[] } | undefined;
  const preamble: string[] = [];

  for (const line of lines) {
    const header = DIFF_HEADER.exec(line);
    if (header) {
      if (current) files.push({ file: current.file, diff: finishBody(current.lines) });
      current = { file: header[2], lines: [] };
      continue;
    }
    if (current) current.lines.push(line);
    else preamble.push(line);
  }

  if (current) {
    files.push({ file: current.file, diff: finishBody(current.lines) });
    return files;
  }

  // No git headers: a plain `diff -u` of one file, or nothing at all.
  const body = finishBody(preamble);
  if (!body) return [];
  return [{ file: pathFromMarkers(preamble) ?? "diff", diff: body }];
}
