import type { InlineReply, SummaryReply } from "@review-prompts/engine";

// ANSI escape codes, no dependencies needed
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const GREEN = "\x1b[32m";
const CYAN = "\x1b[36m";

/** Colors only on a terminal, and never when NO_COLOR is set. */
function useColor(): boolean {
  return !process.env.NO_COLOR && process.stdout.isTTY === true;
}

function c(color: string, text: string): string {
  return useColor() ? `${color}${text}${RESET}` : text;
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

/** A titled block, used for dry-run request dumps. */
export function formatSection(title: string, body: string): string {
  return `${c(BOLD + CYAN, `=== ${title} ===`)}\n${body}\n`;
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export interface TemplateRow {
  id: string;
  sources: readonly string[];
  placeholders: string[];
}

export function formatTemplatesTable(rows: TemplateRow[]): string {
  const idWidth = Math.max(...rows.map((r) => r.id.length), "TEMPLATE".length);
  const lines: string[] = [c(BOLD, `${"TEMPLATE".padEnd(idWidth)}  PLACEHOLDERS`)];

  for (const row of rows) {
    const placeholders = row.placeholders.length > 0 ? row.placeholders.join(", ") : c(DIM, "-");
    lines.push(`${row.id.padEnd(idWidth)}  ${placeholders}`);
    for (const source of row.sources) {
      lines.push(`${" ".repeat(idWidth)}  ${c(DIM, source)}`);
    }
  }

  lines.push("", `${rows.length} templates`);
  return lines.join("\n") + "\n";
}

// ---------------------------------------------------------------------------
// Replies
// ---------------------------------------------------------------------------

export function formatSummaryReply(reply: SummaryReply): string {
  return reply.noIssues ? `${c(GREEN, reply.text)}\n` : `${reply.text}\n`;
}

export function formatInlineReply(reply: InlineReply): string {
  const lines = [reply.message];
  if (reply.suggestion !== null) {
    lines.push("", c(BOLD, "Suggestion:"), "```suggestion", reply.suggestion, "```");
  }
  return lines.join("\n") + "\n";
}

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

export interface TokenReport {
  file: string;
  model: string;
  tokens: number;
  maxTokens?: number;
  chunks?: number;
}

export function formatTokenReport(report: TokenReport): string {
  const lines = [`${report.file}: ${report.tokens} tokens ${c(DIM, `(${report.model})`)}`];
  if (report.maxTokens !== undefined && report.chunks !== undefined) {
    lines.push(`${report.chunks} chunk${report.chunks === 1 ? "" : "s"} at max ${report.maxTokens} tokens`);
  }
  return lines.join("\n") + "\n";
}
