/**
 * Minimal structured logger for @review-prompts/engine.
 *
 * Respects REVIEW_PROMPTS_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for rendered prompts and replies.
 * The level is read on every call, so flags that set the env var late still apply.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.hasOwn(LEVELS, raw);
}

function currentLevel(): number {
  const raw = process.env.REVIEW_PROMPTS_LOG_LEVEL?.toLowerCase();
  if (!raw || !isLevel(raw)) return LEVELS.info;
  return LEVELS[raw];
}

function write(at: Level, msg: string): void {
  if (currentLevel() <= LEVELS[at]) process.stderr.write(`[review-prompts] ${msg}\n`);
}

export const logger = {
  debug(msg: string) { write("debug", msg); },
  info(msg: string)  { write("info", msg); },
  warn(msg: string)  { write("warn", msg); },
  error(msg: string) { write("error", msg); },
};
