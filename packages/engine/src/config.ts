/**
 * Config loader: reads and validates `.review-prompts.yml` configuration files.
 * Uses Zod for schema validation; problems are reported as warnings and the
 * affected setting falls back to its default.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { isProviderName, PROVIDER_NAMES, type ProviderName } from "./llm/providers/index.js";
import { isValidPlaceholderPattern } from "./templates/placeholder.js";
import { isPromptKind, PROMPT_KINDS, type PromptKind } from "./templates/template.js";
import { defaultPromptConfig, type PromptConfig } from "./prompts/settings.js";
import { isRemoteSource } from "./prompts/sources.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const CONFIG_FILE_NAME = ".review-prompts.yml";

export interface LLMConfig {
  provider: ProviderName;
  model?: string;
  /** LiteLLM proxy URL, or an OpenAI-compatible base URL for the openai provider. */
  api_url: string;
  api_key?: string;
  max_tokens?: number;
  temperature?: number;
  /** Prompts above this size are logged as oversized. */
  max_prompt_tokens?: number;
  /** Request timeout in seconds. */
  timeout: number;
}

export interface ReviewPromptsConfig {
  prompt: PromptConfig;
  llm: LLMConfig;
}

export function defaultConfig(): ReviewPromptsConfig {
  return {
    prompt: defaultPromptConfig(),
    llm: {
      provider: "litellm",
      api_url: "http://localhost:4000",
      timeout: 120,
    },
  };
}

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const promptSchema = z.object({
  context: z.record(z.string(), scalar).optional(),
  normalize_prompts: z.boolean().optional(),
  context_placeholder: z.string().optional(),
  files: z.record(z.string(), z.array(z.string())).optional(),
  system_files: z.record(z.string(), z.array(z.string())).optional(),
  include_system: z.record(z.string(), z.boolean()).optional(),
}).passthrough();

const llmSchema = z.object({
  provider: z.string().optional(),
  model: z.string().optional(),
  api_url: z.string().url().optional(),
  api_key: z.string().optional(),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_prompt_tokens: z.number().int().positive().optional(),
  timeout: z.number().positive().optional(),
}).passthrough();

const reviewPromptsConfigSchema = z.object({
  prompt: promptSchema.optional(),
  llm: llmSchema.optional(),
}).passthrough();

const KNOWN_KEYS = {
  root: ["prompt", "llm"],
  prompt: ["context", "normalize_prompts", "context_placeholder", "files", "system_files", "include_system"],
  llm: ["provider", "model", "api_url", "api_key", "max_tokens", "temperature", "max_prompt_tokens", "timeout"],
} as const;

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function warn(msg: string): void {
  process.stderr.write(`[review-prompts] Warning: ${msg}\n`);
}

function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function hint(input: string, valid: readonly string[]): string {
  const suggestion = didYouMean(input, valid);
  return suggestion ? ` — did you mean '${suggestion}'?` : "";
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function warnUnknownKeys(section: string, data: object, known: readonly string[]): void {
  for (const key of Object.keys(data)) {
    if (!known.includes(key)) {
      const where = section ? `${section}.${key}` : key;
      warn(`unknown config key '${where}'${hint(key, known)}`);
    }
  }
}

/** Keep only entries keyed by a known prompt kind. */
function byKind<T>(section: string, record: Record<string, T> | undefined): Partial<Record<PromptKind, T>> {
  const result: Partial<Record<PromptKind, T>> = {};
  if (!record) return result;

  for (const [key, value] of Object.entries(record)) {
    if (isPromptKind(key)) {
      result[key] = value;
    } else {
      warn(`unknown prompt kind '${key}' in prompt.${section}${hint(key, PROMPT_KINDS)}`);
    }
  }
  return result;
}

function resolveSources(dir: string, sources: string[]): string[] {
  return sources.map((s) => (isRemoteSource(s) ? s : resolve(dir, s)));
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.review-prompts.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 * Relative prompt file paths are resolved against `dir`.
 */
export function loadConfig(dir: string): ReviewPromptsConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE_NAME));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    warn(`could not read ${CONFIG_FILE_NAME} — ${err instanceof Error ? err.message : String(err)}. Using defaults.`);
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    warn(`could not parse ${CONFIG_FILE_NAME} — ${err instanceof Error ? err.message : String(err)}. Using defaults.`);
    return defaultConfig();
  }

  if (!parsed || typeof parsed !== "object") return defaultConfig();

  // Validate shape with Zod
  const result = reviewPromptsConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      warn(`config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return defaultConfig();
  }

  const data = result.data;
  const config = defaultConfig();

  warnUnknownKeys("", data, KNOWN_KEYS.root);

  // prompt
  if (data.prompt) {
    const p = data.prompt;
    warnUnknownKeys("prompt", p, KNOWN_KEYS.prompt);

    if (p.context) {
      for (const [key, value] of Object.entries(p.context)) {
        config.prompt.context[key] = String(value);
      }
    }

    if (p.normalize_prompts !== undefined) config.prompt.normalize_prompts = p.normalize_prompts;

    if (p.context_placeholder !== undefined) {
      if (isValidPlaceholderPattern(p.context_placeholder)) {
        config.prompt.context_placeholder = p.context_placeholder;
      } else {
        warn(
          `invalid context_placeholder '${p.context_placeholder}' (it must contain {value} exactly once), using default '${config.prompt.context_placeholder}'`,
        );
      }
    }

    const files = byKind("files", p.files);
    const systemFiles = byKind("system_files", p.system_files);
    const includeSystem = byKind("include_system", p.include_system);

    for (const kind of PROMPT_KINDS) {
      const kindFiles = files[kind];
      if (kindFiles) config.prompt.files[kind] = resolveSources(dir, kindFiles);
      const kindSystemFiles = systemFiles[kind];
      if (kindSystemFiles) config.prompt.system_files[kind] = resolveSources(dir, kindSystemFiles);
      const include = includeSystem[kind];
      if (include !== undefined) config.prompt.include_system[kind] = include;
    }
  }

  // llm
  if (data.llm) {
    const l = data.llm;
    warnUnknownKeys("llm", l, KNOWN_KEYS.llm);

    if (l.provider !== undefined) {
      if (isProviderName(l.provider)) {
        config.llm.provider = l.provider;
      } else {
        warn(
          `unknown llm provider '${l.provider}', using default '${config.llm.provider}'${hint(l.provider, PROVIDER_NAMES)}`,
        );
      }
    }

    if (l.model !== undefined) config.llm.model = l.model;
    if (l.api_url !== undefined) config.llm.api_url = l.api_url;
    if (l.api_key !== undefined) config.llm.api_key = l.api_key;
    if (l.max_tokens !== undefined) config.llm.max_tokens = l.max_tokens;
    if (l.temperature !== undefined) config.llm.temperature = l.temperature;
    if (l.max_prompt_tokens !== undefined) config.llm.max_prompt_tokens = l.max_prompt_tokens;
    if (l.timeout !== undefined) config.llm.timeout = l.timeout;
  }

  return config;
}

/**
 * Apply `REVIEW_PROMPTS_LLM_*` environment overrides on top of a config.
 */
export function applyEnvOverrides(
  config: ReviewPromptsConfig,
  env: NodeJS.ProcessEnv = process.env,
): ReviewPromptsConfig {
  const llm = { ...config.llm };

  const provider = env.REVIEW_PROMPTS_LLM_PROVIDER;
  if (provider) {
    if (isProviderName(provider)) llm.provider = provider;
    else warn(`unknown llm provider '${provider}' in REVIEW_PROMPTS_LLM_PROVIDER${hint(provider, PROVIDER_NAMES)}`);
  }
  if (env.REVIEW_PROMPTS_LLM_MODEL) llm.model = env.REVIEW_PROMPTS_LLM_MODEL;
  if (env.REVIEW_PROMPTS_LLM_API_URL) llm.api_url = env.REVIEW_PROMPTS_LLM_API_URL;
  if (env.REVIEW_PROMPTS_LLM_API_KEY) llm.api_key = env.REVIEW_PROMPTS_LLM_API_KEY;

  return { ...config, llm };
}

/** The config a run should use: file (or defaults) plus environment overrides. */
export function resolveConfig(dir: string, env: NodeJS.ProcessEnv = process.env): ReviewPromptsConfig {
  return applyEnvOverrides(loadConfig(dir) ?? defaultConfig(), env);
}
