import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, writeFileSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { applyEnvOverrides, defaultConfig, loadConfig, resolveConfig } from "../config.js";

const TEST_DIR = join(tmpdir(), `review-prompts-config-test-${Date.now()}`);

function setupConfig(content: string): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, ".review-prompts.yml"), content);
}

function spyStderr() {
  return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

describe("loadConfig", () => {
  let stderrSpy: ReturnType<typeof spyStderr>;

  beforeEach(() => {
    stderrSpy = spyStderr();
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  function warnings(): string[] {
    return stderrSpy.mock.calls.map((c) => String(c[0]));
  }

  it("returns null when no config file exists", () => {
    mkdirSync(TEST_DIR, { recursive: true });
    expect(loadConfig(TEST_DIR)).toBeNull();
  });

  it("returns defaults for empty YAML", () => {
    setupConfig("");
    expect(loadConfig(TEST_DIR)).toEqual(defaultConfig());
  });

  it("parses prompt settings", () => {
    setupConfig(`
prompt:
  context:
    review_title: Untitled
    sprint: 42
  normalize_prompts: false
  context_placeholder: "{{{value}}}"
  files:
    summary:
      - prompts/summary.md
      - https://prompts.test/shared.md
  system_files:
    inline:
      - /abs/system.md
  include_system:
    inline: false
`);

    const prompt = loadConfig(TEST_DIR)?.prompt;
    expect(prompt?.context).toEqual({ review_title: "Untitled", sprint: "42" });
    expect(prompt?.normalize_prompts).toBe(false);
    expect(prompt?.context_placeholder).toBe("{{{value}}}");
    expect(prompt?.files).toEqual({
      summary: [join(TEST_DIR, "prompts/summary.md"), "https://prompts.test/shared.md"],
    });
    expect(prompt?.system_files).toEqual({ inline: ["/abs/system.md"] });
    expect(prompt?.include_system.inline).toBe(false);
    expect(prompt?.include_system.summary).toBe(true);
  });

  it("parses llm settings", () => {
    setupConfig(`
llm:
  provider: openai
  model: gpt-4o-mini
  api_url: https://llm.test/v1
  max_tokens: 800
  temperature: 0.2
  max_prompt_tokens: 12000
  timeout: 30
`);

    expect(loadConfig(TEST_DIR)?.llm).toEqual({
      provider: "openai",
      model: "gpt-4o-mini",
      api_url: "https://llm.test/v1",
      max_tokens: 800,
      temperature: 0.2,
      max_prompt_tokens: 12000,
      timeout: 30,
    });
  });

  it("warns on unknown keys with a suggestion", () => {
    setupConfig(`
promt:
  context: {}
llm:
  modle: gpt-4o
`);

    loadConfig(TEST_DIR);
    expect(warnings()).toContain(
      "[review-prompts] Warning: unknown config key 'promt' — did you mean 'prompt'?\n",
    );
    expect(warnings()).toContain(
      "[review-prompts] Warning: unknown config key 'llm.modle' — did you mean 'model'?\n",
    );
  });

  it("skips unknown prompt kinds", () => {
    setupConfig(`
prompt:
  files:
    sumary:
      - a.md
`);

    const config = loadConfig(TEST_DIR);
    expect(config?.prompt.files).toEqual({});
    expect(warnings()).toContain(
      "[review-prompts] Warning: unknown prompt kind 'sumary' in prompt.files — did you mean 'summary'?\n",
    );
  });

  it("keeps the default placeholder when the configured one is invalid", () => {
    setupConfig(`
prompt:
  context_placeholder: "<<name>>"
`);

    expect(loadConfig(TEST_DIR)?.prompt.context_placeholder).toBe("<<{value}>>");
    expect(warnings().some((w) => w.includes("invalid context_placeholder '<<name>>'"))).toBe(true);
  });

  it("keeps the default provider when the configured one is unknown", () => {
    setupConfig(`
llm:
  provider: openia
`);

    expect(loadConfig(TEST_DIR)?.llm.provider).toBe("litellm");
    expect(warnings()).toContain(
      "[review-prompts] Warning: unknown llm provider 'openia', using default 'litellm' — did you mean 'openai'?\n",
    );
  });

  it("falls back to defaults on schema errors", () => {
    setupConfig(`
llm:
  temperature: hot
`);

    expect(loadConfig(TEST_DIR)).toEqual(defaultConfig());
    expect(warnings().some((w) => w.includes("config validation error — llm.temperature"))).toBe(true);
  });

  it("falls back to defaults on invalid YAML", () => {
    setupConfig("prompt: [unclosed");

    expect(loadConfig(TEST_DIR)).toEqual(defaultConfig());
    expect(warnings().some((w) => w.includes("could not parse .review-prompts.yml"))).toBe(true);
  });
});

describe("applyEnvOverrides", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("overrides llm settings from the environment", () => {
    const config = applyEnvOverrides(defaultConfig(), {
      REVIEW_PROMPTS_LLM_PROVIDER: "anthropic",
      REVIEW_PROMPTS_LLM_MODEL: "claude-3-haiku",
      REVIEW_PROMPTS_LLM_API_URL: "http://proxy.test",
      REVIEW_PROMPTS_LLM_API_KEY: "test-secret",
    });

    expect(config.llm).toEqual({
      provider: "anthropic",
      model: "claude-3-haiku",
      api_url: "http://proxy.test",
      api_key: "test-secret",
      timeout: 120,
    });
  });

  it("does not mutate the given config", () => {
    const base = defaultConfig();
    applyEnvOverrides(base, { REVIEW_PROMPTS_LLM_MODEL: "other" });
    expect(base.llm.model).toBeUndefined();
  });

  it("ignores an unknown provider", () => {
    spyStderr();
    expect(applyEnvOverrides(defaultConfig(), { REVIEW_PROMPTS_LLM_PROVIDER: "nope" }).llm.provider).toBe("litellm");
  });
});

describe("resolveConfig", () => {
  it("uses defaults plus environment when there is no config file", () => {
    const dir = join(tmpdir(), `review-prompts-config-missing-${Date.now()}`);
    expect(resolveConfig(dir, { REVIEW_PROMPTS_LLM_MODEL: "gpt-4o" }).llm.model).toBe("gpt-4o");
  });
});
