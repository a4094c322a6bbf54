import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isRemoteSource, loadPromptSource } from "../sources.js";
import { PromptSourceError } from "../../errors.js";

describe("isRemoteSource", () => {
  it("detects URL schemes", () => {
    expect(isRemoteSource("https://example.com/p.md")).toBe(true);
    expect(isRemoteSource("ftp://example.com/p.md")).toBe(true);
    expect(isRemoteSource("/abs/path.md")).toBe(false);
    expect(isRemoteSource("relative/path.md")).toBe(false);
  });
});

describe("loadPromptSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "review-prompts-sources-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads local files verbatim", async () => {
    const path = join(dir, "prompt.md");
    writeFileSync(path, "Line one\r\nLine two\n");
    await expect(loadPromptSource(path)).resolves.toBe("Line one\r\nLine two\n");
  });

  it("wraps missing files in PromptSourceError", async () => {
    const path = join(dir, "missing.md");
    const error = await loadPromptSource(path).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PromptSourceError);
    if (error instanceof PromptSourceError) {
      expect(error.source).toBe(path);
      expect(error.message).toMatch(new RegExp(`^Failed to load prompt source ${path}: ENOENT`));
    }
  });

  it("rejects unsupported schemes", async () => {
    await expect(loadPromptSource("ftp://example.com/p.md")).rejects.toThrow(
      'Failed to load prompt source ftp://example.com/p.md: unsupported scheme "ftp"',
    );
  });

  it("fetches http(s) sources", async () => {
    const seen: string[] = [];
    const fetchImpl: typeof fetch = async (input) => {
      seen.push(String(input));
      return new Response("remote prompt");
    };

    await expect(loadPromptSource("https://prompts.test/inline.md", { fetchImpl })).resolves.toBe("remote prompt");
    expect(seen).toEqual(["https://prompts.test/inline.md"]);
  });

  it("fails on non-ok responses", async () => {
    const fetchImpl: typeof fetch = async () => new Response("nope", { status: 404 });
    await expect(loadPromptSource("https://prompts.test/x.md", { fetchImpl })).rejects.toThrow(
      "Failed to load prompt source https://prompts.test/x.md: HTTP 404",
    );
  });

  it("wraps network failures", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    await expect(loadPromptSource("http://prompts.test/x.md", { fetchImpl })).rejects.toThrow(
      "Failed to load prompt source http://prompts.test/x.md: fetch failed",
    );
  });
});
