import { describe, it, expect } from "vitest";
import { splitLargeLine, splitLargeSection, splitPrompt } from "../splitter.js";
import { SimpleTokenizer } from "../../llm/tokenizer.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

// floor(length / 4) + 1 tokens per text
const tokenizer = new SimpleTokenizer(4);

function countX(chunks: string[]): number {
  return chunks.reduce((n, c) => n + (c.match(/x/g)?.length ?? 0), 0);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("splitLargeLine", () => {
  it("cuts a line into equal slices with a shorter tail", () => {
    expect(splitLargeLine("abcdefghij", 2)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("never produces empty slices for tiny budgets", () => {
    expect(splitLargeLine("abc", 1)).toEqual(["a", "b", "c"]);
  });
});

describe("splitLargeSection", () => {
  it("splits line-wise when there is no file header", () => {
    expect(splitLargeSection("a\nb", 1, tokenizer)).toEqual(["a", "b"]);
  });

  it("repeats the file header on every piece", () => {
    const section = ["# File: a.ts", "l".repeat(40), "m".repeat(40), "n".repeat(40)].join("\n");
    // header 4 tokens, each line 11: header + 2 lines = 26 fits 30, a third line does not
    const chunks = splitLargeSection(section, 30, tokenizer);
    expect(chunks).toEqual([
      `# File: a.ts\n${"l".repeat(40)}\n${"m".repeat(40)}`,
      `# File: a.ts\n${"n".repeat(40)}`,
    ]);
  });
});

describe("splitPrompt", () => {
  it("returns the prompt unchanged when it fits", () => {
    const prompt = "Short prompt\n# File: a.ts\n+x";
    expect(splitPrompt(prompt, { maxTokens: 1000, tokenizer })).toEqual([prompt]);
  });

  it("returns no chunks when the system prompt leaves no room", () => {
    const systemPrompt = "s".repeat(3000); // 751 tokens
    expect(splitPrompt("anything", { maxTokens: 800, systemPrompt, tokenizer })).toEqual([]);
  });

  it("keeps each file section whole when it fits", () => {
    const body = "x".repeat(1000);
    const prompt =
      "## Changes\n\n" + ["a.ts", "b.ts", "c.ts"].map((f) => `# File: ${f}\n${body}`).join("\n\n");

    const chunks = splitPrompt(prompt, { maxTokens: 600, tokenizer });

    expect(chunks).toEqual([
      "## Changes\n",
      `# File: a.ts\n${body}\n`,
      `# File: b.ts\n${body}\n`,
      `# File: c.ts\n${body}`,
    ]);
  });

  it("splits an oversized file section and repeats its header", () => {
    const header = "# File: huge_file.py";
    const prompt = `## Changes\n\n${header}\n${"x".repeat(8000)}`;

    // 1000 - 100 reserved = 900 available; header is 6 tokens, so slices of 893 * 4 chars
    const chunks = splitPrompt(prompt, { maxTokens: 1000, tokenizer });

    expect(chunks).toEqual([
      "## Changes\n",
      `${header}\n${"x".repeat(3572)}`,
      `${header}\n${"x".repeat(3572)}`,
      `${header}\n${"x".repeat(856)}`,
    ]);
    for (const chunk of chunks) {
      expect(tokenizer.countTokens(chunk)).toBeLessThanOrEqual(900);
    }
    expect(countX(chunks)).toBe(8000);
  });

  it("packs plain lines greedily", () => {
    const prompt = Array.from({ length: 30 }, () => "l".repeat(40)).join("\n");
    // 100 available, 11 tokens per line -> 9 lines per chunk
    const chunks = splitPrompt(prompt, { maxTokens: 200, tokenizer });
    expect(chunks.map((c) => c.split("\n").length)).toEqual([9, 9, 9, 3]);
  });

  it("cuts a single overlong line after flushing what came before", () => {
    const prompt = `intro\n${"y".repeat(3000)}`;
    const chunks = splitPrompt(prompt, { maxTokens: 300, tokenizer });
    expect(chunks).toEqual(["intro", "y".repeat(796), "y".repeat(796), "y".repeat(796), "y".repeat(612)]);
  });

  it("takes the system prompt off the budget", () => {
    const prompt = Array.from({ length: 30 }, () => "l".repeat(40)).join("\n");
    // system prompt of 400 chars is 101 tokens: 300 - 101 - 100 = 99 available -> 9 lines
    const chunks = splitPrompt(prompt, {
      maxTokens: 300,
      systemPrompt: "s".repeat(400),
      tokenizer,
    });
    expect(chunks.map((c) => c.split("\n").length)).toEqual([9, 9, 9, 3]);
  });

  it("honors a custom reserve", () => {
    const prompt = Array.from({ length: 10 }, () => "l".repeat(40)).join("\n");
    // 409 chars -> 103 tokens: over 120 - 100 but under 120 - 0
    expect(splitPrompt(prompt, { maxTokens: 120, reserveTokens: 0, tokenizer })).toEqual([prompt]);
  });
});
