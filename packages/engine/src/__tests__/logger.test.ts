import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { logger } from "../logger.js";

function spyStderr() {
  return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

describe("logger", () => {
  let stderrSpy: ReturnType<typeof spyStderr>;

  beforeEach(() => {
    stderrSpy = spyStderr();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("prefixes lines and writes them to stderr", () => {
    vi.stubEnv("REVIEW_PROMPTS_LOG_LEVEL", "info");
    logger.info("Loaded 10 templates");
    expect(stderrSpy).toHaveBeenCalledWith("[review-prompts] Loaded 10 templates\n");
  });

  it("drops messages below the configured level", () => {
    vi.stubEnv("REVIEW_PROMPTS_LOG_LEVEL", "WARN");
    logger.info("hidden");
    logger.warn("shown");
    expect(stderrSpy).toHaveBeenCalledTimes(1);
    expect(stderrSpy).toHaveBeenCalledWith("[review-prompts] shown\n");
  });

  it("writes nothing when silent", () => {
    vi.stubEnv("REVIEW_PROMPTS_LOG_LEVEL", "silent");
    logger.error("hidden");
    expect(stderrSpy).not.toHaveBeenCalled();
  });

  it("falls back to info for names that are not levels", () => {
    for (const raw of ["constructor", "tostring", "verbose"]) {
      vi.stubEnv("REVIEW_PROMPTS_LOG_LEVEL", raw);
      logger.debug("hidden");
      logger.error(`error under ${raw}`);
    }
    expect(stderrSpy.mock.calls.map((c) => String(c[0]))).toEqual([
      "[review-prompts] error under constructor\n",
      "[review-prompts] error under tostring\n",
      "[review-prompts] error under verbose\n",
    ]);
  });
});
