#!/usr/bin/env node

import { parseArgs } from "./args.js";
import { runRender } from "./commands/render.js";
import { runTemplates } from "./commands/templates.js";
import { runSummary } from "./commands/summary.js";
import { runInlineReply } from "./commands/inline-reply.js";
import { runTokens } from "./commands/tokens.js";
import type { GlobalOptions } from "./commands/shared.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mreview-prompts\x1b[0m — prompt templates for LLM code review
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  review-prompts render <template>     Print a rendered template
  review-prompts templates             List templates, their sources and placeholders
  review-prompts summary               Build (and send) a summary request for a diff
  review-prompts inline-reply          Build (and send) a reply in an inline thread
  review-prompts tokens <file>         Count the tokens of a file
  review-prompts version               Print version

\x1b[1mRENDER OPTIONS\x1b[0m
  --var <name=value>           Placeholder value (repeatable)
  --title <text>               Review title (review_title)
  --author <name>              Review author (review_author)

\x1b[1mSUMMARY OPTIONS\x1b[0m
  --diff <file>                Unified diff to summarize (required)
  --title <text>               Review title
  --author <name>              Review author
  --dry-run                    Print the system and user prompts instead of sending them

\x1b[1mINLINE-REPLY OPTIONS\x1b[0m
  --diff <file>                Unified diff (required)
  --thread <file.json>         Discussion thread: { file?, line?, comments: [{ author, body }] } (required)
  --file <path>                Diff file the thread is about (default: the thread's file, else the first)
  --dry-run                    Print the system and user prompts instead of sending them

\x1b[1mTOKENS OPTIONS\x1b[0m
  --max-tokens <n>             Also report how many chunks the text splits into

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --config <dir>               Directory with .review-prompts.yml (default: .)
  --provider <name>            LLM provider: litellm, openai, anthropic, mock
  --model <name>               Model name
  --api-key <key>              API key for the provider
  --api-url <url>              LiteLLM proxy or OpenAI-compatible base URL
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mEXAMPLES\x1b[0m
  review-prompts render summary --title "Add cache"
  review-prompts render notes --var team=backend --config ./review
  review-prompts summary --diff change.diff --dry-run
  review-prompts inline-reply --diff change.diff --thread thread.json --provider openai
  review-prompts tokens change.diff --model gpt-4o --max-tokens 8000

\x1b[1mENVIRONMENT\x1b[0m
  REVIEW_PROMPTS_LLM_PROVIDER       Provider (overrides llm.provider)
  REVIEW_PROMPTS_LLM_MODEL          Model (overrides llm.model)
  REVIEW_PROMPTS_LLM_API_URL        API URL (overrides llm.api_url)
  REVIEW_PROMPTS_LLM_API_KEY        API key (overrides llm.api_key)
  REVIEW_PROMPTS_LOG_LEVEL          Log level: debug, info, warn, error, silent

`);
}

function globalOptions(args: Record<string, string>): GlobalOptions {
  return {
    configDir: args["config"],
    provider: args["provider"],
    model: args["model"],
    apiKey: args["api-key"],
    apiUrl: args["api-url"],
  };
}

async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`review-prompts v${VERSION}\n`);
    return;
  }

  const { command, args, vars, positional } = parseArgs(rawArgs);
  const global = globalOptions(args);

  switch (command) {
    case "version":
      process.stdout.write(`review-prompts v${VERSION}\n`);
      break;

    case "render":
      await runRender({
        ...global,
        template: positional[0] || "",
        vars,
        title: args["title"],
        author: args["author"],
      });
      break;

    case "templates":
      await runTemplates(global);
      break;

    case "summary":
      await runSummary({
        ...global,
        diff: args["diff"] || "",
        title: args["title"],
        author: args["author"],
        dryRun: args["dry-run"] === "true",
      });
      break;

    case "inline-reply":
      await runInlineReply({
        ...global,
        diff: args["diff"] || "",
        thread: args["thread"] || "",
        file: args["file"],
        title: args["title"],
        author: args["author"],
        dryRun: args["dry-run"] === "true",
      });
      break;

    case "tokens":
      runTokens({
        ...global,
        file: positional[0] || "",
        maxTokens: args["max-tokens"] ? Number(args["max-tokens"]) : undefined,
      });
      break;

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err) => {
  process.stderr.write(`[review-prompts] Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
