import { logger, parseSummaryReply, splitDiffByFile, type PromptContext } from "@review-prompts/engine";
import { formatSection, formatSummaryReply } from "../formatter.js";
import {
  createGateway,
  createPromptService,
  loadRunConfig,
  readInputFile,
  type CommandDeps,
  type GlobalOptions,
} from "./shared.js";

export interface SummaryOptions extends GlobalOptions {
  diff: string;
  title?: string;
  author?: string;
  dryRun: boolean;
}

export async function runSummary(options: SummaryOptions, deps: CommandDeps = {}): Promise<void> {
  if (!options.diff) throw new Error("summary needs --diff <file>");

  const config = loadRunConfig(options);
  const service = await createPromptService(config);

  const files = splitDiffByFile(readInputFile(options.diff));
  const context: PromptContext = {
    reviewTitle: options.title,
    reviewAuthor: options.author,
    changedFiles: files.map((f) => f.file),
  };

  const systemPrompt = service.buildSystemRequest("summary", context);
  const prompt = service.buildSummaryRequest(files, context);

  if (options.dryRun) {
    process.stdout.write(formatSection("system", systemPrompt));
    process.stdout.write(formatSection("user", prompt));
    return;
  }

  const gateway = createGateway(config, deps);
  const maxPromptTokens = config.llm.max_prompt_tokens;
  const requests =
    maxPromptTokens !== undefined
      ? service.buildSummaryRequests(files, context, { maxTokens: maxPromptTokens, systemPrompt })
      : [prompt];

  if (requests.length === 0) {
    throw new Error(`The summary and system prompts do not fit into max_prompt_tokens (${maxPromptTokens})`);
  }
  if (requests.length > 1) {
    logger.info(`Summary request split into ${requests.length} chunks`);
  }

  for (const request of requests) {
    const reply = parseSummaryReply(await gateway.ask(request, systemPrompt));
    process.stdout.write(formatSummaryReply(reply));
  }
}
