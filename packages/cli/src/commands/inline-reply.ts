import { z } from "zod";
import { parseInlineReply, splitDiffByFile, type ReviewDiffFile, type ReviewThread } from "@review-prompts/engine";
import { formatInlineReply, formatSection } from "../formatter.js";
import {
  createGateway,
  createPromptService,
  loadRunConfig,
  readInputFile,
  type CommandDeps,
  type GlobalOptions,
} from "./shared.js";

export interface InlineReplyOptions extends GlobalOptions {
  diff: string;
  thread: string;
  /** Diff file the thread belongs to; defaults to the thread's own file. */
  file?: string;
  title?: string;
  author?: string;
  dryRun: boolean;
}

const ThreadSchema = z.object({
  file: z.string().optional(),
  line: z.number().int().positive().optional(),
  comments: z
    .array(z.object({ author: z.string(), body: z.string() }))
    .min(1, "a thread needs at least one comment"),
});

function readThread(path: string): ReviewThread {
  let data: unknown;
  try {
    data = JSON.parse(readInputFile(path));
  } catch (err) {
    throw new Error(`Invalid thread file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = ThreadSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid thread file ${path}: ${issues.join("; ")}`);
  }
  return result.data;
}

function pickDiff(files: ReviewDiffFile[], wanted: string | undefined): ReviewDiffFile {
  if (files.length === 0) throw new Error("The diff is empty");
  if (wanted === undefined) return files[0];

  const match = files.find((f) => f.file === wanted);
  if (!match) {
    throw new Error(`No diff for ${wanted}; the diff covers: ${files.map((f) => f.file).join(", ")}`);
  }
  return match;
}

export async function runInlineReply(options: InlineReplyOptions, deps: CommandDeps = {}): Promise<void> {
  if (!options.diff) throw new Error("inline-reply needs --diff <file>");
  if (!options.thread) throw new Error("inline-reply needs --thread <file.json>");

  const config = loadRunConfig(options);
  const service = await createPromptService(config);

  const thread = readThread(options.thread);
  const diff = pickDiff(splitDiffByFile(readInputFile(options.diff)), options.file ?? thread.file);
  const context = { reviewTitle: options.title, reviewAuthor: options.author, changedFiles: [diff.file] };

  const systemPrompt = service.buildSystemRequest("inline_reply", context);
  const prompt = service.buildInlineReplyRequest(diff, thread, context);

  if (options.dryRun) {
    process.stdout.write(formatSection("system", systemPrompt));
    process.stdout.write(formatSection("user", prompt));
    return;
  }

  const raw = await createGateway(config, deps).ask(prompt, systemPrompt);
  const reply = parseInlineReply(raw);
  if (!reply) {
    throw new Error("The model did not return a valid inline reply");
  }

  process.stdout.write(formatInlineReply(reply));
}
