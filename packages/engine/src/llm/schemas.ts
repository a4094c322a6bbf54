import { z } from "zod";

// ---------------------------------------------------------------------------
// OpenAI-compatible chat completion (LiteLLM proxy)
// ---------------------------------------------------------------------------

export const ChatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string().nullable().optional(),
});

export const ChatUsageSchema = z.object({
  total_tokens: z.number().int().nonnegative(),
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
});

export const ChatCompletionResponseSchema = z.object({
  usage: ChatUsageSchema.optional(),
  choices: z.array(z.object({ message: ChatMessageSchema })),
});

export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

/** First choice's text, trimmed; empty when there is none. */
export function firstChoiceText(response: ChatCompletionResponse): string {
  return (response.choices[0]?.message.content ?? "").trim();
}

// ---------------------------------------------------------------------------
// Reply contracts
// ---------------------------------------------------------------------------

export const InlineReplySchema = z
  .object({
    message: z.string().trim().min(1, "message must not be empty"),
    suggestion: z.string().nullable(),
  })
  .strict();

export type InlineReply = z.infer<typeof InlineReplySchema>;
