// ---------------------------------------------------------------------------
// @review-prompts/engine
//
// Prompt templates for LLM code review: loading, rendering, request building
// and the gateway that sends them to a model.
// ---------------------------------------------------------------------------

// Templates
export {
  PROMPT_KINDS,
  TEMPLATE_IDS,
  isPromptKind,
  systemTemplateId,
  type PromptKind,
  type SystemTemplateId,
  type TemplateId,
  type Template,
  type RenderContext,
} from "./templates/template.js";

export {
  DEFAULT_PLACEHOLDER_PATTERN,
  compilePlaceholder,
  isValidPlaceholderPattern,
  listPlaceholders,
  type PlaceholderSyntax,
} from "./templates/placeholder.js";

export { TemplateRegistry, SOURCE_SEPARATOR } from "./templates/registry.js";
export { TemplateRenderer, type TemplateRendererOptions } from "./templates/renderer.js";

// Prompts
export { BUILTIN_PROMPTS_DIR, builtinPromptPath, defaultPromptFile } from "./prompts/builtin.js";

export {
  defaultPromptConfig,
  resolvePromptFiles,
  resolveSystemPromptFiles,
  templateSources,
  type PromptConfig,
} from "./prompts/settings.js";

export {
  loadPromptSource,
  isRemoteSource,
  type LoadSourceOptions,
  type PromptSourceLoader,
} from "./prompts/sources.js";

export { normalizePrompt } from "./prompts/normalize.js";

export {
  FILE_HEADER_PREFIX,
  formatFile,
  formatFiles,
  formatThread,
  type ReviewDiffFile,
  type ReviewThread,
  type ThreadComment,
} from "./prompts/format.js";

export { PROMPT_CONTEXT_DEFAULTS, toRenderContext, type PromptContext } from "./prompts/context.js";

export {
  splitPrompt,
  splitLargeLine,
  splitLargeSection,
  type SplitPromptOptions,
} from "./prompts/splitter.js";

export { PromptService, type PromptServiceOptions, type RequestBudget } from "./prompts/service.js";

// Parsers
export { splitDiffByFile } from "./parsers/diff-files.js";

// LLM
export type { AIProvider, AIMessage, AICompleteParams, AICompleteResult, AIUsage } from "./llm/provider.js";
export {
  PROVIDER_NAMES,
  isProviderName,
  createProvider,
  type ProviderName,
  type CreateProviderOptions,
  LiteLLMProvider,
  type LiteLLMProviderOptions,
  OpenAIProvider,
  AnthropicProvider,
  MockProvider,
  type MockResponse,
} from "./llm/providers/index.js";

export {
  SimpleTokenizer,
  TiktokenTokenizer,
  countTokens,
  encodingForModel,
  getTokenizer,
  type Tokenizer,
} from "./llm/tokenizer.js";

export {
  RETRY_STATUS_CODES,
  fetchWithRetry,
  isRetryableFetchError,
  withRetry,
  type FetchRetryOptions,
  type RetryOptions,
} from "./llm/retry.js";

export {
  ChatCompletionResponseSchema,
  InlineReplySchema,
  firstChoiceText,
  type ChatCompletionResponse,
  type InlineReply,
} from "./llm/schemas.js";

export {
  NO_ISSUES_SUMMARY,
  parseInlineReply,
  parseSummaryReply,
  type SummaryReply,
} from "./llm/replies.js";

export {
  ReviewLLMGateway,
  type ChatHooks,
  type PromptTokenCount,
  type ReviewLLMGatewayOptions,
} from "./llm/gateway.js";

// Config
export {
  CONFIG_FILE_NAME,
  applyEnvOverrides,
  defaultConfig,
  loadConfig,
  resolveConfig,
  type LLMConfig,
  type ReviewPromptsConfig,
} from "./config.js";

// Errors and logging
export { NotFoundError, MissingVariableError, PromptSourceError, LLMHttpError } from "./errors.js";
export { logger } from "./logger.js";
