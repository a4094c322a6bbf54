/**
 * Retry helpers for LLM calls.
 *
 * `fetchWithRetry` retries an HTTP request on gateway-style statuses and on
 * network failures with a fixed delay. `withRetry` wraps SDK calls and backs
 * off exponentially on rate limits and server errors.
 */

import { logger } from "../logger.js";

// ---------------------------------------------------------------------------
// HTTP transport retry
// ---------------------------------------------------------------------------

export const RETRY_STATUS_CODES: readonly number[] = [500, 502, 503, 504];

export interface FetchRetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  statusCodes?: readonly number[];
  /** Per-attempt timeout; each attempt gets a fresh signal. */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_DELAY_MS = 500;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Network failures surface from fetch as a TypeError carrying the socket or
 * DNS error as `cause` (message "fetch failed"); timeouts as TimeoutError.
 * Other TypeErrors, such as an unparsable URL, are not retried.
 */
export function isRetryableFetchError(err: unknown): boolean {
  if (err instanceof TypeError) return err.cause !== undefined || err.message === "fetch failed";
  return err instanceof Error && err.name === "TimeoutError";
}

function describe(err: unknown): string {
  return err instanceof Error ? `${err.name} - ${err.message}` : String(err);
}

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options: FetchRetryOptions = {},
): Promise<Response> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  const statusCodes = options.statusCodes ?? RETRY_STATUS_CODES;
  const fetchImpl = options.fetchImpl ?? fetch;
  const method = init.method ?? "GET";
  const retryIn = `Retrying in ${(delayMs / 1000).toFixed(1)}s...`;

  let lastResponse: Response | undefined;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const signal = options.timeoutMs !== undefined ? AbortSignal.timeout(options.timeoutMs) : init.signal;
      const response = await fetchImpl(url, { ...init, signal });
      if (!statusCodes.includes(response.status)) return response;

      if (attempt < maxAttempts) await response.body?.cancel();
      lastResponse = response;
      logger.warn(
        `Attempt ${attempt}/${maxAttempts} failed with status=${response.status} for ${method} ${url}. ${retryIn}`,
      );
    } catch (err) {
      if (!isRetryableFetchError(err)) throw err;
      lastError = err;
      lastResponse = undefined;
      logger.warn(
        `Attempt ${attempt}/${maxAttempts} failed with exception: ${describe(err)} for ${method} ${url}. ${retryIn}`,
      );
    }

    if (attempt < maxAttempts) await sleep(delayMs);
  }

  if (lastResponse) {
    logger.error(
      `All ${maxAttempts} attempts failed for ${method} ${url} (last status=${lastResponse.status})`,
    );
    return lastResponse;
  }

  throw new Error(`All ${maxAttempts} attempts failed for ${method} ${url}: ${describe(lastError)}`, {
    cause: lastError,
  });
}

// ---------------------------------------------------------------------------
// SDK call retry
// ---------------------------------------------------------------------------

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
}

function errorStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/** Retry on 429 and 5xx with exponential backoff; anything else is thrown at once. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 1000;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;
      lastResponse = undefined;

      const status = errorStatus(err);
      const isRetryable = status === 429 || (status !== undefined && status >= 500);

      if (!isRetryable || attempt === maxRetries) throw err;

      const delay = baseDelayMs * Math.pow(2, attempt);
      logger.warn(`Request failed with status ${status}, retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
  throw lastError;
}
