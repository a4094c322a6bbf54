/**
 * Prompt source loading: local files or HTTP(S) URLs.
 */

import { readFile } from "node:fs/promises";
import { PromptSourceError } from "../errors.js";
import { logger } from "../logger.js";

const URL_SCHEME = /^([a-z][a-z0-9+.-]*):\/\//i;

export interface LoadSourceOptions {
  fetchImpl?: typeof fetch;
}

export type PromptSourceLoader = (source: string) => Promise<string>;

export function isRemoteSource(source: string): boolean {
  return URL_SCHEME.test(source);
}

export async function loadPromptSource(
  source: string,
  options: LoadSourceOptions = {},
): Promise<string> {
  const scheme = source.match(URL_SCHEME)?.[1]?.toLowerCase();

  if (scheme === undefined) {
    try {
      return await readFile(source, "utf-8");
    } catch (err) {
      throw new PromptSourceError(source, err instanceof Error ? err.message : String(err));
    }
  }

  if (scheme !== "http" && scheme !== "https") {
    throw new PromptSourceError(source, `unsupported scheme "${scheme}"`);
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  logger.debug(`Fetching prompt ${source}`);

  let response: Response;
  try {
    response = await fetchImpl(source);
  } catch (err) {
    throw new PromptSourceError(source, err instanceof Error ? err.message : String(err));
  }

  if (!response.ok) {
    throw new PromptSourceError(source, `HTTP ${response.status}`);
  }

  return response.text();
}
