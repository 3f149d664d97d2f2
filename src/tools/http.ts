/**
 * HTTP GET with exponential backoff for the retrieval adapters.
 *
 * Transient statuses (429, 500, 502, 503, 504) are retried with a delay of
 * backoffMs * 2^attempt. Every other failure, including timeouts and
 * network errors, ends the request. Failures are logged and reported as
 * null; they never throw.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { ZodType, ZodTypeDef } from "zod";
import { silentLogger, type Logger } from "../logging/logger.js";

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<{ status: number; text(): Promise<string> }>;

export type Sleep = (ms: number) => Promise<void>;

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const DEFAULT_RETRIES = 2;
export const DEFAULT_BACKOFF_MS = 2000;
export const DEFAULT_TIMEOUT_MS = 15_000;

export const USER_AGENT = "grounded-metrics/0.1.0";

export interface RetryOptions {
  headers?: Record<string, string>;
  /** Retries after the first attempt */
  retries?: number;
  /** Base delay for exponential backoff */
  backoffMs?: number;
  /** Per-attempt timeout */
  timeoutMs?: number;
  fetch?: FetchLike;
  sleep?: Sleep;
  logger?: Logger;
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

const defaultSleep: Sleep = (ms) => delay(ms);

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * GET a URL, retrying transient failures.
 *
 * @returns The response body, or null on failure
 */
export async function retryRequest(url: string, options: RetryOptions = {}): Promise<string | null> {
  const {
    headers = {},
    retries = DEFAULT_RETRIES,
    backoffMs = DEFAULT_BACKOFF_MS,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetch: fetchFn = defaultFetch,
    sleep = defaultSleep,
    logger = silentLogger,
  } = options;

  for (let attempt = 0; attempt <= retries; attempt++) {
    let status: number;
    let body: string;
    try {
      const response = await fetchFn(url, {
        headers: { "User-Agent": USER_AGENT, ...headers },
        signal: AbortSignal.timeout(timeoutMs),
      });
      status = response.status;
      body = await response.text();
    } catch (err) {
      logger.error(`Error fetching ${url}`, { error: errorMessage(err) });
      return null;
    }

    if (status >= 200 && status < 300) {
      return body;
    }

    if (RETRYABLE_STATUSES.has(status) && attempt < retries) {
      const waitMs = backoffMs * 2 ** attempt;
      logger.warn(`HTTP ${status} for ${url}; retrying in ${(waitMs / 1000).toFixed(1)}s`, {
        attempt: attempt + 1,
      });
      await sleep(waitMs);
      continue;
    }

    logger.error(`HTTP ${status} for ${url}`);
    return null;
  }

  return null;
}

/**
 * GET a URL and parse the body as JSON of a known shape.
 *
 * @returns The parsed body, or null on transport, JSON or shape failure
 */
export async function fetchJson<T>(
  url: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: RetryOptions = {}
): Promise<T | null> {
  const logger = options.logger ?? silentLogger;
  const raw = await retryRequest(url, options);
  if (raw === null) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    logger.error("JSON parse error", { url, error: errorMessage(err) });
    return null;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    logger.error("Unexpected response shape", {
      url,
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
    return null;
  }
  return result.data;
}
