// CHANGE: Provide HTTP utilities with bounded retries and a request limiter.
// WHY: Outbound requests to the store are serialised and transient listing failures are retried.

import axios, { AxiosError, AxiosInstance, AxiosResponse } from "axios";
import pLimit from "p-limit";
import { NET } from "../config.js";
import { debug } from "../logger.js";

const LISTING_RETRY_ATTEMPTS = 3;

const concurrencyLimit = pLimit(Math.max(1, NET.CONCURRENCY));

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "catalog-watch/1.0 (+rolling store crawler)",
    Accept: "application/json"
  }
});

export interface JsonResponse<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
}

export interface GetJsonOptions {
  readonly params?: Record<string, string>;
  /** Total attempts, first try included. */
  readonly attempts?: number;
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * Exponential backoff with proportional jitter.
 *
 * @param attempt - Zero-based retry index.
 * @param random - Value in `[0, 1)` scaling the jitter.
 * @returns `min(maxMs, baseMs * 2^attempt)` plus up to `jitterRatio` of that delay.
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number, random: number, jitterRatio = 0.2): number {
  const backoff = Math.min(maxMs, baseMs * 2 ** attempt);
  const normalizedRandom = Math.min(1, Math.max(0, random));
  return backoff + Math.floor(backoff * jitterRatio * normalizedRandom);
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

/**
 * Network failures (no HTTP response) and 5xx responses are worth another attempt.
 */
export function isRetryableHttpError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  if (typeof status === "number") {
    return status >= 500 && status < 600;
  }
  return true;
}

/**
 * Parse a numeric `Retry-After` header into milliseconds.
 */
export function retryAfterMs(error: AxiosError): number | undefined {
  const raw = error.response?.headers?.["retry-after"];
  if (typeof raw === "string" && /^\d+$/.test(raw.trim())) {
    return Number(raw.trim()) * 1000;
  }
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return raw * 1000;
  }
  return undefined;
}

async function executeWithRetry<T>(
  operation: () => Promise<AxiosResponse<T>>,
  attempt: number,
  attempts: number
): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (error) {
    const nextAttempt = attempt + 1;
    if (nextAttempt >= attempts || !isRetryableHttpError(error)) {
      throw error;
    }
    const backoff = backoffDelay(attempt, NET.RETRY_BASE_MS, NET.RETRY_MAX_MS, Math.random());
    const url = axios.isAxiosError(error) ? error.config?.url ?? "unknown-url" : "unknown-url";
    debug(`HTTP retry (${nextAttempt}/${attempts}) after ${backoff}ms for ${url}`);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt, attempts);
  }
}

/**
 * Perform GET request expecting JSON payload.
 *
 * @param url - Target URL.
 * @param options - Query parameters and attempt bound (defaults to 3 attempts).
 * @returns Response data and headers.
 */
export async function getJson<T>(url: string, options: GetJsonOptions = {}): Promise<JsonResponse<T>> {
  const attempts = Math.max(1, options.attempts ?? LISTING_RETRY_ATTEMPTS);
  const response = await concurrencyLimit(() =>
    executeWithRetry(() => httpClient.get<T>(url, { params: options.params }), 0, attempts)
  );
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

export { httpClient };
