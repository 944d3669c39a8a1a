/**
 * HTTP client wrapper: JSON GET client using native fetch
 * Supports timeouts, query params, retries with exponential backoff, and structured error handling
 */

import type { HttpMethod, HttpRequest } from "@/types/clients/http";
import {
  DEFAULT_ACCEPT_HEADERS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import * as logger from "@/logger";
import { HttpBodyParseError, HttpError } from "./httpError";

/**
 * Build URL with query parameters
 */
function buildUrl(baseUrl: string, query?: HttpRequest["query"]): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.append(key, String(value));
  }
  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch (error) {
    logger.debug("Could not read error response body", {
      url: response.url,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

function isMethodRetryable(method: HttpMethod): boolean {
  return RETRYABLE_HTTP_METHODS.includes(method);
}

function isStatusRetryable(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status);
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
function isErrorRetryable(error: unknown, method: HttpMethod): boolean {
  if (!isMethodRetryable(method)) {
    return false;
  }

  if (error instanceof HttpError) {
    return isStatusRetryable(error.status);
  }

  if (error instanceof HttpBodyParseError) {
    return false;
  }

  // AbortError (timeout), TypeError (network)
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function computeRetryDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  maxRetryAfterMs: number,
  retryAfterHeader: string | null,
): number {
  const retryAfterMs = parseRetryAfter(retryAfterHeader);
  if (retryAfterMs !== null) {
    return Math.min(retryAfterMs, maxRetryAfterMs);
  }
  return computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: req.method,
      headers: { ...DEFAULT_ACCEPT_HEADERS, ...req.headers },
      signal: controller.signal,
    });

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    // Content blobs are sometimes served without a JSON content-type,
    // so the body is always parsed as JSON regardless of the header.
    const text = await response.text();
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (parseError) {
      throw new HttpBodyParseError(url, parseError);
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent methods (GET, HEAD) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408, 429 (respects Retry-After), 5xx
 *
 * @param req - HTTP request configuration
 * @returns Parsed JSON body, unvalidated
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {HttpBodyParseError} On a 2xx response with an invalid JSON body
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest(req, url, timeoutMs);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !isErrorRetryable(error, req.method)) {
        break;
      }

      // Extract Retry-After header if available (429 or 503)
      let retryAfterHeader: string | null = null;
      if (error instanceof HttpError && error.headers) {
        if (error.status === 429 || error.status === 503) {
          retryAfterHeader = error.headers.get("retry-after");
        }
      }

      const delayMs = computeRetryDelay(
        attempt,
        baseDelayMs,
        maxDelayMs,
        maxRetryAfterMs,
        retryAfterHeader,
      );

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : String(error),
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}
