/**
 * HTTP client constants: defaults and configuration
 */

import type { HttpMethod } from "@/types/clients/http";

/**
 * Default request timeout in milliseconds (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Default headers sent with every request (all endpoints return JSON)
 */
export const DEFAULT_ACCEPT_HEADERS: Record<string, string> = {
  Accept: "application/json",
  "User-Agent": "roll-grid-wishlist/0.1.0",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Default maximum number of attempts (including initial request)
 * 1 initial + 2 retries; a run that still fails aborts
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Base delay in milliseconds for exponential backoff
 */
export const DEFAULT_BASE_DELAY_MS = 1_000;

/**
 * Maximum delay in milliseconds between retries
 */
export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Upper bound for a server-provided Retry-After
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * HTTP methods that are safe to retry (idempotent)
 */
export const RETRYABLE_HTTP_METHODS: readonly HttpMethod[] = ["GET", "HEAD"];

/**
 * HTTP status codes that warrant a retry
 * - 408: Request Timeout
 * - 429: Too Many Requests (rate limit)
 * - 5xx: Server errors (temporary issues)
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [
  408, 429, 500, 502, 503, 504,
];
