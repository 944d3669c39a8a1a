/**
 * HttpError class: structured error for HTTP failures
 */

import type { HttpErrorDetails } from "@/types/clients/http";

/**
 * Structured error class for HTTP failures
 * Contains status, URL, and optional response body snippet for debugging
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

/**
 * A 2xx response whose body is not valid JSON.
 *
 * Not retried: the server answered, it just answered garbage.
 */
export class HttpBodyParseError extends Error {
  public readonly url: string;

  constructor(url: string, cause: unknown) {
    super(
      `Invalid JSON body from ${url}: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = "HttpBodyParseError";
    this.url = url;
  }
}
