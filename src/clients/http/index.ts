/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError, HttpBodyParseError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
} from "@/types/clients/http";
