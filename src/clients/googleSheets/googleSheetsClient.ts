/**
 * GoogleSheetsClient: read-only API client for Google Sheets
 *
 * Reads cell ranges from a single spreadsheet.
 * Handles authentication via service account JWT.
 */

import type {
  GoogleSheetsConfig,
  GoogleSheetsCredentials,
  GoogleSheetsErrorDetails,
  SheetReadResult,
  SheetOperationResult,
} from "@/types/clients/googleSheets";
import {
  GOOGLE_SHEETS_BASE_URL,
  GOOGLE_SHEETS_API_VERSION,
  GOOGLE_SHEETS_DEFAULT_MAX_ATTEMPTS,
  GOOGLE_SHEETS_DEFAULT_BASE_DELAY_MS,
  GOOGLE_SHEETS_DEFAULT_MAX_DELAY_MS,
  GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS,
  GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS,
  GOOGLE_OAUTH2_TOKEN_URL,
  GOOGLE_SHEETS_SCOPES,
  GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS,
  GOOGLE_SHEETS_MS_PER_SECOND,
  GOOGLE_SHEETS_HTTP_STATUS_RATE_LIMIT,
  GOOGLE_SHEETS_HTTP_STATUS_REQUEST_TIMEOUT,
  GOOGLE_SHEETS_HTTP_STATUS_SERVER_ERROR_MIN,
} from "@/constants/clients/googleSheets";
import * as logger from "@/logger";
import { createSign } from "crypto";
import { normalizePrivateKey } from "@/utils/sheets/sheetsHelpers";

/**
 * Google Sheets API error
 */
export class GoogleSheetsError extends Error {
  constructor(
    message: string,
    public readonly details: GoogleSheetsErrorDetails,
  ) {
    super(message);
    this.name = "GoogleSheetsError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRetryableStatus(status: number): boolean {
  return (
    status >= GOOGLE_SHEETS_HTTP_STATUS_SERVER_ERROR_MIN ||
    status === GOOGLE_SHEETS_HTTP_STATUS_RATE_LIMIT ||
    status === GOOGLE_SHEETS_HTTP_STATUS_REQUEST_TIMEOUT
  );
}

/**
 * Validate a values.get response body
 *
 * `values` is omitted by the API when the range is empty.
 */
export function parseValueRange(data: unknown): SheetReadResult {
  if (!isRecord(data) || typeof data.range !== "string") {
    throw new Error("Unexpected values response: missing range");
  }
  if (data.values === undefined) {
    return { range: data.range, values: null };
  }
  if (!Array.isArray(data.values)) {
    throw new Error("Unexpected values response: values is not an array");
  }
  const values: unknown[][] = [];
  for (const row of data.values) {
    if (!Array.isArray(row)) {
      throw new Error("Unexpected values response: row is not an array");
    }
    values.push(row);
  }
  return { range: data.range, values };
}

function parseTokenResponse(data: unknown): { accessToken: string; expiresIn: number } {
  if (
    !isRecord(data) ||
    typeof data.access_token !== "string" ||
    typeof data.expires_in !== "number"
  ) {
    throw new Error("OAuth2 token response missing access_token/expires_in");
  }
  return { accessToken: data.access_token, expiresIn: data.expires_in };
}

/**
 * Google Sheets client implementation
 */
export class GoogleSheetsClient {
  private readonly spreadsheetId: string;
  private readonly credentials: GoogleSheetsCredentials;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  private accessToken: string | null = null;
  private tokenExpiry: number = 0;

  constructor(config: GoogleSheetsConfig) {
    if (!config.spreadsheetId) {
      throw new Error(
        "Google Sheets configuration missing: spreadsheetId is required",
      );
    }

    this.spreadsheetId = config.spreadsheetId;

    const { clientEmail, privateKey } = config.credentials;
    if (!clientEmail) {
      throw new Error(
        "Google Sheets authentication configuration missing: " +
          "credentials.clientEmail is required",
      );
    }

    this.credentials = {
      clientEmail,
      privateKey: normalizePrivateKey(privateKey, "credentials.privateKey"),
    };

    this.maxAttempts =
      config.retry?.maxAttempts ?? GOOGLE_SHEETS_DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs =
      config.retry?.baseDelayMs ?? GOOGLE_SHEETS_DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs =
      config.retry?.maxDelayMs ?? GOOGLE_SHEETS_DEFAULT_MAX_DELAY_MS;

    logger.debug("GoogleSheetsClient initialized", {
      spreadsheetId: this.spreadsheetId,
    });
  }

  /**
   * Generate JWT for service account authentication
   */
  private createJWT(): string {
    const now = Math.floor(Date.now() / GOOGLE_SHEETS_MS_PER_SECOND);
    const expiry = now + GOOGLE_SHEETS_JWT_EXPIRATION_SECONDS;

    const header = {
      alg: "RS256",
      typ: "JWT",
    };

    const payload = {
      iss: this.credentials.clientEmail,
      scope: GOOGLE_SHEETS_SCOPES.join(" "),
      aud: GOOGLE_OAUTH2_TOKEN_URL,
      exp: expiry,
      iat: now,
    };

    const encodedHeader = Buffer.from(JSON.stringify(header)).toString(
      "base64url",
    );
    const encodedPayload = Buffer.from(JSON.stringify(payload)).toString(
      "base64url",
    );

    const signatureInput = `${encodedHeader}.${encodedPayload}`;
    const sign = createSign("RSA-SHA256");
    sign.update(signatureInput);
    sign.end();

    const signature = sign.sign(this.credentials.privateKey, "base64url");

    return `${signatureInput}.${signature}`;
  }

  /**
   * Get access token, refreshing if necessary
   */
  private async getAccessToken(): Promise<string> {
    const now = Math.floor(Date.now() / GOOGLE_SHEETS_MS_PER_SECOND);

    if (
      this.accessToken &&
      this.tokenExpiry > now + GOOGLE_SHEETS_TOKEN_EXPIRY_BUFFER_SECONDS
    ) {
      return this.accessToken;
    }

    logger.debug("Requesting new Google OAuth2 access token");

    try {
      const response = await fetch(GOOGLE_OAUTH2_TOKEN_URL, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({
          grant_type: "urn:ietf:params:oauth:grant-type:jwt-bearer",
          assertion: this.createJWT(),
        }),
        signal: AbortSignal.timeout(GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(
          `OAuth2 token request failed: ${response.status} ${response.statusText} - ${errorText}`,
        );
      }

      const token = parseTokenResponse(await response.json());

      this.accessToken = token.accessToken;
      this.tokenExpiry = now + token.expiresIn;

      logger.debug("Google OAuth2 access token obtained");

      return token.accessToken;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Failed to obtain Google OAuth2 access token", {
        error: message,
      });
      throw new Error(
        `Failed to authenticate with Google Sheets API: ${message}`,
      );
    }
  }

  private backoffDelay(attempt: number): number {
    return Math.min(this.baseDelayMs * Math.pow(2, attempt - 1), this.maxDelayMs);
  }

  /**
   * GET an API endpoint with retry logic
   */
  private async apiGet(endpoint: string): Promise<unknown> {
    const token = await this.getAccessToken();
    const url = `${GOOGLE_SHEETS_BASE_URL}${GOOGLE_SHEETS_API_VERSION}${endpoint}`;

    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await fetch(url, {
          method: "GET",
          headers: { Authorization: `Bearer ${token}` },
          signal: AbortSignal.timeout(GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS),
        });

        if (response.ok) {
          const data: unknown = await response.json();
          return data;
        }

        const errorDetails: GoogleSheetsErrorDetails = {
          status: response.status,
          message: await response.text(),
          spreadsheetId: this.spreadsheetId,
        };

        if (!isRetryableStatus(response.status)) {
          throw new GoogleSheetsError(
            `Google Sheets API error: ${response.status} ${response.statusText}`,
            errorDetails,
          );
        }

        lastError = new GoogleSheetsError(
          `API request failed: ${response.status} ${response.statusText}`,
          errorDetails,
        );
      } catch (error) {
        if (error instanceof GoogleSheetsError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
      }

      if (attempt < this.maxAttempts) {
        const delay = this.backoffDelay(attempt);
        logger.warn(
          `Google Sheets API request failed, retrying (${attempt}/${this.maxAttempts})`,
          {
            error: lastError?.message,
            delayMs: delay,
            url,
          },
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    logger.error("Google Sheets API request failed after all retries", {
      url,
      error: lastError?.message,
    });
    throw lastError ?? new Error("Google Sheets API request failed");
  }

  /**
   * Read values from a range in the spreadsheet
   *
   * @param range - A1 notation range (e.g., "Grid!A:Z")
   * @returns SheetOperationResult with values or error details
   */
  async readRange(
    range: string,
  ): Promise<SheetOperationResult<SheetReadResult>> {
    logger.debug("Reading Google Sheets range", {
      spreadsheetId: this.spreadsheetId,
      range,
    });

    try {
      const endpoint = `/spreadsheets/${this.spreadsheetId}/values/${encodeURIComponent(range)}`;
      const data = parseValueRange(await this.apiGet(endpoint));
      return { ok: true, data };
    } catch (error) {
      const errorDetails: GoogleSheetsErrorDetails =
        error instanceof GoogleSheetsError
          ? { ...error.details, range }
          : {
              message: error instanceof Error ? error.message : String(error),
              spreadsheetId: this.spreadsheetId,
              range,
            };

      logger.error("Failed to read Google Sheets range", {
        spreadsheetId: this.spreadsheetId,
        range,
        error: errorDetails,
      });

      return {
        ok: false,
        error: errorDetails,
      };
    }
  }
}
