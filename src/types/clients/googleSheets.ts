/**
 * Google Sheets API type definitions
 *
 * These types represent the data shapes used by the Google Sheets client.
 * Import from "@/types/clients/googleSheets" or "@/clients/googleSheets".
 */

/**
 * Service account credentials for Google Sheets API authentication
 */
export type GoogleSheetsCredentials = {
  clientEmail: string;
  privateKey: string;
};

/**
 * Google Sheets client configuration
 */
export type GoogleSheetsConfig = {
  /**
   * Service account credentials for authentication
   */
  credentials: GoogleSheetsCredentials;

  /**
   * Target spreadsheet ID (required)
   */
  spreadsheetId: string;

  /**
   * Retry configuration for API requests
   */
  retry?: {
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
  };
};

/**
 * Result type for read operations
 */
export type SheetReadResult = {
  range: string;
  values: unknown[][] | null;
};

/**
 * Error details specific to Google Sheets API
 */
export type GoogleSheetsErrorDetails = {
  status?: number;
  message: string;
  spreadsheetId?: string;
  range?: string;
};

export type SheetOperationSuccess<T> = {
  ok: true;
  data: T;
};

export type SheetOperationError = {
  ok: false;
  error: GoogleSheetsErrorDetails;
};

/**
 * Result union for operations that may fail
 */
export type SheetOperationResult<T> =
  | SheetOperationSuccess<T>
  | SheetOperationError;
