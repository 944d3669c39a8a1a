/**
 * Google Sheets client public API
 */

export {
  GoogleSheetsClient,
  GoogleSheetsError,
  parseValueRange,
} from "./googleSheetsClient";
export type {
  GoogleSheetsConfig,
  GoogleSheetsCredentials,
  GoogleSheetsErrorDetails,
  SheetReadResult,
  SheetOperationResult,
  SheetOperationSuccess,
  SheetOperationError,
} from "@/types/clients/googleSheets";
