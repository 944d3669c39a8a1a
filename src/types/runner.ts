/**
 * Runner/orchestration type definitions
 */

import type { GoogleSheetsCredentials } from "./clients/googleSheets";
import type { GridColumns, RowDiagnostic } from "./grid";
import type { KeyCollision } from "./catalog";
import type { WishlistHeader } from "./wishlist";

/**
 * Run mode selected by RUN_MODE
 *
 * - wishlist: read the roll grid, match it, write the wishlist file
 * - tables: write weapon/perk name->hash CSVs (no spreadsheet needed)
 */
export type RunMode = "wishlist" | "tables";

/**
 * Spreadsheet settings (wishlist mode only)
 */
export type GridSourceConfig = {
  spreadsheetId: string;
  /** A1 range holding header + data rows */
  range: string;
  columns: GridColumns;
  credentials: GoogleSheetsCredentials;
};

/**
 * Fully resolved configuration for a single run
 */
export type RunConfig = {
  mode: RunMode;
  bungieApiKey: string;
  /** Present when mode is "wishlist" */
  grid?: GridSourceConfig;
  wishlistOutputPath: string;
  header: WishlistHeader;
  lookupOutputDir: string;
};

/**
 * Result of a wishlist generation run
 */
export type WishlistRunResult = {
  /** Grid data rows read (empty rows excluded) */
  totalRows: number;
  /** Rows that produced a directive line */
  matched: number;
  /** Rows skipped on a lookup miss */
  skipped: number;
  /** One entry per skipped row, in row order */
  diagnostics: RowDiagnostic[];
  /** Normalization collisions dropped while building the index */
  collisions: readonly KeyCollision[];
  /** Rendered wishlist body (headers + directives) */
  contents: string;
};

/**
 * Result of a lookup-table export run
 */
export type LookupTablesResult = {
  weaponCount: number;
  perkCount: number;
  weaponTablePath: string;
  perkTablePath: string;
};
