/**
 * Roll grid type definitions
 *
 * The roll grid is the curated spreadsheet: one recommended
 * weapon + perk pair per row.
 */

import type { Hash } from "./catalog";

/**
 * One spreadsheet data row, fields exactly as typed by the curator.
 */
export type GridRow = {
  /** 1-based row number in the sheet */
  readonly rowNumber: number;
  readonly weaponName: string;
  readonly perk1Name: string;
  readonly perk2Name: string;
};

/**
 * Raw cell values of the grid, as read from a source.
 */
export type GridValues = {
  /** 2D cell array, header row first */
  readonly values: unknown[][];
  /** 1-based sheet row of values[0] */
  readonly headerRowNumber: number;
};

/**
 * Header names of the three grid columns.
 */
export type GridColumns = {
  weapon: string;
  perk1: string;
  perk2: string;
};

/**
 * Row field a lookup can miss on.
 */
export type GridField = "weapon" | "perk1" | "perk2";

/**
 * A row whose fields all resolved to catalog hashes.
 */
export type MatchedRoll = {
  weaponHash: Hash;
  perk1Hash: Hash;
  perk2Hash: Hash;
  row: GridRow;
};

/**
 * Why a row was skipped (lookup miss).
 */
export type RowDiagnostic = {
  rowNumber: number;
  field: GridField;
  /** Raw, unnormalized cell value that missed */
  value: string;
  message: string;
};

/**
 * Per-row result of matching.
 */
export type RowMatchOutcome =
  | { ok: true; roll: MatchedRoll }
  | { ok: false; diagnostic: RowDiagnostic };
