/**
 * Roll grid sheet constants
 */

import type { GridColumns } from "@/types/grid";

/**
 * Default A1 range for the roll grid (header row + data rows)
 */
export const DEFAULT_GRID_SHEET_RANGE = "Grid!A:Z";

/**
 * Default header names of the three columns the matcher needs.
 * Compared after name normalization, so "perk 1", "Perk #1" and "PERK 1" all match.
 */
export const DEFAULT_GRID_COLUMNS: GridColumns = {
  weapon: "Weapon",
  perk1: "Perk 1",
  perk2: "Perk 2",
};

/**
 * Header row number (1-based); data starts on the next row
 */
export const GRID_HEADER_ROW = 1;
