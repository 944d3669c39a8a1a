/**
 * Runner/orchestration constants
 *
 * Environment variable names and defaults for a run.
 */

import type { RunMode } from "@/types/runner";

export const RUN_MODE_ENV = "RUN_MODE";

export const RUN_MODES: readonly RunMode[] = ["wishlist", "tables"];

export const DEFAULT_RUN_MODE: RunMode = "wishlist";

export const BUNGIE_API_KEY_ENV = "BUNGIE_API_KEY";

export const GRID_SHEET_RANGE_ENV = "GRID_SHEET_RANGE";

export const GRID_WEAPON_COLUMN_ENV = "GRID_WEAPON_COLUMN";

export const GRID_PERK1_COLUMN_ENV = "GRID_PERK1_COLUMN";

export const GRID_PERK2_COLUMN_ENV = "GRID_PERK2_COLUMN";

export const WISHLIST_OUTPUT_PATH_ENV = "WISHLIST_OUTPUT_PATH";

export const WISHLIST_TITLE_ENV = "WISHLIST_TITLE";

export const WISHLIST_DESCRIPTION_ENV = "WISHLIST_DESCRIPTION";

export const LOOKUP_OUTPUT_DIR_ENV = "LOOKUP_OUTPUT_DIR";

/**
 * Default wishlist output file (relative to cwd)
 */
export const DEFAULT_WISHLIST_OUTPUT_PATH = "wishlist.txt";

/**
 * Default directory for weapon_names.csv / perk_names.csv
 */
export const DEFAULT_LOOKUP_OUTPUT_DIR = ".";
