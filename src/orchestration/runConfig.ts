/**
 * Run configuration: resolves a RunConfig from environment variables
 */

import type { RunConfig, RunMode } from "@/types/runner";
import {
  BUNGIE_API_KEY_ENV,
  DEFAULT_LOOKUP_OUTPUT_DIR,
  DEFAULT_RUN_MODE,
  DEFAULT_WISHLIST_OUTPUT_PATH,
  GRID_PERK1_COLUMN_ENV,
  GRID_PERK2_COLUMN_ENV,
  GRID_SHEET_RANGE_ENV,
  GRID_WEAPON_COLUMN_ENV,
  LOOKUP_OUTPUT_DIR_ENV,
  RUN_MODE_ENV,
  RUN_MODES,
  WISHLIST_DESCRIPTION_ENV,
  WISHLIST_OUTPUT_PATH_ENV,
  WISHLIST_TITLE_ENV,
} from "@/constants/runner";
import { DEFAULT_GRID_COLUMNS, DEFAULT_GRID_SHEET_RANGE } from "@/constants/grid";
import {
  DEFAULT_WISHLIST_DESCRIPTION,
  DEFAULT_WISHLIST_TITLE,
} from "@/constants/wishlist";
import {
  GOOGLE_SERVICE_ACCOUNT_EMAIL_ENV,
  GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV,
  GOOGLE_SHEETS_SPREADSHEET_ID_ENV,
} from "@/constants/clients/googleSheets";

type Env = Record<string, string | undefined>;

/**
 * Trimmed value, or undefined when unset or blank
 */
function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

export function parseRunMode(value: string | undefined): RunMode {
  if (value === undefined) {
    return DEFAULT_RUN_MODE;
  }
  const normalized = value.toLowerCase();
  if (!isRunMode(normalized)) {
    throw new Error(
      `Invalid ${RUN_MODE_ENV} "${value}": expected one of ${RUN_MODES.join(", ")}`,
    );
  }
  return normalized;
}

/**
 * Resolve the run configuration
 *
 * The spreadsheet variables are only required in wishlist mode.
 *
 * @throws Error naming every missing required variable
 */
export function loadRunConfig(env: Env = process.env): RunConfig {
  const mode = parseRunMode(readEnv(env, RUN_MODE_ENV));
  const missing: string[] = [];

  const bungieApiKey = readEnv(env, BUNGIE_API_KEY_ENV);
  if (!bungieApiKey) missing.push(BUNGIE_API_KEY_ENV);

  const spreadsheetId = readEnv(env, GOOGLE_SHEETS_SPREADSHEET_ID_ENV);
  const clientEmail = readEnv(env, GOOGLE_SERVICE_ACCOUNT_EMAIL_ENV);
  const privateKey = readEnv(env, GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV);

  if (mode === "wishlist") {
    if (!spreadsheetId) missing.push(GOOGLE_SHEETS_SPREADSHEET_ID_ENV);
    if (!clientEmail) missing.push(GOOGLE_SERVICE_ACCOUNT_EMAIL_ENV);
    if (!privateKey) missing.push(GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ENV);
  }

  if (missing.length > 0 || !bungieApiKey) {
    throw new Error(
      `Configuration missing: ${missing.join(", ")}. ` +
        `Please set these environment variables.`,
    );
  }

  const config: RunConfig = {
    mode,
    bungieApiKey,
    wishlistOutputPath:
      readEnv(env, WISHLIST_OUTPUT_PATH_ENV) ?? DEFAULT_WISHLIST_OUTPUT_PATH,
    header: {
      title: readEnv(env, WISHLIST_TITLE_ENV) ?? DEFAULT_WISHLIST_TITLE,
      description:
        readEnv(env, WISHLIST_DESCRIPTION_ENV) ?? DEFAULT_WISHLIST_DESCRIPTION,
    },
    lookupOutputDir:
      readEnv(env, LOOKUP_OUTPUT_DIR_ENV) ?? DEFAULT_LOOKUP_OUTPUT_DIR,
  };

  if (mode === "wishlist" && spreadsheetId && clientEmail && privateKey) {
    config.grid = {
      spreadsheetId,
      range: readEnv(env, GRID_SHEET_RANGE_ENV) ?? DEFAULT_GRID_SHEET_RANGE,
      columns: {
        weapon: readEnv(env, GRID_WEAPON_COLUMN_ENV) ?? DEFAULT_GRID_COLUMNS.weapon,
        perk1: readEnv(env, GRID_PERK1_COLUMN_ENV) ?? DEFAULT_GRID_COLUMNS.perk1,
        perk2: readEnv(env, GRID_PERK2_COLUMN_ENV) ?? DEFAULT_GRID_COLUMNS.perk2,
      },
      credentials: {
        clientEmail,
        privateKey,
      },
    };
  }

  return config;
}
