/**
 * Entry point: resolves configuration and runs the selected mode
 *
 * Usage:
 *   # Wishlist from the roll grid (default)
 *   npm start
 *
 *   # Weapon/perk name->hash CSVs for the grid's dropdowns
 *   RUN_MODE=tables npm start
 *
 * Environment variables:
 *   - RUN_MODE: wishlist|tables (defaults to wishlist)
 *   - BUNGIE_API_KEY: Bungie.net application API key
 *   - GOOGLE_SHEETS_SPREADSHEET_ID, GOOGLE_SERVICE_ACCOUNT_EMAIL,
 *     GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY: roll grid access (wishlist mode)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *
 * See .env.example for the optional settings.
 */

import "dotenv/config";
import { loadRunConfig } from "./orchestration/runConfig";
import { runFromConfig } from "./orchestration/runner";
import * as logger from "./logger";

async function main(): Promise<void> {
  const config = loadRunConfig();
  logger.info("Starting run", { mode: config.mode });

  await runFromConfig(config);

  logger.info("Run finished", { mode: config.mode });
}

main().catch((error: unknown) => {
  logger.error("Run failed with fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
