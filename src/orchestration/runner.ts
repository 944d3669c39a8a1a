/**
 * Runner core: wires sources, index, matcher and encoder into a run
 *
 * Two run modes:
 * - wishlist: catalog + roll grid -> wishlist file
 * - tables: catalog -> weapon/perk name/hash CSVs
 *
 * Both inputs are fetched to completion before anything is resolved, and
 * any fatal error aborts the run before a file is written.
 */

import type { CatalogSource, GridSource } from "@/interfaces";
import type {
  CatalogIndex,
  GridColumns,
  Logger,
  LookupTablesResult,
  RowDiagnostic,
  RunConfig,
  WishlistHeader,
  WishlistRunResult,
} from "@/types";
import { buildCatalogIndex } from "@/catalog";
import { matchRows, readGridRows, SheetsGridSource } from "@/grid";
import { buildRowNote, encodeWishlistLine, renderWishlist, writeWishlistFile } from "@/wishlist";
import { exportLookupTables } from "@/lookupTables";
import { BungieManifestClient } from "@/clients/bungie";
import { GoogleSheetsClient } from "@/clients/googleSheets";
import * as logger from "@/logger";

export type WishlistRunDeps = {
  catalogSource: CatalogSource;
  gridSource: GridSource;
};

export type WishlistRunOptions = {
  columns: GridColumns;
  header: WishlistHeader;
  /** Directive scheme; defaults to the encoder's */
  scheme?: string;
  logger?: Logger;
};

/**
 * Log index size and every dropped normalization collision
 */
function reportIndex(index: CatalogIndex, log: Logger): void {
  log.info("Catalog index built", {
    weapons: index.weaponsByKey.size,
    perks: index.perksByKey.size,
    collisions: index.collisions.length,
  });

  if (index.collisions.length > 0) {
    log.warn("Catalog names collide after normalization; first entry kept", {
      count: index.collisions.length,
    });
    for (const collision of index.collisions) {
      log.debug("Normalization collision", { ...collision });
    }
  }
}

function reportDiagnostic(diagnostic: RowDiagnostic, log: Logger): void {
  log.warn(diagnostic.message, {
    rowNumber: diagnostic.rowNumber,
    field: diagnostic.field,
    value: diagnostic.value,
  });
}

/**
 * Build the wishlist contents from a catalog and a roll grid
 *
 * A row whose weapon or perk is not found is skipped and reported; it
 * never stops the run. Source, schema and reference errors propagate.
 */
export async function runWishlistGeneration(
  deps: WishlistRunDeps,
  options: WishlistRunOptions,
): Promise<WishlistRunResult> {
  const log = options.logger ?? logger.withContext({ mode: "wishlist" });

  const [rawCatalog, rows] = await Promise.all([
    deps.catalogSource.fetchCatalog(),
    readGridRows(deps.gridSource, options.columns),
  ]);

  const index = buildCatalogIndex(rawCatalog);
  reportIndex(index, log);

  const lines: string[] = [];
  const diagnostics: RowDiagnostic[] = [];

  for (const outcome of matchRows(rows, index)) {
    if (outcome.ok) {
      lines.push(
        encodeWishlistLine(outcome.roll, buildRowNote(outcome.roll.row), options.scheme),
      );
    } else {
      diagnostics.push(outcome.diagnostic);
      reportDiagnostic(outcome.diagnostic, log);
    }
  }

  const result: WishlistRunResult = {
    totalRows: rows.length,
    matched: lines.length,
    skipped: diagnostics.length,
    diagnostics,
    collisions: index.collisions,
    contents: renderWishlist(options.header, lines),
  };

  log.info("Roll grid matched", {
    totalRows: result.totalRows,
    matched: result.matched,
    skipped: result.skipped,
  });

  return result;
}

/**
 * Build the catalog index and write both lookup tables
 */
export async function runLookupTables(
  catalogSource: CatalogSource,
  outputDir: string,
  log: Logger = logger.withContext({ mode: "tables" }),
): Promise<LookupTablesResult> {
  const index = buildCatalogIndex(await catalogSource.fetchCatalog());
  reportIndex(index, log);
  return exportLookupTables(index, outputDir);
}

/**
 * Run a configured mode against the live Bungie and Google APIs
 */
export async function runFromConfig(config: RunConfig): Promise<void> {
  const catalogSource = new BungieManifestClient({ apiKey: config.bungieApiKey });

  if (config.mode === "tables") {
    await runLookupTables(catalogSource, config.lookupOutputDir);
    return;
  }

  if (!config.grid) {
    throw new Error("Wishlist mode requires a roll grid configuration");
  }

  const sheetsClient = new GoogleSheetsClient({
    spreadsheetId: config.grid.spreadsheetId,
    credentials: config.grid.credentials,
  });
  const gridSource = new SheetsGridSource(
    sheetsClient,
    config.grid.range,
    config.grid.spreadsheetId,
  );

  const result = await runWishlistGeneration(
    { catalogSource, gridSource },
    { columns: config.grid.columns, header: config.header },
  );
  await writeWishlistFile(config.wishlistOutputPath, result.contents);
}
