/**
 * Lookup-table export: weapon and perk name/hash CSVs
 *
 * The tables list every name the catalog index knows, so the roll grid's
 * dropdowns only offer values the matcher can resolve.
 */

import { mkdir, writeFile } from "fs/promises";
import { join, resolve } from "path";
import type { CatalogIndex, Hash } from "@/types/catalog";
import type { LookupTableRow } from "@/types/wishlist";
import type { LookupTablesResult } from "@/types/runner";
import {
  CSV_LINE_SEPARATOR,
  PERK_LOOKUP_TABLE_FILE,
  WEAPON_LOOKUP_TABLE_FILE,
} from "@/constants/wishlist";
import * as logger from "@/logger";

const CSV_HEADER = "name,hash";
const CSV_QUOTE_REQUIRED_PATTERN = /[",\r\n]/;

/**
 * Rows sorted by name, then by hash for identical names
 */
export function buildLookupTable(
  names: ReadonlyMap<Hash, string>,
): LookupTableRow[] {
  return Array.from(names, ([hash, name]) => ({ name, hash })).sort(
    (a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : a.hash - b.hash,
  );
}

function csvField(value: string): string {
  if (!CSV_QUOTE_REQUIRED_PATTERN.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function renderLookupCsv(rows: readonly LookupTableRow[]): string {
  const lines = [
    CSV_HEADER,
    ...rows.map((row) => `${csvField(row.name)},${row.hash}`),
  ];
  return lines.join(CSV_LINE_SEPARATOR) + CSV_LINE_SEPARATOR;
}

/**
 * Write both tables into outputDir (created if missing)
 */
export async function exportLookupTables(
  index: CatalogIndex,
  outputDir: string,
): Promise<LookupTablesResult> {
  const dir = resolve(outputDir);
  await mkdir(dir, { recursive: true });

  const weaponRows = buildLookupTable(index.weaponNames);
  const perkRows = buildLookupTable(index.perkNames);

  const weaponTablePath = join(dir, WEAPON_LOOKUP_TABLE_FILE);
  const perkTablePath = join(dir, PERK_LOOKUP_TABLE_FILE);

  await writeFile(weaponTablePath, renderLookupCsv(weaponRows), "utf-8");
  await writeFile(perkTablePath, renderLookupCsv(perkRows), "utf-8");

  logger.info("Lookup tables written", {
    weaponTablePath,
    weaponCount: weaponRows.length,
    perkTablePath,
    perkCount: perkRows.length,
  });

  return {
    weaponCount: weaponRows.length,
    perkCount: perkRows.length,
    weaponTablePath,
    perkTablePath,
  };
}
