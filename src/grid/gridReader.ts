/**
 * Grid reader: turns raw sheet values into GridRow records
 *
 * The first row is the header. The weapon and perk columns are located by
 * header name, so the curator can reorder or add columns freely.
 */

import type { GridColumns, GridRow } from "@/types/grid";
import type { GridSource } from "@/interfaces/grid/gridSource";
import { GRID_HEADER_ROW } from "@/constants/grid";
import { normalizeName } from "@/utils/text/nameNormalization";
import * as logger from "@/logger";
import { GridSchemaError } from "./errors";

type ColumnPositions = Record<keyof GridColumns, number>;

const GRID_FIELDS: ReadonlyArray<keyof GridColumns> = ["weapon", "perk1", "perk2"];

/**
 * Stringify a cell value from the sheet API.
 * Sheets returns formatted strings, but numbers/booleans show up
 * for unformatted reads.
 */
function cellText(value: unknown): string {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

/**
 * Locate the configured columns in the header row.
 *
 * @throws {GridSchemaError} If any column is absent
 */
function locateColumns(
  header: unknown[] | undefined,
  columns: GridColumns,
): ColumnPositions {
  const headerKeys = (header ?? []).map((cell) => normalizeName(cellText(cell)));
  const find = (name: string): number => headerKeys.indexOf(normalizeName(name));

  const positions: ColumnPositions = {
    weapon: find(columns.weapon),
    perk1: find(columns.perk1),
    perk2: find(columns.perk2),
  };

  const missing = GRID_FIELDS
    .filter((field) => positions[field] < 0)
    .map((field) => columns[field]);
  if (missing.length > 0) {
    throw new GridSchemaError(missing);
  }

  return positions;
}

/**
 * Parse sheet values (header row first) into grid rows.
 *
 * Rows whose weapon and perk cells are all empty are skipped silently;
 * every other row is kept as typed, in sheet order, for the matcher to judge.
 *
 * @param values - 2D cell array as returned by the Sheets values API
 * @param columns - Header names of the weapon / perk 1 / perk 2 columns
 * @param headerRowNumber - Sheet row of values[0]; row numbers count from it
 * @throws {GridSchemaError} If the header lacks a configured column
 */
export function parseGridValues(
  values: readonly unknown[][],
  columns: GridColumns,
  headerRowNumber: number = GRID_HEADER_ROW,
): GridRow[] {
  const positions = locateColumns(values[0], columns);

  const rows: GridRow[] = [];
  for (let i = 1; i < values.length; i++) {
    const cells = values[i] ?? [];
    const row: GridRow = {
      rowNumber: headerRowNumber + i,
      weaponName: cellText(cells[positions.weapon]),
      perk1Name: cellText(cells[positions.perk1]),
      perk2Name: cellText(cells[positions.perk2]),
    };

    if (!row.weaponName && !row.perk1Name && !row.perk2Name) {
      continue;
    }
    rows.push(row);
  }

  return rows;
}

/**
 * Read and parse the roll grid from a source.
 *
 * @throws Whatever the source throws on a failed read, or GridSchemaError
 */
export async function readGridRows(
  source: GridSource,
  columns: GridColumns,
): Promise<GridRow[]> {
  logger.debug("Reading roll grid", { source: source.description });

  const { values, headerRowNumber } = await source.readValues();
  const rows = parseGridValues(values, columns, headerRowNumber);

  logger.info("Roll grid read complete", {
    source: source.description,
    sheetRows: Math.max(values.length - 1, 0),
    dataRows: rows.length,
  });

  return rows;
}
