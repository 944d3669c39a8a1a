/**
 * Row matcher
 *
 * Joins roll grid rows against the catalog index. Each row is matched on its
 * own: a lookup miss discards that row (with one diagnostic) and matching
 * moves on to the next. A row with one valid and one invalid perk produces
 * no output at all.
 */

import type { CatalogIndex, Hash } from "@/types/catalog";
import type {
  GridField,
  GridRow,
  RowDiagnostic,
  RowMatchOutcome,
} from "@/types/grid";
import { normalizeName } from "@/utils/text/nameNormalization";

const FIELD_LABELS: Record<GridField, string> = {
  weapon: "weapon",
  perk1: "perk 1",
  perk2: "perk 2",
};

function missDiagnostic(
  row: GridRow,
  field: GridField,
  value: string,
): RowDiagnostic {
  return {
    rowNumber: row.rowNumber,
    field,
    value,
    message: `Row ${row.rowNumber}: ${FIELD_LABELS[field]} "${value}" not found in catalog`,
  };
}

/**
 * Matches a single row.
 *
 * Fields are looked up in order weapon, perk 1, perk 2; the first miss
 * decides the diagnostic.
 */
export function matchRow(row: GridRow, index: CatalogIndex): RowMatchOutcome {
  const weaponHash = index.weaponsByKey.get(normalizeName(row.weaponName));
  if (weaponHash === undefined) {
    return { ok: false, diagnostic: missDiagnostic(row, "weapon", row.weaponName) };
  }

  const perk1Hash = lookupPerk(index, row.perk1Name);
  if (perk1Hash === undefined) {
    return { ok: false, diagnostic: missDiagnostic(row, "perk1", row.perk1Name) };
  }

  const perk2Hash = lookupPerk(index, row.perk2Name);
  if (perk2Hash === undefined) {
    return { ok: false, diagnostic: missDiagnostic(row, "perk2", row.perk2Name) };
  }

  return {
    ok: true,
    roll: { weaponHash, perk1Hash, perk2Hash, row },
  };
}

function lookupPerk(index: CatalogIndex, name: string): Hash | undefined {
  return index.perksByKey.get(normalizeName(name));
}

/**
 * Matches rows strictly in input order.
 *
 * Returns a single-pass generator: outcomes are produced lazily and the
 * sequence cannot be restarted. Iterate it once in the caller.
 *
 * @example
 * for (const outcome of matchRows(rows, index)) {
 *   if (outcome.ok) lines.push(encodeWishlistLine(outcome.roll, buildRowNote(outcome.roll.row)));
 *   else logger.warn(outcome.diagnostic.message);
 * }
 */
export function* matchRows(
  rows: Iterable<GridRow>,
  index: CatalogIndex,
): Generator<RowMatchOutcome, void, undefined> {
  for (const row of rows) {
    yield matchRow(row, index);
  }
}
