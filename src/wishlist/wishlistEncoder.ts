/**
 * Wishlist encoder: renders matched rolls as wishlist directive lines
 *
 * Pure functions, no I/O.
 */

import type { GridRow, MatchedRoll } from "@/types/grid";
import type { WishlistHeader } from "@/types/wishlist";
import {
  WISHLIST_LINE_SEPARATOR,
  WISHLIST_SCHEME,
} from "@/constants/wishlist";

const LINE_BREAK_RUN_PATTERN = /[\r\n]+/g;

/**
 * Collapse every CR/LF run into a single space
 */
function toSingleLine(text: string): string {
  return text.replace(LINE_BREAK_RUN_PATTERN, " ");
}

/**
 * Encode one matched roll as a directive line
 *
 * Perk order is preserved and not deduplicated; an identical perk in
 * both columns is emitted twice.
 *
 * @example
 * encodeWishlistLine({ weaponHash: 1, perk1Hash: 10, perk2Hash: 11, row }, "PvE god roll")
 * // "dimwishlist:item=1&perks=10,11#notes: PvE god roll"
 */
export function encodeWishlistLine(
  roll: MatchedRoll,
  comment: string,
  scheme: string = WISHLIST_SCHEME,
): string {
  return `${scheme}:item=${roll.weaponHash}&perks=${roll.perk1Hash},${roll.perk2Hash}#notes: ${toSingleLine(comment)}`;
}

/**
 * Comment for a row, built from its spreadsheet text
 */
export function buildRowNote(row: GridRow): string {
  return `${row.weaponName}: ${row.perk1Name} + ${row.perk2Name}`;
}

export function renderWishlistHeader(header: WishlistHeader): string[] {
  return [
    `title:${toSingleLine(header.title)}`,
    `description:${toSingleLine(header.description)}`,
  ];
}

/**
 * Full file body: header lines, then one directive per line, trailing newline
 */
export function renderWishlist(
  header: WishlistHeader,
  lines: readonly string[],
): string {
  return (
    [...renderWishlistHeader(header), ...lines].join(WISHLIST_LINE_SEPARATOR) +
    WISHLIST_LINE_SEPARATOR
  );
}
