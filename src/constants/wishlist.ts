/**
 * Wishlist output constants
 */

/**
 * Directive scheme understood by the downstream inventory manager
 */
export const WISHLIST_SCHEME = "dimwishlist";

export const DEFAULT_WISHLIST_TITLE = "Roll Grid Wishlist";

export const DEFAULT_WISHLIST_DESCRIPTION =
  "Recommended weapon rolls generated from the roll grid spreadsheet";

/**
 * Line terminator of the wishlist format
 */
export const WISHLIST_LINE_SEPARATOR = "\n";

/**
 * Lookup table file names (tables mode)
 */
export const WEAPON_LOOKUP_TABLE_FILE = "weapon_names.csv";
export const PERK_LOOKUP_TABLE_FILE = "perk_names.csv";

/**
 * Lookup table record terminator (RFC 4180)
 */
export const CSV_LINE_SEPARATOR = "\r\n";
