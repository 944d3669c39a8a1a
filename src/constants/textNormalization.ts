/**
 * Text normalization constants
 *
 * These patterns define the join key shared by catalog display names
 * and spreadsheet cells.
 */

/**
 * Unicode combining diacritical marks (U+0300-U+036F)
 */
export const DIACRITIC_MARKS_PATTERN = /[\u0300-\u036f]/g;

/**
 * Splits text into tokens on any run of whitespace.
 */
export const TOKEN_SEPARATOR_PATTERN = /\s+/;

/**
 * Characters removed from each token after lowercasing and diacritic folding.
 *
 * Everything outside Unicode letters and digits goes, including straight and
 * curly apostrophes. Letters with no decomposition ("ø", "ß") stay.
 * Word boundaries come from whitespace only, so a hyphen joins its halves:
 * "Hung-Jury" -> "hungjury".
 */
export const NON_ALPHANUMERIC_PATTERN = /[^\p{L}\p{N}]/gu;

/**
 * Separator used when rejoining tokens.
 */
export const TOKEN_JOINER = " ";
