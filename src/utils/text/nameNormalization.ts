/**
 * Name normalization: the join key between catalog and spreadsheet
 *
 * Catalog display names and curator-typed cells drift in capitalization,
 * apostrophes and accents ("Fatebringer (Timelost)" vs "fatebringer timelost").
 * Both sides go through the same function, and lookups are exact on the result.
 */

import {
  DIACRITIC_MARKS_PATTERN,
  NON_ALPHANUMERIC_PATTERN,
  TOKEN_JOINER,
  TOKEN_SEPARATOR_PATTERN,
} from "@/constants/textNormalization";

/**
 * NFD splits "é" into "e" + U+0301; the marks are then dropped.
 * Letters without a decomposition ("ø", "ß") pass through unchanged.
 */
function foldDiacritics(text: string): string {
  return text.normalize("NFD").replace(DIACRITIC_MARKS_PATTERN, "");
}

/**
 * Canonicalizes arbitrary text into a join key.
 *
 * Steps (applied in order):
 * 1. Lowercase
 * 2. Remove diacritics (é -> e)
 * 3. Split on whitespace
 * 4. Strip every character that is not a letter or digit from each token
 * 5. Drop tokens left empty, rejoin with a single space
 *
 * Pure, total and idempotent: normalizeName(normalizeName(x)) === normalizeName(x).
 *
 * @example
 * normalizeName("The Title's Test!") // "the titles test"
 * normalizeName("  Zen   Moment ")   // "zen moment"
 * normalizeName("...")               // ""
 */
export function normalizeName(text: string): string {
  const folded = foldDiacritics(text.toLowerCase());

  const tokens: string[] = [];
  for (const rawToken of folded.split(TOKEN_SEPARATOR_PATTERN)) {
    const token = rawToken.replace(NON_ALPHANUMERIC_PATTERN, "");
    if (token.length > 0) {
      tokens.push(token);
    }
  }

  return tokens.join(TOKEN_JOINER);
}
