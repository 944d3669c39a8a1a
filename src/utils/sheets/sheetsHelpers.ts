/**
 * Google Sheets helper utilities
 */

import {
  PRIVATE_KEY_BEGIN_MARKER,
  PRIVATE_KEY_END_MARKER,
} from "@/constants/clients/googleSheets";

const PRIVATE_KEY_FORMAT_HINT = `Expected format: "${PRIVATE_KEY_BEGIN_MARKER}\\n...\\n${PRIVATE_KEY_END_MARKER}\\n"`;

const A1_START_ROW_PATTERN = /^\$?[A-Za-z]*\$?(\d+)/;

function stripMatchingQuotes(value: string): string {
  if (value.length < 2) {
    return value;
  }
  const first = value[0];
  const last = value[value.length - 1];
  if ((first === '"' || first === "'") && first === last) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Normalize a service account private key read from env or config
 *
 * Accepts the shapes a key usually takes after a trip through a .env file:
 * wrapped in quotes, with literal "\n" escapes, with CRLF line endings.
 *
 * Error messages name the source but never include key content.
 *
 * @param raw - Raw key value
 * @param source - Where the value came from (env var name or config path)
 * @returns PEM key with real LF newlines
 * @throws Error if missing, empty, or lacking PEM markers
 */
export function normalizePrivateKey(
  raw: string | undefined,
  source: string,
): string {
  if (!raw) {
    throw new Error(`${source} is missing or empty. ${PRIVATE_KEY_FORMAT_HINT}`);
  }

  const key = stripMatchingQuotes(raw.trim())
    .replace(/\\r\\n/g, "\n")
    .replace(/\\n/g, "\n")
    .replace(/\r\n/g, "\n")
    .trim();

  if (!key) {
    throw new Error(
      `${source} is empty after normalization. ${PRIVATE_KEY_FORMAT_HINT}`,
    );
  }

  if (!key.includes(PRIVATE_KEY_BEGIN_MARKER) || !key.includes(PRIVATE_KEY_END_MARKER)) {
    throw new Error(
      `${source} does not contain valid PEM markers. ${PRIVATE_KEY_FORMAT_HINT}`,
    );
  }

  return key;
}

/**
 * First row number (1-based) of an A1-notation range
 *
 * "Grid!A3:C" -> 3, "'Roll Grid'!B5:D10" -> 5, "Grid!A:Z" -> 1.
 * A range without a row number starts on the first row.
 */
export function parseA1StartRow(range: string): number {
  const cells = range.slice(range.lastIndexOf("!") + 1);
  const match = A1_START_ROW_PATTERN.exec(cells);
  return match?.[1] ? Number(match[1]) : 1;
}
