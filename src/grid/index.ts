/**
 * Roll grid public API
 */

export { parseGridValues, readGridRows } from "./gridReader";
export { matchRow, matchRows } from "./rowMatcher";
export { SheetsGridSource } from "./sheetsGridSource";
export { GridSchemaError, GridSourceError } from "./errors";
