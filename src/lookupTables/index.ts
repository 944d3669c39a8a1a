/**
 * Lookup tables public API
 */

export {
  buildLookupTable,
  renderLookupCsv,
  exportLookupTables,
} from "./exportLookupTables";
