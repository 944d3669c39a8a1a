/**
 * Catalog public API
 */

export {
  buildCatalogIndex,
  buildCatalogIndexFromRecords,
  findWeaponCategoryHash,
} from "./catalogIndex";
export type { CatalogRecords } from "./catalogIndex";
export {
  resolveWeaponPerkHashes,
  collectRandomRollPerkHashes,
  resolvePerkNames,
} from "./randomRolls";
export { LazyRecordTable } from "./recordTable";
export { SchemaDriftError, MissingReferenceError } from "./errors";
export type { MissingReferenceDetails } from "./errors";
