/**
 * Catalog constants
 */

/**
 * Display name of the item category every weapon is tagged with.
 *
 * Index construction must find exactly one category with this name.
 */
export const WEAPON_CATEGORY_NAME = "Weapon";

/**
 * Manifest content blob names used to build the index
 */
export const CATEGORY_DEFINITION_BLOB = "DestinyItemCategoryDefinition";
export const ITEM_DEFINITION_BLOB = "DestinyInventoryItemDefinition";
export const PLUG_SET_DEFINITION_BLOB = "DestinyPlugSetDefinition";

/**
 * Largest valid manifest hash (hashes are unsigned 32-bit integers)
 */
export const MAX_HASH = 0xffffffff;
