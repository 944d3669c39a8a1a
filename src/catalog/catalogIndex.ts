/**
 * Catalog index construction
 *
 * Builds the immutable name -> hash lookups the row matcher joins against.
 *
 * Steps:
 * 1. Find the one category named "Weapon"
 * 2. Keep items tagged with that category: these are the weapons
 * 3. Index weapons by normalized display name
 * 4. Resolve every reachable random-roll perk and index those by name
 *
 * From raw blobs, only the records these steps reach are fully parsed.
 */

import type {
  CatalogEntry,
  CatalogIndex,
  CategoryRecord,
  Hash,
  ItemRecord,
  KeyCollision,
  PlugSetRecord,
  RawCatalog,
  RecordLookup,
} from "@/types/catalog";
import { WEAPON_CATEGORY_NAME } from "@/constants/catalog";
import {
  parseCategoryRecords,
  parseItemCategoryHashes,
  parseItemEntry,
  parseItemRecord,
  parsePlugSetRecord,
  parseRecordEntries,
} from "@/utils/catalogValidation";
import { normalizeName } from "@/utils/text/nameNormalization";
import { SchemaDriftError } from "./errors";
import { collectRandomRollPerkHashes, resolvePerkNames } from "./randomRolls";
import { LazyRecordTable } from "./recordTable";

/**
 * Parsed catalog records, the input of index construction
 */
export type CatalogRecords = {
  categories: readonly CategoryRecord[];
  items: readonly ItemRecord[];
  plugSets: readonly PlugSetRecord[];
};

/**
 * Finds the hash of the category named "Weapon".
 *
 * Scans every category; exactly one must carry the name.
 *
 * @throws {SchemaDriftError} If no category or more than one category has the name
 */
export function findWeaponCategoryHash(
  categories: readonly CategoryRecord[],
): Hash {
  const matches = categories.filter(
    (category) => category.name === WEAPON_CATEGORY_NAME,
  );

  if (matches.length === 0) {
    throw new SchemaDriftError(
      "categories",
      `no category named "${WEAPON_CATEGORY_NAME}"`,
    );
  }
  if (matches.length > 1) {
    throw new SchemaDriftError(
      "categories",
      `${matches.length} categories named "${WEAPON_CATEGORY_NAME}" (${matches
        .map((category) => category.hash)
        .join(", ")})`,
    );
  }

  return matches[0].hash;
}

/**
 * Indexes entries by normalized name, first registered wins.
 *
 * Entries normalizing to "" are not indexed (a blank cell must never match).
 * Later entries colliding on a key are appended to `collisions`.
 */
function indexByKey(
  entries: readonly CatalogEntry[],
  kind: KeyCollision["kind"],
  collisions: KeyCollision[],
): Map<string, Hash> {
  const byKey = new Map<string, Hash>();

  for (const entry of entries) {
    const key = normalizeName(entry.name);
    if (key.length === 0) {
      continue;
    }

    const keptHash = byKey.get(key);
    if (keptHash === undefined) {
      byKey.set(key, entry.hash);
      continue;
    }

    if (keptHash !== entry.hash) {
      collisions.push({
        kind,
        key,
        keptHash,
        droppedHash: entry.hash,
        droppedName: entry.name,
      });
    }
  }

  return byKey;
}

function assembleIndex(
  weaponCategoryHash: Hash,
  weapons: readonly ItemRecord[],
  items: RecordLookup<CatalogEntry>,
  plugSets: RecordLookup<PlugSetRecord>,
): CatalogIndex {
  const perks = resolvePerkNames(
    collectRandomRollPerkHashes(weapons, plugSets),
    items,
  );

  const collisions: KeyCollision[] = [];
  const weaponsByKey = indexByKey(weapons, "weapon", collisions);
  const perksByKey = indexByKey(perks, "perk", collisions);

  return {
    weaponCategoryHash,
    weaponsByKey,
    perksByKey,
    weaponNames: new Map(weapons.map((weapon) => [weapon.hash, weapon.name])),
    perkNames: new Map(perks.map((perk) => [perk.hash, perk.name])),
    collisions,
  };
}

/**
 * Builds the index from already parsed records.
 *
 * @throws {SchemaDriftError} If the weapon category cannot be determined
 * @throws {MissingReferenceError} If the socket graph references a missing plug set or item
 */
export function buildCatalogIndexFromRecords(
  records: CatalogRecords,
): CatalogIndex {
  const weaponCategoryHash = findWeaponCategoryHash(records.categories);

  const weapons = records.items.filter((item) =>
    item.categoryHashes.includes(weaponCategoryHash),
  );

  return assembleIndex(
    weaponCategoryHash,
    weapons,
    new Map<Hash, ItemRecord>(records.items.map((item) => [item.hash, item])),
    new Map<Hash, PlugSetRecord>(
      records.plugSets.map((plugSet) => [plugSet.hash, plugSet]),
    ),
  );
}

/**
 * Builds the index from the raw manifest blobs.
 *
 * This is the main entry point for index construction. Fail-fast: any
 * catalog error aborts, because every later match depends on the index.
 * Every record's hash and every item's category tags are checked up front;
 * names, sockets and plug items only on weapons, resolved perks and the plug
 * sets their sockets reference.
 *
 * @throws {SchemaDriftError} On malformed reachable records or an undeterminable weapon category
 * @throws {MissingReferenceError} On dangling plug set / item references
 *
 * @example
 * const index = buildCatalogIndex(await catalogSource.fetchCatalog());
 * index.weaponsByKey.get(normalizeName("Vex Mythoclast"));
 */
export function buildCatalogIndex(raw: RawCatalog): CatalogIndex {
  const weaponCategoryHash = findWeaponCategoryHash(
    parseCategoryRecords(raw.categories),
  );

  const itemEntries = parseRecordEntries(raw.items, "items");
  const plugSetEntries = parseRecordEntries(raw.plugSets, "plugSets");

  const weapons = [...itemEntries.values()]
    .filter((entry) =>
      parseItemCategoryHashes(entry).includes(weaponCategoryHash),
    )
    .map(parseItemRecord);

  return assembleIndex(
    weaponCategoryHash,
    weapons,
    new LazyRecordTable(itemEntries, parseItemEntry),
    new LazyRecordTable(plugSetEntries, parsePlugSetRecord),
  );
}
