/**
 * Catalog type definitions
 *
 * The catalog is the Destiny 2 manifest: three content blobs (item categories,
 * inventory items, plug sets) keyed by stringified hash.
 *
 * Two forms exist:
 * - RawCatalog: the blobs exactly as fetched (unvalidated)
 * - Parsed records + CatalogIndex: typed, hash-keyed form used for matching
 */

/**
 * Canonical identifier for every catalog entity.
 *
 * Manifest hashes are unsigned 32-bit integers. Blob keys arrive as strings
 * and are parsed into Hash at the parsing boundary; every map after that is
 * keyed by Hash.
 */
export type Hash = number;

/**
 * Raw content blobs as returned by the manifest content paths.
 */
export type RawCatalog = {
  /** DestinyItemCategoryDefinition blob */
  categories: unknown;
  /** DestinyInventoryItemDefinition blob */
  items: unknown;
  /** DestinyPlugSetDefinition blob */
  plugSets: unknown;
};

/**
 * Item category (e.g. "Weapon", "Auto Rifle").
 */
export type CategoryRecord = {
  hash: Hash;
  name: string;
};

/**
 * A socket on an item.
 *
 * Randomized sockets draw their plug from a plug set at drop time;
 * fixed sockets hold a static plug and never contribute to rolls.
 */
export type SocketEntry =
  | { kind: "randomized"; plugSetHash: Hash }
  | { kind: "fixed" };

/**
 * Inventory item (weapons, perks, and everything else in the game).
 */
export type ItemRecord = {
  hash: Hash;
  name: string;
  /** Category tags; a weapon carries the "Weapon" category hash */
  categoryHashes: Hash[];
  /** Sockets in definition order */
  sockets: SocketEntry[];
};

/**
 * Plug set: an ordered collection of interchangeable plug items.
 */
export type PlugSetRecord = {
  hash: Hash;
  reusablePlugItems: Hash[];
};

/**
 * A blob record whose key and `hash` have been checked, other fields untouched.
 *
 * Fields are read from `fields` only when index construction reaches the record.
 */
export type RawRecordEntry = {
  hash: Hash;
  /** JSON path used in SchemaDriftError (e.g. `items["100"]`) */
  path: string;
  fields: Record<string, unknown>;
};

/**
 * Read access to a hash-keyed table (a Map satisfies it).
 */
export type RecordLookup<T> = {
  get(hash: Hash): T | undefined;
};

/**
 * Weapon or perk as seen by the index.
 */
export type CatalogEntry = {
  hash: Hash;
  name: string;
};

/**
 * Two catalog entries that normalize to the same key.
 *
 * The first registered entry keeps the key; the later one is dropped
 * and recorded here so the run can report it.
 */
export type KeyCollision = {
  kind: "weapon" | "perk";
  key: string;
  keptHash: Hash;
  droppedHash: Hash;
  droppedName: string;
};

/**
 * Immutable lookup index built once per run.
 *
 * Shared read-only by the row matcher and the lookup-table export.
 */
export type CatalogIndex = {
  /** Hash of the single category named "Weapon" */
  readonly weaponCategoryHash: Hash;
  /** Normalized weapon name -> weapon hash */
  readonly weaponsByKey: ReadonlyMap<string, Hash>;
  /** Normalized perk name -> perk hash (random-roll perks only) */
  readonly perksByKey: ReadonlyMap<string, Hash>;
  /** Weapon hash -> display name (every weapon, including collided ones) */
  readonly weaponNames: ReadonlyMap<Hash, string>;
  /** Perk hash -> display name (every reachable random-roll perk) */
  readonly perkNames: ReadonlyMap<Hash, string>;
  /** Normalization collisions dropped under first-wins */
  readonly collisions: readonly KeyCollision[];
};
