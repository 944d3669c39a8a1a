/**
 * Catalog record parsing and validation
 *
 * Turns the raw manifest content blobs into typed, hash-keyed records.
 *
 * Enforced on every record:
 * - Each blob is an object keyed by stringified hash
 * - Each record is an object whose `hash` is an unsigned 32-bit integer
 *   equal to its key
 *
 * Everything else is read per record, only for the records index
 * construction reaches: category names, item category tags, weapon names and
 * sockets, perk names, and the plug items of dereferenced plug sets.
 *
 * Fail-fast: throws SchemaDriftError on the first problem, naming the
 * offending path.
 */

import type {
  CategoryRecord,
  Hash,
  CatalogEntry,
  ItemRecord,
  PlugSetRecord,
  RawRecordEntry,
  SocketEntry,
} from "@/types/catalog";
import { MAX_HASH } from "@/constants/catalog";
import { SchemaDriftError } from "@/catalog/errors";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function typeLabel(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Validates that a value is a plain object.
 */
function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new SchemaDriftError(path, `expected an object, got ${typeLabel(value)}`);
  }
  return value;
}

/**
 * Parses a manifest hash (unsigned 32-bit integer).
 */
export function parseHash(value: unknown, path: string): Hash {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < 0 ||
    value > MAX_HASH
  ) {
    throw new SchemaDriftError(
      path,
      `expected an unsigned 32-bit integer hash, got ${typeof value === "string" ? `"${value}"` : String(value)}`,
    );
  }
  return value;
}

/**
 * Parses an optional array of hashes (missing -> empty).
 */
function parseOptionalHashArray(value: unknown, path: string): Hash[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new SchemaDriftError(path, `expected an array, got ${typeLabel(value)}`);
  }
  return value.map((entry, index) => parseHash(entry, `${path}[${index}]`));
}

/**
 * Reads `hash` off a record and checks it against the blob key.
 */
function parseRecordHash(key: string, record: JsonObject, path: string): Hash {
  const hash = parseHash(record.hash, `${path}.hash`);
  if (String(hash) !== key) {
    throw new SchemaDriftError(
      `${path}.hash`,
      `record hash ${hash} does not match its key "${key}"`,
    );
  }
  return hash;
}

/**
 * Reads `displayProperties.name`.
 */
function parseDisplayName(record: JsonObject, path: string): string {
  const displayProperties = expectObject(
    record.displayProperties,
    `${path}.displayProperties`,
  );
  const name = displayProperties.name;
  if (typeof name !== "string") {
    throw new SchemaDriftError(
      `${path}.displayProperties.name`,
      `expected a string, got ${typeLabel(name)}`,
    );
  }
  return name;
}

/**
 * Reads `sockets.socketEntries` (missing -> no sockets).
 *
 * An entry with `randomizedPlugSetHash` is a randomized socket;
 * anything else is fixed.
 */
function parseSocketEntries(record: JsonObject, path: string): SocketEntry[] {
  if (record.sockets === undefined) {
    return [];
  }

  const sockets = expectObject(record.sockets, `${path}.sockets`);
  const entries = sockets.socketEntries;
  if (entries === undefined) {
    return [];
  }
  if (!Array.isArray(entries)) {
    throw new SchemaDriftError(
      `${path}.sockets.socketEntries`,
      `expected an array, got ${typeLabel(entries)}`,
    );
  }

  return entries.map((entry, index): SocketEntry => {
    const entryPath = `${path}.sockets.socketEntries[${index}]`;
    const socket = expectObject(entry, entryPath);
    if (socket.randomizedPlugSetHash === undefined) {
      return { kind: "fixed" };
    }
    return {
      kind: "randomized",
      plugSetHash: parseHash(
        socket.randomizedPlugSetHash,
        `${entryPath}.randomizedPlugSetHash`,
      ),
    };
  });
}

/**
 * Splits a blob into records keyed by hash.
 *
 * Checks only the blob shape and each record's `hash`; the remaining fields
 * stay unread in `fields`.
 *
 * @throws {SchemaDriftError} On a non-object blob or record, or a bad hash
 */
export function parseRecordEntries(
  raw: unknown,
  label: string,
): Map<Hash, RawRecordEntry> {
  const blob = expectObject(raw, label);
  const entries = new Map<Hash, RawRecordEntry>();
  for (const [key, value] of Object.entries(blob)) {
    const path = `${label}["${key}"]`;
    const fields = expectObject(value, path);
    const hash = parseRecordHash(key, fields, path);
    entries.set(hash, { hash, path, fields });
  }
  return entries;
}

/**
 * Parses the DestinyItemCategoryDefinition blob.
 *
 * Every category is read: the weapon category lookup scans all of them.
 *
 * @throws {SchemaDriftError} On any structural mismatch
 */
export function parseCategoryRecords(raw: unknown): CategoryRecord[] {
  return [...parseRecordEntries(raw, "categories").values()].map(
    ({ hash, path, fields }) => ({ hash, name: parseDisplayName(fields, path) }),
  );
}

/**
 * Reads an item's `itemCategoryHashes` (missing -> none).
 */
export function parseItemCategoryHashes(entry: RawRecordEntry): Hash[] {
  return parseOptionalHashArray(
    entry.fields.itemCategoryHashes,
    `${entry.path}.itemCategoryHashes`,
  );
}

/**
 * Reads an item's hash and display name, the form perks are indexed in.
 */
export function parseItemEntry(entry: RawRecordEntry): CatalogEntry {
  return { hash: entry.hash, name: parseDisplayName(entry.fields, entry.path) };
}

/**
 * Reads a full item record: name, category tags and sockets.
 *
 * @throws {SchemaDriftError} On any structural mismatch
 */
export function parseItemRecord(entry: RawRecordEntry): ItemRecord {
  return {
    ...parseItemEntry(entry),
    categoryHashes: parseItemCategoryHashes(entry),
    sockets: parseSocketEntries(entry.fields, entry.path),
  };
}

/**
 * Reads a plug set's `reusablePlugItems`.
 *
 * @throws {SchemaDriftError} On any structural mismatch
 */
export function parsePlugSetRecord(entry: RawRecordEntry): PlugSetRecord {
  const { hash, path, fields } = entry;
  const plugs = fields.reusablePlugItems;
  if (!Array.isArray(plugs)) {
    throw new SchemaDriftError(
      `${path}.reusablePlugItems`,
      `expected an array, got ${typeLabel(plugs)}`,
    );
  }

  const reusablePlugItems = plugs.map((plug, index) => {
    const plugPath = `${path}.reusablePlugItems[${index}]`;
    return parseHash(expectObject(plug, plugPath).plugItemHash, `${plugPath}.plugItemHash`);
  });

  return { hash, reusablePlugItems };
}
