/**
 * Hash-keyed record table that parses each record on first lookup
 *
 * The item and plug-set blobs hold tens of thousands of records, of which
 * the index reaches a few hundred. Records are parsed when a lookup reaches
 * them, so drift in an unreachable record never aborts a build.
 */

import type { Hash, RawRecordEntry, RecordLookup } from "@/types/catalog";

export class LazyRecordTable<T> implements RecordLookup<T> {
  private readonly entries: ReadonlyMap<Hash, RawRecordEntry>;
  private readonly parse: (entry: RawRecordEntry) => T;
  private readonly parsed = new Map<Hash, T>();

  constructor(
    entries: ReadonlyMap<Hash, RawRecordEntry>,
    parse: (entry: RawRecordEntry) => T,
  ) {
    this.entries = entries;
    this.parse = parse;
  }

  /**
   * @throws {SchemaDriftError} If the record exists but is malformed
   */
  get(hash: Hash): T | undefined {
    const cached = this.parsed.get(hash);
    if (cached !== undefined) {
      return cached;
    }

    const entry = this.entries.get(hash);
    if (!entry) {
      return undefined;
    }

    const record = this.parse(entry);
    this.parsed.set(hash, record);
    return record;
  }
}
