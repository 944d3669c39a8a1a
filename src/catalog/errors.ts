/**
 * Catalog error classes
 *
 * Both are fatal: every match depends on the index being correct,
 * and there is no alternate join key to fall back on.
 */

import type { Hash } from "@/types/catalog";

/**
 * An expected category or structural field is absent from the catalog
 * (no "Weapon" category, a record without a hash, a manifest without
 * a content path, ...).
 */
export class SchemaDriftError extends Error {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Catalog schema drift at ${path}: ${message}`);
    this.name = "SchemaDriftError";
    this.path = path;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaDriftError);
    }
  }
}

export type MissingReferenceDetails = {
  /** Table the reference points into */
  table: "plugSets" | "items";
  /** Hash that could not be found */
  missingHash: Hash;
  /** Weapon whose resolution hit the missing reference */
  weaponHash?: Hash;
  /** Index of the referencing socket on that weapon */
  socketIndex?: number;
};

/**
 * A plug set or item referenced from the socket graph is absent from its table.
 *
 * Never swallowed: a partially resolved perk set looks exactly like a
 * legitimately small one.
 */
export class MissingReferenceError extends Error {
  public readonly table: MissingReferenceDetails["table"];
  public readonly missingHash: Hash;
  public readonly weaponHash?: Hash;
  public readonly socketIndex?: number;

  constructor(details: MissingReferenceDetails) {
    const origin =
      details.weaponHash !== undefined
        ? ` (weapon ${details.weaponHash}${
            details.socketIndex !== undefined
              ? `, socket ${details.socketIndex}`
              : ""
          })`
        : "";
    super(
      `Missing reference: ${details.table} has no entry ${details.missingHash}${origin}`,
    );
    this.name = "MissingReferenceError";
    this.table = details.table;
    this.missingHash = details.missingHash;
    this.weaponHash = details.weaponHash;
    this.socketIndex = details.socketIndex;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingReferenceError);
    }
  }
}
