/**
 * Wishlist output type definitions
 */

import type { Hash } from "./catalog";

/**
 * The two fixed header lines of a wishlist file.
 */
export type WishlistHeader = {
  title: string;
  description: string;
};

/**
 * One row of a name/hash lookup table.
 */
export type LookupTableRow = {
  name: string;
  hash: Hash;
};
