/**
 * Source of raw roll grid cell values
 *
 * Implementations return the sheet as a 2D array, header row first, along
 * with the sheet row the header sits on.
 * A failed read must throw: the run aborts rather than emitting a partial wishlist.
 */

import type { GridValues } from "@/types/grid";

export interface GridSource {
  /** Human-readable origin for logs (e.g. spreadsheet id + range) */
  readonly description: string;

  readValues(): Promise<GridValues>;
}
