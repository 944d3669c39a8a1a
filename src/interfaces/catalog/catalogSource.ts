/**
 * Source of the raw manifest content blobs
 */

import type { RawCatalog } from "@/types/catalog";

export interface CatalogSource {
  /**
   * Fetch all three blobs to completion.
   * Any transport failure throws; there is no partial catalog.
   */
  fetchCatalog(): Promise<RawCatalog>;
}
