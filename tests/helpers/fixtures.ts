/**
 * Fixture loading helpers
 */

import { readFileSync } from "fs";
import { join } from "path";
import type { RawCatalog } from "@/types";

/**
 * Load fixture content from tests/fixtures as UTF-8 text
 *
 * @param relativePath - Path relative to tests/fixtures (e.g. "bungie/items.json")
 */
export function loadFixtureText(relativePath: string): string {
  const fullPath = join(process.cwd(), "tests", "fixtures", relativePath);
  return readFileSync(fullPath, "utf-8");
}

export function loadFixtureJson(relativePath: string): unknown {
  const data: unknown = JSON.parse(loadFixtureText(relativePath));
  return data;
}

/**
 * The three content blobs of the test catalog
 */
export function loadRawCatalog(): RawCatalog {
  return {
    categories: loadFixtureJson("bungie/categories.json"),
    items: loadFixtureJson("bungie/items.json"),
    plugSets: loadFixtureJson("bungie/plugSets.json"),
  };
}

/**
 * The roll grid sheet values (header row first)
 */
export function loadGridValues(): unknown[][] {
  const data = loadFixtureJson("grid/roll_grid.json");
  if (!Array.isArray(data) || !data.every((row) => Array.isArray(row))) {
    throw new Error("grid/roll_grid.json must be an array of rows");
  }
  return data;
}
