/**
 * E2E offline test: manifest + roll grid -> wishlist file, and lookup tables
 *
 * Real clients wired to in-process stand-ins:
 * - BungieManifestClient on the mock HTTP harness (unmocked routes throw)
 * - SheetsGridSource on a fake range reader returning the fixture grid
 *
 * Files are written to a temp directory.
 */

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { BungieManifestClient } from "@/clients/bungie";
import { SheetsGridSource } from "@/grid";
import { runLookupTables, runWishlistGeneration } from "@/orchestration/runner";
import { writeWishlistFile } from "@/wishlist";
import { DEFAULT_GRID_COLUMNS } from "@/constants";
import { createMockHttp } from "../helpers/mockHttp";
import { loadFixtureJson, loadGridValues, loadRawCatalog } from "../helpers/fixtures";

const CONTENT_BASE = "https://www.bungie.net/common/destiny2_content/json/en";

function createCatalogClient(): BungieManifestClient {
  const mock = createMockHttp();
  const raw = loadRawCatalog();
  mock.on(
    "GET",
    "https://www.bungie.net/Platform/Destiny2/Manifest/",
    loadFixtureJson("bungie/manifest.json"),
  );
  mock.on("GET", `${CONTENT_BASE}/DestinyItemCategoryDefinition-test.json`, raw.categories);
  mock.on("GET", `${CONTENT_BASE}/DestinyInventoryItemDefinition-test.json`, raw.items);
  mock.on("GET", `${CONTENT_BASE}/DestinyPlugSetDefinition-test.json`, raw.plugSets);
  return new BungieManifestClient({ apiKey: "test-api-key", httpRequest: mock.request });
}

describe("E2E: roll grid pipeline (offline)", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), "roll-grid-e2e-"));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it("writes one directive per matched row under the header", async () => {
    const gridSource = new SheetsGridSource(
      {
        readRange: async (range) => ({
          ok: true,
          data: { range, values: loadGridValues() },
        }),
      },
      "Grid!A:Z",
      "test-sheet-id",
    );

    const result = await runWishlistGeneration(
      { catalogSource: createCatalogClient(), gridSource },
      {
        columns: DEFAULT_GRID_COLUMNS,
        header: { title: "Test Wishlist", description: "Offline run" },
      },
    );
    const path = await writeWishlistFile(join(outputDir, "nested", "wishlist.txt"), result.contents);

    expect(await readFile(path, "utf-8")).toBe(
      [
        "title:Test Wishlist",
        "description:Offline run",
        "dimwishlist:item=100&perks=10,11#notes: Vex Mythoclast: Rampage + Zen Moment",
        "dimwishlist:item=101&perks=12,13#notes: fatebringer timelost: Explosive Payload + Firefly",
        "",
      ].join("\n"),
    );
    expect(result.skipped).toBe(3);
  });

  it("exports lookup tables without reading the grid", async () => {
    const result = await runLookupTables(createCatalogClient(), outputDir);

    expect(result.weaponCount).toBe(2);
    expect(result.perkCount).toBe(5);
    expect(await readFile(join(outputDir, "weapon_names.csv"), "utf-8")).toBe(
      "name,hash\r\nFatebringer (Timelost),101\r\nVex Mythoclast,100\r\n",
    );
  });
});
