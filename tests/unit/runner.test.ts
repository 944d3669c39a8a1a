/**
 * Unit tests for the runner (in-memory sources, spy logger)
 */

import { describe, it, expect, vi } from "vitest";
import { runWishlistGeneration } from "@/orchestration/runner";
import { DEFAULT_GRID_COLUMNS } from "@/constants";
import type { CatalogSource } from "@/interfaces";
import type { RawCatalog } from "@/types";
import { loadGridValues, loadRawCatalog } from "../helpers/fixtures";
import { InMemoryGridSource } from "../helpers/inMemoryGridSource";

const HEADER = { title: "Test Wishlist", description: "Offline run" };

function catalogSourceOf(raw: RawCatalog): CatalogSource {
  return { fetchCatalog: async () => raw };
}

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("runWishlistGeneration", () => {
  it("encodes matched rows and reports each skipped row once", async () => {
    const log = spyLogger();

    const result = await runWishlistGeneration(
      {
        catalogSource: catalogSourceOf(loadRawCatalog()),
        gridSource: new InMemoryGridSource(loadGridValues()),
      },
      { columns: DEFAULT_GRID_COLUMNS, header: HEADER, logger: log },
    );

    expect(result.contents).toBe(
      "title:Test Wishlist\n" +
        "description:Offline run\n" +
        "dimwishlist:item=100&perks=10,11#notes: Vex Mythoclast: Rampage + Zen Moment\n" +
        "dimwishlist:item=101&perks=12,13#notes: fatebringer timelost: Explosive Payload + Firefly\n",
    );
    expect(result.totalRows).toBe(5);
    expect(result.matched).toBe(2);
    expect(result.skipped).toBe(3);
    expect(result.diagnostics.map((d) => [d.rowNumber, d.field, d.value])).toEqual([
      [5, "perk2", "Unknown Perk"],
      [6, "weapon", "Gjallarhorn"],
      [7, "perk1", "Recovery Mod"],
    ]);

    expect(log.warn).toHaveBeenCalledTimes(3);
    expect(log.warn).toHaveBeenCalledWith('Row 6: weapon "Gjallarhorn" not found in catalog', {
      rowNumber: 6,
      field: "weapon",
      value: "Gjallarhorn",
    });
  });

  it("logs normalization collisions", async () => {
    const raw = loadRawCatalog();
    if (typeof raw.items !== "object" || raw.items === null) {
      throw new Error("items fixture must be an object");
    }
    const items = {
      ...raw.items,
      "103": {
        hash: 103,
        displayProperties: { name: "VEX MYTHOCLAST" },
        itemCategoryHashes: [1],
      },
    };
    const log = spyLogger();

    const result = await runWishlistGeneration(
      {
        catalogSource: catalogSourceOf({ ...raw, items }),
        gridSource: new InMemoryGridSource([["Weapon", "Perk 1", "Perk 2"]]),
      },
      { columns: DEFAULT_GRID_COLUMNS, header: HEADER, logger: log },
    );

    expect(result.collisions).toEqual([
      {
        kind: "weapon",
        key: "vex mythoclast",
        keptHash: 100,
        droppedHash: 103,
        droppedName: "VEX MYTHOCLAST",
      },
    ]);
    expect(log.warn).toHaveBeenCalledWith(
      "Catalog names collide after normalization; first entry kept",
      { count: 1 },
    );
    expect(result.contents).toBe("title:Test Wishlist\ndescription:Offline run\n");
  });

  it("aborts when the catalog cannot be fetched", async () => {
    const failing: CatalogSource = {
      fetchCatalog: async () => {
        throw new Error("HTTP 503 Service Unavailable");
      },
    };

    await expect(
      runWishlistGeneration(
        { catalogSource: failing, gridSource: new InMemoryGridSource(loadGridValues()) },
        { columns: DEFAULT_GRID_COLUMNS, header: HEADER, logger: spyLogger() },
      ),
    ).rejects.toThrow("HTTP 503 Service Unavailable");
  });
});
