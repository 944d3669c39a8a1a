/**
 * Unit tests for catalog index construction
 */

import { describe, it, expect } from "vitest";
import {
  buildCatalogIndex,
  buildCatalogIndexFromRecords,
  findWeaponCategoryHash,
  MissingReferenceError,
  SchemaDriftError,
} from "@/catalog";
import type { ItemRecord, SocketEntry } from "@/types";
import { loadRawCatalog } from "../helpers/fixtures";

function weapon(hash: number, name: string, plugSetHashes: number[] = []): ItemRecord {
  return {
    hash,
    name,
    categoryHashes: [1],
    sockets: plugSetHashes.map(
      (plugSetHash): SocketEntry => ({ kind: "randomized", plugSetHash }),
    ),
  };
}

function plainItem(hash: number, name: string): ItemRecord {
  return { hash, name, categoryHashes: [], sockets: [] };
}

describe("findWeaponCategoryHash", () => {
  it("returns the single category named Weapon", () => {
    expect(
      findWeaponCategoryHash([
        { hash: 2, name: "Auto Rifle" },
        { hash: 1, name: "Weapon" },
      ]),
    ).toBe(1);
  });

  it("throws SchemaDriftError when no category is named Weapon", () => {
    expect(() => findWeaponCategoryHash([{ hash: 2, name: "Auto Rifle" }])).toThrow(
      'Catalog schema drift at categories: no category named "Weapon"',
    );
  });

  it("throws SchemaDriftError when several categories are named Weapon", () => {
    expect(() =>
      findWeaponCategoryHash([
        { hash: 1, name: "Weapon" },
        { hash: 9, name: "Weapon" },
      ]),
    ).toThrow('Catalog schema drift at categories: 2 categories named "Weapon" (1, 9)');
  });

  it("matches the name exactly", () => {
    expect(() => findWeaponCategoryHash([{ hash: 1, name: "weapon" }])).toThrow(
      SchemaDriftError,
    );
  });
});

describe("buildCatalogIndex", () => {
  const index = buildCatalogIndex(loadRawCatalog());

  it("indexes weapons by normalized name", () => {
    expect(index.weaponCategoryHash).toBe(1);
    expect(index.weaponsByKey).toEqual(
      new Map([
        ["vex mythoclast", 100],
        ["fatebringer timelost", 101],
      ]),
    );
  });

  it("indexes only perks reachable through weapon randomized sockets", () => {
    expect(index.perksByKey).toEqual(
      new Map([
        ["rampage", 10],
        ["zen moment", 11],
        ["explosive payload", 12],
        ["firefly", 13],
        ["opening shot", 14],
      ]),
    );
    // fixed socket plug and armor-only plug
    expect(index.perksByKey.has("adaptive frame")).toBe(false);
    expect(index.perksByKey.has("recovery mod")).toBe(false);
  });

  it("excludes items without the Weapon category", () => {
    expect(index.weaponsByKey.has("helm of saint14")).toBe(false);
    expect(index.weaponNames.has(102)).toBe(false);
  });

  it("keeps display names by hash", () => {
    expect(index.weaponNames).toEqual(
      new Map([
        [100, "Vex Mythoclast"],
        [101, "Fatebringer (Timelost)"],
      ]),
    );
    expect(index.perkNames.get(12)).toBe("Explosive Payload");
    expect(index.perkNames.size).toBe(5);
  });

  it("records no collisions for distinct names", () => {
    expect(index.collisions).toEqual([]);
  });
});

describe("buildCatalogIndex with drift outside the reachable graph", () => {
  function catalogWith(extraItems: object, extraPlugSets: object) {
    const raw = loadRawCatalog();
    if (
      typeof raw.items !== "object" ||
      raw.items === null ||
      typeof raw.plugSets !== "object" ||
      raw.plugSets === null
    ) {
      throw new Error("fixture blobs must be objects");
    }
    return {
      categories: raw.categories,
      items: { ...raw.items, ...extraItems },
      plugSets: { ...raw.plugSets, ...extraPlugSets },
    };
  }

  it("ignores a nameless item and an empty plug set no weapon references", () => {
    const index = buildCatalogIndex(
      catalogWith(
        { "999": { hash: 999, redacted: true } },
        { "888": { hash: 888 } },
      ),
    );

    expect(index.weaponsByKey.get("vex mythoclast")).toBe(100);
    expect(index.perkNames.size).toBe(5);
  });

  it("still rejects a nameless weapon", () => {
    expect(() =>
      buildCatalogIndex(
        catalogWith({ "998": { hash: 998, itemCategoryHashes: [1] } }, {}),
      ),
    ).toThrow(
      'Catalog schema drift at items["998"].displayProperties: expected an object, got undefined',
    );
  });

  it("still rejects a referenced plug set without plug items", () => {
    expect(() =>
      buildCatalogIndex(
        catalogWith(
          {
            "997": {
              hash: 997,
              displayProperties: { name: "Hollow Roll" },
              itemCategoryHashes: [1],
              sockets: { socketEntries: [{ randomizedPlugSetHash: 887 }] },
            },
          },
          { "887": { hash: 887 } },
        ),
      ),
    ).toThrow(
      'Catalog schema drift at plugSets["887"].reusablePlugItems: expected an array, got undefined',
    );
  });

  it("still rejects malformed category tags on any item", () => {
    expect(() =>
      buildCatalogIndex(
        catalogWith({ "996": { hash: 996, itemCategoryHashes: "1" } }, {}),
      ),
    ).toThrow(SchemaDriftError);
  });
});

describe("buildCatalogIndexFromRecords", () => {
  it("keeps the first weapon on a normalized-name collision and records the other", () => {
    const index = buildCatalogIndexFromRecords({
      categories: [{ hash: 1, name: "Weapon" }],
      items: [weapon(200, "Ace of Spades"), weapon(201, "ACE OF SPADES")],
      plugSets: [],
    });

    expect(index.weaponsByKey.get("ace of spades")).toBe(200);
    expect(index.weaponNames.get(201)).toBe("ACE OF SPADES");
    expect(index.collisions).toEqual([
      {
        kind: "weapon",
        key: "ace of spades",
        keptHash: 200,
        droppedHash: 201,
        droppedName: "ACE OF SPADES",
      },
    ]);
  });

  it("keeps the first perk reached by the socket walk", () => {
    const index = buildCatalogIndexFromRecords({
      categories: [{ hash: 1, name: "Weapon" }],
      items: [plainItem(20, "Kill Clip"), plainItem(21, "kill clip"), weapon(300, "Gnawing Hunger", [801, 800])],
      plugSets: [
        { hash: 800, reusablePlugItems: [20] },
        { hash: 801, reusablePlugItems: [21] },
      ],
    });

    expect(index.perksByKey.get("kill clip")).toBe(21);
    expect(index.collisions).toEqual([
      {
        kind: "perk",
        key: "kill clip",
        keptHash: 21,
        droppedHash: 20,
        droppedName: "Kill Clip",
      },
    ]);
  });

  it("does not index names that normalize to an empty key", () => {
    const index = buildCatalogIndexFromRecords({
      categories: [{ hash: 1, name: "Weapon" }],
      items: [weapon(400, "???")],
      plugSets: [],
    });

    expect(index.weaponsByKey.size).toBe(0);
    expect(index.weaponNames.get(400)).toBe("???");
  });

  it("aborts on a dangling plug set reference", () => {
    expect(() =>
      buildCatalogIndexFromRecords({
        categories: [{ hash: 1, name: "Weapon" }],
        items: [weapon(500, "Broken", [999])],
        plugSets: [],
      }),
    ).toThrow(MissingReferenceError);
  });

  it("aborts on a plug item absent from the item table", () => {
    expect(() =>
      buildCatalogIndexFromRecords({
        categories: [{ hash: 1, name: "Weapon" }],
        items: [weapon(500, "Broken", [800])],
        plugSets: [{ hash: 800, reusablePlugItems: [77] }],
      }),
    ).toThrow("Missing reference: items has no entry 77");
  });
});
