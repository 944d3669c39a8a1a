/**
 * Unit tests for wishlist directive encoding
 */

import { describe, it, expect } from "vitest";
import {
  buildRowNote,
  encodeWishlistLine,
  renderWishlist,
  renderWishlistHeader,
} from "@/wishlist";
import type { GridRow, MatchedRoll } from "@/types";

const row: GridRow = {
  rowNumber: 2,
  weaponName: "Vex Mythoclast",
  perk1Name: "Rampage",
  perk2Name: "Zen Moment",
};

function roll(weaponHash: number, perk1Hash: number, perk2Hash: number): MatchedRoll {
  return { weaponHash, perk1Hash, perk2Hash, row };
}

describe("encodeWishlistLine", () => {
  it("encodes hashes as decimal integers in perk order", () => {
    expect(encodeWishlistLine(roll(1, 10, 11), "PvE god roll")).toBe(
      "dimwishlist:item=1&perks=10,11#notes: PvE god roll",
    );
  });

  it("does not deduplicate perks", () => {
    expect(encodeWishlistLine(roll(1, 10, 10), "double")).toBe(
      "dimwishlist:item=1&perks=10,10#notes: double",
    );
  });

  it("handles hashes at the top of the 32-bit range", () => {
    expect(encodeWishlistLine(roll(4294967295, 3, 2), "max")).toBe(
      "dimwishlist:item=4294967295&perks=3,2#notes: max",
    );
  });

  it("replaces each line break run in the comment with one space", () => {
    expect(encodeWishlistLine(roll(1, 10, 11), "line one\r\nline two\n\nthree")).toBe(
      "dimwishlist:item=1&perks=10,11#notes: line one line two three",
    );
  });

  it("accepts another scheme", () => {
    expect(encodeWishlistLine(roll(1, 10, 11), "note", "otherwishlist")).toBe(
      "otherwishlist:item=1&perks=10,11#notes: note",
    );
  });
});

describe("buildRowNote", () => {
  it("joins the row's names", () => {
    expect(buildRowNote(row)).toBe("Vex Mythoclast: Rampage + Zen Moment");
  });
});

describe("renderWishlist", () => {
  const header = { title: "Test Wishlist", description: "Offline run" };

  it("renders the header lines", () => {
    expect(renderWishlistHeader(header)).toEqual([
      "title:Test Wishlist",
      "description:Offline run",
    ]);
  });

  it("keeps header values on one line", () => {
    expect(renderWishlistHeader({ title: "Two\nLines", description: "x" })[0]).toBe(
      "title:Two Lines",
    );
  });

  it("joins header and directives with a trailing newline", () => {
    expect(renderWishlist(header, ["a", "b"])).toBe(
      "title:Test Wishlist\ndescription:Offline run\na\nb\n",
    );
  });

  it("renders only the header when nothing matched", () => {
    expect(renderWishlist(header, [])).toBe("title:Test Wishlist\ndescription:Offline run\n");
  });
});
