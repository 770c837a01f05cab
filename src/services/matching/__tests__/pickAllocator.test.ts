import { describe, it, expect } from "vitest";
import { allocateAll, allocatePicks, copiesInListing, unitsForCopies } from "../pickAllocator.js";
import { match } from "../stockMatcher.js";
import { listing } from "../../../test/mocks/listingFactory.js";

describe("pickAllocator", () => {
  const cheap = listing({ marketplaceId: "cheap", name: "Bolt", price: 0.5, quantity: 1 });
  const mid = listing({ marketplaceId: "mid", name: "Bolt", price: 1.0, quantity: 2 });
  const pricey = listing({ marketplaceId: "pricey", name: "Bolt", price: 3.0, quantity: 4 });

  it("takes the cheapest listings first until the want is filled", () => {
    const [result] = match([pricey, mid, cheap], [{ quantity: 3, name: "Bolt" }]);
    if (!result) throw new Error("expected a result");

    const allocation = allocatePicks(result);

    expect(allocation.lines.map((l) => [l.listing.marketplaceId, l.quantity])).toEqual([
      ["cheap", 1],
      ["mid", 2],
    ]);
    expect(allocation.picked).toBe(3);
    expect(allocation.shortfall).toBe(0);
  });

  it("takes only part of the last listing", () => {
    const [result] = match([cheap, pricey], [{ quantity: 2, name: "Bolt" }]);
    if (!result) throw new Error("expected a result");

    expect(allocatePicks(result).lines.map((l) => l.quantity)).toEqual([1, 1]);
  });

  it("keeps inventory order for equal prices", () => {
    const first = listing({ marketplaceId: "first", name: "Bolt", price: 1, quantity: 1 });
    const second = listing({ marketplaceId: "second", name: "Bolt", price: 1, quantity: 1 });
    const [result] = match([first, second], [{ quantity: 2, name: "Bolt" }]);
    if (!result) throw new Error("expected a result");

    expect(allocatePicks(result).lines.map((l) => l.listing.marketplaceId)).toEqual(["first", "second"]);
  });

  it("reports the shortfall when stock runs out", () => {
    const [result] = match([cheap, mid], [{ quantity: 5, name: "Bolt" }]);
    if (!result) throw new Error("expected a result");

    const allocation = allocatePicks(result);
    expect(allocation.picked).toBe(3);
    expect(allocation.shortfall).toBe(2);
  });

  it("allocates nothing for a card not in stock", () => {
    const [result] = match([cheap], [{ quantity: 2, name: "Shock" }]);
    if (!result) throw new Error("expected a result");

    const allocation = allocatePicks(result);
    expect(allocation.lines).toEqual([]);
    expect(allocation.shortfall).toBe(2);
  });

  it("skips listings with no copies", () => {
    const empty = listing({ marketplaceId: "empty", name: "Bolt", price: 0.1, quantity: 0 });
    const [result] = match([empty, mid], [{ quantity: 1, name: "Bolt" }]);
    if (!result) throw new Error("expected a result");

    expect(allocatePicks(result).lines.map((l) => l.listing.marketplaceId)).toEqual(["mid"]);
  });

  describe("preferred language", () => {
    const english = listing({ marketplaceId: "en", name: "Bolt", language: "English", price: 1, quantity: 2 });
    const german = listing({ marketplaceId: "de", name: "Bolt", language: "German", price: 2, quantity: 2 });

    it("picks the preferred language before cheaper listings", () => {
      const [result] = match([english, german], [{ quantity: 2, name: "Bolt" }]);
      if (!result) throw new Error("expected a result");

      const allocation = allocatePicks(result, { language: "de" });
      expect(allocation.lines.map((l) => [l.listing.marketplaceId, l.quantity])).toEqual([["de", 2]]);
    });

    it("falls back to price order for the rest", () => {
      const [result] = match([english, german], [{ quantity: 3, name: "Bolt" }]);
      if (!result) throw new Error("expected a result");

      const allocation = allocatePicks(result, { language: "de" });
      expect(allocation.lines.map((l) => [l.listing.marketplaceId, l.quantity])).toEqual([
        ["de", 2],
        ["en", 1],
      ]);
    });

    it("applies to every result in allocateAll", () => {
      const results = match([english, german], [{ quantity: 1, name: "Bolt" }, { quantity: 1, name: "Bolt" }]);

      expect(allocateAll(results, { language: "de" }).map((a) => a.lines[0]?.listing.marketplaceId)).toEqual([
        "de",
        "de",
      ]);
      expect(allocateAll(results).map((a) => a.lines[0]?.listing.marketplaceId)).toEqual(["en", "en"]);
    });
  });

  describe("playsets", () => {
    const playset = listing({ name: "Bolt", isPlayset: true, quantity: 2 });

    it("counts four copies per unit", () => {
      expect(copiesInListing(playset)).toBe(8);
    });

    it("converts picked copies back into listing units", () => {
      expect(unitsForCopies(playset, 4)).toBe(1);
      expect(unitsForCopies(playset, 5)).toBe(2);
      expect(unitsForCopies(listing({ quantity: 3 }), 3)).toBe(3);
    });
  });
});
