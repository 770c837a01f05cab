/**
 * Stock matcher test suite
 *
 * Covers name matching, quantity aggregation, status classification and the
 * opt-in language restriction with localized names.
 */

import { describe, it, expect } from "vitest";
import { availableQuantity, classifyStock, match, summarizeMatches } from "../stockMatcher.js";
import type { WantEntry } from "../../../domain/inventory.js";
import { listing } from "../../../test/mocks/listingFactory.js";

const bolt2 = listing({ marketplaceId: "1", name: "Bolt", quantity: 2 });
const bolt3 = listing({ marketplaceId: "2", name: "Bolt", quantity: 3 });
const want = (quantity: number, name: string): WantEntry => ({ quantity, name });

describe("stockMatcher", () => {
  describe("match - empty inputs", () => {
    it("returns no results for an empty want-list", () => {
      expect(match([bolt2, bolt3], [])).toEqual([]);
    });

    it("marks every want NOT_IN_STOCK against an empty inventory", () => {
      const results = match([], [want(1, "Bolt"), want(4, "Shock")]);

      expect(results).toHaveLength(2);
      for (const result of results) {
        expect(result.status).toBe("NOT_IN_STOCK");
        expect(result.matches).toEqual([]);
        expect(result.available).toBe(0);
      }
    });
  });

  describe("match - aggregation and status", () => {
    it("sums quantities across listings → FULLY_AVAILABLE", () => {
      const [result] = match([bolt2, bolt3], [want(4, "Bolt")]);

      expect(result?.available).toBe(5);
      expect(result?.status).toBe("FULLY_AVAILABLE");
      expect(result?.matches).toEqual([bolt2, bolt3]);
    });

    it("summed quantity below wanted → PARTIALLY_AVAILABLE", () => {
      const [result] = match([bolt2, bolt3], [want(10, "Bolt")]);

      expect(result?.available).toBe(5);
      expect(result?.status).toBe("PARTIALLY_AVAILABLE");
    });

    it("exactly the wanted quantity → FULLY_AVAILABLE", () => {
      const [result] = match([bolt2, bolt3], [want(5, "Bolt")]);
      expect(result?.status).toBe("FULLY_AVAILABLE");
    });

    it("unknown card → NOT_IN_STOCK with no matches", () => {
      const [result] = match([bolt2, bolt3], [want(1, "Shock")]);

      expect(result?.status).toBe("NOT_IN_STOCK");
      expect(result?.matches).toEqual([]);
      expect(result?.available).toBe(0);
    });

    it("listings with zero quantity still match but add nothing", () => {
      const empty = listing({ name: "Bolt", quantity: 0 });
      const [result] = match([empty], [want(1, "Bolt")]);

      expect(result?.matches).toEqual([empty]);
      expect(result?.available).toBe(0);
      expect(result?.status).toBe("PARTIALLY_AVAILABLE");
    });

    it("keeps a reference to the originating want entry", () => {
      const entry = want(2, "Bolt");
      const [result] = match([bolt2], [entry]);
      expect(result?.want).toBe(entry);
    });
  });

  describe("match - name comparison", () => {
    it("is case-insensitive", () => {
      const stocked = listing({ name: "Lightning Bolt", quantity: 1 });
      const [result] = match([stocked], [want(1, "lightning bolt")]);

      expect(result?.matches).toEqual([stocked]);
      expect(result?.status).toBe("FULLY_AVAILABLE");
    });

    it("ignores surrounding whitespace", () => {
      const [result] = match([listing({ name: " Bolt " })], [want(1, "Bolt")]);
      expect(result?.matches).toHaveLength(1);
    });

    it("does not match partial names", () => {
      const [result] = match([listing({ name: "Lightning Bolt" })], [want(1, "Bolt")]);
      expect(result?.status).toBe("NOT_IN_STOCK");
    });

    it("does not fold diacritics", () => {
      const [result] = match([listing({ name: "Jötun Grunt" })], [want(1, "Jotun Grunt")]);
      expect(result?.status).toBe("NOT_IN_STOCK");
    });
  });

  describe("match - ordering and determinism", () => {
    it("returns one result per want in want-list order", () => {
      const wants = [want(1, "Shock"), want(1, "Bolt"), want(1, "Opt")];
      const results = match([bolt2], wants);

      expect(results.map((r) => r.want.name)).toEqual(["Shock", "Bolt", "Opt"]);
    });

    it("keeps matched listings in inventory order", () => {
      const a = listing({ marketplaceId: "a", name: "Bolt", price: 9 });
      const shock = listing({ marketplaceId: "s", name: "Shock" });
      const b = listing({ marketplaceId: "b", name: "Bolt", price: 1 });
      const c = listing({ marketplaceId: "c", name: "BOLT", price: 5 });

      const [result] = match([a, shock, b, c], [want(1, "bolt")]);
      expect(result?.matches.map((l) => l.marketplaceId)).toEqual(["a", "b", "c"]);
    });

    it("gives deep-equal output for repeated calls", () => {
      const inventory = [bolt2, bolt3, listing({ name: "Shock" })];
      const wants = [want(4, "Bolt"), want(1, "Opt")];

      expect(match(inventory, wants)).toEqual(match(inventory, wants));
    });

    it("does not mutate its inputs", () => {
      const inventory = [bolt3, bolt2];
      const wants = [want(4, "Bolt")];
      match(inventory, wants);

      expect(inventory).toEqual([bolt3, bolt2]);
      expect(wants).toEqual([want(4, "Bolt")]);
    });
  });

  describe("match - language restriction", () => {
    const english = listing({ marketplaceId: "en", name: "Bolt", language: "English", quantity: 2 });
    const german = listing({ marketplaceId: "de", name: "Bolt", language: "German", quantity: 3 });

    it("does not filter on the preferred language alone", () => {
      const [result] = match([english, german], [want(1, "Bolt")], { language: "de" });
      expect(result?.matches).toEqual([english, german]);
    });

    it("matches the localized name in the chosen language when languageOnly is set", () => {
      const [result] = match([english, german], [want(4, "blitzschlag")], { language: "de", languageOnly: true });

      expect(result?.matches).toEqual([german]);
      expect(result?.available).toBe(3);
      expect(result?.status).toBe("PARTIALLY_AVAILABLE");
    });

    it("does not match the English name when a localized name exists", () => {
      const [result] = match([english, german], [want(1, "Bolt")], { language: "de", languageOnly: true });
      expect(result?.status).toBe("NOT_IN_STOCK");
    });

    it("falls back to the English name when the localized name is empty", () => {
      const spanish = listing({ marketplaceId: "es", name: "Bolt", language: "Spanish" });
      const [result] = match([english, spanish], [want(1, "Bolt")], { language: "es", languageOnly: true });

      expect(result?.matches).toEqual([spanish]);
    });

    it("accepts listings tagged with the language code", () => {
      const tagged = listing({ name: "Bolt", language: "de" });
      const [result] = match([tagged], [want(1, "Blitzschlag")], { language: "de", languageOnly: true });

      expect(result?.matches).toEqual([tagged]);
    });

    it("falls back to English when languageOnly is set without a language", () => {
      const [result] = match([english, german], [want(1, "Bolt")], { languageOnly: true });
      expect(result?.matches).toEqual([english]);
    });
  });

  describe("classifyStock", () => {
    it("depends only on match count, available and wanted", () => {
      expect(classifyStock(0, 0, 1)).toBe("NOT_IN_STOCK");
      expect(classifyStock(1, 0, 1)).toBe("PARTIALLY_AVAILABLE");
      expect(classifyStock(2, 3, 3)).toBe("FULLY_AVAILABLE");
      expect(classifyStock(2, 7, 3)).toBe("FULLY_AVAILABLE");
    });
  });

  describe("availableQuantity", () => {
    it("treats negative or fractional quantities as zero", () => {
      expect(availableQuantity(listing({ quantity: -2 }))).toBe(0);
      expect(availableQuantity(listing({ quantity: 1.5 }))).toBe(0);
      expect(availableQuantity(listing({ quantity: 4 }))).toBe(4);
    });
  });

  describe("summarizeMatches", () => {
    it("counts statuses and caps available at the wanted quantity", () => {
      const results = match([bolt2, bolt3], [want(4, "Bolt"), want(10, "Bolt"), want(2, "Shock")]);

      expect(summarizeMatches(results)).toEqual({
        wanted: 16,
        available: 9,
        fullyAvailable: 1,
        partiallyAvailable: 1,
        notInStock: 1,
      });
    });
  });
});
