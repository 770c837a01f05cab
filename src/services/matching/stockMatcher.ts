/**
 * Stock Matcher
 *
 * Reconciles a want-list against an inventory snapshot. For every want entry
 * it collects the listings carrying the same card name, sums their
 * quantities and classifies availability.
 *
 * Decision per want entry:
 * 1. Keep listings whose name equals the want name (case-insensitive,
 *    surrounding whitespace ignored), in inventory order. With languageOnly,
 *    only listings in that language, compared by their localized name
 * 2. No listings → NOT_IN_STOCK
 * 3. Sum of quantities ≥ wanted → FULLY_AVAILABLE
 * 4. Otherwise → PARTIALLY_AVAILABLE
 *
 * Pure and synchronous: inputs are never mutated and the same inputs always
 * produce the same output in the same order.
 */

import type {
  InventoryListing,
  MatchOptions,
  MatchResult,
  StockStatus,
  WantEntry,
} from "../../domain/inventory.js";
import { isInLanguage, nameInLanguage } from "../../domain/language.js";
import { normalizeCardName } from "../../utils/nameNormalization.js";

/**
 * Status for a summed quantity against the wanted quantity.
 */
export function classifyStock(matchCount: number, available: number, wanted: number): StockStatus {
  if (matchCount === 0) return "NOT_IN_STOCK";
  return available >= wanted ? "FULLY_AVAILABLE" : "PARTIALLY_AVAILABLE";
}

/**
 * Quantity a listing contributes. The importer already sanitizes quantities;
 * this guards listings built elsewhere.
 */
export function availableQuantity(listing: InventoryListing): number {
  const qty = listing.quantity;
  return Number.isInteger(qty) && qty > 0 ? qty : 0;
}

/**
 * Predicate for listings matching a normalized want name. With languageOnly
 * the listing must be in the chosen language (English when none is given)
 * and the want name is compared against the name printed in that language.
 */
function listingMatcher(key: string, options: MatchOptions): (listing: InventoryListing) => boolean {
  if (!options.languageOnly) {
    return (listing) => normalizeCardName(listing.name) === key;
  }
  const code = options.language ?? "en";
  return (listing) => isInLanguage(listing, code) && normalizeCardName(nameInLanguage(listing, code)) === key;
}

/**
 * Match every want entry against the inventory.
 *
 * @param inventory - Inventory snapshot, in file order
 * @param wants - Want entries, in want-list order
 * @param options - Optional language restriction (off by default); the
 *   preferred language alone does not change which listings match
 * @returns One result per want entry, in want-list order
 *
 * @example
 * ```ts
 * const [result] = match(
 *   [bolt({ quantity: 2 }), bolt({ quantity: 3 })],
 *   [{ quantity: 4, name: "bolt" }],
 * );
 * // => { available: 5, status: "FULLY_AVAILABLE", matches: [ ...2 listings ] }
 * ```
 */
export function match(
  inventory: readonly InventoryListing[],
  wants: readonly WantEntry[],
  options: MatchOptions = {}
): MatchResult[] {
  return wants.map((want) => {
    const matches = inventory.filter(listingMatcher(normalizeCardName(want.name), options));
    const available = matches.reduce((sum, listing) => sum + availableQuantity(listing), 0);

    return {
      want,
      matches,
      available,
      status: classifyStock(matches.length, available, want.quantity),
    };
  });
}

export interface MatchTotals {
  wanted: number;
  available: number;
  fullyAvailable: number;
  partiallyAvailable: number;
  notInStock: number;
}

/**
 * Aggregate counts across a reconciliation, for summary footers and logs.
 * `available` counts at most the wanted copies per entry.
 */
export function summarizeMatches(results: readonly MatchResult[]): MatchTotals {
  const totals: MatchTotals = {
    wanted: 0,
    available: 0,
    fullyAvailable: 0,
    partiallyAvailable: 0,
    notInStock: 0,
  };

  for (const result of results) {
    totals.wanted += result.want.quantity;
    totals.available += Math.min(result.available, result.want.quantity);
    switch (result.status) {
      case "FULLY_AVAILABLE":
        totals.fullyAvailable++;
        break;
      case "PARTIALLY_AVAILABLE":
        totals.partiallyAvailable++;
        break;
      case "NOT_IN_STOCK":
        totals.notInStock++;
        break;
    }
  }

  return totals;
}
