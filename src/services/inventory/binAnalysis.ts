/**
 * Bin Analysis
 *
 * Counts stored cards per storage bin and reports bins with room left, so new
 * stock can be filed without overfilling a bin.
 */

import type { InventoryListing } from "../../domain/inventory.js";
import { availableQuantity } from "../matching/stockMatcher.js";
import { extractBinLocation } from "./locationCode.js";

export const DEFAULT_BIN_CAPACITY = 60;

export type BinSortOrder = "free" | "location";

export interface BinUsage {
  location: string;
  cards: number;
  freeSlots: number;
}

export interface BinAnalysisOptions {
  minFreeSlots: number;
  capacity?: number;
}

/**
 * Cards per bin, for bins with at least `minFreeSlots` free.
 * Listings without a bin-addressable location are ignored.
 * Result order is unspecified; use sortBins before rendering.
 */
export function analyzeBins(inventory: readonly InventoryListing[], options: BinAnalysisOptions): BinUsage[] {
  const capacity = options.capacity ?? DEFAULT_BIN_CAPACITY;
  const binCounts = new Map<string, number>();

  for (const listing of inventory) {
    if (!listing.location) continue;
    const bin = extractBinLocation(listing.location);
    if (!bin) continue;
    binCounts.set(bin, (binCounts.get(bin) ?? 0) + availableQuantity(listing));
  }

  const bins: BinUsage[] = [];
  for (const [location, cards] of binCounts) {
    const freeSlots = capacity - cards;
    if (freeSlots >= options.minFreeSlots) {
      bins.push({ location, cards, freeSlots });
    }
  }
  return bins;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * "free": most free slots first, then location. "location": location only.
 */
export function sortBins(bins: readonly BinUsage[], order: BinSortOrder): BinUsage[] {
  const sorted = [...bins];
  if (order === "free") {
    sorted.sort((a, b) => b.freeSlots - a.freeSlots || compareText(a.location, b.location));
  } else {
    sorted.sort((a, b) => compareText(a.location, b.location));
  }
  return sorted;
}

export function formatBinAnalysis(
  bins: readonly BinUsage[],
  order: BinSortOrder,
  capacity: number = DEFAULT_BIN_CAPACITY
): string {
  const lines = [
    `Bin Analysis (Maximum Capacity per Bin: ${capacity} cards)`,
    "-----------------------------------------------",
    "",
  ];
  for (const bin of sortBins(bins, order)) {
    lines.push(`${bin.location}: ${bin.cards} cards (${bin.freeSlots} slots free)`);
  }
  return lines.join("\n") + "\n";
}
