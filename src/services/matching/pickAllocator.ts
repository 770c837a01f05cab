/**
 * Pick Allocator
 *
 * Turns a match result into concrete picks: how many copies to take from
 * each matched listing so the want entry is filled as cheaply as possible.
 *
 * Allocation order:
 * 1. Listings in the preferred language first, when one is given
 * 2. Cheapest listing first
 * 3. Equal prices keep inventory order
 * 4. Stop once the wanted quantity is reached
 *
 * A playset listing holds four copies per unit of quantity.
 */

import type {
  InventoryListing,
  MatchOptions,
  MatchResult,
  PickAllocation,
  PickLine,
} from "../../domain/inventory.js";
import { isInLanguage } from "../../domain/language.js";
import { availableQuantity } from "./stockMatcher.js";

export const PLAYSET_SIZE = 4;

/**
 * Copies a listing can supply.
 */
export function copiesInListing(listing: InventoryListing): number {
  const units = availableQuantity(listing);
  return listing.isPlayset ? units * PLAYSET_SIZE : units;
}

/**
 * Listing units consumed when picking `copies` from a listing.
 */
export function unitsForCopies(listing: InventoryListing, copies: number): number {
  return listing.isPlayset ? Math.ceil(copies / PLAYSET_SIZE) : copies;
}

export function allocatePicks(result: MatchResult, options: MatchOptions = {}): PickAllocation {
  const { language } = options;
  const preference = (listing: InventoryListing): number =>
    language !== undefined && isInLanguage(listing, language) ? 0 : 1;

  const ordered = result.matches
    .map((listing, index) => ({ listing, index }))
    .sort(
      (a, b) =>
        preference(a.listing) - preference(b.listing) || a.listing.price - b.listing.price || a.index - b.index
    );

  const lines: PickLine[] = [];
  let remaining = result.want.quantity;

  for (const { listing } of ordered) {
    if (remaining <= 0) break;
    const copies = Math.min(remaining, copiesInListing(listing));
    if (copies > 0) {
      lines.push({ listing, quantity: copies });
      remaining -= copies;
    }
  }

  const picked = result.want.quantity - remaining;
  return {
    want: result.want,
    lines,
    picked,
    shortfall: remaining,
  };
}

export function allocateAll(results: readonly MatchResult[], options: MatchOptions = {}): PickAllocation[] {
  return results.map((result) => allocatePicks(result, options));
}
