/**
 * Picking-list views for order fulfillment.
 *
 * formatPickingList: every matched listing grouped under its want entry, with
 * location, condition, language, foil flag, price and stocked quantity.
 * Listings sharing a location stay separate rows.
 *
 * formatPickRoute: allocated picks flattened into one table ordered by
 * storage location, for walking the shelves once.
 */

import type { InventoryListing, MatchResult, PickAllocation } from "../../domain/inventory.js";
import { compareLocations } from "../inventory/locationCode.js";
import {
  formatPrice,
  locationLabel,
  printedName,
  renderTable,
  specialConditions,
  statusLabel,
} from "./common.js";

export function formatPickingRow(listing: InventoryListing): string {
  return [
    locationLabel(listing),
    listing.condition || "?",
    listing.language || "?",
    listing.isFoil ? "Foil" : "Non-foil",
    formatPrice(listing.price),
    `qty ${listing.quantity}`,
  ].join(" | ");
}

export function formatPickingList(results: readonly MatchResult[]): string {
  const blocks = results.map((result) => {
    const lines = [`${result.want.quantity} x ${result.want.name} [${statusLabel(result.status)}]`];
    if (result.matches.length === 0) {
      lines.push("    (not in stock)");
    }
    for (const listing of result.matches) {
      lines.push(`    ${formatPickingRow(listing)}`);
    }
    return lines.join("\n");
  });

  return blocks.length > 0 ? blocks.join("\n\n") + "\n" : "";
}

export function formatPickRoute(allocations: readonly PickAllocation[]): string {
  const lines = allocations.flatMap((allocation) => allocation.lines);
  const ordered = lines
    .map((line, index) => ({ line, index }))
    .sort((a, b) => compareLocations(a.line.listing.location, b.line.listing.location) || a.index - b.index);

  const rows = ordered.map(({ line }) => {
    const { listing } = line;
    let name = printedName(listing);
    const special = specialConditions(listing);
    if (special) name = `${name} (${special})`;
    if (listing.isPlayset) name = `${name} [Playset]`;
    if (listing.comment) name = `${name} - Note: ${listing.comment}`;

    return [
      String(line.quantity),
      listing.location ?? "",
      name,
      listing.language,
      listing.condition,
      listing.collectorNumber,
      listing.setCode ? `${listing.setName} (${listing.setCode})` : listing.setName,
    ];
  });

  const table = renderTable(["Qty", "Location", "Name", "Language", "Condition", "Collector Number", "Set"], rows);
  const total = lines.reduce((sum, line) => sum + line.quantity, 0);
  const separator = table[1] ?? "";

  return [...table, separator, `Total cards picked: ${total}`].join("\n") + "\n";
}
