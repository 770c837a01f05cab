/**
 * Stock-update CSV: one row per allocated pick with the picked units negated,
 * in the stock export's column layout, so the marketplace stock tool can
 * re-import it to take the sold cards out of stock.
 */

import type { PickAllocation } from "../../domain/inventory.js";
import { unitsForCopies } from "../matching/pickAllocator.js";

export const STOCK_UPDATE_HEADER = [
  "cardmarketId",
  "quantity",
  "name",
  "set",
  "setCode",
  "cn",
  "condition",
  "language",
  "isFoil",
  "isPlayset",
  "isSigned",
  "price",
  "comment",
  "location",
  "nameDE",
  "nameES",
  "nameFR",
  "nameIT",
  "rarity",
] as const;

const toCsv = (value: string | number): string => {
  const str = String(value);
  if (/[,;"\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
};

const flag = (value: boolean): string => (value ? "1" : "");

export function formatStockUpdateCsv(allocations: readonly PickAllocation[]): string {
  const lines = [STOCK_UPDATE_HEADER.join(",")];

  for (const allocation of allocations) {
    for (const { listing, quantity } of allocation.lines) {
      const units = unitsForCopies(listing, quantity);
      const cells: Array<string | number> = [
        listing.marketplaceId,
        -units,
        listing.name,
        listing.setName,
        listing.setCode,
        listing.collectorNumber,
        listing.condition,
        listing.language,
        flag(listing.isFoil),
        flag(listing.isPlayset),
        flag(listing.isSigned),
        listing.price.toFixed(2),
        listing.comment ?? "",
        listing.location ?? "",
        listing.localizedNames.de,
        listing.localizedNames.es,
        listing.localizedNames.fr,
        listing.localizedNames.it,
        listing.rarity,
      ];
      lines.push(cells.map(toCsv).join(","));
    }
  }

  return lines.join("\n") + "\n";
}
