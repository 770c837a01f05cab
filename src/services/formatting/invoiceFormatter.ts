/**
 * Invoice view: one line per allocated pick with unit price and line total.
 *
 *   Qty | Name           | Lang    | Cond | Price    | Total
 *   ----+----------------+---------+------+----------+----------
 *     2 | Lightning Bolt | English | NM   |   1.50 € |    3.00 €
 *   ----+----------------+---------+------+----------+----------
 *   Total: 3.00 € (2 cards)
 */

import type { PickAllocation } from "../../domain/inventory.js";
import { formatPrice, renderTable, specialConditions } from "./common.js";

export interface InvoiceTotals {
  cards: number;
  amount: number;
}

export function invoiceTotals(allocations: readonly PickAllocation[]): InvoiceTotals {
  let cards = 0;
  let amount = 0;
  for (const allocation of allocations) {
    for (const line of allocation.lines) {
      cards += line.quantity;
      amount += line.listing.price * line.quantity;
    }
  }
  return { cards, amount: Math.round(amount * 100) / 100 };
}

export function formatInvoice(allocations: readonly PickAllocation[]): string {
  const rows = allocations.flatMap((allocation) =>
    allocation.lines.map((line) => {
      const { listing } = line;
      const special = specialConditions(listing);
      return [
        String(line.quantity).padStart(3),
        special ? `${listing.name} (${special})` : listing.name,
        listing.language,
        listing.condition,
        formatPrice(listing.price).padStart(8),
        formatPrice(listing.price * line.quantity).padStart(9),
      ];
    })
  );

  const table = renderTable(["Qty", "Name", "Lang", "Cond", "Price", "Total"], rows);
  const totals = invoiceTotals(allocations);
  const separator = table[1] ?? "";

  return [...table, separator, `Total: ${formatPrice(totals.amount)} (${totals.cards} cards)`].join("\n") + "\n";
}
