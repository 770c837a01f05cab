import type { InventoryListing, StockStatus } from "../../domain/inventory.js";

export const LOCATION_UNKNOWN = "location unknown";

export function formatPrice(amount: number): string {
  return `${amount.toFixed(2)} €`;
}

export function statusLabel(status: StockStatus): string {
  switch (status) {
    case "FULLY_AVAILABLE":
      return "IN STOCK";
    case "PARTIALLY_AVAILABLE":
      return "PARTIAL";
    case "NOT_IN_STOCK":
      return "NOT IN STOCK";
  }
}

/**
 * "Foil", "Signed" or both, comma separated; empty when neither.
 */
export function specialConditions(listing: InventoryListing): string {
  const flags: string[] = [];
  if (listing.isFoil) flags.push("Foil");
  if (listing.isSigned) flags.push("Signed");
  return flags.join(", ");
}

export function locationLabel(listing: InventoryListing): string {
  return listing.location ?? LOCATION_UNKNOWN;
}

/**
 * Name printed on the card: the localized name for the listing's language,
 * falling back to the English name.
 */
export function printedName(listing: InventoryListing): string {
  const byLanguage: Record<string, string> = {
    german: listing.localizedNames.de,
    spanish: listing.localizedNames.es,
    french: listing.localizedNames.fr,
    italian: listing.localizedNames.it,
  };
  const localized = byLanguage[listing.language.toLowerCase()]?.trim();
  return localized ? localized : listing.name;
}

/**
 * Render rows as a " | "-separated table padded to the widest cell per column.
 * The separator row uses "-+-" between columns.
 */
export function renderTable(header: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((row) => (row[col] ?? "").length)));
  const renderRow = (cells: readonly string[]) =>
    widths.map((w, col) => (cells[col] ?? "").padEnd(w)).join(" | ").trimEnd();
  const separator = widths.map((w) => "-".repeat(w)).join("-+-");

  return [renderRow(header), separator, ...rows.map(renderRow)];
}
