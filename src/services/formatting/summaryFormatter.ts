/**
 * Summary view: one line per want entry with wanted vs. available copies and
 * its status, then a totals footer.
 *
 *   4 x Lightning Bolt: 5 available [IN STOCK]
 *   10 x Counterspell: 3 available [PARTIAL, 7 missing]
 *   1 x Shock: 0 available [NOT IN STOCK]
 */

import type { MatchResult } from "../../domain/inventory.js";
import { summarizeMatches } from "../matching/stockMatcher.js";
import { statusLabel } from "./common.js";

export function formatSummaryLine(result: MatchResult): string {
  const { want, available, status } = result;
  const detail =
    status === "PARTIALLY_AVAILABLE"
      ? `${statusLabel(status)}, ${want.quantity - available} missing`
      : statusLabel(status);
  return `${want.quantity} x ${want.name}: ${available} available [${detail}]`;
}

export function formatSummary(results: readonly MatchResult[]): string {
  if (results.length === 0) {
    return "Want-list is empty.\n";
  }

  const totals = summarizeMatches(results);
  const lines = results.map(formatSummaryLine);
  lines.push(
    "========================",
    `Copies wanted: ${totals.wanted}, available: ${totals.available}`,
    `In stock: ${totals.fullyAvailable}, partial: ${totals.partiallyAvailable}, not in stock: ${totals.notInStock}`
  );
  return lines.join("\n") + "\n";
}
