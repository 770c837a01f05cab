/**
 * Stock Check Service
 *
 * Loads an inventory export and a want-list from disk, reconciles them and
 * renders the requested view. File I/O and logging live here so the matcher
 * itself stays pure.
 */

import type { Logger } from "pino";
import type { MatchOptions, MatchResult, PickAllocation } from "../domain/inventory.js";
import { InventoryImporter, type InventoryImportResult } from "./inventory/inventoryImporter.js";
import { readWantlistFile, type WantlistParseResult } from "./wantlist/wantlistParser.js";
import { match, summarizeMatches } from "./matching/stockMatcher.js";
import { allocateAll } from "./matching/pickAllocator.js";
import { formatSummary } from "./formatting/summaryFormatter.js";
import { formatPickingList, formatPickRoute } from "./formatting/pickingListFormatter.js";
import { formatInvoice } from "./formatting/invoiceFormatter.js";
import { formatStockUpdateCsv } from "./formatting/stockUpdateCsv.js";

export const OUTPUT_FORMATS = ["summary", "picking", "route", "invoice", "update-csv"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface StockCheckRequest {
  inventoryPath: string;
  wantlistPath: string;
  options?: MatchOptions;
}

export interface StockCheckReport {
  inventory: InventoryImportResult;
  wantlist: WantlistParseResult;
  results: MatchResult[];
  allocations: PickAllocation[];
}

export function renderReport(report: Pick<StockCheckReport, "results" | "allocations">, format: OutputFormat): string {
  switch (format) {
    case "summary":
      return formatSummary(report.results);
    case "picking":
      return formatPickingList(report.results);
    case "route":
      return formatPickRoute(report.allocations);
    case "invoice":
      return formatInvoice(report.allocations);
    case "update-csv":
      return formatStockUpdateCsv(report.allocations);
  }
}

export class StockCheckService {
  private readonly importer: InventoryImporter;

  constructor(private logger: Logger) {
    this.importer = new InventoryImporter(logger.child({ component: "inventory-importer" }));
  }

  async check(request: StockCheckRequest): Promise<StockCheckReport> {
    const [inventory, wantlist] = await Promise.all([
      this.importer.importFile(request.inventoryPath),
      readWantlistFile(request.wantlistPath, this.logger.child({ component: "wantlist" })),
    ]);

    const results = match(inventory.listings, wantlist.wants, request.options);
    const allocations = allocateAll(results, request.options);
    const totals = summarizeMatches(results);

    this.logger.info(
      {
        listings: inventory.listings.length,
        wants: wantlist.wants.length,
        ...totals,
      },
      "Stock check complete"
    );

    return { inventory, wantlist, results, allocations };
  }
}
