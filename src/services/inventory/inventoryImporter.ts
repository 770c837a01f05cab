/**
 * Inventory CSV Importer
 *
 * Parses a marketplace stock export into immutable InventoryListing values.
 *
 * Key behaviors:
 * - Delimiter ("," or ";") detected from the header line
 * - Header names matched case-insensitively, BOM stripped
 * - Rows with an empty price or quantity are skipped (not listings yet)
 * - Unparsable numeric cells default to 0 instead of failing the batch
 * - Row-level problems are reported, never thrown
 *
 * CSV Format (marketplace stock export):
 * cardmarketId,quantity,name,set,setCode,cn,condition,language,isFoil,isPlayset,isSigned,price,comment,location,nameDE,nameES,nameFR,nameIT,rarity,listedAt
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import type { Logger } from "pino";
import { z } from "zod";
import type { InventoryListing } from "../../domain/inventory.js";
import { normalizeCondition, parseLanguage } from "../../domain/language.js";
import { InventoryImportError, errorMessage } from "../../errors.js";
import { optionalText, parseFlag, parsePrice, parseQuantity } from "../parsing/fieldParsers.js";
import {
  detectDelimiter,
  detectInventoryFormat,
  extractHeadersFromCsv,
  getFormatDisplayName,
  missingRequiredHeaders,
  normalizeHeader,
  type CsvDelimiter,
  type InventoryCsvFormat,
} from "./csvFormatDetector.js";

// ============================================================================
// Types
// ============================================================================

/** One parsed CSV row keyed by normalized (lowercase) header */
export type StockCsvRow = Record<string, string | undefined>;

const rawRowsSchema = z.array(z.record(z.string(), z.string().optional()));

export interface RowError {
  /** 1-indexed line in the file, header is line 1 */
  row: number;
  error: string;
}

export interface InventoryImportResult {
  format: InventoryCsvFormat;
  delimiter: CsvDelimiter;
  listings: InventoryListing[];
  /** Data rows read from the file */
  totalRows: number;
  /** Rows that did not become listings */
  skipped: number;
  errors: RowError[];
}

// ============================================================================
// Helpers
// ============================================================================

function cell(row: StockCsvRow, column: string): string {
  return row[column]?.trim() ?? "";
}

function normalizeRowKeys(raw: Record<string, string | undefined>): StockCsvRow {
  const row: StockCsvRow = {};
  for (const [key, value] of Object.entries(raw)) {
    row[normalizeHeader(key)] = value;
  }
  return row;
}

/**
 * Build a listing from a row that passed the price/quantity pre-filter.
 */
export function toInventoryListing(row: StockCsvRow): InventoryListing {
  const rawLanguage = cell(row, "language");

  return {
    marketplaceId: cell(row, "cardmarketid"),
    name: cell(row, "name"),
    setName: cell(row, "set"),
    setCode: cell(row, "setcode"),
    collectorNumber: cell(row, "cn"),
    condition: normalizeCondition(cell(row, "condition")),
    language: parseLanguage(rawLanguage) ?? rawLanguage,
    isFoil: parseFlag(row.isfoil),
    isSigned: parseFlag(row.issigned),
    isPlayset: parseFlag(row.isplayset),
    quantity: parseQuantity(row.quantity),
    price: parsePrice(row.price),
    rarity: cell(row, "rarity"),
    location: optionalText(row.location),
    comment: optionalText(row.comment),
    localizedNames: {
      de: cell(row, "namede"),
      es: cell(row, "namees"),
      fr: cell(row, "namefr"),
      it: cell(row, "nameit"),
    },
  };
}

// ============================================================================
// Importer Class
// ============================================================================

export class InventoryImporter {
  constructor(private logger: Logger) {}

  /**
   * Import stock export CSV content.
   *
   * @param csvContent - Raw CSV string
   * @param fileName - Original filename (for logs and errors)
   * @throws InventoryImportError when the header lacks required columns or
   *   the CSV structure itself cannot be parsed
   */
  import(csvContent: string, fileName: string | null = null): InventoryImportResult {
    const delimiter = detectDelimiter(csvContent);
    const headers = extractHeadersFromCsv(csvContent, delimiter);
    const format = detectInventoryFormat(headers);

    const missing = missingRequiredHeaders(headers);
    if (missing.length > 0) {
      throw new InventoryImportError(`Inventory CSV is missing required column(s): ${missing.join(", ")}`, fileName);
    }

    let rows: StockCsvRow[];
    try {
      const parsed: unknown = parseCsv(csvContent, {
        columns: true,
        delimiter,
        bom: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
        relax_quotes: true,
      });
      rows = rawRowsSchema.parse(parsed).map(normalizeRowKeys);
    } catch (err) {
      this.logger.error({ error: errorMessage(err), fileName }, "InventoryImporter: CSV parse failed");
      throw new InventoryImportError(`CSV parse error: ${errorMessage(err)}`, fileName);
    }

    const listings: InventoryListing[] = [];
    const errors: RowError[] = [];
    let skipped = 0;

    rows.forEach((row, i) => {
      const rowNum = i + 2;

      if (!cell(row, "price") || !cell(row, "quantity")) {
        skipped++;
        return;
      }

      if (!cell(row, "name")) {
        errors.push({ row: rowNum, error: "Missing card name" });
        skipped++;
        return;
      }

      const listing = toInventoryListing(row);
      if (listing.quantity === 0 && cell(row, "quantity") !== "0") {
        this.logger.debug({ row: rowNum, quantity: row.quantity }, "InventoryImporter: unparsable quantity, using 0");
      }
      listings.push(listing);
    });

    this.logger.info(
      {
        fileName,
        format: getFormatDisplayName(format),
        delimiter,
        listings: listings.length,
        skipped,
        errors: errors.length,
      },
      "InventoryImporter: import complete"
    );

    return {
      format,
      delimiter,
      listings,
      totalRows: rows.length,
      skipped,
      errors,
    };
  }

  /**
   * Read and import a CSV file from disk.
   */
  async importFile(filePath: string): Promise<InventoryImportResult> {
    const fileName = path.basename(filePath);
    let content: string;
    try {
      content = await readFile(filePath, "utf8");
    } catch (err) {
      throw new InventoryImportError(`Cannot read inventory file ${filePath}: ${errorMessage(err)}`, fileName);
    }
    return this.import(content, fileName);
  }
}
