/**
 * Inventory CSV Format Detector
 *
 * Auto-detects delimiter and export flavour from the header line.
 * Supports:
 * - Marketplace stock export (cardmarketId + localized name columns)
 * - Plain stock list (name, quantity, price only)
 *
 * Exports are written with "," or ";" depending on the locale of the tool
 * that produced them; the delimiter is whichever occurs more often outside
 * quotes in the header line.
 */

export type InventoryCsvFormat = "marketplace_stock" | "plain_stock" | "unknown";

export type CsvDelimiter = "," | ";";

/**
 * Normalize header for comparison.
 * - Strips BOM (byte order mark)
 * - Trims whitespace
 * - Converts to lowercase
 */
export function normalizeHeader(h: string): string {
  return h.replace(/^\uFEFF/, "").trim().toLowerCase();
}

/**
 * Required header sets for each format.
 * Format matches if ANY set is fully present. Checked in declaration order,
 * so the richer format must come first.
 */
const FORMAT_SIGNATURES: Record<Exclude<InventoryCsvFormat, "unknown">, string[][]> = {
  marketplace_stock: [
    ["cardmarketid", "name", "quantity", "price"],
    ["name", "quantity", "price", "setcode", "cn"],
  ],
  plain_stock: [["name", "quantity", "price"]],
};

const FORMAT_ORDER: Array<Exclude<InventoryCsvFormat, "unknown">> = ["marketplace_stock", "plain_stock"];

/**
 * Columns the importer cannot do without.
 */
export const REQUIRED_HEADERS = ["name", "quantity", "price"] as const;

function firstLine(csvContent: string): string {
  return csvContent.split(/\r?\n/)[0] ?? "";
}

/**
 * Pick the delimiter for a CSV document. Defaults to "," when neither
 * candidate appears in the header line.
 */
export function detectDelimiter(csvContent: string): CsvDelimiter {
  const line = firstLine(csvContent);
  let commas = 0;
  let semicolons = 0;
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (!inQuotes && char === ",") {
      commas++;
    } else if (!inQuotes && char === ";") {
      semicolons++;
    }
  }

  return semicolons > commas ? ";" : ",";
}

/**
 * Extract headers from CSV content (first line).
 * Handles quoted fields.
 */
export function extractHeadersFromCsv(csvContent: string, delimiter: CsvDelimiter = detectDelimiter(csvContent)): string[] {
  const line = firstLine(csvContent);
  if (!line) {
    return [];
  }

  const headers: string[] = [];
  let current = "";
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      headers.push(current);
      current = "";
    } else {
      current += char;
    }
  }

  headers.push(current);

  return headers;
}

/**
 * Detect inventory format from header row.
 */
export function detectInventoryFormat(rawHeaders: string[]): InventoryCsvFormat {
  const normalizedHeaders = new Set(rawHeaders.map(normalizeHeader));

  for (const format of FORMAT_ORDER) {
    for (const requiredHeaders of FORMAT_SIGNATURES[format]) {
      if (requiredHeaders.every((h) => normalizedHeaders.has(h))) {
        return format;
      }
    }
  }

  return "unknown";
}

/**
 * Required columns absent from a header row (normalized names).
 */
export function missingRequiredHeaders(rawHeaders: string[]): string[] {
  const normalizedHeaders = new Set(rawHeaders.map(normalizeHeader));
  return REQUIRED_HEADERS.filter((h) => !normalizedHeaders.has(h));
}

/**
 * Get human-readable format name for log and CLI output.
 */
export function getFormatDisplayName(format: InventoryCsvFormat): string {
  switch (format) {
    case "marketplace_stock":
      return "Marketplace Stock Export";
    case "plain_stock":
      return "Plain Stock List";
    case "unknown":
      return "Unknown Format";
  }
}
