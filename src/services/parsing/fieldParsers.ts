/**
 * Field Parsers
 *
 * Parse-or-default adapters for the raw string fields of the stock export.
 * Every function here is total: a value that cannot be parsed becomes a safe
 * default instead of an error, so a single bad cell never aborts an import.
 */

/**
 * Parse a decimal written with either "." or "," as separator.
 *
 * - "1.50" → 1.5
 * - "1,50" → 1.5
 * - "1.234,50" → 1234.5 (last separator is the decimal one)
 * - "" / "abc" → null
 */
export function parseLocaleDecimal(value: string | null | undefined): number | null {
  if (!value) return null;
  let cleaned = value.trim().replace(/\s|€|\$/g, "");
  if (!cleaned) return null;

  const lastComma = cleaned.lastIndexOf(",");
  const lastDot = cleaned.lastIndexOf(".");
  if (lastComma > lastDot) {
    cleaned = cleaned.replace(/\./g, "").replace(",", ".");
  } else if (lastDot > lastComma && lastComma !== -1) {
    cleaned = cleaned.replace(/,/g, "");
  }

  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Price in the listing currency; unparsable or negative prices become 0.
 */
export function parsePrice(value: string | null | undefined): number {
  const parsed = parseLocaleDecimal(value);
  return parsed !== null && parsed >= 0 ? parsed : 0;
}

/**
 * Non-negative integer quantity; anything else becomes 0.
 * Accepts "3", " 3 ", "3,0" and "3.0".
 */
export function parseQuantity(value: string | null | undefined): number {
  const parsed = parseLocaleDecimal(value);
  if (parsed === null || parsed < 0 || !Number.isInteger(parsed)) {
    return 0;
  }
  return parsed;
}

/**
 * Export flags are "1"/"0", "true"/"false" or empty.
 */
export function parseFlag(value: string | null | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "x";
}

/**
 * Trimmed string, or null when empty.
 */
export function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
