/**
 * Storage location codes.
 *
 * Locations look like "A-0-1-4" (shelf letter, then numeric segments), with an
 * optional position suffix such as "-L03" or "-R". Shelves A-D are known;
 * any other shelf letter sorts first.
 */

const SHELF_RANK: Record<string, number> = { A: 1, B: 2, C: 3, D: 4 };

/**
 * Numeric sort key for a location code, position suffix ("-L0…") ignored.
 *
 * - "A-0-1-4" → [1, 0, 1, 4]
 * - "B-2-10-3-L05" → [2, 2, 10, 3]
 */
export function parseLocationCode(location: string): number[] {
  const mainPart = location.split("-L0")[0] ?? location;

  return mainPart.split("-").map((part, i) => {
    if (i === 0) {
      return SHELF_RANK[part.charAt(0) || "A"] ?? 0;
    }
    const n = parseInt(part, 10);
    return Number.isNaN(n) ? 0 : n;
  });
}

/**
 * Comparator for pick routes: parsed codes ascending, missing locations last.
 */
export function compareLocations(a: string | null, b: string | null): number {
  const locA = a?.trim() ?? "";
  const locB = b?.trim() ?? "";
  if (!locA && !locB) return 0;
  if (!locA) return 1;
  if (!locB) return -1;

  const partsA = parseLocationCode(locA);
  const partsB = parseLocationCode(locB);
  const len = Math.min(partsA.length, partsB.length);
  for (let i = 0; i < len; i++) {
    const diff = (partsA[i] ?? 0) - (partsB[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return partsA.length - partsB.length;
}

/**
 * Bin key of a location: its first four segments, the fourth numeric.
 * Returns null for locations that do not address a bin.
 *
 * - "A-0-1-4-L03" → "A-0-1-4"
 * - "A-0-1" → null
 */
export function extractBinLocation(location: string): string | null {
  const parts = location.trim().split("-");
  if (parts.length < 4) return null;
  const [shelf, row, column, bin] = parts;
  if (!bin || !/^\d+$/.test(bin)) return null;
  return `${shelf}-${row}-${column}-${bin}`;
}
