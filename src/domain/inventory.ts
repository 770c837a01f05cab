/**
 * Inventory domain types
 *
 * Listings come from the marketplace stock export (one row per sellable
 * variant). Want entries come from a deck-style want-list ("4 Lightning Bolt").
 * Both are immutable once parsed; the matcher only reads them.
 */

export type LanguageName = "English" | "German" | "Spanish" | "French" | "Italian";

export type LanguageCode = "en" | "de" | "es" | "fr" | "it";

/**
 * Marketplace condition grades, best to worst.
 */
export type ConditionGrade = "MT" | "NM" | "EX" | "GD" | "LP" | "PL" | "PO";

export interface LocalizedNames {
  de: string;
  es: string;
  fr: string;
  it: string;
}

export interface InventoryListing {
  /** Marketplace product id, empty when the export has none */
  readonly marketplaceId: string;

  /** English card name, the matching key */
  readonly name: string;

  readonly setName: string;
  readonly setCode: string;
  readonly collectorNumber: string;

  /** Usually a ConditionGrade; other strings from the export are kept verbatim */
  readonly condition: string;

  /** Usually a LanguageName; other strings from the export are kept verbatim */
  readonly language: string;

  readonly isFoil: boolean;
  readonly isSigned: boolean;

  /** Quantity counts sets of four copies */
  readonly isPlayset: boolean;

  /** Sanitized, always a non-negative integer */
  readonly quantity: number;

  /** Unit price, 0 when unparsable */
  readonly price: number;

  readonly rarity: string;

  /** Storage location code (e.g. "A-0-1-4"), null when not stored */
  readonly location: string | null;

  readonly comment: string | null;

  readonly localizedNames: Readonly<LocalizedNames>;
}

export interface WantEntry {
  /** Positive integer */
  readonly quantity: number;
  readonly name: string;
}

export type StockStatus = "FULLY_AVAILABLE" | "PARTIALLY_AVAILABLE" | "NOT_IN_STOCK";

export interface MatchResult {
  readonly want: WantEntry;

  /** Matched listings in inventory order */
  readonly matches: readonly InventoryListing[];

  /** Sum of matched listing quantities */
  readonly available: number;

  readonly status: StockStatus;
}

export interface MatchOptions {
  /** Preferred language: picked first, and the only one matched when languageOnly is set */
  language?: LanguageCode;
  languageOnly?: boolean;
}

/**
 * Copies taken from one listing to fill a want entry.
 */
export interface PickLine {
  readonly listing: InventoryListing;
  readonly quantity: number;
}

export interface PickAllocation {
  readonly want: WantEntry;
  readonly lines: readonly PickLine[];

  /** Copies allocated across all lines */
  readonly picked: number;

  /** Copies still missing after allocation */
  readonly shortfall: number;
}
