/**
 * Language and condition vocabularies used by the marketplace stock export.
 */

import type { ConditionGrade, InventoryListing, LanguageCode, LanguageName } from "./inventory.js";

export const LANGUAGES: Record<LanguageCode, LanguageName> = {
  en: "English",
  de: "German",
  es: "Spanish",
  fr: "French",
  it: "Italian",
};

export const LANGUAGE_CODES: readonly LanguageCode[] = ["en", "de", "es", "fr", "it"];

export function isLanguageCode(value: string): value is LanguageCode {
  return LANGUAGE_CODES.some((code) => code === value);
}

/**
 * Resolve a language from either its code ("de") or its name ("german").
 * Returns null for anything outside the five supported languages.
 */
export function parseLanguage(value: string): LanguageName | null {
  const normalized = value.trim().toLowerCase();
  if (isLanguageCode(normalized)) {
    return LANGUAGES[normalized];
  }
  for (const name of Object.values(LANGUAGES)) {
    if (name.toLowerCase() === normalized) return name;
  }
  return null;
}

/**
 * Whether a listing is in the given language. Listings carry the full
 * language name; the code is accepted as well.
 */
export function isInLanguage(listing: InventoryListing, code: LanguageCode): boolean {
  const language = listing.language.trim().toLowerCase();
  return language === LANGUAGES[code].toLowerCase() || language === code;
}

/**
 * Card name as printed in the given language, falling back to the English
 * name when the export has no localized name.
 */
export function nameInLanguage(listing: InventoryListing, code: LanguageCode): string {
  if (code === "en") return listing.name;
  const localized = listing.localizedNames[code].trim();
  return localized ? localized : listing.name;
}

const CONDITION_ALIASES: Record<string, ConditionGrade> = {
  mt: "MT",
  mint: "MT",
  nm: "NM",
  "near mint": "NM",
  ex: "EX",
  excellent: "EX",
  gd: "GD",
  good: "GD",
  lp: "LP",
  "light played": "LP",
  "lightly played": "LP",
  pl: "PL",
  played: "PL",
  po: "PO",
  poor: "PO",
};

/**
 * Map a condition string onto a grade, keeping unknown strings verbatim.
 */
export function normalizeCondition(value: string): string {
  const trimmed = value.trim();
  return CONDITION_ALIASES[trimmed.toLowerCase()] ?? trimmed;
}
