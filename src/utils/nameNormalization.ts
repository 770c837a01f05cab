/**
 * Name Normalization Utilities
 *
 * Card-name key for comparing want-list names with inventory names.
 * Matching is exact apart from case and surrounding whitespace: no
 * punctuation stripping, no diacritics folding, no fuzzy matching.
 *
 * Examples:
 * - "Lightning Bolt" → "lightning bolt"
 * - "  Jötun Grunt " → "jötun grunt"
 * - "Fire // Ice" → "fire // ice"
 */
export function normalizeCardName(name: string): string {
  if (!name) return "";
  return name.trim().toLowerCase();
}

