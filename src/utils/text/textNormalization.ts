/**
 * Text normalization for catalog fields and filters
 *
 * Comparison is case-insensitive and ignores surrounding whitespace.
 * No diacritic folding, no fuzzy matching.
 */

import { TAG_SEPARATOR } from "@/constants/catalog";

/**
 * Normalizes a field or filter value for comparison.
 *
 * @example
 * normalizeText("  Very Rare ") // "very rare"
 */
export function normalizeText(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Splits a comma-separated tag string into normalized tokens.
 *
 * Empty tokens are dropped; duplicates and order are kept.
 *
 * @example
 * parseTagList(" Cursed, ,FIRE,cursed") // ["cursed", "fire", "cursed"]
 */
export function parseTagList(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(TAG_SEPARATOR)
    .map(normalizeText)
    .filter((tag) => tag.length > 0);
}
