/**
 * Query engine — conjunctive filters over loot items
 *
 * Filters run as narrowing passes in a fixed order: rarity, category,
 * subtype, tags. All passes are conjunctive, so the order only affects
 * how much work later passes do.
 *
 * Result order is the catalog order. The input is never mutated.
 */

import type { LootItem } from "@/types/catalog";
import type { LootFilterCriteria } from "@/types/query";
import { normalizeText } from "@/utils/text/textNormalization";

type ItemPredicate = (item: LootItem) => boolean;

export function normalizedRarity(item: LootItem): string {
  return normalizeText(item.rarity);
}

export function normalizedCategory(item: LootItem): string {
  return normalizeText(item.category);
}

export function normalizedSubtype(item: LootItem): string {
  return normalizeText(item.subtype);
}

/**
 * Builds the predicate chain for the supplied criteria.
 * Absent or empty criteria contribute no predicate.
 */
export function buildPredicates(criteria: LootFilterCriteria): ItemPredicate[] {
  const predicates: ItemPredicate[] = [];

  if (criteria.rarity) {
    const rarity = normalizeText(criteria.rarity);
    predicates.push((item) => normalizedRarity(item) === rarity);
  }

  if (criteria.category) {
    const category = normalizeText(criteria.category);
    predicates.push((item) => normalizedCategory(item) === category);
  }

  if (criteria.subtype) {
    const subtype = normalizeText(criteria.subtype);
    predicates.push((item) => normalizedSubtype(item).includes(subtype));
  }

  const { tags } = criteria;
  if (tags && tags.length > 0) {
    predicates.push((item) => tags.every((tag) => item.tags.includes(tag)));
  }

  return predicates;
}

/**
 * Filters items by every supplied criterion.
 *
 * @param items - Catalog items in catalog order
 * @param criteria - Optional rarity, category, subtype and tag criteria
 * @returns New array of matching items, catalog order preserved
 *
 * @example
 * filterItems(items, { rarity: "rare", tags: ["cursed"] });
 */
export function filterItems(
  items: readonly LootItem[],
  criteria: LootFilterCriteria,
): LootItem[] {
  let filtered: LootItem[] = [...items];
  for (const predicate of buildPredicates(criteria)) {
    filtered = filtered.filter(predicate);
  }
  return filtered;
}
