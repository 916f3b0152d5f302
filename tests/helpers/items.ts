/**
 * Item and row builders for unit tests
 */

import type { CatalogSnapshot, LootItem, Row } from "@/types";

/**
 * Helper: Create a LootItem with defaults
 */
export function createTestItem(overrides: Partial<LootItem> = {}): LootItem {
  return {
    itemId: "1",
    name: "Test Item",
    category: "Armor",
    subtype: "",
    rarity: "Common",
    tags: [],
    ...overrides,
  };
}

/**
 * Helper: Create a loaded snapshot over the given items
 */
export function createLoadedSnapshot(
  items: LootItem[],
  hasTags = true,
): CatalogSnapshot {
  return { status: "loaded", items, hasTags, lastError: null };
}

/**
 * Helper: Create rows from a header and value tuples
 */
export function rows(header: string[], ...values: string[][]): Row[] {
  return values.map((cells) =>
    Object.fromEntries(header.map((column, i) => [column, cells[i] ?? ""])),
  );
}
