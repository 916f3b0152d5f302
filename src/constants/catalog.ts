/**
 * Catalog configuration constants
 */

/**
 * Default location of the base table (identity and description columns).
 * Override with LOOT_BASE_TABLE_PATH.
 */
export const DEFAULT_BASE_TABLE_PATH = "data/Items_base.csv";

/**
 * Default location of the loot table (rarity per item).
 * Override with LOOT_TABLE_PATH.
 */
export const DEFAULT_LOOT_TABLE_PATH = "data/Items_loot.csv";

/** Shared join key column */
export const ITEM_ID_COLUMN = "item_id";

export const REQUIRED_BASE_COLUMNS: readonly string[] = [
  ITEM_ID_COLUMN,
  "name",
  "category",
  "subtype",
];

export const REQUIRED_LOOT_COLUMNS: readonly string[] = [
  ITEM_ID_COLUMN,
  "rarity",
];

/**
 * Recognized tag column names, highest priority first.
 * Only the first one present in either table is used.
 */
export const TAG_COLUMN_CANDIDATES: readonly string[] = [
  "tags",
  "tag",
  "item_tags",
];

/** Separator between tags inside a tag cell */
export const TAG_SEPARATOR = ",";

/** How many unresolved item ids are listed in the load error */
export const UNRESOLVED_ID_PREVIEW_SIZE = 5;
