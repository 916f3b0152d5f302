/**
 * Catalog type definitions
 *
 * The catalog is the in-memory list of loot items built by joining
 * the base table (identity and description) with the loot table
 * (rarity) on item_id.
 *
 * Two forms exist:
 * - Row: one CSV record keyed by header column name
 * - LootItem: joined, normalized item served to queries
 */

/**
 * One CSV record, column name -> raw cell text.
 *
 * Column names come from the table's header row.
 */
export type Row = Record<string, string>;

/**
 * Locations of the two source tables.
 */
export type CatalogPaths = {
  /** Base table: item_id, name, category, subtype */
  basePath: string;
  /** Loot table: item_id, rarity */
  lootPath: string;
};

/**
 * Display names of the two tables, used in join error messages.
 */
export type CatalogTableNames = {
  base: string;
  loot: string;
};

/**
 * Joined loot item.
 *
 * Immutable once built. Normalized views of category, rarity and
 * subtype are computed on demand (see utils/text).
 */
export type LootItem = {
  /** Join key shared by both tables */
  readonly itemId: string;
  readonly name: string;
  readonly category: string;
  /** Empty string when the base row has no subtype */
  readonly subtype: string;
  /** Empty string when the loot row has no rarity */
  readonly rarity: string;
  /** Lowercase trimmed tokens in parse order, duplicates kept */
  readonly tags: readonly string[];
};

/**
 * Result of a successful catalog build.
 */
export type BuiltCatalog = {
  /** Items in loot-row order */
  items: LootItem[];
  /** True when a tag column was resolved for this load */
  hasTags: boolean;
  /** Base rows replaced by a later row with the same item_id */
  duplicateBaseIds: number;
};

/**
 * Catalog store lifecycle state
 */
export type CatalogStatus = "unloaded" | "loaded" | "failed";

/**
 * Published catalog state.
 *
 * Replaced as a whole on every reload so readers never see
 * a half-built catalog.
 */
export type CatalogSnapshot = {
  readonly status: CatalogStatus;
  readonly items: readonly LootItem[];
  readonly hasTags: boolean;
  /** Load error text, null unless status is "failed" */
  readonly lastError: string | null;
};

/**
 * Reload outcome reported to callers
 */
export type ReloadResult =
  | { ok: true; itemCount: number }
  | { ok: false; error: string };
