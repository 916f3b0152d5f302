/**
 * Catalog builder — joins base and loot rows into loot items
 *
 * The loot table drives the build: one item per loot row, in loot
 * row order. Base rows without a loot entry are left out.
 *
 * The build is two-phase: every loot row is resolved first and
 * unresolved ids are collected; items are returned only when all
 * of them resolved.
 */

import * as path from "path";
import type {
  BuiltCatalog,
  CatalogTableNames,
  LootItem,
  Row,
} from "@/types/catalog";
import {
  DEFAULT_BASE_TABLE_PATH,
  DEFAULT_LOOT_TABLE_PATH,
  ITEM_ID_COLUMN,
  TAG_COLUMN_CANDIDATES,
  UNRESOLVED_ID_PREVIEW_SIZE,
} from "@/constants/catalog";
import { parseTagList } from "@/utils/text/textNormalization";
import { UnresolvedReferencesError } from "./errors";

const DEFAULT_TABLE_NAMES: CatalogTableNames = {
  base: path.basename(DEFAULT_BASE_TABLE_PATH),
  loot: path.basename(DEFAULT_LOOT_TABLE_PATH),
};

/**
 * Reads a cell, treating an absent column as empty text.
 */
function cell(row: Row, column: string): string {
  return Object.hasOwn(row, column) ? (row[column] ?? "") : "";
}

/**
 * Indexes base rows by item id. Later rows replace earlier ones.
 */
export function indexBaseRows(baseRows: readonly Row[]): {
  index: Map<string, Row>;
  duplicates: number;
} {
  const index = new Map<string, Row>();
  let duplicates = 0;
  for (const row of baseRows) {
    const itemId = cell(row, ITEM_ID_COLUMN);
    if (index.has(itemId)) {
      duplicates++;
    }
    index.set(itemId, row);
  }
  return { index, duplicates };
}

/**
 * Picks the tag column for this load.
 *
 * Checks TAG_COLUMN_CANDIDATES in priority order against the columns
 * of the first base row and the first loot row combined.
 *
 * @returns The first candidate present, or null when neither table has one
 */
export function resolveTagColumn(
  baseRows: readonly Row[],
  lootRows: readonly Row[],
): string | null {
  const available = new Set<string>();
  for (const first of [baseRows[0], lootRows[0]]) {
    if (first !== undefined) {
      Object.keys(first).forEach((column) => available.add(column));
    }
  }

  for (const candidate of TAG_COLUMN_CANDIDATES) {
    if (available.has(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Reads tags for one item. The base row wins when it has the column.
 */
function readTags(
  tagColumn: string | null,
  baseRow: Row,
  lootRow: Row,
): string[] {
  if (tagColumn === null) {
    return [];
  }
  if (Object.hasOwn(baseRow, tagColumn)) {
    return parseTagList(baseRow[tagColumn]);
  }
  if (Object.hasOwn(lootRow, tagColumn)) {
    return parseTagList(lootRow[tagColumn]);
  }
  return [];
}

/**
 * Formats the unresolved-reference message with a bounded id preview.
 */
export function formatUnresolvedMessage(
  missingIds: readonly string[],
  tables: CatalogTableNames,
): string {
  const preview = missingIds.slice(0, UNRESOLVED_ID_PREVIEW_SIZE).join(", ");
  const truncated = missingIds.length > UNRESOLVED_ID_PREVIEW_SIZE ? "..." : "";
  return (
    `${tables.loot} contains item_id values that do not appear in ${tables.base}: ` +
    `${preview}${truncated}`
  );
}

/**
 * Joins validated base and loot rows into the catalog.
 *
 * Steps:
 * 1. Index base rows by item_id (last duplicate wins)
 * 2. Resolve the tag column once for the load
 * 3. Build one item per loot row; collect loot ids missing from base
 * 4. Fail if any id is missing, otherwise return items in loot order
 *
 * @param baseRows - Rows of the base table (already validated)
 * @param lootRows - Rows of the loot table (already validated)
 * @param tables - Table names used in the error message
 * @returns Items and whether tag data is available
 * @throws {UnresolvedReferencesError} If any loot id has no base row
 *
 * @example
 * const { items, hasTags } = buildCatalog(baseRows, lootRows);
 */
export function buildCatalog(
  baseRows: readonly Row[],
  lootRows: readonly Row[],
  tables: CatalogTableNames = DEFAULT_TABLE_NAMES,
): BuiltCatalog {
  const { index: baseById, duplicates } = indexBaseRows(baseRows);
  const tagColumn = resolveTagColumn(baseRows, lootRows);

  const items: LootItem[] = [];
  const missingIds: string[] = [];

  for (const lootRow of lootRows) {
    const itemId = cell(lootRow, ITEM_ID_COLUMN);
    const baseRow = baseById.get(itemId);
    if (baseRow === undefined) {
      missingIds.push(itemId);
      continue;
    }

    items.push({
      itemId,
      name: cell(baseRow, "name"),
      category: cell(baseRow, "category"),
      subtype: cell(baseRow, "subtype"),
      rarity: cell(lootRow, "rarity"),
      tags: readTags(tagColumn, baseRow, lootRow),
    });
  }

  if (missingIds.length > 0) {
    throw new UnresolvedReferencesError(
      formatUnresolvedMessage(missingIds, tables),
      missingIds,
    );
  }

  return {
    items,
    hasTags: tagColumn !== null,
    duplicateBaseIds: duplicates,
  };
}
