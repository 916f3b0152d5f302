/**
 * Catalog loading
 *
 * Reads both source tables, validates their columns and joins them
 * into the runtime catalog.
 */

import * as path from "path";
import type { BuiltCatalog, CatalogPaths } from "@/types/catalog";
import { validateRequiredColumns } from "@/utils";
import {
  REQUIRED_BASE_COLUMNS,
  REQUIRED_LOOT_COLUMNS,
} from "@/constants/catalog";
import { readTable } from "./tableReader";
import { buildCatalog } from "./builder";

/**
 * Loads the catalog from the two table paths.
 *
 * The function is fail-fast and all-or-nothing: any read, validation
 * or join error throws and no partial catalog is returned.
 *
 * Steps:
 * 1. Read base and loot tables
 * 2. Validate required columns of each
 * 3. Join into items
 *
 * @returns Items in loot-row order and the tag availability flag
 * @throws {DataUnavailableError} If a table is missing, unreadable or headerless
 * @throws {EmptyTableError} If a table has no rows
 * @throws {MissingColumnsError} If a table lacks required columns
 * @throws {UnresolvedReferencesError} If loot ids are missing from the base table
 *
 * @example
 * const catalog = loadCatalog({ basePath, lootPath });
 * console.log(`Loaded ${catalog.items.length} items`);
 */
export function loadCatalog(paths: CatalogPaths): BuiltCatalog {
  const baseRows = readTable(paths.basePath);
  const lootRows = readTable(paths.lootPath);

  validateRequiredColumns(paths.basePath, baseRows, REQUIRED_BASE_COLUMNS);
  validateRequiredColumns(paths.lootPath, lootRows, REQUIRED_LOOT_COLUMNS);

  return buildCatalog(baseRows, lootRows, {
    base: path.basename(paths.basePath),
    loot: path.basename(paths.lootPath),
  });
}
