/**
 * Catalog validation module
 *
 * Checks that a parsed table has data rows and carries every
 * required column. Column presence is read from the first row only:
 * all rows of one table share the header.
 *
 * All missing columns are reported together, sorted.
 */

import type { Row } from "@/types/catalog";
import { EmptyTableError, MissingColumnsError } from "@/catalog/errors";

/**
 * Lists required columns absent from a row, sorted ascending.
 *
 * @param row - Row whose keys are the table's columns
 * @param required - Required column names
 */
export function findMissingColumns(
  row: Row,
  required: readonly string[],
): string[] {
  const available = new Set(Object.keys(row));
  const missing = new Set(required.filter((column) => !available.has(column)));
  return [...missing].sort();
}

/**
 * Validates that a table has rows and all required columns.
 *
 * @param table - Table name or path, used in error messages
 * @param rows - Parsed rows
 * @param required - Required column names
 * @throws {EmptyTableError} If there are no rows
 * @throws {MissingColumnsError} If any required column is absent
 *
 * @example
 * validateRequiredColumns("data/Items_loot.csv", rows, ["item_id", "rarity"]);
 */
export function validateRequiredColumns(
  table: string,
  rows: readonly Row[],
  required: readonly string[],
): void {
  const [first] = rows;
  if (first === undefined) {
    throw new EmptyTableError(table);
  }

  const missing = findMissingColumns(first, required);
  if (missing.length > 0) {
    throw new MissingColumnsError(table, missing);
  }
}
