/**
 * Tabular reader — CSV file with a header row to Row[]
 *
 * The header row supplies column names. Rows keep file order;
 * blank lines are skipped and cells are not trimmed.
 */

import * as fs from "fs";
import { parse as parseCsv } from "csv-parse/sync";
import type { Row } from "@/types/catalog";
import { DataUnavailableError } from "./errors";

const BOM = "\uFEFF";

/**
 * Keys a record by the header. Cells missing from a short record are
 * empty text; cells beyond the header are dropped.
 */
function toRow(header: readonly string[], record: readonly string[]): Row {
  return Object.fromEntries(
    header.map((column, index) => [column, record[index] ?? ""]),
  );
}

/**
 * Parses CSV text into rows keyed by header column.
 *
 * Every row carries every header column, whatever its field count.
 * Whitespace-only content counts as having no header.
 *
 * @param content - CSV text, optionally starting with a UTF-8 BOM
 * @param source - Table path or name, used in error messages
 * @returns Rows in file order (empty when only a header is present)
 * @throws {DataUnavailableError} If there is no header row or the CSV is malformed
 */
export function parseTable(content: string, source: string): Row[] {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;

  if (text.trim().length === 0) {
    throw new DataUnavailableError(
      `CSV file has no header row: ${source}`,
      source,
    );
  }

  let records: string[][];
  try {
    records = parseCsv(text, {
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataUnavailableError(
      `CSV file could not be parsed: ${source} (${reason})`,
      source,
    );
  }

  const [header, ...body] = records;
  if (header === undefined) {
    throw new DataUnavailableError(
      `CSV file has no header row: ${source}`,
      source,
    );
  }
  return body.map((record) => toRow(header, record));
}

/**
 * Reads and parses a CSV table from disk.
 *
 * @param filePath - Path to the CSV file
 * @throws {DataUnavailableError} If the file is missing, unreadable or has no header
 */
export function readTable(filePath: string): Row[] {
  if (!fs.existsSync(filePath)) {
    throw new DataUnavailableError(
      `Missing required file: ${filePath}`,
      filePath,
    );
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataUnavailableError(
      `Could not read file: ${filePath} (${reason})`,
      filePath,
    );
  }

  return parseTable(content, filePath);
}
