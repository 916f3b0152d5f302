/**
 * Catalog load errors
 *
 * Every failure while reading, validating or joining the source
 * tables is a LootDataError. CatalogStore.reload catches exactly
 * this family and turns it into the stored load error.
 */

/**
 * Base class for catalog load failures
 */
export class LootDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LootDataError";
  }
}

/**
 * Source table is missing, unreadable, malformed or has no header row.
 */
export class DataUnavailableError extends LootDataError {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "DataUnavailableError";
    this.path = path;
  }
}

/**
 * Source table has a header but no data rows.
 */
export class EmptyTableError extends LootDataError {
  public readonly table: string;

  constructor(table: string) {
    super(`CSV file is empty: ${table}`);
    this.name = "EmptyTableError";
    this.table = table;
  }
}

/**
 * Source table lacks required columns.
 */
export class MissingColumnsError extends LootDataError {
  public readonly table: string;
  /** Sorted ascending */
  public readonly missingColumns: string[];

  constructor(table: string, missingColumns: string[]) {
    super(
      `CSV file ${table} is missing required columns: ${missingColumns.join(", ")}`,
    );
    this.name = "MissingColumnsError";
    this.table = table;
    this.missingColumns = missingColumns;
  }
}

/**
 * Loot rows reference item ids the base table does not have.
 *
 * Carries every missing id in encounter order; the message only
 * previews the first few.
 */
export class UnresolvedReferencesError extends LootDataError {
  public readonly missingIds: string[];

  constructor(message: string, missingIds: string[]) {
    super(message);
    this.name = "UnresolvedReferencesError";
    this.missingIds = missingIds;
  }
}
