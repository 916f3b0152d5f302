/**
 * Catalog store — owns the loaded catalog and its load error
 *
 * State machine:
 *   unloaded -> loaded | failed
 *   loaded  <-> failed   (each reload starts from scratch)
 *
 * A reload builds the next state completely before publishing it
 * with a single assignment, so a reader holding a snapshot sees
 * either the old catalog or the new one.
 *
 * The store never blocks queries; callers check lastError first.
 */

import type {
  CatalogPaths,
  CatalogSnapshot,
  LootItem,
  ReloadResult,
} from "@/types/catalog";
import type { Logger } from "@/types/logger";
import * as logger from "@/logger";
import { LootDataError } from "./errors";
import { loadCatalog } from "./loader";

const UNLOADED: CatalogSnapshot = {
  status: "unloaded",
  items: [],
  hasTags: false,
  lastError: null,
};

export class CatalogStore {
  private snapshot: CatalogSnapshot = UNLOADED;

  constructor(
    public readonly paths: CatalogPaths,
    private readonly log: Logger = logger,
  ) {}

  /**
   * Current published state. Hold on to it for the duration of a query.
   */
  getSnapshot(): CatalogSnapshot {
    return this.snapshot;
  }

  get status(): CatalogSnapshot["status"] {
    return this.snapshot.status;
  }

  get items(): readonly LootItem[] {
    return this.snapshot.items;
  }

  get hasTags(): boolean {
    return this.snapshot.hasTags;
  }

  get lastError(): string | null {
    return this.snapshot.lastError;
  }

  /**
   * Re-reads both tables and replaces the catalog.
   *
   * Load errors are stored and logged, never thrown. On failure the
   * previous items are discarded.
   *
   * @throws Errors outside the LootDataError family (programming errors)
   */
  reload(): ReloadResult {
    let next: CatalogSnapshot;
    try {
      const built = loadCatalog(this.paths);
      if (built.duplicateBaseIds > 0) {
        this.log.debug("Duplicate item_id rows in base table, last row kept", {
          duplicates: built.duplicateBaseIds,
        });
      }
      next = {
        status: "loaded",
        items: Object.freeze(built.items),
        hasTags: built.hasTags,
        lastError: null,
      };
    } catch (err) {
      if (!(err instanceof LootDataError)) {
        throw err;
      }
      next = {
        status: "failed",
        items: [],
        hasTags: false,
        lastError: err.message,
      };
    }

    this.snapshot = next;

    if (next.lastError !== null) {
      this.log.error("Failed to load loot data", {
        error: next.lastError,
        basePath: this.paths.basePath,
        lootPath: this.paths.lootPath,
      });
      return { ok: false, error: next.lastError };
    }

    this.log.info(`Loaded ${next.items.length} loot items`, {
      hasTags: next.hasTags,
    });
    return { ok: true, itemCount: next.items.length };
  }
}
