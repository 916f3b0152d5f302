/**
 * Query type definitions
 */

import type { LootItem } from "./catalog";

/**
 * Optional filter criteria for the query engine.
 *
 * Absent criteria are not tested.
 */
export type LootFilterCriteria = {
  /** Exact match, case and surrounding whitespace ignored */
  rarity?: string;
  /** Exact match, case and surrounding whitespace ignored */
  category?: string;
  /** Substring match, case and surrounding whitespace ignored */
  subtype?: string;
  /** Lowercase tokens; every one must be on the item */
  tags?: readonly string[];
};

/**
 * Raw query request as it arrives from the chat command.
 */
export type LootQueryRequest = {
  rarity?: string;
  category?: string;
  subtype?: string;
  /** Comma-separated tag string */
  tag?: string;
  limit?: number;
};

/**
 * Outcome of a query request.
 *
 * - unavailable: catalog is not usable (load error or never loaded)
 * - rejected: user input error, catalog untouched
 * - ok: matches capped to the limit, total counted before capping
 */
export type LootQueryOutcome =
  | { kind: "unavailable"; message: string }
  | { kind: "rejected"; message: string }
  | { kind: "ok"; total: number; items: LootItem[] };

/**
 * Limit resolution result
 */
export type LimitResult =
  | { ok: true; limit: number }
  | { ok: false; message: string };
