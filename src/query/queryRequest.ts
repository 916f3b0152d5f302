/**
 * Query request handling — caller policy in front of the query engine
 *
 * Checks catalog availability, resolves the result limit and parses
 * the tag filter before any filtering happens. User input errors are
 * returned as outcomes and never touch catalog state.
 */

import type { CatalogSnapshot } from "@/types/catalog";
import type {
  LimitResult,
  LootFilterCriteria,
  LootQueryOutcome,
  LootQueryRequest,
} from "@/types/query";
import { DEFAULT_RESULT_LIMIT, MAX_RESULT_LIMIT } from "@/constants/query";
import {
  MSG_DATA_UNAVAILABLE_PREFIX,
  MSG_EMPTY_TAG_FILTER,
  MSG_INVALID_LIMIT,
  MSG_NOT_LOADED,
  MSG_TAGS_UNSUPPORTED,
} from "@/constants/commands";
import { parseTagList } from "@/utils/text/textNormalization";
import { filterItems } from "./filterItems";

/**
 * Resolves the requested result limit.
 *
 * - absent: DEFAULT_RESULT_LIMIT
 * - zero, negative or fractional: rejected
 * - above MAX_RESULT_LIMIT: clamped
 */
export function resolveLimit(limit: number | undefined): LimitResult {
  if (limit === undefined) {
    return { ok: true, limit: DEFAULT_RESULT_LIMIT };
  }
  if (!Number.isInteger(limit) || limit <= 0) {
    return { ok: false, message: MSG_INVALID_LIMIT };
  }
  return { ok: true, limit: Math.min(limit, MAX_RESULT_LIMIT) };
}

/**
 * Runs a query request against one catalog snapshot.
 *
 * @param snapshot - Published catalog state (see CatalogStore.getSnapshot)
 * @param request - Raw request fields from the chat command
 * @returns Outcome: unavailable, rejected, or capped matches with total
 *
 * @example
 * const outcome = runLootQuery(store.getSnapshot(), { rarity: "Rare", limit: 5 });
 * if (outcome.kind === "ok") console.log(outcome.total);
 */
export function runLootQuery(
  snapshot: CatalogSnapshot,
  request: LootQueryRequest,
): LootQueryOutcome {
  if (snapshot.lastError !== null) {
    return {
      kind: "unavailable",
      message: `${MSG_DATA_UNAVAILABLE_PREFIX}${snapshot.lastError}`,
    };
  }
  if (snapshot.status !== "loaded") {
    return {
      kind: "unavailable",
      message: `${MSG_DATA_UNAVAILABLE_PREFIX}${MSG_NOT_LOADED}`,
    };
  }

  const limitResult = resolveLimit(request.limit);
  if (!limitResult.ok) {
    return { kind: "rejected", message: limitResult.message };
  }

  const criteria: LootFilterCriteria = {
    rarity: request.rarity,
    category: request.category,
    subtype: request.subtype,
  };

  if (request.tag) {
    if (!snapshot.hasTags) {
      return { kind: "rejected", message: MSG_TAGS_UNSUPPORTED };
    }
    const tags = parseTagList(request.tag);
    if (tags.length === 0) {
      return { kind: "rejected", message: MSG_EMPTY_TAG_FILTER };
    }
    criteria.tags = tags;
  }

  const matches = filterItems(snapshot.items, criteria);
  return {
    kind: "ok",
    total: matches.length,
    items: matches.slice(0, limitResult.limit),
  };
}
