/**
 * /loot command handler
 */

import type { CatalogStore } from "@/catalog/store";
import type { CommandReply, LootCommandOptions } from "@/types/commands";
import { runLootQuery } from "@/query";
import { formatLootResults } from "@/presenter/formatResults";
import { MSG_NO_MATCHES } from "@/constants/commands";

/**
 * Answers a /loot request from the current catalog.
 *
 * Errors and empty results are ephemeral; listings are public.
 */
export function handleLootCommand(
  store: CatalogStore,
  options: LootCommandOptions,
): CommandReply {
  const outcome = runLootQuery(store.getSnapshot(), options);

  if (outcome.kind !== "ok") {
    return { content: outcome.message, ephemeral: true };
  }
  if (outcome.total === 0) {
    return { content: MSG_NO_MATCHES, ephemeral: true };
  }
  return {
    content: formatLootResults(outcome.total, outcome.items),
    ephemeral: false,
  };
}
