/**
 * /loot_reload command handler
 */

import type { CatalogStore } from "@/catalog/store";
import type { CommandReply } from "@/types/commands";
import { MSG_RELOAD_FAILED_PREFIX } from "@/constants/commands";

export function handleReloadCommand(store: CatalogStore): CommandReply {
  const result = store.reload();
  if (!result.ok) {
    return {
      content: `${MSG_RELOAD_FAILED_PREFIX}${result.error}`,
      ephemeral: true,
    };
  }
  return { content: `Reloaded ${result.itemCount} items.`, ephemeral: true };
}
