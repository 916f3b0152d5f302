/**
 * Result presenter — renders matched items as a chat listing
 */

import type { LootItem } from "@/types/catalog";
import { MSG_NO_MATCHES } from "@/constants/commands";

/**
 * Formats one item line.
 *
 * @example
 * formatItemLine(cloak) // "• **Cloak of Mist** (Armor — Cloak) — Rare"
 */
export function formatItemLine(item: LootItem): string {
  const subtype = item.subtype ? ` — ${item.subtype}` : "";
  return `• **${item.name}** (${item.category}${subtype}) — ${item.rarity}`;
}

/**
 * Formats a capped result listing.
 *
 * @param total - Match count before capping
 * @param items - Items to show (already capped)
 */
export function formatLootResults(
  total: number,
  items: readonly LootItem[],
): string {
  if (total === 0 || items.length === 0) {
    return MSG_NO_MATCHES;
  }
  return [
    `Found ${total} item(s). Showing ${items.length}:`,
    ...items.map(formatItemLine),
  ].join("\n");
}
