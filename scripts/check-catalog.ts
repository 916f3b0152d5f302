#!/usr/bin/env tsx
/**
 * Loads the catalog tables and prints a summary, without starting the bot.
 *
 * Usage:
 *   npm run check:catalog
 *   LOOT_TABLE_PATH=other/loot.csv npm run check:catalog
 */

import "dotenv/config";
import * as path from "path";
import { CatalogStore } from "@/catalog/store";
import {
  DEFAULT_BASE_TABLE_PATH,
  DEFAULT_LOOT_TABLE_PATH,
} from "@/constants/catalog";

const store = new CatalogStore({
  basePath: path.resolve(
    process.env.LOOT_BASE_TABLE_PATH || DEFAULT_BASE_TABLE_PATH,
  ),
  lootPath: path.resolve(process.env.LOOT_TABLE_PATH || DEFAULT_LOOT_TABLE_PATH),
});

const result = store.reload();
if (!result.ok) {
  console.error(`Catalog failed to load: ${result.error}`);
  process.exit(1);
}

const byRarity = new Map<string, number>();
for (const item of store.items) {
  byRarity.set(item.rarity, (byRarity.get(item.rarity) ?? 0) + 1);
}

console.log(`Items: ${result.itemCount}`);
console.log(`Tags available: ${store.hasTags ? "yes" : "no"}`);
console.log("Items by rarity:");
console.log(Object.fromEntries(byRarity));
