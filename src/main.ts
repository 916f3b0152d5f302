/**
 * Bot entrypoint — loads config, builds the catalog store, starts the bot
 *
 * Usage:
 *   npm start
 *
 * See src/config.ts for environment variables.
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { CatalogStore } from "./catalog";
import { LootBot } from "./bot/lootBot";
import * as logger from "./logger";

async function main() {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  logger.info("Starting loot bot", {
    basePath: config.catalog.basePath,
    lootPath: config.catalog.lootPath,
  });

  const store = new CatalogStore(config.catalog);
  const bot = new LootBot(store);

  const shutdown = () => {
    logger.info("Shutting down loot bot");
    bot
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await bot.start(config.discordToken);
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
