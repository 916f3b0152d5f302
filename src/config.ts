/**
 * Application configuration — environment variables with defaults
 *
 * Environment variables:
 *   - DISCORD_TOKEN: Bot token (required)
 *   - LOOT_BASE_TABLE_PATH: Base table CSV (optional, defaults to data/Items_base.csv)
 *   - LOOT_TABLE_PATH: Loot table CSV (optional, defaults to data/Items_loot.csv)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import * as path from "path";
import type { AppConfig } from "@/types/config";
import {
  DEFAULT_BASE_TABLE_PATH,
  DEFAULT_LOOT_TABLE_PATH,
} from "@/constants/catalog";
import { DEFAULT_LOG_LEVEL } from "@/constants/logger";
import { isLogLevel } from "@/logger";

/**
 * Error thrown when required configuration is missing or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Builds the app config from environment variables.
 *
 * Table paths resolve against the working directory.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param cwd - Base directory for relative table paths
 * @throws {ConfigError} If DISCORD_TOKEN is unset or LOG_LEVEL is invalid
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const discordToken = env.DISCORD_TOKEN?.trim();
  if (!discordToken) {
    throw new ConfigError(
      "DISCORD_TOKEN is not set. Provide your bot token as an environment variable.",
    );
  }

  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase() || DEFAULT_LOG_LEVEL;
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(
      `LOG_LEVEL must be one of debug, info, warn, error (got "${rawLevel}")`,
    );
  }

  return {
    discordToken,
    catalog: {
      basePath: path.resolve(
        cwd,
        env.LOOT_BASE_TABLE_PATH || DEFAULT_BASE_TABLE_PATH,
      ),
      lootPath: path.resolve(cwd, env.LOOT_TABLE_PATH || DEFAULT_LOOT_TABLE_PATH),
    },
    logLevel: rawLevel,
  };
}
