/**
 * Application configuration types
 */

import type { CatalogPaths } from "./catalog";
import type { LogLevel } from "./logger";

export type AppConfig = {
  /** Chat bot token */
  discordToken: string;
  /** Absolute paths of the two source tables */
  catalog: CatalogPaths;
  logLevel: LogLevel;
};
