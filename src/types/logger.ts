/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured logger accepted by the catalog store and the bot.
 *
 * The project logger module (@/logger) satisfies it; tests pass
 * a logger built from vi.fn().
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
