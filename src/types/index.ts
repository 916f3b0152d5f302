/**
 * Types barrel exports
 */

export * from "./logger";
export * from "./catalog";
export * from "./query";
export * from "./commands";
export * from "./config";
