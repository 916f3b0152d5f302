/**
 * Commands barrel exports
 */

export * from "./lootCommand";
export * from "./reloadCommand";
