/**
 * Query barrel exports
 */

export * from "./filterItems";
export * from "./queryRequest";
