/**
 * Catalog barrel exports
 */

export * from "./errors";
export * from "./tableReader";
export * from "./builder";
export * from "./loader";
export * from "./store";
