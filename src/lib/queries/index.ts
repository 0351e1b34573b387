/**
 * Queries module - find queries and the named query catalog
 */

export * from "./types.js";
export * from "./find-queries.js";
export * from "./catalog.js";
