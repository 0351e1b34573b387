/**
 * Generator module - seeded sample datasets
 */

export * from "./types.js";
export * from "./sample-data.js";
