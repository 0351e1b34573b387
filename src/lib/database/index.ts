/**
 * Database module - connection, collection handles and setup
 */

export * from "./types.js";
export * from "./collections.js";
export * from "./connector.js";
export * from "./setup.js";
