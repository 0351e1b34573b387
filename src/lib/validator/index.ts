/**
 * Validator module - JSON Schema checks for configuration and data files
 */

export * from "./schema-validator.js";
