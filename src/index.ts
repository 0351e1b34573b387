/**
 * EduHub: data-access layer for the learning platform's MongoDB database
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/normalizer/index.js";
export * from "./lib/schema/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/database/index.js";
export * from "./lib/crud/index.js";
export * from "./lib/queries/index.js";
export * from "./lib/aggregations/index.js";
export * from "./lib/generator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/seed-manager.js";
