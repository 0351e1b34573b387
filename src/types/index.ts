// Core re-exports for the EduHub type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./schema.js";
export * from "../lib/database/types.js";
export * from "../lib/generator/types.js";
export * from "../lib/queries/types.js";
