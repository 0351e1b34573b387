export * from "./schema-loader.js";
