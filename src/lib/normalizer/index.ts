/**
 * Normalizer module - turns JSON seed documents into driver-ready documents
 */

import type { SchemaDescriptor } from "../../types/schema.js";
import { logger } from "../../utils/logger.js";
import { convertDatesBySchema, extractDateFieldPaths } from "./date-fields.js";

export * from "./date-fields.js";
export * from "./iso-date.js";

/**
 * Normalize a batch of documents belonging to one collection.
 * Date paths are extracted once and shared by every document.
 */
export function normalizeCollectionDocuments<T>(
  documents: T[],
  schema: SchemaDescriptor,
): T[] {
  const dateFields = extractDateFieldPaths(schema);

  logger.debug("Normalizing documents", {
    count: documents.length,
    dateFields: [...dateFields],
  });

  return documents.map((doc) => convertDatesBySchema(doc, dateFields));
}
