/**
 * Collection lifecycle: reset, creation with validators, seeding and indexes
 */

import type { Db, Document } from "mongodb";
import type { ValidatorMap } from "../../types/schema.js";
import { SetupError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { isPlainObject, normalizeCollectionDocuments } from "../normalizer/index.js";
import {
  getJsonSchema,
  loadSampleDataset,
  loadValidationSchemas,
  type SampleDataset,
} from "../schema/schema-loader.js";
import { getCollections } from "./collections.js";
import type { SeedSummary } from "./types.js";

/**
 * Drop every existing collection so setup starts from scratch
 * @returns Names of the dropped collections
 */
export async function resetDatabase(db: Db): Promise<string[]> {
  const existing = await db.listCollections({}, { nameOnly: true }).toArray();
  const dropped: string[] = [];

  for (const { name } of existing) {
    await db.dropCollection(name);
    dropped.push(name);
  }

  logger.info("Dropped existing collections", { dropped });
  return dropped;
}

/**
 * Create one collection per validator entry
 */
export async function buildCollections(db: Db, validators: ValidatorMap): Promise<string[]> {
  const created: string[] = [];

  for (const [collectionName, validator] of Object.entries(validators)) {
    try {
      await db.createCollection(collectionName, { validator });
    } catch (error) {
      logger.error(`Failed to create collection: ${collectionName}`, error);
      throw new SetupError(
        `Error initializing database: could not create '${collectionName}'`,
        { created },
        { cause: error },
      );
    }
    created.push(collectionName);
    logger.info(`Created collection: ${collectionName}`);
  }

  return created;
}

/**
 * Insert the dataset, converting each collection's date fields first.
 *
 * Entries that are not arrays, or that have no validator, are skipped with a
 * warning. Insert errors propagate: a partially seeded database is not a
 * state worth continuing from.
 */
export async function seedDatabase(
  db: Db,
  dataset: SampleDataset,
  validators: ValidatorMap,
): Promise<SeedSummary> {
  const summary: SeedSummary = { seeded: {}, skipped: [] };

  for (const [collectionName, documents] of Object.entries(dataset)) {
    const schema = getJsonSchema(validators, collectionName);

    if (!Array.isArray(documents) || !schema) {
      logger.warn(
        `Data for '${collectionName}' is not a list or schema missing, skipping.`,
      );
      summary.skipped.push(collectionName);
      continue;
    }

    const records: Document[] = documents.filter(isPlainObject);
    if (records.length < documents.length) {
      logger.warn(`Ignoring non-object entries in '${collectionName}'`, {
        ignored: documents.length - records.length,
      });
    }

    const normalized = normalizeCollectionDocuments(records, schema);
    if (normalized.length > 0) {
      const result = await db.collection(collectionName).insertMany(normalized);
      summary.seeded[collectionName] = result.insertedCount;
      logger.info(
        `Seeded ${result.insertedCount} documents into '${collectionName}' collection.`,
      );
    } else {
      summary.seeded[collectionName] = 0;
    }
  }

  return summary;
}

/**
 * Load the validator and dataset files, then seed
 */
export async function seedDatabaseFromFiles(
  db: Db,
  schemaPath: string,
  dataPath: string,
): Promise<SeedSummary> {
  const dataset = await loadSampleDataset(dataPath);
  const validators = await loadValidationSchemas(schemaPath);
  return seedDatabase(db, dataset, validators);
}

/**
 * Create the indexes the query catalog relies on
 * @returns false when any index could not be created
 */
export async function setupIndexes(db: Db): Promise<boolean> {
  const { users, courses, assignments, enrollments } = getCollections(db);

  try {
    await users.createIndex("email", { unique: true });
    await courses.createIndex({ title: "text" });
    await courses.createIndex("category");
    await assignments.createIndex("dueDate");
    await enrollments.createIndex("studentId");
    await enrollments.createIndex("courseId");
    logger.info("Indexes created successfully.");
    return true;
  } catch (error) {
    logger.error("Error setting up indexes", error);
    return false;
  }
}
