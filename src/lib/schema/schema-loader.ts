/**
 * Schema and dataset loading utilities
 * Loads the collection validators and the JSON seed dataset from disk
 */

import fs from "node:fs/promises";
import type { SchemaDescriptor, ValidatorMap } from "../../types/schema.js";
import { FileIOError, ValidationError, isFileNotFound } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { ShapeValidator } from "../validator/schema-validator.js";

export type SampleDataset = Record<string, unknown>;

const validatorMapShape = new ShapeValidator<ValidatorMap>({
  type: "object",
  additionalProperties: {
    type: "object",
    required: ["$jsonSchema"],
    properties: {
      $jsonSchema: { type: "object" },
    },
  },
});

const datasetShape = new ShapeValidator<SampleDataset>({ type: "object" });

async function readJsonFile(path: string, description: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new FileIOError(`${description} not found at: ${path}`, undefined, {
        cause: error,
      });
    }
    throw new FileIOError(`Failed to read ${description} from ${path}`, undefined, {
      cause: error,
    });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${description}: ${path}`, undefined, {
      cause: error,
    });
  }
}

/**
 * Load collection validators from schema_validation.json
 * @param schemaPath Path to the validators file
 * @returns Collection name -> `{ $jsonSchema }` validator
 */
export async function loadValidationSchemas(schemaPath: string): Promise<ValidatorMap> {
  const parsed = await readJsonFile(schemaPath, "Schema file");

  if (!validatorMapShape.validate(parsed)) {
    throw new ValidationError(
      `Schema file does not map collections to $jsonSchema validators: ${schemaPath}`,
      validatorMapShape.getErrors(),
    );
  }

  logger.info("Loaded validation schemas", {
    schemaPath,
    collections: Object.keys(parsed),
  });

  return parsed;
}

/**
 * Load the seed dataset (collection name -> documents)
 */
export async function loadSampleDataset(dataPath: string): Promise<SampleDataset> {
  const parsed = await readJsonFile(dataPath, "Sample data file");

  if (!datasetShape.validate(parsed)) {
    throw new ValidationError(
      `Sample data file must contain a JSON object: ${dataPath}`,
      datasetShape.getErrors(),
    );
  }

  logger.info("Loaded sample dataset", {
    dataPath,
    collections: Object.keys(parsed),
  });

  return parsed;
}

/**
 * Look up the `$jsonSchema` of one collection
 */
export function getJsonSchema(
  validators: ValidatorMap,
  collectionName: string,
): SchemaDescriptor | undefined {
  return Object.prototype.hasOwnProperty.call(validators, collectionName)
    ? validators[collectionName].$jsonSchema
    : undefined;
}
