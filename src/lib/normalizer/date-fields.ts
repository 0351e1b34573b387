/**
 * Schema-driven date normalization
 *
 * Seed data arrives as JSON, so every date is a string. The collection
 * validators declare which fields are `bsonType: "date"`; these helpers
 * collect those field paths once per schema and rewrite the matching
 * strings into `Date` values before insertion.
 */

import type { DateFieldSet, SchemaDescriptor, SchemaNode } from "../../types/schema.js";
import { parseIsoDate } from "./iso-date.js";

const PATH_SEPARATOR = ".";

/**
 * Plain object check: arrays, Dates, ObjectIds and other class instances
 * are not walked.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isSchemaNode(value: unknown): value is SchemaNode {
  return isPlainObject(value);
}

function collectDatePaths(
  properties: Record<string, unknown>,
  prefix: string,
  into: Set<string>,
): void {
  for (const [key, node] of Object.entries(properties)) {
    if (!isSchemaNode(node)) continue;

    if (node.bsonType === "date") {
      into.add(prefix + key);
    }

    // A date node with nested properties is walked as well
    if (isPlainObject(node.properties)) {
      collectDatePaths(node.properties, prefix + key + PATH_SEPARATOR, into);
    }
  }
}

/**
 * Extract the dot-joined paths of every property declared as a date.
 *
 * @example
 * extractDateFieldPaths({
 *   properties: { profile: { properties: { joinedAt: { bsonType: "date" } } } },
 * });
 * // Set { "profile.joinedAt" }
 */
export function extractDateFieldPaths(schema: SchemaDescriptor): DateFieldSet {
  const paths = new Set<string>();
  if (isPlainObject(schema) && isPlainObject(schema.properties)) {
    collectDatePaths(schema.properties, "", paths);
  }
  return paths;
}

/**
 * Convert the string values found at `dateFields` into `Date` objects.
 *
 * Mutates `record` in place and returns it. Strings that do not parse as
 * ISO-8601 are left as they are; values that are not strings (including
 * already converted dates) are never touched. Arrays are walked element by
 * element with the array's own path as prefix.
 */
export function convertDatesBySchema<T>(
  record: T,
  dateFields: DateFieldSet,
  prefix = "",
): T {
  if (!isPlainObject(record)) {
    return record;
  }

  const target: Record<string, unknown> = record;
  for (const [key, value] of Object.entries(target)) {
    const fullKey = prefix + key;

    if (dateFields.has(fullKey) && typeof value === "string") {
      const parsed = parseIsoDate(value);
      if (parsed) {
        target[key] = parsed;
      }
    } else if (isPlainObject(value)) {
      target[key] = convertDatesBySchema(value, dateFields, fullKey + PATH_SEPARATOR);
    } else if (Array.isArray(value)) {
      target[key] = value.map((item: unknown) =>
        isPlainObject(item)
          ? convertDatesBySchema(item, dateFields, fullKey + PATH_SEPARATOR)
          : item,
      );
    }
  }

  return record;
}
