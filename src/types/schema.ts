/**
 * Validator schema types
 * Shapes of the MongoDB `$jsonSchema` validators kept in schema_validation.json
 */

/**
 * One property node of a `$jsonSchema`. Only `bsonType` and `properties`
 * drive date normalization; other keywords are carried through untouched.
 */
export interface SchemaNode {
  bsonType?: string | string[];
  properties?: Record<string, unknown>;
  [keyword: string]: unknown;
}

/**
 * A `$jsonSchema` document describing one collection
 */
export interface SchemaDescriptor extends SchemaNode {
  required?: string[];
}

/**
 * A collection validator as passed to `createCollection`
 */
export interface CollectionValidator {
  $jsonSchema: SchemaDescriptor;
  [operator: string]: unknown;
}

/**
 * Collection name -> validator, as loaded from schema_validation.json
 */
export type ValidatorMap = Record<string, CollectionValidator>;

/**
 * Dot-joined paths of fields declared with `bsonType: "date"`
 */
export type DateFieldSet = ReadonlySet<string>;
