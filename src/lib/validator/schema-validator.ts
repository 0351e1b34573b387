/**
 * Shape validation for loaded files using Ajv
 */

import { Ajv, type Schema, type ValidateFunction } from "ajv";

export interface ShapeViolation {
  path: string;
  message: string;
}

/**
 * Compiles one JSON Schema and checks values against it.
 * `validate` is a type guard, so callers get the typed value back
 * without casting parsed JSON.
 */
export class ShapeValidator<T> {
  private ajv: Ajv;
  private validateFn: ValidateFunction<T>;

  constructor(schema: Schema) {
    this.ajv = new Ajv({
      allErrors: true, // Collect all violations for reporting
    });
    this.validateFn = this.ajv.compile<T>(schema);
  }

  validate(data: unknown): data is T {
    return this.validateFn(data);
  }

  /**
   * Violations from the last validate() call
   */
  getErrors(): ShapeViolation[] {
    if (!this.validateFn.errors) {
      return [];
    }

    return this.validateFn.errors.map((error) => {
      // Ajv reports missing properties on the parent; point at the field itself
      const path =
        error.keyword === "required" && "missingProperty" in error.params
          ? `${error.instancePath}/${String(error.params.missingProperty)}`
          : error.instancePath || "/";

      return {
        path,
        message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
      };
    });
  }
}
