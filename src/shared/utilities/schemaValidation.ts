/**
 * JSON-schema validation helpers (ajv) shared by the store, the settings
 * loader and the HTTP request handlers.
 */

import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import { RequestValidationError } from "../errors";

/**
 * Structural/combinator keywords emitted by ajv that wrap the real errors.
 * These are dropped when more specific child errors exist.
 */
const STRUCTURAL_KEYWORDS = new Set(["if", "then", "else", "allOf", "anyOf", "oneOf", "not"]);

const ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
addFormats(ajv);

/**
 * Compile a schema once; callers keep the returned validator at module scope.
 */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/** Build a human-readable message from an ajv error. */
export function formatAjvError(error: ErrorObject): string {
  const where = error.instancePath || "(root)";
  const allowedValues: unknown = error.params["allowedValues"];
  if (error.keyword === "enum" && Array.isArray(allowedValues)) {
    const list = allowedValues.map((value) => `"${String(value)}"`).join(", ");
    return `${where}: value is not accepted. Valid values: ${list}`;
  }
  const additionalProperty: unknown = error.params["additionalProperty"];
  if (error.keyword === "additionalProperties" && typeof additionalProperty === "string") {
    return `${where}: unknown property "${additionalProperty}"`;
  }
  const missingProperty: unknown = error.params["missingProperty"];
  if (error.keyword === "required" && typeof missingProperty === "string") {
    return `${where}: missing required property "${missingProperty}"`;
  }
  const expectedType: unknown = error.params["type"];
  if (error.keyword === "type" && typeof expectedType === "string") {
    return `${where}: must be ${expectedType}`;
  }
  return `${where}: ${error.message ?? "schema validation error"}`;
}

/**
 * Messages for every error the last validation produced.
 */
export function collectSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) return [];
  const specific = errors.filter((error) => !STRUCTURAL_KEYWORDS.has(error.keyword));
  return (specific.length > 0 ? specific : errors).map(formatAjvError);
}

/**
 * Return the value typed by its schema, or throw listing every violation.
 */
export function assertValid<T>(validate: ValidateFunction<T>, value: unknown, label: string): T {
  if (validate(value)) return value;
  throw new RequestValidationError(`Invalid ${label}`, collectSchemaErrors(validate.errors));
}
