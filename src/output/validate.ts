/**
 * JSON Schema validation (ajv).
 */

import AjvImport, { type ErrorObject, type ValidateFunction } from "ajv";
import type { JsonSchema, ValidationResult } from "./types.js";

interface AjvInstance {
  compile<T>(schema: JsonSchema): ValidateFunction<T>;
}

type AjvConstructorType = new (opts?: { allErrors?: boolean }) => AjvInstance;

// ajv is CommonJS: under NodeNext the default import can be the module object.
const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (AjvImport as unknown as { default: AjvConstructorType }).default
) as AjvConstructorType;

// ajv caches compiled validators by schema identity.
const ajv = new AjvConstructor({ allErrors: true });

export function formatAjvErrors(
  errors: ErrorObject[] | null | undefined
): string[] {
  if (!errors || errors.length === 0) {
    return ["Validation failed"];
  }
  return errors.map(
    (e) => `${e.instancePath || "/"} ${e.message ?? e.keyword}`
  );
}

export function validateAgainstSchema<T>(
  data: unknown,
  schema: JsonSchema
): ValidationResult<T> {
  let validate: ValidateFunction<T>;
  try {
    validate = ajv.compile<T>(schema);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { valid: false, errors: [`Invalid schema: ${message}`] };
  }

  if (validate(data)) {
    return { valid: true, data };
  }
  return { valid: false, errors: formatAjvErrors(validate.errors) };
}
