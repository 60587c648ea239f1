// shared/parse.ts — Schema-validated JSON parsing

import * as v from "valibot";

export type AnySchema = v.BaseSchema<unknown, unknown, v.BaseIssue<unknown>>;

/**
 * Parse a JSON string and validate it against a valibot schema.
 * Returns the validated value, or null if parsing/validation fails.
 */
export function parseJsonWith<T extends AnySchema>(text: string, schema: T): v.InferOutput<T> | null {
  try {
    return v.parse(schema, JSON.parse(text));
  } catch {
    return null;
  }
}
