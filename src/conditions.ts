/**
 * Condition constructors and condition spec parsing
 *
 * Typed code builds conditions with the constructors below. Specs that
 * arrive untyped (a JSON file, a request body) go through
 * `parseConditionSpec`, which accepts the tuple form
 * `{ "Category": ["match", "Tcell"], "Description": null }`.
 */

import { type } from "arktype";
import { InvalidConditionError, ParseError } from "./errors";
import { readToString } from "./io/file-reader";
import { type Condition, RawConditionSchema } from "./types";

export const contains = (value: string): Condition => ({ op: "contains", value });

export const notContains = (value: string): Condition => ({ op: "not_contains", value });

export const match = (value: string): Condition => ({ op: "match", value });

export const notMatch = (value: string): Condition => ({ op: "not_match", value });

export const isIn = (values: Iterable<string>): Condition => ({ op: "is_in", values: [...values] });

/**
 * Validate one untyped condition
 *
 * @throws {InvalidConditionError} with the schema summary when `raw` is not
 * `null`, a string-operator tuple or an `is_in` tuple
 */
export function parseCondition(column: string, raw: unknown): Condition | null {
  const result = RawConditionSchema(raw);
  if (result instanceof type.errors) {
    throw new InvalidConditionError(`Invalid condition: ${result.summary}`, column);
  }
  if (result === null) {
    return null;
  }
  if (result[0] === "is_in") {
    return { op: "is_in", values: result[1] };
  }
  return { op: result[0], value: result[1] };
}

/**
 * Validate an untyped condition spec, keeping key order
 *
 * @throws {InvalidConditionError} If `raw` is not an object or any condition is malformed
 */
export function parseConditionSpec(raw: unknown): Map<string, Condition | null> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new InvalidConditionError(
      "Condition spec must be an object mapping column names to conditions"
    );
  }

  const spec = new Map<string, Condition | null>();
  for (const [column, value] of Object.entries(raw)) {
    spec.set(column, parseCondition(column, value));
  }
  return spec;
}

/**
 * Read a JSON condition spec file
 *
 * @throws {NotFoundError} If the file does not exist
 * @throws {ParseError} If the file is not valid JSON
 * @throws {InvalidConditionError} If the spec is malformed
 */
export async function readConditionSpec(path: string): Promise<Map<string, Condition | null>> {
  const text = await readToString(path);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ParseError(
      `Invalid JSON in condition spec: ${error instanceof Error ? error.message : String(error)}`,
      "json",
      undefined,
      path
    );
  }

  return parseConditionSpec(raw);
}
