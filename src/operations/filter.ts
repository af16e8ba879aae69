/**
 * Condition filtering for row tables
 *
 * Conditions run in spec order, each narrowing the rows that survived the
 * previous one, so the result is the AND of all of them. A `null` condition
 * only marks a column for loading.
 */

import { InvalidConditionError } from "../errors";
import type { Condition, ConditionEntries, ConditionSpec, RowTable } from "../types";
import { cell, createTable, requireColumns } from "./core/table";

type CellPredicate = (value: string) => boolean;

function isEntries(conditions: ConditionSpec | ConditionEntries): conditions is ConditionEntries {
  return Array.isArray(conditions);
}

function isConditionMap(
  conditions: ConditionSpec
): conditions is ReadonlyMap<string, Condition | null> {
  return conditions instanceof Map;
}

/**
 * Condition spec as ordered `[column, condition]` pairs
 */
export function conditionEntries(conditions: ConditionSpec | ConditionEntries): ConditionEntries {
  if (isEntries(conditions)) {
    return conditions;
  }
  if (isConditionMap(conditions)) {
    return [...conditions.entries()];
  }
  return Object.entries(conditions);
}

function describeOperator(condition: unknown): string {
  if (typeof condition === "object" && condition !== null && "op" in condition) {
    return `"${String(condition.op)}"`;
  }
  return `in ${String(condition)}`;
}

function unknownOperator(column: string, condition: never): never {
  throw new InvalidConditionError(`Unknown condition operator ${describeOperator(condition)}`, column);
}

function requireString(column: string, op: string, value: unknown): string {
  if (typeof value !== "string") {
    throw new InvalidConditionError(`Operator "${op}" needs a string operand`, column, op);
  }
  return value;
}

function memberSet(column: string, values: unknown): ReadonlySet<string> {
  if (!(values instanceof Set) && !Array.isArray(values)) {
    throw new InvalidConditionError(
      'Operator "is_in" needs an array or set of strings',
      column,
      "is_in"
    );
  }

  const members = new Set<string>();
  for (const member of values) {
    members.add(requireString(column, "is_in", member));
  }
  return members;
}

/**
 * Build the cell test for one condition
 *
 * @throws {InvalidConditionError} on an unknown operator or malformed operand
 */
export function compileCondition(column: string, condition: Condition): CellPredicate {
  switch (condition.op) {
    case "contains": {
      const needle = requireString(column, condition.op, condition.value);
      return (value) => value.includes(needle);
    }
    case "not_contains": {
      const needle = requireString(column, condition.op, condition.value);
      return (value) => !value.includes(needle);
    }
    case "match": {
      const expected = requireString(column, condition.op, condition.value);
      return (value) => value === expected;
    }
    case "not_match": {
      const expected = requireString(column, condition.op, condition.value);
      return (value) => value !== expected;
    }
    case "is_in": {
      const members = memberSet(column, condition.values);
      return (value) => members.has(value);
    }
    default:
      return unknownOperator(column, condition);
  }
}

/**
 * Keep the rows satisfying every condition
 *
 * Accepts a spec (Map or object) or an entry list; the latter may name a
 * column more than once. The input table is left untouched.
 *
 * @throws {SchemaError} If a condition names a column the table lacks
 * @throws {InvalidConditionError} If a condition is malformed
 *
 * @example
 * ```typescript
 * const tcell = applyConditions(table, {
 *   peptide_sequence: null,
 *   Category: match("Tcell"),
 * });
 * ```
 */
export function applyConditions(
  table: RowTable,
  conditions: ConditionSpec | ConditionEntries
): RowTable {
  let rows = table.rows;

  for (const [column, condition] of conditionEntries(conditions)) {
    if (condition === null) continue;

    requireColumns(table.columns, [column], "table");
    const test = compileCondition(column, condition);
    rows = rows.filter((row) => test(cell(row, column)));
  }

  return createTable(table.columns, rows);
}
