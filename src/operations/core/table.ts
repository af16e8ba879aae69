/**
 * Row table helpers shared by the loader, filter and reducer
 */

import { SchemaError } from "../../errors";
import type { Row, RowTable } from "../../types";

export function createTable(columns: readonly string[], rows: readonly Row[]): RowTable {
  return { columns: [...columns], rows: [...rows] };
}

/**
 * @throws {SchemaError} naming every column of `required` the table lacks
 */
export function requireColumns(
  columns: readonly string[],
  required: readonly string[],
  source: string
): void {
  const missing = required.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw SchemaError.forColumns(missing, columns, source);
  }
}

/**
 * Cell text; a column a row lacks reads as empty
 */
export function cell(row: Row, column: string): string {
  return row[column] ?? "";
}

/**
 * First whitespace-delimited token, or "" when there is none
 */
export function firstToken(value: string): string {
  return value.trim().split(/\s+/)[0] ?? "";
}
