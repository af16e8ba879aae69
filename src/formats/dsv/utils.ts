/**
 * DSV Utility Functions Module
 */

import { DSVParseError } from "../../errors";
import type { RaggedRowHandling } from "../../types";

/**
 * Remove a UTF-8 Byte Order Mark from the start of decoded text
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Handle rows whose field count differs from the header
 *
 * "pad" fills short rows with empty fields and leaves long rows alone (the
 * extra fields have no header and are never read). "truncate" also drops the
 * extra fields. "error" rejects any mismatch.
 */
export function handleRaggedRow(
  fields: string[],
  expectedColumns: number,
  handling: RaggedRowHandling = "pad",
  lineNumber?: number
): string[] {
  if (fields.length === expectedColumns) {
    return fields;
  }

  switch (handling) {
    case "error":
      throw new DSVParseError(
        `Row has ${fields.length} columns, expected ${expectedColumns}`,
        lineNumber
      );
    case "truncate":
      if (fields.length > expectedColumns) {
        return fields.slice(0, expectedColumns);
      }
      return padFields(fields, expectedColumns);
    case "pad":
      return padFields(fields, expectedColumns);
  }
}

function padFields(fields: string[], expectedColumns: number): string[] {
  const padded = [...fields];
  while (padded.length < expectedColumns) {
    padded.push("");
  }
  return padded;
}

/**
 * Give repeated header names a numeric suffix ("id", "id.1", "id.2")
 */
export function dedupeHeaders(header: readonly string[]): string[] {
  const seen = new Set<string>();
  const counts = new Map<string, number>();

  return header.map((name) => {
    let candidate = name;
    let count = counts.get(name) ?? 0;
    while (seen.has(candidate)) {
      count++;
      candidate = `${name}.${count}`;
    }
    counts.set(name, count);
    seen.add(candidate);
    return candidate;
  });
}

/**
 * A blank line splits into a single empty field
 */
export function isBlankRecord(fields: readonly string[]): boolean {
  return fields.length === 1 && fields[0]?.trim() === "";
}
