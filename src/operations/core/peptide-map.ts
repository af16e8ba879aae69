/**
 * Peptide map conversions for serialisation
 */

import type { PeptideMap } from "../../types";

/**
 * Plain object form for JSON output
 */
export function peptideMapToRecord(
  map: ReadonlyMap<string, readonly string[]>
): Record<string, string[]> {
  return Object.fromEntries([...map].map(([code, peptides]) => [code, [...peptides]]));
}

export function peptideMapFromRecord(record: Readonly<Record<string, readonly string[]>>): PeptideMap {
  return new Map(Object.entries(record).map(([code, peptides]) => [code, [...peptides]]));
}
