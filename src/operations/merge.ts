/**
 * Combine peptide maps from two sources
 */

import type { PeptideMap } from "../types";

/**
 * Every key of both maps; on a shared key the override's list replaces the
 * base's list outright (no union). Inputs are not modified and the result
 * shares no arrays with them.
 *
 * @example
 * ```typescript
 * mergePeptideMaps(new Map([["P1", ["A"]]]), new Map([["P1", ["B"]]]));
 * // Map { "P1" => ["B"] }
 * ```
 */
export function mergePeptideMaps(
  base: ReadonlyMap<string, readonly string[]>,
  override: ReadonlyMap<string, readonly string[]>
): PeptideMap {
  const merged: PeptideMap = new Map();
  for (const [code, peptides] of base) {
    merged.set(code, [...peptides]);
  }
  for (const [code, peptides] of override) {
    merged.set(code, [...peptides]);
  }
  return merged;
}
