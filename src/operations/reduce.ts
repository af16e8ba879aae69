/**
 * Reduce a row table to protein code → peptides
 */

import { PEPTIDE_COLUMN, PROTEIN_COLUMN, type PeptideMap, type RowTable } from "../types";
import { cell, requireColumns } from "./core/table";

/**
 * Trailing path segment of a protein identifier; the whole string when it
 * has no "/"
 *
 * @example
 * ```typescript
 * proteinCode("http://www.uniprot.org/uniprot/P12345"); // "P12345"
 * ```
 */
export function proteinCode(identifier: string): string {
  return identifier.slice(identifier.lastIndexOf("/") + 1);
}

/**
 * (peptide, identifier) pairs in table order, first occurrence of each kept
 */
export function distinctPairs(table: RowTable): Array<[peptide: string, identifier: string]> {
  requireColumns(table.columns, [PEPTIDE_COLUMN, PROTEIN_COLUMN], "table");

  const seen = new Map<string, Set<string>>();
  const pairs: Array<[string, string]> = [];

  for (const row of table.rows) {
    const peptide = cell(row, PEPTIDE_COLUMN);
    const identifier = cell(row, PROTEIN_COLUMN);

    let peptides = seen.get(identifier);
    if (peptides === undefined) {
      peptides = new Set();
      seen.set(identifier, peptides);
    }
    if (peptides.has(peptide)) continue;

    peptides.add(peptide);
    pairs.push([peptide, identifier]);
  }

  return pairs;
}

/**
 * Group peptides by protein code
 *
 * The same peptide under two identifiers that share a code (say an http and
 * an https URI) is listed once. Keys come out sorted; lists keep table order.
 *
 * @throws {SchemaError} If the table lacks peptide_sequence or uniprot_id
 */
export function reduceToPeptideMap(table: RowTable): PeptideMap {
  const groups = new Map<string, Set<string>>();

  for (const [peptide, identifier] of distinctPairs(table)) {
    const code = proteinCode(identifier);
    const peptides = groups.get(code);
    if (peptides === undefined) {
      groups.set(code, new Set([peptide]));
    } else {
      peptides.add(peptide);
    }
  }

  const result: PeptideMap = new Map();
  for (const code of [...groups.keys()].sort()) {
    result.set(code, [...(groups.get(code) ?? [])]);
  }
  return result;
}
