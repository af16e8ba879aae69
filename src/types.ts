/**
 * Core types for epitope table extraction
 *
 * Row tables are plain string records; conditions are a closed tagged union
 * so filters can be matched exhaustively.
 */

import { type } from "arktype";

// =============================================================================
// TABLES
// =============================================================================

/** One table row: column name → cell text */
export type Row = Readonly<Record<string, string>>;

/**
 * Ordered rows over a fixed set of uniquely named columns
 */
export interface RowTable {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/** Canonical column holding the peptide sequence after loading */
export const PEPTIDE_COLUMN = "peptide_sequence";

/** Canonical column holding the protein identifier URI after loading */
export const PROTEIN_COLUMN = "uniprot_id";

// =============================================================================
// CONDITIONS
// =============================================================================

/** Operators that compare a cell against a single string */
export type StringOperator = "contains" | "not_contains" | "match" | "not_match";

export type ConditionOperator = StringOperator | "is_in";

export type Condition =
  | { readonly op: StringOperator; readonly value: string }
  | { readonly op: "is_in"; readonly values: ReadonlySet<string> | readonly string[] };

/**
 * Column → condition, in application order. `null` marks a column that is
 * loaded but never filtered.
 *
 * Plain objects list integer-like keys first; use a Map when column names
 * look like numbers.
 */
export type ConditionSpec =
  | ReadonlyMap<string, Condition | null>
  | Readonly<Record<string, Condition | null>>;

/** Ordered condition entries; unlike a spec, may repeat a column */
export type ConditionEntries = ReadonlyArray<readonly [string, Condition | null]>;

// =============================================================================
// OUTPUT
// =============================================================================

/** Protein code → distinct peptide sequences in first-seen order */
export type PeptideMap = Map<string, string[]>;

// =============================================================================
// OPTIONS
// =============================================================================

export type RaggedRowHandling = "pad" | "truncate" | "error";

export interface TableLoaderOptions {
  /** Field delimiter (default ",") */
  delimiter?: string;
  /** Source column renamed to peptide_sequence in structured mode */
  descriptionColumn?: string;
  /** Source column renamed to uniprot_id in structured mode */
  proteinColumn?: string;
  /** Cell values treated as missing */
  naValues?: readonly string[];
  /** What to do with rows whose field count differs from the header */
  raggedRows?: RaggedRowHandling;
  onWarning?: (warning: string) => void;
}

export type LoadRequest =
  | { readonly mode: "structured"; readonly columns: readonly string[] }
  | { readonly mode: "generic" };

export interface ExtractOptions extends TableLoaderOptions {
  /** Filter the source with the condition spec (IEDB-style export) */
  structured?: boolean;
  onProgress?: (message: string) => void;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

export const TableLoaderOptionsSchema = type({
  "delimiter?": "string",
  "descriptionColumn?": "string>0",
  "proteinColumn?": "string>0",
  "naValues?": "string[]",
  "raggedRows?": '"pad"|"truncate"|"error"',
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }
  if (options.delimiter === '"') {
    return ctx.reject({
      path: ["delimiter"],
      expected: "a delimiter other than the quote character",
      actual: "'\"'",
    });
  }
  if (
    options.descriptionColumn !== undefined &&
    options.descriptionColumn === options.proteinColumn
  ) {
    return ctx.reject({
      path: ["descriptionColumn", "proteinColumn"],
      expected: "distinct description and protein columns",
      actual: "the same column for both",
    });
  }
  return true;
});

/**
 * Untyped condition in tuple form, as written in JSON condition files:
 * `null`, `["match", "Tcell"]` or `["is_in", ["a", "b"]]`
 */
export const RawConditionSchema = type(["'contains'|'not_contains'|'match'|'not_match'", "string"])
  .or(type(["'is_in'", "string[]"]))
  .or("null");

export type RawCondition = typeof RawConditionSchema.infer;
