/**
 * epimap - Peptide-to-protein maps from immune epitope exports
 *
 * Loads IEDB-style structured exports or generic database exports, filters
 * rows with a small condition language and reduces them to protein code →
 * distinct peptide sequences.
 */

// Condition constructors and spec parsing
export {
  contains,
  isIn,
  match,
  notContains,
  notMatch,
  parseCondition,
  parseConditionSpec,
  readConditionSpec,
} from "./conditions";
// Error types
export {
  DSVParseError,
  EpimapError,
  FileError,
  InvalidConditionError,
  NotFoundError,
  ParseError,
  SchemaError,
  ValidationError,
} from "./errors";
// DSV format
export { CSVParser, DSVParser, type DSVParserOptions, type DSVTable, TSVParser } from "./formats/dsv";
// File I/O
export { exists, readToString } from "./io/file-reader";
// Operations
export {
  applyConditions,
  type CombinedSources,
  extractCombined,
  extractPeptideData,
  mergePeptideMaps,
  peptideMapFromRecord,
  peptideMapToRecord,
  proteinCode,
  reduceToPeptideMap,
  TableLoader,
  toUniprotUri,
} from "./operations";
// Core types
export type {
  Condition,
  ConditionEntries,
  ConditionOperator,
  ConditionSpec,
  ExtractOptions,
  LoadRequest,
  PeptideMap,
  RaggedRowHandling,
  RawCondition,
  Row,
  RowTable,
  StringOperator,
  TableLoaderOptions,
} from "./types";
export { PEPTIDE_COLUMN, PROTEIN_COLUMN } from "./types";
