/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) reading
 *
 * RFC 4180 quoting, multi-line quoted fields, BOM removal and ragged-row
 * handling for the CSV/TSV exports epitope tables arrive in.
 *
 * @example
 * ```typescript
 * import { CSVParser } from './formats/dsv';
 *
 * const parser = new CSVParser();
 * const { header, rows } = await parser.parseFile('epitopes.csv');
 * ```
 */

export type { DSVParserOptions, DSVRawRecord, DSVTable } from "./types";

export { CSVParseState } from "./types";

export { CSVParser, DSVParser, TSVParser } from "./parser";

export { DSVParserOptionsSchema } from "./validation";

export { dedupeHeaders, handleRaggedRow, isBlankRecord, removeBOM } from "./utils";

export { parseCSVRow, readRecords } from "./state-machine";

export { DEFAULT_DELIMITERS, DEFAULT_NA_VALUES, DEFAULT_QUOTE } from "./constants";
