/**
 * DSV Format Type Definitions
 */

import type { RaggedRowHandling } from "../../types";

/**
 * Parser state for the CSV field state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

export interface DSVParserOptions {
  delimiter?: string;
  quote?: string;
  skipEmptyLines?: boolean;
  raggedRows?: RaggedRowHandling;
}

/**
 * One physical record as split by the state machine, before header mapping
 */
export interface DSVRawRecord {
  fields: string[];
  /** Line the record starts on (1-based); quoted fields may span lines */
  lineNumber: number;
}

/**
 * Parsed delimited text: header plus data rows aligned to it
 */
export interface DSVTable {
  header: string[];
  rows: string[][];
  lineNumbers: number[];
}
