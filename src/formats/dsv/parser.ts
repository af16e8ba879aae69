/**
 * @module formats/dsv/parser
 * @description Delimited text parser producing a header and aligned rows
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { DEFAULT_DELIMITERS, DEFAULT_QUOTE } from "./constants";
import { readRecords } from "./state-machine";
import type { DSVParserOptions, DSVTable } from "./types";
import { dedupeHeaders, handleRaggedRow, isBlankRecord, removeBOM } from "./utils";
import { DSVParserOptionsSchema } from "./validation";

/**
 * DSVParser - header-first delimited text parser
 *
 * The first non-blank record is the header. Repeated header names get a
 * numeric suffix so every column name is unique. Data rows are aligned to
 * the header according to `raggedRows`.
 *
 * @example
 * ```typescript
 * const parser = new DSVParser({ delimiter: "," });
 * const { header, rows } = parser.parseString("a,b\n1,2\n");
 * ```
 */
export class DSVParser {
  private readonly options: Required<DSVParserOptions>;

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    this.options = {
      delimiter: options.delimiter ?? DEFAULT_DELIMITERS.csv,
      quote: options.quote ?? DEFAULT_QUOTE,
      skipEmptyLines: options.skipEmptyLines ?? true,
      raggedRows: options.raggedRows ?? "pad",
    };
  }

  getFormatName(): string {
    switch (this.options.delimiter) {
      case DEFAULT_DELIMITERS.csv:
        return "CSV";
      case DEFAULT_DELIMITERS.tsv:
        return "TSV";
      default:
        return "DSV";
    }
  }

  /**
   * Parse a delimited file; gzip input is decompressed transparently
   */
  async parseFile(path: string): Promise<DSVTable> {
    const text = await readToString(path);
    return this.parseString(text);
  }

  parseString(data: string): DSVTable {
    const table: DSVTable = { header: [], rows: [], lineNumbers: [] };
    let headerSeen = false;

    for (const record of readRecords(removeBOM(data), this.options.delimiter, this.options.quote)) {
      if (this.options.skipEmptyLines && isBlankRecord(record.fields)) {
        continue;
      }

      if (!headerSeen) {
        table.header = dedupeHeaders(record.fields);
        headerSeen = true;
        continue;
      }

      table.rows.push(
        handleRaggedRow(
          record.fields,
          table.header.length,
          this.options.raggedRows,
          record.lineNumber
        )
      );
      table.lineNumbers.push(record.lineNumber);
    }

    return table;
  }
}

/**
 * CSVParser - Convenience class for CSV files
 */
export class CSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSVParser - Convenience class for TSV files
 */
export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
