/**
 * CSV State Machine Module
 *
 * RFC 4180 record splitting over a whole document. Quoted fields may hold
 * delimiters, doubled quotes and line breaks; CRLF, LF and lone CR all end
 * a record outside quotes.
 */

import { DSVParseError } from "../../errors";
import { CSVParseState, type DSVRawRecord } from "./types";

/**
 * Split delimited text into records
 *
 * @param text - Complete document text
 * @param delimiter - Field delimiter
 * @param quote - Quote character; a doubled quote inside a quoted field is a literal quote
 * @throws {DSVParseError} when the text ends inside a quoted field
 */
export function* readRecords(
  text: string,
  delimiter: string = ",",
  quote: string = '"'
): Generator<DSVRawRecord> {
  let fields: string[] = [];
  let field = "";
  let state = CSVParseState.FIELD_START;
  let line = 1;
  let recordLine = 1;
  let i = 0;

  while (i < text.length) {
    const char = text[i];
    if (char === undefined) break;

    if (state === CSVParseState.QUOTED_FIELD) {
      if (char === quote) {
        if (text[i + 1] === quote) {
          field += quote;
          i += 2;
          continue;
        }
        state = CSVParseState.QUOTE_IN_QUOTED;
      } else {
        if (char === "\n" || (char === "\r" && text[i + 1] !== "\n")) line++;
        field += char;
      }
      i++;
      continue;
    }

    if (char === "\r" && text[i + 1] === "\n") {
      i++;
      continue;
    }

    if (char === "\n" || char === "\r") {
      fields.push(field);
      yield { fields, lineNumber: recordLine };
      fields = [];
      field = "";
      state = CSVParseState.FIELD_START;
      line++;
      recordLine = line;
    } else if (char === delimiter) {
      fields.push(field);
      field = "";
      state = CSVParseState.FIELD_START;
    } else if (char === quote && state === CSVParseState.FIELD_START) {
      state = CSVParseState.QUOTED_FIELD;
    } else {
      // Text after a closing quote is kept as part of the field
      field += char;
      state = CSVParseState.UNQUOTED_FIELD;
    }
    i++;
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in field", recordLine, fields.length + 1);
  }

  if (fields.length > 0 || field !== "" || state !== CSVParseState.FIELD_START) {
    fields.push(field);
    yield { fields, lineNumber: recordLine };
  }
}

/**
 * Split a single line into fields
 */
export function parseCSVRow(line: string, delimiter: string = ",", quote: string = '"'): string[] {
  const records = [...readRecords(line, delimiter, quote)];
  if (records.length > 1) {
    throw new DSVParseError("Expected a single record but found a line break", 1);
  }
  return records[0]?.fields ?? [];
}
