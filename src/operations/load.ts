/**
 * TableLoader - Read epitope exports into row tables
 *
 * Structured (IEDB-style) exports load only the requested columns and have
 * their description and protein-IRI columns renamed to the canonical
 * `peptide_sequence` / `uniprot_id`. Generic exports load every column and
 * have bare accessions in `uniprot_id` expanded to UniProt URIs. Either way,
 * rows with a missing value in any loaded column are dropped.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { DEFAULT_NA_VALUES, DSVParser, type DSVTable } from "../formats/dsv";
import { readToString } from "../io/file-reader";
import {
  type LoadRequest,
  PEPTIDE_COLUMN,
  PROTEIN_COLUMN,
  type Row,
  type RowTable,
  type TableLoaderOptions,
  TableLoaderOptionsSchema,
} from "../types";
import { createTable, firstToken, requireColumns } from "./core/table";

export const UNIPROT_URI_PREFIX = "http://www.uniprot.org/uniprot/";

const DEFAULT_DESCRIPTION_COLUMN = "Description";
const DEFAULT_PROTEIN_COLUMN = "Parent.Protein.IRI";

/**
 * Canonical URI form of a generic-export protein identifier
 *
 * The value is trimmed and cut to its first whitespace-delimited token. A
 * token containing "/" is already a URI and is kept; anything else is an
 * accession and is wrapped in the UniProt URI prefix. Returns null when the
 * value holds no token.
 *
 * @example
 * ```typescript
 * toUniprotUri("P99999"); // "http://www.uniprot.org/uniprot/P99999"
 * toUniprotUri("https://purl.uniprot.org/uniprot/Q1"); // unchanged
 * ```
 */
export function toUniprotUri(value: string): string | null {
  const token = firstToken(value);
  if (token === "") {
    return null;
  }
  if (token.includes("/")) {
    return token;
  }
  return `${UNIPROT_URI_PREFIX}${token}`;
}

/**
 * Loader for structured and generic epitope exports
 *
 * @example
 * ```typescript
 * const loader = new TableLoader();
 * const table = await loader.load("epitopes.csv", {
 *   mode: "structured",
 *   columns: ["Description", "Parent.Protein.IRI", "Host"],
 * });
 * ```
 */
export class TableLoader {
  private readonly parser: DSVParser;
  private readonly naValues: ReadonlySet<string>;
  private readonly descriptionColumn: string;
  private readonly proteinColumn: string;
  private readonly onWarning: (warning: string) => void;

  constructor(options: TableLoaderOptions = {}) {
    const validation = TableLoaderOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid table loader options: ${validation.summary}`);
    }

    this.parser = new DSVParser({
      delimiter: options.delimiter ?? ",",
      raggedRows: options.raggedRows ?? "pad",
    });
    this.naValues = new Set(options.naValues ?? DEFAULT_NA_VALUES);
    this.descriptionColumn = options.descriptionColumn ?? DEFAULT_DESCRIPTION_COLUMN;
    this.proteinColumn = options.proteinColumn ?? DEFAULT_PROTEIN_COLUMN;
    this.onWarning =
      options.onWarning ??
      ((warning: string): void => {
        console.warn(`TableLoader Warning: ${warning}`);
      });
  }

  /**
   * Load a delimited file
   *
   * @throws {NotFoundError} If the path does not exist
   * @throws {SchemaError} If a requested or required column is absent
   */
  async load(path: string, request: LoadRequest): Promise<RowTable> {
    const text = await readToString(path);
    return this.loadString(text, request, path);
  }

  /**
   * Load delimited text already in memory
   *
   * @param source - Name used in error and warning messages
   */
  loadString(text: string, request: LoadRequest, source: string = "input"): RowTable {
    const parsed = this.parser.parseString(text);

    const table =
      request.mode === "structured"
        ? this.selectStructured(parsed, request.columns, source)
        : this.selectGeneric(parsed, source);

    return this.dropMissing(table, source);
  }

  private selectStructured(
    parsed: DSVTable,
    requested: readonly string[],
    source: string
  ): PendingTable {
    const columns = [...new Set(requested)];
    requireColumns(parsed.header, columns, source);
    requireColumns(columns, [this.descriptionColumn, this.proteinColumn], "requested columns");

    const renamed = columns.map((column) => this.canonicalName(column));
    const clashes = renamed.filter((name, i) => renamed.indexOf(name) !== i);
    if (clashes.length > 0) {
      throw new ValidationError(
        `Requested columns collide after renaming: ${[...new Set(clashes)].join(", ")}`
      );
    }

    const indices = columns.map((column) => parsed.header.indexOf(column));
    const rows = parsed.rows.map((fields) =>
      columns.map((column, i) => {
        const raw = fields[indices[i] ?? -1] ?? "";
        return this.isMissing(raw) ? null : this.transformStructured(column, raw);
      })
    );

    return { columns: renamed, rows };
  }

  private selectGeneric(parsed: DSVTable, source: string): PendingTable {
    requireColumns(parsed.header, [PEPTIDE_COLUMN, PROTEIN_COLUMN], source);

    const rows = parsed.rows.map((fields) =>
      parsed.header.map((column, i) => {
        const raw = fields[i] ?? "";
        if (this.isMissing(raw)) return null;
        return column === PROTEIN_COLUMN ? toUniprotUri(raw) : raw;
      })
    );

    return { columns: [...parsed.header], rows };
  }

  private canonicalName(column: string): string {
    if (column === this.descriptionColumn) return PEPTIDE_COLUMN;
    if (column === this.proteinColumn) return PROTEIN_COLUMN;
    return column;
  }

  private transformStructured(column: string, raw: string): string | null {
    if (column !== this.descriptionColumn) return raw;
    // Modified peptides carry their modification after the sequence
    const peptide = firstToken(raw);
    return peptide === "" ? null : peptide;
  }

  private isMissing(raw: string): boolean {
    return this.naValues.has(raw);
  }

  /**
   * Keep rows with a value in every column; positions are renumbered by
   * construction since rows are a dense array
   */
  private dropMissing(table: PendingTable, source: string): RowTable {
    const rows: Row[] = [];

    for (const values of table.rows) {
      if (values.every((value) => value !== null)) {
        rows.push(Object.fromEntries(table.columns.map((column, i) => [column, values[i] ?? ""])));
      }
    }

    const dropped = table.rows.length - rows.length;
    if (dropped > 0) {
      this.onWarning(
        `Dropped ${dropped} of ${table.rows.length} rows with missing values in ${source}`
      );
    }

    return createTable(table.columns, rows);
  }
}

/** Rows after column selection; null marks a missing cell */
interface PendingTable {
  columns: string[];
  rows: Array<Array<string | null>>;
}
