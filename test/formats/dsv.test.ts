/**
 * DSV Format Parser Tests
 *
 * RFC 4180 quoting, multi-line fields, header handling and ragged rows.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { DSVParseError, ValidationError } from "../../src/errors";
import {
  CSVParser,
  DSVParser,
  dedupeHeaders,
  parseCSVRow,
  readRecords,
  removeBOM,
  TSVParser,
} from "../../src/formats/dsv";

describe("DSV Format Module", () => {
  describe("parseCSVRow", () => {
    test("splits plain fields", () => {
      expect(parseCSVRow("a,b,c")).toEqual(["a", "b", "c"]);
    });

    test("keeps delimiters inside quoted fields", () => {
      expect(parseCSVRow('a,"b,c",d')).toEqual(["a", "b,c", "d"]);
    });

    test("unescapes doubled quotes", () => {
      expect(parseCSVRow('x,"say ""hi"""')).toEqual(["x", 'say "hi"']);
    });

    test("trailing delimiter yields an empty final field", () => {
      expect(parseCSVRow("a,")).toEqual(["a", ""]);
    });

    test("leading delimiter yields an empty first field", () => {
      expect(parseCSVRow(",b")).toEqual(["", "b"]);
    });

    test("honours a custom delimiter", () => {
      expect(parseCSVRow("a;b,c", ";")).toEqual(["a", "b,c"]);
    });
  });

  describe("readRecords", () => {
    test("quoted fields may span lines", () => {
      const records = [...readRecords('id,note\n1,"line one\nline two"\n2,plain\n')];

      expect(records).toEqual([
        { fields: ["id", "note"], lineNumber: 1 },
        { fields: ["1", "line one\nline two"], lineNumber: 2 },
        { fields: ["2", "plain"], lineNumber: 4 },
      ]);
    });

    test("treats CRLF as a single line break", () => {
      const records = [...readRecords("a,b\r\n1,2\r\n")].map((r) => r.fields);
      expect(records).toEqual([
        ["a", "b"],
        ["1", "2"],
      ]);
    });

    test("reads a last record without a trailing newline", () => {
      const records = [...readRecords("a\n1")].map((r) => r.fields);
      expect(records).toEqual([["a"], ["1"]]);
    });

    test("rejects an unclosed quote", () => {
      expect(() => [...readRecords('a\n"open')]).toThrow(DSVParseError);
    });
  });

  describe("DSVParser", () => {
    test("maps rows under the header", () => {
      const table = new CSVParser().parseString("id,name\n1,x\n2,y\n");

      expect(table.header).toEqual(["id", "name"]);
      expect(table.rows).toEqual([
        ["1", "x"],
        ["2", "y"],
      ]);
      expect(table.lineNumbers).toEqual([2, 3]);
    });

    test("suffixes repeated header names", () => {
      const table = new CSVParser().parseString("id,id,name\n1,2,x\n");
      expect(table.header).toEqual(["id", "id.1", "name"]);
    });

    test("keeps header names as written", () => {
      const table = new CSVParser().parseString(" id , name\n1,x\n");
      expect(table.header).toEqual([" id ", " name"]);
    });

    test("strips a byte order mark", () => {
      const table = new CSVParser().parseString("\uFEFFa,b\n1,2");
      expect(table.header).toEqual(["a", "b"]);
      expect(table.rows).toEqual([["1", "2"]]);
    });

    test("skips blank lines", () => {
      const table = new CSVParser().parseString("a\n\n1\n");
      expect(table.rows).toEqual([["1"]]);
      expect(table.lineNumbers).toEqual([3]);
    });

    test("pads short rows by default", () => {
      const table = new CSVParser().parseString("a,b,c\n1\n");
      expect(table.rows).toEqual([["1", "", ""]]);
    });

    test("leaves long rows intact when padding", () => {
      const table = new CSVParser().parseString("a,b\n1,2,3\n");
      expect(table.rows).toEqual([["1", "2", "3"]]);
    });

    test("truncates long rows on request", () => {
      const table = new CSVParser({ raggedRows: "truncate" }).parseString("a,b\n1,2,3\n");
      expect(table.rows).toEqual([["1", "2"]]);
    });

    test("rejects ragged rows in error mode", () => {
      const parser = new CSVParser({ raggedRows: "error" });
      expect(() => parser.parseString("a,b\n1,2,3\n")).toThrow(DSVParseError);
    });

    test("returns an empty table for empty input", () => {
      expect(new CSVParser().parseString("")).toEqual({ header: [], rows: [], lineNumbers: [] });
    });

    test("TSVParser splits on tabs", () => {
      const parser = new TSVParser();
      expect(parser.getFormatName()).toBe("TSV");
      expect(parser.parseString("a\tb\n1,5\t2\n").rows).toEqual([["1,5", "2"]]);
    });

    test("rejects a multi-character delimiter", () => {
      expect(() => new DSVParser({ delimiter: ";;" })).toThrow(ValidationError);
    });

    test("rejects a quote equal to the delimiter", () => {
      expect(() => new DSVParser({ delimiter: "|", quote: "|" })).toThrow(ValidationError);
    });
  });

  describe("utilities", () => {
    test("removeBOM only strips a leading BOM", () => {
      expect(removeBOM("\uFEFFabc")).toBe("abc");
      expect(removeBOM("abc")).toBe("abc");
    });

    test("dedupeHeaders avoids clashing with existing suffixed names", () => {
      expect(dedupeHeaders(["a", "a", "a.1"])).toEqual(["a", "a.1", "a.1.1"]);
    });
  });
});

describe("DSVParser.parseFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "epimap-dsv-"));
    writeFileSync(join(dir, "epitopes.tsv"), "peptide_sequence\tuniprot_id\nCCC\tP1\n");
    writeFileSync(
      join(dir, "epitopes.csv.gz"),
      gzipSync('peptide_sequence,uniprot_id\n"CCC, mod",P1\nDDD,P2\n')
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads a plain file", async () => {
    const table = await new TSVParser().parseFile(join(dir, "epitopes.tsv"));
    expect(table.header).toEqual(["peptide_sequence", "uniprot_id"]);
    expect(table.rows).toEqual([["CCC", "P1"]]);
  });

  test("decompresses a gzipped file", async () => {
    const table = await new CSVParser().parseFile(join(dir, "epitopes.csv.gz"));
    expect(table.header).toEqual(["peptide_sequence", "uniprot_id"]);
    expect(table.rows).toEqual([
      ["CCC, mod", "P1"],
      ["DDD", "P2"],
    ]);
    expect(table.lineNumbers).toEqual([2, 3]);
  });
});
