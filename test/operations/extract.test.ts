/**
 * End-to-end extraction tests over files on disk
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";
import { match, readConditionSpec } from "../../src";
import { InvalidConditionError, NotFoundError, SchemaError } from "../../src/errors";
import { extractCombined, extractPeptideData } from "../../src/operations/extract";

let dir: string;
const path = (name: string): string => join(dir, name);

const STRUCTURED_CONDITIONS = {
  Description: null,
  "Parent.Protein.IRI": null,
  Category: match("Tcell"),
};

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "epimap-extract-"));

  writeFileSync(
    path("iedb.csv"),
    [
      "Description,Parent.Protein.IRI,Category",
      "AAA mod1,http://x/uniprot/P12345,Tcell",
      "BBB,http://x/uniprot/P12345,Bcell",
    ].join("\n")
  );
  writeFileSync(
    path("iedb-wide.csv"),
    [
      "Description,Parent.Protein.IRI,Category,Host",
      "AAA mod1,http://x/uniprot/P12345,Tcell,Human",
      "BBB,http://x/uniprot/P12345,Bcell,Human",
      "EEE,http://x/uniprot/P55555,Tcell,Mouse",
      "GGG,,Tcell,Mouse",
      "AAA,http://x/uniprot/P12345,Tcell,Mouse",
    ].join("\n")
  );
  writeFileSync(path("generic.csv"), "peptide_sequence,uniprot_id\nCCC,P99999\n");
  writeFileSync(
    path("generic-override.csv.gz"),
    gzipSync("peptide_sequence,uniprot_id\nCCC,P99999\nZZZ,P12345\n")
  );
  writeFileSync(
    path("conditions.json"),
    JSON.stringify({
      Description: null,
      "Parent.Protein.IRI": null,
      Host: ["contains", "Mou"],
    })
  );
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

const quiet = { onProgress: () => {}, onWarning: () => {} };

describe("extractPeptideData", () => {
  test("structured source: load, filter, reduce", async () => {
    const onProgress = vi.fn();
    const result = await extractPeptideData(path("iedb.csv"), STRUCTURED_CONDITIONS, {
      onProgress,
    });

    expect(result).toEqual(new Map([["P12345", ["AAA"]]]));
    expect(onProgress.mock.calls.map(([message]) => message)).toEqual([
      "Extracting peptide data from structured export...",
      "Applying filtering conditions...",
      "Creating the peptide map...",
    ]);
  });

  test("generic source: load and reduce without filtering", async () => {
    const result = await extractPeptideData(path("generic.csv"), null, {
      ...quiet,
      structured: false,
    });
    expect(result).toEqual(new Map([["P99999", ["CCC"]]]));
  });

  test("rows missing a required value never reach the map", async () => {
    const onWarning = vi.fn();
    const result = await extractPeptideData(path("iedb-wide.csv"), STRUCTURED_CONDITIONS, {
      onProgress: () => {},
      onWarning,
    });

    expect(result).toEqual(
      new Map([
        ["P12345", ["AAA"]],
        ["P55555", ["EEE"]],
      ])
    );
    expect(onWarning).toHaveBeenCalledWith(
      `Dropped 1 of 5 rows with missing values in ${path("iedb-wide.csv")}`
    );
  });

  test("applies a condition spec read from JSON", async () => {
    const conditions = await readConditionSpec(path("conditions.json"));
    const result = await extractPeptideData(path("iedb-wide.csv"), conditions, quiet);

    expect(result).toEqual(
      new Map([
        ["P12345", ["AAA"]],
        ["P55555", ["EEE"]],
      ])
    );
  });

  test("structured sources require conditions", async () => {
    await expect(extractPeptideData(path("iedb.csv"), null, quiet)).rejects.toThrow(
      InvalidConditionError
    );
  });

  test("a condition column absent from the file raises SchemaError", async () => {
    await expect(
      extractPeptideData(path("iedb.csv"), { ...STRUCTURED_CONDITIONS, Assay: null }, quiet)
    ).rejects.toThrow(SchemaError);
  });

  test("a missing file raises NotFoundError", async () => {
    await expect(
      extractPeptideData(path("absent.csv"), STRUCTURED_CONDITIONS, quiet)
    ).rejects.toThrow(NotFoundError);
  });
});

describe("extractCombined", () => {
  test("the generic source overrides shared protein codes", async () => {
    const onProgress = vi.fn();
    const result = await extractCombined(
      {
        structured: { path: path("iedb-wide.csv"), conditions: STRUCTURED_CONDITIONS },
        generic: { path: path("generic-override.csv.gz") },
      },
      { onProgress, onWarning: () => {} }
    );

    expect([...result.keys()]).toEqual(["P12345", "P55555", "P99999"]);
    expect(result.get("P12345")).toEqual(["ZZZ"]);
    expect(result.get("P55555")).toEqual(["EEE"]);
    expect(result.get("P99999")).toEqual(["CCC"]);
    expect(onProgress).toHaveBeenLastCalledWith(
      "Merging peptide data from structured and generic sources..."
    );
  });

  test("fails without partial results when one source is missing", async () => {
    await expect(
      extractCombined(
        {
          structured: { path: path("iedb.csv"), conditions: STRUCTURED_CONDITIONS },
          generic: { path: path("absent.csv") },
        },
        quiet
      )
    ).rejects.toThrow(NotFoundError);
  });
});
