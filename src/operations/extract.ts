/**
 * Extraction pipelines: load → filter → reduce, and the two-source merge
 *
 * @example
 * ```typescript
 * const peptides = await extractCombined({
 *   structured: {
 *     path: "epitope_full_v3.csv",
 *     conditions: {
 *       Description: null,
 *       "Parent.Protein.IRI": null,
 *       "Assay Group": match("qualitative binding"),
 *     },
 *   },
 *   generic: { path: "other_db.csv" },
 * });
 * ```
 */

import { InvalidConditionError } from "../errors";
import type { ConditionEntries, ConditionSpec, ExtractOptions, PeptideMap } from "../types";
import { applyConditions, conditionEntries } from "./filter";
import { TableLoader } from "./load";
import { mergePeptideMaps } from "./merge";
import { reduceToPeptideMap } from "./reduce";

export interface CombinedSources {
  structured: { path: string; conditions: ConditionSpec | ConditionEntries };
  generic: { path: string };
}

function defaultProgress(message: string): void {
  console.log(`---> ${message}`);
}

/**
 * Extract one source into a peptide map
 *
 * Structured sources (the default) load exactly the columns the conditions
 * name and are filtered by them; generic sources load every column and are
 * not filtered, so `conditions` may be `null` for them.
 *
 * @throws {NotFoundError} If the path does not exist
 * @throws {SchemaError} If a required or requested column is absent
 * @throws {InvalidConditionError} If a condition is malformed, or a
 * structured source has no conditions
 */
export async function extractPeptideData(
  path: string,
  conditions: ConditionSpec | ConditionEntries | null,
  options: ExtractOptions = {}
): Promise<PeptideMap> {
  const { structured = true, onProgress = defaultProgress, ...loaderOptions } = options;
  const loader = new TableLoader(loaderOptions);

  if (!structured) {
    onProgress("Extracting peptide data from generic export...");
    const table = await loader.load(path, { mode: "generic" });
    onProgress("Creating the peptide map...");
    return reduceToPeptideMap(table);
  }

  if (conditions === null) {
    throw new InvalidConditionError("Structured sources need a condition spec naming the columns to load");
  }

  const entries = conditionEntries(conditions);
  onProgress("Extracting peptide data from structured export...");
  const table = await loader.load(path, {
    mode: "structured",
    columns: entries.map(([column]) => column),
  });

  onProgress("Applying filtering conditions...");
  const filtered = applyConditions(table, entries);

  onProgress("Creating the peptide map...");
  return reduceToPeptideMap(filtered);
}

/**
 * Extract both sources and merge; the generic source's lists win on shared
 * protein codes
 */
export async function extractCombined(
  sources: CombinedSources,
  options: Omit<ExtractOptions, "structured"> = {}
): Promise<PeptideMap> {
  const onProgress = options.onProgress ?? defaultProgress;

  const base = await extractPeptideData(sources.structured.path, sources.structured.conditions, {
    ...options,
    structured: true,
  });
  const override = await extractPeptideData(sources.generic.path, null, {
    ...options,
    structured: false,
  });

  onProgress("Merging peptide data from structured and generic sources...");
  return mergePeptideMaps(base, override);
}
