/**
 * Table operations: load, filter, reduce, merge and the pipelines over them
 */

export { peptideMapFromRecord, peptideMapToRecord } from "./core/peptide-map";
export { cell, createTable, firstToken, requireColumns } from "./core/table";
export { type CombinedSources, extractCombined, extractPeptideData } from "./extract";
export { applyConditions, compileCondition, conditionEntries } from "./filter";
export { TableLoader, toUniprotUri, UNIPROT_URI_PREFIX } from "./load";
export { mergePeptideMaps } from "./merge";
export { distinctPairs, proteinCode, reduceToPeptideMap } from "./reduce";
