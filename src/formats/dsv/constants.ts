/**
 * DSV Format Constants
 */

export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Cell values read as missing, the usual dataframe NA tokens
 */
export const DEFAULT_NA_VALUES: readonly string[] = [
  "",
  "#N/A",
  "#N/A N/A",
  "#NA",
  "-1.#IND",
  "-1.#QNAN",
  "-NaN",
  "-nan",
  "1.#IND",
  "1.#QNAN",
  "<NA>",
  "N/A",
  "NA",
  "NULL",
  "NaN",
  "None",
  "n/a",
  "nan",
  "null",
];
