/**
 * @module formats/dsv/validation
 * @description ArkType schema for DSV parser options
 */

import { type } from "arktype";

export const DSVParserOptionsSchema = type({
  "delimiter?": "string",
  "quote?": "string",
  "skipEmptyLines?": "boolean",
  "raggedRows?": '"pad"|"truncate"|"error"',
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (options.quote !== undefined && options.quote.length !== 1) {
    return ctx.reject({
      path: ["quote"],
      expected: "single character quote",
      actual: `${options.quote.length} characters`,
    });
  }

  if (options.quote !== undefined && options.quote === options.delimiter) {
    return ctx.reject({
      path: ["quote", "delimiter"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }

  return true;
});
