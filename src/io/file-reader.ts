/**
 * File reading through the Effect platform FileSystem service
 *
 * Gzip input is recognised by its magic bytes and decompressed before
 * decoding, so `.csv.gz` exports load the same way as plain text.
 */

import { TextDecoder } from "node:util";
import { gunzipSync } from "node:zlib";
import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError, NotFoundError } from "../errors";

const GZIP_MAGIC = [0x1f, 0x8b] as const;

/**
 * Non-empty path without NUL bytes
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) =>
  path.includes("\0") ? ctx.reject({ expected: "a path without null characters" }) : true
);

export type PathKind = "file" | "directory" | "other" | "missing";

function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem>
): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
}

function validatePath(path: string): string {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file path: ${result.summary}`, path, "stat");
  }
  return result;
}

/**
 * Classify what, if anything, lives at a path
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function statPath(path: string): Promise<PathKind> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(validatedPath))) return "missing" as const;

    const info = yield* fs.stat(validatedPath);
    switch (info.type) {
      case "File":
        return "file" as const;
      case "Directory":
        return "directory" as const;
      default:
        return "other" as const;
    }
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check if a regular file exists at a path
 */
export async function exists(path: string): Promise<boolean> {
  return (await statPath(path)) === "file";
}

export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

/**
 * Read a whole file as UTF-8 text
 *
 * @throws {NotFoundError} If nothing exists at the path
 * @throws {FileError} If the path is not a file, cannot be read or holds corrupt gzip data
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);

  const kind = await statPath(validatedPath);
  if (kind === "missing") {
    throw new NotFoundError(validatedPath);
  }
  if (kind !== "file") {
    throw new FileError(`Not a regular file: ${validatedPath}`, validatedPath, "stat");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFile(validatedPath);
  });

  let bytes: Uint8Array;
  try {
    bytes = await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }

  if (isGzip(bytes)) {
    try {
      bytes = gunzipSync(bytes);
    } catch (error) {
      throw FileError.fromSystemError("decompress", validatedPath, error);
    }
  }

  return new TextDecoder("utf-8").decode(bytes);
}
