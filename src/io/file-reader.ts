/**
 * File reading operations using Effect Platform
 *
 * Every helper requires the platform `FileSystem` service and maps platform
 * failures to {@link FileError}, so callers deal with one error family.
 * Gzip files are decompressed transparently, detected by extension.
 *
 * @module file-reader
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { decompress, isGzipPath } from "../compression/gzip";
import { CompressionError, FileError } from "../errors";

/**
 * Check that a path exists and is a regular file
 */
export const exists = (path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(path);
    if (!pathExists) return false;

    const info = yield* fs.stat(path);
    return info.type === "File";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));

/**
 * Modification time of a file, or undefined when it does not exist
 */
export const modifiedTime = (
  path: string
): Effect.Effect<Date | undefined, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return undefined;

    const info = yield* fs.stat(path);
    return Option.getOrUndefined(info.mtime);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));

/**
 * Read a whole file, decompressing `.gz` content
 */
export const readBytes = (
  path: string
): Effect.Effect<Uint8Array, FileError | CompressionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const raw = yield* fs
      .readFile(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));

    if (!isGzipPath(path)) {
      return raw;
    }
    return yield* Effect.try({
      try: () => decompress(raw),
      catch: (error) =>
        error instanceof CompressionError
          ? error
          : CompressionError.fromSystemError("decompress", error),
    });
  });

/**
 * Read a whole file as UTF-8 text
 */
export const readToString = (
  path: string
): Effect.Effect<string, FileError | CompressionError, FileSystem.FileSystem> =>
  Effect.map(readBytes(path), (bytes) => new TextDecoder().decode(bytes));

/**
 * Read a text file as lines, without line terminators or a trailing empty line
 */
export const readLines = (
  path: string
): Effect.Effect<string[], FileError | CompressionError, FileSystem.FileSystem> =>
  Effect.map(readToString(path), (text) => {
    const lines = text.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }
    return lines;
  });
