/**
 * File writing operations using Effect Platform
 *
 * Writes compress automatically when the target ends in `.gz`. Callers that
 * need atomic replacement write through {@link withFileTransaction} instead
 * of writing final paths directly.
 *
 * @module file-writer
 */

import { dirname } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { compress, isGzipPath } from "../compression/gzip";
import { CompressionError, FileError } from "../errors";

export interface WriteOptions {
  /** Gzip `.gz` targets (default true) */
  readonly autoCompress?: boolean;
}

/**
 * Create a directory and its parents if missing
 */
export const ensureDirectory = (
  path: string
): Effect.Effect<string, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path, { recursive: true });
    return path;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)));

/**
 * Write string to file (overwrites if exists, creates parent directories)
 *
 * @example
 * ```typescript
 * yield* writeString("sample-target-genome.bed", "chr1\t0\t248956422\n");
 * ```
 */
export const writeString = (
  path: string,
  content: string,
  options: WriteOptions = {}
): Effect.Effect<void, FileError | CompressionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const encoded = new TextEncoder().encode(content);
    const autoCompress = options.autoCompress ?? true;
    const data =
      autoCompress && isGzipPath(path)
        ? yield* Effect.try({
            try: () => compress(encoded),
            catch: (error) =>
              error instanceof CompressionError
                ? error
                : CompressionError.fromSystemError("compress", error),
          })
        : encoded;

    yield* ensureDirectory(dirname(path));
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFile(path, data)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
  });

/**
 * Move a file into place, creating the destination directory
 */
export const moveFile = (
  from: string,
  to: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* ensureDirectory(dirname(to));
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .rename(from, to)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("rename", from, error)));
  });

/** Index companions copied alongside a data file */
const INDEX_SUFFIXES = [".tbi", ".csi"] as const;

/**
 * Copy a file together with any tabix/CSI index beside it
 */
export const copyWithIndexes = (
  from: string,
  to: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* ensureDirectory(dirname(to));
    const fs = yield* FileSystem.FileSystem;
    for (const suffix of ["", ...INDEX_SUFFIXES]) {
      const source = `${from}${suffix}`;
      if (suffix !== "" && !(yield* fs.exists(source))) continue;
      yield* fs.copyFile(source, `${to}${suffix}`);
    }
  }).pipe(
    Effect.mapError((error) =>
      error instanceof FileError ? error : FileError.fromSystemError("copy", from, error)
    )
  );
