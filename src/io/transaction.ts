/**
 * Transactional file output
 *
 * Work is written into a scoped temporary directory and only renamed onto
 * the final paths once the body has succeeded. Final paths are moved in the
 * order given, so callers list the file other steps test for freshness last.
 * The temporary directory is removed whether the body succeeds or not.
 */

import { basename, join } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { exists } from "./file-reader";
import { ensureDirectory, moveFile } from "./file-writer";

export interface FileTransaction {
  /** Scoped temporary directory holding staged outputs */
  readonly directory: string;
  /** Staging path for a final output path */
  readonly pathFor: (finalPath: string) => string;
}

/**
 * Run `body` against staging paths and publish its outputs atomically
 *
 * @param txRoot - Directory that holds temporary transaction directories
 * @param finalPaths - Outputs to publish, in publication order
 * @param body - Writes every final path's staging counterpart
 *
 * @example
 * ```typescript
 * yield* withFileTransaction(txRoot, [outFile], (tx) =>
 *   writeString(tx.pathFor(outFile), content)
 * );
 * ```
 */
export const withFileTransaction = <A, E, R>(
  txRoot: string,
  finalPaths: readonly string[],
  body: (tx: FileTransaction) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | FileError, R | FileSystem.FileSystem> =>
  Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      yield* ensureDirectory(txRoot);
      const directory = yield* fs
        .makeTempDirectoryScoped({ directory: txRoot, prefix: "tx-" })
        .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", txRoot, error)));

      const tx: FileTransaction = {
        directory,
        pathFor: (finalPath) => join(directory, basename(finalPath)),
      };

      const result = yield* body(tx);

      for (const finalPath of finalPaths) {
        const staged = tx.pathFor(finalPath);
        if (!(yield* exists(staged))) {
          return yield* Effect.fail(
            new FileError(`Expected output was not produced: ${basename(finalPath)}`, staged, "rename")
          );
        }
      }
      for (const finalPath of finalPaths) {
        yield* moveFile(tx.pathFor(finalPath), finalPath);
      }
      return result;
    })
  );
