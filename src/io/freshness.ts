/**
 * Timestamp-based freshness of derived files
 *
 * A derived file is up to date when it exists, every dependency exists, and
 * its modification time is not older than any dependency's. This is the
 * only place that comparison is made.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { modifiedTime } from "./file-reader";

/**
 * Pure freshness rule over already-read modification times
 *
 * `undefined` stands for a missing file. With no dependencies only
 * existence of the target matters.
 */
export function isFresh(
  target: Date | undefined,
  dependencies: readonly (Date | undefined)[]
): boolean {
  if (target === undefined) return false;
  return dependencies.every(
    (dependency) => dependency !== undefined && target.getTime() >= dependency.getTime()
  );
}

/**
 * Check a file on disk against its dependencies
 *
 * Dependencies given as `undefined` are ignored, so optional inputs can be
 * passed straight through.
 */
export const isUpToDate = (
  path: string,
  dependencies: readonly (string | undefined)[]
): Effect.Effect<boolean, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const target = yield* modifiedTime(path);
    if (target === undefined) return false;

    const declared = dependencies.filter((dep): dep is string => dep !== undefined);
    const stamps = yield* Effect.forEach(declared, (dep) => modifiedTime(dep));
    return isFresh(target, stamps);
  });
