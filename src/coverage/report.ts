/**
 * Detailed per-region coverage outputs for QC reporting
 */

import { basename, join, resolve } from "node:path";
import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { DEPTH_THRESHOLDS } from "../constants";
import type { AnalysisContext } from "../context";
import type { CompressionError, FileError, ParseError, ValidationError } from "../errors";
import { PreconditionError } from "../errors";
import { exists } from "../io/file-reader";
import { copyWithIndexes } from "../io/file-writer";
import { isUpToDate } from "../io/freshness";
import type { DepthFiles, DepthTargetName } from "../types";
import { calculatePercentiles } from "./percentiles";

/**
 * Copy a target's per-region depth, distribution and threshold counts into
 * `outDir` and add the percentile summary
 *
 * Returns nothing when the target has no region file on disk. Otherwise the
 * absolute summary path comes first, followed by the copied files.
 */
export const coverageRegionDetailedStats = (
  context: AnalysisContext,
  target: DepthTargetName,
  regionFile: string | undefined,
  outDir: string,
  depthFiles: DepthFiles
): Effect.Effect<
  string[],
  CompressionError | FileError | ParseError | PreconditionError | ValidationError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    if (regionFile === undefined || !(yield* exists(regionFile))) {
      return [];
    }

    const ready = depthFiles[target];
    if (ready?.regions === undefined) {
      return yield* Effect.fail(
        new PreconditionError(
          `No per-region depth computed for ${target}`,
          `Sample ${context.sampleName}`
        )
      );
    }

    const copies = [ready.regions, ready.dist, ready.thresholds]
      .filter((path): path is string => path !== undefined)
      .map((source) => ({ source, copy: join(outDir, basename(source)) }));
    const regionsCopy = join(outDir, basename(ready.regions));
    if (!(yield* isUpToDate(regionsCopy, [ready.regions]))) {
      for (const { source, copy } of copies) {
        yield* copyWithIndexes(source, copy);
      }
    }

    const distCopy = join(outDir, basename(ready.dist));
    const summaries = yield* calculatePercentiles(context, distCopy, DEPTH_THRESHOLDS);
    return [...summaries.map((path) => resolve(path)), ...copies.map(({ copy }) => copy)];
  });
