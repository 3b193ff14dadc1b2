/**
 * Production wiring of the external tools onto the Node platform
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Layer } from "effect";
import { getPlatform } from "./io/runtime";
import { AlignmentStats } from "./services/alignment-stats";
import { DepthTool } from "./services/depth-tool";

/** Services every coverage program may require */
export type CoverageServices = FileSystem.FileSystem | DepthTool | AlignmentStats;

/**
 * mosdepth and samtools from PATH, plus the Node file system
 */
export const CoverageLive = Layer.mergeAll(DepthTool.Mosdepth, AlignmentStats.Samtools).pipe(
  Layer.provideMerge(getPlatform())
);

/**
 * Run a coverage program against the live layer
 *
 * @example
 * ```typescript
 * const result = await runCoverage(runCoverageStage(context, "/work/qc/NA12878/coverage"));
 * ```
 */
export function runCoverage<A, E>(program: Effect.Effect<A, E, CoverageServices>): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(CoverageLive)));
}
