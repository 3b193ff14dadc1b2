/**
 * One sample's coverage stage: depth, classification, averages and reports
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { AnalysisContext } from "../context";
import type { AlignmentStatsError, ValidationError } from "../errors";
import { PreconditionError } from "../errors";
import type { AlignmentStats } from "../services/alignment-stats";
import type { DepthTool } from "../services/depth-tool";
import type { CoverageInterval, DepthFiles } from "../types";
import { getAverageCoverage } from "./cache";
import { assignInterval } from "./classifier";
import type { CoverageFailure } from "./orchestrator";
import { calculateCoverage } from "./orchestrator";
import { coverageRegionDetailedStats } from "./report";

export interface CoverageStageResult {
  readonly callableFile: string;
  readonly depthFiles: DepthFiles;
  readonly coverageInterval: CoverageInterval;
  /** Truncated mean depth over the variant regions, or genome-wide */
  readonly averageCoverage: number;
  /** Summary and copied depth files under the report directory */
  readonly reports: string[];
}

export const runCoverageStage = (
  context: AnalysisContext,
  reportDir: string
): Effect.Effect<
  CoverageStageResult,
  CoverageFailure | AlignmentStatsError | ValidationError,
  FileSystem.FileSystem | DepthTool | AlignmentStats
> =>
  Effect.gen(function* () {
    const { callableFile, depthFiles } = yield* calculateCoverage(context);
    yield* assignInterval(context, { callableFile });

    const averageCoverage = yield* getAverageCoverage(
      context,
      "variant_regions",
      context.variantRegions,
      { depthFiles }
    );
    const reports = yield* coverageRegionDetailedStats(
      context,
      "coverage",
      context.coverageRegions,
      reportDir,
      depthFiles
    );

    const coverageInterval = context.coverageInterval;
    if (coverageInterval === undefined) {
      return yield* Effect.fail(
        new PreconditionError(`Coverage regime was not assigned for ${context.sampleName}`)
      );
    }
    yield* Effect.logInfo(
      `${context.sampleName}: ${coverageInterval} coverage, average depth ${averageCoverage}`
    );
    return { callableFile, depthFiles, coverageInterval, averageCoverage, reports };
  });
