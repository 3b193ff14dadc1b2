/**
 * Coverage regime classification
 *
 * Decides whether a sample is whole-genome, hybrid capture or amplicon from
 * the fraction of the genome its regions cover and, for targeted data, the
 * fraction of reads that fall outside the targets.
 *
 * @module coverage/classifier
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { GENOME_COV_THRESH, OFFTARGET_THRESH } from "../constants";
import type { AnalysisContext } from "../context";
import type {
  AlignmentStatsError,
  BedError,
  CompressionError,
  FileError,
  ParseError,
} from "../errors";
import { PreconditionError } from "../errors";
import { totalCoverageOfFile } from "../formats/bed";
import { usableGenomeSize } from "../formats/fai";
import { AlignmentStats } from "../services/alignment-stats";
import type { CoverageInterval } from "../types";

export interface AssignIntervalOptions {
  /** Callable regions, sized when the sample has no variant regions */
  readonly callableFile?: string;
}

/**
 * Regime from the genome fraction and, for targeted samples, the
 * off-target fraction. `undefined` off-target means no targets were given.
 */
export function classifyInterval(
  genomeCovPct: number,
  offtargetPct: number | undefined
): CoverageInterval {
  if (genomeCovPct > GENOME_COV_THRESH) return "genome";
  if (offtargetPct === undefined) return "regional";
  return offtargetPct > OFFTARGET_THRESH ? "regional" : "amplicon";
}

/**
 * Fraction of unique mapped reads outside the targets, 0 with no mapped reads
 */
export function offtargetFraction(mappedUnique: number, ontarget: number): number {
  if (mappedUnique <= 0) return 0;
  return Math.min(1, Math.max(0, (mappedUnique - ontarget) / mappedUnique));
}

/**
 * Off-target read fraction of the sample against `regionFile`
 *
 * Duplicates, secondary, QC-fail and unmapped reads are excluded from both
 * counts.
 */
export const countOfftarget = (
  context: AnalysisContext,
  regionFile: string
): Effect.Effect<number, AlignmentStatsError, AlignmentStats> =>
  Effect.gen(function* () {
    const stats = yield* AlignmentStats;
    const query = { alignmentFile: context.alignmentFile, threads: context.cores };
    const mappedUnique = yield* stats.countMappedReads(query);
    const ontarget = yield* stats.countMappedReads({ ...query, regionFile });
    return offtargetFraction(mappedUnique, ontarget);
  });

/**
 * Classify the sample once and record the regime on the context
 *
 * A context that already carries a regime is returned untouched.
 */
export const assignInterval = (
  context: AnalysisContext,
  options: AssignIntervalOptions = {}
): Effect.Effect<
  AnalysisContext,
  | AlignmentStatsError
  | BedError
  | CompressionError
  | FileError
  | ParseError
  | PreconditionError,
  FileSystem.FileSystem | AlignmentStats
> =>
  Effect.gen(function* () {
    if (context.coverageInterval !== undefined) {
      return context;
    }

    const regionsFile = context.variantRegions ?? options.callableFile;
    if (regionsFile === undefined) {
      return yield* Effect.fail(
        new PreconditionError(
          `Cannot classify coverage for ${context.sampleName}`,
          "Neither variant regions nor a callable file is available"
        )
      );
    }

    const callableSize = yield* totalCoverageOfFile(regionsFile);
    const genomeSize = yield* usableGenomeSize(context.referenceFile);
    const genomeCovPct = callableSize / genomeSize;

    const offtargetPct =
      genomeCovPct <= GENOME_COV_THRESH && context.variantRegions !== undefined
        ? yield* countOfftarget(context, context.variantRegions)
        : undefined;
    const interval = classifyInterval(genomeCovPct, offtargetPct);

    yield* Effect.logInfo(
      `${context.sampleName}: Assigned coverage as '${interval}' with ` +
        `${(genomeCovPct * 100).toFixed(1)}% genome coverage and ` +
        `${((offtargetPct ?? 0) * 100).toFixed(1)}% offtarget coverage`
    );
    context.assignCoverageInterval(interval);
    return context;
  });
