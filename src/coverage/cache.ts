/**
 * Average coverage with a per-(sample, target) YAML cache
 *
 * The cache is valid only while it is at least as new as the alignment and
 * the region set it was computed from; a stale or unreadable cache is treated
 * as empty and rewritten whole.
 *
 * @module coverage/cache
 */

import type { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { parse, stringify } from "yaml";
import { AVG_COVERAGE_KEY, QUERY_LENGTH_SAMPLE_SIZE } from "../constants";
import type { AnalysisContext } from "../context";
import type {
  AlignmentStatsError,
  CompressionError,
  DepthToolError,
  FileError,
} from "../errors";
import { ParseError, PreconditionError } from "../errors";
import { fileContigs, totalSize } from "../formats/fai";
import { readLines, readToString } from "../io/file-reader";
import { writeString } from "../io/file-writer";
import { isUpToDate } from "../io/freshness";
import { withFileTransaction } from "../io/transaction";
import { AlignmentStats } from "../services/alignment-stats";
import type { DepthTool } from "../services/depth-tool";
import type { CacheEntry, DepthFiles } from "../types";
import { CacheEntrySchema, isDepthTargetName } from "../types";
import { runDepth } from "./orchestrator";
import { cacheFilePath, transactionRoot } from "./paths";

export type AverageCoverageFailure =
  | AlignmentStatsError
  | CompressionError
  | DepthToolError
  | FileError
  | ParseError
  | PreconditionError;

export interface AverageCoverageOptions {
  /** Alignment to measure; defaults to the context's */
  readonly alignmentFile?: string;
  /** Depth outputs already computed for this sample */
  readonly depthFiles?: DepthFiles;
}

// =============================================================================
// CACHE FILE
// =============================================================================

/**
 * Cached statistics, or an empty entry when the file is missing, stale or
 * not a mapping of numbers
 */
export const readCache = (
  cacheFile: string,
  dependencies: readonly (string | undefined)[]
): Effect.Effect<CacheEntry, CompressionError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isUpToDate(cacheFile, dependencies))) {
      return {};
    }

    const text = yield* readToString(cacheFile);
    const document = yield* Effect.try((): unknown => parse(text)).pipe(
      Effect.catchAll((error) =>
        Effect.as(
          Effect.logWarning(`Ignoring unparsable cache ${cacheFile}: ${error.message}`),
          undefined
        )
      )
    );
    const entry = CacheEntrySchema(document ?? {});
    if (entry instanceof type.errors) {
      yield* Effect.logWarning(`Ignoring unreadable cache ${cacheFile}: ${entry.summary}`);
      return {};
    }
    return entry;
  });

/**
 * Replace the cache file with `cache`
 */
export const writeCache = (
  context: AnalysisContext,
  cacheFile: string,
  cache: CacheEntry
): Effect.Effect<void, CompressionError | FileError, FileSystem.FileSystem> =>
  withFileTransaction(transactionRoot(context), [cacheFile], (tx) =>
    writeString(tx.pathFor(cacheFile), stringify(cache))
  );

// =============================================================================
// AVERAGES
// =============================================================================

/**
 * Median with the two middle values averaged for even lengths; 0 when empty
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >>> 1;
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

/**
 * Length-weighted mean of the last column of per-region depth lines
 *
 * Lines starting with `#` are skipped. Returns 0 when no bases are covered.
 *
 * @throws {ParseError} On a line without coordinates and a depth value
 */
export function averageRegionDepth(lines: readonly string[]): number {
  let weighted = 0;
  let total = 0;

  lines.forEach((line, index) => {
    if (line.startsWith("#") || line.trim() === "") return;
    const tokens = line.trim().split(/\s+/);
    const start = Number(tokens[1]);
    const end = Number(tokens[2]);
    const depth = Number(tokens[tokens.length - 1]);
    if (tokens.length < 4 || [start, end, depth].some(Number.isNaN)) {
      throw new ParseError(
        "Expected chromosome, start, end and a trailing depth value",
        "regions",
        index + 1,
        line
      );
    }
    const size = end - start;
    weighted += depth * size;
    total += size;
  });

  return total > 0 ? weighted / total : 0;
}

/**
 * Per-region depth file for a target, reusing computed outputs when given
 */
export const regionsCoverage = (
  context: AnalysisContext,
  target: string,
  regionFile: string,
  depthFiles?: DepthFiles
): Effect.Effect<
  string,
  DepthToolError | FileError | PreconditionError,
  FileSystem.FileSystem | DepthTool
> =>
  Effect.gen(function* () {
    const ready = isDepthTargetName(target) ? depthFiles?.[target]?.regions : undefined;
    if (ready !== undefined) {
      return ready;
    }

    const bundle = yield* runDepth(context, target, regionFile);
    if (bundle.regions === undefined) {
      return yield* Effect.fail(
        new PreconditionError(`No per-region depth produced for ${target}`)
      );
    }
    return bundle.regions;
  });

/**
 * Mean depth over a region set
 */
export const averageBedCoverage = (
  context: AnalysisContext,
  target: string,
  regionFile: string,
  depthFiles?: DepthFiles
): Effect.Effect<number, AverageCoverageFailure, FileSystem.FileSystem | DepthTool> =>
  Effect.gen(function* () {
    const depthFile = yield* regionsCoverage(context, target, regionFile, depthFiles);
    const lines = yield* readLines(depthFile);
    return yield* Effect.try({
      try: () => averageRegionDepth(lines),
      catch: (error) =>
        error instanceof ParseError
          ? new ParseError(
              `${depthFile}: ${error.message}`,
              error.format,
              error.lineNumber,
              error.context
            )
          : new ParseError(String(error), "regions"),
    });
  });

/**
 * Genome-wide depth estimate: mapped reads times median read length over
 * the total length of every reference contig
 */
export const averageGenomeCoverage = (
  context: AnalysisContext,
  alignmentFile: string
): Effect.Effect<
  number,
  AverageCoverageFailure,
  FileSystem.FileSystem | AlignmentStats
> =>
  Effect.gen(function* () {
    const genomeSize = totalSize(yield* fileContigs(context.referenceFile));
    if (genomeSize <= 0) {
      return yield* Effect.fail(
        new PreconditionError(
          `Reference ${context.referenceFile} has zero total length`,
          "Cannot estimate genome-wide depth"
        )
      );
    }

    const stats = yield* AlignmentStats;
    const readCount = yield* stats.indexedMappedReads(alignmentFile);
    const lengths = yield* stats.sampleQueryLengths(alignmentFile, QUERY_LENGTH_SAMPLE_SIZE);
    return (readCount * median(lengths)) / genomeSize;
  });

/**
 * Truncated average coverage for a target, cached on disk
 *
 * Without a region file the genome-wide estimate is used.
 *
 * @example
 * ```typescript
 * const depth = yield* getAverageCoverage(context, "variant_regions", context.variantRegions);
 * ```
 */
export const getAverageCoverage = (
  context: AnalysisContext,
  target: string,
  regionFile: string | undefined,
  options: AverageCoverageOptions = {}
): Effect.Effect<
  number,
  AverageCoverageFailure,
  FileSystem.FileSystem | DepthTool | AlignmentStats
> =>
  Effect.gen(function* () {
    const alignmentFile = options.alignmentFile ?? context.alignmentFile;
    const cacheFile = cacheFilePath(context, target);
    const cache = yield* readCache(cacheFile, [alignmentFile, regionFile]);

    const cached = cache[AVG_COVERAGE_KEY];
    if (cached !== undefined) {
      return Math.trunc(cached);
    }

    const average =
      regionFile !== undefined
        ? yield* averageBedCoverage(context, target, regionFile, options.depthFiles)
        : yield* averageGenomeCoverage(context, alignmentFile);
    const truncated = Math.trunc(average);

    yield* writeCache(context, cacheFile, { ...cache, [AVG_COVERAGE_KEY]: truncated });
    return truncated;
  }).pipe(Effect.annotateLogs("sample", context.sampleName));
