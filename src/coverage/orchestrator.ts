/**
 * Depth computation across the fixed per-sample targets
 *
 * Each target with a region set gets one depth tool run, skipped only when
 * every requested output is fresh against the alignment. Runs write into a
 * transaction directory and publish the distribution last, so a visible
 * distribution always means a complete bundle.
 *
 * @module coverage/orchestrator
 */

import { basename, join } from "node:path";
import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import {
  CALLABILITY_LABELS,
  DEPTH_EXCLUDE_FLAGS,
  DEPTH_THRESHOLDS,
  QUANTIZED_MIN_MAPQ,
} from "../constants";
import type { AnalysisContext } from "../context";
import type {
  BedError,
  CompressionError,
  DepthToolError,
  FileError,
  ParseError,
} from "../errors";
import { PreconditionError } from "../errors";
import { BedWriter } from "../formats/bed";
import { faiPath, fileContigs, noAltContigs } from "../formats/fai";
import { writeString } from "../io/file-writer";
import { isUpToDate } from "../io/freshness";
import { withFileTransaction } from "../io/transaction";
import { DepthTool } from "../services/depth-tool";
import type {
  DepthArtifactBundle,
  DepthFiles,
  DepthTargetName,
  DepthTargetSpec,
  QuantizeSpec,
  TargetDepthFiles,
} from "../types";
import {
  bundleOutputs,
  depthBundlePaths,
  depthPrefix,
  genomeRegionsPath,
  transactionRoot,
} from "./paths";
import { subsetToVariantRegions } from "./subset";

export interface RunDepthOptions {
  /** Also write per-base depth (default false) */
  readonly perBase?: boolean;
  readonly quantize?: QuantizeSpec;
  readonly thresholds?: readonly number[];
}

export interface CoverageResult {
  /** Callable regions restricted to the variant regions */
  readonly callableFile: string;
  readonly depthFiles: DepthFiles;
  readonly bundles: Partial<Record<DepthTargetName, DepthArtifactBundle>>;
}

export type CoverageFailure =
  | BedError
  | CompressionError
  | DepthToolError
  | FileError
  | ParseError
  | PreconditionError;

/**
 * Quantization into no coverage, low coverage and callable at `minDepth`
 */
export function callabilityQuantize(minDepth: number): QuantizeSpec {
  return { cutpoints: [0, 1, minDepth], labels: CALLABILITY_LABELS };
}

/**
 * The fixed targets in computation order
 *
 * `variantRegions` is the resolved region set for the sample, which for
 * whole-genome runs is the synthesized genome regions file.
 */
export function depthTargets(context: AnalysisContext, variantRegions: string): DepthTargetSpec[] {
  return [
    {
      name: "variant_regions",
      regionFile: variantRegions,
      quantize: callabilityQuantize(context.minCoverageDepth),
    },
    { name: "sv_regions", regionFile: context.svRegions },
    { name: "coverage", regionFile: context.coverageRegions, thresholds: DEPTH_THRESHOLDS },
  ];
}

/**
 * Run the depth tool for one target, or reuse its fresh outputs
 *
 * @param target - Target name; also names the output prefix
 * @param regionFile - Region set to summarize, if any
 */
export const runDepth = (
  context: AnalysisContext,
  target: string,
  regionFile: string | undefined,
  options: RunDepthOptions = {}
): Effect.Effect<
  DepthArtifactBundle,
  DepthToolError | FileError,
  FileSystem.FileSystem | DepthTool
> =>
  Effect.gen(function* () {
    const prefix = depthPrefix(context, target);
    const perBase = options.perBase ?? false;
    const thresholds =
      options.thresholds !== undefined && options.thresholds.length > 0
        ? [...options.thresholds].sort((a, b) => a - b)
        : undefined;
    const bundle = depthBundlePaths(prefix, {
      perBase,
      regions: regionFile !== undefined,
      quantize: options.quantize !== undefined,
      thresholds: thresholds !== undefined,
    });

    const current = yield* Effect.forEach(bundleOutputs(bundle), (path) =>
      isUpToDate(path, [context.alignmentFile])
    );
    if (current.every(Boolean)) {
      yield* Effect.logDebug(`Reusing depth outputs for ${target}`);
      return bundle;
    }

    const tool = yield* DepthTool;
    yield* withFileTransaction(transactionRoot(context), bundleOutputs(bundle), (tx) =>
      tool.run({
        alignmentFile: context.alignmentFile,
        prefix: join(tx.directory, basename(prefix)),
        threads: context.cores,
        excludeFlags: DEPTH_EXCLUDE_FLAGS,
        minMappingQuality:
          perBase || options.quantize !== undefined ? QUANTIZED_MIN_MAPQ : undefined,
        perBase,
        regionFile,
        quantize: options.quantize,
        thresholds,
        description: `mosdepth coverage calculation: ${target}`,
      })
    );
    return bundle;
  });

/**
 * Whole-genome region set over the reference's non-alt contigs
 *
 * Written once to `coverage/<sample>/target-genome.bed` and rebuilt only
 * when the reference index is newer.
 */
export const createGenomeRegions = (
  context: AnalysisContext
): Effect.Effect<
  string,
  CompressionError | FileError | ParseError | PreconditionError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const outFile = genomeRegionsPath(context);
    if (yield* isUpToDate(outFile, [faiPath(context.referenceFile)])) {
      return outFile;
    }

    const contigs = noAltContigs(yield* fileContigs(context.referenceFile));
    if (contigs.length === 0) {
      return yield* Effect.fail(
        new PreconditionError(
          `Reference ${context.referenceFile} has no usable contigs`,
          "Cannot build whole-genome regions"
        )
      );
    }

    const content = new BedWriter().formatRecords(
      contigs.map((contig) => ({
        chromosome: contig.name,
        start: 0,
        end: contig.size,
        fields: [],
      }))
    );
    yield* withFileTransaction(transactionRoot(context), [outFile], (tx) =>
      writeString(tx.pathFor(outFile), content)
    );
    return outFile;
  });

function keptFiles(bundle: DepthArtifactBundle): TargetDepthFiles {
  return {
    dist: bundle.dist,
    ...(bundle.regions !== undefined ? { regions: bundle.regions } : {}),
    ...(bundle.thresholds !== undefined ? { thresholds: bundle.thresholds } : {}),
  };
}

/**
 * Compute depth for every target of a sample
 *
 * Targets run sequentially in the fixed order; one without a region set is
 * skipped. The callable file is the variant-region quantized output
 * restricted to the variant regions.
 */
export const calculateCoverage = (
  context: AnalysisContext
): Effect.Effect<CoverageResult, CoverageFailure, FileSystem.FileSystem | DepthTool> =>
  Effect.gen(function* () {
    const variantRegions = context.variantRegions ?? (yield* createGenomeRegions(context));

    const depthFiles: DepthFiles = {};
    const bundles: Partial<Record<DepthTargetName, DepthArtifactBundle>> = {};
    let quantizedFile: string | undefined;

    for (const spec of depthTargets(context, variantRegions)) {
      if (spec.regionFile === undefined) {
        yield* Effect.logDebug(`No regions for ${spec.name}, skipping`);
        continue;
      }
      const bundle = yield* runDepth(context, spec.name, spec.regionFile, {
        quantize: spec.quantize,
        thresholds: spec.thresholds,
      });
      bundles[spec.name] = bundle;
      depthFiles[spec.name] = keptFiles(bundle);
      if (spec.name === "variant_regions") {
        quantizedFile = bundle.quantized;
      }
    }

    if (quantizedFile === undefined) {
      return yield* Effect.fail(
        new PreconditionError(`No callable regions computed for ${context.sampleName}`)
      );
    }

    const callableFile = yield* subsetToVariantRegions(context, quantizedFile, variantRegions);
    return { callableFile, depthFiles, bundles };
  }).pipe(Effect.annotateLogs("sample", context.sampleName));
