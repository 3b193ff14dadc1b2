/**
 * Core type definitions and ArkType validation schemas
 *
 * Types describe the per-sample inputs, the fixed depth targets and the
 * artifact bundle each target produces. Schemas validate anything that
 * crosses into the package from configuration or from disk.
 */

import { type } from "arktype";
import { DEPTH_TARGET_NAMES } from "./constants";

// =============================================================================
// COVERAGE REGIMES
// =============================================================================

/**
 * Coverage pattern of a sample
 *
 * - genome: unbiased whole-genome coverage
 * - regional: hybrid capture with off-target reads
 * - amplicon: targeted amplification without off-target reads
 */
export type CoverageInterval = "genome" | "regional" | "amplicon";

export const CoverageIntervalSchema = type("'genome' | 'regional' | 'amplicon'");

// =============================================================================
// DEPTH TARGETS
// =============================================================================

/** The fixed set of region sets depth is computed over */
export type DepthTargetName = (typeof DEPTH_TARGET_NAMES)[number];

export function isDepthTargetName(name: string): name is DepthTargetName {
  return DEPTH_TARGET_NAMES.some((target) => target === name);
}

/**
 * Quantization of per-base depth into labelled buckets
 *
 * Bucket `i` spans `[cutpoints[i], cutpoints[i + 1])`; the last bucket is
 * open-ended. `labels[i]` names bucket `i`.
 */
export interface QuantizeSpec {
  readonly cutpoints: readonly number[];
  readonly labels: readonly string[];
}

/**
 * One depth computation request
 *
 * A target without `regionFile` is skipped entirely.
 */
export interface DepthTargetSpec {
  readonly name: DepthTargetName;
  readonly regionFile?: string;
  readonly quantize?: QuantizeSpec;
  readonly thresholds?: readonly number[];
}

/**
 * Deterministic outputs of one depth tool invocation
 *
 * Optional members are present exactly when the matching input was
 * requested: per-base output, a region set, quantization, thresholds.
 */
export interface DepthArtifactBundle {
  /** Depth distribution, always produced */
  readonly dist: string;
  readonly perBase?: string;
  readonly regions?: string;
  readonly quantized?: string;
  readonly thresholds?: string;
}

/** Artifacts kept per target for downstream reporting */
export interface TargetDepthFiles {
  readonly dist: string;
  readonly regions?: string;
  readonly thresholds?: string;
}

export type DepthFiles = Partial<Record<DepthTargetName, TargetDepthFiles>>;

// =============================================================================
// REGIONS AND REFERENCE
// =============================================================================

/**
 * A BED record with its trailing columns kept verbatim
 *
 * Coordinates are 0-based, half-open.
 */
export interface BedRecord {
  readonly chromosome: string;
  readonly start: number;
  readonly end: number;
  /** Columns after `end`, e.g. name or depth value */
  readonly fields: readonly string[];
  readonly lineNumber?: number;
}

/** A reference sequence and its length */
export interface Contig {
  readonly name: string;
  readonly size: number;
}

// =============================================================================
// SETTINGS
// =============================================================================

export const SampleNameSchema = type("string>0").narrow((name, ctx) => {
  if (name.includes("/") || name.includes("\0")) {
    return ctx.reject({
      expected: "a sample name usable as a file name component",
      actual: JSON.stringify(name),
    });
  }
  return true;
});

/**
 * Per-sample settings accepted by {@link AnalysisContext.fromSettings}
 */
export const AnalysisSettingsSchema = type({
  sampleName: SampleNameSchema,
  referenceFile: "string>0",
  alignmentFile: "string>0",
  "variantRegions?": "string>0",
  "svRegions?": "string>0",
  "coverageRegions?": "string>0",
  workDir: "string>0",
  minCoverageDepth: "number>=1",
  cores: "number>=1",
  "coverageInterval?": CoverageIntervalSchema,
}).narrow((settings, ctx) => {
  if (!Number.isInteger(settings.minCoverageDepth)) {
    return ctx.reject({
      expected: "an integer depth",
      actual: String(settings.minCoverageDepth),
      path: ["minCoverageDepth"],
    });
  }
  if (!Number.isInteger(settings.cores)) {
    return ctx.reject({
      expected: "an integer core count",
      actual: String(settings.cores),
      path: ["cores"],
    });
  }
  return true;
});

export type AnalysisSettings = typeof AnalysisSettingsSchema.infer;

// =============================================================================
// CACHE
// =============================================================================

/** Scalar statistics persisted per (sample, target) */
export type CacheEntry = Record<string, number>;

export const CacheEntrySchema = type({ "[string]": "number" });
