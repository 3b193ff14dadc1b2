/**
 * Numeric policy for coverage classification and depth computation
 */

/** Fraction of the genome covered above which a sample counts as whole-genome */
export const GENOME_COV_THRESH = 0.4;

/** Fraction of off-target reads above which targeted data is capture rather than amplicon */
export const OFFTARGET_THRESH = 0.01;

/** Depth ladder reported for the `coverage` target */
export const DEPTH_THRESHOLDS: readonly number[] = [
  1, 5, 10, 20, 50, 100, 250, 500, 1000, 5000, 10000, 50000,
];

/**
 * Reads skipped by the depth tool: unmapped (0x4), mate unmapped (0x8),
 * secondary (0x100), QC fail (0x200), duplicate (0x400)
 */
export const DEPTH_EXCLUDE_FLAGS = 1804;

/** Unmapped, secondary and QC-fail reads; the base filter for mapped-read counts */
export const MAPPED_EXCLUDE_FLAGS = 772;

/** SAM duplicate flag */
export const DUPLICATE_FLAG = 0x400;

/** Mapping-quality floor applied whenever per-base or quantized output is requested */
export const QUANTIZED_MIN_MAPQ = 1;

/** Upper bound on reads sampled to estimate the median read length */
export const QUERY_LENGTH_SAMPLE_SIZE = 100_000;

/** Callability bucket labels, indexed by quantize bucket */
export const CALLABILITY_LABELS = ["NO_COVERAGE", "LOW_COVERAGE", "CALLABLE"] as const;

/** Cache statistic holding the truncated average coverage */
export const AVG_COVERAGE_KEY = "avg_coverage";

/** Name of the synthetic genome-wide row in a depth distribution */
export const DIST_TOTAL_CONTIG = "total";

/** Header of the percentile summary table */
export const PERCENTILE_HEADER = ["cutoff_reads", "bases_pct", "sample"] as const;

/** Fixed depth targets, in computation order */
export const DEPTH_TARGET_NAMES = ["variant_regions", "sv_regions", "coverage"] as const;
