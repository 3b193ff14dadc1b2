/**
 * covergauge - sequencing depth and callability for one sample at a time
 *
 * Runs the depth tool over a sample's region sets, derives callable
 * regions, classifies the coverage regime and reports average depth and
 * depth percentiles. Programs are Effect values; run them with
 * {@link runCoverage} or provide your own layers.
 */

export {
  AVG_COVERAGE_KEY,
  CALLABILITY_LABELS,
  DEPTH_THRESHOLDS,
  DEPTH_TARGET_NAMES,
  GENOME_COV_THRESH,
  OFFTARGET_THRESH,
} from "./constants";
export { AnalysisContext } from "./context";
export {
  AlignmentStatsError,
  BedError,
  CompressionError,
  ContextStateError,
  CoverageError,
  DepthToolError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  PreconditionError,
  ValidationError,
} from "./errors";
export {
  BedParser,
  BedUtils,
  BedWriter,
  intersect,
  mergeOverlapping,
  readBedFile,
  totalCoverage,
} from "./formats/bed";
export { fileContigs, isAltContig, noAltContigs, parseFai } from "./formats/fai";
export { isFresh, isUpToDate } from "./io/freshness";
export { type FileTransaction, withFileTransaction } from "./io/transaction";
export {
  type AverageCoverageOptions,
  averageBedCoverage,
  averageGenomeCoverage,
  getAverageCoverage,
  readCache,
  regionsCoverage,
  writeCache,
} from "./coverage/cache";
export {
  type AssignIntervalOptions,
  assignInterval,
  classifyInterval,
  countOfftarget,
} from "./coverage/classifier";
export {
  type CoverageResult,
  calculateCoverage,
  createGenomeRegions,
  depthTargets,
  type RunDepthOptions,
  runDepth,
} from "./coverage/orchestrator";
export { calculatePercentiles } from "./coverage/percentiles";
export { coverageRegionDetailedStats } from "./coverage/report";
export { type CoverageStageResult, runCoverageStage } from "./coverage/stage";
export { subsetToVariantRegions } from "./coverage/subset";
export { type CoverageServices, CoverageLive, runCoverage } from "./layers";
export {
  AlignmentStats,
  type AlignmentStatsShape,
  type MappedReadQuery,
} from "./services/alignment-stats";
export { type DepthInvocation, DepthTool, type DepthToolShape } from "./services/depth-tool";
export type {
  AnalysisSettings,
  BedRecord,
  CacheEntry,
  Contig,
  CoverageInterval,
  DepthArtifactBundle,
  DepthFiles,
  DepthTargetName,
  DepthTargetSpec,
  QuantizeSpec,
  TargetDepthFiles,
} from "./types";
