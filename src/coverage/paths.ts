/**
 * Deterministic artifact naming
 *
 * Every path is a function of work directory, sample and target, so each
 * (sample, target) pair owns a disjoint set of files.
 */

import { extname, join } from "node:path";
import type { AnalysisContext } from "../context";
import type { DepthArtifactBundle } from "../types";

const COMPRESSED_EXTENSIONS = [".gz", ".bz2", ".zip"];

/**
 * Split a path into stem and extension, keeping compression suffixes
 * attached: `a.bed.gz` -> [`a`, `.bed.gz`]
 */
export function splitExtension(path: string): [string, string] {
  let ext = extname(path);
  let stem = path.slice(0, path.length - ext.length);
  if (COMPRESSED_EXTENSIONS.includes(ext)) {
    const inner = extname(stem);
    stem = stem.slice(0, stem.length - inner.length);
    ext = inner + ext;
  }
  return [stem, ext];
}

/**
 * Insert `word` between stem and extension
 */
export function appendStem(path: string, word: string): string {
  const [stem, ext] = splitExtension(path);
  return `${stem}${word}${ext}`;
}

export function coverageDirectory(context: AnalysisContext): string {
  return join(context.workDir, "coverage", context.sampleName);
}

export function alignDirectory(context: AnalysisContext): string {
  return join(context.workDir, "align", context.sampleName);
}

/** Parent of the scoped temporary directories used for transactional writes */
export function transactionRoot(context: AnalysisContext): string {
  return join(context.workDir, "tx");
}

export function depthPrefix(context: AnalysisContext, target: string): string {
  return join(coverageDirectory(context), `${context.sampleName}-${target}`);
}

export interface BundleRequest {
  readonly perBase: boolean;
  readonly regions: boolean;
  readonly quantize: boolean;
  readonly thresholds: boolean;
}

/**
 * Output paths the depth tool writes for `prefix`
 */
export function depthBundlePaths(prefix: string, request: BundleRequest): DepthArtifactBundle {
  return {
    dist: `${prefix}.mosdepth.dist.txt`,
    ...(request.perBase ? { perBase: `${prefix}.per-base.bed.gz` } : {}),
    ...(request.regions ? { regions: `${prefix}.regions.bed.gz` } : {}),
    ...(request.quantize ? { quantized: `${prefix}.quantized.bed.gz` } : {}),
    ...(request.thresholds ? { thresholds: `${prefix}.thresholds.bed.gz` } : {}),
  };
}

/**
 * Optional bundle members in publication order; `dist` is published last
 */
export function bundleOutputs(bundle: DepthArtifactBundle): string[] {
  const optional = [bundle.perBase, bundle.regions, bundle.quantized, bundle.thresholds];
  return [...optional.filter((path): path is string => path !== undefined), bundle.dist];
}

export function genomeRegionsPath(context: AnalysisContext): string {
  return join(coverageDirectory(context), "target-genome.bed");
}

export function cacheFilePath(context: AnalysisContext, target: string): string {
  return join(alignDirectory(context), `${context.sampleName}-coverage-${target}-stats.yaml`);
}

/** Fixed name downstream reporting collects the percentile summary under */
export function coverageSummaryName(context: AnalysisContext): string {
  return `${context.sampleName}_bcbio_coverage_avg.txt`;
}
