/**
 * Per-sample analysis context
 *
 * Holds the inputs one sample needs for this stage. Everything is readonly
 * except the coverage classification, which may be assigned once.
 */

import { type } from "arktype";
import { ContextStateError, ValidationError } from "./errors";
import type { AnalysisSettings, CoverageInterval } from "./types";
import { AnalysisSettingsSchema } from "./types";

export class AnalysisContext {
  readonly sampleName: string;
  readonly referenceFile: string;
  readonly alignmentFile: string;
  /** Merged variant/target regions; absent for whole-genome runs */
  readonly variantRegions: string | undefined;
  readonly svRegions: string | undefined;
  /** Explicit coverage-of-interest regions */
  readonly coverageRegions: string | undefined;
  readonly workDir: string;
  readonly minCoverageDepth: number;
  readonly cores: number;

  private interval: CoverageInterval | undefined;

  private constructor(settings: AnalysisSettings) {
    this.sampleName = settings.sampleName;
    this.referenceFile = settings.referenceFile;
    this.alignmentFile = settings.alignmentFile;
    this.variantRegions = settings.variantRegions;
    this.svRegions = settings.svRegions;
    this.coverageRegions = settings.coverageRegions;
    this.workDir = settings.workDir;
    this.minCoverageDepth = settings.minCoverageDepth;
    this.cores = settings.cores;
    this.interval = settings.coverageInterval;
  }

  /**
   * Build a context from untrusted settings
   *
   * @throws {ValidationError} When settings fail schema validation
   *
   * @example
   * ```typescript
   * const context = AnalysisContext.fromSettings({
   *   sampleName: "NA12878",
   *   referenceFile: "/refs/hg38.fa",
   *   alignmentFile: "/work/align/NA12878.bam",
   *   variantRegions: "/work/regions/NA12878-merged.bed",
   *   workDir: "/work",
   *   minCoverageDepth: 4,
   *   cores: 8,
   * });
   * ```
   */
  static fromSettings(settings: unknown): AnalysisContext {
    const validated = AnalysisSettingsSchema(settings);
    if (validated instanceof type.errors) {
      throw new ValidationError(`Invalid analysis settings: ${validated.summary}`);
    }
    return new AnalysisContext(validated);
  }

  get coverageInterval(): CoverageInterval | undefined {
    return this.interval;
  }

  /**
   * Record the sample's coverage regime
   *
   * @throws {ContextStateError} If a regime was already assigned
   */
  assignCoverageInterval(interval: CoverageInterval): void {
    if (this.interval !== undefined) {
      throw new ContextStateError(
        `Coverage interval for ${this.sampleName} is already '${this.interval}'`,
        this.sampleName,
        "coverageInterval"
      );
    }
    this.interval = interval;
  }
}
