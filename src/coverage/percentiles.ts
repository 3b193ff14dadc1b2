/**
 * Percent of bases at or above depth cutoffs
 *
 * Reads the `total` rows of a depth distribution (`contig  depth  fraction`)
 * and writes a small table keyed `percentage<depth>`, then publishes it
 * under the fixed summary name reporting collects.
 *
 * @module coverage/percentiles
 */

import { dirname, join } from "node:path";
import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { DIST_TOTAL_CONTIG, PERCENTILE_HEADER } from "../constants";
import type { AnalysisContext } from "../context";
import type { CompressionError, FileError } from "../errors";
import { ParseError, ValidationError } from "../errors";
import { exists, readLines } from "../io/file-reader";
import { copyWithIndexes, writeString } from "../io/file-writer";
import { withFileTransaction } from "../io/transaction";
import { appendStem, coverageSummaryName, transactionRoot } from "./paths";

export interface DistributionRow {
  readonly contig: string;
  readonly depth: number;
  /** Fraction of bases with at least `depth` */
  readonly fraction: number;
}

/**
 * @throws {ParseError} On a line that is not three whitespace-separated columns
 */
export function parseDistribution(lines: readonly string[]): DistributionRow[] {
  const rows: DistributionRow[] = [];
  lines.forEach((line, index) => {
    if (line.trim() === "") return;
    const [contig, depth, fraction, ...rest] = line.trim().split(/\s+/);
    const row = { contig: contig ?? "", depth: Number(depth), fraction: Number(fraction) };
    if (rest.length > 0 || Number.isNaN(row.depth) || Number.isNaN(row.fraction)) {
      throw new ParseError("Expected contig, depth and fraction", "distribution", index + 1, line);
    }
    rows.push(row);
  });
  return rows;
}

function formatPercent(fraction: number): string {
  return (fraction * 100).toFixed(1);
}

/**
 * Summary rows for `cutoffs`
 *
 * One row per `total` depth within the cutoff range. When even the lowest
 * observed depth lies above the smallest cutoff, a row for that cutoff
 * carries the lowest depth's fraction.
 *
 * @throws {ValidationError} When `cutoffs` is empty
 */
export function percentileRows(
  rows: readonly DistributionRow[],
  cutoffs: readonly number[],
  sample: string
): string[][] {
  if (cutoffs.length === 0) {
    throw new ValidationError("At least one depth cutoff is required");
  }
  const low = Math.min(...cutoffs);
  const high = Math.max(...cutoffs);

  const out: string[][] = [];
  let lowest: DistributionRow | undefined;
  for (const row of rows) {
    if (row.contig !== DIST_TOTAL_CONTIG) continue;
    if (row.depth >= low && row.depth <= high) {
      out.push([`percentage${row.depth}`, formatPercent(row.fraction), sample]);
    }
    if (lowest === undefined || row.depth < lowest.depth) {
      lowest = row;
    }
  }
  if (lowest !== undefined && lowest.depth > low) {
    out.push([`percentage${low}`, formatPercent(lowest.fraction), sample]);
  }
  return out;
}

/**
 * Write the percentile summary for a distribution file
 *
 * Returns the fixed-name copy, or nothing when the distribution is missing.
 * An existing summary is reused as is.
 */
export const calculatePercentiles = (
  context: AnalysisContext,
  distFile: string,
  cutoffs: readonly number[]
): Effect.Effect<
  string[],
  CompressionError | FileError | ParseError | ValidationError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    if (!(yield* exists(distFile))) {
      return [];
    }

    const summaryFile = appendStem(distFile, "_total_summary");
    if (!(yield* exists(summaryFile))) {
      const lines = yield* readLines(distFile);
      const table = yield* Effect.try({
        try: () => [
          [...PERCENTILE_HEADER],
          ...percentileRows(parseDistribution(lines), cutoffs, context.sampleName),
        ],
        catch: (error) =>
          error instanceof ParseError || error instanceof ValidationError
            ? error
            : new ParseError(String(error), "distribution"),
      });
      const content = table.map((row) => `${row.join("\t")}\n`).join("");
      yield* withFileTransaction(transactionRoot(context), [summaryFile], (tx) =>
        writeString(tx.pathFor(summaryFile), content)
      );
    }

    const published = join(dirname(summaryFile), coverageSummaryName(context));
    yield* copyWithIndexes(summaryFile, published);
    return [published];
  });
