/**
 * Effect service for read counts and read-length sampling
 *
 * Coverage classification and genome-wide depth estimates need three facts
 * about an alignment file; this service isolates how they are obtained.
 * `AlignmentStats.Samtools` asks samtools; tests provide fixed numbers.
 *
 * @module services/alignment-stats
 */

import { Command, CommandExecutor } from "@effect/platform";
import { Chunk, Context, Effect, Layer, Stream } from "effect";
import { DUPLICATE_FLAG, MAPPED_EXCLUDE_FLAGS } from "../constants";
import { AlignmentStatsError } from "../errors";

export interface MappedReadQuery {
  readonly alignmentFile: string;
  /** Count reads flagged as duplicates (default false) */
  readonly keepDuplicates?: boolean;
  /** Only count reads overlapping these regions */
  readonly regionFile?: string;
  readonly threads?: number;
}

export interface AlignmentStatsShape {
  /** Mapped primary reads passing QC, optionally restricted to regions */
  readonly countMappedReads: (
    query: MappedReadQuery
  ) => Effect.Effect<number, AlignmentStatsError>;

  /** Mapped read total from the index metadata alone, duplicates included */
  readonly indexedMappedReads: (alignmentFile: string) => Effect.Effect<number, AlignmentStatsError>;

  /** Query lengths of up to `limit` reads from the start of the file */
  readonly sampleQueryLengths: (
    alignmentFile: string,
    limit: number
  ) => Effect.Effect<readonly number[], AlignmentStatsError>;
}

export class AlignmentStats extends Context.Tag("@covergauge/AlignmentStats")<
  AlignmentStats,
  AlignmentStatsShape
>() {
  static readonly Samtools: Layer.Layer<AlignmentStats, never, CommandExecutor.CommandExecutor> =
    Layer.effect(
      AlignmentStats,
      Effect.map(CommandExecutor.CommandExecutor, (executor) => createSamtoolsStats(executor))
    );
}

/**
 * Flags excluded when counting mapped reads
 */
export function mappedReadFlags(keepDuplicates: boolean): number {
  return keepDuplicates ? MAPPED_EXCLUDE_FLAGS : MAPPED_EXCLUDE_FLAGS | DUPLICATE_FLAG;
}

/**
 * Sum the mapped column of `samtools idxstats` output
 */
export function parseIdxstats(output: string): number {
  let total = 0;
  for (const line of output.split(/\r?\n/)) {
    const columns = line.split("\t");
    const mapped = columns[2];
    if (mapped === undefined) continue;
    const count = Number.parseInt(mapped, 10);
    if (!Number.isNaN(count)) total += count;
  }
  return total;
}

/**
 * Query length of a SAM text record; `*` sequences count as 0
 */
export function samQueryLength(line: string): number {
  const sequence = line.split("\t")[9];
  return sequence === undefined || sequence === "*" ? 0 : sequence.length;
}

function createSamtoolsStats(executor: CommandExecutor.CommandExecutor): AlignmentStatsShape {
  const fail =
    (alignmentFile: string, operation: AlignmentStatsError["operation"]) =>
    (error: { readonly message: string }) =>
      new AlignmentStatsError(
        `samtools ${operation} failed for ${alignmentFile}: ${error.message}`,
        alignmentFile,
        operation
      );

  const captureStdout = (command: Command.Command) =>
    Effect.scoped(
      Effect.gen(function* () {
        const child = yield* Command.start(command);
        const [stdout, exitCode] = yield* Effect.all(
          [
            child.stdout.pipe(
              Stream.decodeText(),
              Stream.runFold("", (acc, chunk) => acc + chunk)
            ),
            child.exitCode,
          ],
          { concurrency: 2 }
        );
        return { stdout, exitCode };
      })
    ).pipe(Effect.provideService(CommandExecutor.CommandExecutor, executor));

  return {
    countMappedReads: (query) =>
      Effect.gen(function* () {
        const args = [
          "view",
          "-c",
          "-F",
          String(mappedReadFlags(query.keepDuplicates ?? false)),
          "-@",
          String(query.threads ?? 1),
        ];
        if (query.regionFile !== undefined) {
          args.push("-L", query.regionFile);
        }
        args.push(query.alignmentFile);

        const { stdout, exitCode } = yield* captureStdout(Command.make("samtools", ...args)).pipe(
          Effect.mapError(fail(query.alignmentFile, "count"))
        );
        const count = Number.parseInt(stdout.trim(), 10);
        if (exitCode !== 0 || Number.isNaN(count)) {
          return yield* Effect.fail(
            new AlignmentStatsError(
              `samtools view -c exited with code ${exitCode}`,
              query.alignmentFile,
              "count",
              stdout.trim()
            )
          );
        }
        return count;
      }),

    indexedMappedReads: (alignmentFile) =>
      Effect.gen(function* () {
        const { stdout, exitCode } = yield* captureStdout(
          Command.make("samtools", "idxstats", alignmentFile)
        ).pipe(Effect.mapError(fail(alignmentFile, "idxstats")));
        if (exitCode !== 0) {
          return yield* Effect.fail(
            new AlignmentStatsError(
              `samtools idxstats exited with code ${exitCode}`,
              alignmentFile,
              "idxstats"
            )
          );
        }
        return parseIdxstats(stdout);
      }),

    sampleQueryLengths: (alignmentFile, limit) =>
      Command.streamLines(Command.make("samtools", "view", alignmentFile)).pipe(
        Stream.take(limit),
        Stream.map(samQueryLength),
        Stream.runCollect,
        Effect.map((lengths) => Chunk.toReadonlyArray(lengths)),
        Effect.provideService(CommandExecutor.CommandExecutor, executor),
        Effect.mapError(fail(alignmentFile, "sample"))
      ),
  };
}
