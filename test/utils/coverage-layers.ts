/**
 * In-process stand-ins for the external tools
 *
 * The fake depth tool writes plausible outputs beside the invocation prefix
 * and records every invocation, so tests can assert on idempotence and on
 * the exact request without mosdepth installed.
 */

import { writeFileSync } from "node:fs";
import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Layer, Logger } from "effect";
import { compress } from "../../src/compression/gzip";
import { DepthToolError } from "../../src/errors";
import type { MappedReadQuery } from "../../src/services/alignment-stats";
import { AlignmentStats } from "../../src/services/alignment-stats";
import type { DepthInvocation } from "../../src/services/depth-tool";
import { DepthTool } from "../../src/services/depth-tool";

export interface FakeDepthOutputs {
  readonly dist: string;
  readonly regions: string;
  readonly quantized: string;
  readonly thresholds: string;
  readonly perBase: string;
}

export const DEFAULT_DEPTH_OUTPUTS: FakeDepthOutputs = {
  dist: "chr1\t0\t1.00\ntotal\t2\t0.50\ntotal\t1\t0.75\ntotal\t0\t1.00\n",
  regions: "chr1\t0\t100\t10.00\nchr1\t200\t300\t30.00\n",
  quantized: "chr1\t0\t50\tNO_COVERAGE\nchr1\t50\t400\tCALLABLE\n",
  thresholds: "#chrom\tstart\tend\tregion\t1X\nchr1\t0\t100\tunknown\t100\n",
  perBase: "chr1\t0\t400\t12\n",
};

export interface FakeDepthToolOptions {
  readonly outputs?: Partial<FakeDepthOutputs>;
  /** Write the outputs, then fail with this exit code */
  readonly failWithExitCode?: number;
}

function writeGzip(path: string, text: string): void {
  writeFileSync(path, compress(new TextEncoder().encode(text)));
}

export function makeFakeDepthTool(options: FakeDepthToolOptions = {}) {
  const outputs = { ...DEFAULT_DEPTH_OUTPUTS, ...options.outputs };
  const invocations: DepthInvocation[] = [];

  const layer = Layer.succeed(DepthTool, {
    run: (invocation) =>
      Effect.suspend((): Effect.Effect<void, DepthToolError> => {
        invocations.push(invocation);
        const { prefix } = invocation;
        writeFileSync(`${prefix}.mosdepth.dist.txt`, outputs.dist);
        if (invocation.perBase) writeGzip(`${prefix}.per-base.bed.gz`, outputs.perBase);
        if (invocation.regionFile !== undefined) {
          writeGzip(`${prefix}.regions.bed.gz`, outputs.regions);
        }
        if (invocation.quantize !== undefined) {
          writeGzip(`${prefix}.quantized.bed.gz`, outputs.quantized);
        }
        if (invocation.thresholds !== undefined) {
          writeGzip(`${prefix}.thresholds.bed.gz`, outputs.thresholds);
        }
        if (options.failWithExitCode !== undefined) {
          return Effect.fail(
            new DepthToolError(
              `mosdepth exited with code ${options.failWithExitCode}`,
              "mosdepth",
              options.failWithExitCode
            )
          );
        }
        return Effect.void;
      }),
  });

  return { layer, invocations };
}

export interface FakeAlignmentNumbers {
  readonly mappedUnique?: number;
  readonly ontarget?: number;
  readonly indexedMapped?: number;
  readonly queryLengths?: readonly number[];
}

export function makeFakeAlignmentStats(numbers: FakeAlignmentNumbers = {}) {
  const queries: MappedReadQuery[] = [];

  const layer = Layer.succeed(AlignmentStats, {
    countMappedReads: (query) =>
      Effect.sync(() => {
        queries.push(query);
        return query.regionFile === undefined
          ? (numbers.mappedUnique ?? 0)
          : (numbers.ontarget ?? 0);
      }),
    indexedMappedReads: () => Effect.succeed(numbers.indexedMapped ?? 0),
    sampleQueryLengths: (_alignmentFile, limit) =>
      Effect.succeed((numbers.queryLengths ?? []).slice(0, limit)),
  });

  return { layer, queries };
}

/**
 * Logger layer collecting every message as text
 */
export function captureLogs() {
  const messages: string[] = [];
  const logger = Logger.make(({ message }) => {
    messages.push(Array.isArray(message) ? message.map(String).join(" ") : String(message));
  });
  return { layer: Logger.replace(Logger.defaultLogger, logger), messages };
}

export type TestServices = FileSystem.FileSystem | DepthTool | AlignmentStats;

export interface TestLayers {
  readonly depth?: Layer.Layer<DepthTool>;
  readonly stats?: Layer.Layer<AlignmentStats>;
  readonly logger?: Layer.Layer<never>;
}

/**
 * Run a program against the Node file system and fake tools
 */
export function runTest<A, E>(
  program: Effect.Effect<A, E, TestServices>,
  layers: TestLayers = {}
): Promise<A> {
  const services = Layer.mergeAll(
    layers.depth ?? makeFakeDepthTool().layer,
    layers.stats ?? makeFakeAlignmentStats().layer,
    NodeContext.layer
  );
  const withLogger = layers.logger ? Layer.merge(services, layers.logger) : services;
  return Effect.runPromise(program.pipe(Effect.provide(withLogger)));
}
