/**
 * Effect service wrapping the external depth-computation tool
 *
 * Orchestration code describes a run as a structured {@link DepthInvocation};
 * the layer decides how to execute it. `DepthTool.Mosdepth` renders the
 * invocation as a mosdepth command line plus the `MOSDEPTH_Q<n>` environment
 * variables that name quantize buckets. Tests swap in an in-process layer.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const tool = yield* DepthTool;
 *   yield* tool.run(invocation);
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(DepthTool.Mosdepth), Effect.provide(NodeContext.layer))
 * );
 * ```
 *
 * @module services/depth-tool
 */

import { Command, CommandExecutor } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import { DepthToolError } from "../errors";
import type { QuantizeSpec } from "../types";

// =============================================================================
// INVOCATION
// =============================================================================

/**
 * One depth tool run
 *
 * Outputs are written beside `prefix`:
 * `<prefix>.mosdepth.dist.txt`, and depending on the request
 * `.per-base.bed.gz`, `.regions.bed.gz`, `.quantized.bed.gz`,
 * `.thresholds.bed.gz`.
 */
export interface DepthInvocation {
  readonly alignmentFile: string;
  readonly prefix: string;
  readonly threads: number;
  /** SAM flag bits; reads with any of them set are skipped */
  readonly excludeFlags: number;
  readonly minMappingQuality?: number;
  readonly perBase: boolean;
  /** Region set to report mean depth over (`--by`) */
  readonly regionFile?: string;
  readonly quantize?: QuantizeSpec;
  /** Sorted depths for per-region threshold counts */
  readonly thresholds?: readonly number[];
  /** Progress message for logs */
  readonly description?: string;
}

// =============================================================================
// SERVICE
// =============================================================================

export interface DepthToolShape {
  /**
   * Run the tool to completion
   *
   * Fails with {@link DepthToolError} on a non-zero exit or when the
   * process cannot be started.
   */
  readonly run: (invocation: DepthInvocation) => Effect.Effect<void, DepthToolError>;
}

export class DepthTool extends Context.Tag("@covergauge/DepthTool")<DepthTool, DepthToolShape>() {
  /**
   * mosdepth on PATH, executed through the platform CommandExecutor
   */
  static readonly Mosdepth: Layer.Layer<DepthTool, never, CommandExecutor.CommandExecutor> =
    Layer.effect(
      DepthTool,
      Effect.map(CommandExecutor.CommandExecutor, (executor) => createMosdepthTool(executor))
    );
}

// =============================================================================
// MOSDEPTH RENDERING
// =============================================================================

/**
 * Render quantize cut points as mosdepth's `--quantize` argument
 *
 * `[0, 1, 4]` becomes `0:1:4:`, the trailing colon leaving the last
 * bucket open-ended.
 */
export function quantizeArgument(spec: QuantizeSpec): string {
  return `${spec.cutpoints.join(":")}:`;
}

/**
 * Environment naming each quantize bucket, e.g. `MOSDEPTH_Q0=NO_COVERAGE`
 */
export function quantizeEnvironment(spec: QuantizeSpec): Record<string, string> {
  const env: Record<string, string> = {};
  spec.labels.forEach((label, index) => {
    env[`MOSDEPTH_Q${index}`] = label;
  });
  return env;
}

/**
 * mosdepth arguments for an invocation, options before positionals
 */
export function mosdepthArguments(invocation: DepthInvocation): string[] {
  const args = ["-t", String(invocation.threads), "-F", String(invocation.excludeFlags)];

  if (invocation.minMappingQuality !== undefined) {
    args.push("-Q", String(invocation.minMappingQuality));
  }
  if (!invocation.perBase) {
    args.push("--no-per-base");
  }
  if (invocation.regionFile !== undefined) {
    args.push("--by", invocation.regionFile);
  }
  if (invocation.quantize !== undefined) {
    args.push("--quantize", quantizeArgument(invocation.quantize));
  }
  if (invocation.thresholds !== undefined && invocation.thresholds.length > 0) {
    args.push("-T", invocation.thresholds.join(","));
  }

  args.push(invocation.prefix, invocation.alignmentFile);
  return args;
}

/**
 * mosdepth command for an invocation, writing to this process's stdout
 * and stderr
 */
export function mosdepthCommand(invocation: DepthInvocation): Command.Command {
  const env = invocation.quantize ? quantizeEnvironment(invocation.quantize) : {};
  return Command.make("mosdepth", ...mosdepthArguments(invocation)).pipe(
    Command.env(env),
    Command.stdout("inherit"),
    Command.stderr("inherit")
  );
}

function createMosdepthTool(executor: CommandExecutor.CommandExecutor): DepthToolShape {
  return {
    run: (invocation) =>
      Effect.gen(function* () {
        const commandLine = ["mosdepth", ...mosdepthArguments(invocation)].join(" ");

        yield* Effect.logInfo(invocation.description ?? "Calculating coverage").pipe(
          Effect.annotateLogs("command", commandLine)
        );

        const exitCode = yield* Command.exitCode(mosdepthCommand(invocation)).pipe(
          Effect.provideService(CommandExecutor.CommandExecutor, executor),
          Effect.mapError(
            (error) =>
              new DepthToolError(
                `Failed to start mosdepth: ${error.message}`,
                "mosdepth",
                undefined,
                commandLine
              )
          )
        );

        if (exitCode !== 0) {
          return yield* Effect.fail(
            new DepthToolError(
              `mosdepth exited with code ${exitCode}`,
              "mosdepth",
              exitCode,
              commandLine
            )
          );
        }
      }),
  };
}
