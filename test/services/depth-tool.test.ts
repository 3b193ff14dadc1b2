import { Command } from "@effect/platform";
import { HashMap, Option } from "effect";
import { describe, expect, test } from "vitest";
import { CALLABILITY_LABELS, DEPTH_THRESHOLDS } from "../../src/constants";
import {
  type DepthInvocation,
  mosdepthArguments,
  mosdepthCommand,
  quantizeArgument,
  quantizeEnvironment,
} from "../../src/services/depth-tool";

const callability = { cutpoints: [0, 1, 4], labels: CALLABILITY_LABELS };

describe("mosdepth rendering", () => {
  test("quantize cut points end with an open bucket", () => {
    expect(quantizeArgument(callability)).toBe("0:1:4:");
  });

  test("bucket labels become MOSDEPTH_Q variables", () => {
    expect(quantizeEnvironment(callability)).toEqual({
      MOSDEPTH_Q0: "NO_COVERAGE",
      MOSDEPTH_Q1: "LOW_COVERAGE",
      MOSDEPTH_Q2: "CALLABLE",
    });
  });

  test("minimal invocation skips per-base output", () => {
    const invocation: DepthInvocation = {
      alignmentFile: "/data/S1.bam",
      prefix: "/work/coverage/S1/S1-sv_regions",
      threads: 4,
      excludeFlags: 1804,
      perBase: false,
    };

    expect(mosdepthArguments(invocation)).toEqual([
      "-t",
      "4",
      "-F",
      "1804",
      "--no-per-base",
      "/work/coverage/S1/S1-sv_regions",
      "/data/S1.bam",
    ]);
  });

  test("full invocation puts options before positionals", () => {
    const invocation: DepthInvocation = {
      alignmentFile: "/data/S1.bam",
      prefix: "/tmp/tx-1/S1-coverage",
      threads: 2,
      excludeFlags: 1804,
      minMappingQuality: 1,
      perBase: true,
      regionFile: "/data/coverage.bed",
      quantize: callability,
      thresholds: DEPTH_THRESHOLDS,
    };

    expect(mosdepthArguments(invocation)).toEqual([
      "-t",
      "2",
      "-F",
      "1804",
      "-Q",
      "1",
      "--by",
      "/data/coverage.bed",
      "--quantize",
      "0:1:4:",
      "-T",
      "1,5,10,20,50,100,250,500,1000,5000,10000,50000",
      "/tmp/tx-1/S1-coverage",
      "/data/S1.bam",
    ]);
  });

  test("empty thresholds are omitted", () => {
    const args = mosdepthArguments({
      alignmentFile: "a.bam",
      prefix: "p",
      threads: 1,
      excludeFlags: 1804,
      perBase: false,
      thresholds: [],
    });
    expect(args).not.toContain("-T");
  });

  test("command passes its output through instead of piping it", () => {
    const invocation: DepthInvocation = {
      alignmentFile: "/data/S1.bam",
      prefix: "/tmp/tx-2/S1-variant_regions",
      threads: 2,
      excludeFlags: 1804,
      perBase: false,
      quantize: callability,
    };
    const [command, ...rest] = Command.flatten(mosdepthCommand(invocation));

    expect(rest).toEqual([]);
    expect(command.command).toBe("mosdepth");
    expect(command.args).toEqual(mosdepthArguments(invocation));
    expect(command.stdout).toBe("inherit");
    expect(command.stderr).toBe("inherit");
    expect(Option.getOrUndefined(HashMap.get(command.env, "MOSDEPTH_Q2"))).toBe("CALLABLE");
  });
});
