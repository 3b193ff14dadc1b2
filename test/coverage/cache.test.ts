/**
 * Average coverage and its on-disk cache
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { AnalysisContext } from "../../src/context";
import {
  averageRegionDepth,
  getAverageCoverage,
  median,
  readCache,
  writeCache,
} from "../../src/coverage/cache";
import { ParseError } from "../../src/errors";
import { makeFakeAlignmentStats, makeFakeDepthTool, runTest } from "../utils/coverage-layers";
import { createWorkspace, sampleContext, touch, type Workspace } from "../utils/workspace";

describe("median", () => {
  test("odd count takes the middle value", () => {
    expect(median([150, 100, 151])).toBe(150);
  });

  test("even count averages the two middle values", () => {
    expect(median([100, 151, 150, 101])).toBe(125.5);
  });

  test("no values gives zero", () => {
    expect(median([])).toBe(0);
  });
});

describe("averageRegionDepth", () => {
  test("weights each region's depth by its length", () => {
    expect(averageRegionDepth(["chr1\t0\t100\t10", "chr1\t100\t200\t30"])).toBe(20);
  });

  test("uses the last column and skips comments", () => {
    const lines = ["#chrom\tstart\tend\tname\tdepth", "chr1\t0\t300\texon1\t4.00", "", "chr2\t0\t100\texon2\t8.00"];
    expect(averageRegionDepth(lines)).toBe(5);
  });

  test("zero total length gives zero", () => {
    expect(averageRegionDepth([])).toBe(0);
    expect(averageRegionDepth(["chr1\t5\t5\t10"])).toBe(0);
  });

  test("a line without a depth value is rejected", () => {
    expect(() => averageRegionDepth(["chr1\t0\t100"])).toThrow(ParseError);
  });
});

describe("getAverageCoverage", () => {
  let workspace: Workspace;
  let context: AnalysisContext;
  let variantRegions: string;
  let cacheFile: string;

  beforeEach(() => {
    workspace = createWorkspace();
    variantRegions = workspace.write("regions/targets.bed", "chr1\t0\t100\nchr1\t200\t300\n");
    context = sampleContext(workspace, { variantRegions });
    cacheFile = join(workspace.workDir, "align", "S1", "S1-coverage-variant_regions-stats.yaml");
  });

  afterEach(() => {
    workspace.cleanup();
  });

  test("computes the region average and caches it", async () => {
    const depth = makeFakeDepthTool();
    const average = await runTest(
      getAverageCoverage(context, "variant_regions", variantRegions),
      { depth: depth.layer }
    );

    expect(average).toBe(20);
    expect(depth.invocations).toHaveLength(1);
    expect(depth.invocations[0]?.regionFile).toBe(variantRegions);
    expect(readFileSync(cacheFile, "utf8")).toBe("avg_coverage: 20\n");
  });

  test("a fresh cache is returned without recomputation", async () => {
    const depth = makeFakeDepthTool();
    await runTest(getAverageCoverage(context, "variant_regions", variantRegions), {
      depth: depth.layer,
    });

    const failing = makeFakeDepthTool({ failWithExitCode: 1 });
    const average = await runTest(getAverageCoverage(context, "variant_regions", variantRegions), {
      depth: failing.layer,
    });

    expect(average).toBe(20);
    expect(failing.invocations).toHaveLength(0);
  });

  test("a region file newer than the cache invalidates it", async () => {
    await runTest(writeCache(context, cacheFile, { avg_coverage: 99 }));
    touch(variantRegions, 60);

    const depth = makeFakeDepthTool();
    const average = await runTest(getAverageCoverage(context, "variant_regions", variantRegions), {
      depth: depth.layer,
    });

    expect(average).toBe(20);
    expect(depth.invocations).toHaveLength(1);
    expect(readFileSync(cacheFile, "utf8")).toBe("avg_coverage: 20\n");
  });

  test("averages are truncated to integers", async () => {
    const depth = makeFakeDepthTool({ outputs: { regions: "chr1\t0\t100\t10.9\n" } });
    const average = await runTest(getAverageCoverage(context, "variant_regions", variantRegions), {
      depth: depth.layer,
    });
    expect(average).toBe(10);
  });

  test("precomputed per-region depth is reused", async () => {
    const regions = workspace.write("done/S1-variant_regions.regions.bed", "chr1\t0\t10\t5\n");
    const depth = makeFakeDepthTool();

    const average = await runTest(
      getAverageCoverage(context, "variant_regions", variantRegions, {
        depthFiles: { variant_regions: { dist: "unused", regions } },
      }),
      { depth: depth.layer }
    );

    expect(average).toBe(5);
    expect(depth.invocations).toHaveLength(0);
  });

  test("without regions the genome-wide estimate is used", async () => {
    const stats = makeFakeAlignmentStats({ indexedMapped: 1000, queryLengths: [100, 150, 150, 200] });
    const depth = makeFakeDepthTool();

    const average = await runTest(getAverageCoverage(context, "genome", undefined), {
      stats: stats.layer,
      depth: depth.layer,
    });

    // 1000 reads x 150 bases over 500 reference bases, alt contig included
    expect(average).toBe(300);
    expect(depth.invocations).toHaveLength(0);
    expect(
      readFileSync(join(workspace.workDir, "align", "S1", "S1-coverage-genome-stats.yaml"), "utf8")
    ).toBe("avg_coverage: 300\n");
  });

  test("a malformed per-region file fails with its path", async () => {
    const regions = workspace.write("done/bad.regions.bed", "chr1\t0\t10\n");
    const error = await runTest(
      Effect.flip(
        getAverageCoverage(context, "variant_regions", variantRegions, {
          depthFiles: { variant_regions: { dist: "unused", regions } },
        })
      )
    );

    expect(error).toBeInstanceOf(ParseError);
    expect(error.message).toBe(
      `${regions}: Expected chromosome, start, end and a trailing depth value`
    );
    expect(existsSync(cacheFile)).toBe(false);
  });
});

describe("readCache", () => {
  let workspace: Workspace;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  test("missing cache is empty", async () => {
    expect(await runTest(readCache(join(workspace.root, "none.yaml"), []))).toEqual({});
  });

  test("round-trips numeric statistics", async () => {
    const context = sampleContext(workspace);
    const cacheFile = join(workspace.root, "stats.yaml");
    await runTest(writeCache(context, cacheFile, { avg_coverage: 31, callable_pct: 0.5 }));

    expect(await runTest(readCache(cacheFile, [workspace.alignment]))).toEqual({
      avg_coverage: 31,
      callable_pct: 0.5,
    });
  });

  test("non-numeric content is treated as a miss", async () => {
    const cacheFile = workspace.write("stats.yaml", "avg_coverage: high\n");
    expect(await runTest(readCache(cacheFile, []))).toEqual({});
  });

  test("unparsable content is treated as a miss", async () => {
    const cacheFile = workspace.write("stats.yaml", "avg_coverage: [1, 2\n");
    expect(await runTest(readCache(cacheFile, []))).toEqual({});
  });
});
