import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { hasGzipMagic } from "../../src/compression/gzip";
import { readToString } from "../../src/io/file-reader";
import { copyWithIndexes, moveFile, writeString } from "../../src/io/file-writer";
import { runTest } from "../utils/coverage-layers";
import { createWorkspace, type Workspace } from "../utils/workspace";

describe("file-writer", () => {
  let workspace: Workspace;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
  });

  test("writeString creates parent directories", async () => {
    const path = join(workspace.root, "nested", "deeper", "out.txt");
    await runTest(writeString(path, "hello\n"));
    expect(readFileSync(path, "utf8")).toBe("hello\n");
  });

  test("writeString compresses .gz targets", async () => {
    const path = join(workspace.root, "out.bed.gz");
    await runTest(writeString(path, "chr1\t0\t10\n"));

    expect(hasGzipMagic(readFileSync(path))).toBe(true);
    expect(await runTest(readToString(path))).toBe("chr1\t0\t10\n");
  });

  test("autoCompress false writes plain text", async () => {
    const path = join(workspace.root, "plain.gz");
    await runTest(writeString(path, "raw", { autoCompress: false }));
    expect(readFileSync(path, "utf8")).toBe("raw");
  });

  test("moveFile renames into a new directory", async () => {
    const source = workspace.write("a.txt", "moved");
    const target = join(workspace.root, "dest", "a.txt");
    await runTest(moveFile(source, target));

    expect(existsSync(source)).toBe(false);
    expect(readFileSync(target, "utf8")).toBe("moved");
  });

  test("copyWithIndexes brings a tabix index along", async () => {
    const source = workspace.write("depth.bed.gz", "data");
    writeFileSync(`${source}.tbi`, "index");
    const target = join(workspace.root, "copy", "depth.bed.gz");

    await runTest(copyWithIndexes(source, target));

    expect(readFileSync(target, "utf8")).toBe("data");
    expect(readFileSync(`${target}.tbi`, "utf8")).toBe("index");
    expect(existsSync(`${target}.csi`)).toBe(false);
  });
});
