/**
 * Temporary sample workspace on disk
 */

import { mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { AnalysisContext } from "../../src/context";

export interface Workspace {
  readonly root: string;
  readonly reference: string;
  readonly alignment: string;
  readonly workDir: string;
  /** Write a file under the root, creating directories */
  readonly write: (relative: string, content: string) => string;
  readonly cleanup: () => void;
}

/** chr1 and chr2 usable, 400 bases in all; one alt contig of 100 */
export const DEFAULT_FAI = [
  "chr1\t300\t6\t60\t61",
  "chr2\t100\t318\t60\t61",
  "chr1_KI270706v1_alt\t100\t430\t60\t61",
].join("\n");

export function createWorkspace(fai: string = DEFAULT_FAI): Workspace {
  const root = mkdtempSync(join(tmpdir(), "covergauge-"));
  const write = (relative: string, content: string): string => {
    const path = join(root, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
    return path;
  };

  const reference = write("ref/genome.fa", ">chr1\n");
  write("ref/genome.fa.fai", `${fai}\n`);
  const alignment = write("align/S1.bam", "placeholder alignment");
  // Inputs predate anything the tests produce
  const past = new Date(Date.now() - 60_000);
  utimesSync(alignment, past, past);
  utimesSync(`${reference}.fai`, past, past);

  return {
    root,
    reference,
    alignment,
    workDir: join(root, "work"),
    write,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function sampleContext(
  workspace: Workspace,
  overrides: Record<string, unknown> = {}
): AnalysisContext {
  return AnalysisContext.fromSettings({
    sampleName: "S1",
    referenceFile: workspace.reference,
    alignmentFile: workspace.alignment,
    workDir: workspace.workDir,
    minCoverageDepth: 4,
    cores: 2,
    ...overrides,
  });
}

/** Move a file's timestamps by `seconds` relative to now */
export function touch(path: string, seconds = 0): void {
  const when = new Date(Date.now() + seconds * 1000);
  utimesSync(path, when, when);
}
