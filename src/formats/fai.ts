/**
 * Reference contigs from a FASTA index (.fai)
 *
 * Only names and lengths are needed here; offsets and line geometry are
 * validated but not kept.
 *
 * @module formats/fai
 */

import type { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import type { CompressionError } from "../errors";
import { FileError, ParseError, PreconditionError } from "../errors";
import { exists, readLines } from "../io/file-reader";
import type { Contig } from "../types";

/**
 * ArkType schema for one .fai record
 *
 * - name must be non-empty
 * - length must be at least 1 base
 * - linewidth must account for bases + newline
 */
const FaiRecordSchema = type({
  name: "string>0",
  length: "number>=1",
  offset: "number>=0",
  linebases: "number>=1",
  linewidth: "number>=1",
}).narrow((record, ctx) => {
  if (record.linewidth < record.linebases) {
    return ctx.reject({
      expected: "linewidth >= linebases (linewidth includes newline bytes)",
      actual: `linewidth=${record.linewidth}, linebases=${record.linebases}`,
      path: ["linewidth"],
    });
  }
  return true;
});

export type FaiRecord = typeof FaiRecordSchema.infer;

/**
 * Parse .fai text into contigs, in file order
 *
 * @throws {ParseError} On a malformed line
 */
export function parseFai(text: string): Contig[] {
  const contigs: Contig[] = [];
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index] ?? "";
    if (line.trim() === "") continue;

    const [name, length, offset, linebases, linewidth] = line.split("\t");
    const record = FaiRecordSchema({
      name,
      length: Number(length),
      offset: Number(offset),
      linebases: Number(linebases),
      linewidth: Number(linewidth),
    });
    if (record instanceof type.errors) {
      throw new ParseError(`Invalid .fai record: ${record.summary}`, "FAI", index + 1, line);
    }
    contigs.push({ name: record.name, size: record.length });
  }
  return contigs;
}

/**
 * Alternate haplotypes, decoys and HLA sequences
 */
export function isAltContig(name: string): boolean {
  return name.includes("_alt") || name.includes("_decoy") || name.startsWith("HLA-");
}

export function noAltContigs(contigs: readonly Contig[]): Contig[] {
  return contigs.filter((contig) => !isAltContig(contig.name));
}

export function totalSize(contigs: readonly Contig[]): number {
  return contigs.reduce((sum, contig) => sum + contig.size, 0);
}

/** Path of the index for a reference FASTA */
export function faiPath(referenceFile: string): string {
  return `${referenceFile}.fai`;
}

/**
 * All contigs of a reference, read from `<reference>.fai`
 */
export const fileContigs = (
  referenceFile: string
): Effect.Effect<Contig[], FileError | CompressionError | ParseError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const indexFile = faiPath(referenceFile);
    if (!(yield* exists(indexFile))) {
      return yield* Effect.fail(
        new FileError(
          `Reference index not found: ${indexFile}. Create it with \`samtools faidx ${referenceFile}\``,
          indexFile,
          "read"
        )
      );
    }
    const lines = yield* readLines(indexFile);
    return yield* Effect.try({
      try: () => parseFai(lines.join("\n")),
      catch: (error) =>
        error instanceof ParseError ? error : new ParseError(String(error), "FAI"),
    });
  });

/**
 * Total length of the usable (non-alt) contigs
 *
 * Fails with {@link PreconditionError} when no usable contig has any length.
 */
export const usableGenomeSize = (
  referenceFile: string
): Effect.Effect<
  number,
  FileError | CompressionError | ParseError | PreconditionError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const size = totalSize(noAltContigs(yield* fileContigs(referenceFile)));
    if (size <= 0) {
      return yield* Effect.fail(
        new PreconditionError(
          `Reference ${referenceFile} has no usable contigs`,
          "Total length of non-alt contigs is zero"
        )
      );
    }
    return size;
  });
