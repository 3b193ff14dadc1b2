/**
 * BED format parser, writer and interval algebra
 *
 * Reads the BED3+ files that flow between coverage steps: target regions,
 * depth-tool region outputs (`chrom start end [name] depth`) and quantized
 * callability (`chrom start end label`). Columns after `end` are kept
 * verbatim so records can be written back unchanged.
 *
 * Handles real-world BED file messiness:
 * - Track lines and browser lines
 * - Comment lines
 * - Zero-length intervals
 * - Space- or tab-separated columns
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { BedError } from "../errors";
import type { CompressionError, FileError } from "../errors";
import { readToString } from "../io/file-reader";
import type { BedRecord } from "../types";

export interface BedParserOptions {
  /** Accept `start === end` (default true) */
  readonly allowZeroLength?: boolean;
}

/**
 * Validate genomic coordinates
 */
export function validateCoordinates(
  start: number,
  end: number,
  allowZeroLength = true
): { valid: boolean; error?: string } {
  if (start < 0 || end < 0) {
    return { valid: false, error: "Coordinates cannot be negative" };
  }
  if (!allowZeroLength && start >= end) {
    return { valid: false, error: "End coordinate must be greater than start" };
  }
  if (start > end) {
    return { valid: false, error: "Start coordinate cannot exceed end coordinate" };
  }
  return { valid: true };
}

function isSkippable(trimmedLine: string): boolean {
  return (
    trimmedLine === "" ||
    trimmedLine.startsWith("#") ||
    trimmedLine.startsWith("track") ||
    trimmedLine.startsWith("browser")
  );
}

export class BedParser {
  private readonly allowZeroLength: boolean;

  constructor(options: BedParserOptions = {}) {
    this.allowZeroLength = options.allowZeroLength ?? true;
  }

  /**
   * Parse BED records from text
   *
   * @throws {BedError} On the first malformed line
   */
  *parseString(data: string): Generator<BedRecord> {
    const lines = data.split(/\r?\n/);
    for (let index = 0; index < lines.length; index++) {
      const trimmedLine = (lines[index] ?? "").trim();
      if (isSkippable(trimmedLine)) continue;
      yield this.parseLine(trimmedLine, index + 1);
    }
  }

  private parseLine(line: string, lineNumber: number): BedRecord {
    const [chromosome, startStr, endStr, ...fields] = line.split(/\s+/);

    if (chromosome === undefined || startStr === undefined || endStr === undefined) {
      throw new BedError(
        "BED format requires at least 3 fields (chromosome, start, end)",
        chromosome,
        undefined,
        undefined,
        lineNumber,
        line
      );
    }

    const start = this.parseCoordinate(startStr, "start", lineNumber, line);
    const end = this.parseCoordinate(endStr, "end", lineNumber, line);

    const validation = validateCoordinates(start, end, this.allowZeroLength);
    if (!validation.valid) {
      throw new BedError(
        validation.error ?? "Invalid coordinates",
        chromosome,
        start,
        end,
        lineNumber,
        line
      );
    }

    return { chromosome, start, end, fields, lineNumber };
  }

  private parseCoordinate(
    coordStr: string,
    fieldName: "start" | "end",
    lineNumber: number,
    line: string
  ): number {
    if (!/^\d+$/.test(coordStr)) {
      throw new BedError(
        `Invalid ${fieldName}: '${coordStr}' is not a valid integer`,
        undefined,
        undefined,
        undefined,
        lineNumber,
        line
      );
    }
    return Number.parseInt(coordStr, 10);
  }
}

/**
 * BED format writer
 */
export class BedWriter {
  formatRecord(record: BedRecord): string {
    return [record.chromosome, String(record.start), String(record.end), ...record.fields].join(
      "\t"
    );
  }

  formatRecords(records: Iterable<BedRecord>): string {
    let out = "";
    for (const record of records) {
      out += `${this.formatRecord(record)}\n`;
    }
    return out;
  }
}

// Interval algebra

/**
 * Sort records by chromosome name, then start, then end
 */
export function sortRecords(records: readonly BedRecord[]): BedRecord[] {
  return [...records].sort((a, b) => {
    if (a.chromosome !== b.chromosome) return a.chromosome < b.chromosome ? -1 : 1;
    if (a.start !== b.start) return a.start - b.start;
    return a.end - b.end;
  });
}

/**
 * Merge overlapping and book-ended records into BED3 intervals
 */
export function mergeOverlapping(records: readonly BedRecord[]): BedRecord[] {
  const merged: BedRecord[] = [];
  for (const current of sortRecords(records)) {
    const last = merged[merged.length - 1];
    if (last !== undefined && current.chromosome === last.chromosome && current.start <= last.end) {
      merged[merged.length - 1] = { ...last, end: Math.max(last.end, current.end) };
    } else {
      merged.push({
        chromosome: current.chromosome,
        start: current.start,
        end: current.end,
        fields: [],
      });
    }
  }
  return merged;
}

/**
 * Number of bases covered by at least one record
 */
export function totalCoverage(records: readonly BedRecord[]): number {
  return mergeOverlapping(records).reduce((sum, record) => sum + (record.end - record.start), 0);
}

function groupByChromosome(records: readonly BedRecord[]): Map<string, BedRecord[]> {
  const groups = new Map<string, BedRecord[]>();
  for (const record of records) {
    const group = groups.get(record.chromosome);
    if (group === undefined) {
      groups.set(record.chromosome, [record]);
    } else {
      group.push(record);
    }
  }
  return groups;
}

/** Index of the first interval whose end lies past `position` */
function firstEndingAfter(intervals: readonly BedRecord[], position: number): number {
  let low = 0;
  let high = intervals.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const interval = intervals[mid];
    if (interval !== undefined && interval.end <= position) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Restrict `records` to the bases covered by `mask`
 *
 * Each record is clipped to every overlapping (merged) mask interval and
 * keeps its own trailing columns; records without overlap are dropped.
 * Input order is preserved.
 */
export function intersect(records: readonly BedRecord[], mask: readonly BedRecord[]): BedRecord[] {
  const maskByChromosome = groupByChromosome(mergeOverlapping(mask));
  const out: BedRecord[] = [];

  for (const record of records) {
    const intervals = maskByChromosome.get(record.chromosome);
    if (intervals === undefined) continue;

    for (let i = firstEndingAfter(intervals, record.start); i < intervals.length; i++) {
      const interval = intervals[i];
      if (interval === undefined || interval.start >= record.end) break;
      out.push({
        chromosome: record.chromosome,
        start: Math.max(record.start, interval.start),
        end: Math.min(record.end, interval.end),
        fields: record.fields,
      });
    }
  }
  return out;
}

// File-level helpers

/**
 * Read and parse a BED file, gzip or plain
 */
export const readBedFile = (
  path: string,
  options: BedParserOptions = {}
): Effect.Effect<BedRecord[], BedError | FileError | CompressionError, FileSystem.FileSystem> =>
  Effect.flatMap(readToString(path), (text) =>
    Effect.try({
      try: () => Array.from(new BedParser(options).parseString(text)),
      catch: (error) =>
        error instanceof BedError
          ? new BedError(
              `${path}: ${error.message}`,
              error.chromosome,
              error.start,
              error.end,
              error.lineNumber,
              error.context
            )
          : new BedError(`Failed to parse BED file '${path}': ${String(error)}`),
    })
  );

/**
 * Total covered bases of a BED file
 */
export const totalCoverageOfFile = (
  path: string
): Effect.Effect<number, BedError | FileError | CompressionError, FileSystem.FileSystem> =>
  Effect.map(readBedFile(path), totalCoverage);

export const BedUtils = {
  validateCoordinates,
  sortRecords,
  mergeOverlapping,
  totalCoverage,
  intersect,
} as const;
