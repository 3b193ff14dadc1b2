/**
 * Error handling for coverage computation
 *
 * Every failure raised by this package is a CoverageError subclass, so
 * callers can discriminate on `code` or `instanceof` and still print a
 * readable message with line and context details.
 */

import { Predicate } from "effect";

/**
 * Base error class for all coverage-related errors
 */
export class CoverageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "CoverageError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed settings or arguments
 */
export class ValidationError extends CoverageError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends CoverageError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * BED-specific parsing errors with genomic coordinates
 */
export class BedError extends ParseError {
  constructor(
    message: string,
    public readonly chromosome?: string,
    public readonly start?: number,
    public readonly end?: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "BED", lineNumber, context);
    this.name = "BedError";
  }
}

/**
 * Gzip compression/decompression failures
 */
export class CompressionError extends CoverageError {
  constructor(
    message: string,
    public readonly operation: "compress" | "decompress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemErrorMessage(systemError);
    return new CompressionError(
      `gzip ${operation} failed: ${errorMessage}`,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * Message of a thrown value, including platform errors that are not `Error`
 * instances
 */
function systemErrorMessage(systemError: unknown): string {
  return Predicate.hasProperty(systemError, "message")
    ? String(systemError.message)
    : String(systemError);
}

/**
 * File system errors with the failing path and operation
 */
export class FileError extends CoverageError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "rename" | "copy" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemErrorMessage(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different work directory";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    } else if (this.systemError !== undefined) {
      msg += `\nSystem Error: ${systemErrorMessage(this.systemError)}`;
    }
    return msg;
  }
}

/**
 * Inputs that make a computation meaningless, such as a reference with no
 * usable contigs. Never retried.
 */
export class PreconditionError extends CoverageError {
  constructor(message: string, context?: string) {
    super(message, "PRECONDITION_ERROR", undefined, context);
    this.name = "PreconditionError";
  }
}

/**
 * Failure of the external depth-computation tool
 */
export class DepthToolError extends CoverageError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly exitCode?: number,
    public readonly commandLine?: string,
    context?: string
  ) {
    super(message, "DEPTH_TOOL_ERROR", undefined, context);
    this.name = "DepthToolError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.exitCode !== undefined) {
      msg += `\nExit code: ${this.exitCode}`;
    }
    if (this.commandLine !== undefined) {
      msg += `\nCommand: ${this.commandLine}`;
    }
    return msg;
  }
}

/**
 * Failure while counting or sampling reads from an alignment file
 */
export class AlignmentStatsError extends CoverageError {
  constructor(
    message: string,
    public readonly alignmentFile: string,
    public readonly operation: "count" | "idxstats" | "sample",
    context?: string
  ) {
    super(message, "ALIGNMENT_STATS_ERROR", undefined, context);
    this.name = "AlignmentStatsError";
  }
}

/**
 * Illegal transition of per-sample state, e.g. a second classification
 */
export class ContextStateError extends CoverageError {
  constructor(
    message: string,
    public readonly sampleName: string,
    public readonly field: string
  ) {
    super(message, "CONTEXT_STATE_ERROR");
    this.name = "ContextStateError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  INVALID_BED_COORDINATES: "BED coordinates must be non-negative integers with start <= end",
  MISSING_FASTA_INDEX: "Create the reference index with `samtools faidx <reference>`",
  DEPTH_TOOL_FAILED: "Check that mosdepth is on PATH and the alignment file is indexed",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: CoverageError): string | undefined {
  if (error instanceof BedError) {
    return ERROR_SUGGESTIONS.INVALID_BED_COORDINATES;
  }
  if (error instanceof DepthToolError) {
    return ERROR_SUGGESTIONS.DEPTH_TOOL_FAILED;
  }
  if (error instanceof FileError && error.filePath.endsWith(".fai")) {
    return ERROR_SUGGESTIONS.MISSING_FASTA_INDEX;
  }
  if (error instanceof ParseError) {
    return ERROR_SUGGESTIONS.MALFORMED_LINE;
  }
  return undefined;
}
