import { describe, expect, test } from "vitest";
import {
  BedError,
  CompressionError,
  DepthToolError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  ParseError,
  PreconditionError,
} from "../src/errors";

describe("errors", () => {
  test("toString carries line and context", () => {
    const error = new ParseError("Expected contig, depth and fraction", "distribution", 3, "total\t1");
    expect(error.toString()).toBe(
      "ParseError: Expected contig, depth and fraction (line 3)\nContext: total\t1"
    );
  });

  test("depth tool failures show exit code and command", () => {
    const error = new DepthToolError("mosdepth exited with code 2", "mosdepth", 2, "mosdepth -t 1 p a.bam");
    expect(error.toString()).toBe(
      "DepthToolError: mosdepth exited with code 2\nExit code: 2\nCommand: mosdepth -t 1 p a.bam"
    );
  });

  test("system errors get a suggestion", () => {
    const error = FileError.fromSystemError("read", "/x.bed", new Error("ENOENT: no such file"));
    expect(error.message).toBe(
      "read operation failed for /x.bed: ENOENT: no such file. Check that the file path is correct and the file exists"
    );
    expect(error.code).toBe("FILE_ERROR");
  });

  test("platform errors that are not Error instances keep their message", () => {
    const platformError = {
      _tag: "SystemError",
      reason: "PermissionDenied",
      message: "PermissionDenied: FileSystem.writeFile (/out.bed): EACCES: permission denied",
    };
    const error = FileError.fromSystemError("write", "/out.bed", platformError);

    expect(error.message).toBe(
      "write operation failed for /out.bed: PermissionDenied: FileSystem.writeFile (/out.bed): EACCES: permission denied. Check file permissions or run with appropriate privileges"
    );
    expect(error.toString()).toBe(
      `FileError: ${error.message}\nContext: System error: ${platformError.message}\nSystem Error: PermissionDenied: FileSystem.writeFile (/out.bed): EACCES: permission denied`
    );
    expect(CompressionError.fromSystemError("decompress", { message: "invalid header" }).message).toBe(
      "gzip decompress failed: invalid header"
    );
  });

  test("suggestions by error kind", () => {
    expect(getErrorSuggestion(new BedError("bad"))).toBe(ERROR_SUGGESTIONS.INVALID_BED_COORDINATES);
    expect(getErrorSuggestion(new DepthToolError("x", "mosdepth"))).toBe(
      ERROR_SUGGESTIONS.DEPTH_TOOL_FAILED
    );
    expect(getErrorSuggestion(new FileError("missing", "/refs/genome.fa.fai", "read"))).toBe(
      ERROR_SUGGESTIONS.MISSING_FASTA_INDEX
    );
    expect(getErrorSuggestion(new PreconditionError("empty reference"))).toBeUndefined();
  });
});
