/**
 * Gzip support for region and depth artifacts
 *
 * Depth tool outputs are BGZF, i.e. a series of concatenated gzip members,
 * so decompression goes through zlib, which reads every member. Compression
 * of files this package writes uses fflate.
 */

import { gunzipSync } from "node:zlib";
import { type GzipOptions, gzipSync } from "fflate";
import { CompressionError } from "../errors";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip", ".bgz"] as const;

/**
 * Detect gzip from a file name
 */
export function isGzipPath(path: string): boolean {
  const lower = path.toLowerCase();
  return GZIP_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Detect gzip from the first two bytes
 */
export function hasGzipMagic(data: Uint8Array): boolean {
  return (
    data.length >= 2 && data[0] === GZIP_MAGIC_FIRST_BYTE && data[1] === GZIP_MAGIC_SECOND_BYTE
  );
}

/**
 * Decompress gzip or BGZF data
 *
 * An empty input decompresses to an empty output; mosdepth writes empty
 * region files for targets with no intervals on some builds.
 *
 * @throws {CompressionError} On corrupt or non-gzip data
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  if (compressed.length === 0) {
    return compressed;
  }
  if (!hasGzipMagic(compressed)) {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "decompress"
    );
  }
  try {
    return new Uint8Array(gunzipSync(compressed));
  } catch (error) {
    throw CompressionError.fromSystemError("decompress", error);
  }
}

/**
 * Compress data as a single gzip member
 *
 * @throws {CompressionError} If fflate rejects the input
 */
export function compress(data: Uint8Array, level: GzipOptions["level"] = 6): Uint8Array {
  try {
    return gzipSync(data, { level });
  } catch (error) {
    throw CompressionError.fromSystemError("compress", error);
  }
}
