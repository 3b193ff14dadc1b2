/**
 * Restrict callable regions to the variant regions
 *
 * Depth is computed across the whole alignment, so quantized blocks can
 * extend past the regions of interest. The subset is rebuilt only when the
 * callable file is newer than it.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { AnalysisContext } from "../context";
import type { BedError, CompressionError, FileError } from "../errors";
import { BedWriter, intersect, readBedFile } from "../formats/bed";
import { writeString } from "../io/file-writer";
import { isUpToDate } from "../io/freshness";
import { withFileTransaction } from "../io/transaction";
import { splitExtension, transactionRoot } from "./paths";

/** `<stem>-vrsubset.bed` beside the callable file */
export function subsetPath(callableFile: string): string {
  return `${splitExtension(callableFile)[0]}-vrsubset.bed`;
}

export const subsetToVariantRegions = (
  context: AnalysisContext,
  callableFile: string,
  variantRegions: string
): Effect.Effect<string, BedError | CompressionError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const outFile = subsetPath(callableFile);
    if (yield* isUpToDate(outFile, [callableFile])) {
      return outFile;
    }

    const [callable, targets] = yield* Effect.all([
      readBedFile(callableFile),
      readBedFile(variantRegions),
    ]);
    const content = new BedWriter().formatRecords(intersect(callable, targets));

    yield* withFileTransaction(transactionRoot(context), [outFile], (tx) =>
      writeString(tx.pathFor(outFile), content)
    );
    return outFile;
  });
