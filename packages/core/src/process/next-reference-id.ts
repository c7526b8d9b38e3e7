/**
 * First pass of `generate`: find the highest reference in use.
 */

import type { Logger } from "../logger.js";
import type { ReferenceProcessor } from "./types.js";

export interface ReferenceScan {
  /** Highest reference in the file, 0 when it has none. */
  maxReference: number;
  /** Entries without a reference. */
  missing: number;
}

export interface NextReferenceId {
  /** One past the highest reference; 1 when no file holds one. */
  nextReferenceId: number;
  missing: number;
}

export function createNextReferenceIdProcessor(
  logger: Logger,
): ReferenceProcessor<void, ReferenceScan, NextReferenceId> {
  return {
    name: "next-reference-id",

    async map({ path, entries }) {
      let maxReference = 0;
      let missing = 0;
      for (const entry of entries) {
        if (entry.reference === undefined) {
          missing++;
        } else if (entry.reference > maxReference) {
          maxReference = entry.reference;
        }
      }
      logger.debug("Scanned references", { file: path, maxReference, missing });
      return { maxReference, missing };
    },

    reduce(results) {
      let maxReference = 0;
      let missing = 0;
      for (const result of results) {
        maxReference = Math.max(maxReference, result.maxReference);
        missing += result.missing;
      }
      return { nextReferenceId: maxReference + 1, missing };
    },
  };
}
