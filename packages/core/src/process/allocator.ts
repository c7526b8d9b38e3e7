/**
 * Reference id allocation shared by every file of one run.
 */

import { BreadlogError, BreadlogErrorCode } from "../errors.js";
import { MAX_REFERENCE_ID } from "../model/entry.js";

/** First id handed out when no reference exists anywhere. */
export const START_REFERENCE_ID = 1;

/**
 * Monotonic id counter.
 *
 * `next()` is synchronous, so concurrent file tasks on the event loop never
 * observe the same id.
 */
export class ReferenceAllocator {
  private nextId: number;

  constructor(start: number = START_REFERENCE_ID) {
    if (!Number.isInteger(start) || start < 0) {
      throw new RangeError(`Invalid start reference id: ${start}`);
    }
    this.nextId = start;
  }

  /** Return the next id and advance. */
  next(): number {
    if (this.nextId > MAX_REFERENCE_ID) {
      throw new BreadlogError(
        `Reference ids exhausted (maximum ${MAX_REFERENCE_ID})`,
        BreadlogErrorCode.REFERENCE_SPACE_EXHAUSTED,
      );
    }
    return this.nextId++;
  }

  /** The id the next call to `next()` returns. */
  peek(): number {
    return this.nextId;
  }
}
