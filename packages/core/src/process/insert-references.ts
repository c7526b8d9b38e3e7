/**
 * `generate` pass: write missing references into each file.
 */

import { describeError, isBreadlogError } from "../errors.js";
import { ScratchFile } from "../io/scratch-file.js";
import type { Logger } from "../logger.js";
import {
  hasUsableReferencePosition,
  insertableReferenceString,
  needsReference,
} from "../model/entry.js";
import type { ReferenceAllocator } from "./allocator.js";
import type { ReferenceProcessor } from "./types.js";

export interface InsertResult {
  failed: boolean;
  /** References written (or buffered, when the file failed late). */
  inserted: number;
}

export function createInsertReferencesProcessor(
  logger: Logger,
): ReferenceProcessor<ReferenceAllocator, InsertResult, InsertResult> {
  return {
    name: "insert-references",

    async map({ path, contents, params: allocator, entries }) {
      for (const entry of entries) {
        if (!hasUsableReferencePosition(entry)) {
          const { line, column } = entry.position;
          logger.warn(`Reference in file ${path}, line ${line}, column ${column} is not an integer; leaving it as is`, {
            file: path,
            line,
            column,
          });
        }
      }

      const candidates = entries.filter(needsReference);
      if (candidates.length === 0) return { failed: false, inserted: 0 };

      if (!allocator) {
        logger.error(`No reference allocator available for ${path}`, { file: path });
        return { failed: true, inserted: 0 };
      }

      let scratch: ScratchFile;
      try {
        scratch = await ScratchFile.create(path, logger);
      } catch (error) {
        logger.error(`Failed to create scratch file for ${path}`, { file: path, error: describeError(error) });
        return { failed: true, inserted: 0 };
      }

      let cursor = 0;
      let inserted = 0;
      try {
        for (const entry of candidates) {
          const offset = entry.position.offset;
          if (offset < cursor) {
            logger.error(`Out-of-order reference position in ${path} at offset ${offset}`, { file: path, offset });
            await scratch.discard();
            return { failed: true, inserted: 0 };
          }
          await scratch.write(contents.slice(cursor, offset));
          await scratch.write(insertableReferenceString(entry, allocator.next()));
          cursor = offset;
          inserted++;
        }
        await scratch.write(contents.slice(cursor));
        await scratch.commit();
      } catch (error) {
        await scratch.discard();
        if (isBreadlogError(error)) throw error;
        logger.error(`Failed to write references to ${path}`, { file: path, error: describeError(error) });
        return { failed: true, inserted };
      }

      logger.debug(`Inserted ${inserted} reference(s) in ${path}`, { file: path, inserted });
      return { failed: false, inserted };
    },

    reduce(results) {
      return results.reduce<InsertResult>(
        (total, result) => ({
          failed: total.failed || result.failed,
          inserted: total.inserted + result.inserted,
        }),
        { failed: false, inserted: 0 },
      );
    },
  };
}
