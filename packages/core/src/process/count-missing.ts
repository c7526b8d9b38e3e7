/**
 * `check` pass: count and report call sites without a reference.
 */

import type { Logger } from "../logger.js";
import { hasReference } from "../model/entry.js";
import type { ReferenceProcessor } from "./types.js";

export function createCountMissingProcessor(logger: Logger): ReferenceProcessor<void, number, number> {
  return {
    name: "count-missing",

    async map({ path, entries }) {
      let missing = 0;
      for (const entry of entries) {
        if (hasReference(entry)) continue;
        const { line, column } = entry.position;
        logger.warn(`Missing reference in file ${path}, line ${line}, column ${column}`, {
          file: path,
          line,
          column,
        });
        missing++;
      }
      logger.info(`Total missing references in ${path}: ${missing}`, { file: path, missing });
      return missing;
    },

    reduce(results) {
      const total = results.reduce((sum, count) => sum + count, 0);
      logger.info(`Total missing references (all files): ${total}`, { missing: total });
      return total;
    },
  };
}
