/**
 * The `check` and `generate` commands.
 */

import { describeError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { ReferenceAllocator } from "./process/allocator.js";
import { createCountMissingProcessor } from "./process/count-missing.js";
import { createInsertReferencesProcessor } from "./process/insert-references.js";
import { createNextReferenceIdProcessor } from "./process/next-reference-id.js";
import { processReferences, type ProcessContext } from "./process/orchestrator.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

/** Why a command did not succeed. */
export const CommandFailure = {
  NO_FILES: "NO_FILES",
  MISSING_REFERENCES: "MISSING_REFERENCES",
  CANCELLED: "CANCELLED",
  INSERT_FAILED: "INSERT_FAILED",
} as const;

export type CommandFailureCode = (typeof CommandFailure)[keyof typeof CommandFailure];

/** Storage for the next reference id between runs. */
export interface ReferenceCache {
  /** The stored id, or undefined when nothing usable is stored. */
  load(): Promise<number | undefined>;
  store(nextReferenceId: number): Promise<void>;
}

export interface CommandContext extends ProcessContext {
  cache?: ReferenceCache;
}

export interface CheckResult {
  ok: boolean;
  missing: number;
  failure?: CommandFailureCode;
}

export interface GenerateResult {
  ok: boolean;
  inserted: number;
  nextReferenceId?: number;
  failure?: CommandFailureCode;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Report every log call site without a reference. Never writes.
 */
export async function checkReferences(context: CommandContext): Promise<CheckResult> {
  const logger = context.logger ?? silentLogger;
  if (!hasFiles(context, logger)) {
    return { ok: false, missing: 0, failure: CommandFailure.NO_FILES };
  }

  const missing = await processReferences(createCountMissingProcessor(logger), undefined, context);
  if (missing === undefined) {
    return { ok: false, missing: 0, failure: CommandFailure.CANCELLED };
  }
  if (missing > 0) {
    logger.error("One or more missing references were found", { missing });
    return { ok: false, missing, failure: CommandFailure.MISSING_REFERENCES };
  }
  return { ok: true, missing };
}

/**
 * Insert a reference at every log call site that lacks one.
 *
 * The next id comes from the cache when it has one, otherwise from a first
 * pass over the files. The cache is updated only when every file succeeded.
 */
export async function generateCode(context: CommandContext): Promise<GenerateResult> {
  const logger = context.logger ?? silentLogger;
  if (!hasFiles(context, logger)) {
    return { ok: false, inserted: 0, failure: CommandFailure.NO_FILES };
  }

  let start = await loadCachedId(context.cache, logger);
  if (start !== undefined) {
    logger.info("Using cached next reference ID", { nextReferenceId: start });
  } else {
    logger.info("Performing first pass to determine next reference ID");
    const scan = await processReferences(createNextReferenceIdProcessor(logger), undefined, context);
    if (!scan) {
      return { ok: false, inserted: 0, failure: CommandFailure.CANCELLED };
    }
    if (scan.missing === 0) {
      logger.info("No missing references - nothing to do");
      return { ok: true, inserted: 0, nextReferenceId: scan.nextReferenceId };
    }
    start = scan.nextReferenceId;
  }

  logger.info(`Next reference ID: ${start}`, { nextReferenceId: start });
  const allocator = new ReferenceAllocator(start);
  const result = await processReferences(createInsertReferencesProcessor(logger), allocator, context);
  const nextReferenceId = allocator.peek();

  if (!result) {
    return {
      ok: false,
      inserted: nextReferenceId - start,
      nextReferenceId,
      failure: CommandFailure.CANCELLED,
    };
  }

  logger.info(`Num. inserted reference(s): ${result.inserted}`, { inserted: result.inserted });
  if (result.failed) {
    logger.error("Failed to insert references");
    return { ok: false, inserted: result.inserted, nextReferenceId, failure: CommandFailure.INSERT_FAILED };
  }

  await storeCachedId(context.cache, nextReferenceId, logger);
  return { ok: true, inserted: result.inserted, nextReferenceId };
}

/* =============================================================================
 * INTERNAL
 * ============================================================================= */

function hasFiles(context: CommandContext, logger: Logger): boolean {
  if (context.files.length === 0) {
    logger.error("No files found");
    return false;
  }
  logger.info(`Found ${context.files.length} file(s)`, { files: context.files.length });
  return true;
}

async function loadCachedId(cache: ReferenceCache | undefined, logger: Logger): Promise<number | undefined> {
  if (!cache) return undefined;
  try {
    return await cache.load();
  } catch (error) {
    logger.warn(`Ignoring reference cache: ${describeError(error)}`);
    return undefined;
  }
}

async function storeCachedId(
  cache: ReferenceCache | undefined,
  nextReferenceId: number,
  logger: Logger,
): Promise<void> {
  if (!cache) return;
  try {
    await cache.store(nextReferenceId);
  } catch (error) {
    logger.warn(`Failed to update reference cache: ${describeError(error)}`);
  }
}
