/**
 * Runs a reference processor over a set of files.
 *
 * Each file is read, extracted and mapped in sequence; files run concurrently
 * up to the configured limit. Results are reduced once every file is done.
 */

import { readFile } from "node:fs/promises";
import pLimit from "p-limit";

import { describeError } from "../errors.js";
import { extractReferences, type ExtractOptions } from "../extract/extractor.js";
import { silentLogger, type Logger } from "../logger.js";
import type { ReferenceProcessor } from "./types.js";

export const DEFAULT_CONCURRENCY = 8;

export interface ProcessContext {
  /** Source files to process. */
  files: readonly string[];
  extract: ExtractOptions;
  logger?: Logger;
  /** Checked before the run, before each file and after the last one. */
  signal?: AbortSignal;
  /** Files processed at once. */
  concurrency?: number;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Map every file through `processor` and reduce the results.
 *
 * Returns undefined when the run was cancelled.
 */
export async function processReferences<Params, MapResult, ReduceResult>(
  processor: ReferenceProcessor<Params, MapResult, ReduceResult>,
  params: Params | undefined,
  context: ProcessContext,
): Promise<ReduceResult | undefined> {
  const logger = context.logger ?? silentLogger;
  const { signal } = context;
  if (signal?.aborted) return undefined;

  const limit = pLimit(context.concurrency ?? DEFAULT_CONCURRENCY);
  const results = await Promise.all(
    context.files.map((path) =>
      limit(async () => {
        if (signal?.aborted) return undefined;
        return processFile(processor, params, path, context.extract, logger);
      }),
    ),
  );

  if (signal?.aborted) {
    logger.warn(`Cancelled ${processor.name}`);
    return undefined;
  }

  return processor.reduce(results.filter(isDefined));
}

/**
 * Read a file as strict UTF-8. A byte order mark is kept so offsets and
 * rewrites cover the whole file.
 */
export async function readSourceFile(path: string): Promise<string> {
  const bytes = await readFile(path);
  return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
}

/* =============================================================================
 * INTERNAL
 * ============================================================================= */

async function processFile<Params, MapResult>(
  processor: ReferenceProcessor<Params, MapResult, unknown>,
  params: Params | undefined,
  path: string,
  extract: ExtractOptions,
  logger: Logger,
): Promise<MapResult | undefined> {
  let contents: string;
  try {
    contents = await readSourceFile(path);
  } catch (error) {
    logger.warn(`Skipping ${path}: ${describeError(error)}`, { file: path });
    return undefined;
  }

  const { entries, error } = extractReferences(contents, extract);
  if (error) {
    logger.warn(`Failed to parse ${path}: ${error.message}`, { file: path, offset: error.offset });
  }

  return processor.map({ path, contents, params, entries });
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}
