/**
 * Lock-file cache for the next reference id.
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";

import {
  BreadlogError,
  BreadlogErrorCode,
  MAX_REFERENCE_ID,
  describeError,
  silentLogger,
  type Logger,
  type ReferenceCache,
} from "@breadlog/core";

export const LOCK_FILE_NAME = "Breadlog.lock";

const BANNER = [
  "# This file is generated by breadlog and used to speed up reference insertion.",
  "# Do not edit it by hand.",
  "",
].join("\n");

const LockFileSchema = z.object({
  // One past the last id handed out, so the maximum id itself may follow.
  next_reference_id: z.number().int().min(0).max(MAX_REFERENCE_ID + 1),
});

/**
 * `Breadlog.lock` beside the configuration file.
 *
 * Unreadable or malformed content counts as a miss.
 */
export class LockFileCache implements ReferenceCache {
  readonly path: string;

  constructor(configDir: string, private readonly logger: Logger = silentLogger) {
    this.path = join(configDir, LOCK_FILE_NAME);
  }

  async load(): Promise<number | undefined> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn(`Failed to read ${this.path}: ${describeError(error)}`, { file: this.path });
      }
      return undefined;
    }

    try {
      return this.parse(text);
    } catch (error) {
      this.logger.warn(describeError(error), { file: this.path });
      return undefined;
    }
  }

  async store(nextReferenceId: number): Promise<void> {
    await writeFile(this.path, BANNER + stringify({ next_reference_id: nextReferenceId }), "utf8");
  }

  private parse(text: string): number {
    let document: unknown;
    try {
      document = parse(text);
    } catch (error) {
      throw new BreadlogError(`Invalid lock file ${this.path}`, BreadlogErrorCode.CACHE_INVALID, this.path, {
        cause: error,
      });
    }
    const result = LockFileSchema.safeParse(document);
    if (!result.success) {
      throw new BreadlogError(
        `Invalid lock file ${this.path}: expected next_reference_id`,
        BreadlogErrorCode.CACHE_INVALID,
        this.path,
      );
    }
    return result.data.next_reference_id;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
