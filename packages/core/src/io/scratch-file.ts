/**
 * Crash-safe file rewriting: text goes to a scratch file beside the target,
 * which is renamed over the target only once it is complete.
 */

import { randomUUID } from "node:crypto";
import { open, rename, rm, stat, type FileHandle } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { describeError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

const PERMISSION_BITS = 0o7777;

export class ScratchFile {
  private closed = false;

  private constructor(
    /** Path of the scratch file. */
    readonly path: string,
    /** File replaced on commit. */
    readonly target: string,
    private readonly handle: FileHandle,
    private readonly logger: Logger,
  ) {}

  /**
   * Create an empty scratch file in `target`'s directory, so the final rename
   * stays on one file system.
   */
  static async create(target: string, logger: Logger = silentLogger): Promise<ScratchFile> {
    const path = join(dirname(target), `.${basename(target)}.${randomUUID()}.breadlog.tmp`);
    const handle = await open(path, "wx");
    return new ScratchFile(path, target, handle, logger);
  }

  /** Append UTF-8 text. */
  async write(text: string): Promise<void> {
    if (text.length === 0) return;
    await this.handle.write(text, null, "utf8");
  }

  /** Give the scratch file the target's permissions and move it over the target. */
  async commit(): Promise<void> {
    const { mode } = await stat(this.target);
    await this.handle.chmod(mode & PERMISSION_BITS);
    await this.close();
    await rename(this.path, this.target);
  }

  /** Close and delete the scratch file. Cleanup failures are only logged. */
  async discard(): Promise<void> {
    try {
      await this.close();
    } catch (error) {
      this.logger.debug("Failed to close scratch file", { file: this.path, error: describeError(error) });
    }
    try {
      await rm(this.path, { force: true });
    } catch (error) {
      this.logger.debug("Failed to remove scratch file", { file: this.path, error: describeError(error) });
    }
  }

  private async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
