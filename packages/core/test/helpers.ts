import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";

import type { Logger, ReferenceCache } from "@breadlog/core";

export function createRecordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/** Temporary directory holding the given files. */
export async function createTempTree(files: Record<string, string | Uint8Array> = {}): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "breadlog-test-"));
  for (const [name, contents] of Object.entries(files)) {
    await writeFile(join(dir, name), contents);
  }
  return dir;
}

export async function removeTempTree(dir: string | undefined): Promise<void> {
  if (dir) await rm(dir, { recursive: true, force: true });
}

export async function listFiles(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}

export class MemoryCache implements ReferenceCache {
  stored: number[] = [];

  constructor(private value?: number) {}

  async load(): Promise<number | undefined> {
    return this.value;
  }

  async store(nextReferenceId: number): Promise<void> {
    this.stored.push(nextReferenceId);
    this.value = nextReferenceId;
  }
}
