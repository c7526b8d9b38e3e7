import { join } from "node:path";
import { afterEach, describe, it, expect } from "vitest";

import {
  processReferences,
  readSourceFile,
  type ExtractOptions,
  type ReferenceProcessor,
} from "@breadlog/core";
import { createRecordingLogger, createTempTree, removeTempTree } from "./helpers.js";

const extract: ExtractOptions = { macros: [{ module: "log", name: "info" }] };

/** Collects the paths it maps, in order, with their entry counts. */
function createCollector(onMap?: (path: string) => void): ReferenceProcessor<string, string, string[]> {
  return {
    name: "collect",
    async map({ path, params, entries }) {
      onMap?.(path);
      return `${params ?? ""}${path.slice(path.lastIndexOf("/") + 1)}:${entries.length}`;
    },
    reduce(results) {
      return [...results];
    },
  };
}

describe("processReferences", () => {
  let dir: string | undefined;

  afterEach(async () => {
    await removeTempTree(dir);
    dir = undefined;
  });

  it("maps every file and reduces the results", async () => {
    dir = await createTempTree({
      "a.rs": 'info!("a");\ninfo!("b");',
      "b.rs": "fn main() {}",
    });
    const files = [join(dir, "a.rs"), join(dir, "b.rs")];

    const result = await processReferences(createCollector(), "p-", { files, extract });

    expect(result).toEqual(["p-a.rs:2", "p-b.rs:0"]);
  });

  it("skips unreadable and non-UTF-8 files", async () => {
    dir = await createTempTree({
      "bad.rs": new Uint8Array([0x69, 0xff, 0xfe]),
      "good.rs": 'info!("a");',
    });
    const logger = createRecordingLogger();
    const files = [join(dir, "bad.rs"), join(dir, "missing.rs"), join(dir, "good.rs")];

    const result = await processReferences(createCollector(), undefined, { files, extract, logger });

    expect(result).toEqual(["good.rs:1"]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("maps unparseable files with no entries and a warning", async () => {
    dir = await createTempTree({ "a.rs": 'info!("oops);' });
    const logger = createRecordingLogger();

    const result = await processReferences(createCollector(), undefined, {
      files: [join(dir, "a.rs")],
      extract,
      logger,
    });

    expect(result).toEqual(["a.rs:0"]);
    expect(logger.warn).toHaveBeenCalledWith(`Failed to parse ${join(dir, "a.rs")}: Unterminated string literal`, {
      file: join(dir, "a.rs"),
      offset: 6,
    });
  });

  it("returns undefined when cancelled before starting", async () => {
    const controller = new AbortController();
    controller.abort();
    const mapped: string[] = [];

    const result = await processReferences(createCollector((path) => mapped.push(path)), undefined, {
      files: ["a.rs"],
      extract,
      signal: controller.signal,
    });

    expect(result).toBeUndefined();
    expect(mapped).toEqual([]);
  });

  it("stops between files when cancelled", async () => {
    dir = await createTempTree({ "a.rs": 'info!("a");', "b.rs": 'info!("b");' });
    const controller = new AbortController();
    const mapped: string[] = [];
    const processor = createCollector((path) => {
      mapped.push(path);
      controller.abort();
    });

    const result = await processReferences(processor, undefined, {
      files: [join(dir, "a.rs"), join(dir, "b.rs")],
      extract,
      signal: controller.signal,
      concurrency: 1,
    });

    expect(result).toBeUndefined();
    expect(mapped).toEqual([join(dir, "a.rs")]);
  });
});

describe("readSourceFile", () => {
  let dir: string | undefined;

  afterEach(async () => {
    await removeTempTree(dir);
    dir = undefined;
  });

  it("keeps a byte order mark", async () => {
    dir = await createTempTree({ "a.rs": '\uFEFFinfo!("x");' });
    expect(await readSourceFile(join(dir, "a.rs"))).toBe('\uFEFFinfo!("x");');
  });

  it("rejects invalid UTF-8", async () => {
    dir = await createTempTree({ "a.rs": new Uint8Array([0xc3, 0x28]) });
    await expect(readSourceFile(join(dir, "a.rs"))).rejects.toThrow(TypeError);
  });
});
