/**
 * Reference processor tests.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, it, expect } from "vitest";

import {
  ReferenceAllocator,
  createCountMissingProcessor,
  createInsertReferencesProcessor,
  createNextReferenceIdProcessor,
  findReferences,
  type ExtractOptions,
} from "@breadlog/core";
import { createRecordingLogger, createTempTree, listFiles, removeTempTree } from "./helpers.js";

const extract: ExtractOptions = { macros: [{ module: "log", name: "info" }] };

describe("next-reference-id", () => {
  const processor = createNextReferenceIdProcessor(createRecordingLogger());

  it("finds the highest reference and counts missing ones", async () => {
    const contents = 'info!("[ref: 9] a");\ninfo!("b");\ninfo!("[ref: 4] c");';
    const entries = findReferences(contents, extract);

    expect(await processor.map({ path: "a.rs", contents, params: undefined, entries })).toEqual({
      maxReference: 9,
      missing: 1,
    });
  });

  it("reduces to one past the highest reference", () => {
    expect(
      processor.reduce([
        { maxReference: 9, missing: 1 },
        { maxReference: 10, missing: 0 },
      ]),
    ).toEqual({ nextReferenceId: 11, missing: 1 });
  });

  it("starts at 1 when no file has a reference", () => {
    expect(processor.reduce([])).toEqual({ nextReferenceId: 1, missing: 0 });
    expect(processor.reduce([{ maxReference: 0, missing: 2 }])).toEqual({ nextReferenceId: 1, missing: 2 });
  });
});

describe("count-missing", () => {
  it("reports each missing reference", async () => {
    const logger = createRecordingLogger();
    const processor = createCountMissingProcessor(logger);
    const contents = 'info!("a");\ninfo!("[ref: 1] b");\ninfo!("c");';
    const entries = findReferences(contents, extract);

    expect(await processor.map({ path: "src/a.rs", contents, params: undefined, entries })).toBe(2);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenNthCalledWith(1, "Missing reference in file src/a.rs, line 1, column 8", {
      file: "src/a.rs",
      line: 1,
      column: 8,
    });
    expect(logger.warn).toHaveBeenNthCalledWith(2, "Missing reference in file src/a.rs, line 3, column 8", {
      file: "src/a.rs",
      line: 3,
      column: 8,
    });
    expect(logger.info).toHaveBeenCalledWith("Total missing references in src/a.rs: 2", {
      file: "src/a.rs",
      missing: 2,
    });
  });

  it("reports a subtotal for files without missing references", async () => {
    const logger = createRecordingLogger();
    const processor = createCountMissingProcessor(logger);
    const contents = 'info!("[ref: 1] a");';
    const entries = findReferences(contents, extract);

    expect(await processor.map({ path: "src/b.rs", contents, params: undefined, entries })).toBe(0);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith("Total missing references in src/b.rs: 0", {
      file: "src/b.rs",
      missing: 0,
    });
  });

  it("sums the files", () => {
    const logger = createRecordingLogger();
    const processor = createCountMissingProcessor(logger);

    expect(processor.reduce([2, 3])).toBe(5);
    expect(logger.info).toHaveBeenCalledWith("Total missing references (all files): 5", { missing: 5 });
  });
});

describe("insert-references", () => {
  let dir: string | undefined;

  afterEach(async () => {
    await removeTempTree(dir);
    dir = undefined;
  });

  const contents = 'info!("a");\ninfo!("[ref: 4] b");\ninfo!("c");\n';

  it("writes references at every missing position", async () => {
    dir = await createTempTree({ "a.rs": contents });
    const path = join(dir, "a.rs");
    const allocator = new ReferenceAllocator(10);
    const processor = createInsertReferencesProcessor(createRecordingLogger());

    const result = await processor.map({ path, contents, params: allocator, entries: findReferences(contents, extract) });

    expect(result).toEqual({ failed: false, inserted: 2 });
    expect(await readFile(path, "utf8")).toBe('info!("[ref: 10] a");\ninfo!("[ref: 4] b");\ninfo!("[ref: 11] c");\n');
    expect(allocator.peek()).toBe(12);
    expect(await listFiles(dir)).toEqual(["a.rs"]);
  });

  it("writes structured references", async () => {
    const code = 'info!(user = 1; "hi");\ninfo!("plain");\n';
    dir = await createTempTree({ "a.rs": code });
    const path = join(dir, "a.rs");
    const processor = createInsertReferencesProcessor(createRecordingLogger());
    const entries = findReferences(code, { ...extract, structured: true });

    const result = await processor.map({ path, contents: code, params: new ReferenceAllocator(1), entries });

    expect(result).toEqual({ failed: false, inserted: 2 });
    expect(await readFile(path, "utf8")).toBe('info!(ref = 1, user = 1; "hi");\ninfo!(ref = 2; "plain");\n');
  });

  it("succeeds without an allocator when nothing is missing", async () => {
    const code = 'info!("[ref: 1] a");';
    const processor = createInsertReferencesProcessor(createRecordingLogger());

    const result = await processor.map({
      path: "unused.rs",
      contents: code,
      params: undefined,
      entries: findReferences(code, extract),
    });

    expect(result).toEqual({ failed: false, inserted: 0 });
  });

  it("fails without an allocator", async () => {
    dir = await createTempTree({ "a.rs": contents });
    const path = join(dir, "a.rs");
    const logger = createRecordingLogger();
    const processor = createInsertReferencesProcessor(logger);

    const result = await processor.map({ path, contents, params: undefined, entries: findReferences(contents, extract) });

    expect(result).toEqual({ failed: true, inserted: 0 });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(await readFile(path, "utf8")).toBe(contents);
    expect(await listFiles(dir)).toEqual(["a.rs"]);
  });

  it("aborts the file on out-of-order positions", async () => {
    dir = await createTempTree({ "a.rs": contents });
    const path = join(dir, "a.rs");
    const processor = createInsertReferencesProcessor(createRecordingLogger());
    const entries = findReferences(contents, extract).reverse();

    const result = await processor.map({ path, contents, params: new ReferenceAllocator(1), entries });

    expect(result).toEqual({ failed: true, inserted: 0 });
    expect(await readFile(path, "utf8")).toBe(contents);
    expect(await listFiles(dir)).toEqual(["a.rs"]);
  });

  it("leaves a non-integer structured reference alone", async () => {
    const code = 'info!(ref = some_id; "x");';
    const logger = createRecordingLogger();
    const processor = createInsertReferencesProcessor(logger);
    const entries = findReferences(code, { ...extract, structured: true });

    const result = await processor.map({ path: "a.rs", contents: code, params: new ReferenceAllocator(1), entries });

    expect(result).toEqual({ failed: false, inserted: 0 });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("reports buffered insertions when the rename fails", async () => {
    dir = await createTempTree();
    // The target does not exist, so committing over it fails.
    const path = join(dir, "gone.rs");
    const processor = createInsertReferencesProcessor(createRecordingLogger());

    const result = await processor.map({
      path,
      contents,
      params: new ReferenceAllocator(1),
      entries: findReferences(contents, extract),
    });

    expect(result).toEqual({ failed: true, inserted: 2 });
    expect(await listFiles(dir)).toEqual([]);
  });

  it("fails when the scratch file cannot be created", async () => {
    dir = await createTempTree();
    const processor = createInsertReferencesProcessor(createRecordingLogger());

    const result = await processor.map({
      path: join(dir, "missing", "a.rs"),
      contents,
      params: new ReferenceAllocator(1),
      entries: findReferences(contents, extract),
    });

    expect(result).toEqual({ failed: true, inserted: 0 });
  });

  it("reduces counts and failures", () => {
    const processor = createInsertReferencesProcessor(createRecordingLogger());

    expect(
      processor.reduce([
        { failed: false, inserted: 2 },
        { failed: true, inserted: 1 },
      ]),
    ).toEqual({ failed: true, inserted: 3 });
    expect(processor.reduce([])).toEqual({ failed: false, inserted: 0 });
  });
});
