import { describe, it, expect } from "vitest";
import {
  codePosition,
  extractReference,
  hasReference,
  hasUsableReferencePosition,
  insertableReferenceString,
  needsReference,
  parseReferenceId,
  type LogReferenceEntry,
} from "@breadlog/core";

function entry(overrides: Partial<LogReferenceEntry> = {}): LogReferenceEntry {
  return {
    position: codePosition(0, 1, 1),
    macroName: "info",
    kind: "string",
    ...overrides,
  };
}

describe("extractReference", () => {
  it("reads a leading reference", () => {
    expect(extractReference("[ref: 0] message")).toBe(0);
    expect(extractReference("[ref: 42]")).toBe(42);
    expect(extractReference("[ref: 4294967295] message")).toBe(4294967295);
  });

  it("rejects values outside 32 bits", () => {
    expect(extractReference("[ref: 4294967296] message")).toBeUndefined();
    expect(extractReference("[ref: 12345678901] message")).toBeUndefined();
  });

  it("only accepts the reference at the start", () => {
    expect(extractReference("message [ref: 1]")).toBeUndefined();
    expect(extractReference(" [ref: 1] message")).toBeUndefined();
  });

  it("rejects malformed references", () => {
    expect(extractReference("[ref: abc] message")).toBeUndefined();
    expect(extractReference("ref: 1 message")).toBeUndefined();
    expect(extractReference("[ref:1] message")).toBeUndefined();
  });

  it("takes the first of several references", () => {
    expect(extractReference("[ref: 1] [ref: 2]")).toBe(1);
  });
});

describe("parseReferenceId", () => {
  it("parses unsigned decimal ids", () => {
    expect(parseReferenceId("7")).toBe(7);
    expect(parseReferenceId("007")).toBe(7);
  });

  it("rejects everything else", () => {
    expect(parseReferenceId("-1")).toBeUndefined();
    expect(parseReferenceId("1.5")).toBeUndefined();
    expect(parseReferenceId("id")).toBeUndefined();
    expect(parseReferenceId("")).toBeUndefined();
  });
});

describe("entry predicates", () => {
  it("string entries always have a usable position", () => {
    expect(hasUsableReferencePosition(entry())).toBe(true);
    expect(needsReference(entry())).toBe(true);
    expect(needsReference(entry({ reference: 3 }))).toBe(false);
    expect(hasReference(entry({ reference: 0 }))).toBe(true);
  });

  it("a pre-existing structured slot without an integer cannot take a reference", () => {
    const unusable = entry({ kind: "structured-pre-existing" });

    expect(hasReference(unusable)).toBe(false);
    expect(hasUsableReferencePosition(unusable)).toBe(false);
    expect(needsReference(unusable)).toBe(false);
  });
});

describe("insertableReferenceString", () => {
  it("uses the message form without prefix or suffix", () => {
    expect(insertableReferenceString(entry(), 7)).toBe("[ref: 7] ");
  });

  it("wraps the id in prefix and suffix", () => {
    const structured = entry({ kind: "structured-new", insertionPrefix: "ref = ", insertionSuffix: "; " });
    expect(insertableReferenceString(structured, 7)).toBe("ref = 7; ");
  });
});
