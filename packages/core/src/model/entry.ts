/**
 * Log reference entries: one per discovered log call site.
 */

import type { CodePosition } from "./position.js";

/** Largest reference id; references are unsigned 32-bit values. */
export const MAX_REFERENCE_ID = 4294967295;

/** Name of the key-value argument that holds a structured reference. */
export const REFERENCE_KEY = "ref";

/**
 * How a reference is represented at a call site.
 *
 * - `string`: leading `[ref: N]` text in the log message literal
 * - `structured-pre-existing`: a `ref = N` argument that already exists
 * - `structured-new`: no `ref` argument yet; one is synthesised on insert
 */
export type LogReferenceKind = "unknown" | "string" | "structured-pre-existing" | "structured-new";

export interface LogReferenceEntry {
  /** Where the reference is read from, or where a new one is written. */
  position: CodePosition;
  reference?: number;
  /** Macro name without its module path. */
  macroName: string;
  kind: LogReferenceKind;
  /** Text written before an inserted id. */
  insertionPrefix?: string;
  /** Text written after an inserted id. */
  insertionSuffix?: string;
}

const LOG_REFERENCE_PATTERN = /^\[ref: ([0-9]{1,10})\]/;

/**
 * Read the reference from a log message literal.
 *
 * Only a leading `[ref: N]` counts; values that do not fit in 32 bits are ignored.
 */
export function extractReference(literal: string): number | undefined {
  const match = LOG_REFERENCE_PATTERN.exec(literal);
  if (!match?.[1]) return undefined;
  return parseReferenceId(match[1]);
}

/** Parse a decimal reference id, rejecting anything outside the u32 range. */
export function parseReferenceId(text: string): number | undefined {
  if (!/^[0-9]{1,10}$/.test(text)) return undefined;
  const value = Number(text);
  return value <= MAX_REFERENCE_ID ? value : undefined;
}

export function hasReference(entry: LogReferenceEntry): boolean {
  return entry.reference !== undefined;
}

/**
 * A structured `ref` argument whose value is not an integer still occupies the
 * slot, but nothing can be written there.
 */
export function hasUsableReferencePosition(entry: LogReferenceEntry): boolean {
  return !(entry.kind === "structured-pre-existing" && !hasReference(entry));
}

/** True when a reference is missing and one can be inserted at the entry's position. */
export function needsReference(entry: LogReferenceEntry): boolean {
  return !hasReference(entry) && hasUsableReferencePosition(entry);
}

/**
 * Text to insert for `referenceId`.
 *
 * Entries without a prefix or suffix take the message form `[ref: N] `.
 */
export function insertableReferenceString(entry: LogReferenceEntry, referenceId: number): string {
  if (entry.insertionPrefix === undefined && entry.insertionSuffix === undefined) {
    return `[ref: ${referenceId}] `;
  }
  return `${entry.insertionPrefix ?? ""}${referenceId}${entry.insertionSuffix ?? ""}`;
}
