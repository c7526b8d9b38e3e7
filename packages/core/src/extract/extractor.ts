/**
 * Reference Extractor
 *
 * Turns scanned macro calls into log reference entries: filters calls by the
 * configured macro names and directives, then decides where each call's
 * reference lives.
 */

import { scanSource, skipTrivia } from "../grammar/scanner.js";
import type { MacroCall, ScanError } from "../grammar/types.js";
import {
  REFERENCE_KEY,
  extractReference,
  parseReferenceId,
  type LogReferenceEntry,
} from "../model/entry.js";
import { LineIndex } from "../model/position.js";
import { DEFAULT_COMMENT_PATTERN, hasIgnoreDirective, hasNoKvpDirective } from "./directives.js";
import { createMacroMatcher, type MacroMatcher, type MacroSpecifier } from "./macros.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

export interface ExtractOptions {
  /** Log macros whose call sites carry references. */
  macros: readonly MacroSpecifier[];
  /** Keep references in a `ref = N` key-value argument instead of the message text. */
  structured?: boolean;
  /** Comment pattern for directives; defaults to `//` and single-line block comments. */
  commentPattern?: RegExp;
}

export interface ExtractionResult {
  entries: LogReferenceEntry[];
  /** Set when the text could not be scanned; `entries` is then empty. */
  error?: ScanError;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Find log reference entries in `code`, in source order.
 */
export function extractReferences(code: string, options: ExtractOptions): ExtractionResult {
  const scanned = scanSource(code);
  if (!scanned.ok) {
    return { entries: [], error: scanned.error };
  }

  const extractor = new ReferenceExtractor(code, options);
  const entries: LogReferenceEntry[] = [];
  for (const call of scanned.calls) {
    const entry = extractor.entryFor(call);
    if (entry) entries.push(entry);
  }

  entries.sort((a, b) => a.position.offset - b.position.offset);
  return { entries };
}

/**
 * Find log reference entries in `code`. Unparseable text yields no entries.
 */
export function findReferences(code: string, options: ExtractOptions): LogReferenceEntry[] {
  return extractReferences(code, options).entries;
}

/* =============================================================================
 * EXTRACTOR
 * ============================================================================= */

class ReferenceExtractor {
  private readonly lines: LineIndex;
  private readonly matcher: MacroMatcher;
  private readonly structured: boolean;
  private readonly commentPattern: RegExp;

  constructor(private readonly code: string, options: ExtractOptions) {
    this.lines = new LineIndex(code);
    this.matcher = createMacroMatcher(options.macros);
    this.structured = options.structured ?? false;
    this.commentPattern = options.commentPattern ?? DEFAULT_COMMENT_PATTERN;
  }

  entryFor(call: MacroCall): LogReferenceEntry | undefined {
    // Calls without a message literal are not log statements.
    if (!call.message) return undefined;

    const macroName = this.matcher.match(call.name);
    if (macroName === undefined) return undefined;

    const subject = call.span.start;
    if (hasIgnoreDirective(this.code, subject, this.commentPattern)) return undefined;

    if (!this.structured || hasNoKvpDirective(this.code, subject, this.commentPattern)) {
      const content = call.message.content;
      return {
        position: this.lines.positionAt(content.start),
        reference: extractReference(this.code.slice(content.start, content.end)),
        macroName,
        kind: "string",
      };
    }

    return this.structuredEntry(call, macroName);
  }

  private structuredEntry(call: MacroCall, macroName: string): LogReferenceEntry {
    const existing = call.keyValues.find((kv) => kv.key === REFERENCE_KEY);

    if (existing) {
      const value = existing.value;
      return {
        position: this.lines.positionAt(value?.start ?? existing.keySpan.end),
        reference: value ? this.readReferenceValue(value.start, value.end) : undefined,
        macroName,
        kind: "structured-pre-existing",
      };
    }

    // A new `ref` argument goes first, but after any `target:` argument.
    const insertAt = call.target
      ? skipTrivia(this.code, call.target.span.end + 1, call.closeParen)
      : call.openParen + 1;

    return {
      position: this.lines.positionAt(insertAt),
      reference: undefined,
      macroName,
      kind: "structured-new",
      insertionPrefix: `${REFERENCE_KEY} = `,
      insertionSuffix: call.keyValues.length === 0 ? "; " : ", ",
    };
  }

  private readReferenceValue(start: number, end: number): number | undefined {
    return parseReferenceId(this.code.slice(start, end).trim());
  }
}
