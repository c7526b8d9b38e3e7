/**
 * Grammar - Structural Scanner
 *
 * A shallow scanner for Rust source text. It understands just enough of the
 * lexical grammar (strings, raw strings, character literals, comments and
 * bracket nesting) to locate macro calls of the form `path!(args)` and to
 * split their arguments at top-level separators.
 */

import { CharCode, isIdentifierPart, isIdentifierStart, isWhitespace } from "./char-code.js";
import type {
  ArgumentTerminator,
  KeyValueArgument,
  MacroArgument,
  MacroCall,
  ScanResult,
  StringLiteral,
} from "./types.js";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Scan source text for macro calls.
 *
 * Calls nested in the arguments of other calls are reported as well, in order
 * of their start offset. Unterminated literals, comments or argument lists make
 * the whole text unparseable.
 */
export function scanSource(source: string): ScanResult {
  const scanner = new SourceScanner(source);
  try {
    return { ok: true, calls: scanner.scan() };
  } catch (e) {
    if (e instanceof ScanFailure) {
      return { ok: false, error: { message: e.message, offset: e.offset } };
    }
    throw e;
  }
}

/**
 * Skip whitespace and comments between `start` and `end`.
 * Returns the first significant offset, or `end` when there is none.
 */
export function skipTrivia(source: string, start: number, end: number): number {
  let i = start;
  while (i < end) {
    const ch = source.charCodeAt(i);
    if (isWhitespace(ch)) {
      i++;
      continue;
    }
    if (ch === CharCode.Slash) {
      const next = source.charCodeAt(i + 1);
      if (next === CharCode.Slash) {
        i = skipLineComment(source, i + 2);
        continue;
      }
      if (next === CharCode.Asterisk) {
        const after = skipBlockComment(source, i + 2);
        if (after < 0) return end;
        i = after;
        continue;
      }
    }
    break;
  }
  return Math.min(i, end);
}

/* =============================================================================
 * SCANNER
 * ============================================================================= */

class ScanFailure extends Error {
  constructor(message: string, public readonly offset: number) {
    super(message);
    this.name = "ScanFailure";
  }
}

interface ArgumentScan {
  closeParen: number;
  separators: Array<{ offset: number; kind: ArgumentTerminator }>;
}

class SourceScanner {
  private readonly source: string;
  private readonly length: number;

  constructor(source: string) {
    this.source = source;
    this.length = source.length;
  }

  scan(): MacroCall[] {
    const calls: MacroCall[] = [];
    let i = 0;

    while (i < this.length) {
      const literalEnd = this.skipLiteralOrComment(i);
      if (literalEnd !== undefined) {
        i = literalEnd;
        continue;
      }

      const ch = this.source.charCodeAt(i);
      if (!isIdentifierStart(ch)) {
        i++;
        continue;
      }

      const pathEnd = this.readPath(i);
      if (this.source.charCodeAt(pathEnd) === CharCode.Exclamation) {
        // `name! (…)` is a call too.
        const openParen = skipTrivia(this.source, pathEnd + 1, this.length);
        if (this.source.charCodeAt(openParen) === CharCode.OpenParen) {
          calls.push(this.readCall(i, pathEnd, openParen));
          // Continue inside the arguments so nested calls are found too.
          i = openParen + 1;
          continue;
        }
      }
      i = pathEnd;
    }

    return calls;
  }

  /* ---------------------------------------------------------------------------
   * Calls
   * --------------------------------------------------------------------------- */

  private readCall(start: number, pathEnd: number, openParen: number): MacroCall {
    const { closeParen, separators } = this.scanArguments(openParen);
    const args = this.splitArguments(openParen, closeParen, separators);

    let index = 0;
    let target: MacroArgument | undefined;
    const first = args[0];
    if (first && this.isTargetArgument(first)) {
      target = first;
      index = 1;
    }

    const keyValues: KeyValueArgument[] = [];
    let messageIndex = index;
    const terminatorIndex = args.findIndex((arg, k) => k >= index && arg.terminator === ";");
    if (terminatorIndex >= 0) {
      for (let k = index; k <= terminatorIndex; k++) {
        const arg = args[k];
        if (arg) keyValues.push(this.readKeyValue(arg));
      }
      messageIndex = terminatorIndex + 1;
    }

    const messageArg = args[messageIndex];
    const message = messageArg ? this.readStringLiteral(messageArg.contentStart) : undefined;

    return {
      span: { start, end: closeParen + 1 },
      name: this.source.slice(start, pathEnd),
      nameSpan: { start, end: pathEnd },
      openParen,
      closeParen,
      arguments: args,
      target,
      keyValues,
      message,
    };
  }

  private scanArguments(openParen: number): ArgumentScan {
    const separators: ArgumentScan["separators"] = [];
    let depth = 0;
    let i = openParen + 1;

    while (i < this.length) {
      const literalEnd = this.skipLiteralOrComment(i);
      if (literalEnd !== undefined) {
        i = literalEnd;
        continue;
      }

      const ch = this.source.charCodeAt(i);
      if (isIdentifierStart(ch)) {
        // Identifiers are consumed whole so `r`/`b` prefixes are seen only at their start.
        i = this.readIdentifier(i);
        continue;
      }

      switch (ch) {
        case CharCode.OpenParen:
        case CharCode.OpenBracket:
        case CharCode.OpenBrace:
          depth++;
          break;
        case CharCode.CloseParen:
        case CharCode.CloseBracket:
        case CharCode.CloseBrace:
          if (depth === 0) {
            if (ch === CharCode.CloseParen) return { closeParen: i, separators };
            throw new ScanFailure("Unbalanced delimiter in macro arguments", i);
          }
          depth--;
          break;
        case CharCode.Comma:
          if (depth === 0) separators.push({ offset: i, kind: "," });
          break;
        case CharCode.Semicolon:
          if (depth === 0) separators.push({ offset: i, kind: ";" });
          break;
      }
      i++;
    }

    throw new ScanFailure("Unterminated macro arguments", openParen);
  }

  private splitArguments(
    openParen: number,
    closeParen: number,
    separators: ArgumentScan["separators"],
  ): MacroArgument[] {
    const args: MacroArgument[] = [];
    let start = openParen + 1;

    for (const separator of separators) {
      args.push(this.makeArgument(start, separator.offset, separator.kind));
      start = separator.offset + 1;
    }

    const last = this.makeArgument(start, closeParen, ")");
    // `name!()` has no arguments and `name!(a, b,)` has a trailing separator.
    if (last.contentStart < closeParen) {
      args.push(last);
    }
    return args;
  }

  private makeArgument(start: number, end: number, terminator: ArgumentTerminator): MacroArgument {
    return { span: { start, end }, contentStart: skipTrivia(this.source, start, end), terminator };
  }

  private isTargetArgument(arg: MacroArgument): boolean {
    const start = arg.contentStart;
    const end = this.readIdentifier(start);
    if (this.source.slice(start, end) !== "target") return false;
    const colon = skipTrivia(this.source, end, arg.span.end);
    return (
      this.source.charCodeAt(colon) === CharCode.Colon &&
      this.source.charCodeAt(colon + 1) !== CharCode.Colon
    );
  }

  private readKeyValue(arg: MacroArgument): KeyValueArgument {
    const end = arg.span.end;
    let keyStart = arg.contentStart;
    if (
      this.source.charCodeAt(keyStart) === CharCode.LowercaseR &&
      this.source.charCodeAt(keyStart + 1) === CharCode.Hash
    ) {
      keyStart += 2;
    }

    const keyEnd = isIdentifierStart(this.source.charCodeAt(keyStart))
      ? this.readIdentifier(keyStart)
      : keyStart;
    const result: KeyValueArgument = {
      argument: arg,
      key: this.source.slice(keyStart, keyEnd),
      keySpan: { start: arg.contentStart, end: keyEnd },
    };
    if (keyEnd === keyStart) return result;

    // Skip an optional capture modifier such as `:?` or `:%` up to the `=`.
    let i = keyEnd;
    while (i < end && this.source.charCodeAt(i) !== CharCode.Equals) {
      const literalEnd = this.skipLiteralOrComment(i);
      i = literalEnd ?? i + 1;
    }
    if (i >= end) return result;

    const valueStart = skipTrivia(this.source, i + 1, end);
    result.value = { start: valueStart, end: trimEnd(this.source, valueStart, end) };
    return result;
  }

  private readStringLiteral(start: number): StringLiteral | undefined {
    const ch = this.source.charCodeAt(start);
    if (ch === CharCode.DoubleQuote) {
      const end = this.skipString(start);
      return { span: { start, end }, content: { start: start + 1, end: end - 1 }, raw: false };
    }
    if (ch === CharCode.LowercaseR && this.isRawStringStart(start + 1)) {
      const hashes = this.countHashes(start + 1);
      const end = this.skipRawString(start + 1);
      return {
        span: { start, end },
        content: { start: start + 2 + hashes, end: end - 1 - hashes },
        raw: true,
      };
    }
    return undefined;
  }

  /* ---------------------------------------------------------------------------
   * Paths & identifiers
   * --------------------------------------------------------------------------- */

  /** Read `ident(::ident)*`; `start` must be an identifier start. */
  private readPath(start: number): number {
    let i = this.readIdentifier(start);
    while (
      this.source.charCodeAt(i) === CharCode.Colon &&
      this.source.charCodeAt(i + 1) === CharCode.Colon &&
      isIdentifierStart(this.source.charCodeAt(i + 2))
    ) {
      i = this.readIdentifier(i + 2);
    }
    return i;
  }

  private readIdentifier(start: number): number {
    let i = start;
    while (i < this.length && isIdentifierPart(this.source.charCodeAt(i))) {
      i++;
    }
    return i;
  }

  /* ---------------------------------------------------------------------------
   * Literals & comments
   * --------------------------------------------------------------------------- */

  /**
   * If a string, character literal or comment starts at `i`, return the offset
   * just past it. Returns undefined otherwise.
   */
  private skipLiteralOrComment(i: number): number | undefined {
    const ch = this.source.charCodeAt(i);

    if (ch === CharCode.Slash) {
      const next = this.source.charCodeAt(i + 1);
      if (next === CharCode.Slash) return skipLineComment(this.source, i + 2);
      if (next === CharCode.Asterisk) {
        const after = skipBlockComment(this.source, i + 2);
        if (after < 0) throw new ScanFailure("Unterminated block comment", i);
        return after;
      }
      return undefined;
    }

    if (ch === CharCode.DoubleQuote) return this.skipString(i);
    if (ch === CharCode.SingleQuote) return this.skipCharOrLifetime(i);

    // Prefixed literals: r"…", r#"…"#, b"…", b'…', br"…", br#"…"#
    if (i > 0 && isIdentifierPart(this.source.charCodeAt(i - 1))) return undefined;
    if (ch === CharCode.LowercaseR && this.isRawStringStart(i + 1)) {
      return this.skipRawString(i + 1);
    }
    if (ch === CharCode.LowercaseB) {
      const next = this.source.charCodeAt(i + 1);
      if (next === CharCode.DoubleQuote) return this.skipString(i + 1);
      if (next === CharCode.SingleQuote) return this.skipCharOrLifetime(i + 1);
      if (next === CharCode.LowercaseR && this.isRawStringStart(i + 2)) {
        return this.skipRawString(i + 2);
      }
    }
    return undefined;
  }

  private skipString(start: number): number {
    let i = start + 1;
    while (i < this.length) {
      const ch = this.source.charCodeAt(i);
      if (ch === CharCode.Backslash) {
        i += 2;
        continue;
      }
      if (ch === CharCode.DoubleQuote) {
        return i + 1;
      }
      i++;
    }
    throw new ScanFailure("Unterminated string literal", start);
  }

  /** `start` is the offset just after the `r`. */
  private isRawStringStart(start: number): boolean {
    return this.source.charCodeAt(start + this.countHashes(start)) === CharCode.DoubleQuote;
  }

  private countHashes(start: number): number {
    let n = 0;
    while (this.source.charCodeAt(start + n) === CharCode.Hash) n++;
    return n;
  }

  /** `start` is the offset just after the `r`. */
  private skipRawString(start: number): number {
    const hashes = this.countHashes(start);
    const terminator = `"${"#".repeat(hashes)}`;
    const close = this.source.indexOf(terminator, start + hashes + 1);
    if (close < 0) throw new ScanFailure("Unterminated raw string literal", start - 1);
    return close + terminator.length;
  }

  /**
   * A `'` opens either a character literal or a lifetime/label. Character
   * literals are skipped whole; for lifetimes only the quote is consumed.
   */
  private skipCharOrLifetime(start: number): number {
    const next = this.source.charCodeAt(start + 1);
    if (next === CharCode.Backslash) {
      // '\n', '\'', '\x7f', '\u{10FFFF}'
      const close = this.source.indexOf("'", start + 3);
      if (close >= 0 && close - start <= 11) return close + 1;
      return start + 1;
    }
    if (next === CharCode.LineFeed || next === CharCode.CarriageReturn) return start + 1;
    if (this.source.charCodeAt(start + 2) === CharCode.SingleQuote) return start + 3;
    if (isHighSurrogate(next) && this.source.charCodeAt(start + 3) === CharCode.SingleQuote) {
      return start + 4;
    }
    return start + 1;
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function skipLineComment(source: string, start: number): number {
  let i = start;
  while (i < source.length) {
    const ch = source.charCodeAt(i);
    if (ch === CharCode.LineFeed || ch === CharCode.CarriageReturn) {
      return i;
    }
    i++;
  }
  return i;
}

/** Block comments nest. Returns -1 when unterminated. */
function skipBlockComment(source: string, start: number): number {
  let depth = 1;
  let i = start;
  while (i < source.length - 1) {
    const ch = source.charCodeAt(i);
    const next = source.charCodeAt(i + 1);
    if (ch === CharCode.Slash && next === CharCode.Asterisk) {
      depth++;
      i += 2;
      continue;
    }
    if (ch === CharCode.Asterisk && next === CharCode.Slash) {
      depth--;
      i += 2;
      if (depth === 0) return i;
      continue;
    }
    i++;
  }
  return -1;
}

function trimEnd(source: string, start: number, end: number): number {
  let i = end;
  while (i > start && isWhitespace(source.charCodeAt(i - 1))) i--;
  return i;
}

function isHighSurrogate(ch: number): boolean {
  return ch >= 0xd800 && ch <= 0xdbff;
}
