/**
 * Grammar - Types
 *
 * Spans produced by the structural scanner. All offsets are 0-based UTF-16
 * offsets into the scanned text; `end` is exclusive.
 */

/* =============================================================================
 * SPANS
 * ============================================================================= */

export interface Span {
  start: number;
  end: number;
}

/**
 * A string literal argument.
 *
 * `content` covers the text between the delimiters exactly as written, escape
 * sequences included.
 */
export interface StringLiteral {
  span: Span;
  content: Span;
  raw: boolean;
}

/* =============================================================================
 * MACRO CALLS
 * ============================================================================= */

export type ArgumentTerminator = "," | ";" | ")";

/** One top-level argument of a macro call, delimited by `,`, `;` or `)`. */
export interface MacroArgument {
  /** Raw argument text, surrounding whitespace and comments included. */
  span: Span;
  /** First offset that is neither whitespace nor comment; `span.end` when empty. */
  contentStart: number;
  terminator: ArgumentTerminator;
}

/**
 * A key-value argument such as `key = value`, `key:? = value` or the
 * shorthand `key`.
 */
export interface KeyValueArgument {
  argument: MacroArgument;
  /** Key name without any `r#` prefix; empty when the argument has no leading identifier. */
  key: string;
  keySpan: Span;
  /** Value expression, from its first significant character to the end of the argument. */
  value?: Span;
}

export interface MacroCall {
  /** From the first character of the path to just past the closing parenthesis. */
  span: Span;
  /** Macro path as written, e.g. `info` or `log::info`, without a leading `::`. */
  name: string;
  nameSpan: Span;
  /** Offset of the opening parenthesis. */
  openParen: number;
  /** Offset of the closing parenthesis. */
  closeParen: number;
  arguments: MacroArgument[];
  /** A leading `target: "…"` argument. */
  target?: MacroArgument;
  /** Arguments before the first top-level `;`, after any target. */
  keyValues: KeyValueArgument[];
  /** First string literal argument after the target and key-values. */
  message?: StringLiteral;
}

/* =============================================================================
 * RESULTS
 * ============================================================================= */

export interface ScanError {
  message: string;
  offset: number;
}

export type ScanResult =
  | { ok: true; calls: MacroCall[] }
  | { ok: false; error: ScanError };
