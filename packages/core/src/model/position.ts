/**
 * Code positions and offset/line mapping.
 */

/**
 * 0-based offset with 1-based line and column.
 *
 * The offset counts UTF-16 code units; the column counts characters (code
 * points) from the start of the line.
 */
export interface CodePosition {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export function codePosition(offset: number, line: number, column: number): CodePosition {
  return { offset, line, column };
}

/**
 * Maps offsets to line/column for one immutable text.
 *
 * Line starts are computed once; lookups are binary searches.
 */
export class LineIndex {
  private readonly lineStarts: number[];

  constructor(private readonly text: string) {
    this.lineStarts = computeLineStarts(text);
  }

  positionAt(offset: number): CodePosition {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? Number.POSITIVE_INFINITY) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    const lineStart = this.lineStarts[low] ?? 0;
    return codePosition(clamped, low + 1, countCodePoints(this.text, lineStart, clamped) + 1);
  }
}

function countCodePoints(text: string, start: number, end: number): number {
  let count = 0;
  for (let i = start; i < end; i += 1) {
    const ch = text.charCodeAt(i);
    // A surrogate pair is one character.
    if (ch >= 0xd800 && ch <= 0xdbff && i + 1 < end) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) i += 1;
    }
    count += 1;
  }
  return count;
}

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charCodeAt(i);
    if (ch === 13 /* CR */ || ch === 10 /* LF */) {
      if (ch === 13 /* CR */ && text.charCodeAt(i + 1) === 10 /* LF */) i += 1;
      starts.push(i + 1);
    }
  }
  return starts;
}
