/**
 * Directive comments that precede a log call site.
 */

export const IGNORE_DIRECTIVE = "breadlog:ignore";
export const NO_KVP_DIRECTIVE = "breadlog:no-kvp";

/** Line comments and single-line block comments; each capture is the comment text. */
export const DEFAULT_COMMENT_PATTERN = /\/\/(.+)|\/\*(.+)\*\//;

/**
 * Determine whether `directive` is set by a comment preceding the line that
 * contains `subjectOffset`.
 *
 * Walks backwards from the previous line, skipping blank lines. The first
 * non-blank line must match `commentPattern` with a capture whose trimmed,
 * lower-cased text equals the directive; any other line ends the search.
 */
export function isDirectiveActive(
  code: string,
  subjectOffset: number,
  directive: string,
  commentPattern: RegExp = DEFAULT_COMMENT_PATTERN,
): boolean {
  const lines = splitLines(code.slice(0, subjectOffset + 1));

  // The last line is the subject's own.
  for (let i = lines.length - 2; i >= 0; i--) {
    const line = (lines[i] ?? "").trim();
    if (line.length === 0) continue;

    const match = commentPattern.exec(line);
    if (!match) return false;
    return match.some((group) => group !== undefined && group.toLowerCase().trim() === directive);
  }

  return false;
}

export function hasIgnoreDirective(code: string, subjectOffset: number, commentPattern?: RegExp): boolean {
  return isDirectiveActive(code, subjectOffset, IGNORE_DIRECTIVE, commentPattern);
}

export function hasNoKvpDirective(code: string, subjectOffset: number, commentPattern?: RegExp): boolean {
  return isDirectiveActive(code, subjectOffset, NO_KVP_DIRECTIVE, commentPattern);
}

/** Split into lines; a trailing line break does not start another line. */
function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}
