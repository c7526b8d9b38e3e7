// ----------------------------------------------------------------------------------------
// CharCode constants
// ----------------------------------------------------------------------------------------

export const enum CharCode {
  // ASCII control & whitespace
  Tab = 0x0009,
  LineFeed = 0x000a,
  VerticalTab = 0x000b,
  FormFeed = 0x000c,
  CarriageReturn = 0x000d,
  Space = 0x0020,

  // Digits
  Zero = 0x0030,
  Nine = 0x0039,

  // Letters
  UppercaseA = 0x0041,
  UppercaseZ = 0x005a,
  LowercaseA = 0x0061,
  LowercaseZ = 0x007a,
  LowercaseB = 0x0062,
  LowercaseR = 0x0072,

  // Symbols / punctuation
  Exclamation = 0x0021,      // !
  DoubleQuote = 0x0022,      // "
  Hash = 0x0023,             // #
  SingleQuote = 0x0027,      // '
  OpenParen = 0x0028,        // (
  CloseParen = 0x0029,       // )
  Asterisk = 0x002a,         // *
  Comma = 0x002c,            // ,
  Slash = 0x002f,            // /
  Colon = 0x003a,            // :
  Semicolon = 0x003b,        // ;
  Equals = 0x003d,           // =
  OpenBracket = 0x005b,      // [
  Backslash = 0x005c,        // \
  CloseBracket = 0x005d,     // ]
  Underscore = 0x005f,       // _
  OpenBrace = 0x007b,        // {
  CloseBrace = 0x007d,       // }
}

export function isWhitespace(ch: number): boolean {
  return (
    ch === CharCode.Space ||
    ch === CharCode.Tab ||
    ch === CharCode.LineFeed ||
    ch === CharCode.CarriageReturn ||
    ch === CharCode.VerticalTab ||
    ch === CharCode.FormFeed
  );
}

export function isDigit(ch: number): boolean {
  return ch >= CharCode.Zero && ch <= CharCode.Nine;
}

/** ASCII identifiers only. */
export function isIdentifierStart(ch: number): boolean {
  return (
    (ch >= CharCode.LowercaseA && ch <= CharCode.LowercaseZ) ||
    (ch >= CharCode.UppercaseA && ch <= CharCode.UppercaseZ) ||
    ch === CharCode.Underscore
  );
}

export function isIdentifierPart(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}
