import { Lexer, createToken } from "chevrotain"

/**
 * Token definitions shared by the definition-statement lexer and the
 * exponent-string lexer. Whitespace is kept as a token and filtered by the
 * parsers so column information survives.
 */

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /[ \t]+/ })

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/,
})

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /'[^'\n]*'|"[^"\n]*"/,
})

export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: /'[^'\n]*|"[^"\n]*/,
})

export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z_][A-Za-z0-9_]*/ })

export const BooleanTrue = createToken({ name: "BooleanTrue", pattern: /True/, longer_alt: Identifier })
export const BooleanFalse = createToken({ name: "BooleanFalse", pattern: /False/, longer_alt: Identifier })

export const Arrow = createToken({ name: "Arrow", pattern: /=>/ })
export const Equals = createToken({ name: "Equals", pattern: /=/ })
export const DoubleStar = createToken({ name: "DoubleStar", pattern: /\*\*/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const Comma = createToken({ name: "Comma", pattern: /,/ })
export const Unknown = createToken({ name: "Unknown", pattern: /./ })

export const DefinitionLexer = new Lexer(
  [
    WhiteSpace,
    NumberLiteral,
    StringLiteral,
    UnterminatedString,
    Arrow,
    Equals,
    DoubleStar,
    Star,
    Slash,
    Plus,
    Minus,
    LParen,
    RParen,
    Comma,
    BooleanTrue,
    BooleanFalse,
    Identifier,
    Unknown,
  ],
  { positionTracking: "full" },
)

// Exponent strings such as `L2*M/T2` or `L(1/2)`: bases take no digits so
// an exponent can follow its base directly.
export const ExponentBase = createToken({ name: "ExponentBase", pattern: /[A-Za-z][A-Za-z_]*/ })

export const ExponentNumber = createToken({
  name: "ExponentNumber",
  pattern: /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/,
})

export const ExponentLexer = new Lexer(
  [WhiteSpace, ExponentNumber, ExponentBase, Caret, Star, Slash, LParen, RParen, Unknown],
  { positionTracking: "full" },
)
