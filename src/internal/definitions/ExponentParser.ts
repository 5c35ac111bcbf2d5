import type { IToken } from "chevrotain"
import Fraction from "fraction.js"
import type { Rational } from "../rational.js"
import { DiagnosticError, snippet, type DefinitionErrorCode } from "./Diagnostic.js"
import {
  Caret,
  ExponentBase,
  ExponentLexer,
  ExponentNumber,
  LParen,
  RParen,
  Slash,
  Star,
  Unknown,
  WhiteSpace,
} from "./tokens.js"

type Factors = Map<string, Rational>

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #text: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, text: string) {
    this.#tokens = tokens
    this.#text = text
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw this.error(undefined, "Unexpected end of exponent expression")
    }
    this.#index += 1
    return token
  }

  match(tokenType: unknown): boolean {
    const token = this.peek()
    if (token && token.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: unknown, message: string, code: DefinitionErrorCode = "UnexpectedToken"): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw this.error(token, message, code)
    }
    this.#index += 1
    return token
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(token: IToken | undefined, message: string, code: DefinitionErrorCode = "UnexpectedToken"): DiagnosticError {
    const column = token ? token.startColumn ?? 1 : this.#text.length + 1
    const start = token ? token.startOffset : this.#text.length
    return new DiagnosticError({
      diagnostic: {
        phase: "parse",
        code,
        message,
        span: { start, end: token ? (token.endOffset ?? start) + 1 : start, line: 1, column },
        snippet: snippet(this.#text, column),
      },
    })
  }
}

const accumulate = (target: Factors, source: Factors, sign: 1 | -1): void => {
  for (const [symbol, exponent] of source) {
    const next = (target.get(symbol) ?? new Fraction(0)).add(sign === 1 ? exponent : exponent.neg())
    target.set(symbol, next)
  }
}

const parseNumber = (stream: Stream, token: IToken): Rational => {
  const value = Number(token.image)
  if (!Number.isFinite(value)) {
    throw stream.error(token, `Invalid exponent ${token.image}`, "InvalidExponent")
  }
  return new Fraction(value)
}

// `^` is optional; a parenthesized exponent must be a fraction such as (1/2).
const parseExponent = (stream: Stream): Rational | undefined => {
  const caret = stream.match(Caret)
  const next = stream.peek()
  if (next?.tokenType === ExponentNumber) {
    return parseNumber(stream, stream.consume())
  }
  if (next?.tokenType === LParen && stream.peek(1)?.tokenType === ExponentNumber) {
    stream.consume()
    const numerator = parseNumber(stream, stream.consume())
    stream.expect(Slash, "Expected '/' in fractional exponent", "InvalidExponent")
    const denominatorToken = stream.expect(ExponentNumber, "Expected denominator in fractional exponent", "InvalidExponent")
    const denominator = parseNumber(stream, denominatorToken)
    if (denominator.equals(0)) {
      throw stream.error(denominatorToken, "Exponent denominator must not be zero", "InvalidExponent")
    }
    stream.expect(RParen, "Expected ')' closing fractional exponent", "InvalidExponent")
    return numerator.div(denominator)
  }
  if (caret) {
    throw stream.error(next, "Expected exponent after '^'", "InvalidExponent")
  }
  return undefined
}

const parseFactor = (stream: Stream): Factors => {
  if (stream.match(LParen)) {
    const inner = parseProduct(stream)
    stream.expect(RParen, "Expected ')' closing group")
    return inner
  }
  const token = stream.peek()
  if (token?.tokenType === ExponentNumber) {
    stream.consume()
    if (Number(token.image) !== 1) {
      throw stream.error(token, `Unexpected number ${token.image}; only 1 may stand alone`, "InvalidExponent")
    }
    return new Map()
  }
  const base = stream.expect(ExponentBase, "Expected a symbol")
  const exponent = parseExponent(stream) ?? new Fraction(1)
  return new Map([[base.image, exponent]])
}

const parseProduct = (stream: Stream): Factors => {
  const result: Factors = new Map()
  accumulate(result, parseFactor(stream), 1)
  while (true) {
    if (stream.match(Star)) {
      accumulate(result, parseFactor(stream), 1)
      continue
    }
    if (stream.match(Slash)) {
      accumulate(result, parseFactor(stream), -1)
      continue
    }
    return result
  }
}

/**
 * Parse exponent strings such as `L2*M/T2`, `a/b/(c*d2)`, `L(1/2)`, `m^-1`
 * or `1/s` into (symbol, exponent) pairs. Zero exponents are kept; the
 * caller normalizes.
 */
export const parseExponentText = (text: string): ReadonlyArray<readonly [string, Rational]> => {
  const lexing = ExponentLexer.tokenize(text)
  const tokens = lexing.tokens.filter((token) => token.tokenType !== WhiteSpace)
  const stream = new Stream(tokens, text)
  const unknown = tokens.find((token) => token.tokenType === Unknown)
  if (unknown) {
    throw stream.error(unknown, `Unexpected character "${unknown.image}"`, "UnknownCharacter")
  }
  if (tokens.length === 0) {
    return []
  }
  const result = parseProduct(stream)
  if (!stream.done()) {
    throw stream.error(stream.peek(), "Unexpected trailing input in exponent expression", "TrailingInput")
  }
  return Array.from(result)
}
