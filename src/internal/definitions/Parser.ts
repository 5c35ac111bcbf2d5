import type { IToken } from "chevrotain"
import type {
  BinaryNode,
  BinaryOp,
  Expr,
  NodeId,
  Span,
  StatementNode,
  UnaryNode,
  UnaryOp,
} from "./Ast.js"
import { DiagnosticError, snippet, type DefinitionDiagnostic } from "./Diagnostic.js"
import {
  Arrow,
  BooleanFalse,
  BooleanTrue,
  Comma,
  DefinitionLexer,
  DoubleStar,
  Equals,
  Identifier,
  LParen,
  Minus,
  NumberLiteral,
  Plus,
  RParen,
  Slash,
  Star,
  StringLiteral,
  Unknown,
  UnterminatedString,
  WhiteSpace,
} from "./tokens.js"

interface BinaryInfo {
  readonly precedence: number
  readonly rightAssociative?: boolean
  readonly op: BinaryOp
}

const BinaryOperators = new Map<unknown, BinaryInfo>([
  [Plus, { precedence: 1, op: "+" }],
  [Minus, { precedence: 1, op: "-" }],
  [Star, { precedence: 2, op: "*" }],
  [Slash, { precedence: 2, op: "/" }],
  [DoubleStar, { precedence: 4, op: "**", rightAssociative: true }],
])

// Unary signs bind looser than `**`: -x**2 is -(x**2).
const UNARY_OPERAND_PRECEDENCE = 4

const createDiagnostic = (
  source: string,
  line: number,
  token: IToken | undefined,
  code: DefinitionDiagnostic["code"],
  message: string,
): DefinitionDiagnostic => {
  const span = token ? spanFromToken(token, line) : endSpan(source, line)
  return {
    phase: "parse",
    code,
    message,
    span,
    snippet: snippet(source, span.column),
  }
}

const spanFromToken = (token: IToken, line: number): Span => ({
  start: token.startOffset,
  end: (token.endOffset ?? token.startOffset) + 1,
  line,
  column: token.startColumn ?? token.startOffset + 1,
})

const endSpan = (source: string, line: number): Span => ({
  start: source.length,
  end: source.length,
  line,
  column: source.length + 1,
})

const combineSpans = (start: Span, end: Span): Span => ({
  start: start.start,
  end: end.end,
  line: start.line,
  column: start.column,
})

const makeId = (span: Span): NodeId => `n:${span.line}:${span.start}:${span.end}`

class TokenStream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  readonly #line: number
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string, line: number) {
    this.#tokens = tokens
    this.#source = source
    this.#line = line
  }

  peek(offset = 0): IToken | undefined {
    return this.#tokens[this.#index + offset]
  }

  previous(offset = 1): IToken | undefined {
    return this.#tokens[this.#index - offset]
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw this.error(undefined, "Unexpected end of statement")
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

  expect(tokenType: unknown, message: string, code: DefinitionDiagnostic["code"] = "UnexpectedToken"): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw this.error(token, message, code)
    }
    this.#index += 1
    return token
  }

  error(
    token: IToken | undefined,
    message: string,
    code: DefinitionDiagnostic["code"] = "UnexpectedToken",
  ): DiagnosticError {
    return new DiagnosticError({ diagnostic: createDiagnostic(this.#source, this.#line, token, code, message) })
  }

  span(token: IToken): Span {
    return spanFromToken(token, this.#line)
  }

  get done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

const lex = (source: string, line: number): ReadonlyArray<IToken> => {
  const result = DefinitionLexer.tokenize(source)
  const tokens = result.tokens.filter((token) => token.tokenType !== WhiteSpace)
  for (const token of tokens) {
    if (token.tokenType === UnterminatedString) {
      throw new DiagnosticError({
        diagnostic: createDiagnostic(source, line, token, "UnterminatedString", "Unterminated string literal"),
      })
    }
    if (token.tokenType === Unknown) {
      throw new DiagnosticError({
        diagnostic: createDiagnostic(source, line, token, "UnknownCharacter", `Unexpected character "${token.image}"`),
      })
    }
  }
  return tokens
}

class DefinitionPrattParser {
  readonly #stream: TokenStream

  constructor(tokens: ReadonlyArray<IToken>, source: string, line: number) {
    this.#stream = new TokenStream(tokens, source, line)
  }

  parseStatement(): StatementNode {
    const nameToken = this.#stream.peek()
    if (!nameToken || nameToken.tokenType !== Identifier) {
      throw this.#stream.error(nameToken, "Expected a symbol name at the start of the statement", "MissingAssignment")
    }
    this.#stream.consume()
    this.#stream.expect(Equals, `Expected '=' after "${nameToken.image}"`, "MissingAssignment")
    const expr = this.parseExpression(0)

    let prefixable: boolean | undefined
    if (this.#stream.match(Comma)) {
      const flag = this.#stream.peek()
      if (!flag || (flag.tokenType !== BooleanTrue && flag.tokenType !== BooleanFalse)) {
        throw this.#stream.error(flag, "Expected True or False after ',' (prefixable flag)")
      }
      this.#stream.consume()
      prefixable = flag.tokenType === BooleanTrue
    }

    if (!this.#stream.done) {
      const token = this.#stream.peek()
      throw this.#stream.error(token, `Unexpected ${token?.image ?? "<eol>"} after expression`, "TrailingInput")
    }

    const last = this.#stream.previous() ?? nameToken
    const span = combineSpans(this.#stream.span(nameToken), this.#stream.span(last))
    const base: StatementNode = {
      _tag: "Statement",
      id: makeId(span),
      symbol: nameToken.image,
      expr,
      span,
    }
    return prefixable === undefined ? base : { ...base, prefixable }
  }

  parseStandalone(): Expr {
    if (this.#stream.done) {
      throw this.#stream.error(undefined, "Empty expression")
    }
    const expr = this.parseExpression(0)
    if (!this.#stream.done) {
      const token = this.#stream.peek()
      throw this.#stream.error(token, `Unexpected ${token?.image ?? "<eol>"} after expression`, "TrailingInput")
    }
    return expr
  }

  parseExpression(minPrecedence: number): Expr {
    let left = this.parseUnary()
    while (true) {
      const token = this.#stream.peek()
      if (!token) {
        break
      }
      const info = BinaryOperators.get(token.tokenType)
      if (!info || info.precedence < minPrecedence) {
        break
      }
      this.#stream.consume()
      const nextPrecedence = info.rightAssociative ? info.precedence : info.precedence + 1
      const right = this.parseExpression(nextPrecedence)
      left = this.makeBinaryNode(info.op, left, right)
    }
    return left
  }

  parseUnary(): Expr {
    const token = this.#stream.peek()
    if (token && (token.tokenType === Plus || token.tokenType === Minus)) {
      this.#stream.consume()
      const op: UnaryOp = token.tokenType === Plus ? "Pos" : "Neg"
      const expr = this.parseExpression(UNARY_OPERAND_PRECEDENCE)
      return this.makeUnaryNode(op, expr, token)
    }
    return this.parsePrimary()
  }

  parsePrimary(): Expr {
    const token = this.#stream.peek()
    if (!token) {
      throw this.#stream.error(undefined, "Unexpected end of expression")
    }

    switch (token.tokenType) {
      case NumberLiteral: {
        this.#stream.consume()
        const value = Number(token.image)
        if (!Number.isFinite(value)) {
          throw this.#stream.error(token, `Invalid number literal: ${token.image}`)
        }
        const span = this.#stream.span(token)
        return { _tag: "NumberLiteral", id: makeId(span), value, text: token.image, span }
      }
      case StringLiteral: {
        this.#stream.consume()
        const span = this.#stream.span(token)
        return { _tag: "StringLiteral", id: makeId(span), value: token.image.slice(1, -1), span }
      }
      case BooleanTrue:
      case BooleanFalse: {
        this.#stream.consume()
        const span = this.#stream.span(token)
        return { _tag: "BooleanLiteral", id: makeId(span), value: token.tokenType === BooleanTrue, span }
      }
      case Identifier: {
        this.#stream.consume()
        return this.parseIdentifier(token)
      }
      case LParen: {
        this.#stream.consume()
        const expr = this.parseExpression(0)
        this.#stream.expect(RParen, "Expected ')' to close group")
        return expr
      }
      default:
        throw this.#stream.error(token, `Unexpected token ${token.image}`)
    }
  }

  parseIdentifier(token: IToken): Expr {
    if (this.#stream.match(Arrow)) {
      const body = this.parseExpression(0)
      const span = combineSpans(this.#stream.span(token), body.span)
      return { _tag: "Lambda", id: makeId(span), param: token.image, body, span }
    }
    if (this.#stream.match(LParen)) {
      const args: Array<Expr> = []
      if (!this.#stream.match(RParen)) {
        do {
          args.push(this.parseExpression(0))
        } while (this.#stream.match(Comma))
        this.#stream.expect(RParen, "Expected ')' closing function arguments")
      }
      const endToken = this.#stream.previous() ?? token
      const span = combineSpans(this.#stream.span(token), this.#stream.span(endToken))
      return { _tag: "Call", id: makeId(span), name: token.image, args, span }
    }
    const span = this.#stream.span(token)
    return { _tag: "Ref", id: makeId(span), name: token.image, span }
  }

  makeUnaryNode(op: UnaryOp, expr: Expr, token: IToken): UnaryNode {
    const span = combineSpans(this.#stream.span(token), expr.span)
    return { _tag: "Unary", id: makeId(span), op, expr, span }
  }

  makeBinaryNode(op: BinaryOp, left: Expr, right: Expr): BinaryNode {
    const span = combineSpans(left.span, right.span)
    return { _tag: "Binary", id: makeId(span), op, left, right, span }
  }
}

/**
 * Parse one statement line (note already removed). `line` is only used for
 * spans and diagnostics.
 */
export const parseStatement = (source: string, line = 1): StatementNode =>
  new DefinitionPrattParser(lex(source, line), source, line).parseStatement()

/**
 * Parse a bare expression, e.g. for ad-hoc evaluation against a table.
 */
export const parseExpression = (source: string, line = 1): Expr =>
  new DefinitionPrattParser(lex(source, line), source, line).parseStandalone()
