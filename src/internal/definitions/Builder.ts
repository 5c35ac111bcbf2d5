import { Either, Option } from "effect"
import {
  DefinitionError,
  LookupError,
  ParseError,
  UndefinedSymbolError,
  type DefinitionBuildError,
} from "../../Errors.js"
import { ExponentVector } from "../../Exponents.js"
import { resolvePrefixed } from "../../Prefixes.js"
import type { Quantity } from "../../Quantity.js"
import { SymbolEntry, type Origin } from "../../SymbolEntry.js"
import { SymbolTable, type Redefinition } from "../../SymbolTable.js"
import type { StatementNode } from "./Ast.js"
import { DiagnosticError, snippet } from "./Diagnostic.js"
import { evaluateExpression, valueKind, type Scope, type Value } from "./Evaluator.js"
import { parseExpression, parseStatement } from "./Parser.js"
import { splitSource, type SourceLine } from "./Source.js"

/**
 * A parsed statement together with the line it came from.
 */
export interface ParsedStatement {
  readonly line: SourceLine
  readonly node: StatementNode
}

export interface SourceText {
  readonly name: string
  readonly text: string
}

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error))

const toParseError = (line: SourceLine, error: DiagnosticError): ParseError => {
  const { diagnostic } = error
  const column = diagnostic.span?.column ?? 1
  return new ParseError({
    source: line.source,
    line: line.line,
    column,
    snippet: diagnostic.snippet ?? snippet(line.text, column),
    problem: diagnostic.message,
  })
}

/**
 * Parse every statement of `source`. The first malformed line fails the
 * whole source.
 */
export const parseSourceText = (source: SourceText): Either.Either<ReadonlyArray<ParsedStatement>, ParseError> => {
  const parsed: Array<ParsedStatement> = []
  for (const line of splitSource(source.name, source.text)) {
    const node = Either.try({
      try: () => parseStatement(line.text, line.line),
      catch: (error) =>
        error instanceof DiagnosticError
          ? toParseError(line, error)
          : new ParseError({
              source: line.source,
              line: line.line,
              column: 1,
              snippet: snippet(line.text, 1),
              problem: messageOf(error),
            }),
    })
    if (Either.isLeft(node)) {
      return Either.left(node.left)
    }
    parsed.push({ line, node: node.right })
  }
  return Either.right(parsed)
}

const toBuildError = (statement: ParsedStatement, error: unknown): DefinitionBuildError => {
  const { line, node } = statement
  const text = line.text.trim()
  if (!(error instanceof DiagnosticError)) {
    return new DefinitionError({
      symbol: node.symbol,
      statement: text,
      source: line.source,
      line: line.line,
      problem: messageOf(error),
      cause: error,
    })
  }
  const { diagnostic } = error
  if (diagnostic.phase === "parse") {
    return toParseError(line, error)
  }
  if (diagnostic.code === "IdentifierNotFound") {
    return new UndefinedSymbolError({
      symbol: diagnostic.symbol ?? node.symbol,
      definition: node.symbol,
      statement: text,
      source: line.source,
      line: line.line,
    })
  }
  return new DefinitionError({
    symbol: node.symbol,
    statement: text,
    source: line.source,
    line: line.line,
    problem: diagnostic.message,
    cause: diagnostic.cause,
  })
}

const originOf = (line: SourceLine): Origin => ({
  source: line.source,
  line: line.line,
  section: line.section,
  note: line.note,
})

/**
 * Turn an evaluated right-hand side into an entry. A flag makes a unit
 * shown under its own name; without one a quantity is a constant and keeps
 * the display of its expression.
 */
const bind = (statement: ParsedStatement, value: Value): Either.Either<SymbolEntry, DefinitionError> => {
  const { node, line } = statement
  const name = node.symbol
  const origin = originOf(line)
  const display = ExponentVector.of(name)
  switch (value._tag) {
    case "Quantity":
      return Either.right(
        node.prefixable === undefined
          ? SymbolEntry.Constant({ name, quantity: value.quantity, origin })
          : SymbolEntry.Unit({ name, quantity: value.quantity.withDisplay(display), prefixable: node.prefixable, origin }),
      )
    case "LambdaUnit":
      return Either.right(
        SymbolEntry.LambdaUnit({
          name,
          unit: value.unit.withDisplay(display),
          prefixable: node.prefixable ?? false,
          origin,
        }),
      )
    default:
      return Either.left(
        new DefinitionError({
          symbol: name,
          statement: line.text.trim(),
          source: line.source,
          line: line.line,
          problem: `expression evaluates to ${valueKind(value)}, not a quantity or lambda unit`,
        }),
      )
  }
}

const frozenScope = (bindings: ReadonlyMap<string, SymbolEntry>): Scope => {
  const scope: Scope = {
    lookup: (name) => resolvePrefixed(name, (candidate) => Option.fromNullable(bindings.get(candidate))),
    snapshot: () => scope,
  }
  return scope
}

/**
 * Evaluate parsed statements in order on top of `base`. A later binding of
 * a name replaces the earlier one in place and is recorded as a
 * redefinition.
 */
export const evaluateStatements = (
  statements: ReadonlyArray<ParsedStatement>,
  base: SymbolTable = SymbolTable.empty,
): Either.Either<SymbolTable, DefinitionBuildError> => {
  const bindings = new Map<string, SymbolEntry>(base.entries().map((entry) => [entry.name, entry] as const))
  const redefinitions: Array<Redefinition> = [...base.redefinitions]
  const scope: Scope = {
    lookup: (name) => resolvePrefixed(name, (candidate) => Option.fromNullable(bindings.get(candidate))),
    snapshot: () => frozenScope(new Map(bindings)),
  }

  for (const statement of statements) {
    const value = Either.try({
      try: () => evaluateExpression(statement.node.expr, scope),
      catch: (error) => toBuildError(statement, error),
    })
    const entry = Either.flatMap(value, (evaluated) => bind(statement, evaluated))
    if (Either.isLeft(entry)) {
      return Either.left(entry.left)
    }
    const previous = bindings.get(entry.right.name)
    if (previous) {
      redefinitions.push({ name: entry.right.name, previous: previous.origin, current: entry.right.origin })
    }
    bindings.set(entry.right.name, entry.right)
  }

  return Either.right(new SymbolTable(bindings.values(), redefinitions))
}

/**
 * Parse all sources, then evaluate their statements in order.
 */
export const buildTable = (
  sources: ReadonlyArray<SourceText>,
  base: SymbolTable = SymbolTable.empty,
): Either.Either<SymbolTable, DefinitionBuildError> =>
  Either.gen(function* () {
    const statements: Array<ParsedStatement> = []
    for (const source of sources) {
      statements.push(...(yield* parseSourceText(source)))
    }
    return yield* evaluateStatements(statements, base)
  })

const EXPRESSION = "<expression>"

/**
 * Evaluate a free-standing expression against a finished table.
 */
export const evaluateAgainst = (
  table: SymbolTable,
  expression: string,
): Either.Either<Quantity, ParseError | LookupError | DefinitionError> => {
  const failure = (error: unknown): ParseError | LookupError | DefinitionError => {
    if (error instanceof DiagnosticError) {
      const { diagnostic } = error
      if (diagnostic.phase === "parse") {
        const column = diagnostic.span?.column ?? 1
        return new ParseError({
          source: EXPRESSION,
          line: 1,
          column,
          snippet: diagnostic.snippet ?? snippet(expression, column),
          problem: diagnostic.message,
        })
      }
      if (diagnostic.code === "IdentifierNotFound") {
        return new LookupError({ symbol: diagnostic.symbol ?? expression, reason: "not defined" })
      }
      return new DefinitionError({
        symbol: EXPRESSION,
        statement: expression,
        source: EXPRESSION,
        line: 1,
        problem: diagnostic.message,
        cause: diagnostic.cause,
      })
    }
    return new DefinitionError({
      symbol: EXPRESSION,
      statement: expression,
      source: EXPRESSION,
      line: 1,
      problem: messageOf(error),
      cause: error,
    })
  }
  const scope: Scope = { lookup: (name) => table.lookup(name), snapshot: () => scope }
  return Either.flatMap(
    Either.try({ try: () => evaluateExpression(parseExpression(expression), scope), catch: failure }),
    (value): Either.Either<Quantity, DefinitionError> => {
      switch (value._tag) {
        case "Quantity":
          return Either.right(value.quantity)
        default:
          return Either.left(
            new DefinitionError({
              symbol: EXPRESSION,
              statement: expression,
              source: EXPRESSION,
              line: 1,
              problem:
                value._tag === "LambdaUnit"
                  ? "a lambda unit needs a number: write n * unit"
                  : `expression evaluates to ${valueKind(value)}, not a quantity`,
            }),
          )
      }
    },
  )
}
