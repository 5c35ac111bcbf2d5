/**
 * Definition sources and the construction of symbol tables from them.
 *
 * A source is plain text, one statement per line:
 *
 * ```ini
 * [Lengths]
 * m = 10973731.568539/R_inf, True   ; prefixable unit
 * ft = 0.3048*m, False              ; unit, never prefixed
 * g_0 = 9.80665*m/s**2              ; constant
 * ```
 *
 * Every source is parsed before anything is evaluated, so a syntax error
 * anywhere fails the build before a single name is bound. Statements then
 * run in order; a later statement may redefine an earlier name and the
 * last definition wins.
 *
 * @since 0.1.0
 */

import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import { Effect, Either, Schema } from "effect"
import {
  DefinitionFileError,
  type DefinitionBuildError,
  type DefinitionError,
  type LookupError,
  type ParseError,
} from "./Errors.js"
import {
  buildTable,
  evaluateAgainst,
  parseSourceText,
  type ParsedStatement,
} from "./internal/definitions/Builder.js"
import type { Quantity } from "./Quantity.js"
import { SymbolTable } from "./SymbolTable.js"

/**
 * Named definition text. `name` is what error messages and origins report.
 *
 * @category Models
 * @since 0.1.0
 */
export class DefinitionSource extends Schema.Class<DefinitionSource>("DefinitionSource")({
  name: Schema.NonEmptyTrimmedString,
  text: Schema.String,
}) {}

/**
 * A statement as written: symbol, flag, note and section.
 *
 * @category Models
 * @since 0.1.0
 */
export interface DefinitionStatement {
  readonly symbol: string
  readonly expression: string
  readonly prefixable: boolean | undefined
  readonly source: string
  readonly line: number
  readonly section: string | undefined
  readonly note: string | undefined
}

const toStatement = ({ line, node }: ParsedStatement): DefinitionStatement => ({
  symbol: node.symbol,
  expression: line.text.slice(node.expr.span.start, node.expr.span.end),
  prefixable: node.prefixable,
  source: line.source,
  line: line.line,
  section: line.section._tag === "Some" ? line.section.value : undefined,
  note: line.note._tag === "Some" ? line.note.value : undefined,
})

/**
 * Parse a source without evaluating it.
 *
 * @category Parsing
 * @since 0.1.0
 */
export const parseDefinitions = (
  source: DefinitionSource,
): Either.Either<ReadonlyArray<DefinitionStatement>, ParseError> =>
  Either.map(parseSourceText(source), (statements) => statements.map(toStatement))

/**
 * Build a table from `sources` in order, optionally on top of `base`.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const table = Either.getOrThrow(
 *   buildSymbolTable([new DefinitionSource({ name: "mini", text: "m = Unit(1, 'L'), True" })]),
 * )
 * table.lookup("km") // Right(kilo-metre)
 * ```
 */
export const buildSymbolTable = (
  sources: ReadonlyArray<DefinitionSource>,
  base: SymbolTable = SymbolTable.empty,
): Either.Either<SymbolTable, DefinitionBuildError> => buildTable(sources, base)

/**
 * Evaluate an expression such as `"3*km/h"` against a finished table.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export const evaluate = (
  table: SymbolTable,
  expression: string,
): Either.Either<Quantity, ParseError | LookupError | DefinitionError> => evaluateAgainst(table, expression)

/**
 * Read one definition file.
 *
 * @category Loading
 * @since 0.1.0
 */
export const readDefinitionSource = (path: string): Effect.Effect<DefinitionSource, DefinitionFileError> =>
  Effect.tryPromise({
    try: () => readFile(path, "utf8"),
    catch: (error) =>
      new DefinitionFileError({ path, problem: error instanceof Error ? error.message : String(error) }),
  }).pipe(Effect.map((text) => new DefinitionSource({ name: path, text })))

/**
 * Build a table and report every redefinition as a warning.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const buildSymbolTableLogged = (
  sources: ReadonlyArray<DefinitionSource>,
  base: SymbolTable = SymbolTable.empty,
): Effect.Effect<SymbolTable, DefinitionBuildError> =>
  Effect.gen(function* () {
    const table = yield* buildSymbolTable(sources, base)
    const fresh = table.redefinitions.slice(base.redefinitions.length)
    yield* Effect.forEach(
      fresh,
      (redefinition) =>
        Effect.logWarning(
          `"${redefinition.name}" redefined; the definition at ${redefinition.previous.source}:${redefinition.previous.line} is replaced`,
        ).pipe(
          Effect.annotateLogs({ source: redefinition.current.source, line: redefinition.current.line }),
        ),
      { discard: true },
    )
    yield* Effect.logDebug(`Built symbol table with ${table.size} symbols from ${sources.length} source(s)`)
    return table
  })

/**
 * Read `paths` in order and build one table from them.
 *
 * @category Loading
 * @since 0.1.0
 */
export const loadSymbolTable = (
  paths: ReadonlyArray<string>,
  base: SymbolTable = SymbolTable.empty,
): Effect.Effect<SymbolTable, DefinitionFileError | DefinitionBuildError> =>
  Effect.forEach(paths, readDefinitionSource).pipe(
    Effect.flatMap((sources) => buildSymbolTableLogged(sources, base)),
  )

/**
 * The bundled SI definition files, in load order.
 *
 * @category Constants
 * @since 0.1.0
 */
export const defaultDefinitionPaths: ReadonlyArray<string> = ["base-SI", "derived", "BIPM", "other"].map(
  (name) => fileURLToPath(new URL(`../definitions/${name}.ini`, import.meta.url)),
)
