/**
 * Error taxonomy for quantity arithmetic, unit lookup and symbol table
 * construction.
 *
 * Every failure is a tagged error so callers can pattern match using
 * `Effect.catchTag`. Pure helpers return them inside `Either`, the class
 * methods on `Quantity` throw them, and the `UnitSystem` service surfaces
 * them on the error channel.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { ExponentVector } from "./Exponents.js"

/**
 * Raised when two quantities with different dimensions are added,
 * subtracted or compared.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new DimensionError({ operation: "add", left: length, right: time })
 * yield* Effect.fail(error)
 * ```
 */
export class DimensionError extends Data.TaggedError("DimensionError")<{
  readonly operation: "add" | "subtract" | "compare"
  readonly left: ExponentVector
  readonly right: ExponentVector
}> {
  override get message(): string {
    return `Cannot ${this.operation} quantities of dimension ${describe(this.left)} and ${describe(this.right)}`
  }
}

/**
 * Raised when a quantity is expressed in a unit of another dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IncompatibleUnitError extends Data.TaggedError("IncompatibleUnitError")<{
  readonly unit: string
  readonly quantityDimension: ExponentVector
  readonly unitDimension: ExponentVector
}> {
  override get message(): string {
    return `Cannot express a quantity of dimension ${describe(this.quantityDimension)} in ${this.unit} (dimension ${describe(this.unitDimension)})`
  }
}

/**
 * Raised when a negative value is raised to a non-integer power.
 *
 * @category Errors
 * @since 0.1.0
 */
export class FractionalPowerOfNegativeError extends Data.TaggedError("FractionalPowerOfNegativeError")<{
  readonly base: number
  readonly exponent: string
}> {
  override get message(): string {
    return `Cannot raise negative value ${this.base} to the fractional power ${this.exponent}`
  }
}

/**
 * Raised while building a symbol table when a statement references a name
 * that no earlier statement bound.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * Effect.catchTag("UndefinedSymbolError", (error) => Console.error(error.message))
 * ```
 */
export class UndefinedSymbolError extends Data.TaggedError("UndefinedSymbolError")<{
  readonly symbol: string
  readonly definition: string
  readonly statement: string
  readonly source: string
  readonly line: number
}> {
  override get message(): string {
    return `${this.source}:${this.line}: "${this.symbol}" is not defined (while defining "${this.definition}")`
  }
}

/**
 * Raised for structurally malformed definition statements, expressions and
 * exponent strings.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ParseError extends Data.TaggedError("ParseError")<{
  readonly source: string
  readonly line: number
  readonly column: number
  readonly snippet: string
  readonly problem: string
}> {
  override get message(): string {
    return `Parse error in ${this.source} at line ${this.line}, column ${this.column}: ${this.problem}`
  }
}

/**
 * Raised when a well-formed statement fails to evaluate, e.g. a dimension
 * mismatch or a misuse of a lambda unit. `cause` carries the underlying
 * tagged error when there is one.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DefinitionError extends Data.TaggedError("DefinitionError")<{
  readonly symbol: string
  readonly statement: string
  readonly source: string
  readonly line: number
  readonly problem: string
  readonly cause?: unknown
}> {
  override get message(): string {
    return `${this.source}:${this.line}: cannot define "${this.symbol}": ${this.problem}`
  }
}

/**
 * Raised when a name is neither defined nor resolvable through an SI
 * prefix.
 *
 * @category Errors
 * @since 0.1.0
 */
export class LookupError extends Data.TaggedError("LookupError")<{
  readonly symbol: string
  readonly reason: string
}> {
  override get message(): string {
    return `Unknown symbol "${this.symbol}": ${this.reason}`
  }
}

/**
 * Raised when a definition file cannot be read.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DefinitionFileError extends Data.TaggedError("DefinitionFileError")<{
  readonly path: string
  readonly problem: string
}> {
  override get message(): string {
    return `Cannot read definitions from ${this.path}: ${this.problem}`
  }
}

/**
 * Failures that abort building a symbol table.
 *
 * @category Errors
 * @since 0.1.0
 */
export type DefinitionBuildError = ParseError | UndefinedSymbolError | DefinitionError

/**
 * Failures raised by quantity arithmetic.
 *
 * @category Errors
 * @since 0.1.0
 */
export type QuantityError = DimensionError | IncompatibleUnitError | FractionalPowerOfNegativeError

const describe = (vector: ExponentVector): string => {
  const text = vector.toString()
  return text === "" ? "1" : text
}
