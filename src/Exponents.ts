/**
 * Immutable products of symbols raised to rational exponents.
 *
 * The same structure carries a quantity's physical dimension (over `L`, `M`,
 * `T`, `I`, `Theta`, `N`, `A`) and its display unit (over unit names).
 * Exponents are exact `fraction.js` rationals so `sqrt(m**2)` is `m` again;
 * zero exponents never appear in the canonical form.
 *
 * @since 0.1.0
 */

import { Either, Equal, Hash } from "effect"
import { ParseError } from "./Errors.js"
import { parseExponentText } from "./internal/definitions/ExponentParser.js"
import { DiagnosticError } from "./internal/definitions/Diagnostic.js"
import {
  compareMagnitude,
  formatRational,
  isZero,
  toRational,
  type Rational,
  type RationalLike,
} from "./internal/rational.js"
import { renderFactors, type FormatStyle } from "./internal/styles.js"

const byMagnitudeThenSymbol = (
  [leftSymbol, leftExponent]: readonly [string, Rational],
  [rightSymbol, rightExponent]: readonly [string, Rational],
): number =>
  compareMagnitude(leftExponent, rightExponent) ||
  (leftSymbol < rightSymbol ? -1 : leftSymbol > rightSymbol ? 1 : 0)

const isPairs = (
  input: Readonly<Record<string, RationalLike>> | Iterable<readonly [string, RationalLike]>,
): input is Iterable<readonly [string, RationalLike]> => Symbol.iterator in input

/**
 * Rational exponent vector over named symbols.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const energy = ExponentVector.make({ L: 2, M: 1, T: -2 })
 * energy.toString() // "L2*M/T2"
 * ```
 */
export class ExponentVector implements Equal.Equal {
  /**
   * The empty product (dimensionless, or no display unit).
   */
  static readonly empty: ExponentVector = new ExponentVector(new Map())

  readonly #exponents: ReadonlyMap<string, Rational>
  #ordered: ReadonlyArray<readonly [string, Rational]> | undefined

  private constructor(exponents: ReadonlyMap<string, Rational>) {
    this.#exponents = exponents
  }

  static make(
    exponents: Readonly<Record<string, RationalLike>> | Iterable<readonly [string, RationalLike]>,
  ): ExponentVector {
    const pairs = isPairs(exponents) ? exponents : Object.entries(exponents)
    const normalized = new Map<string, Rational>()
    for (const [symbol, raw] of pairs) {
      const exponent = (normalized.get(symbol) ?? toRational(0)).add(toRational(raw))
      normalized.set(symbol, exponent)
    }
    for (const [symbol, exponent] of normalized) {
      if (isZero(exponent)) {
        normalized.delete(symbol)
      }
    }
    return normalized.size === 0 ? ExponentVector.empty : new ExponentVector(normalized)
  }

  static of(symbol: string, exponent: RationalLike = 1): ExponentVector {
    return ExponentVector.make([[symbol, exponent]])
  }

  /**
   * Parse strings such as `L2*M/T2`, `I*T2/(L2*M)`, `L(1/2)` or `1/s`.
   * Each exponent directly follows its symbol, optionally after `^`.
   */
  static parse(text: string, source = "<exponents>"): Either.Either<ExponentVector, ParseError> {
    return Either.try({
      try: () => ExponentVector.make(parseExponentText(text)),
      catch: (error) => {
        if (error instanceof DiagnosticError) {
          const column = error.diagnostic.span?.column ?? 1
          return new ParseError({
            source,
            line: 1,
            column,
            snippet: error.diagnostic.snippet ?? text,
            problem: error.diagnostic.message,
          })
        }
        throw error
      },
    })
  }

  get size(): number {
    return this.#exponents.size
  }

  get isEmpty(): boolean {
    return this.#exponents.size === 0
  }

  get symbols(): ReadonlyArray<string> {
    return this.entries().map(([symbol]) => symbol)
  }

  /**
   * Exponent of `symbol`, zero when absent.
   */
  get(symbol: string): Rational {
    return this.#exponents.get(symbol) ?? toRational(0)
  }

  has(symbol: string): boolean {
    return this.#exponents.has(symbol)
  }

  /**
   * Entries ordered by descending exponent magnitude, then symbol.
   */
  entries(): ReadonlyArray<readonly [string, Rational]> {
    if (!this.#ordered) {
      this.#ordered = Array.from(this.#exponents).sort(byMagnitudeThenSymbol)
    }
    return this.#ordered
  }

  multiply(that: ExponentVector): ExponentVector {
    if (that.isEmpty) {
      return this
    }
    if (this.isEmpty) {
      return that
    }
    return ExponentVector.make([...this.#exponents, ...that.#exponents])
  }

  divide(that: ExponentVector): ExponentVector {
    return this.multiply(that.invert())
  }

  power(exponent: RationalLike): ExponentVector {
    const factor = toRational(exponent)
    if (isZero(factor)) {
      return ExponentVector.empty
    }
    return new ExponentVector(
      new Map(Array.from(this.#exponents, ([symbol, value]) => [symbol, value.mul(factor)] as const)),
    )
  }

  invert(): ExponentVector {
    return this.power(-1)
  }

  equals(that: ExponentVector): boolean {
    if (this.#exponents.size !== that.#exponents.size) {
      return false
    }
    for (const [symbol, exponent] of this.#exponents) {
      const other = that.#exponents.get(symbol)
      if (!other || !other.equals(exponent)) {
        return false
      }
    }
    return true
  }

  /**
   * Canonical key, independent of insertion order: `L:2|M:1|T:-2`.
   */
  get key(): string {
    return Array.from(this.#exponents)
      .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
      .map(([symbol, exponent]) => `${symbol}:${formatRational(exponent)}`)
      .join("|")
  }

  toRecord(): Readonly<Record<string, number>> {
    return Object.fromEntries(this.entries().map(([symbol, exponent]) => [symbol, exponent.valueOf()]))
  }

  format(style: FormatStyle): string {
    return renderFactors(this.entries(), style)
  }

  toString(): string {
    return this.format("plain")
  }

  toJSON(): Readonly<Record<string, string>> {
    return Object.fromEntries(this.entries().map(([symbol, exponent]) => [symbol, formatRational(exponent)]))
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof ExponentVector && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.string(this.key))
  }
}
