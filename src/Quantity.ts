/**
 * Physical quantities: a floating-point value in base units, its physical
 * dimension and the display unit it was built from.
 *
 * The display vector never affects the value; it only steers formatting.
 * Arithmetic is offered twice: `Either`-returning functions for Effect code
 * (`yield* add(a, b)`) and throwing methods for direct use
 * (`a.plus(b)`). Both raise the same tagged errors.
 *
 * @since 0.1.0
 */

import { Either, Equal, Hash } from "effect"
import { DimensionError, FractionalPowerOfNegativeError, IncompatibleUnitError } from "./Errors.js"
import { ExponentVector } from "./Exponents.js"
import { formatRational, toRational, type RationalLike } from "./internal/rational.js"

/**
 * Plain numbers stand for dimensionless quantities.
 *
 * @since 0.1.0
 */
export type QuantityLike = Quantity | number

const raise = <A, E>(either: Either.Either<A, E>): A =>
  Either.getOrThrowWith(either, (error) => error)

/**
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const speed = new Quantity(3, ExponentVector.make({ L: 1, T: -1 }))
 * speed.times(2).value // 6
 * ```
 */
export class Quantity implements Equal.Equal {
  constructor(
    readonly value: number,
    readonly dimension: ExponentVector = ExponentVector.empty,
    readonly display: ExponentVector = ExponentVector.empty,
  ) {}

  static dimensionless(value: number): Quantity {
    return new Quantity(value)
  }

  static from(value: QuantityLike): Quantity {
    return typeof value === "number" ? new Quantity(value) : value
  }

  get isDimensionless(): boolean {
    return this.dimension.isEmpty
  }

  withDisplay(display: ExponentVector): Quantity {
    return new Quantity(this.value, this.dimension, display)
  }

  plus(that: QuantityLike): Quantity {
    return raise(add(this, that))
  }

  minus(that: QuantityLike): Quantity {
    return raise(subtract(this, that))
  }

  times(that: QuantityLike): Quantity {
    return multiply(this, that)
  }

  dividedBy(that: QuantityLike): Quantity {
    return divide(this, that)
  }

  pow(exponent: RationalLike): Quantity {
    return raise(power(this, exponent))
  }

  negate(): Quantity {
    return new Quantity(-this.value, this.dimension, this.display)
  }

  abs(): Quantity {
    return new Quantity(Math.abs(this.value), this.dimension, this.display)
  }

  compareTo(that: QuantityLike): -1 | 0 | 1 {
    return raise(compare(this, that))
  }

  /**
   * Number of `unit`s in this quantity.
   */
  in(unit: Quantity, name?: string): number {
    return raise(convertTo(this, unit, name))
  }

  /**
   * Same value and dimension; display units are ignored.
   */
  equals(that: Quantity): boolean {
    return this.value === that.value && this.dimension.equals(that.dimension)
  }

  toString(): string {
    return this.dimension.isEmpty ? String(this.value) : `${this.value} ${this.dimension.toString()}`
  }

  toJSON(): unknown {
    return {
      value: this.value,
      dimension: this.dimension.toJSON(),
      display: this.display.toJSON(),
    }
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Quantity && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.combine(Hash.number(this.value))(Hash.hash(this.dimension)))
  }
}

const sameDimension = (
  operation: DimensionError["operation"],
  left: Quantity,
  right: Quantity,
): Either.Either<void, DimensionError> =>
  left.dimension.equals(right.dimension)
    ? Either.right(undefined)
    : Either.left(new DimensionError({ operation, left: left.dimension, right: right.dimension }))

/**
 * Sum of two quantities of equal dimension, shown in the left operand's
 * display unit.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const add = (left: QuantityLike, right: QuantityLike): Either.Either<Quantity, DimensionError> => {
  const a = Quantity.from(left)
  const b = Quantity.from(right)
  return Either.map(sameDimension("add", a, b), () => new Quantity(a.value + b.value, a.dimension, a.display))
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const subtract = (left: QuantityLike, right: QuantityLike): Either.Either<Quantity, DimensionError> => {
  const a = Quantity.from(left)
  const b = Quantity.from(right)
  return Either.map(sameDimension("subtract", a, b), () => new Quantity(a.value - b.value, a.dimension, a.display))
}

/**
 * Product; dimension and display vectors combine. Never fails.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const multiply = (left: QuantityLike, right: QuantityLike): Quantity => {
  const a = Quantity.from(left)
  const b = Quantity.from(right)
  return new Quantity(a.value * b.value, a.dimension.multiply(b.dimension), a.display.multiply(b.display))
}

/**
 * @category Arithmetic
 * @since 0.1.0
 */
export const divide = (left: QuantityLike, right: QuantityLike): Quantity => {
  const a = Quantity.from(left)
  const b = Quantity.from(right)
  return new Quantity(a.value / b.value, a.dimension.divide(b.dimension), a.display.divide(b.display))
}

/**
 * Raise to a rational power. Dimension and display vectors scale by the
 * exponent; a negative value admits integer exponents only.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const power = (
  base: QuantityLike,
  exponent: RationalLike,
): Either.Either<Quantity, FractionalPowerOfNegativeError> => {
  const quantity = Quantity.from(base)
  const numeric = typeof exponent === "number" ? exponent : exponent.valueOf()
  if (quantity.value < 0 && !Number.isInteger(numeric)) {
    return Either.left(
      new FractionalPowerOfNegativeError({
        base: quantity.value,
        exponent: typeof exponent === "number" ? String(exponent) : formatRational(exponent),
      }),
    )
  }
  const value = Math.pow(quantity.value, numeric)
  if (quantity.dimension.isEmpty && quantity.display.isEmpty) {
    return Either.right(new Quantity(value))
  }
  const rational = toRational(exponent)
  return Either.right(new Quantity(value, quantity.dimension.power(rational), quantity.display.power(rational)))
}

/**
 * Order two quantities of equal dimension.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const compare = (left: QuantityLike, right: QuantityLike): Either.Either<-1 | 0 | 1, DimensionError> => {
  const a = Quantity.from(left)
  const b = Quantity.from(right)
  return Either.map(sameDimension("compare", a, b), (): -1 | 0 | 1 => (a.value < b.value ? -1 : a.value > b.value ? 1 : 0))
}

/**
 * Express `quantity` as a number of `unit`s: `quantity.value / unit.value`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertTo = (
  quantity: QuantityLike,
  unit: Quantity,
  name?: string,
): Either.Either<number, IncompatibleUnitError> => {
  const q = Quantity.from(quantity)
  return q.dimension.equals(unit.dimension)
    ? Either.right(q.value / unit.value)
    : Either.left(
        new IncompatibleUnitError({
          unit: name ?? (unit.display.isEmpty ? String(unit.value) : unit.display.toString()),
          quantityDimension: q.dimension,
          unitDimension: unit.dimension,
        }),
      )
}
