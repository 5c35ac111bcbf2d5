/**
 * Units that are not pure scale factors, such as temperature scales with an
 * offset or logarithmic ratios.
 *
 * A lambda unit only converts between numbers and quantities: `n * unit`
 * runs `forward(n)` and `quantity / unit` runs `inverse(quantity)`. It takes
 * no part in multiplicative unit algebra.
 *
 * @since 0.1.0
 */

import { Either } from "effect"
import { IncompatibleUnitError } from "./Errors.js"
import { ExponentVector } from "./Exponents.js"
import { Quantity } from "./Quantity.js"

/**
 * @since 0.1.0
 */
export interface LambdaUnitOptions {
  readonly forward: (value: number) => Quantity
  readonly inverse: (quantity: Quantity) => number
  /** Dimension of every quantity `forward` returns. */
  readonly dimension: ExponentVector
  readonly display?: ExponentVector
}

/**
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const degC = new LambdaUnit({
 *   forward: (n) => kelvin.times(n + 273.15),
 *   inverse: (q) => q.value / kelvin.value - 273.15,
 *   dimension: kelvin.dimension,
 * })
 * degC.toNumber(degC.toQuantity(25)) // 25
 * ```
 */
export class LambdaUnit {
  readonly #forward: (value: number) => Quantity
  readonly #inverse: (quantity: Quantity) => number
  readonly dimension: ExponentVector
  readonly display: ExponentVector

  constructor(options: LambdaUnitOptions) {
    this.#forward = options.forward
    this.#inverse = options.inverse
    this.dimension = options.dimension
    this.display = options.display ?? ExponentVector.empty
  }

  /**
   * `n * unit`: the quantity `n` of this unit denotes, shown in this unit.
   */
  toQuantity(value: number): Quantity {
    const quantity = this.#forward(value)
    return new Quantity(quantity.value, quantity.dimension, this.display)
  }

  /**
   * `quantity / unit`, failing when the dimension does not match.
   */
  convert(quantity: Quantity): Either.Either<number, IncompatibleUnitError> {
    if (!quantity.dimension.equals(this.dimension)) {
      return Either.left(
        new IncompatibleUnitError({
          unit: this.display.isEmpty ? "<lambda unit>" : this.display.toString(),
          quantityDimension: quantity.dimension,
          unitDimension: this.dimension,
        }),
      )
    }
    return Either.right(this.#inverse(quantity))
  }

  toNumber(quantity: Quantity): number {
    return Either.getOrThrowWith(this.convert(quantity), (error) => error)
  }

  withDisplay(display: ExponentVector): LambdaUnit {
    return new LambdaUnit({ forward: this.#forward, inverse: this.#inverse, dimension: this.dimension, display })
  }

  /**
   * Variant scaled by a prefix factor: `forward(factor * n)` and
   * `inverse(q) / factor`.
   */
  scaled(factor: number, display: ExponentVector): LambdaUnit {
    const forward = this.#forward
    const inverse = this.#inverse
    return new LambdaUnit({
      forward: (value) => forward(value * factor),
      inverse: (quantity) => inverse(quantity) / factor,
      dimension: this.dimension,
      display,
    })
  }
}
