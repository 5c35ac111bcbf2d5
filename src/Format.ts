/**
 * Rendering of quantities as text in the supported style tokens.
 *
 * The formatter prefers the display unit a quantity was built from, falls
 * back to the coherent simplifier for raw dimensions, and finally to the
 * base-dimension symbols themselves.
 *
 * @since 0.1.0
 */

import { Either, Option } from "effect"
import { ExponentVector } from "./Exponents.js"
import { renderScientific, unitSeparator, type FormatStyle } from "./internal/styles.js"
import { Quantity, multiply, power } from "./Quantity.js"
import { simplify } from "./Simplifier.js"
import { quantityOf } from "./SymbolEntry.js"
import type { SymbolTable } from "./SymbolTable.js"

export { FORMAT_STYLES, isFormatStyle, type FormatStyle } from "./internal/styles.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface FormatOptions {
  /** Defaults to `plain`. */
  readonly style?: FormatStyle
  /**
   * Significant digits, clamped to 1..100; ignored when `formatNumber` is
   * given or when not finite.
   */
  readonly precision?: number
  readonly formatNumber?: (value: number) => string
  /** Search depth handed to the simplifier. */
  readonly maxSymbols?: number
}

const RELATIVE_TOLERANCE = 1e-12
const MAX_PRECISION = 100

/**
 * Shortest round-trip text, with `.0` on integral values: `1.0`, `0.5`,
 * `1e+21`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const defaultNumberFormat = (value: number): string => {
  const text = String(value)
  return Number.isInteger(value) && !/[eE]/.test(text) ? `${text}.0` : text
}

const numberFormat = (options: FormatOptions): ((value: number) => string) => {
  if (options.formatNumber) {
    return options.formatNumber
  }
  const { precision } = options
  if (precision === undefined || !Number.isFinite(precision)) {
    return defaultNumberFormat
  }
  const digits = Math.min(MAX_PRECISION, Math.max(1, Math.trunc(precision)))
  return (value) => value.toPrecision(digits)
}

/**
 * Product of the scalar units named by `vector`, or `None` when a symbol
 * is unknown, is a lambda unit, or cannot be raised to its exponent.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const unitProduct = (table: SymbolTable, vector: ExponentVector): Option.Option<Quantity> => {
  let product = new Quantity(1)
  for (const [symbol, exponent] of vector.entries()) {
    const entry = table.lookup(symbol)
    const quantity = Either.isRight(entry) ? quantityOf(entry.right) : Option.none()
    if (Option.isNone(quantity)) {
      return Option.none()
    }
    const raised = power(quantity.value, exponent)
    if (Either.isLeft(raised)) {
      return Option.none()
    }
    product = multiply(product, raised.right)
  }
  return Option.some(product)
}

const sameScale = (a: number, b: number): boolean =>
  Math.abs(a - b) <= RELATIVE_TOLERANCE * Math.max(Math.abs(a), Math.abs(b))

/**
 * @category Models
 * @since 0.1.0
 */
export interface Rendering {
  readonly number: number
  readonly unit: ExponentVector
}

const fromLambdaDisplay = (table: SymbolTable, quantity: Quantity): Option.Option<Rendering> => {
  const [only] = quantity.display.entries()
  if (quantity.display.size !== 1 || !only || !only[1].equals(1)) {
    return Option.none()
  }
  const entry = table.lookup(only[0])
  if (Either.isLeft(entry) || entry.right._tag !== "LambdaUnit") {
    return Option.none()
  }
  return Option.map(Option.getRight(entry.right.unit.convert(quantity)), (number) => ({
    number,
    unit: quantity.display,
  }))
}

const fromScalarDisplay = (
  table: SymbolTable,
  quantity: Quantity,
  options: FormatOptions,
): Option.Option<Rendering> => {
  const { display, dimension } = quantity
  return Option.flatMap(unitProduct(table, display), (product) => {
    if (!product.dimension.equals(dimension)) {
      return Option.none()
    }
    if (display.size === 1) {
      return Option.some({ number: quantity.value / product.value, unit: display })
    }
    if (dimension.isEmpty) {
      return Option.some({ number: quantity.value, unit: ExponentVector.empty })
    }
    // A shorter unit only replaces the display when both carry the same scale.
    const shorter = simplify(table, dimension, options).pipe(
      Option.filter((candidate) => candidate.size < display.size),
      Option.flatMap((unit) =>
        unitProduct(table, unit).pipe(
          Option.filter((replacement) => sameScale(replacement.value, product.value)),
          Option.map((replacement) => ({ number: quantity.value / replacement.value, unit })),
        ),
      ),
    )
    return Option.some(Option.getOrElse(shorter, () => ({ number: quantity.value / product.value, unit: display })))
  })
}

const fromDimension = (table: SymbolTable, quantity: Quantity, options: FormatOptions): Rendering => {
  const { dimension, value } = quantity
  if (dimension.isEmpty) {
    return { number: value, unit: ExponentVector.empty }
  }
  return Option.match(simplify(table, dimension, options), {
    onNone: () => ({ number: value, unit: dimension }),
    onSome: (unit) => ({
      number: Option.match(unitProduct(table, unit), {
        onNone: () => value,
        onSome: (product) => value / product.value,
      }),
      unit,
    }),
  })
}

/**
 * Choose the unit a quantity is shown in and the number that goes with it.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const chooseRendering = (
  table: SymbolTable,
  quantity: Quantity,
  options: FormatOptions = {},
): Rendering => {
  if (quantity.display.isEmpty) {
    return fromDimension(table, quantity, options)
  }
  return fromLambdaDisplay(table, quantity).pipe(
    Option.orElse(() => fromScalarDisplay(table, quantity, options)),
    Option.getOrElse(() => fromDimension(table, quantity, options)),
  )
}

/**
 * Render `quantity` as text, e.g. `"1.0 J"`, `"3.0 km"` or `"25.0 °C"`.
 *
 * @category Formatting
 * @since 0.1.0
 * @example
 * ```ts
 * formatQuantity(si, new Quantity(1, ExponentVector.make({ L: 2, M: 1, T: -2 }))) // "1.0 J"
 * formatQuantity(si, speed, { style: "latex", precision: 3 }) // "12.0\\,\\mathrm{m}\\,\\mathrm{s}^{-1}"
 * ```
 */
export const formatQuantity = (table: SymbolTable, quantity: Quantity, options: FormatOptions = {}): string => {
  const style = options.style ?? "plain"
  const { number, unit } = chooseRendering(table, quantity, options)
  const numberText = renderScientific(numberFormat(options)(number), style)
  const unitText = unit.format(style)
  return unitText === "" ? numberText : `${numberText}${unitSeparator(style)}${unitText}`
}
