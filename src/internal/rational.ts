import Fraction from "fraction.js"

export type Rational = Fraction

export type RationalLike = number | Fraction

export const toRational = (value: RationalLike): Rational =>
  value instanceof Fraction ? value : new Fraction(value)

export const isInteger = (value: Rational): boolean => value.d === 1

export const isZero = (value: Rational): boolean => value.n === 0

/**
 * `3`, `-2`, `1/2`. Never a mixed fraction.
 */
export const formatRational = (value: Rational): string => value.toFraction(false)

export const compareMagnitude = (left: Rational, right: Rational): number =>
  right.abs().compare(left.abs())
