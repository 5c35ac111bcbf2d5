import { describe, it, expect } from "@effect/vitest"
import { Effect, Either, Equal, Option } from "effect"
import Fraction from "fraction.js"
import { DimensionError, FractionalPowerOfNegativeError } from "../src/Errors.js"
import { ExponentVector } from "../src/Exponents.js"
import { Quantity, add, compare, convertTo, divide, multiply, power, subtract } from "../src/Quantity.js"

const L = ExponentVector.of("L")
const T = ExponentVector.of("T")

const right = <A, E>(either: Either.Either<A, E>): A => Either.getOrThrowWith(either, (error) => error)
const left = <A, E>(either: Either.Either<A, E>): E => Option.getOrThrow(Either.getLeft(either))

describe("Quantity", () => {
  describe("addition", () => {
    it("keeps the left display unit", () => {
      const sum = right(add(new Quantity(2, L, ExponentVector.of("m")), new Quantity(3, L, ExponentVector.of("ft"))))
      expect(sum.value).toBe(5)
      expect(sum.display.equals(ExponentVector.of("m"))).toBe(true)
    })

    it("rejects mismatched dimensions", () => {
      const error = left(add(new Quantity(1, L), new Quantity(1, T)))
      expect(error._tag).toBe("DimensionError")
      expect(error.operation).toBe("add")
      expect(error.message).toBe("Cannot add quantities of dimension L and T")
    })

    it("treats plain numbers as dimensionless", () => {
      const difference = right(subtract(5, 3))
      expect(difference.value).toBe(2)
      expect(difference.isDimensionless).toBe(true)
      expect(left(subtract(new Quantity(1, L), 1)).operation).toBe("subtract")
    })
  })

  describe("multiplication", () => {
    it("combines dimensions and display units", () => {
      const speed = divide(new Quantity(6, L, ExponentVector.of("m")), new Quantity(2, T, ExponentVector.of("s")))
      expect(speed.value).toBe(3)
      expect(speed.dimension.equals(ExponentVector.make({ L: 1, T: -1 }))).toBe(true)
      expect(speed.display.toString()).toBe("m/s")
    })

    it("scales by numbers", () => {
      const doubled = multiply(new Quantity(4, L), 2)
      expect(doubled.value).toBe(8)
      expect(doubled.dimension.equals(L)).toBe(true)
    })
  })

  describe("power", () => {
    it("takes rational roots of dimensions", () => {
      const side = right(power(new Quantity(9, ExponentVector.of("L", 2), ExponentVector.of("m", 2)), new Fraction(1, 2)))
      expect(side.value).toBe(3)
      expect(side.dimension.equals(L)).toBe(true)
      expect(side.display.toString()).toBe("m")
    })

    it("allows integer powers of negative values", () => {
      const cube = right(power(new Quantity(-2, L), 3))
      expect(cube.value).toBe(-8)
      expect(cube.dimension.equals(ExponentVector.of("L", 3))).toBe(true)
    })

    it("refuses fractional powers of negative values", () => {
      const error = left(power(new Quantity(-8, L), new Fraction(1, 3)))
      expect(error).toBeInstanceOf(FractionalPowerOfNegativeError)
      expect(error.base).toBe(-8)
      expect(error.exponent).toBe("1/3")
    })

    it("uses floating exponents for plain numbers", () => {
      expect(right(power(2, 0.5)).value).toBeCloseTo(Math.SQRT2, 15)
    })
  })

  describe("comparison and conversion", () => {
    it("orders quantities of the same dimension", () => {
      expect(right(compare(new Quantity(1, L), new Quantity(2, L)))).toBe(-1)
      expect(right(compare(new Quantity(2, L), new Quantity(2, L)))).toBe(0)
      expect(left(compare(new Quantity(1, L), new Quantity(1, T))).operation).toBe("compare")
    })

    it("expresses a quantity in a unit", () => {
      const km = new Quantity(1000, L, ExponentVector.of("km"))
      expect(right(convertTo(new Quantity(1500, L), km))).toBe(1.5)
      const error = left(convertTo(new Quantity(1, T), km))
      expect(error.unit).toBe("km")
      expect(error.message).toBe("Cannot express a quantity of dimension T in km (dimension L)")
      expect(new Quantity(3600, T).in(new Quantity(60, T, ExponentVector.of("min")))).toBe(60)
    })
  })

  describe("methods", () => {
    it("throw the tagged errors", () => {
      expect(() => new Quantity(1, L).plus(new Quantity(1, T))).toThrow(DimensionError)
      expect(() => new Quantity(-1).pow(0.5)).toThrow(FractionalPowerOfNegativeError)
    })

    it("negate and take absolute values", () => {
      const negative = new Quantity(2, L).negate()
      expect(negative.value).toBe(-2)
      expect(negative.abs().value).toBe(2)
    })

    it("compare equal regardless of display", () => {
      const metres = new Quantity(2, L, ExponentVector.of("m"))
      const feet = new Quantity(2, L, ExponentVector.of("ft"))
      expect(metres.equals(feet)).toBe(true)
      expect(Equal.equals(metres, feet)).toBe(true)
      expect(metres.equals(new Quantity(2, T))).toBe(false)
    })

    it("print value and dimension", () => {
      expect(new Quantity(2, ExponentVector.make({ L: 1, T: -1 })).toString()).toBe("2 L/T")
      expect(Quantity.dimensionless(0.5).toString()).toBe("0.5")
    })
  })

  it.effect("yields arithmetic results inside Effect.gen", () =>
    Effect.gen(function* () {
      const sum = yield* add(new Quantity(1, L), new Quantity(2, L))
      expect(sum.value).toBe(3)
      const error = yield* Effect.flip(add(new Quantity(1, L), new Quantity(2, T)))
      expect(error._tag).toBe("DimensionError")
    }),
  )
})
