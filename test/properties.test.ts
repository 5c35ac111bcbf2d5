import { describe, it, expect } from "@effect/vitest"
import { Either } from "effect"
import * as FastCheck from "effect/FastCheck"
import Fraction from "fraction.js"
import { ExponentVector } from "../src/Exponents.js"
import { PREFIXES } from "../src/Prefixes.js"
import { Quantity, add, multiply, power, subtract } from "../src/Quantity.js"
import { mini } from "./fixtures.js"

const smallInt = FastCheck.integer({ min: -3, max: 3 })

const dimensionArbitrary = FastCheck.record({ L: smallInt, M: smallInt, T: smallInt }).map((exponents) =>
  ExponentVector.make(exponents),
)

const rationalArbitrary = FastCheck.tuple(FastCheck.integer({ min: -4, max: 4 }), FastCheck.integer({ min: 1, max: 4 })).map(
  ([numerator, denominator]) => new Fraction(numerator, denominator),
)

const valueArbitrary = FastCheck.double({ min: -1e6, max: 1e6, noNaN: true })

const right = <A, E>(either: Either.Either<A, E>): A => Either.getOrThrowWith(either, (error) => error)

describe("Quantity properties", () => {
  it("subtraction undoes addition", () => {
    FastCheck.assert(
      FastCheck.property(valueArbitrary, valueArbitrary, dimensionArbitrary, (a, b, dimension) => {
        const sum = right(add(new Quantity(a, dimension), new Quantity(b, dimension)))
        const back = right(subtract(sum, new Quantity(b, dimension)))
        expect(back.value).toBeCloseTo(a, 6)
        expect(back.dimension.equals(dimension)).toBe(true)
      }),
    )
  })

  it("multiplication commutes on dimensions", () => {
    FastCheck.assert(
      FastCheck.property(dimensionArbitrary, dimensionArbitrary, (first, second) => {
        const ab = multiply(new Quantity(2, first), new Quantity(3, second))
        const ba = multiply(new Quantity(3, second), new Quantity(2, first))
        expect(ab.dimension.equals(ba.dimension)).toBe(true)
        expect(ab.value).toBe(ba.value)
      }),
    )
  })

  it("nested powers multiply their exponents", () => {
    FastCheck.assert(
      FastCheck.property(
        FastCheck.double({ min: 0.1, max: 100, noNaN: true }),
        dimensionArbitrary,
        rationalArbitrary,
        rationalArbitrary,
        (value, dimension, p, q) => {
          const nested = right(power(right(power(new Quantity(value, dimension), p)), q))
          const direct = right(power(new Quantity(value, dimension), p.mul(q)))
          expect(nested.dimension.equals(direct.dimension)).toBe(true)
          expect(nested.value / direct.value).toBeCloseTo(1, 9)
        },
      ),
    )
  })

  it("exponent strings parse back to the same vector", () => {
    FastCheck.assert(
      FastCheck.property(dimensionArbitrary, (dimension) => {
        const parsed = right(ExponentVector.parse(dimension.toString()))
        expect(parsed.equals(dimension)).toBe(true)
      }),
    )
  })
})

describe("Unit properties", () => {
  it("degC converts back to the number it was built from", () => {
    FastCheck.assert(
      FastCheck.property(FastCheck.double({ min: -273.15, max: 1e4, noNaN: true }), (celsius) => {
        const quantity = right(mini.quantity(celsius, "degC"))
        expect(right(mini.convert(quantity, "degC"))).toBeCloseTo(celsius, 9)
      }),
    )
  })

  it("every prefix scales the metre by its factor", () => {
    FastCheck.assert(
      FastCheck.property(FastCheck.constantFrom(...PREFIXES), (prefix) => {
        const prefixed = right(mini.lookup(`${prefix.symbol}m`))
        expect(prefixed._tag === "Unit" && prefixed.quantity.value).toBe(prefix.factor)
      }),
    )
  })
})
