import { describe, it, expect } from "@effect/vitest"
import { Either, Option } from "effect"
import { Quantity } from "../src/Quantity.js"
import { build, mini, source } from "./fixtures.js"

const signed = build([source("signed", "dip = -4", "sq = Unit(4, 'L2'), True")], mini)

describe("SymbolTable", () => {
  describe("resolveUnit", () => {
    it("combines units with exponents", () => {
      const resolved = Either.getOrThrowWith(signed.resolveUnit("sq(1/2)*s"), (error) => error)
      expect(resolved._tag === "Scalar" && resolved.quantity.value).toBe(2)
      expect(resolved._tag === "Scalar" && resolved.quantity.dimension.toString()).toBe("L*T")
    })

    it("returns fractional powers of negative constants as errors", () => {
      const error = Option.getOrThrow(Either.getLeft(signed.resolveUnit("dip(1/2)")))
      expect(error._tag).toBe("FractionalPowerOfNegativeError")
    })
  })

  describe("convert", () => {
    it("reports a negative base through the error channel", () => {
      const result = signed.convert(new Quantity(1), "dip(1/2)*m")
      expect(Either.isLeft(result) && result.left._tag).toBe("FractionalPowerOfNegativeError")
    })
  })
})
