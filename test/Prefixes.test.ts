import { describe, it, expect } from "@effect/vitest"
import { Either, Option } from "effect"
import { ExponentVector } from "../src/Exponents.js"
import { LambdaUnit } from "../src/LambdaUnit.js"
import { PREFIXES, findPrefix, prefixSplits, resolvePrefixed } from "../src/Prefixes.js"
import { Quantity } from "../src/Quantity.js"
import { SymbolEntry } from "../src/SymbolEntry.js"
import { inlineOrigin } from "../src/SymbolTable.js"

const L = ExponentVector.of("L")
const origin = inlineOrigin()

const unit = (name: string, value: number, prefixable: boolean): SymbolEntry =>
  SymbolEntry.Unit({ name, quantity: new Quantity(value, L, ExponentVector.of(name)), prefixable, origin })

const finder = (...entries: ReadonlyArray<SymbolEntry>) => {
  const byName = new Map(entries.map((entry) => [entry.name, entry] as const))
  return (name: string): Option.Option<SymbolEntry> => Option.fromNullable(byName.get(name))
}

const resolved = (name: string, find: (name: string) => Option.Option<SymbolEntry>): SymbolEntry =>
  Either.getOrThrowWith(resolvePrefixed(name, find), (error) => error)

const valueOf = (entry: SymbolEntry): number => (entry._tag === "LambdaUnit" ? Number.NaN : entry.quantity.value)

describe("SI prefixes", () => {
  it("covers yotta to yocto", () => {
    expect(PREFIXES).toHaveLength(20)
    expect(PREFIXES.map((prefix) => prefix.symbol).join(" ")).toBe("Y Z E P T G M k h da d c m u n p f a z y")
    const kilo = Option.getOrThrow(findPrefix("k"))
    expect(kilo.exponent).toBe(3)
    expect(kilo.factor).toBe(1000)
    expect(Option.isNone(findPrefix("x"))).toBe(true)
  })

  it("splits one-character prefixes before da", () => {
    expect(prefixSplits("dam").map(([prefix, base]) => [prefix.symbol, base])).toStrictEqual([
      ["d", "am"],
      ["da", "m"],
    ])
    expect(prefixSplits("m")).toStrictEqual([])
  })

  describe("resolvePrefixed", () => {
    const metre = unit("m", 1, true)

    it("synthesizes prefixed units", () => {
      const km = resolved("km", finder(metre))
      expect(km._tag).toBe("Unit")
      expect(km.name).toBe("km")
      expect(valueOf(km)).toBe(1000)
      expect(km._tag === "Unit" && km.prefixable).toBe(false)
      expect(km._tag === "Unit" && km.quantity.display.equals(ExponentVector.of("km"))).toBe(true)
    })

    it("prefers an exact definition", () => {
      expect(valueOf(resolved("km", finder(metre, unit("km", 7, false))))).toBe(7)
    })

    it("resolves da when no one-character split applies", () => {
      expect(valueOf(resolved("dam", finder(metre)))).toBe(10)
    })

    it("resolves a one-character prefix before da", () => {
      expect(valueOf(resolved("dam", finder(metre, unit("am", 5, true))))).toBe(0.5)
    })

    it("refuses bases that are not prefixable", () => {
      const error = Option.getOrThrow(Either.getLeft(resolvePrefixed("mkg", finder(unit("kg", 1, false)))))
      expect(error.message).toBe('Unknown symbol "mkg": "kg" cannot take an SI prefix')
    })

    it("refuses constants", () => {
      const c = SymbolEntry.Constant({ name: "c", quantity: new Quantity(299792458), origin })
      const error = Option.getOrThrow(Either.getLeft(resolvePrefixed("kc", finder(c))))
      expect(error.reason).toBe('"c" cannot take an SI prefix')
    })

    it("reports unknown names", () => {
      const error = Option.getOrThrow(Either.getLeft(resolvePrefixed("xyz", finder(metre))))
      expect(error.symbol).toBe("xyz")
      expect(error.reason).toBe("not defined and not a prefixed unit")
    })

    it("scales lambda units", () => {
      const bel = SymbolEntry.LambdaUnit({
        name: "B",
        unit: new LambdaUnit({
          forward: (n) => new Quantity(10 ** n),
          inverse: (q) => Math.log10(q.value),
          dimension: ExponentVector.empty,
          display: ExponentVector.of("B"),
        }),
        prefixable: true,
        origin,
      })
      const decibel = resolved("dB", finder(bel))
      expect(decibel._tag).toBe("LambdaUnit")
      expect(decibel._tag === "LambdaUnit" && decibel.unit.toQuantity(20).value).toBe(100)
      expect(decibel._tag === "LambdaUnit" && decibel.unit.display.toString()).toBe("dB")
    })
  })
})
