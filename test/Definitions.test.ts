import { describe, it, expect } from "@effect/vitest"
import { Effect, Either, HashMap, Logger, Option } from "effect"
import {
  buildSymbolTable,
  buildSymbolTableLogged,
  evaluate,
  loadSymbolTable,
  parseDefinitions,
} from "../src/Definitions.js"
import { DimensionError, FractionalPowerOfNegativeError } from "../src/Errors.js"
import { ExponentVector } from "../src/Exponents.js"
import type { SymbolEntry } from "../src/SymbolEntry.js"
import type { SymbolTable } from "../src/SymbolTable.js"
import { build, mini, source } from "./fixtures.js"

const entry = (table: SymbolTable, name: string): SymbolEntry =>
  Either.getOrThrowWith(table.lookup(name), (error) => error)

const valueOf = (table: SymbolTable, name: string): number => {
  const found = entry(table, name)
  return found._tag === "LambdaUnit" ? Number.NaN : found.quantity.value
}

const failure = (...lines: ReadonlyArray<string>) =>
  Option.getOrThrow(Either.getLeft(buildSymbolTable([source("bad", ...lines)], mini)))

describe("Definitions", () => {
  describe("building", () => {
    it("binds every statement in order", () => {
      expect(mini.names()).toStrictEqual([
        "c",
        "R_inf",
        "m",
        "s",
        "kg",
        "g",
        "K",
        "N",
        "J",
        "W",
        "Hz",
        "min",
        "h",
        "degC",
        "g_0",
      ])
    })

    it("turns flagged statements into units shown under their own name", () => {
      const metre = entry(mini, "m")
      expect(metre._tag).toBe("Unit")
      if (metre._tag !== "Unit") {
        return
      }
      expect(metre.quantity.value).toBe(1)
      expect(metre.prefixable).toBe(true)
      expect(metre.quantity.display.toString()).toBe("m")
      expect(metre.origin.source).toBe("mini")
      expect(metre.origin.line).toBe(7)
      expect(Option.getOrNull(metre.origin.section)).toBe("Units")
      expect(Option.getOrNull(metre.origin.note)).toBe("metre")
    })

    it("keeps the expression display on constants", () => {
      const gravity = entry(mini, "g_0")
      expect(gravity._tag).toBe("Constant")
      if (gravity._tag !== "Constant") {
        return
      }
      expect(gravity.quantity.value).toBe(9.80665)
      expect(gravity.quantity.display.toString()).toBe("m/s2")
      const light = entry(mini, "c")
      expect(light._tag === "Constant" && light.quantity.dimension.equals(ExponentVector.make({ L: 1, T: -1 }))).toBe(
        true,
      )
    })

    it("derives units from constants", () => {
      expect(valueOf(mini, "s")).toBe(1)
      expect(valueOf(mini, "N")).toBe(1)
      expect(valueOf(mini, "h")).toBe(3600)
      const kilogram = entry(mini, "kg")
      expect(kilogram._tag === "Unit" && kilogram.prefixable).toBe(false)
    })

    it("resolves prefixed names inside definitions", () => {
      const table = build([source("run", "leg = 5*km")], mini)
      expect(valueOf(table, "leg")).toBe(5000)
    })

    it("evaluates lambda units on n * unit and quantity / unit", () => {
      const table = build([source("temps", "t = 25*degC", "back = t/degC")], mini)
      expect(valueOf(table, "t")).toBeCloseTo(298.15, 12)
      expect(entry(table, "t")._tag).toBe("Constant")
      expect(valueOf(table, "back")).toBeCloseTo(25, 12)
    })

    it("takes exact roots", () => {
      const table = build([source("roots", "area = Quantity(4, 'L2')", "side = sqrt(area)")])
      expect(valueOf(table, "side")).toBe(2)
      const side = entry(table, "side")
      expect(side._tag === "Constant" && side.quantity.dimension.equals(ExponentVector.of("L"))).toBe(true)
    })
  })

  describe("redefinition", () => {
    it("lets the last definition win and records it", () => {
      const table = build([source("a", "x = 5"), source("b", "x = 7")])
      expect(valueOf(table, "x")).toBe(7)
      expect(table.redefinitions).toHaveLength(1)
      const [redefinition] = table.redefinitions
      expect(redefinition?.name).toBe("x")
      expect(redefinition?.previous.source).toBe("a")
      expect(redefinition?.current.source).toBe("b")
    })

    it("keeps the first position and earlier uses", () => {
      const table = build([source("a", "x = 5", "y = x*2", "x = 7")])
      expect(table.names()).toStrictEqual(["x", "y"])
      expect(valueOf(table, "y")).toBe(10)
      expect(valueOf(table, "x")).toBe(7)
    })

    it("lets lambda units keep the bindings they were defined with", () => {
      const table = build([
        source(
          "lambda",
          "k = Unit(2, 'Theta'), True",
          "lam = LambdaUnit(n => n*k, q => q/k), True",
          "k = Unit(3, 'Theta'), True",
          "x = 1*lam",
        ),
      ])
      expect(valueOf(table, "x")).toBe(2)
      expect(valueOf(table, "k")).toBe(3)
    })
  })

  describe("failures", () => {
    it("reports undefined symbols with their line", () => {
      const error = failure("a = 1", "b = a*zz")
      expect(error._tag).toBe("UndefinedSymbolError")
      expect(error.message).toBe('bad:2: "zz" is not defined (while defining "b")')
    })

    it("does not allow forward references", () => {
      const error = failure("b = a_later", "a_later = 1")
      expect(error._tag === "UndefinedSymbolError" && error.line).toBe(1)
    })

    it("parses every source before evaluating any", () => {
      const result = buildSymbolTable([source("first", "a = zz"), source("second", "b = 1", "", "c = (1 + 2")])
      const error = Option.getOrThrow(Either.getLeft(result))
      expect(error._tag).toBe("ParseError")
      if (error._tag !== "ParseError") {
        return
      }
      expect(error.source).toBe("second")
      expect(error.line).toBe(3)
      expect(error.column).toBe(11)
      expect(error.problem).toBe("Expected ')' to close group")
    })

    it("wraps arithmetic failures", () => {
      const error = failure("L1 = Quantity(1, 'L')", "T1 = Quantity(1, 'T')", "oops = L1 + T1")
      expect(error._tag).toBe("DefinitionError")
      if (error._tag !== "DefinitionError") {
        return
      }
      expect(error.symbol).toBe("oops")
      expect(error.line).toBe(3)
      expect(error.problem).toBe("Cannot add quantities of dimension L and T")
      expect(error.cause).toBeInstanceOf(DimensionError)
    })

    it("refuses fractional powers of negative numbers", () => {
      const error = failure("x = (-8)**(1/3)")
      expect(error._tag === "DefinitionError" && error.cause).toBeInstanceOf(FractionalPowerOfNegativeError)
    })

    it.each([
      ["x = degC*2", "a lambda unit can only be used as number * unit or quantity / unit"],
      ["x = 2\ny = x(3)", '"x" is a quantity, not a function'],
      ["x = sqrt(1, 2)", "sqrt expects 1 argument(s), got 2"],
      ["x = 'L'", "expression evaluates to a string, not a quantity or lambda unit"],
      ["x = Quantity(1, 'L**')", "Invalid exponent string 'L**': Expected a symbol"],
    ])("rejects %s", (text, problem) => {
      const error = failure(...text.split("\n"))
      expect(error._tag === "DefinitionError" && error.problem).toBe(problem)
    })

    it("treats unknown functions as undefined symbols", () => {
      const error = failure("x = foo(1)")
      expect(error._tag === "UndefinedSymbolError" && error.symbol).toBe("foo")
    })

    it("evaluates lambda unit bodies when they are defined", () => {
      const error = failure("lam = LambdaUnit(n => n*zz, q => q/m, 'L'), True")
      expect(error._tag).toBe("UndefinedSymbolError")
      expect(error.message).toBe('bad:1: "zz" is not defined (while defining "lam")')
    })

    it("rejects lambda units whose forward disagrees with the declared dimension", () => {
      const error = failure("a = 1", "lam = LambdaUnit(n => n*m, q => q/m, 'T'), True")
      expect(error._tag).toBe("DefinitionError")
      if (error._tag !== "DefinitionError") {
        return
      }
      expect(error.symbol).toBe("lam")
      expect(error.line).toBe(2)
      expect(error.problem).toBe("LambdaUnit forward returns dimension L, not the declared T")
    })
  })

  describe("parseDefinitions", () => {
    it("returns statements as written", () => {
      const statements = Either.getOrThrowWith(
        parseDefinitions(source("doc", "[S]", "m = 10*cm, True ; metre", "c0 = 3")),
        (error) => error,
      )
      expect(statements).toStrictEqual([
        { symbol: "m", expression: "10*cm", prefixable: true, source: "doc", line: 2, section: "S", note: "metre" },
        { symbol: "c0", expression: "3", prefixable: undefined, source: "doc", line: 3, section: "S", note: undefined },
      ])
    })
  })

  describe("evaluate", () => {
    it("evaluates expressions against a table", () => {
      const speed = Either.getOrThrowWith(evaluate(mini, "3*km/h"), (error) => error)
      expect(speed.value).toBeCloseTo(3000 / 3600, 12)
      expect(speed.display.toString()).toBe("km/h")
    })

    it("reports unknown names as lookup errors", () => {
      const error = Option.getOrThrow(Either.getLeft(evaluate(mini, "nope")))
      expect(error._tag === "LookupError" && error.symbol).toBe("nope")
    })

    it("reports syntax errors", () => {
      const error = Option.getOrThrow(Either.getLeft(evaluate(mini, "1 +")))
      expect(error._tag).toBe("ParseError")
      expect(error._tag === "ParseError" && [error.source, error.column]).toStrictEqual(["<expression>", 4])
    })

    it("needs a number in front of a lambda unit", () => {
      const error = Option.getOrThrow(Either.getLeft(evaluate(mini, "degC")))
      expect(error._tag === "DefinitionError" && error.problem).toBe("a lambda unit needs a number: write n * unit")
    })
  })

  describe("logging and loading", () => {
    it.effect("logs each redefinition as a warning", () =>
      Effect.gen(function* () {
        const logged: Array<string> = []
        const sources: Array<string> = []
        const logger = Logger.make(({ logLevel, message, annotations }) => {
          logged.push(`${logLevel.label} ${Array.isArray(message) ? message.join(" ") : String(message)}`)
          sources.push(String(Option.getOrNull(HashMap.get(annotations, "source"))))
        })
        const table = yield* buildSymbolTableLogged([source("a", "x = 5"), source("b", "x = 7")]).pipe(
          Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
        )
        expect(table.redefinitions).toHaveLength(1)
        expect(logged).toStrictEqual(['WARN "x" redefined; the definition at a:1 is replaced'])
        expect(sources).toStrictEqual(["b"])
      }),
    )

    it.effect("fails on unreadable files", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(loadSymbolTable(["/nonexistent/units.ini"]))
        expect(error._tag).toBe("DefinitionFileError")
        expect(error._tag === "DefinitionFileError" && error.path).toBe("/nonexistent/units.ini")
      }),
    )
  })
})
