import { Either } from "effect"
import { DefinitionSource, buildSymbolTable } from "../src/Definitions.js"
import type { SymbolTable } from "../src/SymbolTable.js"

export const source = (name: string, ...lines: ReadonlyArray<string>): DefinitionSource =>
  new DefinitionSource({ name, text: lines.join("\n") })

export const build = (sources: ReadonlyArray<DefinitionSource>, base?: SymbolTable): SymbolTable =>
  Either.getOrThrowWith(buildSymbolTable(sources, base), (error) => error)

/**
 * A compact SI subset; line numbers are asserted by the tests.
 */
export const miniSource = source(
  "mini",
  "# compact SI subset",
  "[Constants]",
  "c = Quantity(299792458, 'L/T') ; speed of light",
  "R_inf = Quantity(10973731.568539, 'L-1')",
  "",
  "[Units]",
  "m = 10973731.568539/R_inf, True ; metre",
  "s = 299792458*m/c, True",
  "kg = Unit(1, 'M'), False",
  "g = kg/1000, True",
  "K = Unit(1, 'Theta'), True",
  "N = kg*m/s**2, True",
  "J = N*m, True",
  "W = J/s, True",
  "Hz = 1/s, True",
  "min = 60*s, False",
  "h = 60*min, False",
  "degC = LambdaUnit(n => (n + 273.15)*K, q => q/K - 273.15), True",
  "g_0 = 9.80665*m/s**2",
)

export const mini: SymbolTable = build([miniSource])
