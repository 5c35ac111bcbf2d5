/**
 * SI prefixes and the lookup-time synthesis of prefixed units.
 *
 * Prefixed names are never stored in a symbol table; `resolvePrefixed`
 * builds them on demand from a prefixable base entry.
 *
 * @since 0.1.0
 */

import { Either, Option } from "effect"
import { LookupError } from "./Errors.js"
import { ExponentVector } from "./Exponents.js"
import { Quantity } from "./Quantity.js"
import { SymbolEntry, isPrefixable, type LambdaUnitEntry, type UnitEntry } from "./SymbolEntry.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface Prefix {
  readonly symbol: string
  readonly name: string
  /** Power of ten. */
  readonly exponent: number
  /** `10 ** exponent`, read from the decimal literal so it is exact. */
  readonly factor: number
}

const prefix = (symbol: string, name: string, exponent: number): Prefix => ({
  symbol,
  name,
  exponent,
  factor: Number(`1e${exponent}`),
})

/**
 * @category Constants
 * @since 0.1.0
 */
export const PREFIXES: ReadonlyArray<Prefix> = [
  prefix("Y", "yotta", 24),
  prefix("Z", "zetta", 21),
  prefix("E", "exa", 18),
  prefix("P", "peta", 15),
  prefix("T", "tera", 12),
  prefix("G", "giga", 9),
  prefix("M", "mega", 6),
  prefix("k", "kilo", 3),
  prefix("h", "hecto", 2),
  prefix("da", "deca", 1),
  prefix("d", "deci", -1),
  prefix("c", "centi", -2),
  prefix("m", "milli", -3),
  prefix("u", "micro", -6),
  prefix("n", "nano", -9),
  prefix("p", "pico", -12),
  prefix("f", "femto", -15),
  prefix("a", "atto", -18),
  prefix("z", "zepto", -21),
  prefix("y", "yocto", -24),
]

const BY_SYMBOL: ReadonlyMap<string, Prefix> = new Map(PREFIXES.map((entry) => [entry.symbol, entry] as const))

/**
 * @since 0.1.0
 */
export const findPrefix = (symbol: string): Option.Option<Prefix> => Option.fromNullable(BY_SYMBOL.get(symbol))

/**
 * Candidate (prefix, base) splits of `name` in precedence order: every
 * one-character prefix before the two-character `da`.
 *
 * @since 0.1.0
 */
export const prefixSplits = (name: string): ReadonlyArray<readonly [Prefix, string]> => {
  const splits: Array<readonly [Prefix, string]> = []
  for (const length of [1, 2]) {
    if (name.length <= length) {
      continue
    }
    const found = BY_SYMBOL.get(name.slice(0, length))
    if (found) {
      splits.push([found, name.slice(length)])
    }
  }
  return splits
}

/**
 * Apply `prefix` to a prefixable entry. The result is shown under `name`
 * and cannot be prefixed again.
 *
 * @since 0.1.0
 */
export const applyPrefix = (entry: UnitEntry | LambdaUnitEntry, found: Prefix, name: string): SymbolEntry => {
  const display = ExponentVector.of(name)
  switch (entry._tag) {
    case "LambdaUnit":
      return SymbolEntry.LambdaUnit({
        name,
        unit: entry.unit.scaled(found.factor, display),
        prefixable: false,
        origin: entry.origin,
      })
    case "Unit":
      return SymbolEntry.Unit({
        name,
        quantity: new Quantity(entry.quantity.value * found.factor, entry.quantity.dimension, display),
        prefixable: false,
        origin: entry.origin,
      })
  }
}

/**
 * Resolve `name` against `find`: an exact entry always wins, then a
 * one-character prefix on a prefixable base, then `da`.
 *
 * @category Lookup
 * @since 0.1.0
 * @example
 * ```ts
 * resolvePrefixed("km", (name) => table.get(name)) // kilo-metre, value 1000 * m
 * ```
 */
export const resolvePrefixed = (
  name: string,
  find: (name: string) => Option.Option<SymbolEntry>,
): Either.Either<SymbolEntry, LookupError> => {
  const exact = find(name)
  if (Option.isSome(exact)) {
    return Either.right(exact.value)
  }
  const refused: Array<string> = []
  for (const [found, baseName] of prefixSplits(name)) {
    const base = find(baseName)
    if (Option.isNone(base)) {
      continue
    }
    if (isPrefixable(base.value)) {
      return Either.right(applyPrefix(base.value, found, name))
    }
    refused.push(baseName)
  }
  return Either.left(
    new LookupError({
      symbol: name,
      reason:
        refused.length > 0
          ? `"${refused.join('", "')}" cannot take an SI prefix`
          : "not defined and not a prefixed unit",
    }),
  )
}
