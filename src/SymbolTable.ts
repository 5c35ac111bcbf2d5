/**
 * Frozen registry of constants and units built from definition sources.
 *
 * A table is an explicit value: independent unit systems are independent
 * tables and nothing is shared between them. Lookups fall back to SI-prefix
 * synthesis without touching the table.
 *
 * @since 0.1.0
 */

import { Either, Option } from "effect"
import { FractionalPowerOfNegativeError, IncompatibleUnitError, LookupError, ParseError } from "./Errors.js"
import { ExponentVector } from "./Exponents.js"
import type { LambdaUnit } from "./LambdaUnit.js"
import { resolvePrefixed } from "./Prefixes.js"
import { Quantity, convertTo, multiply, power } from "./Quantity.js"
import { SymbolEntry, type Origin, type UnitEntry } from "./SymbolEntry.js"

/**
 * A symbol bound more than once; the later definition won.
 *
 * @since 0.1.0
 */
export interface Redefinition {
  readonly name: string
  readonly previous: Origin
  readonly current: Origin
}

/**
 * A compound unit expression resolved against a table: either a scalar
 * quantity displayed as the expression, or a single lambda unit.
 *
 * @since 0.1.0
 */
export type ResolvedUnit =
  | { readonly _tag: "Scalar"; readonly text: string; readonly quantity: Quantity }
  | { readonly _tag: "Lambda"; readonly text: string; readonly unit: LambdaUnit }

/**
 * @category Models
 * @since 0.1.0
 */
export class SymbolTable {
  readonly #entries: ReadonlyMap<string, SymbolEntry>
  readonly redefinitions: ReadonlyArray<Redefinition>

  constructor(entries: Iterable<SymbolEntry>, redefinitions: ReadonlyArray<Redefinition> = []) {
    this.#entries = new Map(Array.from(entries, (entry) => [entry.name, entry] as const))
    this.redefinitions = redefinitions
    Object.freeze(this)
  }

  static readonly empty: SymbolTable = new SymbolTable([])

  get size(): number {
    return this.#entries.size
  }

  has(name: string): boolean {
    return this.#entries.has(name)
  }

  /**
   * Exact entry for `name`, without prefix resolution.
   */
  get(name: string): Option.Option<SymbolEntry> {
    return Option.fromNullable(this.#entries.get(name))
  }

  /**
   * Exact entry, or a unit synthesized from an SI prefix and a prefixable
   * base.
   */
  lookup(name: string): Either.Either<SymbolEntry, LookupError> {
    return resolvePrefixed(name, (candidate) => this.get(candidate))
  }

  /**
   * Entries in definition order. A redefined symbol keeps the position of
   * its first definition.
   */
  entries(): ReadonlyArray<SymbolEntry> {
    return Array.from(this.#entries.values())
  }

  names(): ReadonlyArray<string> {
    return Array.from(this.#entries.keys())
  }

  units(): ReadonlyArray<UnitEntry> {
    return this.entries().filter(SymbolEntry.$is("Unit"))
  }

  /**
   * Entries whose quantity (or lambda codomain) has `dimension`.
   */
  withDimension(dimension: ExponentVector): ReadonlyArray<SymbolEntry> {
    return this.entries().filter((entry) =>
      (entry._tag === "LambdaUnit" ? entry.unit.dimension : entry.quantity.dimension).equals(dimension),
    )
  }

  /**
   * Resolve a unit expression such as `km`, `m/s2`, `kg*m2/s2` or
   * `degC`. A lambda unit only resolves on its own.
   */
  resolveUnit(text: string): Either.Either<ResolvedUnit, LookupError | ParseError | FractionalPowerOfNegativeError> {
    const trimmed = text.trim()
    const direct = this.lookup(trimmed)
    if (Either.isRight(direct)) {
      const entry = direct.right
      const resolved: ResolvedUnit =
        entry._tag === "LambdaUnit"
          ? { _tag: "Lambda", text: trimmed, unit: entry.unit }
          : { _tag: "Scalar", text: trimmed, quantity: entry.quantity.withDisplay(ExponentVector.of(trimmed)) }
      return Either.right(resolved)
    }
    const missing = direct.left
    const lookup = (name: string) => this.lookup(name)
    return Either.gen(function* () {
      const vector = yield* ExponentVector.parse(trimmed, text)
      if (vector.size === 1 && vector.entries()[0]?.[1].equals(1)) {
        return yield* Either.left(missing)
      }
      let quantity = new Quantity(1)
      for (const [name, exponent] of vector.entries()) {
        const entry = yield* lookup(name)
        if (entry._tag === "LambdaUnit") {
          return yield* Either.left(
            new LookupError({ symbol: name, reason: "a lambda unit cannot be combined with other units" }),
          )
        }
        quantity = multiply(quantity, yield* power(entry.quantity, exponent))
      }
      const resolved: ResolvedUnit = { _tag: "Scalar", text: trimmed, quantity: quantity.withDisplay(vector) }
      return resolved
    })
  }

  /**
   * Number of `unit`s in `quantity`.
   */
  convert(
    quantity: Quantity,
    unit: string,
  ): Either.Either<number, LookupError | ParseError | FractionalPowerOfNegativeError | IncompatibleUnitError> {
    return Either.flatMap(this.resolveUnit(unit), (resolved) =>
      resolved._tag === "Lambda" ? resolved.unit.convert(quantity) : convertTo(quantity, resolved.quantity, unit),
    )
  }

  /**
   * `value` expressed in `unit`, displayed in that unit.
   */
  quantity(
    value: number,
    unit: string,
  ): Either.Either<Quantity, LookupError | ParseError | FractionalPowerOfNegativeError> {
    return Either.map(this.resolveUnit(unit), (resolved) =>
      resolved._tag === "Lambda"
        ? resolved.unit.toQuantity(value)
        : multiply(value, resolved.quantity),
    )
  }
}

/**
 * Origin of a symbol defined in code rather than in a source file.
 *
 * @since 0.1.0
 */
export const inlineOrigin = (source = "<inline>", line = 0): Origin => ({
  source,
  line,
  section: Option.none(),
  note: Option.none(),
})
