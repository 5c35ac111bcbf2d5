/**
 * Entries of a symbol table: constants, scalar units and lambda units.
 *
 * Callers match on `_tag` (or `SymbolEntry.$match`) instead of probing the
 * shape of a value.
 *
 * @since 0.1.0
 */

import { Data, Option } from "effect"
import type { LambdaUnit } from "./LambdaUnit.js"
import type { Quantity } from "./Quantity.js"

/**
 * Where a symbol was defined.
 *
 * @since 0.1.0
 */
export interface Origin {
  readonly source: string
  readonly line: number
  readonly section: Option.Option<string>
  readonly note: Option.Option<string>
}

/**
 * @category Models
 * @since 0.1.0
 */
export type SymbolEntry = Data.TaggedEnum<{
  Constant: {
    readonly name: string
    readonly quantity: Quantity
    readonly origin: Origin
  }
  Unit: {
    readonly name: string
    readonly quantity: Quantity
    readonly prefixable: boolean
    readonly origin: Origin
  }
  LambdaUnit: {
    readonly name: string
    readonly unit: LambdaUnit
    readonly prefixable: boolean
    readonly origin: Origin
  }
}>

/**
 * Constructors and guards for {@link SymbolEntry}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const SymbolEntry = Data.taggedEnum<SymbolEntry>()

export type ConstantEntry = Data.TaggedEnum.Value<SymbolEntry, "Constant">
export type UnitEntry = Data.TaggedEnum.Value<SymbolEntry, "Unit">
export type LambdaUnitEntry = Data.TaggedEnum.Value<SymbolEntry, "LambdaUnit">

/**
 * Entries that may carry an SI prefix.
 *
 * @since 0.1.0
 */
export const isPrefixable = (entry: SymbolEntry): entry is UnitEntry | LambdaUnitEntry =>
  entry._tag !== "Constant" && entry.prefixable

/**
 * The quantity a scalar entry stands for; `None` for lambda units.
 *
 * @since 0.1.0
 */
export const quantityOf = (entry: SymbolEntry): Option.Option<Quantity> =>
  entry._tag === "LambdaUnit" ? Option.none() : Option.some(entry.quantity)
