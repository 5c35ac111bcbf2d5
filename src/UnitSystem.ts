/**
 * Effect service exposing a built unit system: lookups, conversions and
 * formatting against one frozen symbol table.
 *
 * Independent unit systems are independent layers; nothing is global.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Either, Layer, Option } from "effect"
import {
  buildSymbolTableLogged,
  defaultDefinitionPaths,
  evaluate,
  loadSymbolTable,
  type DefinitionSource,
} from "./Definitions.js"
import {
  LookupError,
  type DefinitionError,
  type FractionalPowerOfNegativeError,
  type IncompatibleUnitError,
  type ParseError,
} from "./Errors.js"
import { ExponentVector } from "./Exponents.js"
import { FORMAT_STYLES, formatQuantity, type FormatOptions, type FormatStyle } from "./Format.js"
import type { Quantity } from "./Quantity.js"
import type { SymbolEntry } from "./SymbolEntry.js"
import type { SymbolTable } from "./SymbolTable.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface UnitSystemSettings {
  /** Definition files, loaded in order. */
  readonly definitions: ReadonlyArray<string>
  readonly style: FormatStyle
  readonly maxSymbols: number
  readonly precision: Option.Option<number>
}

/**
 * @category Constants
 * @since 0.1.0
 */
export const defaultSettings: UnitSystemSettings = {
  definitions: defaultDefinitionPaths,
  style: "plain",
  maxSymbols: 3,
  precision: Option.none(),
}

/**
 * Settings read from `UNITS_DEFINITIONS` (comma separated paths),
 * `UNITS_STYLE`, `UNITS_MAX_SYMBOLS` and `UNITS_PRECISION`.
 *
 * @category Config
 * @since 0.1.0
 */
export const settingsConfig: Config.Config<UnitSystemSettings> = Config.all({
  definitions: Config.array(Config.string(), "UNITS_DEFINITIONS").pipe(
    Config.withDefault(defaultSettings.definitions),
  ),
  style: Config.literal(...FORMAT_STYLES)("UNITS_STYLE").pipe(Config.withDefault(defaultSettings.style)),
  maxSymbols: Config.integer("UNITS_MAX_SYMBOLS").pipe(
    Config.validate({ message: "UNITS_MAX_SYMBOLS must be at least 1", validation: (value) => value >= 1 }),
    Config.withDefault(defaultSettings.maxSymbols),
  ),
  precision: Config.option(
    Config.integer("UNITS_PRECISION").pipe(
      Config.validate({ message: "UNITS_PRECISION must be between 1 and 100", validation: (value) => value >= 1 && value <= 100 }),
    ),
  ),
})

/**
 * @category Services
 * @since 0.1.0
 */
export class UnitSystemConfig extends Context.Tag("dimensional/UnitSystemConfig")<
  UnitSystemConfig,
  UnitSystemSettings
>() {
  static readonly Default = Layer.succeed(this, defaultSettings)

  static readonly fromEnv = Layer.effect(this, settingsConfig)
}

/**
 * Ways a unit expression such as `km/h` or `m(1/2)` can fail to resolve.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitExpressionError = LookupError | ParseError | FractionalPowerOfNegativeError

/**
 * @category Services
 * @since 0.1.0
 */
export interface UnitSystemService {
  readonly table: SymbolTable
  readonly lookup: (name: string) => Effect.Effect<SymbolEntry, LookupError>
  /** Scalar quantity of a unit expression such as `km/h`. */
  readonly unit: (expression: string) => Effect.Effect<Quantity, UnitExpressionError>
  readonly quantity: (value: number, unit: string) => Effect.Effect<Quantity, UnitExpressionError>
  readonly convert: (quantity: Quantity, unit: string) => Effect.Effect<number, UnitExpressionError | IncompatibleUnitError>
  readonly format: (quantity: Quantity, options?: FormatOptions) => Effect.Effect<string>
  readonly evaluate: (expression: string) => Effect.Effect<Quantity, ParseError | LookupError | DefinitionError>
  readonly withDimension: (dimension: ExponentVector | string) => Effect.Effect<ReadonlyArray<SymbolEntry>, ParseError>
}

/**
 * Service over an already built table.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeUnitSystem = (
  table: SymbolTable,
  settings: UnitSystemSettings = defaultSettings,
): UnitSystemService => {
  const formatDefaults: FormatOptions = Option.match(settings.precision, {
    onNone: () => ({ style: settings.style, maxSymbols: settings.maxSymbols }),
    onSome: (precision) => ({ style: settings.style, maxSymbols: settings.maxSymbols, precision }),
  })

  return {
    table,
    lookup: (name) => table.lookup(name),
    unit: (expression) =>
      Either.flatMap(table.resolveUnit(expression), (resolved) =>
        resolved._tag === "Scalar"
          ? Either.right(resolved.quantity)
          : Either.left(
              new LookupError({
                symbol: resolved.text,
                reason: "is a lambda unit; build quantities with quantity(value, unit)",
              }),
            ),
      ),
    quantity: (value, unit) => table.quantity(value, unit),
    convert: (quantity, unit) => table.convert(quantity, unit),
    format: (quantity, options = {}) => Effect.sync(() => formatQuantity(table, quantity, { ...formatDefaults, ...options })),
    evaluate: (expression) => evaluate(table, expression),
    withDimension: (dimension) =>
      Either.map(
        typeof dimension === "string" ? ExponentVector.parse(dimension) : Either.right(dimension),
        (vector) => table.withDimension(vector),
      ),
  }
}

/**
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const units = yield* UnitSystem
 *   const distance = yield* units.quantity(3, "km")
 *   return yield* units.format(distance) // "3.0 km"
 * })
 * Effect.runPromise(program.pipe(Effect.provide(UnitSystem.Default)))
 * ```
 */
export class UnitSystem extends Context.Tag("dimensional/UnitSystem")<UnitSystem, UnitSystemService>() {
  /**
   * Load the configured definition files.
   */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const settings = yield* UnitSystemConfig
      const table = yield* loadSymbolTable(settings.definitions)
      return makeUnitSystem(table, settings)
    }),
  )

  /**
   * The bundled SI definitions with default settings.
   */
  static readonly Default = UnitSystem.layer.pipe(Layer.provide(UnitSystemConfig.Default))

  static fromTable(table: SymbolTable, settings: UnitSystemSettings = defaultSettings) {
    return Layer.succeed(this, makeUnitSystem(table, settings))
  }

  /**
   * Build from in-memory sources instead of files.
   */
  static fromSources(sources: ReadonlyArray<DefinitionSource>, settings: UnitSystemSettings = defaultSettings) {
    return Layer.effect(
      this,
      Effect.map(buildSymbolTableLogged(sources), (table) => makeUnitSystem(table, settings)),
    )
  }
}
