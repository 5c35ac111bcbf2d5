/**
 * Coherent-unit search: express a raw dimension as a product of powers of
 * as few registered units as possible.
 *
 * @since 0.1.0
 */

import { Option } from "effect"
import Fraction from "fraction.js"
import { ExponentVector } from "./Exponents.js"
import { isInteger, isZero, type Rational } from "./internal/rational.js"
import type { UnitEntry } from "./SymbolEntry.js"
import type { SymbolTable } from "./SymbolTable.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface SimplifyOptions {
  /** Largest number of distinct unit symbols tried. Defaults to 3. */
  readonly maxSymbols?: number
}

const DEFAULT_MAX_SYMBOLS = 3
const COHERENCE_TOLERANCE = 1e-9

const candidateCache = new WeakMap<SymbolTable, ReadonlyArray<UnitEntry>>()
const resultCache = new WeakMap<SymbolTable, Map<string, Option.Option<ExponentVector>>>()

/**
 * Unique exact solution of `sum(x_i * columns_i) = target`, if there is
 * one.
 */
const solve = (
  columns: ReadonlyArray<ExponentVector>,
  target: ExponentVector,
): Option.Option<ReadonlyArray<Rational>> => {
  const symbols = new Set<string>(target.symbols)
  for (const column of columns) {
    column.symbols.forEach((symbol) => symbols.add(symbol))
  }
  const width = columns.length
  const rows: Array<Array<Rational>> = Array.from(symbols, (symbol) => [
    ...columns.map((column) => column.get(symbol)),
    target.get(symbol),
  ])

  let rank = 0
  for (let col = 0; col < width; col++) {
    const pivot = rows.findIndex((row, index) => index >= rank && !isZero(row[col] ?? new Fraction(0)))
    if (pivot < 0) {
      return Option.none()
    }
    const pivotRow = rows[pivot]
    const rankRow = rows[rank]
    if (!pivotRow || !rankRow) {
      return Option.none()
    }
    rows[pivot] = rankRow
    const lead = pivotRow[col] ?? new Fraction(1)
    const normalized = pivotRow.map((value) => value.div(lead))
    rows[rank] = normalized
    rows.forEach((row, index) => {
      const factor = row[col]
      if (index !== rank && factor && !isZero(factor)) {
        rows[index] = row.map((value, at) => value.sub(factor.mul(normalized[at] ?? new Fraction(0))))
      }
    })
    rank += 1
  }

  const consistent = rows.slice(rank).every((row) => isZero(row[width] ?? new Fraction(0)))
  return consistent ? Option.some(rows.slice(0, width).map((row) => row[width] ?? new Fraction(0))) : Option.none()
}

const scaleOf = (basis: ReadonlyArray<UnitEntry>, exponents: ReadonlyArray<Rational>): number =>
  basis.reduce((product, entry, index) => product * entry.quantity.value ** (exponents[index]?.valueOf() ?? 0), 1)

const sameScale = (a: number, b: number): boolean =>
  Math.abs(a - b) <= COHERENCE_TOLERANCE * Math.max(Math.abs(a), Math.abs(b))

/**
 * Scalar units with a dimension, in definition order, that are coherent with
 * the units defined before them. A unit whose dimension is independent of the
 * earlier ones fixes the scale of that dimension; any other unit must equal
 * the product those earlier units give for its dimension. Only the first
 * unit of each dimension is kept.
 *
 * @category Lookup
 * @since 0.1.0
 */
export const coherentUnits = (table: SymbolTable): ReadonlyArray<UnitEntry> => {
  const cached = candidateCache.get(table)
  if (cached) {
    return cached
  }
  const seen = new Set<string>()
  const basis: Array<UnitEntry> = []
  const units = table.units().filter((entry) => {
    const { dimension, value } = entry.quantity
    if (dimension.isEmpty || seen.has(dimension.key)) {
      return false
    }
    const coherent = Option.match(
      solve(
        basis.map((unit) => unit.quantity.dimension),
        dimension,
      ),
      {
        onNone: () => {
          basis.push(entry)
          return true
        },
        onSome: (exponents) => sameScale(value, scaleOf(basis, exponents)),
      },
    )
    if (coherent) {
      seen.add(dimension.key)
    }
    return coherent
  })
  candidateCache.set(table, units)
  return units
}

function* combinations(size: number, count: number): Generator<ReadonlyArray<number>> {
  if (size > count) {
    return
  }
  const indices = Array.from({ length: size }, (_, index) => index)
  while (true) {
    yield [...indices]
    let position = size - 1
    while (position >= 0 && indices[position] === count - size + position) {
      position -= 1
    }
    if (position < 0) {
      return
    }
    indices[position] = (indices[position] ?? 0) + 1
    for (let next = position + 1; next < size; next++) {
      indices[next] = (indices[next - 1] ?? 0) + 1
    }
  }
}

const search = (
  candidates: ReadonlyArray<UnitEntry>,
  dimension: ExponentVector,
  maxSymbols: number,
  accept: (exponent: Rational) => boolean,
): Option.Option<ExponentVector> => {
  for (let size = 1; size <= Math.min(maxSymbols, candidates.length); size++) {
    for (const indices of combinations(size, candidates.length)) {
      const chosen = indices.flatMap((index) => {
        const entry = candidates[index]
        return entry ? [entry] : []
      })
      const solution = solve(
        chosen.map((entry) => entry.quantity.dimension),
        dimension,
      )
      if (Option.isSome(solution) && solution.value.every((exponent) => !isZero(exponent) && accept(exponent))) {
        return Option.some(
          ExponentVector.make(chosen.map((entry, index) => [entry.name, solution.value[index] ?? new Fraction(0)] as const)),
        )
      }
    }
  }
  return Option.none()
}

/**
 * Fewest-symbol combination of coherent units whose dimension is
 * `dimension`, ties going to the earliest-defined units. Combinations with
 * integer exponents are tried at every size before fractional ones. `None`
 * for a dimensionless target or when nothing within `maxSymbols` fits.
 *
 * @category Simplification
 * @since 0.1.0
 * @example
 * ```ts
 * simplify(si, ExponentVector.make({ L: 2, M: 1, T: -2 })) // Some({ J: 1 })
 * simplify(si, ExponentVector.make({ L: 1, T: -1 })) // Some({ m: 1, s: -1 })
 * ```
 */
export const simplify = (
  table: SymbolTable,
  dimension: ExponentVector,
  options: SimplifyOptions = {},
): Option.Option<ExponentVector> => {
  if (dimension.isEmpty) {
    return Option.none()
  }
  const maxSymbols = options.maxSymbols ?? DEFAULT_MAX_SYMBOLS
  const key = `${maxSymbols}#${dimension.key}`
  let cache = resultCache.get(table)
  if (!cache) {
    cache = new Map()
    resultCache.set(table, cache)
  }
  const cached = cache.get(key)
  if (cached) {
    return cached
  }
  const candidates = coherentUnits(table)
  const result = search(candidates, dimension, maxSymbols, isInteger).pipe(
    Option.orElse(() => search(candidates, dimension, maxSymbols, () => true)),
  )
  cache.set(key, result)
  return result
}
