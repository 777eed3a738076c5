import type { BaseDimension } from "../../Dimensions.js"
import { DimensionVector } from "../../Dimensions.js"
import { InvalidUnitTableError } from "../../Errors.js"
import type { UnitTable } from "../../UnitTable.js"
import { findDerived, findFundamental, findMultiplier, siRepresentative } from "../../UnitTable.js"
import { condense } from "./algebra.js"
import { parseUnitString } from "./parser.js"

/**
 * A unit string reduced to SI: `value_si = (value + siOffset) * siScale`.
 */
export interface ResolvedUnit {
  readonly siUnits: string
  readonly siScale: number
  readonly siOffset: number
  readonly dimensions: DimensionVector
}

const MAX_DEPTH = 32

interface Accumulator {
  scale: number
  readonly siTerms: Array<string>
  readonly exponents: Partial<Record<BaseDimension, number>>
}

const expand = (
  table: UnitTable,
  units: string,
  power: number,
  trail: ReadonlyArray<string>,
  acc: Accumulator,
): void => {
  if (trail.length > MAX_DEPTH) {
    throw new InvalidUnitTableError({ reason: `derived unit expansion exceeds ${MAX_DEPTH} levels: ${trail.join(" -> ")}` })
  }
  for (const term of parseUnitString(table, units)) {
    const termPower = term.power * power
    const multiplier = findMultiplier(table, term.multiplier)
    if (multiplier) {
      acc.scale *= multiplier.factor ** termPower
    }
    const fundamental = findFundamental(table, term.base)
    if (fundamental) {
      const representative = siRepresentative(table, fundamental.type)
      if (!representative) {
        throw new InvalidUnitTableError({
          reason: `dimension ${fundamental.type} has no unit with factor 1 and offset 0`,
        })
      }
      acc.scale *= fundamental.factor ** termPower
      acc.siTerms.push(`${representative.symbol}^${String(termPower)}`)
      acc.exponents[fundamental.type] = (acc.exponents[fundamental.type] ?? 0) + termPower
      continue
    }
    const derived = findDerived(table, term.base)
    if (derived) {
      if (trail.includes(derived.symbol)) {
        throw new InvalidUnitTableError({
          reason: `derived unit \`${derived.symbol}\` is defined in terms of itself: ${[...trail, derived.symbol].join(" -> ")}`,
        })
      }
      acc.scale *= derived.factor ** termPower
      expand(table, derived.composition, termPower, [...trail, derived.symbol], acc)
    }
  }
}

const cache = new WeakMap<UnitTable, Map<string, ResolvedUnit>>()

/** Entries kept per table; the oldest is evicted first. */
export const RESOLVE_CACHE_SIZE = 1024

const resolveUncached = (table: UnitTable, units: string): ResolvedUnit => {
  const acc: Accumulator = { scale: 1, siTerms: [], exponents: {} }
  expand(table, units, 1, [], acc)
  return {
    siUnits: condense(acc.siTerms.join(" ")),
    siScale: acc.scale,
    siOffset: findFundamental(table, units.trim())?.offset ?? 0,
    dimensions: DimensionVector.make(acc.exponents),
  }
}

/**
 * Resolve a unit string to its SI units, scale, offset and dimensions.
 * The most recent results are memoized per table.
 *
 * @example
 * ```ts
 * resolveUnitString(table, "ft^2") // => { siUnits: "m^2", siScale: 0.0929..., siOffset: 0, ... }
 * ```
 */
export const resolveUnitString = (table: UnitTable, units: string): ResolvedUnit => {
  let resolved = cache.get(table)
  if (!resolved) {
    resolved = new Map()
    cache.set(table, resolved)
  }
  const cached = resolved.get(units)
  if (cached) {
    return cached
  }
  const result = resolveUncached(table, units)
  if (resolved.size >= RESOLVE_CACHE_SIZE) {
    const oldest = resolved.keys().next()
    if (!oldest.done) {
      resolved.delete(oldest.value)
    }
  }
  resolved.set(units, result)
  return result
}
