import { dimensionLabel, type DimensionLabel } from "../../Dimensions.js"
import type { UnitTable } from "../../UnitTable.js"
import { findDerived, findFundamental } from "../../UnitTable.js"
import { parseUnitString, tokenizeUnitString, type RawTerm } from "./parser.js"

/**
 * Classification of a unit string: the label of a base dimension for a bare
 * fundamental unit, or one of the composite kinds.
 */
export type UnitType = DimensionLabel | "derived" | "composite" | "no type"

const EPSILON = 1e-12

const renderTerm = (symbol: string, power: number): string =>
  power === 1 ? symbol : `${symbol}^${String(Number(power.toPrecision(12)))}`

const condenseTerms = (terms: Iterable<RawTerm>): string => {
  const powers = new Map<string, number>()
  for (const { symbol, power } of terms) {
    powers.set(symbol, (powers.get(symbol) ?? 0) + power)
  }
  const rendered: Array<string> = []
  for (const [symbol, power] of powers) {
    if (Math.abs(power) > EPSILON) {
      rendered.push(renderTerm(symbol, power))
    }
  }
  return rendered.join(" ")
}

const scaleTerms = (terms: ReadonlyArray<RawTerm>, factor: number): ReadonlyArray<RawTerm> =>
  terms.map((term) => ({ ...term, power: term.power * factor, hasExponent: true }))

/**
 * Merge repeated symbols by summing their powers, in order of first
 * appearance. Terms whose powers cancel are dropped.
 *
 * @example
 * ```ts
 * condense("kg ft^3 kg^-2") // => "kg^-1 ft^3"
 * ```
 */
export const condense = (units: string): string => condenseTerms(tokenizeUnitString(units))

export const multiplyUnitStrings = (left: string, right: string): string =>
  condenseTerms([...tokenizeUnitString(left), ...tokenizeUnitString(right)])

export const divideUnitStrings = (left: string, right: string): string =>
  condenseTerms([...tokenizeUnitString(left), ...scaleTerms(tokenizeUnitString(right), -1)])

export const powerUnitString = (units: string, exponent: number): string =>
  condenseTerms(scaleTerms(tokenizeUnitString(units), exponent))

/**
 * Classify a unit string against the table.
 *
 * A composite containing a temperature unit is a temperature difference when
 * that unit carries an explicit exponent or is itself a difference unit.
 */
export const typeOf = (table: UnitTable, units: string): UnitType => {
  const symbol = units.trim()
  if (symbol === "") {
    return "no type"
  }
  const fundamental = findFundamental(table, symbol)
  if (fundamental) {
    return dimensionLabel(fundamental.type)
  }
  if (findDerived(table, symbol)) {
    return "derived"
  }
  let type: UnitType = "composite"
  for (const term of parseUnitString(table, symbol)) {
    const base = findFundamental(table, term.base)
    if (base?.type === "TEMPERATURE_DIFFERENCE" || (base?.type === "TEMPERATURE" && term.hasExponent)) {
      return "temperature difference"
    }
    if (base?.type === "TEMPERATURE") {
      type = "temperature"
    }
  }
  return type
}
