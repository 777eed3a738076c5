/**
 * Resolved units.
 *
 * A {@link Unit} is a unit string resolved once against a table: its SI
 * expansion, scale, offset, type and dimension vector are fixed fields.
 *
 * @since 0.1.0
 */

import { BASE_DIMENSIONS, DimensionVector } from "./Dimensions.js"
import { UnknownQuantityNameError } from "./Errors.js"
import {
  condense,
  divideUnitStrings,
  multiplyUnitStrings,
  powerUnitString,
  typeOf,
  type UnitType,
} from "./internal/units/algebra.js"
import { resolveUnitString } from "./internal/units/resolver.js"
import type { DerivedUnit, UnitTable } from "./UnitTable.js"
import { registerUnit } from "./UnitTable.js"
import { UnitSystem } from "./UnitSystem.js"

export type { UnitType } from "./internal/units/algebra.js"

/**
 * @category Models
 * @since 0.1.0
 */
export class Unit {
  private constructor(
    readonly table: UnitTable,
    /** The unit string in condensed form. */
    readonly name: string,
    readonly siUnits: string,
    readonly siScale: number,
    readonly siOffset: number,
    readonly type: UnitType,
    readonly dimensions: DimensionVector,
  ) {}

  /**
   * Resolve a unit string. The empty string is the dimensionless unit.
   *
   * @example
   * ```ts
   * const psi = Unit.make(table, "psi")
   * psi.siUnits // => "kg m^-1 s^-2"
   * ```
   */
  static make(table: UnitTable, units = ""): Unit {
    const name = condense(units)
    const resolved = resolveUnitString(table, name)
    return new Unit(
      table,
      name,
      resolved.siUnits,
      resolved.siScale,
      resolved.siOffset,
      typeOf(table, name),
      resolved.dimensions,
    )
  }

  /**
   * The unit a system uses for a dimension vector: the system unit of every
   * non-zero dimension raised to its exponent, in canonical order.
   */
  static fromDimensions(table: UnitTable, dimensions: DimensionVector, system?: UnitSystem): Unit {
    const units = system ?? UnitSystem.make(table)
    const terms = BASE_DIMENSIONS.flatMap((dimension) => {
      const exponent = dimensions.get(dimension)
      return exponent === 0 ? [] : [`${units.get(dimension)}^${String(exponent)}`]
    })
    return Unit.make(table, terms.join(" "))
  }

  /**
   * Compose a unit from named quantities of the table and their exponents.
   *
   * @example
   * ```ts
   * Unit.fromQuantityMap(table, { Force: 1, Length: -2 }).name // => "N m^-2"
   * ```
   */
  static fromQuantityMap(table: UnitTable, quantities: Readonly<Record<string, number>>): Unit {
    let units = ""
    for (const [quantity, exponent] of Object.entries(quantities)) {
      const base = Object.hasOwn(table.quantityMap, quantity) ? table.quantityMap[quantity] : undefined
      if (base === undefined) {
        throw new UnknownQuantityNameError({ quantity })
      }
      units = multiplyUnitStrings(units, powerUnitString(base, exponent))
    }
    return Unit.make(table, units)
  }

  get isDimensionless(): boolean {
    return this.dimensions.isDimensionless
  }

  multiply(that: Unit): Unit {
    return Unit.make(this.table, multiplyUnitStrings(this.name, that.name))
  }

  divide(that: Unit): Unit {
    return Unit.make(this.table, divideUnitStrings(this.name, that.name))
  }

  pow(exponent: number): Unit {
    return Unit.make(this.table, powerUnitString(this.name, exponent))
  }

  /**
   * Same dimensions, scale and offset, whatever the spelling (`N` and
   * `kg m s^-2`).
   */
  isEquivalent(that: Unit): boolean {
    return this.dimensions.equals(that.dimensions) &&
      this.siScale === that.siScale &&
      this.siOffset === that.siOffset
  }

  /**
   * Every other fundamental or derived symbol of the table with exactly the
   * same dimensions.
   */
  compatibleUnits(): ReadonlyArray<string> {
    return [...this.table.fundamentalUnits, ...this.table.derivedUnits]
      .map(({ symbol }) => symbol)
      .filter((symbol) => symbol !== this.name && resolveUnitString(this.table, symbol).dimensions.equals(this.dimensions))
  }

  toString(): string {
    return this.name
  }
}

/**
 * Register a derived unit and check that its composition resolves in the new
 * table.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const registerDerivedUnit = (table: UnitTable, definition: DerivedUnit): UnitTable => {
  const next = registerUnit(table, definition)
  resolveUnitString(next, definition.symbol)
  return next
}

/**
 * Alias of {@link Unit.make}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeUnit = (table: UnitTable, units = ""): Unit => Unit.make(table, units)
