/**
 * Unit systems: one fundamental unit per base dimension.
 *
 * @since 0.1.0
 */

import { BASE_DIMENSIONS, type BaseDimension } from "./Dimensions.js"
import {
  DuplicateDimensionTypeError,
  ExcessiveParametersError,
  IncorrectUnitTypeError,
  InvalidUnitSystemError,
  NotFundamentalUnitError,
} from "./Errors.js"
import type { UnitTable } from "./UnitTable.js"
import { findFundamental } from "./UnitTable.js"

/**
 * Unit symbol per base dimension.
 *
 * @category Models
 * @since 0.1.0
 */
export type SystemUnits = Readonly<Record<BaseDimension, string>>

/**
 * @category Models
 * @since 0.1.0
 */
export interface UnitSystemOptions {
  /** Name of a predefined system of the table (`SI`, `CGS`, `BT`). */
  readonly system?: string
  /** Slots to override. */
  readonly baseUnits?: Partial<SystemUnits>
  readonly copyFrom?: UnitSystem
}

const validateSlots = (table: UnitTable, name: string, slots: Partial<Record<BaseDimension, string>>): SystemUnits => {
  const owners = new Map<string, Array<BaseDimension>>()
  for (const dimension of BASE_DIMENSIONS) {
    const unit = slots[dimension]
    if (unit !== undefined) {
      owners.set(unit, [...(owners.get(unit) ?? []), dimension])
    }
  }
  for (const [unit, dimensions] of owners) {
    const [first, ...rest] = dimensions
    if (first !== undefined && rest.length > 0) {
      throw new DuplicateDimensionTypeError({
        dimension: findFundamental(table, unit)?.type ?? first,
        units: dimensions.map((slot) => `${slot}=${unit}`),
      })
    }
  }

  const missing: Array<BaseDimension> = []
  const units: Partial<Record<BaseDimension, string>> = {}
  for (const dimension of BASE_DIMENSIONS) {
    const unit = slots[dimension]
    if (unit === undefined) {
      missing.push(dimension)
      continue
    }
    const fundamental = findFundamental(table, unit)
    if (!fundamental) {
      throw new NotFundamentalUnitError({ unit })
    }
    if (fundamental.type !== dimension) {
      throw new IncorrectUnitTypeError({ unit, dimension })
    }
    units[dimension] = unit
  }
  return completeSlots(name, units, missing)
}

const completeSlots = (
  name: string,
  units: Partial<Record<BaseDimension, string>>,
  missing: ReadonlyArray<BaseDimension>,
): SystemUnits => {
  const {
    MASS,
    LENGTH,
    TIME,
    TEMPERATURE,
    TEMPERATURE_DIFFERENCE,
    ANGLE,
    CHEMICAL_AMOUNT,
    LIGHT,
    CURRENT,
    SOLID_ANGLE,
  } = units
  if (
    MASS === undefined || LENGTH === undefined || TIME === undefined || TEMPERATURE === undefined ||
    TEMPERATURE_DIFFERENCE === undefined || ANGLE === undefined || CHEMICAL_AMOUNT === undefined ||
    LIGHT === undefined || CURRENT === undefined || SOLID_ANGLE === undefined
  ) {
    throw new InvalidUnitSystemError({ system: name, reason: `no unit for ${missing.join(", ")}` })
  }
  return {
    MASS,
    LENGTH,
    TIME,
    TEMPERATURE,
    TEMPERATURE_DIFFERENCE,
    ANGLE,
    CHEMICAL_AMOUNT,
    LIGHT,
    CURRENT,
    SOLID_ANGLE,
  }
}

const predefinedSlots = (table: UnitTable, name: string): Partial<Record<BaseDimension, string>> => {
  const predefined = Object.hasOwn(table.unitSystems, name) ? table.unitSystems[name] : undefined
  if (!predefined) {
    throw new InvalidUnitSystemError({ system: name, reason: "no such predefined system" })
  }
  const slots: Partial<Record<BaseDimension, string>> = {}
  for (const dimension of BASE_DIMENSIONS) {
    slots[dimension] = predefined[dimension]
  }
  return slots
}

/**
 * A complete and consistent assignment of fundamental units to base
 * dimensions.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const british = UnitSystem.make(table, { system: "BT" })
 * british.get("MASS") // => "slug"
 * const mixed = british.with({ LENGTH: "inch" })
 * ```
 */
export class UnitSystem {
  private constructor(
    readonly table: UnitTable,
    readonly name: string,
    readonly units: SystemUnits,
  ) {}

  /**
   * Start from a predefined system (`SI` by default) or a copy of another
   * system and apply `baseUnits` overrides.
   */
  static make(table: UnitTable, options: UnitSystemOptions = {}): UnitSystem {
    if (options.system !== undefined && options.copyFrom !== undefined) {
      throw new ExcessiveParametersError({ parameters: ["system", "copyFrom"] })
    }
    const name = options.copyFrom?.name ?? options.system ?? "SI"
    const start = options.copyFrom ? { ...options.copyFrom.units } : predefinedSlots(table, name)
    return new UnitSystem(table, name, validateSlots(table, name, { ...start, ...options.baseUnits }))
  }

  /**
   * Assemble a system from a list of fundamental units, each filling the slot
   * of its own dimension.
   */
  static fromUnits(table: UnitTable, units: ReadonlyArray<string>): UnitSystem {
    const slots: Partial<Record<BaseDimension, string>> = {}
    for (const unit of units) {
      const fundamental = findFundamental(table, unit)
      if (!fundamental) {
        throw new NotFundamentalUnitError({ unit })
      }
      const taken = slots[fundamental.type]
      if (taken !== undefined) {
        throw new DuplicateDimensionTypeError({ dimension: fundamental.type, units: [taken, unit] })
      }
      slots[fundamental.type] = unit
    }
    const name = units.join(" ")
    return new UnitSystem(table, name, validateSlots(table, name, slots))
  }

  get(dimension: BaseDimension): string {
    return this.units[dimension]
  }

  /**
   * Copy of this system with some slots replaced.
   */
  with(baseUnits: Partial<SystemUnits>): UnitSystem {
    return UnitSystem.make(this.table, { copyFrom: this, baseUnits })
  }

  equals(that: UnitSystem): boolean {
    return BASE_DIMENSIONS.every((dimension) => this.units[dimension] === that.units[dimension])
  }

  toString(): string {
    return BASE_DIMENSIONS.map((dimension) => `${dimension}: ${this.units[dimension]}`).join("\n")
  }
}
