/**
 * Quantities: a numeric value (scalar or array) paired with a resolved unit.
 *
 * Temperature units come in two flavours. A bare absolute temperature (`K`,
 * `C`, `F`, `R`) is a point on a scale and converts with its offset; a
 * difference (`delta_C`, or any composite such as `W m^-2 K^-1`) is an
 * interval and converts by scale only. Arithmetic picks the flavour of its
 * result from the flavours of its operands.
 *
 * @since 0.1.0
 */

import { type BaseDimension, DimensionVector } from "./Dimensions.js"
import {
  ExcessiveParametersError,
  IncompatibleDimensionsError,
  IncompatibleQuantitiesError,
  InsufficientArgumentsError,
  InvalidFloatCoercionError,
  ProhibitedTemperatureOperationError,
} from "./Errors.js"
import { Unit, type UnitType } from "./Unit.js"
import { UnitSystem } from "./UnitSystem.js"
import type { UnitTable } from "./UnitTable.js"
import { findFundamental } from "./UnitTable.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type QuantityValue = number | ReadonlyArray<number>

/**
 * Right-hand side of arithmetic and comparisons. A plain number is a
 * dimensionless quantity.
 *
 * @category Models
 * @since 0.1.0
 */
export type Operand = Quantity | number

const DELTA_PREFIX = "delta_"
const RELATIVE_TOLERANCE = 1e-12

const isAbsoluteTemperature = (unit: Unit): boolean =>
  findFundamental(unit.table, unit.name)?.type === "TEMPERATURE"

const deltaCounterpart = (unit: Unit): Unit | undefined => {
  const symbol = `${DELTA_PREFIX}${unit.name}`
  return findFundamental(unit.table, symbol)?.type === "TEMPERATURE_DIFFERENCE"
    ? Unit.make(unit.table, symbol)
    : undefined
}

const absoluteCounterpart = (unit: Unit): Unit | undefined => {
  if (findFundamental(unit.table, unit.name)?.type !== "TEMPERATURE_DIFFERENCE" || !unit.name.startsWith(DELTA_PREFIX)) {
    return undefined
  }
  const symbol = unit.name.slice(DELTA_PREFIX.length)
  return findFundamental(unit.table, symbol)?.type === "TEMPERATURE" ? Unit.make(unit.table, symbol) : undefined
}

const mapValue = (value: QuantityValue, f: (x: number) => number): QuantityValue =>
  typeof value === "number" ? f(value) : value.map(f)

const valuesOf = (value: QuantityValue): ReadonlyArray<number> => typeof value === "number" ? [value] : value

const renderValue = (value: QuantityValue): string =>
  typeof value === "number" ? String(value) : `[${value.join(", ")}]`

const approximatelyEqual = (a: number, b: number): boolean =>
  a === b || Math.abs(a - b) <= RELATIVE_TOLERANCE * Math.max(Math.abs(a), Math.abs(b))

// Value of `value` (in `from`) expressed in `to`. Offsets apply only between
// two bare absolute temperatures.
const convertValue = (value: QuantityValue, from: Unit, to: Unit): QuantityValue => {
  if (isAbsoluteTemperature(from) && isAbsoluteTemperature(to)) {
    return mapValue(value, (x) => (x + from.siOffset) * from.siScale / to.siScale - to.siOffset)
  }
  return mapValue(value, (x) => x * from.siScale / to.siScale)
}

/**
 * @category Models
 * @since 0.1.0
 */
export class Quantity implements Iterable<Quantity> {
  private constructor(
    readonly value: QuantityValue,
    readonly unit: Unit,
  ) {}

  /**
   * Pair a value with a resolved unit. An absolute temperature below its
   * physical floor (`-offset`) is taken to be a difference and moves to the
   * `delta_` unit.
   */
  static fromUnit(source: QuantityValue, unit: Unit): Quantity {
    const value = typeof source === "number" ? source : Object.freeze([...source])
    const floor = findFundamental(unit.table, unit.name)
    if (floor?.type === "TEMPERATURE" && valuesOf(value).some((x) => x < -floor.offset)) {
      const delta = deltaCounterpart(unit)
      if (delta) {
        return new Quantity(value, delta)
      }
    }
    return new Quantity(value, unit)
  }

  get table(): UnitTable {
    return this.unit.table
  }

  get units(): string {
    return this.unit.name
  }

  get siUnits(): string {
    return this.unit.siUnits
  }

  get dimensions(): DimensionVector {
    return this.unit.dimensions
  }

  get isDimensionless(): boolean {
    return this.unit.isDimensionless
  }

  get type(): UnitType {
    return this.unit.type
  }

  get siValue(): QuantityValue {
    return mapValue(this.value, (x) => (x + this.unit.siOffset) * this.unit.siScale)
  }

  /**
   * Convert into another unit of convertible dimensions.
   *
   * @example
   * ```ts
   * quantity(table, 0, "C").to("K").value // => 273.15
   * ```
   */
  to(units: string | Unit): Quantity {
    let target = typeof units === "string" ? Unit.make(this.table, units) : units
    if (this.type === "temperature difference" && isAbsoluteTemperature(target)) {
      target = deltaCounterpart(target) ?? target
    }
    if (!this.dimensions.isConvertibleTo(target.dimensions)) {
      throw new IncompatibleDimensionsError({ from: this.units, to: target.name })
    }
    return Quantity.fromUnit(convertValue(this.value, this.unit, target), target)
  }

  /**
   * Convert into the units a system uses for this quantity's dimensions.
   */
  convert(system: UnitSystem | string): Quantity {
    const target = typeof system === "string" ? UnitSystem.make(this.table, { system }) : system
    return this.to(Unit.fromDimensions(this.table, this.dimensions, target))
  }

  multiply(that: Operand): Quantity {
    const other = this.lift(that)
    return Quantity.fromUnit(this.combine(other, (a, b) => a * b), this.unit.multiply(other.unit))
  }

  divide(that: Operand): Quantity {
    const other = this.lift(that)
    return Quantity.fromUnit(this.combine(other, (a, b) => a / b), this.unit.divide(other.unit))
  }

  pow(exponent: number): Quantity {
    return Quantity.fromUnit(mapValue(this.value, (x) => x ** exponent), this.unit.pow(exponent))
  }

  negate(): Quantity {
    return Quantity.fromUnit(mapValue(this.value, (x) => -x), this.unit)
  }

  add(that: Operand): Quantity {
    return this.additive(this.lift(that), "add")
  }

  subtract(that: Operand): Quantity {
    return this.additive(this.lift(that), "subtract")
  }

  equals(that: Operand): boolean {
    const [left, right] = this.comparable(that)
    const lefts = valuesOf(left)
    const rights = valuesOf(right)
    return typeof left === typeof right &&
      lefts.length === rights.length &&
      lefts.every((x, index) => approximatelyEqual(x, rights[index] ?? Number.NaN))
  }

  notEquals(that: Operand): boolean {
    return !this.equals(that)
  }

  lessThan(that: Operand): boolean {
    const [a, b] = this.ordered(that)
    return a < b && !approximatelyEqual(a, b)
  }

  lessThanOrEqual(that: Operand): boolean {
    const [a, b] = this.ordered(that)
    return a <= b || approximatelyEqual(a, b)
  }

  greaterThan(that: Operand): boolean {
    const [a, b] = this.ordered(that)
    return a > b && !approximatelyEqual(a, b)
  }

  greaterThanOrEqual(that: Operand): boolean {
    const [a, b] = this.ordered(that)
    return a >= b || approximatelyEqual(a, b)
  }

  /**
   * The SI value of a dimensionless quantity, or of an angle or solid angle
   * (in radians or steradians).
   */
  toNumber(): number {
    const coercible = this.isDimensionless ||
      this.dimensions.equals(DimensionVector.of("ANGLE")) ||
      this.dimensions.equals(DimensionVector.of("SOLID_ANGLE"))
    const value = this.siValue
    if (!coercible || typeof value !== "number") {
      throw new InvalidFloatCoercionError({ units: this.units })
    }
    return value
  }

  /**
   * Element of an array quantity. A scalar quantity is its own element 0.
   */
  at(index: number): Quantity | undefined {
    if (typeof this.value === "number") {
      return index === 0 ? this : undefined
    }
    const element = this.value.at(index)
    return element === undefined ? undefined : Quantity.fromUnit(element, this.unit)
  }

  get length(): number {
    return valuesOf(this.value).length
  }

  *[Symbol.iterator](): Iterator<Quantity> {
    for (const element of valuesOf(this.value)) {
      yield Quantity.fromUnit(element, this.unit)
    }
  }

  compatibleUnits(): ReadonlyArray<string> {
    return this.unit.compatibleUnits()
  }

  toString(): string {
    return `(${renderValue(this.value)}, "${this.units}")`
  }

  private lift(that: Operand): Quantity {
    return typeof that === "number" ? new Quantity(that, Unit.make(this.table)) : that
  }

  private combine(that: Quantity, f: (a: number, b: number) => number): QuantityValue {
    const left = this.value
    const right = that.value
    if (typeof left === "number") {
      return typeof right === "number" ? f(left, right) : right.map((b) => f(left, b))
    }
    if (typeof right === "number") {
      return left.map((a) => f(a, right))
    }
    if (left.length !== right.length) {
      throw new IncompatibleQuantitiesError({ left: this.toString(), right: that.toString() })
    }
    return left.map((a, index) => f(a, right[index] ?? Number.NaN))
  }

  private additiveUnit(that: Quantity, operation: "add" | "subtract"): Unit {
    const leftAbsolute = isAbsoluteTemperature(this.unit)
    const rightAbsolute = isAbsoluteTemperature(that.unit)
    if (leftAbsolute && rightAbsolute) {
      if (this.units !== that.units) {
        throw new IncompatibleDimensionsError({ from: this.units, to: that.units })
      }
      if (operation === "add") {
        throw new ProhibitedTemperatureOperationError({ left: this.units, right: that.units, operation })
      }
      return deltaCounterpart(this.unit) ?? this.unit
    }
    if (!this.dimensions.isConvertibleTo(that.dimensions)) {
      throw new IncompatibleDimensionsError({ from: this.units, to: that.units })
    }
    if (rightAbsolute) {
      return absoluteCounterpart(this.unit) ?? this.unit
    }
    return this.unit
  }

  private additive(that: Quantity, operation: "add" | "subtract"): Quantity {
    const unit = this.additiveUnit(that, operation)
    const left = new Quantity(convertValue(this.value, this.unit, unit), unit)
    const right = new Quantity(convertValue(that.value, that.unit, unit), unit)
    return Quantity.fromUnit(
      left.combine(right, operation === "add" ? (a, b) => a + b : (a, b) => a - b),
      unit,
    )
  }

  private comparable(that: Operand): readonly [QuantityValue, QuantityValue] {
    if (typeof that === "number") {
      if (!this.isDimensionless) {
        throw new IncompatibleQuantitiesError({ left: this.toString(), right: String(that) })
      }
      return [this.siValue, that]
    }
    if (!this.dimensions.isConvertibleTo(that.dimensions)) {
      throw new IncompatibleDimensionsError({ from: this.units, to: that.units })
    }
    return [this.siValue, that.siValue]
  }

  private ordered(that: Operand): readonly [number, number] {
    const [left, right] = this.comparable(that)
    if (typeof left !== "number" || typeof right !== "number") {
      throw new IncompatibleQuantitiesError({ left: this.toString(), right: String(that) })
    }
    return [left, right]
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export interface QuantityOptions {
  readonly value?: QuantityValue
  readonly units?: string
  readonly quantityMap?: Readonly<Record<string, number>>
  readonly dimensions?: DimensionVector | Partial<Record<BaseDimension, number>>
  /** Unit system used with `dimensions`; SI by default. Requires `dimensions`. */
  readonly system?: UnitSystem | string
  readonly copyFrom?: Quantity
}

const unitFromOptions = (table: UnitTable, options: QuantityOptions): Unit => {
  if (options.units !== undefined) {
    return Unit.make(table, options.units)
  }
  if (options.quantityMap !== undefined) {
    return Unit.fromQuantityMap(table, options.quantityMap)
  }
  if (options.dimensions !== undefined) {
    const dimensions = options.dimensions instanceof DimensionVector
      ? options.dimensions
      : DimensionVector.make(options.dimensions)
    const system = typeof options.system === "string"
      ? UnitSystem.make(table, { system: options.system })
      : options.system
    return Unit.fromDimensions(table, dimensions, system)
  }
  return options.copyFrom?.unit ?? Unit.make(table)
}

/**
 * Build a quantity from a value and at most one of `units`, `quantityMap` or
 * `dimensions`. `copyFrom` supplies whatever is not given.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * makeQuantity(table, { value: 3, quantityMap: { Velocity: 1 } }).units // => "m s^-1"
 * makeQuantity(table, { value: 1, dimensions: { MASS: 1 }, system: "BT" }).units // => "slug"
 * ```
 */
export const makeQuantity = (table: UnitTable, options: QuantityOptions): Quantity => {
  const unitSources = [options.units, options.quantityMap, options.dimensions].filter((source) => source !== undefined)
  if (unitSources.length > 1) {
    throw new ExcessiveParametersError({ parameters: ["units", "quantityMap", "dimensions"] })
  }
  if (options.system !== undefined && options.dimensions === undefined) {
    throw new InsufficientArgumentsError({ required: ["dimensions"] })
  }
  const value = options.value ?? options.copyFrom?.value
  if (value === undefined) {
    throw new InsufficientArgumentsError({ required: ["value", "copyFrom"] })
  }
  return Quantity.fromUnit(value, unitFromOptions(table, options))
}

/**
 * Short form of {@link makeQuantity}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const quantity = (table: UnitTable, value: QuantityValue, units = ""): Quantity =>
  Quantity.fromUnit(value, Unit.make(table, units))
