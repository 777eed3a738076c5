/**
 * Base dimensions and dimension vectors.
 *
 * A dimension vector records the exponent of each of the ten base dimensions.
 * Vectors are derived from fundamental units only, so multiplier prefixes never
 * affect them (`km` and `m` share the vector `{ LENGTH: 1 }`).
 *
 * @since 0.1.0
 */

import { Equal, Hash, Schema } from "effect"

/**
 * The base dimensions in their canonical order.
 *
 * @category Dimensions
 * @since 0.1.0
 */
export const BASE_DIMENSIONS = [
  "MASS",
  "LENGTH",
  "TIME",
  "TEMPERATURE",
  "TEMPERATURE_DIFFERENCE",
  "ANGLE",
  "CHEMICAL_AMOUNT",
  "LIGHT",
  "CURRENT",
  "SOLID_ANGLE",
] as const

/**
 * Schema for a single base dimension name.
 *
 * @category Dimensions
 * @since 0.1.0
 */
export const BaseDimension = Schema.Literal(...BASE_DIMENSIONS)

/**
 * @category Dimensions
 * @since 0.1.0
 */
export type BaseDimension = typeof BaseDimension.Type

const EPSILON = 1e-12

const TEMPERATURE_INDEX = BASE_DIMENSIONS.indexOf("TEMPERATURE")
const TEMPERATURE_DIFFERENCE_INDEX = BASE_DIMENSIONS.indexOf("TEMPERATURE_DIFFERENCE")

const normalizeExponent = (exponent: number): number =>
  Math.abs(exponent) > EPSILON ? exponent : 0

/**
 * @category Dimensions
 * @since 0.1.0
 */
export type DimensionLabel =
  | "mass"
  | "length"
  | "time"
  | "temperature"
  | "temperature difference"
  | "angle"
  | "chemical amount"
  | "light"
  | "current"
  | "solid angle"

const DIMENSION_LABELS: Readonly<Record<BaseDimension, DimensionLabel>> = {
  MASS: "mass",
  LENGTH: "length",
  TIME: "time",
  TEMPERATURE: "temperature",
  TEMPERATURE_DIFFERENCE: "temperature difference",
  ANGLE: "angle",
  CHEMICAL_AMOUNT: "chemical amount",
  LIGHT: "light",
  CURRENT: "current",
  SOLID_ANGLE: "solid angle",
}

/**
 * Lower-case label of a base dimension, e.g. `"temperature difference"`.
 *
 * @category Dimensions
 * @since 0.1.0
 */
export const dimensionLabel = (dimension: BaseDimension): DimensionLabel => DIMENSION_LABELS[dimension]

/**
 * Fixed-length exponent tuple over the base dimensions.
 *
 * Equality through {@link DimensionVector.equals} (and `Equal.equals`) is
 * strict. Conversions use {@link DimensionVector.isConvertibleTo}, which lets a
 * temperature exponent stand in for a temperature-difference exponent.
 *
 * @category Dimensions
 * @since 0.1.0
 */
export class DimensionVector implements Equal.Equal {
  readonly exponents: ReadonlyArray<number>

  private constructor(exponents: ReadonlyArray<number>) {
    this.exponents = exponents.map(normalizeExponent)
  }

  /**
   * Build a vector from a partial record of exponents; missing dimensions are 0.
   */
  static make(exponents: Partial<Record<BaseDimension, number>> = {}): DimensionVector {
    return new DimensionVector(BASE_DIMENSIONS.map((dimension) => exponents[dimension] ?? 0))
  }

  static readonly dimensionless: DimensionVector = DimensionVector.make()

  /**
   * Vector with exponent 1 on a single dimension.
   */
  static of(dimension: BaseDimension, exponent = 1): DimensionVector {
    return DimensionVector.make({ [dimension]: exponent })
  }

  get(dimension: BaseDimension): number {
    return this.exponents[BASE_DIMENSIONS.indexOf(dimension)] ?? 0
  }

  get isDimensionless(): boolean {
    return this.exponents.every((exponent) => exponent === 0)
  }

  multiply(that: DimensionVector): DimensionVector {
    return new DimensionVector(this.exponents.map((exponent, index) => exponent + (that.exponents[index] ?? 0)))
  }

  divide(that: DimensionVector): DimensionVector {
    return new DimensionVector(this.exponents.map((exponent, index) => exponent - (that.exponents[index] ?? 0)))
  }

  power(exponent: number): DimensionVector {
    return new DimensionVector(this.exponents.map((value) => value * exponent))
  }

  equals(that: DimensionVector): boolean {
    return this.exponents.every((exponent, index) => Math.abs(exponent - (that.exponents[index] ?? 0)) <= EPSILON)
  }

  /**
   * True when a value with these dimensions may be converted into, added to or
   * compared with a value of `that` dimension. Temperature and temperature
   * difference exponents are compared by their sum.
   */
  isConvertibleTo(that: DimensionVector): boolean {
    const difference = this.divide(that)
    return difference.exponents.every((exponent, index) => {
      if (index === TEMPERATURE_INDEX || index === TEMPERATURE_DIFFERENCE_INDEX) {
        return true
      }
      return exponent === 0
    }) &&
      Math.abs(
        (difference.exponents[TEMPERATURE_INDEX] ?? 0) + (difference.exponents[TEMPERATURE_DIFFERENCE_INDEX] ?? 0),
      ) <= EPSILON
  }

  /**
   * Non-zero exponents keyed by dimension, in canonical order.
   */
  toRecord(): Partial<Record<BaseDimension, number>> {
    const result: Partial<Record<BaseDimension, number>> = {}
    BASE_DIMENSIONS.forEach((dimension, index) => {
      const exponent = this.exponents[index] ?? 0
      if (exponent !== 0) {
        result[dimension] = exponent
      }
    })
    return result
  }

  toString(): string {
    return JSON.stringify(this.toRecord())
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof DimensionVector && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.string(this.toString())
  }
}
