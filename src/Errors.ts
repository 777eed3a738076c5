/**
 * Error hierarchy for the units engine.
 *
 * Every failure raised by the engine is a tagged error so callers can pattern
 * match with `Effect.catchTag` once the failure has been lifted onto the error
 * channel by the `UnitRegistry` service. The pure engine throws these errors
 * synchronously at the point of detection.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a unit term cannot be split into a known prefix and symbol.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new UnknownUnitError({ symbol: "kbeans" })
 * error.message // => "`kbeans` is an unknown or unconfigured unit"
 * ```
 */
export class UnknownUnitError extends Data.TaggedError("UnknownUnitError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `\`${this.symbol}\` is an unknown or unconfigured unit`
  }
}

/**
 * Raised when a conversion, addition, subtraction or comparison mixes units
 * whose dimensions differ.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IncompatibleDimensionsError extends Data.TaggedError("IncompatibleDimensionsError")<{
  readonly from: string
  readonly to: string
}> {
  override get message(): string {
    return `\`${this.from}\` and \`${this.to}\` have incompatible dimensions`
  }
}

/**
 * Raised when a quantity is compared against a raw number it cannot be
 * measured against, or when array shapes disagree.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IncompatibleQuantitiesError extends Data.TaggedError("IncompatibleQuantitiesError")<{
  readonly left: string
  readonly right: string
}> {
  override get message(): string {
    return `'${this.left}' and '${this.right}' are incompatible`
  }
}

/**
 * Raised when mutually exclusive construction arguments are combined.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ExcessiveParametersError extends Data.TaggedError("ExcessiveParametersError")<{
  readonly parameters: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Only one of the following parameters may be provided: ${this.parameters.join(", ")}`
  }
}

/**
 * Raised when a required construction argument is missing.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InsufficientArgumentsError extends Data.TaggedError("InsufficientArgumentsError")<{
  readonly required: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Requires at least one of: ${this.required.join(", ")}`
  }
}

/**
 * Raised when a unit system is unknown or does not cover every base dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidUnitSystemError extends Data.TaggedError("InvalidUnitSystemError")<{
  readonly system: string
  readonly reason: string
}> {
  override get message(): string {
    return `\`${this.system}\` is not a valid unit system: ${this.reason}`
  }
}

/**
 * Raised when a unit system slot is given a derived or composite unit.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NotFundamentalUnitError extends Data.TaggedError("NotFundamentalUnitError")<{
  readonly unit: string
}> {
  override get message(): string {
    return `\`${this.unit}\` is not a fundamental unit`
  }
}

/**
 * Raised when a unit is placed in a unit system slot of another dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IncorrectUnitTypeError extends Data.TaggedError("IncorrectUnitTypeError")<{
  readonly unit: string
  readonly dimension: string
}> {
  override get message(): string {
    return `The unit \`${this.unit}\` is incompatible with unit system type: \`${this.dimension}\``
  }
}

/**
 * Raised when two slots of a unit system would share one dimension type.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DuplicateDimensionTypeError extends Data.TaggedError("DuplicateDimensionTypeError")<{
  readonly dimension: string
  readonly units: ReadonlyArray<string>
}> {
  override get message(): string {
    return `Dimension \`${this.dimension}\` is assigned more than once: ${this.units.join(", ")}`
  }
}

/**
 * Raised when a quantity that is not dimensionless, an angle or a solid angle
 * is coerced to a plain number.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidFloatCoercionError extends Data.TaggedError("InvalidFloatCoercionError")<{
  readonly units: string
}> {
  override get message(): string {
    return `Only dimensionless quantities and angles can be used as a number, got \`${this.units}\``
  }
}

/**
 * Raised when two absolute temperatures are added together.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ProhibitedTemperatureOperationError extends Data.TaggedError(
  "ProhibitedTemperatureOperationError",
)<{
  readonly left: string
  readonly right: string
  readonly operation: string
}> {
  override get message(): string {
    return `Cannot ${this.operation} absolute temperatures \`${this.left}\` and \`${this.right}\``
  }
}

/**
 * Raised when a symbol is registered twice.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitAlreadyRegisteredError extends Data.TaggedError("UnitAlreadyRegisteredError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `Unable to override \`${this.symbol}\`: it has already been registered`
  }
}

/**
 * Raised when a quantity map references a name missing from the table.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownQuantityNameError extends Data.TaggedError("UnknownQuantityNameError")<{
  readonly quantity: string
}> {
  override get message(): string {
    return `\`${this.quantity}\` is not a valid quantity map item`
  }
}

/**
 * Raised when the unit table itself is malformed: undecodable JSON, duplicate
 * symbols, a dimension without an SI representative, or a derived unit whose
 * composition refers back to itself.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidUnitTableError extends Data.TaggedError("InvalidUnitTableError")<{
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid unit table: ${this.reason}`
  }
}

/**
 * Union of every error the units engine raises.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitsError =
  | UnknownUnitError
  | IncompatibleDimensionsError
  | IncompatibleQuantitiesError
  | ExcessiveParametersError
  | InsufficientArgumentsError
  | InvalidUnitSystemError
  | NotFundamentalUnitError
  | IncorrectUnitTypeError
  | DuplicateDimensionTypeError
  | InvalidFloatCoercionError
  | ProhibitedTemperatureOperationError
  | UnitAlreadyRegisteredError
  | UnknownQuantityNameError
  | InvalidUnitTableError

const unitsErrorClasses = [
  UnknownUnitError,
  IncompatibleDimensionsError,
  IncompatibleQuantitiesError,
  ExcessiveParametersError,
  InsufficientArgumentsError,
  InvalidUnitSystemError,
  NotFundamentalUnitError,
  IncorrectUnitTypeError,
  DuplicateDimensionTypeError,
  InvalidFloatCoercionError,
  ProhibitedTemperatureOperationError,
  UnitAlreadyRegisteredError,
  UnknownQuantityNameError,
  InvalidUnitTableError,
] as const

/**
 * Refinement for values thrown by the engine.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isUnitsError = (error: unknown): error is UnitsError =>
  unitsErrorClasses.some((errorClass) => error instanceof errorClass)
