/**
 * Unit table: multiplier prefixes, fundamental units, derived units, named
 * quantities and predefined unit systems.
 *
 * Tables are plain immutable data decoded with `Schema`. The engine never
 * mutates a table; {@link registerUnit} returns a new one.
 *
 * @since 0.1.0
 */

import { readFileSync } from "node:fs"
import { Either, ParseResult, Schema } from "effect"
import { BaseDimension } from "./Dimensions.js"
import { InvalidUnitTableError, UnitAlreadyRegisteredError } from "./Errors.js"

/**
 * Scale-modifying prefix such as `k` (1000) or `u` (1e-6).
 *
 * @category Models
 * @since 0.1.0
 */
export class MultiplierPrefix extends Schema.Class<MultiplierPrefix>("MultiplierPrefix")({
  symbol: Schema.NonEmptyTrimmedString,
  factor: Schema.Number.pipe(Schema.greaterThan(0)),
}) {}

/**
 * Directly defined unit. `offset` is non-zero only for absolute temperature
 * scales whose zero differs from absolute zero.
 *
 * @category Models
 * @since 0.1.0
 */
export class FundamentalUnit extends Schema.Class<FundamentalUnit>("FundamentalUnit")({
  symbol: Schema.NonEmptyTrimmedString,
  type: BaseDimension,
  factor: Schema.Number.pipe(Schema.greaterThan(0)),
  offset: Schema.Number.pipe(Schema.finite()),
}) {}

/**
 * Unit defined as `factor` times a composition of other units.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const newton = new DerivedUnit({ symbol: "N", composition: "kg m s^-2", factor: 1 })
 * ```
 */
export class DerivedUnit extends Schema.Class<DerivedUnit>("DerivedUnit")({
  symbol: Schema.NonEmptyTrimmedString,
  composition: Schema.String,
  factor: Schema.Number.pipe(Schema.greaterThan(0)),
}) {}

const UnitSystemUnitsSchema = Schema.Record({
  key: Schema.String,
  value: Schema.String,
})

/**
 * Complete table consumed by the engine.
 *
 * The order of `multipliers` is the order in which prefixes are tried when a
 * term is not itself a known symbol.
 *
 * @category Models
 * @since 0.1.0
 */
export class UnitTable extends Schema.Class<UnitTable>("UnitTable")({
  multipliers: Schema.Array(MultiplierPrefix),
  fundamentalUnits: Schema.Array(FundamentalUnit),
  derivedUnits: Schema.Array(DerivedUnit),
  quantityMap: Schema.Record({ key: Schema.String, value: Schema.String }),
  unitSystems: Schema.Record({ key: Schema.String, value: UnitSystemUnitsSchema }),
}) {}

interface TableIndex {
  readonly multipliers: ReadonlyMap<string, MultiplierPrefix>
  readonly fundamental: ReadonlyMap<string, FundamentalUnit>
  readonly derived: ReadonlyMap<string, DerivedUnit>
  readonly siRepresentative: ReadonlyMap<BaseDimension, FundamentalUnit>
}

const indexCache = new WeakMap<UnitTable, TableIndex>()

const buildIndex = (table: UnitTable): TableIndex => {
  const siRepresentative = new Map<BaseDimension, FundamentalUnit>()
  for (const unit of table.fundamentalUnits) {
    if (unit.factor === 1 && unit.offset === 0 && !siRepresentative.has(unit.type)) {
      siRepresentative.set(unit.type, unit)
    }
  }
  return {
    multipliers: new Map(table.multipliers.map((prefix) => [prefix.symbol, prefix] as const)),
    fundamental: new Map(table.fundamentalUnits.map((unit) => [unit.symbol, unit] as const)),
    derived: new Map(table.derivedUnits.map((unit) => [unit.symbol, unit] as const)),
    siRepresentative,
  }
}

const indexOf = (table: UnitTable): TableIndex => {
  const cached = indexCache.get(table)
  if (cached) {
    return cached
  }
  const index = buildIndex(table)
  indexCache.set(table, index)
  return index
}

/**
 * @category Lookups
 * @since 0.1.0
 */
export const findFundamental = (table: UnitTable, symbol: string): FundamentalUnit | undefined =>
  indexOf(table).fundamental.get(symbol)

/**
 * @category Lookups
 * @since 0.1.0
 */
export const findDerived = (table: UnitTable, symbol: string): DerivedUnit | undefined =>
  indexOf(table).derived.get(symbol)

/**
 * @category Lookups
 * @since 0.1.0
 */
export const findMultiplier = (table: UnitTable, symbol: string): MultiplierPrefix | undefined =>
  indexOf(table).multipliers.get(symbol)

/**
 * True when `symbol` is a fundamental or derived unit of the table.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const isKnownSymbol = (table: UnitTable, symbol: string): boolean =>
  indexOf(table).fundamental.has(symbol) || indexOf(table).derived.has(symbol)

/**
 * The fundamental unit with factor 1 and offset 0 for a dimension (`kg` for
 * MASS, `K` for TEMPERATURE).
 *
 * @category Lookups
 * @since 0.1.0
 */
export const siRepresentative = (table: UnitTable, dimension: BaseDimension): FundamentalUnit | undefined =>
  indexOf(table).siRepresentative.get(dimension)

/**
 * Check the structural invariants of a table: unique symbols across
 * fundamental and derived units, and an SI representative for every dimension
 * in use.
 *
 * @category Validation
 * @since 0.1.0
 */
export const validateUnitTable = (table: UnitTable): UnitTable => {
  const seen = new Set<string>()
  for (const { symbol } of [...table.fundamentalUnits, ...table.derivedUnits]) {
    if (seen.has(symbol)) {
      throw new InvalidUnitTableError({ reason: `duplicate unit symbol \`${symbol}\`` })
    }
    seen.add(symbol)
  }
  for (const unit of table.fundamentalUnits) {
    if (!siRepresentative(table, unit.type)) {
      throw new InvalidUnitTableError({
        reason: `dimension ${unit.type} has no unit with factor 1 and offset 0`,
      })
    }
  }
  return table
}

const decodeUnitTableJson = Schema.decodeUnknownEither(Schema.parseJson(UnitTable))

/**
 * Decode and validate a table from JSON text.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const parseUnitTable = (json: string): UnitTable => {
  const decoded = decodeUnitTableJson(json)
  if (Either.isLeft(decoded)) {
    throw new InvalidUnitTableError({ reason: ParseResult.TreeFormatter.formatErrorSync(decoded.left) })
  }
  return validateUnitTable(decoded.right)
}

/**
 * Read a table from a JSON file.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const loadUnitTable = (path: string | URL): UnitTable => {
  let text: string
  try {
    text = readFileSync(path, "utf8")
  } catch (error) {
    throw new InvalidUnitTableError({
      reason: `cannot read ${String(path)}: ${error instanceof Error ? error.message : String(error)}`,
    })
  }
  return parseUnitTable(text)
}

let defaultTable: UnitTable | undefined

/**
 * The bundled table (`data/units.json`), loaded on first use and shared
 * afterwards.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const defaultUnitTable = (): UnitTable => {
  if (!defaultTable) {
    defaultTable = loadUnitTable(new URL("../data/units.json", import.meta.url))
  }
  return defaultTable
}

/**
 * Return a copy of `table` with one more derived unit. Symbols are registered
 * at most once: re-registering an existing fundamental or derived symbol
 * fails instead of overwriting it.
 *
 * The composition is not resolved here; see `registerDerivedUnit` in
 * `Unit.ts` for the checked variant.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const registerUnit = (table: UnitTable, definition: DerivedUnit): UnitTable => {
  if (isKnownSymbol(table, definition.symbol)) {
    throw new UnitAlreadyRegisteredError({ symbol: definition.symbol })
  }
  return new UnitTable({
    multipliers: table.multipliers,
    fundamentalUnits: table.fundamentalUnits,
    derivedUnits: [...table.derivedUnits, definition],
    quantityMap: table.quantityMap,
    unitSystems: table.unitSystems,
  })
}
