import { Quantity, quantity, type QuantityValue } from "../src/Quantity.js"
import { DerivedUnit, defaultUnitTable, FundamentalUnit, MultiplierPrefix, UnitTable } from "../src/UnitTable.js"

/**
 * The bundled table shared by most tests.
 */
export const table: UnitTable = defaultUnitTable()

export const q = (value: QuantityValue, units = ""): Quantity => quantity(table, value, units)

/**
 * Run `evaluate` and return what it throws.
 */
export const thrown = (evaluate: () => unknown): unknown => {
  try {
    evaluate()
  } catch (error) {
    return error
  }
  throw new Error("expected a thrown error")
}

/**
 * Small hand-built table for lookup-order and configuration tests.
 */
export const makeTinyTable = (options: {
  readonly multipliers?: ReadonlyArray<readonly [string, number]>
  readonly fundamentals?: ReadonlyArray<readonly [string, FundamentalUnit["type"], number]>
  readonly derived?: ReadonlyArray<readonly [string, string]>
} = {}): UnitTable =>
  new UnitTable({
    multipliers: (options.multipliers ?? [["k", 1000]]).map(([symbol, factor]) => new MultiplierPrefix({ symbol, factor })),
    fundamentalUnits: (options.fundamentals ?? [["m", "LENGTH", 1]]).map(
      ([symbol, type, factor]) => new FundamentalUnit({ symbol, type, factor, offset: 0 }),
    ),
    derivedUnits: (options.derived ?? []).map(([symbol, composition]) => new DerivedUnit({ symbol, composition, factor: 1 })),
    quantityMap: {},
    unitSystems: {},
  })
