/**
 * Effect service over the units engine.
 *
 * The pure engine throws tagged errors; the registry runs it inside `Effect`
 * so that those errors land on the typed error channel, and owns the current
 * table in a `Ref` so units can be registered while a program runs.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Either, Layer, Option, Ref } from "effect"
import { identity } from "effect/Function"
import { isUnitsError, type UnitsError } from "./Errors.js"
import { makeQuantity, type Quantity, quantity, type QuantityOptions, type QuantityValue } from "./Quantity.js"
import { registerDerivedUnit, Unit } from "./Unit.js"
import { UnitSystem, type UnitSystemOptions } from "./UnitSystem.js"
import { defaultUnitTable, type DerivedUnit, loadUnitTable, type UnitTable } from "./UnitTable.js"

const failWith = (error: unknown): Effect.Effect<never, UnitsError> =>
  isUnitsError(error) ? Effect.fail(error) : Effect.die(error)

/**
 * Run a synchronous engine call, failing with any engine error and dying on
 * anything else.
 *
 * @category Combinators
 * @since 0.1.0
 */
export const attempt = <A>(evaluate: () => A): Effect.Effect<A, UnitsError> =>
  Effect.try({ try: evaluate, catch: identity }).pipe(Effect.catchAll(failWith))

/**
 * @category Services
 * @since 0.1.0
 */
export interface UnitRegistryService {
  readonly table: Effect.Effect<UnitTable>
  /** Add a derived unit. Each symbol can be registered once. */
  readonly register: (definition: DerivedUnit) => Effect.Effect<UnitTable, UnitsError>
  readonly unit: (units: string) => Effect.Effect<Unit, UnitsError>
  readonly quantity: (value: QuantityValue, units?: string) => Effect.Effect<Quantity, UnitsError>
  readonly makeQuantity: (options: QuantityOptions) => Effect.Effect<Quantity, UnitsError>
  readonly system: (options?: UnitSystemOptions) => Effect.Effect<UnitSystem, UnitsError>
  readonly convert: (value: Quantity, units: string) => Effect.Effect<Quantity, UnitsError>
}

const make = (initial: UnitTable, source: string) =>
  Effect.gen(function* () {
    const tableRef = yield* Ref.make(initial)
    const getTable = Ref.get(tableRef)
    const withTable = <A>(f: (table: UnitTable) => A) =>
      Effect.flatMap(getTable, (table) => attempt(() => f(table)))

    yield* Effect.logDebug("unit table loaded").pipe(
      Effect.annotateLogs({
        source,
        fundamentalUnits: initial.fundamentalUnits.length,
        derivedUnits: initial.derivedUnits.length,
      }),
    )

    const register = (definition: DerivedUnit): Effect.Effect<UnitTable, UnitsError> =>
      Ref.modify(tableRef, (current) => {
        const result = Either.try({ try: () => registerDerivedUnit(current, definition), catch: identity })
        return [result, Either.getOrElse(result, () => current)] as const
      }).pipe(
        Effect.flatMap((result) => Either.isRight(result) ? Effect.succeed(result.right) : failWith(result.left)),
        Effect.tap(() => Effect.logDebug("unit registered")),
        Effect.tapError((error) => Effect.logWarning(`unit registration rejected: ${error.message}`)),
        Effect.annotateLogs({ symbol: definition.symbol, composition: definition.composition }),
      )

    const service: UnitRegistryService = {
      table: getTable,
      register,
      unit: (units) => withTable((table) => Unit.make(table, units)),
      quantity: (value, units) => withTable((table) => quantity(table, value, units)),
      makeQuantity: (options) => withTable((table) => makeQuantity(table, options)),
      system: (options) => withTable((table) => UnitSystem.make(table, options)),
      convert: (value, units) => attempt(() => value.to(units)),
    }

    return service
  })

/**
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const registry = yield* UnitRegistry
 *   const boiling = yield* registry.quantity(100, "C")
 *   return yield* registry.convert(boiling, "F")
 * })
 *
 * Effect.runSync(program.pipe(Effect.provide(UnitRegistry.layer())))
 * ```
 */
export class UnitRegistry extends Context.Tag("effect-units/UnitRegistry")<
  UnitRegistry,
  UnitRegistryService
>() {
  /**
   * Registry over `table`, or over the bundled table when omitted.
   */
  static layer(table?: UnitTable) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const initial = table ?? (yield* attempt(defaultUnitTable))
        return yield* make(initial, table ? "provided" : "default")
      }),
    )
  }

  /**
   * Registry over the table file named by `UNITS_TABLE_PATH`, falling back to
   * the bundled table.
   */
  static layerConfig() {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const path = yield* Config.option(Config.string("UNITS_TABLE_PATH"))
        if (Option.isSome(path)) {
          const table = yield* attempt(() => loadUnitTable(path.value))
          return yield* make(table, path.value)
        }
        return yield* make(yield* attempt(defaultUnitTable), "default")
      }),
    )
  }
}
