import { Effect, Logger, LogLevel } from "effect"
import { attempt, UnitRegistry } from "../src/UnitRegistry.js"
import { DerivedUnit } from "../src/UnitTable.js"

// Heat duty of a water stream warmed from 60 F to 140 F, reported in SI and
// British units.
const program = Effect.gen(function* () {
  const registry = yield* UnitRegistry
  yield* registry.register(new DerivedUnit({ symbol: "minute", composition: "s", factor: 60 }))

  const flow = yield* registry.quantity(120, "gal minute^-1")
  const density = yield* registry.quantity(62.4, "lb ft^-3")
  const specificHeat = yield* registry.quantity(1, "BTU lb^-1 delta_F^-1")
  const inlet = yield* registry.quantity(60, "F")
  const outlet = yield* registry.quantity(140, "F")

  const rise = yield* attempt(() => outlet.subtract(inlet))
  const duty = yield* attempt(() => flow.multiply(density).multiply(specificHeat).multiply(rise))

  const kilowatts = yield* registry.convert(duty, "kW")
  const british = yield* attempt(() => duty.convert("BT"))

  yield* Effect.logInfo(`temperature rise ${rise.toString()}`)
  yield* Effect.logInfo(`heat duty ${kilowatts.toString()}`)
  yield* Effect.logInfo(`heat duty in BT units ${british.toString()}`)
})

Effect.runPromise(
  program.pipe(
    Effect.provide(UnitRegistry.layer()),
    Logger.withMinimumLogLevel(LogLevel.Debug),
  ),
).catch((error) => {
  console.error("Failed to run heat exchanger example", error)
  process.exitCode = 1
})
