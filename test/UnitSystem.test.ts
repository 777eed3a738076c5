import { describe, expect, it } from "vitest"
import {
  DuplicateDimensionTypeError,
  ExcessiveParametersError,
  IncorrectUnitTypeError,
  InvalidUnitSystemError,
  NotFundamentalUnitError,
} from "../src/Errors.js"
import { UnitSystem } from "../src/UnitSystem.js"
import { table, thrown } from "./fixtures.js"

const BRITISH = ["slug", "ft", "s", "R", "delta_R", "radian", "slugmol", "cd", "A", "sr"]

describe("UnitSystem.make", () => {
  it("defaults to SI", () => {
    const si = UnitSystem.make(table)
    expect(si.name).toBe("SI")
    expect(si.get("MASS")).toBe("kg")
    expect(si.get("TEMPERATURE_DIFFERENCE")).toBe("delta_K")
  })

  it("loads the predefined systems", () => {
    expect(UnitSystem.make(table, { system: "CGS" }).get("LENGTH")).toBe("cm")
    expect(UnitSystem.make(table, { system: "BT" }).toString().split("\n")).toEqual([
      "MASS: slug",
      "LENGTH: ft",
      "TIME: s",
      "TEMPERATURE: R",
      "TEMPERATURE_DIFFERENCE: delta_R",
      "ANGLE: radian",
      "CHEMICAL_AMOUNT: slugmol",
      "LIGHT: cd",
      "CURRENT: A",
      "SOLID_ANGLE: sr",
    ])
  })

  it("rejects unknown system names", () => {
    const error = thrown(() => UnitSystem.make(table, { system: "MKS" }))
    expect(error).toBeInstanceOf(InvalidUnitSystemError)
    expect(error).toMatchObject({ system: "MKS" })
  })

  it("does not take inherited object keys for system names", () => {
    const error = thrown(() => UnitSystem.make(table, { system: "toString" }))
    expect(error).toBeInstanceOf(InvalidUnitSystemError)
    expect(error).toMatchObject({ system: "toString", reason: "no such predefined system" })
  })

  it("rejects a system name together with a copy", () => {
    expect(() => UnitSystem.make(table, { system: "SI", copyFrom: UnitSystem.make(table) }))
      .toThrow(ExcessiveParametersError)
  })

  it("overrides slots", () => {
    const custom = UnitSystem.make(table, { baseUnits: { MASS: "g", LENGTH: "inch" } })
    expect(custom.get("MASS")).toBe("g")
    expect(custom.get("LENGTH")).toBe("inch")
    expect(custom.get("TIME")).toBe("s")
  })

  it("rejects derived and composite slot units", () => {
    expect(() => UnitSystem.make(table, { baseUnits: { MASS: "N" } })).toThrow(NotFundamentalUnitError)
    expect(() => UnitSystem.make(table, { baseUnits: { MASS: "kg m" } })).toThrow(NotFundamentalUnitError)
  })

  it("rejects a unit of another dimension", () => {
    const error = thrown(() => UnitSystem.make(table, { baseUnits: { MASS: "ft" } }))
    expect(error).toBeInstanceOf(IncorrectUnitTypeError)
    expect(error).toMatchObject({ unit: "ft", dimension: "MASS" })
  })

  it("rejects one unit in two slots", () => {
    const error = thrown(() => UnitSystem.make(table, { baseUnits: { LENGTH: "kg" } }))
    expect(error).toBeInstanceOf(DuplicateDimensionTypeError)
    expect(error).toMatchObject({ dimension: "MASS", units: ["MASS=kg", "LENGTH=kg"] })
  })
})

describe("UnitSystem.fromUnits", () => {
  it("fills each slot from the unit's own dimension", () => {
    const british = UnitSystem.fromUnits(table, [...BRITISH].reverse())
    expect(british.equals(UnitSystem.make(table, { system: "BT" }))).toBe(true)
  })

  it("rejects two units of one dimension", () => {
    const error = thrown(() => UnitSystem.fromUnits(table, ["kg", "g"]))
    expect(error).toBeInstanceOf(DuplicateDimensionTypeError)
    expect(error).toMatchObject({ dimension: "MASS", units: ["kg", "g"] })
  })

  it("rejects incomplete systems", () => {
    const error = thrown(() => UnitSystem.fromUnits(table, BRITISH.slice(1)))
    expect(error).toBeInstanceOf(InvalidUnitSystemError)
    expect(error).toMatchObject({ reason: "no unit for MASS" })
  })

  it("rejects non-fundamental units", () => {
    expect(() => UnitSystem.fromUnits(table, ["N"])).toThrow(NotFundamentalUnitError)
  })
})

describe("UnitSystem", () => {
  it("copies with replaced slots", () => {
    const si = UnitSystem.make(table)
    const mixed = si.with({ LENGTH: "ft" })
    expect(mixed.get("LENGTH")).toBe("ft")
    expect(si.get("LENGTH")).toBe("m")
    expect(mixed.name).toBe("SI")
  })

  it("compares slot by slot", () => {
    expect(UnitSystem.make(table).equals(UnitSystem.make(table))).toBe(true)
    expect(UnitSystem.make(table).equals(UnitSystem.make(table, { system: "CGS" }))).toBe(false)
  })
})
