import { describe, expect, it } from "vitest"
import { DimensionVector } from "../src/Dimensions.js"
import { InvalidUnitTableError, UnitAlreadyRegisteredError, UnknownQuantityNameError, UnknownUnitError } from "../src/Errors.js"
import { makeUnit, registerDerivedUnit, Unit } from "../src/Unit.js"
import { UnitSystem } from "../src/UnitSystem.js"
import { DerivedUnit, isKnownSymbol } from "../src/UnitTable.js"
import { table } from "./fixtures.js"

describe("Unit.make", () => {
  it("resolves every field", () => {
    const unit = Unit.make(table, "kN m")
    expect(unit.name).toBe("kN m")
    expect(unit.siUnits).toBe("kg m^2 s^-2")
    expect(unit.siScale).toBe(1000)
    expect(unit.siOffset).toBe(0)
    expect(unit.type).toBe("composite")
    expect(unit.dimensions.toRecord()).toEqual({ MASS: 1, LENGTH: 2, TIME: -2 })
  })

  it("condenses its name", () => {
    expect(Unit.make(table, "m m").name).toBe("m^2")
    expect(makeUnit(table, "s^2 s^-2").isDimensionless).toBe(true)
  })

  it("defaults to the dimensionless unit", () => {
    const unit = Unit.make(table)
    expect(unit.name).toBe("")
    expect(unit.type).toBe("no type")
  })
})

describe("unit algebra", () => {
  const newton = Unit.make(table, "N")
  const meter = Unit.make(table, "m")
  const second = Unit.make(table, "s")

  it("multiplies, divides and raises to powers", () => {
    expect(newton.multiply(meter).name).toBe("N m")
    expect(meter.divide(second).name).toBe("m s^-1")
    expect(meter.pow(3).name).toBe("m^3")
    expect(meter.divide(second).pow(2).dimensions.toRecord()).toEqual({ LENGTH: 2, TIME: -2 })
  })

  it("recognises equivalent spellings", () => {
    expect(newton.isEquivalent(Unit.make(table, "kg m s^-2"))).toBe(true)
    expect(newton.isEquivalent(Unit.make(table, "kN"))).toBe(false)
    expect(Unit.make(table, "C").isEquivalent(Unit.make(table, "K"))).toBe(false)
  })

  it("lists compatible units", () => {
    expect(Unit.make(table, "ft").compatibleUnits()).toEqual(["m", "cm", "inch", "in"])
    expect(Unit.make(table, "Pa").compatibleUnits()).toEqual(["psi", "psf"])
  })
})

describe("Unit.fromDimensions", () => {
  it("uses SI by default", () => {
    expect(Unit.fromDimensions(table, DimensionVector.make({ LENGTH: 1, TIME: -1 })).name).toBe("m s^-1")
  })

  it("uses the units of the given system in canonical order", () => {
    const british = UnitSystem.make(table, { system: "BT" })
    const dimensions = DimensionVector.make({ TEMPERATURE: 1, LENGTH: 2, MASS: 1 })
    expect(Unit.fromDimensions(table, dimensions, british).name).toBe("slug ft^2 R")
  })
})

describe("Unit.fromQuantityMap", () => {
  it("composes named quantities", () => {
    const unit = Unit.fromQuantityMap(table, {
      Mass: 1,
      Velocity: 2.5,
      Current: 3,
      Light: 1,
      HeatTransferCoefficient: 2,
    })
    expect(unit.name).toBe("kg m^-1.5 s^-2.5 A^3 cd W^2 K^-2")
  })

  it("rejects names missing from the table", () => {
    expect(() => Unit.fromQuantityMap(table, { Happiness: 1 })).toThrow(UnknownQuantityNameError)
  })

  it("ignores names inherited by plain objects", () => {
    expect(() => Unit.fromQuantityMap(table, { constructor: 1 })).toThrow(UnknownQuantityNameError)
    expect(() => Unit.fromQuantityMap(table, { toString: 2 })).toThrow(UnknownQuantityNameError)
  })
})

describe("registerDerivedUnit", () => {
  it("makes the new symbol usable", () => {
    const next = registerDerivedUnit(table, new DerivedUnit({ symbol: "furlong", composition: "ft", factor: 660 }))
    const furlong = Unit.make(next, "furlong")
    expect(furlong.siUnits).toBe("m")
    expect(furlong.siScale).toBeCloseTo(201.168, 9)
    expect(isKnownSymbol(table, "furlong")).toBe(false)
  })

  it("rejects compositions that do not resolve", () => {
    expect(() => registerDerivedUnit(table, new DerivedUnit({ symbol: "bean", composition: "beans", factor: 1 })))
      .toThrow(UnknownUnitError)
    expect(() => registerDerivedUnit(table, new DerivedUnit({ symbol: "ouro", composition: "ouro m", factor: 1 })))
      .toThrow(InvalidUnitTableError)
  })

  it("rejects symbols already in the table", () => {
    expect(() => registerDerivedUnit(table, new DerivedUnit({ symbol: "J", composition: "N m", factor: 1 })))
      .toThrow(UnitAlreadyRegisteredError)
  })
})
