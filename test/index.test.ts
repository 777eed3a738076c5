import { describe, expect, it } from "vitest"
import * as Units from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(Units).toHaveProperty("Quantity")
    expect(Units).toHaveProperty("makeQuantity")
    expect(Units).toHaveProperty("quantity")
    expect(Units).toHaveProperty("Unit")
    expect(Units).toHaveProperty("UnitSystem")
    expect(Units).toHaveProperty("UnitRegistry")
    expect(Units).toHaveProperty("DimensionVector")
    expect(Units).toHaveProperty("defaultUnitTable")
    expect(Units).toHaveProperty("condense")
    expect(Units).toHaveProperty("parseUnitTerm")
    expect(Units).toHaveProperty("resolveUnitString")
    expect(Units).toHaveProperty("UnknownUnitError")
  })

  it("works end to end", () => {
    const table = Units.defaultUnitTable()
    expect(Units.quantity(table, 0, "C").to("K").value).toBe(273.15)
  })
})
