import { describe, expect, it } from "vitest"
import { Equal, Hash } from "effect"
import { BASE_DIMENSIONS, dimensionLabel, DimensionVector } from "../src/Dimensions.js"

describe("DimensionVector", () => {
  it("keeps the canonical dimension order", () => {
    expect(BASE_DIMENSIONS[0]).toBe("MASS")
    expect(BASE_DIMENSIONS[4]).toBe("TEMPERATURE_DIFFERENCE")
    expect(BASE_DIMENSIONS).toHaveLength(10)
  })

  it("reads missing dimensions as zero", () => {
    const velocity = DimensionVector.make({ LENGTH: 1, TIME: -1 })
    expect(velocity.get("LENGTH")).toBe(1)
    expect(velocity.get("TIME")).toBe(-1)
    expect(velocity.get("MASS")).toBe(0)
    expect(velocity.isDimensionless).toBe(false)
    expect(DimensionVector.dimensionless.isDimensionless).toBe(true)
  })

  it("multiplies, divides and raises to powers", () => {
    const length = DimensionVector.of("LENGTH")
    const time = DimensionVector.of("TIME")
    expect(length.divide(time).toRecord()).toEqual({ LENGTH: 1, TIME: -1 })
    expect(length.multiply(length).toRecord()).toEqual({ LENGTH: 2 })
    expect(length.divide(time).power(2).toRecord()).toEqual({ LENGTH: 2, TIME: -2 })
    expect(length.divide(length).isDimensionless).toBe(true)
  })

  it("flushes exponents within rounding noise to zero", () => {
    expect(DimensionVector.make({ MASS: 1e-13 }).isDimensionless).toBe(true)
    expect(DimensionVector.of("LENGTH", 0.1).multiply(DimensionVector.of("LENGTH", 0.2))
      .divide(DimensionVector.of("LENGTH", 0.3)).isDimensionless).toBe(true)
  })

  it("is strict in equals but folds temperature kinds for conversion", () => {
    const absolute = DimensionVector.of("TEMPERATURE")
    const difference = DimensionVector.of("TEMPERATURE_DIFFERENCE")
    expect(absolute.equals(difference)).toBe(false)
    expect(absolute.isConvertibleTo(difference)).toBe(true)
    expect(absolute.isConvertibleTo(absolute.power(2))).toBe(false)
    expect(DimensionVector.of("ANGLE").isConvertibleTo(DimensionVector.dimensionless)).toBe(false)
  })

  it("implements Equal and Hash by value", () => {
    const a = DimensionVector.make({ MASS: 1, LENGTH: 2 })
    const b = DimensionVector.of("LENGTH", 2).multiply(DimensionVector.of("MASS"))
    expect(Equal.equals(a, b)).toBe(true)
    expect(Hash.hash(a)).toBe(Hash.hash(b))
    expect(Equal.equals(a, DimensionVector.of("MASS"))).toBe(false)
  })

  it("renders the non-zero exponents", () => {
    expect(DimensionVector.make({ TIME: -1, LENGTH: 1 }).toString()).toBe("{\"LENGTH\":1,\"TIME\":-1}")
    expect(DimensionVector.dimensionless.toString()).toBe("{}")
  })
})

describe("dimensionLabel", () => {
  it("lower-cases and spaces the dimension name", () => {
    expect(dimensionLabel("MASS")).toBe("mass")
    expect(dimensionLabel("TEMPERATURE_DIFFERENCE")).toBe("temperature difference")
    expect(dimensionLabel("SOLID_ANGLE")).toBe("solid angle")
  })
})
