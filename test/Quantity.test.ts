import { describe, it, expect } from "@effect/vitest"
import { Effect, Either, Equal } from "effect"
import { makeDecimalFormat, makeLabelFormat } from "../src/Format.js"
import { formatQuantity, makeQuantity, toUnit } from "../src/Quantity.js"
import { FOOT, INCH, SECOND } from "./fixtures.js"

describe("Quantity", () => {
  it("converts into compatible units", () => {
    const inches = Either.getOrThrow(toUnit(makeQuantity(2, FOOT), INCH))
    expect(inches.unit).toBe(INCH)
    expect(inches.value).toBeCloseTo(24, 9)
  })

  it.effect("fails to convert into another dimension", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(toUnit(makeQuantity(2, FOOT), SECOND))
      expect(error._tag).toBe("UnitDimensionMismatchError")
    }))

  it("renders value and symbol", () => {
    expect(String(makeQuantity(1, FOOT))).toBe("1 ft")
    expect(formatQuantity(makeQuantity(1, FOOT))).toBe("1 ft")
  })

  it("renders through custom formats", () => {
    const labels = makeLabelFormat([[FOOT, "feet"]])
    expect(formatQuantity(makeQuantity(2.5, FOOT), labels, makeDecimalFormat({ minimumFractionDigits: 2 }))).toBe(
      "2.50 feet",
    )
    expect(formatQuantity(makeQuantity(3, INCH), labels)).toBe("3 in")
  })

  it("compares by value and unit", () => {
    expect(Equal.equals(makeQuantity(1, FOOT), makeQuantity(1, FOOT))).toBe(true)
    expect(Equal.equals(makeQuantity(1, FOOT), makeQuantity(1, INCH))).toBe(false)
    expect(Equal.equals(makeQuantity(1, FOOT), makeQuantity(2, FOOT))).toBe(false)
  })
})
