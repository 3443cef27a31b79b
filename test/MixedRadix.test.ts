import { describe, it, expect } from "@effect/vitest"
import { Effect, Equal, HashMap, Logger, LogLevel, Option, pipe } from "effect"
import { ArgumentCountError, MixedRadixDefinitionError, UnitDimensionMismatchError } from "../src/Errors.js"
import { makeDecimalFormat, makeLabelFormat } from "../src/Format.js"
import { MixedRadix, mix, ofPrimary } from "../src/MixedRadix.js"
import { makeQuantity } from "../src/Quantity.js"
import { FOOT, INCH, PICA, SECOND } from "./fixtures.js"

const feetInches = MixedRadix.ofPrimary(FOOT).mix(INCH)
const feetInchesPicas = feetInches.mix(PICA)
const alwaysPoint = makeDecimalFormat({ decimalSeparatorAlwaysShown: true })

describe("MixedRadix definition", () => {
  it("keeps units in declaration order", () => {
    expect(feetInchesPicas.primaryUnit).toBe(FOOT)
    expect(feetInchesPicas.secondaryUnits).toEqual([INCH, PICA])
    expect(feetInchesPicas.size).toBe(3)
    expect(feetInchesPicas.toString()).toBe("MixedRadix[ft, in, P\u0338]")
  })

  it("leaves the receiver of mix untouched", () => {
    const feet = ofPrimary(FOOT)
    const extended = feet.mix(INCH)
    expect(feet.size).toBe(1)
    expect(extended.size).toBe(2)
  })

  it("builds the same chain through the function form", () => {
    expect(Equal.equals(pipe(ofPrimary(FOOT), mix(INCH), mix(PICA)), feetInchesPicas)).toBe(true)
    expect(Equal.equals(mix(ofPrimary(FOOT), INCH), feetInches)).toBe(true)
  })

  it("rejects repeated units", () => {
    expect(() => feetInches.mix(FOOT)).toThrow(MixedRadixDefinitionError)
    expect(() => feetInches.mix(INCH)).toThrow("Cannot mix in into radix: unit is already part of the radix")
  })

  it("rejects units of another dimension", () => {
    expect(() => feetInches.mix(SECOND)).toThrow("Cannot mix s into radix: dimension differs from primary unit ft")
  })

  it("compares chains by their units", () => {
    expect(Equal.equals(ofPrimary(FOOT).mix(INCH), feetInches)).toBe(true)
    expect(Equal.equals(ofPrimary(INCH).mix(FOOT), feetInches)).toBe(false)
    expect(Equal.equals(feetInchesPicas, feetInches)).toBe(false)
  })
})

describe("MixedRadix.createQuantity", () => {
  it.effect("sums the parts in the primary unit", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInches.createQuantity(1, 2)
      expect(quantity.unit).toBe(FOOT)
      expect(quantity.value).toBeCloseTo(7 / 6, 9)
    }))

  it.effect("treats missing trailing values as zero", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInches.createQuantity(1)
      expect(quantity.value).toBe(1)
      expect(quantity.toString()).toBe("1 ft")
    }))

  it.effect("fails when given more values than units", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(ofPrimary(FOOT).createQuantity(1, 2))
      expect(error).toBeInstanceOf(ArgumentCountError)
      expect(error.expected).toBe(1)
      expect(error.actual).toBe(2)
    }))

  it.effect("annotates its debug logs with the operation", () =>
    Effect.gen(function* () {
      const operations: Array<unknown> = []
      const logger = Logger.make(({ annotations }) => {
        operations.push(Option.getOrUndefined(HashMap.get(annotations, "operation")))
      })
      yield* feetInches.createQuantity(1, 2).pipe(
        Logger.withMinimumLogLevel(LogLevel.Debug),
        Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
      )
      expect(operations).toEqual(["createQuantity"])
    }))
})

describe("MixedRadix.extractValues", () => {
  it.effect("splits into whole counts and a real remainder", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInchesPicas.createQuantity(1, 2, 3)
      const [feet, inches, picas] = yield* feetInchesPicas.extractValues(quantity)
      expect(feet).toBe(1)
      expect(inches).toBe(2)
      expect(picas).toBeCloseTo(3, 9)
    }))

  it.effect("normalises quantities given in a smaller unit", () =>
    Effect.gen(function* () {
      const [feet, inches] = yield* feetInches.extractValues(makeQuantity(14, INCH))
      expect(feet).toBe(1)
      expect(inches).toBeCloseTo(2, 9)
    }))

  it.effect("carries the sign into every part", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInchesPicas.createQuantity(-1, -2, -3)
      const [feet, inches, picas] = yield* feetInchesPicas.extractValues(quantity)
      expect(feet).toBe(-1)
      expect(inches).toBe(-2)
      expect(picas).toBeCloseTo(-3, 9)
    }))

  it.effect("clears remainders left by floating noise", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInchesPicas.createQuantity(1, 2)
      expect(yield* feetInchesPicas.extractValues(quantity)).toEqual([1, 2, 0])
    }))

  it.effect("returns the value unchanged for a single-unit chain", () =>
    Effect.gen(function* () {
      const feet = ofPrimary(FOOT)
      expect(yield* feet.extractValues(yield* feet.createQuantity(2.5))).toEqual([2.5])
    }))

  it.effect("keeps tiny values in a single-unit chain", () =>
    Effect.gen(function* () {
      expect(yield* ofPrimary(FOOT).extractValues(makeQuantity(5e-10, FOOT))).toEqual([5e-10])
    }))

  it.effect("fails for quantities of another dimension", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(feetInches.extractValues(makeQuantity(1, SECOND)))
      expect(error).toBeInstanceOf(UnitDimensionMismatchError)
      expect(error.message).toBe("Cannot convert s to ft: dimensions do not match")
    }))
})

describe("MixedRadix.format", () => {
  it.effect("renders every part down to the last nonzero one", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInchesPicas.createQuantity(1, 2, 3)
      expect(yield* feetInchesPicas.format(quantity, { realFormat: alwaysPoint })).toBe("1 ft 2 in 3. P\u0338")
    }))

  it.effect("drops trailing zero parts", () =>
    Effect.gen(function* () {
      expect(yield* feetInches.format(yield* feetInches.createQuantity(1))).toBe("1 ft")
      expect(yield* feetInchesPicas.format(yield* feetInchesPicas.createQuantity(1, 2))).toBe("1 ft 2 in")
    }))

  it.effect("renders the smallest unit of a single-unit chain as a real number", () =>
    Effect.gen(function* () {
      const feet = ofPrimary(FOOT)
      expect(yield* feet.format(yield* feet.createQuantity(2.5))).toBe("2.5 ft")
    }))

  it.effect("applies custom labels and delimiters", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInchesPicas.createQuantity(1, 2, 3)
      const text = yield* feetInchesPicas.format(quantity, {
        unitFormat: makeLabelFormat([
          [FOOT, "ft"],
          [INCH, "in"],
          [PICA, "pica"],
        ]),
        numberToUnitDelimiter: "",
        radixPartsDelimiter: ", ",
      })
      expect(text).toBe("1ft, 2in, 3pica")
    }))

  it.effect("renders negative quantities part by part", () =>
    Effect.gen(function* () {
      const quantity = yield* feetInches.createQuantity(-1, -6)
      expect(yield* feetInches.format(quantity)).toBe("-1 ft -6 in")
    }))
})
