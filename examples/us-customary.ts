import { Effect } from "effect"
import type { MixedRadixError } from "../src/Errors.js"
import { makeDecimalFormat } from "../src/Format.js"
import { MixedRadix } from "../src/MixedRadix.js"
import type { Quantity } from "../src/Quantity.js"
import { makeBaseUnit, multiplyUnit } from "../src/Units.js"

export const METRE = makeBaseUnit("m", { length: 1 })
export const FOOT = multiplyUnit(METRE, 0.3048, "ft")
export const INCH = multiplyUnit(METRE, 0.0254, "in")
export const PICA = multiplyUnit(METRE, 0.0042, "P\u0338")

export const feetInchesPicas = (): MixedRadix => MixedRadix.ofPrimary(FOOT).mix(INCH).mix(PICA)

export interface LengthDescription {
  readonly quantity: Quantity
  readonly parts: ReadonlyArray<number>
  readonly text: string
}

export const describeLength = (
  ...values: ReadonlyArray<number>
): Effect.Effect<LengthDescription, MixedRadixError> =>
  Effect.gen(function* () {
    const radix = feetInchesPicas()
    const quantity = yield* radix.createQuantity(...values)
    const parts = yield* radix.extractValues(quantity)
    const text = yield* radix.format(quantity, {
      realFormat: makeDecimalFormat({ maximumFractionDigits: 3, decimalSeparatorAlwaysShown: true }),
    })
    return { quantity, parts, text }
  })

if (process.argv[1]?.endsWith("us-customary.ts") === true) {
  Effect.runPromise(describeLength(1, 2, 3)).then(
    ({ quantity, parts, text }) => {
      console.log(`${quantity.value} ft = [${parts.join(", ")}] = ${text}`)
    },
    (error) => {
      console.error("Failed to run the US customary example", error)
      process.exitCode = 1
    },
  )
}
