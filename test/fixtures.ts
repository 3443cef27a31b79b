import { add } from "../src/Converter.js"
import { makeBaseUnit, multiplyUnit, prefixUnit, transformUnit } from "../src/Units.js"

export const METRE = makeBaseUnit("m", { length: 1 })
export const SECOND = makeBaseUnit("s", { time: 1 })
export const KELVIN = makeBaseUnit("K", { temperature: 1 })

export const KILOMETRE = prefixUnit(METRE, { symbol: "k", base: 10, exponent: 3 })
export const MILLIMETRE = prefixUnit(METRE, { symbol: "m", base: 10, exponent: -3 })

export const CELSIUS = transformUnit(KELVIN, add(273.15), "°C")

export const FOOT = multiplyUnit(METRE, 0.3048, "ft")
export const INCH = multiplyUnit(METRE, 0.0254, "in")
export const PICA = multiplyUnit(METRE, 0.0042, "P\u0338")
