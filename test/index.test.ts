import { describe, it, expect } from "vitest"
import * as MixedRadixUnits from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(MixedRadixUnits).toHaveProperty("Converter")
    expect(MixedRadixUnits.Converter).toHaveProperty("power")
    expect(MixedRadixUnits.Converter).toHaveProperty("compose")
    expect(MixedRadixUnits.Converter).toHaveProperty("convert")
    expect(MixedRadixUnits).toHaveProperty("MixedRadix")
    expect(MixedRadixUnits).toHaveProperty("ofPrimary")
    expect(MixedRadixUnits).toHaveProperty("Quantity")
    expect(MixedRadixUnits).toHaveProperty("getConverterTo")
    expect(MixedRadixUnits).toHaveProperty("makeDecimalFormat")
    expect(MixedRadixUnits).toHaveProperty("ArgumentCountError")
  })
})
