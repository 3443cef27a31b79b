/**
 * @since 0.1.0
 */
export * as Converter from "./Converter.js"
export * from "./Errors.js"
export * from "./Format.js"
export * from "./MixedRadix.js"
export * from "./Quantity.js"
export * from "./Units.js"
