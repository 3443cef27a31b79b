/**
 * Error taxonomy for converters and mixed-radix quantities.
 *
 * Contract violations (a converter built from impossible parameters, a
 * composition the algebra has no rule for, a malformed radix chain) are
 * thrown synchronously. Caller errors that can be corrected and resubmitted
 * travel through the `Effect` error channel so callers can pattern match on
 * them with `Effect.catchTag`.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Unique symbol used to tag converter values.
 *
 * @since 0.1.0
 */
export const ConverterTypeId: unique symbol = Symbol.for("mixed-radix-units/Converter")

/**
 * Raised when a converter factory receives parameters that do not describe an
 * invertible transformation, such as a zero power base (`0^0` is undefined).
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * power(0, 3) // throws InvalidConverterError
 * ```
 */
export class InvalidConverterError extends Data.TaggedError("InvalidConverterError")<{
  readonly converter: string
  readonly parameter: string
  readonly value: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid ${this.converter} ${this.parameter} ${this.value}: ${this.reason}`
  }
}

/**
 * Raised when two converters are handed to the simplifying composition step
 * although the algebra has no rule combining their shapes.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsupportedCompositionError extends Data.TaggedError("UnsupportedCompositionError")<{
  readonly left: string
  readonly right: string
}> {
  override get message(): string {
    return `Composition of ${this.left} with ${this.right} is not supported`
  }
}

/**
 * Raised when more component values are supplied than the radix chain has
 * units.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new ArgumentCountError({ expected: 1, actual: 2 })
 * error.message // "Expected at most 1 value(s), got 2"
 * ```
 */
export class ArgumentCountError extends Data.TaggedError("ArgumentCountError")<{
  readonly expected: number
  readonly actual: number
}> {
  override get message(): string {
    return `Expected at most ${this.expected} value(s), got ${this.actual}`
  }
}

/**
 * Raised when a radix chain is declared with a repeated unit or with a unit
 * of another dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MixedRadixDefinitionError extends Data.TaggedError("MixedRadixDefinitionError")<{
  readonly unit: string
  readonly reason: string
}> {
  override get message(): string {
    return `Cannot mix ${this.unit} into radix: ${this.reason}`
  }
}

/**
 * Raised when two units are incompatible (mismatched dimensions).
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitDimensionMismatchError extends Data.TaggedError("UnitDimensionMismatchError")<{
  readonly from: string
  readonly to: string
  readonly fromDimension: Readonly<Record<string, number>>
  readonly toDimension: Readonly<Record<string, number>>
}> {
  override get message(): string {
    return `Cannot convert ${this.from} to ${this.to}: dimensions do not match`
  }
}

/**
 * Union of the errors surfaced through the mixed-radix effects.
 *
 * @category Errors
 * @since 0.1.0
 */
export type MixedRadixError = ArgumentCountError | UnitDimensionMismatchError
