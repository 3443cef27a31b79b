/**
 * Mixed-radix quantities: one quantity written as whole counts of
 * successively smaller units followed by a real remainder in the smallest,
 * e.g. `1 ft 2 in 3 P̸`.
 *
 * A chain is built fluently with {@link MixedRadix.ofPrimary} and
 * {@link MixedRadix.mix}. Each `mix` returns a new chain; the receiver is left
 * untouched. Units are kept in declaration order, which callers choose in
 * descending magnitude.
 *
 * @since 0.1.0
 */

import { Array as Arr, Effect, Either, Equal, Hash, Option } from "effect"
import { dual } from "effect/Function"
import { convertNumber, type Converter } from "./Converter.js"
import { ArgumentCountError, MixedRadixDefinitionError, type UnitDimensionMismatchError } from "./Errors.js"
import {
  integerFormat,
  makeDecimalFormat,
  symbolFormat,
  type NumberFormat,
  type UnitFormat,
} from "./Format.js"
import { makeQuantity, type Quantity } from "./Quantity.js"
import { getConverterTo, type Unit } from "./Units.js"

/**
 * Settings for {@link MixedRadix.format}.
 *
 * @category Configuration
 * @since 0.1.0
 */
export interface MixedRadixFormatOptions {
  /** Formatter for the real-valued part of the smallest unit. */
  readonly realFormat: NumberFormat
  readonly unitFormat: UnitFormat
  /** Inserted between a number and its unit symbol. */
  readonly numberToUnitDelimiter: string
  /** Inserted between successive radix parts. */
  readonly radixPartsDelimiter: string
}

/**
 * @category Configuration
 * @since 0.1.0
 */
export const defaultFormatOptions: MixedRadixFormatOptions = {
  realFormat: makeDecimalFormat({ maximumFractionDigits: 3 }),
  unitFormat: symbolFormat,
  numberToUnitDelimiter: " ",
  radixPartsDelimiter: " ",
}

/**
 * Defaults overridden by any subset of settings.
 *
 * @category Configuration
 * @since 0.1.0
 */
export const makeFormatOptions = (overrides: Partial<MixedRadixFormatOptions> = {}): MixedRadixFormatOptions => ({
  ...defaultFormatOptions,
  ...overrides,
})

// distances this small from a whole count are binary noise from the converter factors
const WHOLE_COUNT_EPSILON = 1e-9

const wholeCount = (value: number): number => {
  const floor = Math.floor(value)
  return value - floor > 1 - WHOLE_COUNT_EPSILON ? floor + 1 : floor
}

const converterOrThrow = (from: Unit, to: Unit): Converter =>
  Either.getOrThrowWith(
    getConverterTo(from, to),
    () =>
      new MixedRadixDefinitionError({
        unit: from.symbol,
        reason: `dimension differs from primary unit ${to.symbol}`,
      }),
  )

/**
 * @category Models
 * @since 0.1.0
 */
export class MixedRadix implements Equal.Equal {
  /** `toPrimary[i]` converts values of `units[i]` into the primary unit. */
  private readonly toPrimary: ReadonlyArray<Converter>
  /** `fromPrimary[i]` converts primary-unit values into `units[i]`. */
  private readonly fromPrimary: ReadonlyArray<Converter>

  private constructor(readonly units: Arr.NonEmptyReadonlyArray<Unit>) {
    const primary = Arr.headNonEmpty(units)
    this.toPrimary = units.map((unit) => converterOrThrow(unit, primary))
    this.fromPrimary = units.map((unit) => converterOrThrow(primary, unit))
  }

  /**
   * Start a chain with its largest, reference unit.
   */
  static ofPrimary(unit: Unit): MixedRadix {
    return new MixedRadix([unit])
  }

  get primaryUnit(): Unit {
    return Arr.headNonEmpty(this.units)
  }

  get secondaryUnits(): ReadonlyArray<Unit> {
    return Arr.tailNonEmpty(this.units)
  }

  get size(): number {
    return this.units.length
  }

  /**
   * A new chain extended by one smaller unit.
   *
   * Throws `MixedRadixDefinitionError` when the unit is already part of the
   * chain or belongs to another dimension.
   */
  mix(unit: Unit): MixedRadix {
    if (this.units.some((existing) => Equal.equals(existing, unit))) {
      throw new MixedRadixDefinitionError({ unit: unit.symbol, reason: "unit is already part of the radix" })
    }
    return new MixedRadix(Arr.append(this.units, unit))
  }

  /**
   * Sum of `values[i]` taken in `units[i]`, expressed in the primary unit.
   * Missing trailing values count as zero; more values than units fail with
   * `ArgumentCountError`.
   */
  createQuantity(...values: ReadonlyArray<number>): Effect.Effect<Quantity, ArgumentCountError> {
    const self = this
    return Effect.gen(function* () {
      if (values.length > self.size) {
        return yield* Effect.fail(new ArgumentCountError({ expected: self.size, actual: values.length }))
      }
      const total = Arr.reduce(
        Arr.zipWith(values, self.toPrimary, (value, converter) => convertNumber(converter, value)),
        0,
        (sum, term) => sum + term,
      )
      yield* Effect.logDebug("created mixed radix quantity", total)
      return makeQuantity(total, self.primaryUnit)
    }).pipe(Effect.annotateLogs({ operation: "createQuantity", radix: self.toString() }))
  }

  /**
   * Decompose a quantity into one value per unit: whole counts for every unit
   * but the smallest, which receives the real remainder. Negative quantities
   * are decomposed by magnitude and every part carries the sign.
   */
  extractValues(quantity: Quantity): Effect.Effect<ReadonlyArray<number>, UnitDimensionMismatchError> {
    const self = this
    return Effect.gen(function* () {
      const converter = yield* getConverterTo(quantity.unit, self.primaryUnit)
      const total = convertNumber(converter, quantity.value)
      const sign = total < 0 ? -1 : 1
      const last = self.size - 1

      const values: Array<number> = []
      let remaining = Math.abs(total)
      for (const [index, [fromPrimary, toPrimary]] of Arr.zip(self.fromPrimary, self.toPrimary).entries()) {
        if (index === last) {
          // snapping a count up can leave a remainder a few ulps below zero;
          // a single-unit chain subtracts nothing and keeps the full value
          const rest = convertNumber(fromPrimary, Math.max(remaining, 0))
          values.push(index > 0 && rest < WHOLE_COUNT_EPSILON ? 0 : rest)
          break
        }
        const count = wholeCount(convertNumber(fromPrimary, remaining))
        values.push(count)
        remaining -= convertNumber(toPrimary, count)
      }

      const signed = values.map((value) => (value === 0 ? 0 : sign * value))
      yield* Effect.logDebug("extracted mixed radix values", signed)
      return signed
    }).pipe(Effect.annotateLogs({ operation: "extractValues", radix: self.toString() }))
  }

  /**
   * Render a quantity part by part: whole counts for the leading units, the
   * smallest unit through `realFormat`. Trailing zero parts are left out, so
   * `createQuantity(1)` on a feet/inches chain renders as `"1 ft"`.
   */
  format(
    quantity: Quantity,
    options: Partial<MixedRadixFormatOptions> = {},
  ): Effect.Effect<string, UnitDimensionMismatchError> {
    const self = this
    const settings = makeFormatOptions(options)
    return Effect.map(self.extractValues(quantity), (values) => {
      const shown = Option.getOrElse(Arr.findLastIndex(values, (value) => value !== 0), () => 0)
      return Arr.zip(values, self.units)
        .slice(0, shown + 1)
        .map(([value, unit], index) => {
          const number = index === self.size - 1 ? settings.realFormat : integerFormat
          return `${number.format(value)}${settings.numberToUnitDelimiter}${settings.unitFormat.format(unit)}`
        })
        .join(settings.radixPartsDelimiter)
    })
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return (
      that instanceof MixedRadix &&
      that.size === this.size &&
      Arr.every(Arr.zip(this.units, that.units), ([left, right]) => Equal.equals(left, right))
    )
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.array(this.units))
  }

  toString(): string {
    return `MixedRadix[${this.units.map((unit) => unit.symbol).join(", ")}]`
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const ofPrimary = (unit: Unit): MixedRadix => MixedRadix.ofPrimary(unit)

/**
 * Function form of {@link MixedRadix.mix}, usable in a pipeline.
 *
 * @category Combinators
 * @since 0.1.0
 * @example
 * ```ts
 * pipe(ofPrimary(foot), mix(inch), mix(pica))
 * ```
 */
export const mix: {
  (unit: Unit): (self: MixedRadix) => MixedRadix
  (self: MixedRadix, unit: Unit): MixedRadix
} = dual(2, (self: MixedRadix, unit: Unit): MixedRadix => self.mix(unit))
