/**
 * Minimal unit model feeding the converter algebra and the mixed-radix engine.
 *
 * A unit carries a symbol, a canonical dimension, and the converter taking
 * its values to the base unit of that dimension. Converters between two units
 * are derived from those base converters and are only available for units of
 * the same dimension.
 *
 * @since 0.1.0
 */

import { Either, Equal, Hash, Schema } from "effect"
import { compose, identity, inverse, multiply, power, type Converter } from "./Converter.js"
import { UnitDimensionMismatchError } from "./Errors.js"

/**
 * Canonical representation of the dimension for a unit: keys are dimension names,
 * values are exponents (e.g. `{ mass: 1 }`, `{ length: 1, time: -2 }`).
 *
 * @since 0.1.0
 */
export type DimensionMap = Readonly<Record<string, number>>

const decodeSymbol = Schema.decodeSync(Schema.NonEmptyTrimmedString)

const dimensionKey = (dimension: DimensionMap): string =>
  Object.entries(dimension)
    .filter(([, exponent]) => Math.abs(exponent) > 0)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, exponent]) => `${name}:${exponent}`)
    .join("|")

/**
 * @category Models
 * @since 0.1.0
 */
export class Unit implements Equal.Equal {
  readonly symbol: string

  constructor(
    symbol: string,
    readonly dimension: DimensionMap,
    readonly toBase: Converter,
  ) {
    this.symbol = decodeSymbol(symbol)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return (
      that instanceof Unit &&
      that.symbol === this.symbol &&
      dimensionKey(that.dimension) === dimensionKey(this.dimension) &&
      Equal.equals(that.toBase, this.toBase)
    )
  }

  [Hash.symbol](): number {
    return Hash.cached(
      this,
      Hash.combine(Hash.hash(this.toBase))(Hash.string(`${this.symbol}|${dimensionKey(this.dimension)}`)),
    )
  }

  toString(): string {
    return this.symbol
  }
}

/**
 * A base unit: its values are already expressed in the base of its dimension.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeBaseUnit = (symbol: string, dimension: DimensionMap): Unit =>
  new Unit(symbol, dimension, identity)

/**
 * A unit whose values map onto `unit` through `converter`.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const celsius = transformUnit(kelvin, add(273.15), "°C")
 * ```
 */
export const transformUnit = (unit: Unit, converter: Converter, symbol: string): Unit =>
  new Unit(symbol, unit.dimension, compose(unit.toBase, converter))

/**
 * @category Constructors
 * @since 0.1.0
 */
export const multiplyUnit = (unit: Unit, factor: number, symbol: string): Unit =>
  transformUnit(unit, multiply(factor), symbol)

/**
 * Metric (`10^n`) or binary (`2^n`) prefix.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Prefix {
  readonly symbol: string
  readonly base: number
  readonly exponent: number
}

/**
 * Prefixed unit, e.g. `prefixUnit(metre, { symbol: "k", base: 10, exponent: 3 })`
 * for `km`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const prefixUnit = (unit: Unit, prefix: Prefix): Unit =>
  transformUnit(unit, power(prefix.base, prefix.exponent), `${prefix.symbol}${unit.symbol}`)

/**
 * @since 0.1.0
 */
export const isCompatible = (from: Unit, to: Unit): boolean =>
  dimensionKey(from.dimension) === dimensionKey(to.dimension)

/**
 * Converter from values in `from` to values in `to`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const getConverterTo = (
  from: Unit,
  to: Unit,
): Either.Either<Converter, UnitDimensionMismatchError> =>
  isCompatible(from, to)
    ? Either.right(Equal.equals(from.toBase, to.toBase) ? identity : compose(inverse(to.toBase), from.toBase))
    : Either.left(
        new UnitDimensionMismatchError({
          from: from.symbol,
          to: to.symbol,
          fromDimension: from.dimension,
          toDimension: to.dimension,
        }),
      )
