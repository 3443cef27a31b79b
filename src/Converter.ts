/**
 * Converter algebra: immutable, composable scaling and offset transformations
 * between two numeric representations of the same physical quantity.
 *
 * `Converter` is a closed union. Composition, inversion and the three
 * conversion entry points match exhaustively on `_tag`, so adding a variant
 * forces every rule site to be revisited.
 *
 * Composition order is fixed: `compose(left, right)` applies `right` first and
 * then `left`, i.e. `left ∘ right`.
 *
 * @since 0.1.0
 */

import { BigDecimal, Equal, Hash, Option, Predicate, Schema } from "effect"
import * as Equivalence from "effect/Equivalence"
import { absurd, dual } from "effect/Function"
import * as order from "effect/Order"
import { ConverterTypeId, InvalidConverterError, UnsupportedCompositionError } from "./Errors.js"
import { pow, reduce } from "./internal/bigint.js"
import { divideTo, multiplyTo, roundTo, sumTo } from "./internal/decimal.js"

const RoundingMode = Schema.Literal(
  "ceil",
  "floor",
  "to-zero",
  "from-zero",
  "half-ceil",
  "half-floor",
  "half-to-zero",
  "half-from-zero",
  "half-even",
  "half-odd",
)

/**
 * Precision and rounding applied to arbitrary-precision decimal results.
 * `precision` counts significant digits; `0` leaves results unrounded.
 *
 * @category Configuration
 * @since 0.1.0
 */
export class RoundingContext extends Schema.Class<RoundingContext>("RoundingContext")({
  precision: Schema.Int.pipe(Schema.nonNegative()),
  mode: RoundingMode,
}) {}

/**
 * 34 significant digits, half-even. The default context, and the working
 * precision of the integer path when a division is not exact.
 *
 * @category Configuration
 * @since 0.1.0
 */
export const DECIMAL128 = new RoundingContext({ precision: 34, mode: "half-even" })

/**
 * @category Configuration
 * @since 0.1.0
 */
export const UNLIMITED = new RoundingContext({ precision: 0, mode: "half-even" })

/**
 * @category Models
 * @since 0.1.0
 */
export type Converter =
  | IdentityConverter
  | PowerConverter
  | RationalConverter
  | MultiplyConverter
  | AddConverter
  | PairConverter

const IDENTITY_HASH = Hash.string("IdentityConverter")

abstract class ConverterBase implements Equal.Equal {
  readonly [ConverterTypeId]: typeof ConverterTypeId = ConverterTypeId

  abstract readonly _tag: Converter["_tag"]

  /** `true` iff applying the converter leaves every value unchanged. */
  abstract isIdentity(): boolean

  /** `true` iff the converter only scales (no additive term). */
  abstract isLinear(): boolean

  protected abstract sameParameters(that: Converter): boolean

  protected abstract parameterHash(): number

  /** Apply `that` first, then this converter. */
  compose(this: Converter, that: Converter): Converter {
    return compose(this, that)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    if (!isConverter(that)) {
      return false
    }
    if (this.isIdentity() && that.isIdentity()) {
      return true
    }
    return this.sameParameters(that)
  }

  [Hash.symbol](): number {
    return Hash.cached(this, this.isIdentity() ? IDENTITY_HASH : this.parameterHash())
  }
}

/**
 * @category Models
 * @since 0.1.0
 */
export class IdentityConverter extends ConverterBase {
  readonly _tag = "IdentityConverter"

  isIdentity(): boolean {
    return true
  }

  isLinear(): boolean {
    return true
  }

  inverse(): IdentityConverter {
    return this
  }

  protected sameParameters(that: Converter): boolean {
    return that._tag === "IdentityConverter"
  }

  protected parameterHash(): number {
    return IDENTITY_HASH
  }

  toString(): string {
    return "IdentityConverter"
  }
}

/**
 * Factor `base^exponent` with integer base and exponent.
 *
 * @category Models
 * @since 0.1.0
 */
export class PowerConverter extends ConverterBase {
  readonly _tag = "PowerConverter"
  /** floating factor, used by the `number` path only */
  readonly factor: number

  constructor(
    readonly base: number,
    readonly exponent: number,
  ) {
    super()
    if (!Number.isSafeInteger(base)) {
      throw new InvalidConverterError({
        converter: "PowerConverter",
        parameter: "base",
        value: String(base),
        reason: "must be an integer",
      })
    }
    if (base === 0) {
      throw new InvalidConverterError({
        converter: "PowerConverter",
        parameter: "base",
        value: "0",
        reason: "0^0 is undefined",
      })
    }
    if (!Number.isSafeInteger(exponent)) {
      throw new InvalidConverterError({
        converter: "PowerConverter",
        parameter: "exponent",
        value: String(exponent),
        reason: "must be an integer",
      })
    }
    this.factor = Math.pow(base, exponent)
  }

  getBase(): number {
    return this.base
  }

  getExponent(): number {
    return this.exponent
  }

  isIdentity(): boolean {
    // 1^x = 1 and x^0 = 1; the base is never 0 and no composition changes it
    return this.base === 1 || this.exponent === 0
  }

  isLinear(): boolean {
    return true
  }

  inverse(): PowerConverter {
    return this.isIdentity() ? this : new PowerConverter(this.base, -this.exponent)
  }

  /**
   * The exact rational equivalent: `base^exponent / 1` or `1 / base^-exponent`.
   */
  toRationalConverter(): RationalConverter {
    return this.exponent > 0
      ? new RationalConverter(pow(this.base, this.exponent), 1n)
      : new RationalConverter(1n, pow(this.base, -this.exponent))
  }

  protected sameParameters(that: Converter): boolean {
    return that._tag === "PowerConverter" && that.base === this.base && that.exponent === this.exponent
  }

  protected parameterHash(): number {
    return Hash.combine(Hash.number(this.exponent))(Hash.number(this.base))
  }

  toString(): string {
    return `PowerConverter(${this.base}^${this.exponent})`
  }
}

/**
 * Exact factor `dividend / divisor`, kept in lowest terms with a positive
 * divisor.
 *
 * @category Models
 * @since 0.1.0
 */
export class RationalConverter extends ConverterBase {
  readonly _tag = "RationalConverter"
  readonly dividend: bigint
  readonly divisor: bigint

  constructor(dividend: bigint, divisor: bigint) {
    super()
    if (divisor === 0n) {
      throw new InvalidConverterError({
        converter: "RationalConverter",
        parameter: "divisor",
        value: "0",
        reason: "division by zero",
      })
    }
    if (dividend === 0n) {
      throw new InvalidConverterError({
        converter: "RationalConverter",
        parameter: "dividend",
        value: "0",
        reason: "a zero factor has no inverse",
      })
    }
    const ratio = reduce(dividend, divisor)
    this.dividend = ratio.dividend
    this.divisor = ratio.divisor
  }

  get factor(): number {
    return Number(this.dividend) / Number(this.divisor)
  }

  isIdentity(): boolean {
    return this.dividend === this.divisor
  }

  isLinear(): boolean {
    return true
  }

  inverse(): RationalConverter {
    return this.isIdentity() ? this : new RationalConverter(this.divisor, this.dividend)
  }

  protected sameParameters(that: Converter): boolean {
    return that._tag === "RationalConverter" && that.dividend === this.dividend && that.divisor === this.divisor
  }

  protected parameterHash(): number {
    return Hash.combine(Hash.hash(this.divisor))(Hash.hash(this.dividend))
  }

  toString(): string {
    return `RationalConverter(${this.dividend}/${this.divisor})`
  }
}

/**
 * Approximate floating-point factor.
 *
 * @category Models
 * @since 0.1.0
 */
export class MultiplyConverter extends ConverterBase {
  readonly _tag = "MultiplyConverter"

  constructor(readonly factor: number) {
    super()
    if (!Number.isFinite(factor) || factor === 0) {
      throw new InvalidConverterError({
        converter: "MultiplyConverter",
        parameter: "factor",
        value: String(factor),
        reason: "must be finite and nonzero",
      })
    }
  }

  isIdentity(): boolean {
    return this.factor === 1
  }

  isLinear(): boolean {
    return true
  }

  inverse(): MultiplyConverter {
    return this.isIdentity() ? this : new MultiplyConverter(1 / this.factor)
  }

  protected sameParameters(that: Converter): boolean {
    return that._tag === "MultiplyConverter" && that.factor === this.factor
  }

  protected parameterHash(): number {
    return Hash.number(this.factor)
  }

  toString(): string {
    return `MultiplyConverter(${this.factor})`
  }
}

/**
 * Additive offset. Affine, so never linear.
 *
 * @category Models
 * @since 0.1.0
 */
export class AddConverter extends ConverterBase {
  readonly _tag = "AddConverter"

  constructor(readonly offset: number) {
    super()
    if (!Number.isFinite(offset)) {
      throw new InvalidConverterError({
        converter: "AddConverter",
        parameter: "offset",
        value: String(offset),
        reason: "must be finite",
      })
    }
  }

  isIdentity(): boolean {
    return this.offset === 0
  }

  isLinear(): boolean {
    return false
  }

  inverse(): AddConverter {
    return this.isIdentity() ? this : new AddConverter(-this.offset)
  }

  protected sameParameters(that: Converter): boolean {
    return that._tag === "AddConverter" && that.offset === this.offset
  }

  protected parameterHash(): number {
    return Hash.number(this.offset)
  }

  toString(): string {
    return this.offset < 0 ? `AddConverter(${this.offset})` : `AddConverter(+${this.offset})`
  }
}

/**
 * Two-stage chain for compositions the algebra cannot simplify: applies
 * `right`, then `left`.
 *
 * @category Models
 * @since 0.1.0
 */
export class PairConverter extends ConverterBase {
  readonly _tag = "PairConverter"

  constructor(
    readonly left: Converter,
    readonly right: Converter,
  ) {
    super()
  }

  isIdentity(): boolean {
    return false
  }

  isLinear(): boolean {
    return this.left.isLinear() && this.right.isLinear()
  }

  inverse(): PairConverter {
    return new PairConverter(inverse(this.right), inverse(this.left))
  }

  protected sameParameters(that: Converter): boolean {
    return that._tag === "PairConverter" && Equal.equals(that.left, this.left) && Equal.equals(that.right, this.right)
  }

  protected parameterHash(): number {
    return Hash.combine(Hash.hash(this.right))(Hash.hash(this.left))
  }

  toString(): string {
    return `(${this.left} ∘ ${this.right})`
  }
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isConverter = (u: unknown): u is Converter => Predicate.hasProperty(u, ConverterTypeId)

/**
 * @category Constructors
 * @since 0.1.0
 */
export const identity: IdentityConverter = new IdentityConverter()

/**
 * Converter with factor `base^exponent`.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const milli = power(10, -3)
 * convertBigInt(milli, 5000n) // 5n
 * ```
 */
export const power = (base: number, exponent: number): PowerConverter => new PowerConverter(base, exponent)

/**
 * Power converter for a metric (`10^n`) or binary (`2^n`) prefix.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const ofPrefix = (prefix: { readonly base: number; readonly exponent: number }): PowerConverter =>
  new PowerConverter(prefix.base, prefix.exponent)

/**
 * @category Constructors
 * @since 0.1.0
 */
export const rational = (dividend: bigint, divisor: bigint): RationalConverter =>
  new RationalConverter(dividend, divisor)

/**
 * @category Constructors
 * @since 0.1.0
 */
export const multiply = (factor: number): MultiplyConverter => new MultiplyConverter(factor)

/**
 * @category Constructors
 * @since 0.1.0
 */
export const add = (offset: number): AddConverter => new AddConverter(offset)

const normalize = (converter: Converter): Converter => (converter.isIdentity() ? identity : converter)

const multiplyRationals = (left: RationalConverter, right: RationalConverter): RationalConverter =>
  new RationalConverter(left.dividend * right.dividend, left.divisor * right.divisor)

const simplifyPower = (left: PowerConverter, right: Converter): Option.Option<Converter> => {
  switch (right._tag) {
    case "IdentityConverter":
      return Option.some(left)
    case "PowerConverter":
      return right.base === left.base
        ? Option.some(new PowerConverter(left.base, left.exponent + right.exponent))
        : Option.none()
    case "RationalConverter":
      return Option.some(multiplyRationals(left.toRationalConverter(), right))
    case "MultiplyConverter":
      // loses exactness: the power is folded into the floating factor
      return Option.some(new MultiplyConverter(left.factor * right.factor))
    case "AddConverter":
    case "PairConverter":
      return Option.none()
    default:
      return absurd(right)
  }
}

const simplifyRational = (left: RationalConverter, right: Converter): Option.Option<Converter> => {
  switch (right._tag) {
    case "IdentityConverter":
      return Option.some(left)
    case "PowerConverter":
      return Option.some(multiplyRationals(left, right.toRationalConverter()))
    case "RationalConverter":
      return Option.some(multiplyRationals(left, right))
    case "MultiplyConverter":
      return Option.some(new MultiplyConverter(left.factor * right.factor))
    case "AddConverter":
    case "PairConverter":
      return Option.none()
    default:
      return absurd(right)
  }
}

const simplifyMultiply = (left: MultiplyConverter, right: Converter): Option.Option<Converter> => {
  switch (right._tag) {
    case "IdentityConverter":
      return Option.some(left)
    case "PowerConverter":
    case "RationalConverter":
    case "MultiplyConverter":
      return Option.some(new MultiplyConverter(left.factor * right.factor))
    case "AddConverter":
    case "PairConverter":
      return Option.none()
    default:
      return absurd(right)
  }
}

const simplify = (left: Converter, right: Converter): Option.Option<Converter> => {
  if (!left.isLinear() || !right.isLinear()) {
    return Option.none()
  }
  switch (left._tag) {
    case "IdentityConverter":
      return Option.some(right)
    case "PowerConverter":
      return simplifyPower(left, right)
    case "RationalConverter":
      return simplifyRational(left, right)
    case "MultiplyConverter":
      return simplifyMultiply(left, right)
    case "AddConverter":
    case "PairConverter":
      return Option.none()
    default:
      return absurd(left)
  }
}

/**
 * Whether `left ∘ right` collapses into a single converter.
 *
 * @category Composition
 * @since 0.1.0
 */
export const isSimplyComposable = (left: Converter, right: Converter): boolean =>
  Option.isSome(simplify(left, right))

/**
 * The single simplified converter for `left ∘ right`. Throws
 * `UnsupportedCompositionError` when the pair is not simply composable; use
 * {@link compose} for the general case.
 *
 * @category Composition
 * @since 0.1.0
 */
export const composeSimplified = (left: Converter, right: Converter): Converter =>
  Option.match(simplify(left, right), {
    onNone: () => {
      throw new UnsupportedCompositionError({ left: left.toString(), right: right.toString() })
    },
    onSome: normalize,
  })

/**
 * Converter equivalent to applying `that` first and then `self`. Simply
 * composable pairs collapse into one converter, everything else becomes a
 * {@link PairConverter}.
 *
 * @category Composition
 * @since 0.1.0
 * @example
 * ```ts
 * compose(power(10, 3), power(10, -1)) // PowerConverter(10^2)
 * pipe(power(10, 3), compose(power(10, -3))).isIdentity() // true
 * ```
 */
export const compose: {
  (that: Converter): (self: Converter) => Converter
  (self: Converter, that: Converter): Converter
} = dual(2, (self: Converter, that: Converter): Converter => {
  if (that.isIdentity()) {
    return self
  }
  if (self.isIdentity()) {
    return that
  }
  return Option.match(simplify(self, that), {
    onNone: (): Converter => new PairConverter(self, that),
    onSome: normalize,
  })
})

/**
 * @category Composition
 * @since 0.1.0
 */
export const inverse = (self: Converter): Converter => self.inverse()

/**
 * Apply the converter to a native floating-point value.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertNumber = (self: Converter, value: number): number => {
  if (self.isIdentity()) {
    return value
  }
  switch (self._tag) {
    case "IdentityConverter":
      return value
    case "PowerConverter":
    case "MultiplyConverter":
      return value * self.factor
    case "RationalConverter":
      return (value * Number(self.dividend)) / Number(self.divisor)
    case "AddConverter":
      return value + self.offset
    case "PairConverter":
      return convertNumber(self.left, convertNumber(self.right, value))
    default:
      return absurd(self)
  }
}

/**
 * Apply the converter to an arbitrary-precision integer. The result stays a
 * `bigint` whenever it is exact; a division that leaves a remainder degrades
 * to a `BigDecimal` computed at {@link DECIMAL128}.
 *
 * @category Conversions
 * @since 0.1.0
 * @example
 * ```ts
 * convertBigInt(power(10, -1), 70n) // 7n
 * convertBigInt(power(10, -1), 7n)  // BigDecimal 0.7
 * ```
 */
export const convertBigInt = (
  self: Converter,
  value: bigint,
  context: RoundingContext = DECIMAL128,
): bigint | BigDecimal.BigDecimal => {
  if (self.isIdentity()) {
    return value
  }
  switch (self._tag) {
    case "IdentityConverter":
      return value
    case "PowerConverter": {
      const factor = pow(self.base, Math.abs(self.exponent))
      if (self.exponent > 0) {
        return value * factor
      }
      return exactQuotient(value, factor)
    }
    case "RationalConverter":
      return exactQuotient(value * self.dividend, self.divisor)
    case "MultiplyConverter":
      return multiplyTo(BigDecimal.fromBigInt(value), BigDecimal.unsafeFromNumber(self.factor), context)
    case "AddConverter":
      return Number.isInteger(self.offset)
        ? value + BigInt(self.offset)
        : sumTo(BigDecimal.fromBigInt(value), BigDecimal.unsafeFromNumber(self.offset), context)
    case "PairConverter": {
      const intermediate = convertBigInt(self.right, value, context)
      return typeof intermediate === "bigint"
        ? convertBigInt(self.left, intermediate, context)
        : convertBigDecimal(self.left, intermediate, context)
    }
    default:
      return absurd(self)
  }
}

const exactQuotient = (dividend: bigint, divisor: bigint): bigint | BigDecimal.BigDecimal =>
  dividend % divisor === 0n
    ? dividend / divisor
    : divideTo(BigDecimal.fromBigInt(dividend), BigDecimal.fromBigInt(divisor), DECIMAL128)

/**
 * Apply the converter to an arbitrary-precision decimal, rounding the result
 * to `context`. Identity converters return the input untouched.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertBigDecimal = (
  self: Converter,
  value: BigDecimal.BigDecimal,
  context: RoundingContext = DECIMAL128,
): BigDecimal.BigDecimal => {
  if (self.isIdentity()) {
    return value
  }
  switch (self._tag) {
    case "IdentityConverter":
      return value
    case "PowerConverter": {
      const factor = BigDecimal.fromBigInt(pow(self.base, Math.abs(self.exponent)))
      return self.exponent > 0 ? multiplyTo(value, factor, context) : divideTo(value, factor, context)
    }
    case "RationalConverter":
      return divideTo(
        BigDecimal.multiply(value, BigDecimal.fromBigInt(self.dividend)),
        BigDecimal.fromBigInt(self.divisor),
        context,
      )
    case "MultiplyConverter":
      return multiplyTo(value, BigDecimal.unsafeFromNumber(self.factor), context)
    case "AddConverter":
      return sumTo(value, BigDecimal.unsafeFromNumber(self.offset), context)
    case "PairConverter":
      return convertBigDecimal(self.left, convertBigDecimal(self.right, value, context), context)
    default:
      return absurd(self)
  }
}

/**
 * Convert a value, keeping its numeric representation.
 *
 * @category Conversions
 * @since 0.1.0
 */
export function convert(self: Converter, value: number): number
export function convert(
  self: Converter,
  value: bigint,
  context?: RoundingContext,
): bigint | BigDecimal.BigDecimal
export function convert(
  self: Converter,
  value: BigDecimal.BigDecimal,
  context?: RoundingContext,
): BigDecimal.BigDecimal
export function convert(
  self: Converter,
  value: number | bigint | BigDecimal.BigDecimal,
  context: RoundingContext = DECIMAL128,
): number | bigint | BigDecimal.BigDecimal {
  if (typeof value === "number") {
    return convertNumber(self, value)
  }
  if (typeof value === "bigint") {
    return convertBigInt(self, value, context)
  }
  return convertBigDecimal(self, value, context)
}

/**
 * Round a decimal to a context without converting it.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const round = (value: BigDecimal.BigDecimal, context: RoundingContext): BigDecimal.BigDecimal =>
  roundTo(value, context)

/**
 * Two converters are equivalent when both are identities, whatever their
 * variant, or when they are the same variant with equal parameters.
 *
 * @category Instances
 * @since 0.1.0
 */
export const equivalence: Equivalence.Equivalence<Converter> = Equivalence.make((self, that) =>
  Equal.equals(self, that),
)

const thenBy = (first: -1 | 0 | 1, next: () => -1 | 0 | 1): -1 | 0 | 1 => (first !== 0 ? first : next())

const compareParameters = (self: Converter, that: Converter): -1 | 0 | 1 => {
  if (self.isIdentity() || that.isIdentity()) {
    return 0
  }
  switch (self._tag) {
    case "IdentityConverter":
      return 0
    case "PowerConverter":
      if (that._tag !== "PowerConverter") {
        return 0
      }
      return thenBy(order.number(self.base, that.base), () => order.number(self.exponent, that.exponent))
    case "RationalConverter":
      if (that._tag !== "RationalConverter") {
        return 0
      }
      return thenBy(order.bigint(self.dividend, that.dividend), () => order.bigint(self.divisor, that.divisor))
    case "MultiplyConverter":
      return that._tag === "MultiplyConverter" ? order.number(self.factor, that.factor) : 0
    case "AddConverter":
      return that._tag === "AddConverter" ? order.number(self.offset, that.offset) : 0
    case "PairConverter": {
      if (that._tag !== "PairConverter") {
        return 0
      }
      return thenBy(Order(self.left, that.left), () => Order(self.right, that.right))
    }
    default:
      return absurd(self)
  }
}

/**
 * Total order used for canonicalization. Identities of any variant are equal
 * and rank as `IdentityConverter`; other converters order by tag name, then by
 * their parameters.
 *
 * @category Instances
 * @since 0.1.0
 */
export const Order: order.Order<Converter> = (self, that) => {
  if (self === that || (self.isIdentity() && that.isIdentity())) {
    return 0
  }
  return thenBy(order.string(rankTag(self), rankTag(that)), () => compareParameters(self, that))
}

// every identity ranks as IdentityConverter, whichever variant carries it
const rankTag = (converter: Converter): Converter["_tag"] =>
  converter.isIdentity() ? "IdentityConverter" : converter._tag
