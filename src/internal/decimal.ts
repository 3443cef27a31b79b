import { BigDecimal } from "effect"
import { digitCount } from "./bigint.js"

export interface MathContext {
  /** significant digits, 0 leaves the value unrounded */
  readonly precision: number
  readonly mode: BigDecimal.RoundingMode
}

export const roundTo = (value: BigDecimal.BigDecimal, context: MathContext): BigDecimal.BigDecimal => {
  const normalized = BigDecimal.normalize(value)
  if (context.precision === 0) {
    return normalized
  }
  const excess = digitCount(normalized.value) - context.precision
  if (excess <= 0) {
    return normalized
  }
  return BigDecimal.normalize(
    BigDecimal.round(normalized, { scale: normalized.scale - excess, mode: context.mode }),
  )
}

export const multiplyTo = (
  left: BigDecimal.BigDecimal,
  right: BigDecimal.BigDecimal,
  context: MathContext,
): BigDecimal.BigDecimal => roundTo(BigDecimal.multiply(left, right), context)

// divisor is never zero: every converter factor is validated nonzero at construction
export const divideTo = (
  dividend: BigDecimal.BigDecimal,
  divisor: BigDecimal.BigDecimal,
  context: MathContext,
): BigDecimal.BigDecimal => roundTo(BigDecimal.unsafeDivide(dividend, divisor), context)

export const sumTo = (
  left: BigDecimal.BigDecimal,
  right: BigDecimal.BigDecimal,
  context: MathContext,
): BigDecimal.BigDecimal => roundTo(BigDecimal.sum(left, right), context)
