export const abs = (value: bigint): bigint => (value < 0n ? -value : value)

export const gcd = (left: bigint, right: bigint): bigint => {
  let a = abs(left)
  let b = abs(right)
  while (b !== 0n) {
    const t = b
    b = a % b
    a = t
  }
  return a
}

/**
 * `base ** exponent` for a non-negative integer exponent.
 */
export const pow = (base: number, exponent: number): bigint => BigInt(base) ** BigInt(exponent)

/**
 * Number of decimal digits of `|value|`; zero has one digit.
 */
export const digitCount = (value: bigint): number => abs(value).toString().length

export interface Ratio {
  readonly dividend: bigint
  readonly divisor: bigint
}

/**
 * Reduce a ratio to lowest terms with a positive divisor.
 */
export const reduce = (dividend: bigint, divisor: bigint): Ratio => {
  const sign = divisor < 0n ? -1n : 1n
  const g = gcd(dividend, divisor)
  return { dividend: (sign * dividend) / g, divisor: (sign * divisor) / g }
}
