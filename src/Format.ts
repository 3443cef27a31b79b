/**
 * Number and unit formatters used when rendering quantities.
 *
 * Number formatting delegates to `Intl.NumberFormat`; the only addition is
 * the option to always show the decimal separator, so a whole number in the
 * fractional slot of a mixed-radix rendering reads as `3.` rather than `3`.
 *
 * @since 0.1.0
 */

import { HashMap, Option } from "effect"
import type { Unit } from "./Units.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface NumberFormat {
  readonly format: (value: number) => string
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface UnitFormat {
  readonly format: (unit: Unit) => string
}

/**
 * @category Configuration
 * @since 0.1.0
 */
export interface DecimalFormatOptions {
  readonly locale?: string
  readonly minimumFractionDigits?: number
  readonly maximumFractionDigits?: number
  readonly useGrouping?: boolean
  readonly decimalSeparatorAlwaysShown?: boolean
}

const decimalSeparator = (locale: string): string =>
  new Intl.NumberFormat(locale).formatToParts(1.5).find((part) => part.type === "decimal")?.value ?? "."

/**
 * Locale-aware decimal formatter. Defaults: locale `en`, 0 to 3 fraction
 * digits, grouping on.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * makeDecimalFormat({ decimalSeparatorAlwaysShown: true }).format(3) // "3."
 * ```
 */
export const makeDecimalFormat = (options: DecimalFormatOptions = {}): NumberFormat => {
  const locale = options.locale ?? "en"
  const formatter = new Intl.NumberFormat(locale, {
    minimumFractionDigits: options.minimumFractionDigits ?? 0,
    maximumFractionDigits: options.maximumFractionDigits ?? 3,
    useGrouping: options.useGrouping ?? true,
  })
  const separator = decimalSeparator(locale)
  return {
    format: (value) => {
      const parts = formatter.formatToParts(value)
      const text = parts.map((part) => part.value).join("")
      return options.decimalSeparatorAlwaysShown === true && !parts.some((part) => part.type === "decimal")
        ? `${text}${separator}`
        : text
    },
  }
}

/**
 * Whole numbers without grouping, as used for the leading parts of a
 * mixed-radix rendering.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const integerFormat: NumberFormat = makeDecimalFormat({ maximumFractionDigits: 0, useGrouping: false })

/**
 * Renders a unit by its own symbol.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const symbolFormat: UnitFormat = {
  format: (unit) => unit.symbol,
}

/**
 * Renders units through an explicit label table, falling back to `fallback`
 * for units without a label.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeLabelFormat = (
  labels: Iterable<readonly [Unit, string]>,
  fallback: UnitFormat = symbolFormat,
): UnitFormat => {
  const table = HashMap.fromIterable(labels)
  return {
    format: (unit) => Option.getOrElse(HashMap.get(table, unit), () => fallback.format(unit)),
  }
}
