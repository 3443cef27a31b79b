/**
 * A numeric value paired with the unit it is expressed in.
 *
 * @since 0.1.0
 */

import { Data, Either } from "effect"
import { convertNumber } from "./Converter.js"
import type { UnitDimensionMismatchError } from "./Errors.js"
import { symbolFormat, type NumberFormat, type UnitFormat } from "./Format.js"
import { getConverterTo, type Unit } from "./Units.js"

/**
 * @category Models
 * @since 0.1.0
 */
export class Quantity extends Data.Class<{
  readonly value: number
  readonly unit: Unit
}> {
  toString(): string {
    return `${this.value} ${this.unit.symbol}`
  }
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeQuantity = (value: number, unit: Unit): Quantity => new Quantity({ value, unit })

/**
 * Express a quantity in another unit of the same dimension.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const toUnit = (
  quantity: Quantity,
  unit: Unit,
): Either.Either<Quantity, UnitDimensionMismatchError> =>
  Either.map(getConverterTo(quantity.unit, unit), (converter) =>
    makeQuantity(convertNumber(converter, quantity.value), unit),
  )

const plainNumber: NumberFormat = { format: (value) => String(value) }

/**
 * `"<value> <unit>"`, e.g. `"1 ft"`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const formatQuantity = (
  quantity: Quantity,
  unitFormat: UnitFormat = symbolFormat,
  numberFormat: NumberFormat = plainNumber,
): string => `${numberFormat.format(quantity.value)} ${unitFormat.format(quantity.unit)}`
