/**
 * Overflow-aware area computation over a fixed-width signed integer type.
 *
 * Inputs must already be nonnegative; see validateDimensions.
 */
import { OverflowError, ErrorCodes } from '../../utils/errors.js';
import { wrapToWidth, type FixedWidthIntType } from '../integer/fixed-width.js';
import type { Area, AreaOptions, Dimension } from './types.js';

export const OVERFLOW_MESSAGE = 'ERROR: Computed area resulted in an integer overflow.';

/**
 * Multiply with the type's native semantics: the product wraps around
 * instead of saturating or trapping.
 */
export function multiplyFixedWidth(
  width: Dimension,
  height: Dimension,
  type: FixedWidthIntType
): bigint {
  return wrapToWidth(width * height, type);
}

/**
 * Compute width * height and classify the result.
 *
 * With the `sign` strategy a negative wrapped product is the only overflow
 * signal, so a product that wraps to a nonnegative value is returned as is.
 * The `checked` strategy compares the exact product with the type's maximum.
 *
 * @throws OverflowError when the product is classified as overflowed
 */
export function calculateArea(width: Dimension, height: Dimension, options: AreaOptions): Area {
  const { type, strategy } = options;

  if (strategy === 'checked') {
    const exact = width * height;
    if (exact > type.max) {
      throw overflow(width, height, type, wrapToWidth(exact, type));
    }
    return exact;
  }

  const area = multiplyFixedWidth(width, height, type);
  if (area < 0n) {
    throw overflow(width, height, type, area);
  }
  return area;
}

function overflow(
  width: Dimension,
  height: Dimension,
  type: FixedWidthIntType,
  wrapped: bigint
): OverflowError {
  return new OverflowError(ErrorCodes.ARITHMETIC_OVERFLOW, OVERFLOW_MESSAGE, {
    width: width.toString(),
    height: height.toString(),
    bits: type.bits,
    wrapped: wrapped.toString(),
  });
}
