/**
 * Input validation for rectangle dimensions.
 */
import { DimensionError, ErrorCodes } from '../../utils/errors.js';
import type { Dimension, DimensionPair } from './types.js';

export const INVALID_DIMENSION_MESSAGE = 'Both dimensions must be nonnegative integers. Please try again.';

/**
 * Accept a width/height pair when both are nonnegative.
 * The pair is returned unchanged; nothing is clamped.
 * @throws DimensionError if either dimension is negative
 */
export function validateDimensions(width: Dimension, height: Dimension): DimensionPair {
  if (width < 0n || height < 0n) {
    throw new DimensionError(ErrorCodes.INVALID_DIMENSION, INVALID_DIMENSION_MESSAGE, {
      width: width.toString(),
      height: height.toString(),
    });
  }
  return { width, height };
}
