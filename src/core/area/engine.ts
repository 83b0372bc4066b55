/**
 * Runs one invocation through validation and computation:
 *
 *   validating -> rejected(invalid_dimension)
 *              -> computing -> rejected(arithmetic_overflow)
 *                           -> succeeded(area)
 */
import { DimensionError, OverflowError } from '../../utils/errors.js';
import { assertRepresentable, getIntegerType } from '../integer/fixed-width.js';
import { validateDimensions } from './validator.js';
import { calculateArea } from './calculator.js';
import type { AreaOptions, AreaOutcome, AreaState, Dimension } from './types.js';

export function getDefaultAreaOptions(): AreaOptions {
  return { type: getIntegerType(), strategy: 'checked' };
}

/**
 * Compute the area of a width x height rectangle.
 * Negative dimensions and overflow come back as rejected outcomes; any other
 * error propagates.
 * @throws InputError if a dimension does not fit the integer type
 */
export function computeArea(
  width: Dimension,
  height: Dimension,
  options: Partial<AreaOptions> = {}
): AreaOutcome {
  const defaults = getDefaultAreaOptions();
  const resolved: AreaOptions = {
    type: options.type ?? defaults.type,
    strategy: options.strategy ?? defaults.strategy,
  };
  assertRepresentable(width, resolved.type, 'width');
  assertRepresentable(height, resolved.type, 'height');

  const states: AreaState[] = ['validating'];

  try {
    validateDimensions(width, height);
  } catch (error) {
    if (error instanceof DimensionError) {
      states.push('rejected');
      return { status: 'rejected', reason: 'invalid_dimension', message: error.message, width, height, states };
    }
    throw error;
  }

  states.push('computing');

  try {
    const area = calculateArea(width, height, resolved);
    states.push('succeeded');
    return { status: 'succeeded', width, height, area, states };
  } catch (error) {
    if (error instanceof OverflowError) {
      states.push('rejected');
      return { status: 'rejected', reason: 'arithmetic_overflow', message: error.message, width, height, states };
    }
    throw error;
  }
}
