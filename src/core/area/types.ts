/**
 * Area domain types.
 */
import type { FixedWidthIntType } from '../integer/fixed-width.js';

/** Width or height of a rectangle. Valid only when >= 0. */
export type Dimension = bigint;

/** Product of two dimensions in the same fixed-width type. */
export type Area = bigint;

export interface DimensionPair {
  width: Dimension;
  height: Dimension;
}

/**
 * How an overflowed product is recognised.
 * - checked: compare the exact product with the type's maximum before narrowing
 * - sign: narrow first and treat a negative result as overflow (misses products
 *   that wrap back into the nonnegative range)
 */
export type OverflowStrategy = 'checked' | 'sign';

export interface AreaOptions {
  type: FixedWidthIntType;
  strategy: OverflowStrategy;
}

export type RejectionReason = 'invalid_dimension' | 'arithmetic_overflow';

/** States of one invocation, in the order they can be visited. */
export type AreaState = 'validating' | 'computing' | 'succeeded' | 'rejected';

export interface AreaSucceeded extends DimensionPair {
  status: 'succeeded';
  area: Area;
  states: AreaState[];
}

export interface AreaRejected extends DimensionPair {
  status: 'rejected';
  reason: RejectionReason;
  message: string;
  states: AreaState[];
}

export type AreaOutcome = AreaSucceeded | AreaRejected;
