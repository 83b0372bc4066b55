/**
 * Tests for the area engine: scenarios, state transitions and properties.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { computeArea, getDefaultAreaOptions } from '../../../../src/core/area/engine.js';
import { INVALID_DIMENSION_MESSAGE } from '../../../../src/core/area/validator.js';
import { OVERFLOW_MESSAGE } from '../../../../src/core/area/calculator.js';
import { getIntegerType } from '../../../../src/core/integer/fixed-width.js';
import { InputError, ErrorCodes } from '../../../../src/utils/errors.js';
import { thrownBy } from '../../../helpers/errors.js';

const MAX = 2147483647n;
const MIN = -2147483648n;

describe('getDefaultAreaOptions', () => {
  it('should use 32-bit checked arithmetic', () => {
    const options = getDefaultAreaOptions();

    expect(options.type.bits).toBe(32);
    expect(options.strategy).toBe('checked');
  });
});

describe('computeArea', () => {
  describe('scenarios', () => {
    it('should compute 3 x 4', () => {
      expect(computeArea(3n, 4n)).toEqual({
        status: 'succeeded',
        width: 3n,
        height: 4n,
        area: 12n,
        states: ['validating', 'computing', 'succeeded'],
      });
    });

    it('should compute 0 x 0', () => {
      expect(computeArea(0n, 0n)).toMatchObject({ status: 'succeeded', area: 0n });
    });

    it('should reject a negative width before computing', () => {
      expect(computeArea(-1n, 5n)).toEqual({
        status: 'rejected',
        reason: 'invalid_dimension',
        message: INVALID_DIMENSION_MESSAGE,
        width: -1n,
        height: 5n,
        states: ['validating', 'rejected'],
      });
    });

    it('should reject 100000 x 100000 as overflow', () => {
      expect(computeArea(100000n, 100000n)).toEqual({
        status: 'rejected',
        reason: 'arithmetic_overflow',
        message: OVERFLOW_MESSAGE,
        width: 100000n,
        height: 100000n,
        states: ['validating', 'computing', 'rejected'],
      });
    });
  });

  describe('options', () => {
    it('should report the wrapped value under the sign strategy', () => {
      expect(computeArea(100000n, 100000n, { strategy: 'sign' })).toMatchObject({
        status: 'succeeded',
        area: 1410065408n,
      });
    });

    it('should honour a narrower integer type', () => {
      expect(computeArea(12n, 12n, { type: getIntegerType(8) })).toMatchObject({
        status: 'rejected',
        reason: 'arithmetic_overflow',
      });
    });

    it('should fall back to defaults for options passed as undefined', () => {
      expect(computeArea(3n, 4n, { type: undefined, strategy: undefined })).toMatchObject({
        status: 'succeeded',
        area: 12n,
      });
    });

    it('should honour a wider integer type', () => {
      expect(computeArea(100000n, 100000n, { type: getIntegerType(64) })).toMatchObject({
        status: 'succeeded',
        area: 10000000000n,
      });
    });
  });

  describe('dimensions outside the integer type', () => {
    it('should not wrap an oversized width into range', () => {
      const error = thrownBy(() => computeArea(4294967297n, 1n, { strategy: 'sign' }));

      expect(error).toBeInstanceOf(InputError);
      expect(error).toMatchObject({ code: ErrorCodes.INPUT_OUT_OF_RANGE });
    });

    it('should reject an oversized width even when the area would be zero', () => {
      const error = thrownBy(() => computeArea(2n ** 40n, 0n));

      expect(error).toMatchObject({
        code: ErrorCodes.INPUT_OUT_OF_RANGE,
        message: 'Invalid width: 1099511627776 does not fit a 32-bit signed integer (-2147483648 to 2147483647)',
      });
    });

    it('should check the height against a narrower type', () => {
      const error = thrownBy(() => computeArea(1n, 128n, { type: getIntegerType(8) }));

      expect(error).toMatchObject({
        code: ErrorCodes.INPUT_OUT_OF_RANGE,
        message: 'Invalid height: 128 does not fit a 8-bit signed integer (-128 to 127)',
      });
    });
  });

  describe('properties', () => {
    const dimension = fc.bigInt({ min: 0n, max: MAX });
    const anyInt = fc.bigInt({ min: MIN, max: MAX });

    it('should succeed with the exact product whenever it fits', () => {
      const fittingPair = dimension.chain((width) =>
        fc.tuple(
          fc.constant(width),
          fc.bigInt({ min: 0n, max: width === 0n ? MAX : MAX / width })
        )
      );

      fc.assert(
        fc.property(fittingPair, ([width, height]) => {
          const outcome = computeArea(width, height);
          expect(outcome).toMatchObject({ status: 'succeeded', area: width * height });
        })
      );
    });

    it('should reject any negative dimension regardless of the other', () => {
      const negative = fc.bigInt({ min: MIN, max: -1n });

      fc.assert(
        fc.property(negative, anyInt, (bad, other) => {
          expect(computeArea(bad, other)).toMatchObject({ reason: 'invalid_dimension' });
          expect(computeArea(other, bad)).toMatchObject({ reason: 'invalid_dimension' });
        })
      );
    });

    it('should reject every product above the maximum under the checked strategy', () => {
      const large = fc.bigInt({ min: 46341n, max: MAX });

      fc.assert(
        fc.property(large, large, (width, height) => {
          expect(computeArea(width, height)).toMatchObject({
            status: 'rejected',
            reason: 'arithmetic_overflow',
          });
        })
      );
    });

    it('should reject products with a negative wrapped value under the sign strategy', () => {
      const large = fc.bigInt({ min: 46341n, max: MAX });
      const negativeWrap = fc
        .tuple(large, large)
        .filter(([width, height]) => BigInt.asIntN(32, width * height) < 0n);

      fc.assert(
        fc.property(negativeWrap, ([width, height]) => {
          expect(computeArea(width, height, { strategy: 'sign' })).toMatchObject({
            status: 'rejected',
            reason: 'arithmetic_overflow',
          });
        })
      );
    });

    it('should be deterministic', () => {
      fc.assert(
        fc.property(anyInt, anyInt, (width, height) => {
          expect(computeArea(width, height)).toEqual(computeArea(width, height));
        })
      );
    });
  });
});
