/**
 * Fixed-width signed integer types, carried as bigint so 64-bit values stay exact.
 */
import { InputError, ErrorCodes } from '../../utils/errors.js';

export const INTEGER_WIDTHS = [8, 16, 32, 64] as const;

export type IntegerWidth = (typeof INTEGER_WIDTHS)[number];

/**
 * A signed two's-complement integer type of a given bit width.
 */
export interface FixedWidthIntType {
  bits: IntegerWidth;
  min: bigint;
  max: bigint;
}

export const DEFAULT_INTEGER_WIDTH: IntegerWidth = 32;

/**
 * Describe the signed integer type of the given width.
 */
export function getIntegerType(bits: IntegerWidth = DEFAULT_INTEGER_WIDTH): FixedWidthIntType {
  const half = 1n << BigInt(bits - 1);
  return { bits, min: -half, max: half - 1n };
}

/**
 * Reduce an exact value to the type's two's-complement range (wraparound).
 */
export function wrapToWidth(value: bigint, type: FixedWidthIntType): bigint {
  return BigInt.asIntN(type.bits, value);
}

export function isRepresentable(value: bigint, type: FixedWidthIntType): boolean {
  return value >= type.min && value <= type.max;
}

/**
 * Return the value when it fits the type.
 * @throws InputError (INPUT_OUT_OF_RANGE) otherwise
 */
export function assertRepresentable(value: bigint, type: FixedWidthIntType, label = 'value'): bigint {
  if (!isRepresentable(value, type)) {
    throw new InputError(
      ErrorCodes.INPUT_OUT_OF_RANGE,
      `Invalid ${label}: ${value} does not fit a ${type.bits}-bit signed integer (${type.min} to ${type.max})`,
      { label, input: value.toString(), bits: type.bits }
    );
  }
  return value;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Read operator text as a value of the integer type.
 * @param label - name used in error messages ("width", "height")
 * @throws InputError if the text is not an integer or falls outside the type's range
 */
export function parseFixedWidthInt(text: string, type: FixedWidthIntType, label = 'value'): bigint {
  const trimmed = text.trim();

  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InputError(
      ErrorCodes.INVALID_INPUT,
      `Invalid ${label}: "${trimmed}" is not an integer`,
      { label, input: trimmed }
    );
  }

  return assertRepresentable(BigInt(trimmed), type, label);
}
