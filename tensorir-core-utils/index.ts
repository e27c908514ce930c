import Long from 'long';
export { Long };

export function assert(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? 'Assertion failed.');
  }
}

export const listShallowEquals = <T>(list1: readonly T[], list2: readonly T[]): boolean => {
  const length = list1.length;
  if (length !== list2.length) {
    return false;
  }
  for (let i = 0; i < length; i += 1) {
    if (list1[i] !== list2[i]) {
      return false;
    }
  }
  return true;
};

/** Rounds to the nearest integer, breaking ties towards the even neighbor. */
export const roundHalfToEven = (value: number): number => {
  const floor = Math.floor(value);
  const difference = value - floor;
  if (difference > 0.5) return floor + 1;
  if (difference < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

const MAX_HALF_EXPONENT = 15;
const MIN_HALF_NORMAL_EXPONENT = -14;
const HALF_MANTISSA_BITS = 10;
// Halfway between the largest finite half (65504) and 2^16.
const HALF_OVERFLOW_THRESHOLD = 65520;

/**
 * Rounds a double to the closest value representable in IEEE 754 binary16, ties to even.
 * Subnormal halves are handled by clamping the exponent at the smallest normal exponent.
 */
export const roundToHalfPrecision = (value: number): number => {
  if (!Number.isFinite(value) || value === 0) return value;
  const absolute = Math.abs(value);
  if (absolute >= HALF_OVERFLOW_THRESHOLD) return value > 0 ? Infinity : -Infinity;
  let exponent = Math.floor(Math.log2(absolute));
  if (2 ** exponent > absolute) exponent -= 1;
  exponent = Math.min(Math.max(exponent, MIN_HALF_NORMAL_EXPONENT), MAX_HALF_EXPONENT);
  const quantum = 2 ** (exponent - HALF_MANTISSA_BITS);
  const rounded = roundHalfToEven(absolute / quantum) * quantum;
  return value < 0 ? -rounded : rounded;
};
