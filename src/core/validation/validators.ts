/**
 * Argument guards
 *
 * Shared by the combinatorics primitives and BinomialDistribution. Each guard
 * throws a ProbabilityError: INVALID_TYPE when the argument is not the kind of
 * number required, INVALID_VALUE when it is outside its domain.
 */

import { ProbabilityError, ErrorCode } from '../errors';

function received(value: unknown): number | string {
  return typeof value === 'number' ? value : String(value);
}

/**
 * Assert that a value is a non-negative integer
 */
export function validateNonNegativeInteger(
  value: unknown,
  label: string = 'value'
): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ProbabilityError(
      ErrorCode.INVALID_TYPE,
      `${label} must be an integer, received ${String(value)}`,
      { label, received: received(value) }
    );
  }

  if (value < 0) {
    throw new ProbabilityError(
      ErrorCode.INVALID_VALUE,
      `${label} must be non-negative, received ${value}`,
      { label, received: value }
    );
  }
}

/**
 * Assert that x and y are non-negative integers with x <= y
 */
export function validateLessEqual(x: unknown, y: unknown): void {
  validateNonNegativeInteger(x, 'x');
  validateNonNegativeInteger(y, 'y');

  if (x > y) {
    throw new ProbabilityError(
      ErrorCode.INVALID_VALUE,
      `${x} must be less than or equal to ${y}`,
      { x, y }
    );
  }
}

/**
 * Assert that a value is a probability in [0, 1]
 */
export function validateProbability(
  value: unknown,
  label: string = 'p'
): asserts value is number {
  if (typeof value !== 'number') {
    throw new ProbabilityError(
      ErrorCode.INVALID_TYPE,
      `${label} must be a number, received ${String(value)}`,
      { label, received: received(value) }
    );
  }

  // NaN fails both comparisons
  if (!(value >= 0 && value <= 1)) {
    throw new ProbabilityError(
      ErrorCode.INVALID_VALUE,
      `${label} must be between 0 and 1 inclusive, received ${value}`,
      { label, received: value }
    );
  }
}
