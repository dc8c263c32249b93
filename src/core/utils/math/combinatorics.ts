/**
 * Exact combinatorics on bigint
 */

import { validateNonNegativeInteger, validateLessEqual } from '../../validation';

/**
 * n! for a non-negative integer n, with 0! = 1
 */
export function factorial(n: number): bigint {
  validateNonNegativeInteger(n, 'n');

  let result = 1n;
  for (let i = 2; i <= n; i++) {
    result *= BigInt(i);
  }
  return result;
}

/**
 * Number of r-combinations of n elements: n! / (r! * (n - r)!)
 */
export function combinations(n: number, r: number): bigint {
  validateNonNegativeInteger(n, 'n');
  validateNonNegativeInteger(r, 'r');
  validateLessEqual(r, n);

  // C(n, r) = C(n, n - r)
  const k = Math.min(r, n - r);

  // Each partial product is C(n - k + i, i), so the division is exact
  let result = 1n;
  for (let i = 1; i <= k; i++) {
    result = (result * BigInt(n - k + i)) / BigInt(i);
  }
  return result;
}
