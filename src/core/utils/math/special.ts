// src/core/utils/math/special.ts
/**
 * Log-space combinatorics for when exact coefficients overflow a double
 */

import jStat from 'jstat';

// Below this, summing logs is exact enough and cheaper than gammaln
const EXACT_LOG_LIMIT = 20;

export function logFactorial(n: number): number {
  if (n < 0) return -Infinity;
  if (n <= 1) return 0;

  if (n < EXACT_LOG_LIMIT) {
    let result = 0;
    for (let i = 2; i <= n; i++) {
      result += Math.log(i);
    }
    return result;
  }

  return jStat.gammaln(n + 1);
}

export function logBinomial(n: number, k: number): number {
  if (k > n || k < 0 || n < 0) return -Infinity;
  if (k === 0 || k === n) return 0;

  if (k > n - k) k = n - k;

  if (n < EXACT_LOG_LIMIT) {
    let result = 0;
    for (let i = 0; i < k; i++) {
      result += Math.log(n - i) - Math.log(i + 1);
    }
    return result;
  }

  return logFactorial(n) - logFactorial(k) - logFactorial(n - k);
}

/**
 * x * log(y), taking 0 * log(0) as 0
 */
export function xlogy(x: number, y: number): number {
  return x === 0 ? 0 : x * Math.log(y);
}
