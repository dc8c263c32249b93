/**
 * Binomial Distribution
 *
 * Number of successes in n independent trials that each succeed with
 * probability p. Parameters are validated once at construction and never
 * change afterwards; q is derived from p on every access.
 */

import { combinations } from '../utils/math/combinatorics';
import { logBinomial, xlogy } from '../utils/math/special';
import {
  validateNonNegativeInteger,
  validateLessEqual,
  validateProbability,
} from '../validation';
import { ProbabilityError, ErrorCode } from '../errors';
import {
  DEFAULT_DISPLAY_DIGITS,
  DEFAULT_NORMALIZATION_TOLERANCE,
  MAX_DISPLAY_DIGITS,
} from '../defaults';

export interface BinomialOptions {
  /** Decimal places for formatDistribution/formatStats */
  displayDigits?: number;
  /** Allowed |sum(PMF) - 1| before `distribution` warns */
  normalizationTolerance?: number;
}

export interface BinomialParameters {
  n: number;
  p: number;
  q: number;
}

function validateDisplayDigits(digits: unknown): asserts digits is number {
  validateNonNegativeInteger(digits, 'displayDigits');
  if (digits > MAX_DISPLAY_DIGITS) {
    throw new ProbabilityError(
      ErrorCode.INVALID_VALUE,
      `displayDigits must be at most ${MAX_DISPLAY_DIGITS}, received ${digits}`,
      { displayDigits: digits }
    );
  }
}

function validateTolerance(tolerance: unknown): asserts tolerance is number {
  if (typeof tolerance !== 'number') {
    throw new ProbabilityError(
      ErrorCode.INVALID_TYPE,
      `normalizationTolerance must be a number, received ${String(tolerance)}`
    );
  }
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new ProbabilityError(
      ErrorCode.INVALID_VALUE,
      `normalizationTolerance must be a finite non-negative number, received ${tolerance}`,
      { normalizationTolerance: tolerance }
    );
  }
}

export class BinomialDistribution {
  private readonly displayDigits: number;
  private readonly normalizationTolerance: number;

  constructor(
    readonly n: number,
    readonly p: number,
    options: BinomialOptions = {}
  ) {
    validateNonNegativeInteger(n, 'n');
    validateProbability(p, 'p');

    const {
      displayDigits = DEFAULT_DISPLAY_DIGITS,
      normalizationTolerance = DEFAULT_NORMALIZATION_TOLERANCE,
    } = options;
    validateDisplayDigits(displayDigits);
    validateTolerance(normalizationTolerance);

    this.displayDigits = displayDigits;
    this.normalizationTolerance = normalizationTolerance;
    Object.freeze(this);
  }

  /**
   * Probability of failure, 1 - p
   */
  get q(): number {
    return 1 - this.p;
  }

  /**
   * Mean: n * p
   */
  get expectedValue(): number {
    return this.n * this.p;
  }

  /**
   * Variance: n * p * q
   */
  get variance(): number {
    return this.n * this.p * this.q;
  }

  get stdDev(): number {
    return Math.sqrt(this.variance);
  }

  /**
   * Skewness: (q - p) / sqrt(n * p * q)
   *
   * @throws ProbabilityError UNDEFINED_STATISTIC when n * p * q is 0
   *   (n = 0, p = 0 or p = 1)
   */
  get skewness(): number {
    const variance = this.variance;
    if (variance === 0) {
      throw new ProbabilityError(
        ErrorCode.UNDEFINED_STATISTIC,
        `Skewness is undefined when n * p * q = 0 (n=${this.n}, p=${this.p})`,
        { n: this.n, p: this.p }
      );
    }
    return (this.q - this.p) / Math.sqrt(variance);
  }

  /**
   * Mode: floor((n + 1) * p), capped at n for p = 1
   */
  get mode(): number {
    return Math.min(this.n, Math.floor((this.n + 1) * this.p));
  }

  /**
   * P(X = k) = C(n, k) * p^k * q^(n - k), with 0^0 = 1
   */
  probabilityK(k: number): number {
    validateNonNegativeInteger(k, 'k');
    validateLessEqual(k, this.n);

    const coefficient = Number(combinations(this.n, k));
    if (Number.isFinite(coefficient)) {
      return coefficient * this.p ** k * this.q ** (this.n - k);
    }

    // C(n, k) overflows a double
    return Math.exp(this.logProbabilityK(k));
  }

  /**
   * log P(X = k) = log C(n, k) + k*log(p) + (n - k)*log(q)
   */
  logProbabilityK(k: number): number {
    validateNonNegativeInteger(k, 'k');
    validateLessEqual(k, this.n);

    return logBinomial(this.n, k) + xlogy(k, this.p) + xlogy(this.n - k, this.q);
  }

  /**
   * P(X <= k)
   */
  cumulative(k: number): number {
    validateNonNegativeInteger(k, 'k');
    validateLessEqual(k, this.n);

    let cumulative = 0;
    for (let i = 0; i <= k; i++) {
      cumulative += this.probabilityK(i);
    }
    return cumulative;
  }

  /**
   * P(k1 <= X <= k2)
   */
  cumulativeRange(k1: number, k2: number): number {
    validateNonNegativeInteger(k1, 'k1');
    validateNonNegativeInteger(k2, 'k2');
    validateLessEqual(k1, this.n);
    validateLessEqual(k2, this.n);
    validateLessEqual(k1, k2);

    let cumulative = 0;
    for (let i = k1; i <= k2; i++) {
      cumulative += this.probabilityK(i);
    }
    return cumulative;
  }

  /**
   * Full PMF table, k -> P(X = k) for k in [0, n]. Rebuilt on every access.
   */
  get distribution(): Map<number, number> {
    const table = new Map<number, number>();
    let total = 0;

    for (let k = 0; k <= this.n; k++) {
      const probability = this.probabilityK(k);
      table.set(k, probability);
      total += probability;
    }

    if (Math.abs(total - 1) > this.normalizationTolerance) {
      console.warn(
        `PMF of ${this.toString()} sums to ${total} - possible numerical issues`
      );
    }

    return table;
  }

  support(): { min: number; max: number } {
    return { min: 0, max: this.n };
  }

  getParameters(): BinomialParameters {
    return { n: this.n, p: this.p, q: this.q };
  }

  /**
   * One `P(X=k) = ...` line per outcome
   */
  formatDistribution(digits: number = this.displayDigits): string[] {
    validateDisplayDigits(digits);

    const lines: string[] = [];
    for (const [k, probability] of this.distribution) {
      lines.push(`P(X=${k}) = ${probability.toFixed(digits)}`);
    }
    return lines;
  }

  /**
   * Expected value, variance and skewness lines. Skewness reads `undefined`
   * for degenerate parameters.
   */
  formatStats(digits: number = this.displayDigits): string[] {
    validateDisplayDigits(digits);

    const skewness = this.variance === 0 ? 'undefined' : this.skewness.toFixed(digits);
    return [
      `Expected value (μ): ${this.expectedValue.toFixed(digits)}`,
      `Variance (σ²): ${this.variance.toFixed(digits)}`,
      `Skewness (γ₁): ${skewness}`,
    ];
  }

  printDistribution(): void {
    for (const line of this.formatDistribution()) {
      console.log(line);
    }
  }

  printStats(): void {
    for (const line of this.formatStats()) {
      console.log(line);
    }
  }

  toString(): string {
    return `Binomial experiment: n = ${this.n}, p = ${this.p.toFixed(2)}, q = ${this.q.toFixed(2)}`;
  }
}

/**
 * Factory function for Binomial distributions
 */
export function binomial(n: number, p: number, options?: BinomialOptions): BinomialDistribution {
  return new BinomialDistribution(n, p, options);
}

/**
 * Bernoulli distribution (Binomial with n=1)
 */
export function bernoulli(p: number, options?: BinomialOptions): BinomialDistribution {
  return binomial(1, p, options);
}
