/**
 * binomial-kit - exact combinatorics and the binomial distribution
 *
 * Factorials and binomial coefficients on bigint, plus an immutable
 * BinomialDistribution exposing PMF, CDF and summary statistics.
 */

// Error handling
export { ProbabilityError, ErrorCode, isProbabilityError } from './core/errors';

// Argument guards
export {
  validateNonNegativeInteger,
  validateLessEqual,
  validateProbability,
} from './core/validation';

// Mathematical utilities
export { factorial, combinations } from './core/utils/math/combinatorics';
export { logFactorial, logBinomial } from './core/utils/math/special';

// Distributions
export { BinomialDistribution, binomial, bernoulli } from './core/distributions';
export type { BinomialOptions, BinomialParameters } from './core/distributions';

// Configuration defaults
export {
  DEFAULT_DISPLAY_DIGITS,
  DEFAULT_NORMALIZATION_TOLERANCE,
  MAX_DISPLAY_DIGITS,
} from './core/defaults';

// Version
export const VERSION = '0.1.0';
