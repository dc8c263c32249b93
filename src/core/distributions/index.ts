/**
 * Distribution module
 */

export { BinomialDistribution, binomial, bernoulli } from './BinomialDistribution';
export type { BinomialOptions, BinomialParameters } from './BinomialDistribution';
