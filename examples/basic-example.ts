/**
 * Basic example walking through the binomial-kit API
 *
 * Builds two distributions, prints their tables and summary statistics, and
 * queries exact, cumulative and ranged probabilities.
 */

import { BinomialDistribution, binomial } from '../src/index';

const SEPARATOR = '============================================';

/**
 * Example 1: fair coin, five tosses
 */
export function fairCoinExample(): BinomialDistribution {
  const coin = new BinomialDistribution(5, 0.5);

  console.log(coin.toString());
  coin.printDistribution();
  coin.printStats();

  console.log(SEPARATOR);

  console.log('Expected value is', coin.expectedValue);
  console.log('Variance is', coin.variance);
  console.log('Skewness is', coin.skewness);
  console.log('Distribution is', coin.distribution);

  console.log(SEPARATOR);

  console.log('Probability of exactly 4 successes is', coin.probabilityK(4));
  console.log('Cumulative probability up to 4 successes is', coin.cumulative(4));
  console.log('Cumulative probability from 2 to 3 successes is', coin.cumulativeRange(2, 3));

  return coin;
}

/**
 * Example 2: six trials at p = 0.25, read back through the PMF table
 */
export function pmfTableExample(): BinomialDistribution {
  const dist = binomial(6, 0.25);

  console.log(SEPARATOR);
  console.log(dist.toString());
  dist.printDistribution();
  dist.printStats();

  console.log(SEPARATOR);

  // The table and probabilityK agree
  const table = dist.distribution;
  console.log('Table:', table);
  console.log('Probability of exactly 2 successes is', table.get(2));
  console.log('Probability of exactly 2 successes is', dist.probabilityK(2));

  return dist;
}

export function runBasicExamples(): void {
  fairCoinExample();
  pmfTableExample();
}
