/**
 * Library-wide defaults
 */

/** Decimal places used by the formatting helpers */
export const DEFAULT_DISPLAY_DIGITS = 4;

/** Largest decimal place count the formatting helpers accept */
export const MAX_DISPLAY_DIGITS = 20;

/** Allowed |sum(PMF) - 1| before the distribution table warns */
export const DEFAULT_NORMALIZATION_TOLERANCE = 1e-9;
