/**
 * Universal Sinphasé ceilings. Per-division thresholds may be stricter,
 * never looser than the reorganization ceiling.
 */

export const GOVERNANCE_THRESHOLD = 0.6;
export const ISOLATION_THRESHOLD = 0.8;
export const ARCHITECTURAL_REORGANIZATION_THRESHOLD = 1.0;

/** Accepted range for the sum of the five cost weights (nominal 1.0). */
export const COST_WEIGHT_MIN = 0.8;
export const COST_WEIGHT_MAX = 1.2;

export const PRIORITY_BOOST_MIN = 0.1;
export const PRIORITY_BOOST_MAX = 3.0;

/** Clip ceilings for the complexity sub-scores. */
export const SIZE_CEILING_KB = 100000;
export const COMMIT_CEILING = 100;

/** Scale applied to scores for display and threshold evaluation. */
export const NORMALIZATION_CEILING = 100;
