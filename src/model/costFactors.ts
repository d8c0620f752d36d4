/**
 * Cost factor weights. Bounds are checked on demand (validateCostBounds) so
 * experimental weight sets can still be scored; createCostFactors is the
 * strict path used by configuration loading.
 */

import { COST_WEIGHT_MAX, COST_WEIGHT_MIN } from "./constants.js";
import { createValidationError, type ValidationError } from "./validationError.js";

export interface CostFactors {
  readonly starsWeight: number;
  readonly commitActivityWeight: number;
  readonly buildTimeWeight: number;
  readonly sizeWeight: number;
  readonly testCoverageWeight: number;
  /** Multiplier on the weighted sum; not part of the weight bounds. */
  readonly manualBoost: number;
}

export const DEFAULT_COST_FACTORS: CostFactors = Object.freeze({
  starsWeight: 0.2,
  commitActivityWeight: 0.3,
  buildTimeWeight: 0.2,
  sizeWeight: 0.2,
  testCoverageWeight: 0.1,
  manualBoost: 1.0,
});

export const WEIGHT_KEYS = [
  "starsWeight",
  "commitActivityWeight",
  "buildTimeWeight",
  "sizeWeight",
  "testCoverageWeight",
] as const;

export type WeightKey = (typeof WEIGHT_KEYS)[number];

export type CostFactorsResult =
  | { ok: true; factors: CostFactors }
  | { ok: false; errors: ValidationError[] };

export function costWeightSum(factors: CostFactors): number {
  return (
    factors.starsWeight +
    factors.commitActivityWeight +
    factors.buildTimeWeight +
    factors.sizeWeight +
    factors.testCoverageWeight
  );
}

export function validateCostBounds(factors: CostFactors): boolean {
  const total = costWeightSum(factors);
  return total >= COST_WEIGHT_MIN && total <= COST_WEIGHT_MAX;
}

export interface CreateCostFactorsOptions {
  /**
   * Reject a weight sum outside [0.8, 1.2]. Configuration loading turns this
   * off and lets the calculator flag the sum as a governance alert instead.
   */
  enforceBounds?: boolean;
}

export function createCostFactors(
  overrides: Partial<CostFactors> = {},
  options: CreateCostFactorsOptions = {},
): CostFactorsResult {
  const factors: CostFactors = Object.freeze({ ...DEFAULT_COST_FACTORS, ...overrides });
  const errors: ValidationError[] = [];

  for (const key of WEIGHT_KEYS) {
    const w = factors[key];
    if (!Number.isFinite(w) || w < 0) {
      errors.push(
        createValidationError({ field: `costFactors.${key}`, message: "Weight must be a non-negative number", value: w }),
      );
    }
  }

  if (errors.length === 0 && options.enforceBounds !== false && !validateCostBounds(factors)) {
    const total = costWeightSum(factors);
    errors.push(
      createValidationError({
        field: "costFactors",
        message: `Total weight sum ${total.toFixed(2)} outside [${COST_WEIGHT_MIN}, ${COST_WEIGHT_MAX}]`,
        value: total,
      }),
    );
  }

  if (!Number.isFinite(factors.manualBoost) || factors.manualBoost <= 0) {
    errors.push(
      createValidationError({
        field: "costFactors.manualBoost",
        message: "Manual boost must be a positive number",
        value: factors.manualBoost,
      }),
    );
  }

  return errors.length === 0 ? { ok: true, factors } : { ok: false, errors };
}
