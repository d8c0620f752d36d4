/**
 * Central Sinphasé cost formula. Bounded above by the reorganization ceiling;
 * no floor is applied, so negative inputs surface as negative cost.
 */

import { ARCHITECTURAL_REORGANIZATION_THRESHOLD } from "../model/constants.js";
import type { CostFactors } from "../model/costFactors.js";
import { calculateComplexityScore, type RepositoryMetrics } from "../model/repositoryMetrics.js";

export function calculateSinphaseCost(metrics: RepositoryMetrics, factors: CostFactors): number {
  const complexity = calculateComplexityScore(metrics);

  const baseCost =
    (metrics.starsCount / 1000.0) * factors.starsWeight +
    (metrics.commitsLast30Days / 100.0) * factors.commitActivityWeight +
    complexity * (factors.sizeWeight + factors.buildTimeWeight) +
    factors.testCoverageWeight * 1.0;

  const finalCost = baseCost * factors.manualBoost;

  if (finalCost > ARCHITECTURAL_REORGANIZATION_THRESHOLD) {
    return Math.min(finalCost, ARCHITECTURAL_REORGANIZATION_THRESHOLD);
  }
  return finalCost;
}

/** Display scale: clipped to the ceiling, ×100, one decimal. */
export function normalizeScore(rawScore: number): number {
  const clipped = Math.min(rawScore, ARCHITECTURAL_REORGANIZATION_THRESHOLD);
  return Math.round(clipped * 100 * 10) / 10;
}
