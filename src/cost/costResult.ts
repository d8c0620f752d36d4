/**
 * Per-repository outcome. The builder accepts exactly one calculation and
 * returns a frozen result with governance alerts and Sinphasé violations
 * evaluated against the universal thresholds (percent scale).
 */

import {
  ARCHITECTURAL_REORGANIZATION_THRESHOLD,
  GOVERNANCE_THRESHOLD,
  ISOLATION_THRESHOLD,
  NORMALIZATION_CEILING,
} from "../model/constants.js";
import { DEFAULT_COST_FACTORS, type CostFactors } from "../model/costFactors.js";
import type { Division, ProjectStatus } from "../model/divisions.js";
import { createRepositoryMetrics, type RepositoryMetrics } from "../model/repositoryMetrics.js";

export interface CostCalculationResult {
  readonly repository: string;
  readonly division: Division;
  readonly status: ProjectStatus;
  readonly calculatedScore: number;
  readonly normalizedScore: number;
  readonly governanceAlerts: readonly string[];
  readonly sinphaseViolations: readonly string[];
  readonly requiresIsolation: boolean;
  readonly rawMetrics: RepositoryMetrics;
  readonly costFactors: CostFactors;
}

export interface CostCalculationSubject {
  repository: string;
  division: Division;
  status: ProjectStatus;
  rawMetrics?: RepositoryMetrics;
  costFactors?: CostFactors;
  /** Isolation demanded by repository configuration, whatever the score. */
  isolationRequired?: boolean;
}

export class ResultAlreadySetError extends Error {
  constructor(repository: string) {
    super(`Calculation result already set for ${repository}`);
    this.name = "ResultAlreadySetError";
  }
}

const GOVERNANCE_PERCENT = GOVERNANCE_THRESHOLD * NORMALIZATION_CEILING;
const ISOLATION_PERCENT = ISOLATION_THRESHOLD * NORMALIZATION_CEILING;
const REORGANIZATION_PERCENT = ARCHITECTURAL_REORGANIZATION_THRESHOLD * NORMALIZATION_CEILING;

interface ThresholdOutcome {
  governanceAlerts: string[];
  sinphaseViolations: string[];
  requiresIsolation: boolean;
}

function evaluateThresholds(normalizedScore: number, alerts: readonly string[]): ThresholdOutcome {
  const governanceAlerts = [...alerts];
  const sinphaseViolations: string[] = [];
  let requiresIsolation = false;
  const shown = normalizedScore.toFixed(1);

  if (normalizedScore >= GOVERNANCE_PERCENT) {
    governanceAlerts.push(`Governance threshold exceeded: ${shown} >= ${GOVERNANCE_PERCENT}`);
  }
  if (normalizedScore >= ISOLATION_PERCENT) {
    sinphaseViolations.push(`Isolation threshold exceeded: ${shown} >= ${ISOLATION_PERCENT}`);
    requiresIsolation = true;
  }
  if (normalizedScore >= REORGANIZATION_PERCENT) {
    sinphaseViolations.push(`Architectural reorganization required: ${shown} >= ${REORGANIZATION_PERCENT}`);
  }

  return { governanceAlerts, sinphaseViolations, requiresIsolation };
}

export class CostCalculationResultBuilder {
  private readonly subject: CostCalculationSubject;
  private built = false;

  constructor(subject: CostCalculationSubject) {
    this.subject = subject;
  }

  setCalculationResult(
    rawScore: number,
    normalizedScore: number,
    alerts: readonly string[] = [],
  ): CostCalculationResult {
    if (this.built) throw new ResultAlreadySetError(this.subject.repository);
    this.built = true;

    const outcome = evaluateThresholds(normalizedScore, alerts);
    const rawMetrics = this.subject.rawMetrics ?? createRepositoryMetrics(this.subject.repository);

    return Object.freeze({
      repository: this.subject.repository,
      division: this.subject.division,
      status: this.subject.status,
      calculatedScore: rawScore,
      normalizedScore,
      governanceAlerts: Object.freeze(outcome.governanceAlerts),
      sinphaseViolations: Object.freeze(outcome.sinphaseViolations),
      requiresIsolation: outcome.requiresIsolation || this.subject.isolationRequired === true,
      rawMetrics: Object.freeze({ ...rawMetrics }),
      costFactors: this.subject.costFactors ?? DEFAULT_COST_FACTORS,
    });
  }
}
