/**
 * Repository scoring pipeline: formula → division boost → threshold
 * evaluation, then a single gather pass for the organization report.
 */

import { COST_WEIGHT_MAX, COST_WEIGHT_MIN } from "../model/constants.js";
import { costWeightSum, validateCostBounds } from "../model/costFactors.js";
import { DEFAULT_DIVISION, type Division } from "../model/divisions.js";
import { defaultDivisionMetadata, type DivisionMetadata } from "../model/divisionMetadata.js";
import { createRepositoryConfig, type RepositoryConfig } from "../model/repositoryConfig.js";
import type { RepositoryMetrics } from "../model/repositoryMetrics.js";
import { CostCalculationResultBuilder, type CostCalculationResult } from "./costResult.js";
import {
  calculateGovernanceMetrics,
  createOrganizationCostReport,
  generateDivisionSummaries,
  type OrganizationCostReport,
} from "./organizationReport.js";
import { calculateSinphaseCost, normalizeScore } from "./sinphaseCost.js";

export interface RepositoryEntry {
  metrics: RepositoryMetrics;
  config?: RepositoryConfig | null;
}

export interface AnalyzeOrganizationOptions {
  /** Only score repositories assigned to this division. */
  division?: Division | null;
  /** Repositories discovered, including those filtered out. Defaults to entries.length. */
  totalRepositories?: number;
  configHash?: string | null;
  now?: Date;
}

export class CostScoreCalculator {
  private readonly divisions = new Map<Division, DivisionMetadata>();

  constructor(divisions: ReadonlyMap<Division, DivisionMetadata> = new Map()) {
    for (const [k, v] of divisions) this.divisions.set(k, v);
  }

  divisionMetadata(division: Division): DivisionMetadata {
    let metadata = this.divisions.get(division);
    if (!metadata) {
      metadata = defaultDivisionMetadata(division);
      this.divisions.set(division, metadata);
    }
    return metadata;
  }

  calculateRepositoryCost(metrics: RepositoryMetrics, config?: RepositoryConfig | null): CostCalculationResult {
    const effective = config ?? createRepositoryConfig();
    const division = this.divisionMetadata(effective.division);
    const alerts: string[] = [];

    if (!validateCostBounds(effective.costFactors)) {
      const total = costWeightSum(effective.costFactors);
      alerts.push(`Cost factor weights sum to ${total.toFixed(2)}, outside [${COST_WEIGHT_MIN}, ${COST_WEIGHT_MAX}]`);
    }

    let raw = calculateSinphaseCost(metrics, effective.costFactors);
    if (effective.manualOverride !== null) {
      raw = effective.manualOverride;
      alerts.push(`Manual override applied: ${raw.toFixed(2)}`);
    }
    const score = division.applyPriorityBoost(raw);

    if (!division.isGovernanceCompliant(score)) {
      alerts.push(
        `${effective.division} governance threshold exceeded: ${score.toFixed(2)} >= ${division.governanceThreshold}`,
      );
    }
    if (division.requiresIsolation(score)) {
      alerts.push(
        `${effective.division} isolation threshold reached: ${score.toFixed(2)} >= ${division.isolationThreshold}`,
      );
    }
    if (effective.isolationRequired) alerts.push("Isolation required by repository configuration");
    if (!effective.sinphaseCompliance) alerts.push("Explicit Sinphasé non-compliance declared");

    const builder = new CostCalculationResultBuilder({
      repository: metrics.name,
      division: effective.division,
      status: effective.status,
      rawMetrics: metrics,
      costFactors: effective.costFactors,
      isolationRequired: effective.isolationRequired,
    });
    return builder.setCalculationResult(score, normalizeScore(score), alerts);
  }

  analyzeOrganization(
    organization: string,
    entries: readonly RepositoryEntry[],
    options: AnalyzeOrganizationOptions = {},
  ): OrganizationCostReport {
    const filter = options.division ?? null;
    const now = options.now ?? new Date();

    const results = entries
      .filter((e) => filter === null || (e.config?.division ?? DEFAULT_DIVISION) === filter)
      .map((e) => this.calculateRepositoryCost(e.metrics, e.config));

    const report = createOrganizationCostReport({
      organization,
      totalRepositories: options.totalRepositories ?? entries.length,
      repositoryScores: results,
      divisionSummaries: generateDivisionSummaries(results, this.divisions, now),
      configHash: options.configHash ?? null,
      generatedAt: now,
    });
    return calculateGovernanceMetrics(report);
  }
}
