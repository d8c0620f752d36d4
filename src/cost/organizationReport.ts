/**
 * Organization-wide aggregation. Built once after every repository result is
 * materialized; functions return new reports rather than mutating.
 */

import { GOVERNANCE_THRESHOLD, NORMALIZATION_CEILING } from "../model/constants.js";
import type { Division, ProjectStatus } from "../model/divisions.js";
import { defaultDivisionMetadata, type DivisionMetadata } from "../model/divisionMetadata.js";
import type { CostCalculationResult } from "./costResult.js";

export const TOP_REPOSITORY_LIMIT = 5;

export interface DivisionSummary {
  division: Division;
  totalRepositories: number;
  averageCostScore: number;
  statusDistribution: Partial<Record<ProjectStatus, number>>;
  governanceViolations: number;
  isolationCandidates: number;
  topRepositories: string[];
  complianceRate: number;
}

export type DivisionSummaries = Partial<Record<Division, DivisionSummary>>;

export interface OrganizationCostReport {
  readonly organization: string;
  readonly generationTimestamp: string;
  readonly totalRepositories: number;
  readonly analyzedRepositories: number;
  readonly complianceRate: number;
  readonly sinphaseComplianceRate: number;
  readonly repositoryScores: readonly CostCalculationResult[];
  readonly divisionSummaries: DivisionSummaries;
  readonly configHash: string | null;
}

export interface OrganizationCostReportInit {
  organization: string;
  totalRepositories?: number;
  repositoryScores?: readonly CostCalculationResult[];
  divisionSummaries?: DivisionSummaries;
  complianceRate?: number;
  sinphaseComplianceRate?: number;
  configHash?: string | null;
  generatedAt?: Date;
}

export function createOrganizationCostReport(init: OrganizationCostReportInit): OrganizationCostReport {
  const scores = [...(init.repositoryScores ?? [])];
  return {
    organization: init.organization,
    generationTimestamp: (init.generatedAt ?? new Date()).toISOString(),
    totalRepositories: init.totalRepositories ?? scores.length,
    analyzedRepositories: scores.length,
    complianceRate: init.complianceRate ?? 0.0,
    sinphaseComplianceRate: init.sinphaseComplianceRate ?? 0.0,
    repositoryScores: scores,
    divisionSummaries: { ...(init.divisionSummaries ?? {}) },
    configHash: init.configHash ?? null,
  };
}

const GOVERNANCE_PERCENT = GOVERNANCE_THRESHOLD * NORMALIZATION_CEILING;

/**
 * Compliance is the share of results scored below the governance threshold;
 * informational alerts (overrides, weight bounds) do not count against it.
 * Sinphasé compliance is a violation density: each stacked violation counts,
 * so the rate may drop below zero. Empty reports are returned unchanged.
 */
export function calculateGovernanceMetrics(report: OrganizationCostReport): OrganizationCostReport {
  const scores = report.repositoryScores;
  if (scores.length === 0) return report;

  let violations = 0;
  let compliant = 0;
  for (const r of scores) {
    violations += r.sinphaseViolations.length;
    if (r.normalizedScore < GOVERNANCE_PERCENT) compliant++;
  }

  return {
    ...report,
    complianceRate: compliant / scores.length,
    sinphaseComplianceRate: 1 - violations / scores.length,
  };
}

export function getIsolationCandidates(report: OrganizationCostReport): CostCalculationResult[] {
  return report.repositoryScores.filter((r) => r.requiresIsolation);
}

function round1(x: number): number {
  return Math.round(x * 10) / 10;
}

/**
 * Group results by division (first-seen order) and summarize each group.
 * Divisions without metadata are evaluated with default thresholds.
 */
export function generateDivisionSummaries(
  results: readonly CostCalculationResult[],
  divisions: ReadonlyMap<Division, DivisionMetadata> = new Map(),
  now: Date = new Date(),
): DivisionSummaries {
  const groups = new Map<Division, CostCalculationResult[]>();
  for (const r of results) {
    const list = groups.get(r.division);
    if (list) list.push(r);
    else groups.set(r.division, [r]);
  }

  const summaries: DivisionSummaries = {};
  for (const [division, repos] of groups) {
    const total = repos.length;
    const statusDistribution: Partial<Record<ProjectStatus, number>> = {};
    let scoreSum = 0;
    let governanceViolations = 0;
    let isolationCandidates = 0;
    for (const r of repos) {
      scoreSum += r.normalizedScore;
      governanceViolations += r.governanceAlerts.length;
      if (r.requiresIsolation) isolationCandidates++;
      statusDistribution[r.status] = (statusDistribution[r.status] ?? 0) + 1;
    }

    const top = [...repos]
      .sort((a, b) => b.normalizedScore - a.normalizedScore)
      .slice(0, TOP_REPOSITORY_LIMIT)
      .map((r) => r.repository);

    const metadata = divisions.get(division) ?? defaultDivisionMetadata(division);
    const governance = metadata.generateGovernanceReport(
      repos.map((r) => ({ costScore: r.calculatedScore })),
      now,
    );

    summaries[division] = {
      division,
      totalRepositories: total,
      averageCostScore: round1(scoreSum / total),
      statusDistribution,
      governanceViolations,
      isolationCandidates,
      topRepositories: top,
      complianceRate: governance.complianceRate,
    };
  }
  return summaries;
}
