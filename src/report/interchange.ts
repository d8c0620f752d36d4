/**
 * Interchange form of OrganizationCostReport (cost_scores.json). Field names
 * are the documented contract for dashboards and CI gates; do not rename.
 */

import type { CostFactors } from "../model/costFactors.js";
import { isDivision, isProjectStatus, type Division, type ProjectStatus } from "../model/divisions.js";
import type { RepositoryMetrics } from "../model/repositoryMetrics.js";
import type { CostCalculationResult } from "../cost/costResult.js";
import type { DivisionSummaries, DivisionSummary, OrganizationCostReport } from "../cost/organizationReport.js";
import { isRecord } from "../config/sinphaseYaml.js";
import { stableStringify } from "../config/hash.js";

export interface RawMetricsJson {
  name: string;
  full_name: string;
  stars_count: number;
  commits_last_30_days: number;
  size_kb: number;
  build_time_minutes: number | null;
  test_coverage_percent: number | null;
  primary_language: string | null;
  is_archived: boolean;
  is_fork: boolean;
}

export interface CostFactorsJson {
  stars_weight: number;
  commit_activity_weight: number;
  build_time_weight: number;
  size_weight: number;
  test_coverage_weight: number;
  manual_boost: number;
}

export interface RepositoryScoreJson {
  repository: string;
  division: Division;
  status: ProjectStatus;
  calculated_score: number;
  normalized_score: number;
  governance_alerts: string[];
  sinphase_violations: string[];
  requires_isolation: boolean;
  raw_metrics: RawMetricsJson;
  cost_factors: CostFactorsJson;
}

export interface DivisionSummaryJson {
  division: Division;
  total_repositories: number;
  average_cost_score: number;
  status_distribution: Partial<Record<ProjectStatus, number>>;
  governance_violations: number;
  isolation_candidates: number;
  top_repositories: string[];
  compliance_rate: number;
}

export interface OrganizationCostReportJson {
  organization: string;
  generation_timestamp: string;
  total_repositories: number;
  analyzed_repositories: number;
  compliance_rate: number;
  sinphase_compliance_rate: number;
  config_hash: string | null;
  repository_scores: RepositoryScoreJson[];
  division_summaries: Partial<Record<Division, DivisionSummaryJson>>;
}

function metricsToJson(m: RepositoryMetrics): RawMetricsJson {
  return {
    name: m.name,
    full_name: m.fullName,
    stars_count: m.starsCount,
    commits_last_30_days: m.commitsLast30Days,
    size_kb: m.sizeKb,
    build_time_minutes: m.buildTimeMinutes,
    test_coverage_percent: m.testCoveragePercent,
    primary_language: m.primaryLanguage,
    is_archived: m.isArchived,
    is_fork: m.isFork,
  };
}

function factorsToJson(f: CostFactors): CostFactorsJson {
  return {
    stars_weight: f.starsWeight,
    commit_activity_weight: f.commitActivityWeight,
    build_time_weight: f.buildTimeWeight,
    size_weight: f.sizeWeight,
    test_coverage_weight: f.testCoverageWeight,
    manual_boost: f.manualBoost,
  };
}

function scoreToJson(r: CostCalculationResult): RepositoryScoreJson {
  return {
    repository: r.repository,
    division: r.division,
    status: r.status,
    calculated_score: r.calculatedScore,
    normalized_score: r.normalizedScore,
    governance_alerts: [...r.governanceAlerts],
    sinphase_violations: [...r.sinphaseViolations],
    requires_isolation: r.requiresIsolation,
    raw_metrics: metricsToJson(r.rawMetrics),
    cost_factors: factorsToJson(r.costFactors),
  };
}

function summaryToJson(s: DivisionSummary): DivisionSummaryJson {
  return {
    division: s.division,
    total_repositories: s.totalRepositories,
    average_cost_score: s.averageCostScore,
    status_distribution: { ...s.statusDistribution },
    governance_violations: s.governanceViolations,
    isolation_candidates: s.isolationCandidates,
    top_repositories: [...s.topRepositories],
    compliance_rate: s.complianceRate,
  };
}

export function toInterchange(report: OrganizationCostReport): OrganizationCostReportJson {
  const divisionSummaries: Partial<Record<Division, DivisionSummaryJson>> = {};
  for (const s of Object.values(report.divisionSummaries)) {
    if (s) divisionSummaries[s.division] = summaryToJson(s);
  }
  return {
    organization: report.organization,
    generation_timestamp: report.generationTimestamp,
    total_repositories: report.totalRepositories,
    analyzed_repositories: report.analyzedRepositories,
    compliance_rate: report.complianceRate,
    sinphase_compliance_rate: report.sinphaseComplianceRate,
    config_hash: report.configHash,
    repository_scores: report.repositoryScores.map(scoreToJson),
    division_summaries: divisionSummaries,
  };
}

/** Key-sorted single-line JSON with trailing newline. */
export function serializeReport(report: OrganizationCostReport): string {
  return stableStringify(toInterchange(report)) + "\n";
}

class Reader {
  constructor(private readonly source: string) {}

  fail(path: string, expected: string): never {
    throw new Error(`${this.source}: ${path} must be ${expected}`);
  }

  record(v: unknown, path: string): Record<string, unknown> {
    return isRecord(v) ? v : this.fail(path, "an object");
  }

  num(obj: Record<string, unknown>, key: string, path: string): number {
    const v = obj[key];
    return typeof v === "number" && Number.isFinite(v) ? v : this.fail(`${path}.${key}`, "a number");
  }

  numOrNull(obj: Record<string, unknown>, key: string, path: string): number | null {
    return obj[key] === null || obj[key] === undefined ? null : this.num(obj, key, path);
  }

  str(obj: Record<string, unknown>, key: string, path: string): string {
    const v = obj[key];
    return typeof v === "string" ? v : this.fail(`${path}.${key}`, "a string");
  }

  strOrNull(obj: Record<string, unknown>, key: string, path: string): string | null {
    return obj[key] === null || obj[key] === undefined ? null : this.str(obj, key, path);
  }

  bool(obj: Record<string, unknown>, key: string, path: string): boolean {
    const v = obj[key];
    return typeof v === "boolean" ? v : this.fail(`${path}.${key}`, "a boolean");
  }

  strings(obj: Record<string, unknown>, key: string, path: string): string[] {
    const v = obj[key];
    if (!Array.isArray(v)) return this.fail(`${path}.${key}`, "an array of strings");
    return v.map((x, i) => (typeof x === "string" ? x : this.fail(`${path}.${key}[${i}]`, "a string")));
  }

  division(obj: Record<string, unknown>, path: string): Division {
    const v = obj.division;
    return isDivision(v) ? v : this.fail(`${path}.division`, "a known division");
  }

  status(obj: Record<string, unknown>, path: string): ProjectStatus {
    const v = obj.status;
    return isProjectStatus(v) ? v : this.fail(`${path}.status`, "a known project status");
  }
}

function readMetrics(rd: Reader, raw: unknown, path: string): RepositoryMetrics {
  const o = rd.record(raw, path);
  return Object.freeze({
    name: rd.str(o, "name", path),
    fullName: rd.str(o, "full_name", path),
    starsCount: rd.num(o, "stars_count", path),
    commitsLast30Days: rd.num(o, "commits_last_30_days", path),
    sizeKb: rd.num(o, "size_kb", path),
    buildTimeMinutes: rd.numOrNull(o, "build_time_minutes", path),
    testCoveragePercent: rd.numOrNull(o, "test_coverage_percent", path),
    primaryLanguage: rd.strOrNull(o, "primary_language", path),
    isArchived: rd.bool(o, "is_archived", path),
    isFork: rd.bool(o, "is_fork", path),
  });
}

function readFactors(rd: Reader, raw: unknown, path: string): CostFactors {
  const o = rd.record(raw, path);
  return Object.freeze({
    starsWeight: rd.num(o, "stars_weight", path),
    commitActivityWeight: rd.num(o, "commit_activity_weight", path),
    buildTimeWeight: rd.num(o, "build_time_weight", path),
    sizeWeight: rd.num(o, "size_weight", path),
    testCoverageWeight: rd.num(o, "test_coverage_weight", path),
    manualBoost: rd.num(o, "manual_boost", path),
  });
}

function readScore(rd: Reader, raw: unknown, path: string): CostCalculationResult {
  const o = rd.record(raw, path);
  return Object.freeze({
    repository: rd.str(o, "repository", path),
    division: rd.division(o, path),
    status: rd.status(o, path),
    calculatedScore: rd.num(o, "calculated_score", path),
    normalizedScore: rd.num(o, "normalized_score", path),
    governanceAlerts: Object.freeze(rd.strings(o, "governance_alerts", path)),
    sinphaseViolations: Object.freeze(rd.strings(o, "sinphase_violations", path)),
    requiresIsolation: rd.bool(o, "requires_isolation", path),
    rawMetrics: readMetrics(rd, o.raw_metrics, `${path}.raw_metrics`),
    costFactors: readFactors(rd, o.cost_factors, `${path}.cost_factors`),
  });
}

function readSummary(rd: Reader, raw: unknown, path: string): DivisionSummary {
  const o = rd.record(raw, path);
  const dist = rd.record(o.status_distribution, `${path}.status_distribution`);
  const statusDistribution: Partial<Record<ProjectStatus, number>> = {};
  for (const [k, v] of Object.entries(dist)) {
    if (!isProjectStatus(k)) rd.fail(`${path}.status_distribution.${k}`, "a known project status");
    else statusDistribution[k] = typeof v === "number" ? v : rd.fail(`${path}.status_distribution.${k}`, "a number");
  }
  return {
    division: rd.division(o, path),
    totalRepositories: rd.num(o, "total_repositories", path),
    averageCostScore: rd.num(o, "average_cost_score", path),
    statusDistribution,
    governanceViolations: rd.num(o, "governance_violations", path),
    isolationCandidates: rd.num(o, "isolation_candidates", path),
    topRepositories: rd.strings(o, "top_repositories", path),
    complianceRate: rd.num(o, "compliance_rate", path),
  };
}

/** Validate a parsed cost_scores.json document and rebuild the report. */
export function parseInterchange(raw: unknown, source = "report"): OrganizationCostReport {
  const rd = new Reader(source);
  const o = rd.record(raw, "$");

  const scoresRaw: unknown[] = Array.isArray(o.repository_scores)
    ? o.repository_scores
    : rd.fail("$.repository_scores", "an array");
  const repositoryScores = scoresRaw.map((s, i) => readScore(rd, s, `$.repository_scores[${i}]`));

  const divisionSummaries: DivisionSummaries = {};
  const summariesRaw = rd.record(o.division_summaries ?? {}, "$.division_summaries");
  for (const [k, v] of Object.entries(summariesRaw)) {
    const summary = readSummary(rd, v, `$.division_summaries.${k}`);
    divisionSummaries[summary.division] = summary;
  }

  return {
    organization: rd.str(o, "organization", "$"),
    generationTimestamp: rd.str(o, "generation_timestamp", "$"),
    totalRepositories: rd.num(o, "total_repositories", "$"),
    analyzedRepositories: rd.num(o, "analyzed_repositories", "$"),
    complianceRate: rd.num(o, "compliance_rate", "$"),
    sinphaseComplianceRate: rd.num(o, "sinphase_compliance_rate", "$"),
    repositoryScores,
    divisionSummaries,
    configHash: rd.strOrNull(o, "config_hash", "$"),
  };
}
