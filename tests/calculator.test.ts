import { CostScoreCalculator } from "../src/cost/calculator.js";
import { getIsolationCandidates } from "../src/cost/organizationReport.js";
import { DEFAULT_COST_FACTORS } from "../src/model/costFactors.js";
import { DivisionMetadata } from "../src/model/divisionMetadata.js";
import type { Division } from "../src/model/divisions.js";
import { createRepositoryConfig } from "../src/model/repositoryConfig.js";
import { createRepositoryMetrics } from "../src/model/repositoryMetrics.js";

const sample = createRepositoryMetrics("svc", { starsCount: 25, commitsLast30Days: 15, sizeKb: 2840 });
const big = createRepositoryMetrics("big", { starsCount: 5000, commitsLast30Days: 200, sizeKb: 200000 });
const empty = createRepositoryMetrics("empty");
const now = new Date("2026-03-01T00:00:00.000Z");

describe("CostScoreCalculator.calculateRepositoryCost", () => {
  it("defaults to Computing with its 1.2 priority boost", () => {
    const r = new CostScoreCalculator().calculateRepositoryCost(sample);
    expect(r.division).toBe("Computing");
    expect(r.status).toBe("Active");
    expect(r.calculatedScore).toBeCloseTo(0.222816, 10);
    expect(r.normalizedScore).toBe(22.3);
    expect(r.governanceAlerts).toEqual([]);
    expect(r.rawMetrics).toEqual(sample);
  });

  it("a saturated repository trips every threshold", () => {
    const r = new CostScoreCalculator().calculateRepositoryCost(big);
    expect(r.calculatedScore).toBe(1);
    expect(r.governanceAlerts).toEqual([
      "Computing governance threshold exceeded: 1.00 >= 0.6",
      "Computing isolation threshold reached: 1.00 >= 0.8",
      "Governance threshold exceeded: 100.0 >= 60",
    ]);
    expect(r.sinphaseViolations).toHaveLength(2);
    expect(r.requiresIsolation).toBe(true);
  });

  it("manual override replaces the formula and is reported", () => {
    const config = createRepositoryConfig({ division: "UCHE Nnamdi", manualOverride: 0.5 });
    const r = new CostScoreCalculator().calculateRepositoryCost(sample, config);
    expect(r.calculatedScore).toBeCloseTo(0.75, 10);
    expect(r.normalizedScore).toBe(75);
    expect(r.governanceAlerts).toEqual([
      "Manual override applied: 0.50",
      "UCHE Nnamdi governance threshold exceeded: 0.75 >= 0.6",
      "Governance threshold exceeded: 75.0 >= 60",
    ]);
    expect(r.requiresIsolation).toBe(false);
  });

  it("out-of-bounds weights are scored but flagged", () => {
    const config = createRepositoryConfig({ costFactors: { ...DEFAULT_COST_FACTORS, starsWeight: 1.0 } });
    const r = new CostScoreCalculator().calculateRepositoryCost(empty, config);
    expect(r.governanceAlerts).toEqual(["Cost factor weights sum to 1.80, outside [0.8, 1.2]"]);
    expect(r.normalizedScore).toBe(12);
  });

  it("repository flags add alerts without changing the score", () => {
    const config = createRepositoryConfig({ isolationRequired: true, sinphaseCompliance: false });
    const r = new CostScoreCalculator().calculateRepositoryCost(empty, config);
    expect(r.governanceAlerts).toEqual([
      "Isolation required by repository configuration",
      "Explicit Sinphasé non-compliance declared",
    ]);
    expect(r.normalizedScore).toBe(12);
    expect(r.sinphaseViolations).toEqual([]);
  });

  it("configured isolation marks a low-scoring repository for isolation", () => {
    const config = createRepositoryConfig({ isolationRequired: true });
    const r = new CostScoreCalculator().calculateRepositoryCost(empty, config);
    expect(r.requiresIsolation).toBe(true);
  });

  it("uses configured division thresholds; compliance is strict", () => {
    const divisions = new Map<Division, DivisionMetadata>([
      ["TDA", new DivisionMetadata({ division: "TDA", governanceThreshold: 0.1, isolationThreshold: 0.5 })],
    ]);
    const r = new CostScoreCalculator(divisions).calculateRepositoryCost(empty, createRepositoryConfig({ division: "TDA" }));
    expect(r.governanceAlerts).toEqual(["TDA governance threshold exceeded: 0.10 >= 0.1"]);
    expect(r.normalizedScore).toBe(10);
  });
});

describe("CostScoreCalculator.analyzeOrganization", () => {
  const entries = [
    { metrics: sample },
    { metrics: big },
    { metrics: createRepositoryMetrics("lab"), config: createRepositoryConfig({ division: "UCHE Nnamdi", manualOverride: 0.5 }) },
  ];

  it("scores every entry and derives organization rates", () => {
    const report = new CostScoreCalculator().analyzeOrganization("acme", entries, { now, configHash: "abc123" });
    expect(report.organization).toBe("acme");
    expect(report.generationTimestamp).toBe("2026-03-01T00:00:00.000Z");
    expect(report.analyzedRepositories).toBe(3);
    expect(report.totalRepositories).toBe(3);
    expect(report.complianceRate).toBeCloseTo(1 / 3, 10);
    expect(report.sinphaseComplianceRate).toBeCloseTo(1 / 3, 10);
    expect(report.configHash).toBe("abc123");
    expect(Object.keys(report.divisionSummaries)).toEqual(["Computing", "UCHE Nnamdi"]);
  });

  it("division filter keeps the discovered total", () => {
    const report = new CostScoreCalculator().analyzeOrganization("acme", entries, {
      division: "Computing",
      totalRepositories: 5,
      now,
    });
    expect(report.repositoryScores.map((r) => r.repository)).toEqual(["svc", "big"]);
    expect(report.totalRepositories).toBe(5);
    expect(report.analyzedRepositories).toBe(2);
    expect(report.complianceRate).toBe(0.5);
    expect(report.sinphaseComplianceRate).toBe(0);

    const computing = report.divisionSummaries.Computing;
    expect(computing?.topRepositories).toEqual(["big", "svc"]);
    expect(computing?.governanceViolations).toBe(3);
    expect(computing?.isolationCandidates).toBe(1);
    expect(computing?.complianceRate).toBe(0.5);
    expect(computing?.statusDistribution).toEqual({ Active: 2 });
  });

  it("configured isolation makes an isolation candidate", () => {
    const report = new CostScoreCalculator().analyzeOrganization(
      "acme",
      [
        { metrics: sample },
        { metrics: createRepositoryMetrics("legacy"), config: createRepositoryConfig({ isolationRequired: true }) },
      ],
      { now },
    );
    expect(getIsolationCandidates(report).map((r) => r.repository)).toEqual(["legacy"]);
    expect(report.divisionSummaries.Computing?.isolationCandidates).toBe(1);
  });

  it("informational alerts do not count against compliance", () => {
    const config = createRepositoryConfig({ division: "TDA", manualOverride: 0.1 });
    const report = new CostScoreCalculator().analyzeOrganization(
      "acme",
      [{ metrics: createRepositoryMetrics("tools"), config }],
      { now },
    );
    const [result] = report.repositoryScores;
    expect(result?.governanceAlerts).toEqual(["Manual override applied: 0.10"]);
    expect(result?.normalizedScore).toBe(10);
    expect(report.complianceRate).toBe(1);
    expect(report.divisionSummaries.TDA?.complianceRate).toBe(1);
  });

  it("no entries yields an empty report with zero rates", () => {
    const report = new CostScoreCalculator().analyzeOrganization("acme", [], { now });
    expect(report.analyzedRepositories).toBe(0);
    expect(report.complianceRate).toBe(0);
    expect(report.divisionSummaries).toEqual({});
  });
});
