import { CostCalculationResultBuilder, type CostCalculationResult } from "../src/cost/costResult.js";
import {
  calculateGovernanceMetrics,
  createOrganizationCostReport,
  generateDivisionSummaries,
} from "../src/cost/organizationReport.js";
import {
  formatAnalysisSummary,
  formatDivisionSummary,
  formatRepositoryTable,
  formatTechnicalDuration,
  renderTable,
} from "../src/formatters/costSummary.js";
import type { Division, ProjectStatus } from "../src/model/divisions.js";

function scored(repository: string, normalized: number, division: Division, status: ProjectStatus): CostCalculationResult {
  return new CostCalculationResultBuilder({ repository, division, status }).setCalculationResult(
    normalized / 100,
    normalized,
  );
}

const now = new Date("2026-03-01T00:00:00.000Z");
const alpha = scored("a", 85, "Computing", "Active");
const results = [scored("b", 10, "TDA", "Core"), alpha];
const report = calculateGovernanceMetrics(
  createOrganizationCostReport({
    organization: "acme",
    repositoryScores: results,
    divisionSummaries: generateDivisionSummaries(results, new Map(), now),
    generatedAt: now,
  }),
);

describe("renderTable", () => {
  it("pads columns and right-aligns numeric ones", () => {
    expect(renderTable(["A", "Num"], [["x", "5"], ["long", "12"]], new Set([1]))).toBe("A     Num\nx       5\nlong   12");
  });
});

describe("formatAnalysisSummary", () => {
  it("lists totals and rates", () => {
    expect(formatAnalysisSummary(report, { outputPath: "out.json" })).toBe(
      [
        "Organization: acme",
        "Total Repositories: 2",
        "Analyzed: 2",
        "Governance Alerts: 1",
        "Sinphasé Violations: 1",
        "Compliance Rate: 50.0%",
        "Sinphasé Compliance Rate: 50.0%",
        "Output: out.json",
      ].join("\n"),
    );
  });

  it("verbose adds the division breakdown", () => {
    const text = formatAnalysisSummary(report, { verbose: true });
    expect(text.split("\n").slice(-4)).toEqual([
      "Division Breakdown:",
      "Division   Repositories  Avg Score  Alerts",
      "TDA                   1       10.0       0",
      "Computing             1       85.0       1",
    ]);
  });
});

describe("formatRepositoryTable", () => {
  it("sorts by score and flags isolation", () => {
    expect(formatRepositoryTable(report)).toBe(
      [
        "Repository  Division   Status  Score  Flag",
        "a           Computing  Active   85.0  ISOLATE",
        "b           TDA        Core     10.0",
      ].join("\n"),
    );
  });

  it("verbose adds metric columns", () => {
    const lines = formatRepositoryTable(report, true).split("\n");
    expect(lines[0]).toBe("Repository  Division   Status  Score  Stars  Commits  Alerts  Flag");
    expect(lines[1]).toBe("a           Computing  Active   85.0      0        0       2  ISOLATE");
  });
});

describe("formatDivisionSummary", () => {
  it("renders one block per division", () => {
    const single = createOrganizationCostReport({
      organization: "acme",
      divisionSummaries: generateDivisionSummaries([alpha], new Map(), now),
    });
    expect(formatDivisionSummary(single)).toBe(
      [
        "Computing Division",
        "  Repositories: 1",
        "  Average Score: 85.0",
        "  Governance Issues: 1",
        "  Isolation Candidates: 1",
        "  Compliance Rate: 0.0%",
        "  Status: Active 1",
        "  Top Projects:",
        "    a",
      ].join("\n"),
    );
  });

  it("says so when there is nothing to show", () => {
    expect(formatDivisionSummary(createOrganizationCostReport({ organization: "acme" }))).toBe("No division summaries.");
  });
});

describe("formatTechnicalDuration", () => {
  it("picks a unit by magnitude", () => {
    expect(formatTechnicalDuration(0.25)).toBe("250ms");
    expect(formatTechnicalDuration(12.34)).toBe("12.3s");
    expect(formatTechnicalDuration(125)).toBe("2m 5s");
    expect(formatTechnicalDuration(3725)).toBe("1h 2m");
  });
});
