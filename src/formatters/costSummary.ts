/**
 * Plain-text renderings of an OrganizationCostReport for the console.
 * Deterministic for a given report; no colour codes.
 */

import { PROJECT_STATUSES } from "../model/divisions.js";
import type { CostCalculationResult } from "../cost/costResult.js";
import type { DivisionSummary, OrganizationCostReport } from "../cost/organizationReport.js";

function pct(rate: number): string {
  return (rate * 100).toFixed(1) + "%";
}

function countAlerts(results: readonly CostCalculationResult[]): { governance: number; sinphase: number } {
  let governance = 0;
  let sinphase = 0;
  for (const r of results) {
    governance += r.governanceAlerts.length;
    sinphase += r.sinphaseViolations.length;
  }
  return { governance, sinphase };
}

/** Render rows as left-aligned columns separated by two spaces; numeric columns right-aligned. */
export function renderTable(header: string[], rows: string[][], rightAligned: ReadonlySet<number> = new Set()): string {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const line = (cells: string[]): string =>
    cells
      .map((c, i) => {
        const w = widths[i] ?? c.length;
        return rightAligned.has(i) ? c.padStart(w) : c.padEnd(w);
      })
      .join("  ")
      .trimEnd();
  return [line(header), ...rows.map(line)].join("\n");
}

function summaries(report: OrganizationCostReport): DivisionSummary[] {
  return Object.values(report.divisionSummaries).filter((s): s is DivisionSummary => s !== undefined);
}

export function formatAnalysisSummary(
  report: OrganizationCostReport,
  options: { outputPath?: string; verbose?: boolean } = {},
): string {
  const { governance, sinphase } = countAlerts(report.repositoryScores);
  const lines = [
    `Organization: ${report.organization}`,
    `Total Repositories: ${report.totalRepositories}`,
    `Analyzed: ${report.analyzedRepositories}`,
    `Governance Alerts: ${governance}`,
    `Sinphasé Violations: ${sinphase}`,
    `Compliance Rate: ${pct(report.complianceRate)}`,
    `Sinphasé Compliance Rate: ${pct(report.sinphaseComplianceRate)}`,
  ];
  if (options.outputPath) lines.push(`Output: ${options.outputPath}`);

  const divisions = summaries(report);
  if (options.verbose && divisions.length > 0) {
    lines.push("", "Division Breakdown:");
    lines.push(
      renderTable(
        ["Division", "Repositories", "Avg Score", "Alerts"],
        divisions.map((s) => [
          s.division,
          String(s.totalRepositories),
          s.averageCostScore.toFixed(1),
          String(s.governanceViolations),
        ]),
        new Set([1, 2, 3]),
      ),
    );
  }
  return lines.join("\n");
}

function flag(r: CostCalculationResult): string {
  if (r.requiresIsolation) return "ISOLATE";
  if (r.governanceAlerts.length > 0) return "ALERT";
  return "";
}

/** Repositories by normalized score, highest first. */
export function formatRepositoryTable(report: OrganizationCostReport, verbose = false): string {
  const sorted = [...report.repositoryScores].sort((a, b) => b.normalizedScore - a.normalizedScore);
  const header = ["Repository", "Division", "Status", "Score"];
  if (verbose) header.push("Stars", "Commits", "Alerts");
  header.push("Flag");

  const rows = sorted.map((r) => {
    const row = [r.repository, r.division, r.status, r.normalizedScore.toFixed(1)];
    if (verbose) {
      row.push(
        String(r.rawMetrics.starsCount),
        String(r.rawMetrics.commitsLast30Days),
        String(r.governanceAlerts.length + r.sinphaseViolations.length),
      );
    }
    row.push(flag(r));
    return row;
  });

  const right = verbose ? new Set([3, 4, 5, 6]) : new Set([3]);
  return renderTable(header, rows, right);
}

export function formatDivisionSummary(report: OrganizationCostReport): string {
  const blocks = summaries(report).map((s) => {
    const lines = [
      `${s.division} Division`,
      `  Repositories: ${s.totalRepositories}`,
      `  Average Score: ${s.averageCostScore.toFixed(1)}`,
      `  Governance Issues: ${s.governanceViolations}`,
      `  Isolation Candidates: ${s.isolationCandidates}`,
      `  Compliance Rate: ${pct(s.complianceRate)}`,
    ];
    const statuses = PROJECT_STATUSES.filter((st) => (s.statusDistribution[st] ?? 0) > 0).map(
      (st) => `${st} ${s.statusDistribution[st] ?? 0}`,
    );
    if (statuses.length > 0) lines.push(`  Status: ${statuses.join(", ")}`);
    if (s.topRepositories.length > 0) {
      lines.push("  Top Projects:");
      for (const name of s.topRepositories) lines.push(`    ${name}`);
    }
    return lines.join("\n");
  });
  return blocks.length > 0 ? blocks.join("\n\n") : "No division summaries.";
}

export function formatTechnicalDuration(seconds: number): string {
  if (seconds < 1) return `${(seconds * 1000).toFixed(0)}ms`;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  if (seconds < 3600) {
    const minutes = Math.floor(seconds / 60);
    return `${minutes}m ${(seconds % 60).toFixed(0)}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}
