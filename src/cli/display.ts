/**
 * sinphase display: render a previously written cost_scores.json.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import type { Division } from "../model/divisions.js";
import { formatDivisionSummary, formatRepositoryTable } from "../formatters/costSummary.js";
import { parseInterchange, toInterchange } from "../report/interchange.js";
import type { OrganizationCostReport } from "../cost/organizationReport.js";
import { DEFAULT_REPORT_PATH } from "./analyze.js";

export const DISPLAY_FORMATS = ["table", "json", "summary"] as const;

export type DisplayFormat = (typeof DISPLAY_FORMATS)[number];

export function isDisplayFormat(value: unknown): value is DisplayFormat {
  return typeof value === "string" && DISPLAY_FORMATS.some((f) => f === value);
}

export interface DisplayOptions {
  input?: string | null;
  division?: Division | null;
  format?: DisplayFormat;
  verbose?: boolean;
}

function filterDivision(report: OrganizationCostReport, division: Division): OrganizationCostReport {
  const summary = report.divisionSummaries[division];
  return {
    ...report,
    repositoryScores: report.repositoryScores.filter((r) => r.division === division),
    divisionSummaries: summary ? { [division]: summary } : {},
  };
}

/** Returns exit code: 0 rendered, 1 unreadable or invalid report. */
export function runDisplay(cwd: string, options: DisplayOptions): number {
  const input = options.input ?? process.env.SINPHASE_REPORT_PATH ?? DEFAULT_REPORT_PATH;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolve(cwd, input), "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`sinphase display: cannot read report ${input}: ${msg}`);
    return 1;
  }

  let report: OrganizationCostReport;
  try {
    report = parseInterchange(raw, input);
  } catch (err) {
    console.error(`sinphase display: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  if (options.division) report = filterDivision(report, options.division);

  switch (options.format ?? "table") {
    case "json":
      console.log(JSON.stringify(toInterchange(report), null, 2));
      break;
    case "summary":
      console.log(formatDivisionSummary(report));
      break;
    case "table":
      console.log(formatRepositoryTable(report, options.verbose === true));
      break;
  }
  return 0;
}
