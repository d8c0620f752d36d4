/**
 * sinphase analyze: collect metrics for an organization, score every
 * repository, write cost_scores.json. Returns an exit code (0 ok, 1 runtime
 * failure, 2 invalid configuration or arguments); never throws.
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { CostScoreCalculator, type RepositoryEntry } from "../cost/calculator.js";
import { generateConfigHash } from "../config/hash.js";
import {
  isStrictValidation,
  loadConfigDocument,
  loadCostFactors,
  loadDivisionConfig,
  validateConfig,
  type ConfigDocument,
} from "../config/sinphaseYaml.js";
import { formatAnalysisSummary, formatTechnicalDuration } from "../formatters/costSummary.js";
import {
  collectOrganizationMetrics,
  createGitHubMetricsSource,
  fetchRepositoryConfig,
  type GitHubMetricsSource,
} from "../github/metrics.js";
import type { Division } from "../model/divisions.js";
import { createRepositoryConfig } from "../model/repositoryConfig.js";
import { formatValidationError, hasBlockingErrors, type ValidationError } from "../model/validationError.js";
import { serializeReport } from "../report/interchange.js";

export const DEFAULT_REPORT_PATH = "artifacts/cost_scores.json";

export interface AnalyzeOptions {
  org: string;
  token?: string | null;
  output?: string | null;
  division?: Division | null;
  configPath?: string | null;
  validateOnly?: boolean;
  includeArchived?: boolean;
  verbose?: boolean;
  now?: Date;
}

const PREFIX = "sinphase analyze:";

function reportWarnings(errors: readonly ValidationError[]): void {
  for (const e of errors) console.error(`${PREFIX} ${formatValidationError(e)}`);
}

export async function runAnalyze(
  cwd: string,
  options: AnalyzeOptions,
  source?: GitHubMetricsSource,
): Promise<number> {
  const started = Date.now();
  const verbose = options.verbose === true;
  const phase = (msg: string): void => {
    if (verbose) console.log(`${PREFIX} ${msg}`);
  };

  phase("phase 1: configuration validation");
  let doc: ConfigDocument;
  try {
    doc = loadConfigDocument(cwd, options.configPath);
  } catch (err) {
    console.error(`${PREFIX} ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }
  phase(`configuration source: ${doc.source}`);

  const configErrors = doc.source === "default" ? [] : validateConfig(doc.data);
  reportWarnings(configErrors);
  if (hasBlockingErrors(configErrors) || (isStrictValidation(doc.data) && configErrors.length > 0)) {
    console.error(`${PREFIX} configuration invalid (${configErrors.length} issue(s))`);
    return 2;
  }

  const { divisions, skipped } = loadDivisionConfig(doc.data);
  reportWarnings(skipped);
  const orgFactors = loadCostFactors(doc.data.cost_factors);
  if (!orgFactors.ok) {
    reportWarnings(orgFactors.errors);
    console.error(`${PREFIX} cost_factors invalid`);
    return 2;
  }

  let metricsSource = source;
  if (!metricsSource) {
    const token = options.token ?? process.env.GH_API_TOKEN ?? process.env.GITHUB_TOKEN ?? null;
    if (!token) {
      console.error(`${PREFIX} GitHub API token required (set GH_API_TOKEN or pass --token)`);
      return 1;
    }
    metricsSource = createGitHubMetricsSource(token);
  }

  try {
    phase("phase 2: repository discovery");
    const collected = await collectOrganizationMetrics(metricsSource, options.org, {
      includeArchived: options.includeArchived === true,
      now: options.now,
    });
    for (const f of collected.failures) {
      console.error(`${PREFIX} metrics failed for ${f.repository}: ${f.message}`);
    }
    phase(`discovered ${collected.discovered} repositories`);

    if (options.validateOnly) {
      console.log(`${PREFIX} validation checkpoint passed (${collected.repositories.length} repositories reachable)`);
      return 0;
    }

    phase("phase 3: cost analysis");
    const src = metricsSource;
    const entries: RepositoryEntry[] = await Promise.all(
      collected.repositories.map(async (metrics) => {
        const fallback = createRepositoryConfig({ costFactors: orgFactors.factors });
        try {
          const loaded = await fetchRepositoryConfig(src, options.org, metrics.name, orgFactors.factors);
          if (loaded) reportWarnings(loaded.warnings);
          return { metrics, config: loaded?.config ?? fallback };
        } catch (err) {
          const msg = err instanceof Error ? err.message : String(err);
          console.error(`${PREFIX} repository config unavailable for ${metrics.name}: ${msg}; using organization defaults`);
          return { metrics, config: fallback };
        }
      }),
    );

    phase("phase 4: report generation");
    const calculator = new CostScoreCalculator(divisions);
    const report = calculator.analyzeOrganization(options.org, entries, {
      division: options.division ?? null,
      totalRepositories: collected.discovered,
      configHash: generateConfigHash(doc.data),
      now: options.now,
    });

    const outputPath = options.output ?? process.env.SINPHASE_REPORT_PATH ?? DEFAULT_REPORT_PATH;
    const absOutput = resolve(cwd, outputPath);
    mkdirSync(dirname(absOutput), { recursive: true });
    writeFileSync(absOutput, serializeReport(report), "utf8");

    console.log(formatAnalysisSummary(report, { outputPath, verbose }));
    phase(`completed in ${formatTechnicalDuration((Date.now() - started) / 1000)}`);
    return 0;
  } catch (err) {
    console.error(`${PREFIX} ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
