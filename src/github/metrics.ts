/**
 * GitHub metrics collection. Everything above this file talks to the
 * GitHubMetricsSource seam; createOctokitMetricsSource is the only place that
 * touches the REST API.
 */

import { Octokit } from "@octokit/rest";
import { DEFAULT_COST_FACTORS, type CostFactors } from "../model/costFactors.js";
import { createRepositoryMetrics, type RepositoryMetrics } from "../model/repositoryMetrics.js";
import { createRepositoryConfig } from "../model/repositoryConfig.js";
import { createValidationError, type ValidationError } from "../model/validationError.js";
import { parseConfigText, parseRepositoryConfig, type RepositoryConfigLoad } from "../config/sinphaseYaml.js";

export const COMMIT_WINDOW_DAYS = 30;
export const COMMIT_COUNT_CAP = 1000;
export const USER_AGENT = "sinphase/1.0";

export const REPOSITORY_CONFIG_PATHS = [".github/repo.yaml", ".github/sinphase.yaml", "repo.yaml", "sinphase.yaml"];

export interface GitHubRepositorySummary {
  name: string;
  fullName: string;
  stars: number;
  sizeKb: number;
  archived: boolean;
  fork: boolean;
  language: string | null;
}

export interface GitHubMetricsSource {
  listOrganizationRepositories(org: string): Promise<GitHubRepositorySummary[]>;
  /** Commits since `since`, capped at COMMIT_COUNT_CAP. */
  countCommitsSince(owner: string, repo: string, since: Date): Promise<number>;
  /** File contents as text, or null when the path does not exist. */
  readFile(owner: string, repo: string, path: string): Promise<string | null>;
}

function hasStatus(err: unknown, ...statuses: number[]): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    statuses.includes(err.status)
  );
}

export function createOctokitMetricsSource(octokit: Octokit): GitHubMetricsSource {
  return {
    async listOrganizationRepositories(org) {
      const repos = await octokit.paginate(octokit.repos.listForOrg, { org, type: "all", per_page: 100 });
      return repos.map((r) => ({
        name: r.name,
        fullName: r.full_name,
        stars: r.stargazers_count ?? 0,
        sizeKb: r.size ?? 0,
        archived: r.archived ?? false,
        fork: r.fork,
        language: r.language ?? null,
      }));
    },

    async countCommitsSince(owner, repo, since) {
      let count = 0;
      try {
        const pages = octokit.paginate.iterator(octokit.repos.listCommits, {
          owner,
          repo,
          since: since.toISOString(),
          per_page: 100,
        });
        for await (const page of pages) {
          count += page.data.length;
          if (count >= COMMIT_COUNT_CAP) return COMMIT_COUNT_CAP;
        }
      } catch (err) {
        // 409: repository is empty
        if (hasStatus(err, 409)) return 0;
        throw err;
      }
      return count;
    },

    async readFile(owner, repo, path) {
      try {
        const { data } = await octokit.repos.getContent({ owner, repo, path });
        if (Array.isArray(data) || data.type !== "file" || !("content" in data)) return null;
        return Buffer.from(data.content, "base64").toString("utf8");
      } catch (err) {
        if (hasStatus(err, 404)) return null;
        throw err;
      }
    },
  };
}

export function createGitHubMetricsSource(token: string): GitHubMetricsSource {
  return createOctokitMetricsSource(new Octokit({ auth: token, userAgent: USER_AGENT }));
}

export interface CollectOptions {
  includeArchived?: boolean;
  now?: Date;
}

export interface CollectionFailure {
  repository: string;
  message: string;
}

export interface CollectedMetrics {
  discovered: number;
  repositories: RepositoryMetrics[];
  failures: CollectionFailure[];
}

/**
 * Enumerate organization repositories (forks always skipped, archived unless
 * requested) and measure each. A repository that fails is reported, not fatal.
 */
export async function collectOrganizationMetrics(
  source: GitHubMetricsSource,
  org: string,
  options: CollectOptions = {},
): Promise<CollectedMetrics> {
  const now = options.now ?? new Date();
  const since = new Date(now.getTime() - COMMIT_WINDOW_DAYS * 24 * 60 * 60 * 1000);
  const listed = await source.listOrganizationRepositories(org);
  const eligible = listed.filter((r) => !r.fork && (options.includeArchived === true || !r.archived));

  const repositories: RepositoryMetrics[] = [];
  const failures: CollectionFailure[] = [];
  for (const r of eligible) {
    try {
      const commits = await source.countCommitsSince(org, r.name, since);
      repositories.push(
        createRepositoryMetrics(r.name, {
          fullName: r.fullName,
          starsCount: r.stars,
          commitsLast30Days: commits,
          sizeKb: r.sizeKb,
          primaryLanguage: r.language,
          isArchived: r.archived,
          isFork: r.fork,
        }),
      );
    } catch (err) {
      failures.push({ repository: r.name, message: err instanceof Error ? err.message : String(err) });
    }
  }
  return { discovered: eligible.length, repositories, failures };
}

/**
 * First parsable repository config among REPOSITORY_CONFIG_PATHS. Unparsable
 * files are reported as warnings and the next path is tried; if none parses,
 * the default config comes back with those warnings. No file at all → null.
 */
export async function fetchRepositoryConfig(
  source: GitHubMetricsSource,
  owner: string,
  repo: string,
  baseFactors: CostFactors = DEFAULT_COST_FACTORS,
): Promise<RepositoryConfigLoad | null> {
  const parseWarnings: ValidationError[] = [];
  for (const path of REPOSITORY_CONFIG_PATHS) {
    const text = await source.readFile(owner, repo, path);
    if (text === null) continue;
    try {
      const loaded = parseRepositoryConfig(parseConfigText(text, `${repo}/${path}`), repo, baseFactors);
      return { config: loaded.config, warnings: [...parseWarnings, ...loaded.warnings] };
    } catch (err) {
      parseWarnings.push(
        createValidationError({
          field: `${repo}.${path}`,
          message: err instanceof Error ? err.message : String(err),
          severity: "warning",
        }),
      );
    }
  }
  if (parseWarnings.length > 0) {
    return { config: createRepositoryConfig({ costFactors: baseFactors }), warnings: parseWarnings };
  }
  return null;
}
