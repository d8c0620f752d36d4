import { COMMIT_CEILING, SIZE_CEILING_KB } from "./constants.js";

/** Raw per-repository measurements for one analysis run. */
export interface RepositoryMetrics {
  readonly name: string;
  readonly fullName: string;
  readonly starsCount: number;
  readonly commitsLast30Days: number;
  readonly sizeKb: number;
  readonly buildTimeMinutes: number | null;
  readonly testCoveragePercent: number | null;
  readonly primaryLanguage: string | null;
  readonly isArchived: boolean;
  readonly isFork: boolean;
}

export function createRepositoryMetrics(
  name: string,
  fields: Partial<Omit<RepositoryMetrics, "name">> = {},
): RepositoryMetrics {
  return Object.freeze({
    name,
    fullName: fields.fullName ?? name,
    starsCount: fields.starsCount ?? 0,
    commitsLast30Days: fields.commitsLast30Days ?? 0,
    sizeKb: fields.sizeKb ?? 0,
    buildTimeMinutes: fields.buildTimeMinutes ?? null,
    testCoveragePercent: fields.testCoveragePercent ?? null,
    primaryLanguage: fields.primaryLanguage ?? null,
    isArchived: fields.isArchived ?? false,
    isFork: fields.isFork ?? false,
  });
}

function clip01(x: number): number {
  return Math.min(Math.max(x, 0), 1);
}

/** Average of normalized size and recent commit volume, in [0, 1]. */
export function calculateComplexityScore(metrics: RepositoryMetrics): number {
  const size = clip01(metrics.sizeKb / SIZE_CEILING_KB);
  const activity = clip01(metrics.commitsLast30Days / COMMIT_CEILING);
  return 0.5 * size + 0.5 * activity;
}
