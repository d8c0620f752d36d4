import { DEFAULT_COST_FACTORS, type CostFactors } from "./costFactors.js";
import { DEFAULT_DIVISION, DEFAULT_STATUS, type Division, type ProjectStatus } from "./divisions.js";

/** Per-repository governance settings, usually read from .github/repo.yaml. */
export interface RepositoryConfig {
  readonly division: Division;
  readonly status: ProjectStatus;
  readonly costFactors: CostFactors;
  readonly tags: readonly string[];
  readonly dependencies: readonly string[];
  readonly sinphaseCompliance: boolean;
  readonly isolationRequired: boolean;
  readonly manualOverride: number | null;
}

export function createRepositoryConfig(fields: Partial<RepositoryConfig> = {}): RepositoryConfig {
  return Object.freeze({
    division: fields.division ?? DEFAULT_DIVISION,
    status: fields.status ?? DEFAULT_STATUS,
    costFactors: fields.costFactors ?? DEFAULT_COST_FACTORS,
    tags: [...(fields.tags ?? [])],
    dependencies: [...(fields.dependencies ?? [])],
    sinphaseCompliance: fields.sinphaseCompliance ?? true,
    isolationRequired: fields.isolationRequired ?? false,
    manualOverride: fields.manualOverride ?? null,
  });
}
