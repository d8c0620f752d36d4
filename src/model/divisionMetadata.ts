/**
 * Per-division governance parameters. Bounds are enforced at construction;
 * an out-of-range division never exists.
 */

import {
  ARCHITECTURAL_REORGANIZATION_THRESHOLD,
  GOVERNANCE_THRESHOLD,
  ISOLATION_THRESHOLD,
  PRIORITY_BOOST_MAX,
  PRIORITY_BOOST_MIN,
} from "./constants.js";
import { defaultPriorityBoost, type Division } from "./divisions.js";

export class DivisionBoundsError extends Error {
  constructor(
    message: string,
    readonly field: "governanceThreshold" | "isolationThreshold" | "priorityBoost",
  ) {
    super(message);
    this.name = "DivisionBoundsError";
  }
}

export interface DivisionMetadataInit {
  division: Division;
  description?: string;
  governanceThreshold?: number;
  isolationThreshold?: number;
  priorityBoost?: number;
  responsibleArchitect?: string | null;
  createdAt?: Date;
}

/** Any record carrying a cost score; absent scores count as 0. */
export interface ScoredRecord {
  costScore?: number;
}

export interface DivisionGovernanceReport {
  division: Division;
  totalRepositories: number;
  compliantRepositories: number;
  complianceRate: number;
  isolationCandidates: number;
  governanceThreshold: number;
  isolationThreshold: number;
  responsibleArchitect: string | null;
  generatedAt: string;
}

function inUnitRange(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 1;
}

export class DivisionMetadata {
  readonly division: Division;
  readonly description: string;
  readonly governanceThreshold: number;
  readonly isolationThreshold: number;
  readonly priorityBoost: number;
  readonly responsibleArchitect: string | null;
  readonly createdAt: Date;

  constructor(init: DivisionMetadataInit) {
    const governance = init.governanceThreshold ?? GOVERNANCE_THRESHOLD;
    const isolation = init.isolationThreshold ?? ISOLATION_THRESHOLD;
    const boost = init.priorityBoost ?? 1.0;

    if (!inUnitRange(governance)) {
      throw new DivisionBoundsError(`Governance threshold out of bounds: ${governance}`, "governanceThreshold");
    }
    if (!inUnitRange(isolation)) {
      throw new DivisionBoundsError(`Isolation threshold out of bounds: ${isolation}`, "isolationThreshold");
    }
    if (governance > isolation) {
      throw new DivisionBoundsError(
        `Governance threshold ${governance} cannot exceed isolation threshold ${isolation}`,
        "governanceThreshold",
      );
    }
    if (!Number.isFinite(boost) || boost < PRIORITY_BOOST_MIN || boost > PRIORITY_BOOST_MAX) {
      throw new DivisionBoundsError(`Priority boost out of bounds: ${boost}`, "priorityBoost");
    }

    this.division = init.division;
    this.description = init.description ?? `${init.division} Division`;
    this.governanceThreshold = governance;
    this.isolationThreshold = isolation;
    this.priorityBoost = boost;
    this.responsibleArchitect = init.responsibleArchitect ?? null;
    this.createdAt = init.createdAt ?? new Date();
  }

  /** Strictly below the governance threshold. */
  isGovernanceCompliant(costScore: number): boolean {
    return costScore < this.governanceThreshold;
  }

  /** At or above the isolation threshold. */
  requiresIsolation(costScore: number): boolean {
    return costScore >= this.isolationThreshold;
  }

  applyPriorityBoost(baseScore: number): number {
    return Math.min(baseScore * this.priorityBoost, ARCHITECTURAL_REORGANIZATION_THRESHOLD);
  }

  generateGovernanceReport(
    repositories: readonly ScoredRecord[],
    now: Date = new Date(),
  ): DivisionGovernanceReport {
    const total = repositories.length;
    let compliant = 0;
    let isolation = 0;
    for (const r of repositories) {
      const score = r.costScore ?? 0.0;
      if (this.isGovernanceCompliant(score)) compliant++;
      if (this.requiresIsolation(score)) isolation++;
    }
    return {
      division: this.division,
      totalRepositories: total,
      compliantRepositories: compliant,
      complianceRate: total > 0 ? compliant / total : 0,
      isolationCandidates: isolation,
      governanceThreshold: this.governanceThreshold,
      isolationThreshold: this.isolationThreshold,
      responsibleArchitect: this.responsibleArchitect,
      generatedAt: now.toISOString(),
    };
  }
}

/** Universal thresholds with the division's built-in priority boost. */
export function defaultDivisionMetadata(division: Division): DivisionMetadata {
  return new DivisionMetadata({ division, priorityBoost: defaultPriorityBoost(division) });
}
