/**
 * Sinphasé configuration loader. Organization file (divisions + cost factors)
 * and per-repository .github/repo.yaml. Parse failures throw with the file
 * name; schema problems are returned as ValidationError records.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { isAbsolute, join, resolve } from "path";
import { parse } from "yaml";
import { COST_WEIGHT_MAX, COST_WEIGHT_MIN, PRIORITY_BOOST_MAX, PRIORITY_BOOST_MIN } from "../model/constants.js";
import {
  createCostFactors,
  DEFAULT_COST_FACTORS,
  WEIGHT_KEYS,
  type CostFactors,
  type CostFactorsResult,
} from "../model/costFactors.js";
import {
  DEFAULT_DIVISION,
  DEFAULT_STATUS,
  DIVISIONS,
  defaultPriorityBoost,
  isDivision,
  isProjectStatus,
  type Division,
} from "../model/divisions.js";
import { DivisionMetadata } from "../model/divisionMetadata.js";
import { createRepositoryConfig, type RepositoryConfig } from "../model/repositoryConfig.js";
import { createValidationError, type ValidationError } from "../model/validationError.js";

export const CONFIG_SEARCH_PATHS = [
  ".github/sinphase.yaml",
  ".github/division_config.yaml",
  "sinphase.yaml",
  "division_config.yaml",
];

export const USER_CONFIG_PATH = join(".config", "sinphase", "config.yaml");

export const COST_FACTOR_FIELDS: Record<keyof CostFactors, string> = {
  starsWeight: "stars_weight",
  commitActivityWeight: "commit_activity_weight",
  buildTimeWeight: "build_time_weight",
  sizeWeight: "size_weight",
  testCoverageWeight: "test_coverage_weight",
  manualBoost: "manual_boost",
};

export const COST_FACTOR_KEYS: readonly (keyof CostFactors)[] = [...WEIGHT_KEYS, "manualBoost"];

const VERSION_PATTERN = /^\d+\.\d+\.\d+$/;
const GITHUB_LOGIN_MAX = 39;

export interface DivisionConfigEntry {
  description?: string;
  governance_threshold?: number;
  isolation_threshold?: number;
  priority_boost?: number;
  responsible_architect?: string;
}

/** `governance.strict_validation: true` turns configuration warnings into failures. */
export function isStrictValidation(raw: Record<string, unknown>): boolean {
  return isRecord(raw.governance) && raw.governance.strict_validation === true;
}

export interface ConfigDocument {
  data: Record<string, unknown>;
  source: string;
}

export const DEFAULT_DIVISION_CONFIGURATIONS: Record<Division, DivisionConfigEntry> = {
  Computing: {
    description: "Core technical infrastructure and toolchain development",
    governance_threshold: 0.6,
    isolation_threshold: 0.8,
    priority_boost: 1.2,
  },
  "UCHE Nnamdi": {
    description: "Strategic leadership and architectural oversight",
    governance_threshold: 0.5,
    isolation_threshold: 0.7,
    priority_boost: 1.5,
  },
  "Aegis Engineering": {
    description: "Core engineering systems and build orchestration",
    governance_threshold: 0.6,
    isolation_threshold: 0.8,
    priority_boost: 1.3,
  },
  "OBIAxis R&D": {
    description: "Research and development initiatives",
    governance_threshold: 0.7,
    isolation_threshold: 0.9,
    priority_boost: 1.1,
  },
  TDA: {
    description: "Tactical defense and security applications",
    governance_threshold: 0.6,
    isolation_threshold: 0.8,
    priority_boost: 1.0,
  },
  Publishing: {
    description: "Documentation and content management",
    governance_threshold: 0.7,
    isolation_threshold: 0.9,
    priority_boost: 0.9,
  },
  Nkwakọba: {
    description: "Packaging and presentation systems",
    governance_threshold: 0.6,
    isolation_threshold: 0.8,
    priority_boost: 1.0,
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function defaultConfigDocument(organization = "example-org"): Record<string, unknown> {
  return {
    version: "1.0.0",
    organization,
    divisions: { ...DEFAULT_DIVISION_CONFIGURATIONS },
  };
}

/** First existing candidate: explicit path, repo-local files, then the user config. */
export function findConfigPath(cwd: string, explicitPath?: string | null, home: string = homedir()): string | null {
  if (explicitPath) {
    const p = isAbsolute(explicitPath) ? explicitPath : resolve(cwd, explicitPath);
    if (!existsSync(p)) throw new Error(`${explicitPath}: configuration file not found`);
    return p;
  }
  for (const rel of CONFIG_SEARCH_PATHS) {
    const p = join(cwd, rel);
    if (existsSync(p)) return p;
  }
  const user = join(home, USER_CONFIG_PATH);
  return existsSync(user) ? user : null;
}

export function parseConfigText(content: string, source: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = source.endsWith(".json") ? JSON.parse(content) : parse(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${source}: invalid ${source.endsWith(".json") ? "JSON" : "YAML"}: ${msg}`);
  }
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) throw new Error(`${source}: root must be an object`);
  return raw;
}

/** Missing file → built-in defaults with source "default". */
export function loadConfigDocument(cwd: string, explicitPath?: string | null, home?: string): ConfigDocument {
  const path = findConfigPath(cwd, explicitPath, home);
  if (path === null) return { data: defaultConfigDocument(), source: "default" };
  return { data: parseConfigText(readFileSync(path, "utf8"), path), source: path };
}

function validateDivisions(divisions: unknown): ValidationError[] {
  const errors: ValidationError[] = [];
  if (!isRecord(divisions)) {
    errors.push(createValidationError({ field: "divisions", message: "Divisions must be a mapping", value: divisions }));
    return errors;
  }
  for (const [name, entry] of Object.entries(divisions)) {
    if (!isDivision(name)) {
      errors.push(
        createValidationError({ field: `divisions.${name}`, message: `Unknown division type: ${name}`, value: name }),
      );
      continue;
    }
    if (!isRecord(entry)) {
      errors.push(createValidationError({ field: `divisions.${name}`, message: "Division entry must be a mapping" }));
      continue;
    }
    for (const key of ["governance_threshold", "isolation_threshold"]) {
      const v = entry[key];
      if (v !== undefined && !(isNumber(v) && v >= 0 && v <= 1)) {
        errors.push(
          createValidationError({
            field: `divisions.${name}.${key}`,
            message: "Threshold must be between 0.0 and 1.0",
            value: v,
          }),
        );
      }
    }
    const boost = entry.priority_boost;
    if (boost !== undefined && !(isNumber(boost) && boost >= PRIORITY_BOOST_MIN && boost <= PRIORITY_BOOST_MAX)) {
      errors.push(
        createValidationError({
          field: `divisions.${name}.priority_boost`,
          message: `Priority boost must be between ${PRIORITY_BOOST_MIN} and ${PRIORITY_BOOST_MAX}`,
          value: boost,
          severity: "warning",
        }),
      );
    }
  }
  return errors;
}

function validateCostFactorSection(section: unknown): ValidationError[] {
  const errors: ValidationError[] = [];
  if (!isRecord(section)) {
    errors.push(createValidationError({ field: "cost_factors", message: "Cost factors must be a mapping" }));
    return errors;
  }
  let total = 0;
  for (const key of WEIGHT_KEYS) {
    const field = COST_FACTOR_FIELDS[key];
    const v = section[field];
    if (v === undefined) {
      total += DEFAULT_COST_FACTORS[key];
      continue;
    }
    if (!(isNumber(v) && v >= 0 && v <= 1)) {
      errors.push(
        createValidationError({ field: `cost_factors.${field}`, message: "Weight must be between 0.0 and 1.0", value: v }),
      );
    } else {
      total += v;
    }
  }
  if (total < COST_WEIGHT_MIN || total > COST_WEIGHT_MAX) {
    errors.push(
      createValidationError({
        field: "cost_factors",
        message: `Total weight sum ${total.toFixed(2)} should be approximately 1.0`,
        value: total,
        severity: "warning",
      }),
    );
  }
  const boost = section.manual_boost;
  if (boost !== undefined && !(isNumber(boost) && boost >= PRIORITY_BOOST_MIN && boost <= PRIORITY_BOOST_MAX)) {
    errors.push(
      createValidationError({
        field: "cost_factors.manual_boost",
        message: `Manual boost must be between ${PRIORITY_BOOST_MIN} and ${PRIORITY_BOOST_MAX}`,
        value: boost,
        severity: "warning",
      }),
    );
  }
  return errors;
}

export function isValidGithubLogin(name: string): boolean {
  if (name.length === 0 || name.length > GITHUB_LOGIN_MAX) return false;
  if (!/^[A-Za-z0-9_-]+$/.test(name) || name.includes("--")) return false;
  return !name.startsWith("-") && !name.endsWith("-");
}

export function validateConfig(raw: unknown): ValidationError[] {
  if (!isRecord(raw)) {
    return [createValidationError({ field: "$", message: "Configuration root must be a mapping", severity: "critical" })];
  }
  const errors: ValidationError[] = [];

  for (const field of ["version", "organization"]) {
    if (!(field in raw)) {
      errors.push(
        createValidationError({
          field,
          message: `Required field '${field}' missing from configuration`,
          severity: "critical",
        }),
      );
    }
  }

  const version = raw.version;
  if (version !== undefined && !(typeof version === "string" && VERSION_PATTERN.test(version))) {
    errors.push(
      createValidationError({ field: "version", message: `Invalid version format: ${String(version)}`, value: version }),
    );
  }

  if (raw.divisions !== undefined) errors.push(...validateDivisions(raw.divisions));
  if (raw.cost_factors !== undefined) errors.push(...validateCostFactorSection(raw.cost_factors));

  const org = raw.organization;
  if (org !== undefined && !(typeof org === "string" && isValidGithubLogin(org))) {
    errors.push(
      createValidationError({
        field: "organization",
        message: `Invalid GitHub organization name: ${String(org)}`,
        value: org,
      }),
    );
  }

  return errors;
}

export interface DivisionConfigLoad {
  divisions: Map<Division, DivisionMetadata>;
  skipped: ValidationError[];
}

function divisionFromEntry(name: Division, e: Record<string, unknown>): DivisionMetadata {
  return new DivisionMetadata({
    division: name,
    description: typeof e.description === "string" ? e.description : undefined,
    governanceThreshold: isNumber(e.governance_threshold) ? e.governance_threshold : undefined,
    isolationThreshold: isNumber(e.isolation_threshold) ? e.isolation_threshold : undefined,
    priorityBoost: isNumber(e.priority_boost) ? e.priority_boost : defaultPriorityBoost(name),
    responsibleArchitect: typeof e.responsible_architect === "string" ? e.responsible_architect : null,
  });
}

/**
 * Build metadata for every configured division. Unknown names and bound
 * violations are skipped and reported; every other division comes from
 * DEFAULT_DIVISION_CONFIGURATIONS.
 */
export function loadDivisionConfig(raw: Record<string, unknown>): DivisionConfigLoad {
  const divisions = new Map<Division, DivisionMetadata>();
  const skipped: ValidationError[] = [];
  const section = isRecord(raw.divisions) ? raw.divisions : {};

  for (const [name, entry] of Object.entries(section)) {
    if (!isDivision(name)) {
      skipped.push(
        createValidationError({
          field: `divisions.${name}`,
          message: `Unknown division type: ${name}`,
          severity: "warning",
        }),
      );
      continue;
    }
    try {
      divisions.set(name, divisionFromEntry(name, isRecord(entry) ? entry : {}));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      skipped.push(createValidationError({ field: `divisions.${name}`, message: msg }));
    }
  }

  // Same built-in table as a run without any configuration file.
  for (const division of DIVISIONS) {
    if (!divisions.has(division)) {
      divisions.set(division, divisionFromEntry(division, { ...DEFAULT_DIVISION_CONFIGURATIONS[division] }));
    }
  }
  return { divisions, skipped };
}

/**
 * Read a snake_case cost_factors mapping over `base`; absent section → base.
 * Malformed values are errors; an out-of-bounds weight sum is carried through.
 */
export function loadCostFactors(section: unknown, base: CostFactors = DEFAULT_COST_FACTORS): CostFactorsResult {
  if (section === undefined || section === null) return { ok: true, factors: base };
  if (!isRecord(section)) {
    return {
      ok: false,
      errors: [createValidationError({ field: "cost_factors", message: "Cost factors must be a mapping" })],
    };
  }
  const overrides: { -readonly [K in keyof CostFactors]?: number } = {};
  for (const key of COST_FACTOR_KEYS) {
    const field = COST_FACTOR_FIELDS[key];
    const v = section[field];
    if (v === undefined) continue;
    if (!isNumber(v)) {
      return {
        ok: false,
        errors: [createValidationError({ field: `cost_factors.${field}`, message: "Must be a number", value: v })],
      };
    }
    overrides[key] = v;
  }
  return createCostFactors({ ...base, ...overrides }, { enforceBounds: false });
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

export interface RepositoryConfigLoad {
  config: RepositoryConfig;
  warnings: ValidationError[];
}

/** .github/repo.yaml → RepositoryConfig; unknown tags fall back to defaults with a warning. */
export function parseRepositoryConfig(
  raw: unknown,
  repoName: string,
  baseFactors: CostFactors = DEFAULT_COST_FACTORS,
): RepositoryConfigLoad {
  const warnings: ValidationError[] = [];
  const data = isRecord(raw) ? raw : {};

  let division: Division = DEFAULT_DIVISION;
  if (data.division !== undefined) {
    if (isDivision(data.division)) division = data.division;
    else
      warnings.push(
        createValidationError({
          field: `${repoName}.division`,
          message: `Invalid division '${String(data.division)}', defaulting to ${DEFAULT_DIVISION}`,
          value: data.division,
          severity: "warning",
        }),
      );
  }

  let status = DEFAULT_STATUS;
  if (data.status !== undefined) {
    if (isProjectStatus(data.status)) status = data.status;
    else
      warnings.push(
        createValidationError({
          field: `${repoName}.status`,
          message: `Invalid status '${String(data.status)}', defaulting to ${DEFAULT_STATUS}`,
          value: data.status,
          severity: "warning",
        }),
      );
  }

  let costFactors = baseFactors;
  const factors = loadCostFactors(data.cost_factors, baseFactors);
  if (factors.ok) costFactors = factors.factors;
  else warnings.push(...factors.errors.map((e) => ({ ...e, field: `${repoName}.${e.field}`, severity: "warning" as const })));

  let manualOverride: number | null = null;
  if (data.manual_override !== undefined && data.manual_override !== null) {
    const v = data.manual_override;
    if (isNumber(v) && v >= 0 && v <= 1) manualOverride = v;
    else
      warnings.push(
        createValidationError({
          field: `${repoName}.manual_override`,
          message: "Manual override must be a cost between 0.0 and 1.0; ignored",
          value: v,
          severity: "warning",
        }),
      );
  }

  const config = createRepositoryConfig({
    division,
    status,
    costFactors,
    tags: stringList(data.tags),
    dependencies: stringList(data.dependencies),
    sinphaseCompliance: typeof data.sinphase_compliance === "boolean" ? data.sinphase_compliance : true,
    isolationRequired: typeof data.isolation_required === "boolean" ? data.isolation_required : false,
    manualOverride,
  });
  return { config, warnings };
}
