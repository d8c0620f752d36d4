/**
 * Closed tag sets for organizational divisions and project lifecycle status.
 * Adding a member is a compile error at every exhaustive switch until handled.
 */

export const DIVISIONS = [
  "Computing",
  "UCHE Nnamdi",
  "Publishing",
  "OBIAxis R&D",
  "TDA",
  "Nkwakọba",
  "Aegis Engineering",
] as const;

export type Division = (typeof DIVISIONS)[number];

export const PROJECT_STATUSES = [
  "Core",
  "Active",
  "Incubator",
  "Legacy",
  "Experimental",
  "Isolated",
] as const;

export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const DEFAULT_DIVISION: Division = "Computing";
export const DEFAULT_STATUS: ProjectStatus = "Active";

export function isDivision(value: unknown): value is Division {
  return typeof value === "string" && DIVISIONS.some((d) => d === value);
}

export function isProjectStatus(value: unknown): value is ProjectStatus {
  return typeof value === "string" && PROJECT_STATUSES.some((s) => s === value);
}

export function parseDivision(value: unknown): Division {
  if (!isDivision(value)) {
    throw new Error(`unknown division: ${String(value)}`);
  }
  return value;
}

export function parseProjectStatus(value: unknown): ProjectStatus {
  if (!isProjectStatus(value)) {
    throw new Error(`unknown project status: ${String(value)}`);
  }
  return value;
}

export function assertNever(value: never): never {
  throw new Error(`unhandled tag: ${String(value)}`);
}

/** Built-in priority matrix used when a division has no configured boost. */
export function defaultPriorityBoost(division: Division): number {
  switch (division) {
    case "Computing":
      return 1.2;
    case "UCHE Nnamdi":
      return 1.5;
    case "Aegis Engineering":
      return 1.3;
    case "OBIAxis R&D":
      return 1.1;
    case "TDA":
      return 1.0;
    case "Publishing":
      return 0.9;
    case "Nkwakọba":
      return 1.0;
    default:
      return assertNever(division);
  }
}

