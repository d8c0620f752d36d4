/** Starter configuration documents written by `sinphase init`. */

import { assertNever } from "../model/divisions.js";
import { COST_FACTOR_FIELDS, COST_FACTOR_KEYS, DEFAULT_DIVISION_CONFIGURATIONS } from "./sinphaseYaml.js";
import { DEFAULT_COST_FACTORS } from "../model/costFactors.js";

export const TEMPLATE_TYPES = ["basic", "advanced", "enterprise"] as const;

export type TemplateType = (typeof TEMPLATE_TYPES)[number];

export const DEFAULT_CONFIG_OUTPUT = ".github/sinphase.yaml";

export function isTemplateType(value: unknown): value is TemplateType {
  return typeof value === "string" && TEMPLATE_TYPES.some((t) => t === value);
}

function defaultCostFactorSection(): Record<string, number> {
  const out: Record<string, number> = {};
  for (const key of COST_FACTOR_KEYS) out[COST_FACTOR_FIELDS[key]] = DEFAULT_COST_FACTORS[key];
  return out;
}

export function configTemplate(type: TemplateType, organization = "example-org"): Record<string, unknown> {
  const base: Record<string, unknown> = {
    version: "1.0.0",
    organization,
    divisions: {
      Computing: { ...DEFAULT_DIVISION_CONFIGURATIONS.Computing },
      "UCHE Nnamdi": { ...DEFAULT_DIVISION_CONFIGURATIONS["UCHE Nnamdi"] },
    },
    cost_factors: defaultCostFactorSection(),
  };

  switch (type) {
    case "basic":
      return base;
    case "advanced":
      return { ...base, divisions: { ...DEFAULT_DIVISION_CONFIGURATIONS } };
    case "enterprise":
      return {
        ...base,
        divisions: { ...DEFAULT_DIVISION_CONFIGURATIONS },
        governance: { strict_validation: true },
      };
    default:
      return assertNever(type);
  }
}
