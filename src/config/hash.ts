/**
 * Deterministic configuration fingerprint: normalized values, binary key
 * order, sha256. Scalar arrays are sorted; floats rounded to 6 places.
 */

import { createHash } from "crypto";

export function stringCompareBinary(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function stableStringify(obj: unknown): string {
  if (obj === null || obj === undefined) return "null";
  if (typeof obj === "boolean") return String(obj);
  if (typeof obj === "number") return Number.isFinite(obj) ? String(obj) : "null";
  if (typeof obj === "string") return JSON.stringify(obj);
  if (obj instanceof Date) return JSON.stringify(obj.toISOString());

  if (Array.isArray(obj)) {
    return "[" + obj.map((v) => stableStringify(v)).join(",") + "]";
  }

  if (typeof obj === "object") {
    const entries = Object.entries(obj)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => stringCompareBinary(a, b));
    return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") + "}";
  }

  return "null";
}

function isScalar(v: unknown): v is string | number {
  return typeof v === "string" || typeof v === "number";
}

function compareScalars(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return stringCompareBinary(String(a), String(b));
}

export function normalizeForHashing(value: unknown): unknown {
  if (typeof value === "number" && !Number.isInteger(value)) {
    return Math.round(value * 1e6) / 1e6;
  }
  if (Array.isArray(value)) {
    const items = value.map(normalizeForHashing);
    return items.every(isScalar) ? [...items].sort(compareScalars) : items;
  }
  if (value !== null && typeof value === "object" && !(value instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = normalizeForHashing(v);
    return out;
  }
  return value;
}

export function generateConfigHash(config: Record<string, unknown>): string {
  const canonical = stableStringify(normalizeForHashing(config));
  return createHash("sha256").update(canonical, "utf8").digest("hex");
}
