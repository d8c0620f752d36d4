/**
 * Structured validation record shared by the configuration layer and the CLI.
 * Sinphasé-related records are routed to governance reporting; the rest are
 * plain configuration problems.
 */

export type ValidationSeverity = "critical" | "error" | "warning";

export interface ValidationError {
  field: string;
  message: string;
  severity: ValidationSeverity;
  value?: unknown;
  timestamp: Date;
}

const SINPHASE_KEYWORDS = ["cost", "threshold", "isolation", "complexity", "governance"];

export function createValidationError(input: {
  field: string;
  message: string;
  severity?: ValidationSeverity;
  value?: unknown;
  timestamp?: Date;
}): ValidationError {
  const error: ValidationError = {
    field: input.field,
    message: input.message,
    severity: input.severity ?? "error",
    timestamp: input.timestamp ?? new Date(),
  };
  if (input.value !== undefined) error.value = input.value;
  return error;
}

export function isSinphaseViolation(error: Pick<ValidationError, "field" | "message">): boolean {
  const haystack = (error.field + " " + error.message).toLowerCase();
  return SINPHASE_KEYWORDS.some((k) => haystack.includes(k));
}

/** Blocking errors are anything above warning. */
export function hasBlockingErrors(errors: readonly ValidationError[]): boolean {
  return errors.some((e) => e.severity !== "warning");
}

export function formatValidationError(error: ValidationError): string {
  return `[${error.severity}] ${error.field}: ${error.message}`;
}
