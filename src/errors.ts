import type { ZodError } from "zod";

/**
 * Stable error codes raised by the catalog entry points. Lookups that merely
 * miss (unknown field, absent node, unreachable record) never throw: only
 * structurally impossible input reaches these classes.
 */
export const ERROR_CODES = {
  INVALID_INPUT: "E-CATALOG-INVALID-INPUT",
  INVALID_DOCUMENT: "E-CATALOG-INVALID-DOCUMENT",
  INVALID_QUERY: "E-CATALOG-INVALID-QUERY",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Base class shared by every error surfaced by the catalog. */
export class CatalogError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

/** Raised when an entry point receives input it cannot operate on at all. */
export class CatalogInputError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.INVALID_INPUT, message, details);
    this.name = "CatalogInputError";
  }
}

/** Issue reported by {@link CatalogValidationError}, mirroring zod issues. */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/** Raised when a catalog document or query definition fails validation. */
export class CatalogValidationError extends CatalogError {
  constructor(
    code: ErrorCode,
    readonly issues: readonly ValidationIssue[],
  ) {
    super(code, issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; "), {
      issues,
    });
    this.name = "CatalogValidationError";
  }
}

/** Flattens zod issues into `path: message` pairs. */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}
