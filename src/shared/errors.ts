/**
 * Typed error taxonomy.
 *
 * `code` is stable and machine-oriented so callers can branch on it;
 * `details` carries structured context (zod issues, ids) when available.
 */

import type { VerificationResult } from "./types.js";

export type StyleVerifyErrorCode =
  | "EXTRACTION_FAILED"
  | "TEMPLATE_NOT_FOUND"
  | "TEMPLATE_INACTIVE"
  | "TEMPLATE_IN_USE"
  | "VERIFICATION_CANCELLED"
  | "COMPARATOR_DEFECT"
  | "INVALID_TRANSITION"
  | "CONFIG_INVALID";

export class StyleVerifyError extends Error {
  readonly code: StyleVerifyErrorCode;
  readonly details?: unknown;

  constructor(code: StyleVerifyErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** The document could not be turned into formatting contexts. */
export class ExtractionFailedError extends StyleVerifyError {
  constructor(message: string, details?: unknown) {
    super("EXTRACTION_FAILED", message, details);
  }
}

export class TemplateNotFoundError extends StyleVerifyError {
  constructor(readonly templateName: string) {
    super("TEMPLATE_NOT_FOUND", `Template not found: ${templateName}`);
  }
}

export class TemplateInactiveError extends StyleVerifyError {
  constructor(readonly templateName: string, readonly status: string) {
    super("TEMPLATE_INACTIVE", `Template "${templateName}" is not active (status: ${status})`);
  }
}

/** Restrict-delete: results still reference the template. */
export class TemplateInUseError extends StyleVerifyError {
  constructor(readonly templateId: number, readonly resultCount: number) {
    super(
      "TEMPLATE_IN_USE",
      `Template ${templateId} is referenced by ${resultCount} verification result(s) and cannot be deleted`,
    );
  }
}

export class VerificationCancelledError extends StyleVerifyError {
  constructor(message = "Verification cancelled") {
    super("VERIFICATION_CANCELLED", message);
  }
}

/**
 * A comparator threw for a well-formed pair. Fatal for the run; once the
 * orchestrator has failed the run, the terminal record is attached as
 * `result` so callers can persist it before propagating.
 */
export class ComparatorDefectError extends StyleVerifyError {
  result?: VerificationResult;

  constructor(comparator: string, contextKey: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      "COMPARATOR_DEFECT",
      `Comparator "${comparator}" failed on context "${contextKey}": ${reason}`,
      { comparator, contextKey },
    );
  }
}

export class InvalidTransitionError extends StyleVerifyError {
  constructor(from: string, to: string) {
    super("INVALID_TRANSITION", `Invalid verification status transition: ${from} → ${to}`);
  }
}

export class ConfigError extends StyleVerifyError {
  constructor(message: string, details?: unknown) {
    super("CONFIG_INVALID", message, details);
  }
}

/** Best-effort message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
