/**
 * Verification run state machine: Pending → Running → Completed | Failed.
 *
 * Terminal results are frozen.
 */

import { InvalidTransitionError } from "../shared/errors.js";
import type {
  Mismatch,
  VerificationResult,
  VerificationStatus,
  VerificationWarning,
} from "../shared/types.js";
import { reportDigest } from "./aggregator.js";

const TRANSITIONS: Readonly<Record<VerificationStatus, readonly VerificationStatus[]>> = {
  Pending: ["Running"],
  Running: ["Completed", "Failed"],
  Completed: [],
  Failed: [],
};

export function canTransition(from: VerificationStatus, to: VerificationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: VerificationStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export interface RunHeader {
  runId: string;
  templateId: number;
  templateName: string;
  templateVersion: number;
  documentName: string;
  documentPath: string;
  createdBy: string;
  verifiedAt: Date;
}

export class VerificationRun {
  private current: VerificationStatus = "Pending";

  constructor(private readonly header: RunHeader) {}

  get status(): VerificationStatus {
    return this.current;
  }

  private transition(to: VerificationStatus): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    this.current = to;
  }

  start(): void {
    this.transition("Running");
  }

  complete(
    mismatches: readonly Mismatch[],
    warnings: readonly VerificationWarning[],
  ): VerificationResult {
    this.transition("Completed");
    return this.build(mismatches, warnings, "");
  }

  /** All-or-nothing: a failed run never carries a partial mismatch list. */
  fail(message: string, warnings: readonly VerificationWarning[] = []): VerificationResult {
    this.transition("Failed");
    return this.build([], warnings, message);
  }

  private build(
    mismatches: readonly Mismatch[],
    warnings: readonly VerificationWarning[],
    errorMessage: string,
  ): VerificationResult {
    return Object.freeze({
      runId: this.header.runId,
      templateId: this.header.templateId,
      templateName: this.header.templateName,
      templateVersion: this.header.templateVersion,
      documentName: this.header.documentName,
      documentPath: this.header.documentPath,
      status: this.current,
      verifiedAt: this.header.verifiedAt,
      totalMismatches: mismatches.length,
      errorMessage,
      warnings: Object.freeze([...warnings]),
      reportDigest: reportDigest(mismatches),
      createdBy: this.header.createdBy,
      createdOn: this.header.verifiedAt,
      mismatches: Object.freeze([...mismatches]),
    });
  }
}
