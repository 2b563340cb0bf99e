/**
 * Verification Orchestrator
 *
 * `verify(template, documentContexts)` runs one verification through the
 * stage runtime and stamps the terminal status. Pure with respect to its
 * inputs: the same template snapshot, document contexts and clock give a
 * byte-identical mismatch list. Nothing is persisted here.
 */

import { v4 as uuidv4 } from "uuid";
import { StageRuntime } from "../pipeline/runtime.js";
import type { StageConfig } from "../pipeline/types.js";
import {
  ComparatorDefectError,
  ConfigError,
  ExtractionFailedError,
  TemplateInactiveError,
  VerificationCancelledError,
} from "../shared/errors.js";
import type { ExtractedContext, StyleType, Template, VerificationResult } from "../shared/types.js";
import { createDefaultComparators, type DimensionComparator } from "./comparators/index.js";
import { DEFAULT_SEVERITY_POLICY, type SeverityPolicy } from "./policy.js";
import { VerificationRun } from "./run_state.js";
import { DEFAULT_SIGNATURE_MAX_LENGTH } from "./signature.js";

export const DEFAULT_CONCURRENCY = 4;

export interface VerifyOptions {
  runId?: string;
  documentName?: string;
  documentPath?: string;
  createdBy?: string;
  policy?: SeverityPolicy;
  /** Replaces the default signature, direct-format and tab-stop comparators. */
  comparators?: readonly DimensionComparator[];
  /** Pair-comparison workers. */
  concurrency?: number;
  signatureMaxLength?: number;
  /** Style types skipped on both sides. */
  ignoreStyleTypes?: readonly StyleType[];
  signal?: AbortSignal;
  /** Clock for `verifiedAt` and `detectedAt`. */
  now?: () => Date;
}

function resolveConcurrency(value: number | undefined): number {
  if (value === undefined) return DEFAULT_CONCURRENCY;
  if (!Number.isFinite(value) || value < 1) {
    throw new ConfigError(`Invalid concurrency: ${value} (expected a number >= 1)`);
  }
  return Math.floor(value);
}

export async function verify(
  template: Template,
  documentContexts: readonly ExtractedContext[],
  options: VerifyOptions = {},
): Promise<VerificationResult> {
  const concurrency = resolveConcurrency(options.concurrency);
  if (template.status !== "Active") {
    throw new TemplateInactiveError(template.name, template.status);
  }

  const runId = options.runId ?? uuidv4();
  const verifiedAt = (options.now ?? (() => new Date()))();
  const signatureMaxLength = options.signatureMaxLength ?? DEFAULT_SIGNATURE_MAX_LENGTH;

  const run = new VerificationRun({
    runId,
    templateId: template.id,
    templateName: template.name,
    templateVersion: template.version,
    documentName: options.documentName ?? "",
    documentPath: options.documentPath ?? "",
    createdBy: options.createdBy ?? "system",
    verifiedAt,
  });

  run.start();
  if (options.signal?.aborted) {
    return run.fail(new VerificationCancelledError().message);
  }

  const config: StageConfig = {
    runId,
    template,
    documentContexts,
    comparators: options.comparators ?? createDefaultComparators({ signatureMaxLength }),
    policy: options.policy ?? DEFAULT_SEVERITY_POLICY,
    concurrency,
    signatureMaxLength,
    ignoreStyleTypes: options.ignoreStyleTypes ?? [],
    signal: options.signal,
    detectedAt: verifiedAt,
  };

  const outcome = await new StageRuntime(config).execute();

  if (outcome.failure) {
    const { error } = outcome.failure;
    const result = run.fail(error.message);
    if (error instanceof ExtractionFailedError || error instanceof VerificationCancelledError) {
      return result;
    }
    // Defects abort the run.
    if (error instanceof ComparatorDefectError) error.result = result;
    throw error;
  }

  return run.complete(
    outcome.store.get("mismatches", runId),
    outcome.store.get("warnings", runId),
  );
}
