/**
 * Verification Service — wires storage and extraction around `verify`.
 *
 * Template lookup errors surface immediately and nothing is persisted.
 * Extraction failures, empty documents and cancellations persist a
 * Failed result with no mismatches. A comparator defect persists the
 * Failed result and then propagates.
 */

import type { ContextExtractor } from "../extraction/json_extractor.js";
import {
  ComparatorDefectError,
  ExtractionFailedError,
} from "../shared/errors.js";
import type {
  ExtractedContext,
  StyleType,
  VerificationResult,
  VerificationResultFilter,
  VerificationSummary,
} from "../shared/types.js";
import type { StyleRepository } from "../storage/types.js";
import type { DimensionComparator } from "./comparators/index.js";
import { verify } from "./orchestrator.js";
import { DEFAULT_SEVERITY_POLICY, type SeverityPolicy } from "./policy.js";
import { DEFAULT_SIGNATURE_MAX_LENGTH } from "./signature.js";
import { summarizeResults } from "./summary.js";

export interface ServiceConfig {
  concurrency?: number;
  signatureMaxLength?: number;
  policy?: SeverityPolicy;
  comparators?: readonly DimensionComparator[];
  ignoreStyleTypes?: readonly StyleType[];
  now?: () => Date;
}

export interface VerifyDocumentRequest {
  templateName: string;
  document: {
    name: string;
    path?: string;
    bytes: Uint8Array;
  };
  createdBy: string;
  signal?: AbortSignal;
  runId?: string;
  /** Overrides the service-wide `ignoreStyleTypes` for this run. */
  ignoreStyleTypes?: readonly StyleType[];
}

export class VerificationService {
  constructor(
    private readonly repository: StyleRepository,
    private readonly extractor: ContextExtractor,
    private readonly config: ServiceConfig = {},
  ) {}

  async verifyDocument(request: VerifyDocumentRequest): Promise<VerificationResult> {
    const template = await this.repository.loadActiveTemplate(request.templateName);

    let contexts: readonly ExtractedContext[];
    let extractionError: ExtractionFailedError | undefined;
    try {
      contexts = await this.extractor.extractContexts(request.document.bytes);
    } catch (err) {
      if (!(err instanceof ExtractionFailedError)) throw err;
      // An empty context set fails the run with the same status.
      contexts = [];
      extractionError = err;
    }

    let result: VerificationResult;
    try {
      result = await verify(template, contexts, {
        runId: request.runId,
        documentName: request.document.name,
        documentPath: request.document.path,
        createdBy: request.createdBy,
        policy: this.config.policy ?? DEFAULT_SEVERITY_POLICY,
        comparators: this.config.comparators,
        concurrency: this.config.concurrency,
        signatureMaxLength: this.config.signatureMaxLength ?? DEFAULT_SIGNATURE_MAX_LENGTH,
        ignoreStyleTypes: request.ignoreStyleTypes ?? this.config.ignoreStyleTypes,
        signal: request.signal,
        now: this.config.now,
      });
    } catch (err) {
      if (err instanceof ComparatorDefectError && err.result) {
        await this.repository.saveVerificationResult(err.result);
      }
      throw err;
    }

    if (extractionError && result.status === "Failed") {
      result = { ...result, errorMessage: extractionError.message };
    }

    const id = await this.repository.saveVerificationResult(result);
    return Object.freeze({ ...result, id });
  }

  /** Removes a stored result and its mismatches; false when no such result exists. */
  async deleteResult(id: number): Promise<boolean> {
    return this.repository.deleteVerificationResult(id);
  }

  async getResult(id: number): Promise<VerificationResult | null> {
    return this.repository.getVerificationResult(id);
  }

  async listResults(filter: VerificationResultFilter = {}): Promise<VerificationResult[]> {
    return this.repository.listVerificationResults(filter);
  }

  async summarize(filter: VerificationResultFilter = {}): Promise<VerificationSummary> {
    return summarizeResults(await this.repository.listVerificationResults(filter));
  }
}
