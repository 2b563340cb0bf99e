/**
 * Verification Stage Types
 *
 * A verification run is decomposed into ephemeral stages that talk to
 * each other through typed references in a per-run StageStore.
 */

import type {
  ExtractedContext,
  Mismatch,
  RawDiscrepancy,
  StyleType,
  Template,
  TextStyle,
  VerificationWarning,
} from "../shared/types.js";
import type { DimensionComparator, PreparedStyle } from "../verify/comparators/types.js";
import type { MatchOutcome } from "../verify/matcher.js";
import type { SeverityPolicy } from "../verify/policy.js";

// ── Stage Type Enum ────────────────────────────────────────────────

export type VerifyStageType =
  | "RESOLVE_TEMPLATE"
  | "PREPARE_DOCUMENT"
  | "MATCH_CONTEXTS"
  | "COMPARE_PAIRS"
  | "AGGREGATE_MISMATCHES";

// ── Store Slots ────────────────────────────────────────────────────

export interface PreparedTemplateStyle {
  style: TextStyle;
  prepared: PreparedStyle;
}

export interface PreparedDocumentContext {
  context: ExtractedContext;
  prepared: PreparedStyle;
}

/** Value type held in each store slot. */
export interface StoreSlots {
  template_styles: PreparedTemplateStyle[];
  document_styles: PreparedDocumentContext[];
  match_outcome: MatchOutcome;
  raw_discrepancies: RawDiscrepancy[];
  mismatches: Mismatch[];
  warnings: VerificationWarning[];
}

export type StoreSlotKind = keyof StoreSlots;

// ── Reference & Bundle Types ───────────────────────────────────────

export interface ProducedRef {
  kind: StoreSlotKind;
  id: string;
  hash: string;
}

export interface StageInputBundle {
  stageType: VerifyStageType;
  stageId: string;
  runId: string;
}

export interface StageOutputBundle {
  stageType: VerifyStageType;
  stageId: string;
  runId: string;
  producedRefs: ProducedRef[];
  timing: {
    startedAt: Date;
    completedAt: Date;
    durationMs: number;
  };
  status: "success" | "failed";
}

// ── Stage Result ───────────────────────────────────────────────────

export type StageResult =
  | { status: "success"; output: StageOutputBundle }
  | { status: "failed"; output: StageOutputBundle; error: Error };

// ── StageStore Interface ───────────────────────────────────────────

export interface StageStore {
  set<K extends StoreSlotKind>(kind: K, id: string, value: StoreSlots[K]): ProducedRef;
  get<K extends StoreSlotKind>(kind: K, id: string): StoreSlots[K];
  has(kind: StoreSlotKind, id: string): boolean;
  refs(): ProducedRef[];
  clear(): void;
  readonly size: number;
}

// ── Stage Handler & Config ─────────────────────────────────────────

export interface StageConfig {
  runId: string;
  template: Template;
  documentContexts: readonly ExtractedContext[];
  comparators: readonly DimensionComparator[];
  policy: SeverityPolicy;
  concurrency: number;
  signatureMaxLength: number;
  /** Style types left out on both sides before matching. */
  ignoreStyleTypes: readonly StyleType[];
  signal?: AbortSignal;
  /** Timestamp stamped on every mismatch of the run. */
  detectedAt: Date;
}

export type StageHandler = (
  input: StageInputBundle,
  store: StageStore,
  config: StageConfig,
) => Promise<StageOutputBundle["producedRefs"]>;

// ── Stage Definition (Registry) ────────────────────────────────────

export interface StageDefinition {
  stageType: VerifyStageType;
  handler: StageHandler;
  dependsOn: VerifyStageType[];
}

// ── Runtime Result ─────────────────────────────────────────────────

export interface PipelineRunResult {
  runId: string;
  stageResults: Map<VerifyStageType, StageResult>;
  store: StageStore;
  /** The failed stage's error, when the run halted. */
  failure?: { stageType: VerifyStageType; error: Error };
  totalDurationMs: number;
}
