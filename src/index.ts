/**
 * Public API
 */

export * from "./shared/types.js";
export * from "./shared/errors.js";
export { contentHash, sha256Bytes, sha256String } from "./shared/hash.js";
export { mapWithConcurrency } from "./shared/concurrency.js";
export { loadSeverityPolicy, loadVerifyConfig, type VerifyConfig } from "./shared/run_config.js";

export {
  DEFAULT_SIGNATURE_MAX_LENGTH,
  buildStyleSignature,
  canonicalizeProperties,
  diffCanonicalProperties,
  signatureOfStyle,
  type SignatureInput,
  type SignatureOptions,
  type StyleSignature,
} from "./verify/signature.js";
export { matchContexts, type MatchOutcome, type MatchedPair } from "./verify/matcher.js";
export * from "./verify/comparators/index.js";
export {
  DEFAULT_SEVERITY_POLICY,
  parseSeverityPolicy,
  resolveSeverity,
  type EscalationRule,
  type SeverityPolicy,
} from "./verify/policy.js";
export { aggregateMismatches, compareMismatches, reportDigest } from "./verify/aggregator.js";
export { describeLocation } from "./verify/location.js";
export { recommendAction } from "./verify/recommendation.js";
export { VerificationRun, canTransition, isTerminal } from "./verify/run_state.js";
export { DEFAULT_CONCURRENCY, verify, type VerifyOptions } from "./verify/orchestrator.js";
export { summarizeResults } from "./verify/summary.js";
export {
  VerificationService,
  type ServiceConfig,
  type VerifyDocumentRequest,
} from "./verify/service.js";

export { JsonContextExtractor, type ContextExtractor } from "./extraction/json_extractor.js";
export { ingestTemplateDefinition, type IngestOptions } from "./templates/ingest.js";
export { templateStats } from "./templates/stats.js";
export { TemplateDefinitionSchema, type TemplateDefinition } from "./templates/template_schema.js";

export type { StyleRepository, RepositoryOptions } from "./storage/types.js";
export { InMemoryStyleRepository } from "./storage/memory_repository.js";
export { DrizzleStyleRepository } from "./storage/drizzle_repository.js";
export { createConnection, type DatabaseConnection, type StyleDatabase } from "./db/connection.js";
