/**
 * Stage Handler Barrel Export
 */

export { handleResolveTemplate } from "./resolve_template.js";
export { handlePrepareDocument } from "./prepare_document.js";
export { handleMatchContexts } from "./match_contexts.js";
export { handleComparePairs } from "./compare_pairs.js";
export { handleAggregateMismatches } from "./aggregate_mismatches.js";
