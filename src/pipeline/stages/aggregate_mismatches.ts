/**
 * AGGREGATE_MISMATCHES Stage — severity, dedup and ordering over the
 * complete set of raw discrepancies.
 */

import type { VerificationWarning } from "../../shared/types.js";
import { aggregateMismatches } from "../../verify/aggregator.js";
import type { StageHandler } from "../types.js";

function compareWarnings(a: VerificationWarning, b: VerificationWarning): number {
  const left = `${a.side}\u0000${a.contextKey}\u0000${a.styleName}`;
  const right = `${b.side}\u0000${b.contextKey}\u0000${b.styleName}`;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export const handleAggregateMismatches: StageHandler = async (_input, store, config) => {
  const raw = [
    ...store.get("raw_discrepancies", "structural"),
    ...store.get("raw_discrepancies", "pairs"),
  ];
  const mismatches = aggregateMismatches(raw, config.policy, config.detectedAt);

  const warnings = [
    ...store.get("warnings", "template"),
    ...store.get("warnings", "document"),
  ].sort(compareWarnings);

  return [
    store.set("mismatches", config.runId, mismatches),
    store.set("warnings", config.runId, warnings),
  ];
};
