import type { MismatchCategory, VerificationResult, VerificationSummary } from "../shared/types.js";

const RECENT_LIMIT = 10;

/**
 * Totals over a set of results. `results` is expected newest first;
 * the first ten become `recentVerifications`.
 */
export function summarizeResults(results: readonly VerificationResult[]): VerificationSummary {
  const bySeverity: VerificationSummary["mismatchesBySeverity"] = { Low: 0, Medium: 0, High: 0 };
  const byCategory: Partial<Record<MismatchCategory, number>> = {};
  let totalMismatches = 0;

  for (const result of results) {
    for (const mismatch of result.mismatches) {
      totalMismatches++;
      bySeverity[mismatch.severity]++;
      byCategory[mismatch.category] = (byCategory[mismatch.category] ?? 0) + 1;
    }
  }

  return {
    totalVerifications: results.length,
    completedVerifications: results.filter((r) => r.status === "Completed").length,
    failedVerifications: results.filter((r) => r.status === "Failed").length,
    totalMismatches,
    mismatchesBySeverity: bySeverity,
    mismatchesByCategory: byCategory,
    recentVerifications: results.slice(0, RECENT_LIMIT),
  };
}
