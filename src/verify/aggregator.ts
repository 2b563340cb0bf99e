/**
 * Mismatch Aggregator
 *
 * Turns raw discrepancies from the matcher and comparators into the
 * final report:
 *   1. severity from the policy (category base + role escalation)
 *   2. dedup on (context key, sorted field set); the merged entry keeps
 *      the highest severity and the first category, location and
 *      recommended action
 *   3. order by severity desc, context key asc, field list asc
 *
 * The ordering is a reproducibility contract: comparisons use code-unit
 * order, never locale collation.
 */

import { contentHash } from "../shared/hash.js";
import type { Mismatch, RawDiscrepancy, VerificationWarningCode } from "../shared/types.js";
import { SEVERITY_RANK, maxSeverity, resolveSeverity, type SeverityPolicy } from "./policy.js";
import { recommendAction } from "./recommendation.js";

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareMismatches(a: Mismatch, b: Mismatch): number {
  const bySeverity = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
  if (bySeverity !== 0) return bySeverity;
  const byContext = compareText(a.contextKey, b.contextKey);
  if (byContext !== 0) return byContext;
  return compareText(a.mismatchFields, b.mismatchFields);
}

function detailKey(field: string, index: number | undefined): string {
  return index === undefined ? field : `${field}[${index}]`;
}

function mergeWarnings(
  a: readonly VerificationWarningCode[],
  b: readonly VerificationWarningCode[],
): VerificationWarningCode[] {
  return [...new Set([...a, ...b])].sort();
}

export function aggregateMismatches(
  raw: readonly RawDiscrepancy[],
  policy: SeverityPolicy,
  detectedAt: Date,
): Mismatch[] {
  const merged = new Map<string, Mismatch>();

  for (const discrepancy of raw) {
    if (discrepancy.fields.length === 0) continue;

    const fields = [...new Set(discrepancy.fields.map((f) => f.field))].sort(compareText);
    const mismatchFields = fields.join(",");
    const severity = resolveSeverity(policy, discrepancy.category, discrepancy.structuralRole);

    const expected: Mismatch["expected"] = {};
    const actual: Mismatch["actual"] = {};
    for (const tuple of discrepancy.fields) {
      const key = detailKey(tuple.field, tuple.index);
      if (!(key in expected)) expected[key] = tuple.expected;
      if (!(key in actual)) actual[key] = tuple.actual;
    }

    const dedupKey = `${discrepancy.contextKey}\u0000${mismatchFields}`;
    const existing = merged.get(dedupKey);
    if (existing) {
      existing.severity = maxSeverity(existing.severity, severity);
      existing.expected = { ...expected, ...existing.expected };
      existing.actual = { ...actual, ...existing.actual };
      existing.warnings = mergeWarnings(existing.warnings, discrepancy.warnings);
      continue;
    }

    merged.set(dedupKey, {
      contextKey: discrepancy.contextKey,
      location: discrepancy.location,
      structuralRole: discrepancy.structuralRole,
      category: discrepancy.category,
      fields,
      mismatchFields,
      expected,
      actual,
      sampleText: discrepancy.sampleText,
      severity,
      recommendedAction: recommendAction(discrepancy.category, discrepancy.fields),
      warnings: mergeWarnings([], discrepancy.warnings),
      detectedAt,
    });
  }

  return [...merged.values()].sort(compareMismatches).map((m) => Object.freeze(m));
}

/** SHA-256 over the ordered mismatch list, ignoring ids and timestamps. */
export function reportDigest(mismatches: readonly Mismatch[]): string {
  return contentHash(
    mismatches.map(({ id: _id, detectedAt: _detectedAt, ...rest }) => rest),
  );
}
