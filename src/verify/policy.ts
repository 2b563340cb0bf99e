/**
 * Severity Policy
 *
 * Category → severity table plus role-based escalation rules. The
 * heading escalation is the default rule, not a constant: policies can
 * be loaded from JSON and replace it.
 */

import { z } from "zod";
import { ConfigError } from "../shared/errors.js";
import {
  MISMATCH_CATEGORIES,
  SEVERITIES,
  type MismatchCategory,
  type Severity,
} from "../shared/types.js";

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  Low: 1,
  Medium: 2,
  High: 3,
};

export interface EscalationRule {
  /** Case-insensitive regular expression tested against the structural role. */
  rolePattern: string;
  categories: MismatchCategory[];
  severity: Severity;
}

export interface SeverityPolicy {
  categories: Record<MismatchCategory, Severity>;
  escalations: EscalationRule[];
}

export const DEFAULT_SEVERITY_POLICY: SeverityPolicy = {
  categories: {
    MissingInDocument: "Medium",
    UnexpectedInDocument: "Medium",
    StyleMismatch: "High",
    DirectFormatMismatch: "Medium",
    TabStopMismatch: "Medium",
  },
  escalations: [
    {
      rolePattern: "^heading",
      categories: ["DirectFormatMismatch", "TabStopMismatch"],
      severity: "High",
    },
  ],
};

// ── Schema ─────────────────────────────────────────────────────────

const SeveritySchema = z.enum(SEVERITIES);

const CategorySchema = z.enum(MISMATCH_CATEGORIES);

const EscalationRuleSchema = z.object({
  rolePattern: z.string().min(1),
  categories: z.array(CategorySchema).min(1),
  severity: SeveritySchema,
});

export const SeverityPolicySchema = z.object({
  categories: z.record(CategorySchema, SeveritySchema).optional(),
  escalations: z.array(EscalationRuleSchema).optional(),
});

/**
 * Parse a policy document. Category entries override the defaults one
 * by one; a supplied `escalations` list replaces the default rules.
 */
export function parseSeverityPolicy(raw: unknown): SeverityPolicy {
  const parsed = SeverityPolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid severity policy", parsed.error.flatten());
  }

  const escalations = parsed.data.escalations ?? DEFAULT_SEVERITY_POLICY.escalations;
  for (const rule of escalations) {
    try {
      new RegExp(rule.rolePattern, "i");
    } catch (err) {
      throw new ConfigError(`Invalid rolePattern "${rule.rolePattern}"`, String(err));
    }
  }

  return {
    categories: { ...DEFAULT_SEVERITY_POLICY.categories, ...parsed.data.categories },
    escalations,
  };
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

/** Severity for one discrepancy: the category base, raised by any matching escalation. */
export function resolveSeverity(
  policy: SeverityPolicy,
  category: MismatchCategory,
  structuralRole: string,
): Severity {
  let severity = policy.categories[category];
  for (const rule of policy.escalations) {
    if (!rule.categories.includes(category)) continue;
    if (!new RegExp(rule.rolePattern, "i").test(structuralRole)) continue;
    severity = maxSeverity(severity, rule.severity);
  }
  return severity;
}
