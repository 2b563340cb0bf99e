/**
 * Run Configuration Module
 *
 * Environment-driven settings for verification runs:
 * - DATABASE_URL:                  PostgreSQL connection (optional; CLI --db)
 * - STYLE_VERIFY_CONCURRENCY:      pair-comparison workers, 1–64 (default 4)
 * - STYLE_VERIFY_SIGNATURE_MAX:    signature length cap, 80–5000 (default 500)
 * - STYLE_VERIFY_SEVERITY_POLICY:  path to a JSON severity policy
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { DEFAULT_SEVERITY_POLICY, parseSeverityPolicy, type SeverityPolicy } from "../verify/policy.js";
import { ConfigError, errorMessage } from "./errors.js";

export interface VerifyConfig {
  databaseUrl?: string;
  concurrency: number;
  signatureMaxLength: number;
  policy: SeverityPolicy;
  policyPath?: string;
}

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  DATABASE_URL: z.preprocess(blankToUndefined, z.string().optional()),
  STYLE_VERIFY_CONCURRENCY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(64).default(4),
  ),
  STYLE_VERIFY_SIGNATURE_MAX: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(80).max(5000).default(500),
  ),
  STYLE_VERIFY_SEVERITY_POLICY: z.preprocess(blankToUndefined, z.string().optional()),
});

/** Read and validate a severity policy JSON file. */
export function loadSeverityPolicy(policyPath: string): SeverityPolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(policyPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read severity policy ${policyPath}: ${errorMessage(err)}`);
  }
  return parseSeverityPolicy(raw);
}

export function loadVerifyConfig(env: Record<string, string | undefined>): VerifyConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const policyPath = parsed.data.STYLE_VERIFY_SEVERITY_POLICY;
  return {
    databaseUrl: parsed.data.DATABASE_URL,
    concurrency: parsed.data.STYLE_VERIFY_CONCURRENCY,
    signatureMaxLength: parsed.data.STYLE_VERIFY_SIGNATURE_MAX,
    policy: policyPath ? loadSeverityPolicy(policyPath) : DEFAULT_SEVERITY_POLICY,
    policyPath,
  };
}
