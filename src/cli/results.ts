#!/usr/bin/env node
/**
 * CLI: results
 *
 * Usage: npm run results -- [--template-id <id>] [--status <status>] [--since <iso-date>]
 *
 * Lists stored verification results (newest first) with severity and
 * category totals. Reads from PostgreSQL (DATABASE_URL).
 */

import "dotenv/config";
import { createConnection } from "../db/connection.js";
import { JsonContextExtractor } from "../extraction/json_extractor.js";
import { errorMessage } from "../shared/errors.js";
import { loadVerifyConfig } from "../shared/run_config.js";
import {
  VERIFICATION_STATUSES,
  type VerificationResultFilter,
  type VerificationStatus,
} from "../shared/types.js";
import { DrizzleStyleRepository } from "../storage/drizzle_repository.js";
import { VerificationService } from "../verify/service.js";

function isStatus(value: string): value is VerificationStatus {
  return VERIFICATION_STATUSES.some((s) => s === value);
}

function parseFilter(args: string[]): VerificationResultFilter {
  const filter: VerificationResultFilter = {};
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === "--template-id" && value !== undefined) {
      const id = Number.parseInt(value, 10);
      if (Number.isNaN(id)) throw new Error(`--template-id expects a number, got "${value}"`);
      filter.templateId = id;
      i++;
    } else if (args[i] === "--status" && value !== undefined) {
      if (!isStatus(value)) {
        throw new Error(`--status must be one of ${VERIFICATION_STATUSES.join(", ")}`);
      }
      filter.status = value;
      i++;
    } else if (args[i] === "--since" && value !== undefined) {
      const since = new Date(value);
      if (Number.isNaN(since.getTime())) throw new Error(`--since expects an ISO date, got "${value}"`);
      filter.from = since;
      i++;
    }
  }
  return filter;
}

async function main() {
  const filter = parseFilter(process.argv.slice(2));
  const config = loadVerifyConfig(process.env);
  if (!config.databaseUrl) {
    console.error("DATABASE_URL is not set");
    process.exit(1);
  }

  const { pool, db } = createConnection(config.databaseUrl);
  try {
    const service = new VerificationService(new DrizzleStyleRepository(db), new JsonContextExtractor());
    const results = await service.listResults(filter);
    const summary = await service.summarize(filter);

    console.log(`  Verifications: ${summary.totalVerifications}`);
    console.log(`    Completed:   ${summary.completedVerifications}`);
    console.log(`    Failed:      ${summary.failedVerifications}`);
    console.log(`  Mismatches:    ${summary.totalMismatches}`);
    for (const [severity, n] of Object.entries(summary.mismatchesBySeverity)) {
      console.log(`    ${severity.padEnd(12)} ${n}`);
    }
    console.log();

    for (const r of results) {
      console.log(`  #${r.id ?? "?"}  ${r.verifiedAt.toISOString()}`);
      console.log(`    Template:   ${r.templateName} (v${r.templateVersion})`);
      console.log(`    Document:   ${r.documentName}`);
      console.log(`    Status:     ${r.status}`);
      console.log(`    Mismatches: ${r.totalMismatches}`);
      if (r.errorMessage) console.log(`    Error:      ${r.errorMessage}`);
      console.log();
    }
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(`  ✗ ${errorMessage(err)}`);
  process.exit(1);
});
