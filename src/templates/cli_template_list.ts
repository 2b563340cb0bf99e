#!/usr/bin/env tsx
/**
 * CLI: template:list
 *
 * Usage: npm run template:list [-- --name <name>] [--status <status>]
 *
 * Lists stored template versions with their style counts. Reads from
 * PostgreSQL (DATABASE_URL).
 */

import "dotenv/config";
import { createConnection } from "../db/connection.js";
import { errorMessage } from "../shared/errors.js";
import { loadVerifyConfig } from "../shared/run_config.js";
import { TEMPLATE_STATUSES, type TemplateFilter, type TemplateStatus } from "../shared/types.js";
import { DrizzleStyleRepository } from "../storage/drizzle_repository.js";
import { templateStats } from "./stats.js";

function isStatus(value: string): value is TemplateStatus {
  return TEMPLATE_STATUSES.some((s) => s === value);
}

async function main() {
  const args = process.argv.slice(2);
  const filter: TemplateFilter = {};

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--name" && i + 1 < args.length) {
      filter.name = args[i + 1];
      i++;
    } else if (args[i] === "--status" && i + 1 < args.length) {
      const status = args[i + 1];
      if (!isStatus(status)) {
        console.error(`--status must be one of ${TEMPLATE_STATUSES.join(", ")}`);
        process.exit(1);
      }
      filter.status = status;
      i++;
    }
  }

  const config = loadVerifyConfig(process.env);
  if (!config.databaseUrl) {
    console.error("DATABASE_URL is not set");
    process.exit(1);
  }

  const { pool, db } = createConnection(config.databaseUrl);
  try {
    const templates = await new DrizzleStyleRepository(db).listTemplates(filter);
    console.log(`  Templates: ${templates.length}`);
    console.log();

    for (const t of templates.map(templateStats)) {
      const types = Object.entries(t.styleTypeBreakdown)
        .map(([type, n]) => `${type} ${n}`)
        .join(", ");
      console.log(`  #${t.templateId}  ${t.templateName} (v${t.version})`);
      console.log(`    Status:    ${t.status}`);
      console.log(`    Styles:    ${t.totalStyles}${types ? ` (${types})` : ""}`);
      console.log(`    Patterns:  ${t.directFormatPatternsCount}`);
      console.log(`    Tab stops: ${t.tabStopsCount}`);
      console.log(`    Size:      ${t.fileSize} bytes`);
      console.log(`    Processed: ${t.lastProcessed.toISOString()}`);
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
