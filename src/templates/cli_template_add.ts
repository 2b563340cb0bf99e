#!/usr/bin/env tsx
/**
 * CLI: template:add
 *
 * Usage: npm run template:add -- --file <template.json> [--user <name>]
 *
 * Ingests a template definition into PostgreSQL (DATABASE_URL). An
 * unchanged definition keeps its current version; a changed one becomes
 * a new active version and archives the previous one.
 */

import "dotenv/config";
import path from "path";
import { existsSync, readFileSync } from "fs";
import { createConnection } from "../db/connection.js";
import { errorMessage } from "../shared/errors.js";
import { loadVerifyConfig } from "../shared/run_config.js";
import { DrizzleStyleRepository } from "../storage/drizzle_repository.js";
import { ingestTemplateDefinition } from "./ingest.js";

async function main() {
  const args = process.argv.slice(2);
  let filePath = "";
  let user = "cli";

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--file" && i + 1 < args.length) {
      filePath = args[i + 1];
      i++;
    }
    if (args[i] === "--user" && i + 1 < args.length) {
      user = args[i + 1];
      i++;
    }
  }

  if (!filePath) {
    console.error("Usage: npm run template:add -- --file <template.json> [--user <name>]");
    process.exit(1);
  }

  const resolved = path.resolve(filePath);
  if (!existsSync(resolved)) {
    console.error(`Template definition not found: ${resolved}`);
    process.exit(1);
  }

  const config = loadVerifyConfig(process.env);
  if (!config.databaseUrl) {
    console.error("DATABASE_URL is not set");
    process.exit(1);
  }

  const draft = ingestTemplateDefinition(readFileSync(resolved), path.basename(resolved), user, {
    filePath: resolved,
    signatureMaxLength: config.signatureMaxLength,
  });

  const { pool, db } = createConnection(config.databaseUrl);
  try {
    const template = await new DrizzleStyleRepository(db).saveTemplate(draft);
    console.log(`  Template:   ${template.name}`);
    console.log(`  Version:    ${template.version}`);
    console.log(`  Styles:     ${template.textStyles.length}`);
    console.log(`  File hash:  ${template.fileHash}`);
    console.log();
    console.log(`  ✓ Template ingested`);
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(`  ✗ ${errorMessage(err)}`);
  process.exit(1);
});
