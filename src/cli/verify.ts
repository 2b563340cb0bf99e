#!/usr/bin/env node
/**
 * CLI: verify
 *
 * Usage: npm run verify -- --template <template.json> --document <document.json>
 *                          [--db] [--user <name>] [--json]
 *                          [--ignore-types <paragraph,character,table>]
 *
 * Verifies an extracted document against a template definition and
 * prints the ordered mismatch report. Without --db everything stays in
 * memory; with --db the template and result are stored in PostgreSQL.
 * Exits 1 when the run fails, 2 when it completes with mismatches.
 */

import "dotenv/config";
import path from "path";
import { existsSync, readFileSync } from "fs";
import { createConnection } from "../db/connection.js";
import { JsonContextExtractor } from "../extraction/json_extractor.js";
import { errorMessage } from "../shared/errors.js";
import { loadVerifyConfig } from "../shared/run_config.js";
import { STYLE_TYPES, type StyleType, type VerificationResult } from "../shared/types.js";
import { DrizzleStyleRepository } from "../storage/drizzle_repository.js";
import { InMemoryStyleRepository } from "../storage/memory_repository.js";
import type { StyleRepository } from "../storage/types.js";
import { ingestTemplateDefinition } from "../templates/ingest.js";
import { VerificationService } from "../verify/service.js";

interface CliArgs {
  templatePath: string;
  documentPath: string;
  useDb: boolean;
  user: string;
  json: boolean;
  ignoreStyleTypes: StyleType[];
}

function isStyleType(value: string): value is StyleType {
  return STYLE_TYPES.some((t) => t === value);
}

function parseStyleTypes(list: string): StyleType[] {
  return list.split(",").map((raw) => {
    const value = raw.trim();
    if (!isStyleType(value)) {
      throw new Error(`--ignore-types expects ${STYLE_TYPES.join(", ")}, got "${value}"`);
    }
    return value;
  });
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    templatePath: "",
    documentPath: "",
    useDb: false,
    user: "cli",
    json: false,
    ignoreStyleTypes: [],
  };
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--template" && i + 1 < args.length) {
      parsed.templatePath = args[i + 1];
      i++;
    } else if (args[i] === "--document" && i + 1 < args.length) {
      parsed.documentPath = args[i + 1];
      i++;
    } else if (args[i] === "--user" && i + 1 < args.length) {
      parsed.user = args[i + 1];
      i++;
    } else if (args[i] === "--ignore-types" && i + 1 < args.length) {
      parsed.ignoreStyleTypes = parseStyleTypes(args[i + 1]);
      i++;
    } else if (args[i] === "--db") {
      parsed.useDb = true;
    } else if (args[i] === "--json") {
      parsed.json = true;
    }
  }
  return parsed;
}

function formatValues(values: Record<string, unknown>): string {
  return Object.entries(values)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(", ");
}

function printReport(result: VerificationResult): void {
  console.log(`  Template:    ${result.templateName} (v${result.templateVersion})`);
  console.log(`  Document:    ${result.documentName}`);
  console.log(`  Status:      ${result.status}`);
  console.log(`  Mismatches:  ${result.totalMismatches}`);
  console.log(`  Digest:      ${result.reportDigest}`);
  if (result.errorMessage) console.log(`  Error:       ${result.errorMessage}`);
  for (const warning of result.warnings) {
    console.log(`  ! ${warning.code}: ${warning.side} ${warning.contextKey} (${warning.styleName})`);
  }
  console.log();

  for (const m of result.mismatches) {
    console.log(`  [${m.severity}] ${m.category}  ${m.contextKey}  ${m.location}`);
    console.log(`      fields:   ${m.mismatchFields}`);
    console.log(`      expected: ${formatValues(m.expected)}`);
    console.log(`      actual:   ${formatValues(m.actual)}`);
    console.log(`      action:   ${m.recommendedAction}`);
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.templatePath || !args.documentPath) {
    console.error(
      "Usage: npm run verify -- --template <template.json> --document <document.json> [--db] [--user <name>] [--json]",
    );
    process.exit(1);
  }

  const templateFile = path.resolve(args.templatePath);
  const documentFile = path.resolve(args.documentPath);
  for (const file of [templateFile, documentFile]) {
    if (!existsSync(file)) {
      console.error(`File not found: ${file}`);
      process.exit(1);
    }
  }

  const config = loadVerifyConfig(process.env);
  let repository: StyleRepository = new InMemoryStyleRepository();
  let close = async (): Promise<void> => {};

  if (args.useDb) {
    if (!config.databaseUrl) {
      console.error("--db requires DATABASE_URL");
      process.exit(1);
    }
    const { pool, db } = createConnection(config.databaseUrl);
    repository = new DrizzleStyleRepository(db);
    close = () => pool.end();
  }

  try {
    const draft = ingestTemplateDefinition(
      readFileSync(templateFile),
      path.basename(templateFile),
      args.user,
      { filePath: templateFile, signatureMaxLength: config.signatureMaxLength },
    );
    const template = await repository.saveTemplate(draft);

    const service = new VerificationService(repository, new JsonContextExtractor(), {
      concurrency: config.concurrency,
      signatureMaxLength: config.signatureMaxLength,
      policy: config.policy,
      ignoreStyleTypes: args.ignoreStyleTypes,
    });

    const result = await service.verifyDocument({
      templateName: template.name,
      document: {
        name: path.basename(documentFile),
        path: documentFile,
        bytes: readFileSync(documentFile),
      },
      createdBy: args.user,
    });

    if (args.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printReport(result);
    }

    if (result.status === "Failed") process.exitCode = 1;
    else if (result.totalMismatches > 0) process.exitCode = 2;
  } finally {
    await close();
  }
}

main().catch((err) => {
  console.error(`  ✗ ${errorMessage(err)}`);
  process.exit(1);
});
