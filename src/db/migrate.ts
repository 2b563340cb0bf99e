import "dotenv/config";
import { sql } from "drizzle-orm";
import { errorMessage } from "../shared/errors.js";
import { loadVerifyConfig } from "../shared/run_config.js";
import { createConnection } from "./connection.js";

async function migrate() {
  const config = loadVerifyConfig(process.env);
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }
  const { pool, db } = createConnection(config.databaseUrl);

  console.log("Running migrations...");

  try {
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS templates (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        file_name VARCHAR(255) NOT NULL,
        file_path TEXT NOT NULL DEFAULT '',
        file_hash VARCHAR(64) NOT NULL,
        file_size BIGINT NOT NULL DEFAULT 0,
        status VARCHAR(20) NOT NULL DEFAULT 'Active',
        version INTEGER NOT NULL DEFAULT 1,
        created_by VARCHAR(100) NOT NULL,
        created_on TIMESTAMP NOT NULL DEFAULT NOW(),
        modified_by VARCHAR(100),
        modified_on TIMESTAMP
      )
    `);
    await db.execute(sql`
      CREATE INDEX IF NOT EXISTS templates_name_status_idx ON templates (name, status)
    `);

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS text_styles (
        id SERIAL PRIMARY KEY,
        template_id INTEGER NOT NULL REFERENCES templates(id) ON DELETE CASCADE,
        name VARCHAR(255) NOT NULL,
        style_type VARCHAR(20) NOT NULL,
        font_family VARCHAR(100),
        font_size DOUBLE PRECISION,
        color VARCHAR(20),
        alignment VARCHAR(20),
        properties JSONB NOT NULL,
        signature TEXT NOT NULL,
        signature_truncated BOOLEAN NOT NULL DEFAULT FALSE,
        formatting_context JSONB NOT NULL,
        version INTEGER NOT NULL DEFAULT 1
      )
    `);
    await db.execute(sql`
      CREATE INDEX IF NOT EXISTS text_styles_template_idx ON text_styles (template_id)
    `);

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS direct_format_patterns (
        id SERIAL PRIMARY KEY,
        text_style_id INTEGER NOT NULL REFERENCES text_styles(id) ON DELETE CASCADE,
        pattern_name VARCHAR(255) NOT NULL,
        context TEXT NOT NULL,
        properties JSONB NOT NULL,
        sample_text TEXT,
        occurrence_count INTEGER,
        sort_order INTEGER NOT NULL
      )
    `);

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS tab_stops (
        id SERIAL PRIMARY KEY,
        text_style_id INTEGER NOT NULL REFERENCES text_styles(id) ON DELETE CASCADE,
        position DOUBLE PRECISION,
        alignment VARCHAR(20) NOT NULL,
        leader VARCHAR(20) NOT NULL,
        sort_order INTEGER NOT NULL
      )
    `);

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS verification_results (
        id SERIAL PRIMARY KEY,
        run_id UUID NOT NULL UNIQUE,
        template_id INTEGER NOT NULL REFERENCES templates(id) ON DELETE RESTRICT,
        template_name VARCHAR(255) NOT NULL,
        template_version INTEGER NOT NULL,
        document_name VARCHAR(255) NOT NULL,
        document_path TEXT NOT NULL DEFAULT '',
        status VARCHAR(20) NOT NULL,
        verified_at TIMESTAMP NOT NULL,
        total_mismatches INTEGER NOT NULL DEFAULT 0,
        error_message TEXT NOT NULL DEFAULT '',
        warnings JSONB NOT NULL,
        report_digest VARCHAR(64) NOT NULL,
        created_by VARCHAR(100) NOT NULL,
        created_on TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);
    await db.execute(sql`
      CREATE INDEX IF NOT EXISTS verification_results_template_idx ON verification_results (template_id)
    `);
    await db.execute(sql`
      CREATE INDEX IF NOT EXISTS verification_results_verified_at_idx ON verification_results (verified_at)
    `);

    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS mismatches (
        id SERIAL PRIMARY KEY,
        verification_result_id INTEGER NOT NULL REFERENCES verification_results(id) ON DELETE CASCADE,
        sort_order INTEGER NOT NULL,
        context_key TEXT NOT NULL,
        location TEXT NOT NULL,
        structural_role VARCHAR(100) NOT NULL,
        category VARCHAR(40) NOT NULL,
        fields JSONB NOT NULL,
        mismatch_fields TEXT NOT NULL,
        expected JSONB NOT NULL,
        actual JSONB NOT NULL,
        sample_text TEXT NOT NULL DEFAULT '',
        severity VARCHAR(10) NOT NULL,
        recommended_action TEXT NOT NULL DEFAULT '',
        warnings JSONB NOT NULL,
        detected_at TIMESTAMP NOT NULL
      )
    `);
    await db.execute(sql`
      ALTER TABLE mismatches ADD COLUMN IF NOT EXISTS recommended_action TEXT NOT NULL DEFAULT ''
    `);
    await db.execute(sql`
      CREATE INDEX IF NOT EXISTS mismatches_result_idx ON mismatches (verification_result_id)
    `);

    console.log("Migrations complete.");
  } finally {
    await pool.end();
  }
}

migrate().catch((err) => {
  console.error("Migration failed:", errorMessage(err));
  process.exit(1);
});
