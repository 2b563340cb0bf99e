import {
  pgTable,
  text,
  timestamp,
  integer,
  bigint,
  boolean,
  jsonb,
  uuid,
  varchar,
  doublePrecision,
  serial,
  index,
} from "drizzle-orm/pg-core";
import {
  MISMATCH_CATEGORIES,
  SEVERITIES,
  STYLE_TYPES,
  TAB_ALIGNMENTS,
  TAB_LEADERS,
  TEMPLATE_STATUSES,
  VERIFICATION_STATUSES,
  type DiscrepancyValue,
  type FormattingContext,
  type PropertyBag,
  type VerificationWarning,
  type VerificationWarningCode,
} from "../shared/types.js";

// ── Templates ──────────────────────────────────────────────────────
export const templates = pgTable(
  "templates",
  {
    id: serial("id").primaryKey(),
    name: varchar("name", { length: 255 }).notNull(),
    description: text("description").notNull().default(""),
    fileName: varchar("file_name", { length: 255 }).notNull(),
    filePath: text("file_path").notNull().default(""),
    fileHash: varchar("file_hash", { length: 64 }).notNull(),
    fileSize: bigint("file_size", { mode: "number" }).notNull().default(0),
    status: varchar("status", { length: 20, enum: TEMPLATE_STATUSES }).notNull().default("Active"),
    version: integer("version").notNull().default(1),
    createdBy: varchar("created_by", { length: 100 }).notNull(),
    createdOn: timestamp("created_on").notNull().defaultNow(),
    modifiedBy: varchar("modified_by", { length: 100 }),
    modifiedOn: timestamp("modified_on"),
  },
  (table) => ({
    nameStatusIdx: index("templates_name_status_idx").on(table.name, table.status),
  }),
);

// ── Text Styles ────────────────────────────────────────────────────
export const textStyles = pgTable(
  "text_styles",
  {
    id: serial("id").primaryKey(),
    templateId: integer("template_id")
      .notNull()
      .references(() => templates.id, { onDelete: "cascade" }),
    name: varchar("name", { length: 255 }).notNull(),
    styleType: varchar("style_type", { length: 20, enum: STYLE_TYPES }).notNull(),
    fontFamily: varchar("font_family", { length: 100 }),
    fontSize: doublePrecision("font_size"),
    color: varchar("color", { length: 20 }),
    alignment: varchar("alignment", { length: 20 }),
    properties: jsonb("properties").$type<PropertyBag>().notNull(),
    signature: text("signature").notNull(),
    signatureTruncated: boolean("signature_truncated").notNull().default(false),
    formattingContext: jsonb("formatting_context").$type<FormattingContext>().notNull(),
    version: integer("version").notNull().default(1),
  },
  (table) => ({
    templateIdx: index("text_styles_template_idx").on(table.templateId),
  }),
);

// ── Direct Format Patterns ─────────────────────────────────────────
export const directFormatPatterns = pgTable("direct_format_patterns", {
  id: serial("id").primaryKey(),
  textStyleId: integer("text_style_id")
    .notNull()
    .references(() => textStyles.id, { onDelete: "cascade" }),
  patternName: varchar("pattern_name", { length: 255 }).notNull(),
  context: text("context").notNull(),
  properties: jsonb("properties").$type<PropertyBag>().notNull(),
  sampleText: text("sample_text"),
  occurrenceCount: integer("occurrence_count"),
  sortOrder: integer("sort_order").notNull(),
});

// ── Tab Stops ──────────────────────────────────────────────────────
export const tabStops = pgTable("tab_stops", {
  id: serial("id").primaryKey(),
  textStyleId: integer("text_style_id")
    .notNull()
    .references(() => textStyles.id, { onDelete: "cascade" }),
  position: doublePrecision("position"),
  alignment: varchar("alignment", { length: 20, enum: TAB_ALIGNMENTS }).notNull(),
  leader: varchar("leader", { length: 20, enum: TAB_LEADERS }).notNull(),
  sortOrder: integer("sort_order").notNull(),
});

// ── Verification Results ───────────────────────────────────────────
export const verificationResults = pgTable(
  "verification_results",
  {
    id: serial("id").primaryKey(),
    runId: uuid("run_id").notNull().unique(),
    templateId: integer("template_id")
      .notNull()
      .references(() => templates.id, { onDelete: "restrict" }),
    templateName: varchar("template_name", { length: 255 }).notNull(),
    templateVersion: integer("template_version").notNull(),
    documentName: varchar("document_name", { length: 255 }).notNull(),
    documentPath: text("document_path").notNull().default(""),
    status: varchar("status", { length: 20, enum: VERIFICATION_STATUSES }).notNull(),
    verifiedAt: timestamp("verified_at").notNull(),
    totalMismatches: integer("total_mismatches").notNull().default(0),
    errorMessage: text("error_message").notNull().default(""),
    warnings: jsonb("warnings").$type<VerificationWarning[]>().notNull(),
    reportDigest: varchar("report_digest", { length: 64 }).notNull(),
    createdBy: varchar("created_by", { length: 100 }).notNull(),
    createdOn: timestamp("created_on").notNull().defaultNow(),
  },
  (table) => ({
    templateIdx: index("verification_results_template_idx").on(table.templateId),
    verifiedAtIdx: index("verification_results_verified_at_idx").on(table.verifiedAt),
  }),
);

// ── Mismatches ─────────────────────────────────────────────────────
export const mismatches = pgTable(
  "mismatches",
  {
    id: serial("id").primaryKey(),
    verificationResultId: integer("verification_result_id")
      .notNull()
      .references(() => verificationResults.id, { onDelete: "cascade" }),
    sortOrder: integer("sort_order").notNull(),
    contextKey: text("context_key").notNull(),
    location: text("location").notNull(),
    structuralRole: varchar("structural_role", { length: 100 }).notNull(),
    category: varchar("category", { length: 40, enum: MISMATCH_CATEGORIES }).notNull(),
    fields: jsonb("fields").$type<string[]>().notNull(),
    mismatchFields: text("mismatch_fields").notNull(),
    expected: jsonb("expected").$type<Record<string, DiscrepancyValue>>().notNull(),
    actual: jsonb("actual").$type<Record<string, DiscrepancyValue>>().notNull(),
    sampleText: text("sample_text").notNull().default(""),
    severity: varchar("severity", { length: 10, enum: SEVERITIES }).notNull(),
    recommendedAction: text("recommended_action").notNull().default(""),
    warnings: jsonb("warnings").$type<VerificationWarningCode[]>().notNull(),
    detectedAt: timestamp("detected_at").notNull(),
  },
  (table) => ({
    resultIdx: index("mismatches_result_idx").on(table.verificationResultId),
  }),
);
