/**
 * Row ↔ domain mapping for the PostgreSQL tables. Pure functions so the
 * mapping can be tested without a database.
 */

import type * as schema from "../db/schema.js";
import type {
  DirectFormatPattern,
  Mismatch,
  TabStop,
  Template,
  TextStyle,
  VerificationResult,
} from "../shared/types.js";

export type TemplateRow = typeof schema.templates.$inferSelect;
export type TemplateInsert = typeof schema.templates.$inferInsert;
export type TextStyleRow = typeof schema.textStyles.$inferSelect;
export type TextStyleInsert = typeof schema.textStyles.$inferInsert;
export type DirectFormatPatternRow = typeof schema.directFormatPatterns.$inferSelect;
export type DirectFormatPatternInsert = typeof schema.directFormatPatterns.$inferInsert;
export type TabStopRow = typeof schema.tabStops.$inferSelect;
export type TabStopInsert = typeof schema.tabStops.$inferInsert;
export type VerificationResultRow = typeof schema.verificationResults.$inferSelect;
export type VerificationResultInsert = typeof schema.verificationResults.$inferInsert;
export type MismatchRow = typeof schema.mismatches.$inferSelect;
export type MismatchInsert = typeof schema.mismatches.$inferInsert;

// ── Templates ──────────────────────────────────────────────────────

export function textStyleToRow(
  style: Omit<TextStyle, "id">,
): TextStyleInsert {
  return {
    templateId: style.templateId,
    name: style.name,
    styleType: style.styleType,
    fontFamily: style.fontFamily ?? null,
    fontSize: style.fontSize ?? null,
    color: style.color ?? null,
    alignment: style.alignment ?? null,
    properties: style.properties,
    signature: style.signature,
    signatureTruncated: style.signatureTruncated,
    formattingContext: style.context,
    version: style.version,
  };
}

export function patternsToRows(
  textStyleId: number,
  patterns: readonly DirectFormatPattern[],
): DirectFormatPatternInsert[] {
  return patterns.map((pattern, sortOrder) => ({
    textStyleId,
    patternName: pattern.patternName,
    context: pattern.context,
    properties: pattern.properties,
    sampleText: pattern.sampleText ?? null,
    occurrenceCount: pattern.occurrenceCount ?? null,
    sortOrder,
  }));
}

export function tabStopsToRows(textStyleId: number, tabs: readonly TabStop[]): TabStopInsert[] {
  return tabs.map((tab, sortOrder) => ({
    textStyleId,
    position: tab.position ?? null,
    alignment: tab.alignment,
    leader: tab.leader,
    sortOrder,
  }));
}

function bySortOrder<T extends { sortOrder: number }>(a: T, b: T): number {
  return a.sortOrder - b.sortOrder;
}

export function rowToPattern(row: DirectFormatPatternRow): DirectFormatPattern {
  return {
    patternName: row.patternName,
    context: row.context,
    properties: row.properties,
    sampleText: row.sampleText ?? undefined,
    occurrenceCount: row.occurrenceCount ?? undefined,
  };
}

export function rowToTabStop(row: TabStopRow): TabStop {
  return { position: row.position, alignment: row.alignment, leader: row.leader };
}

export function rowToTextStyle(
  row: TextStyleRow,
  patterns: readonly DirectFormatPatternRow[],
  tabs: readonly TabStopRow[],
): TextStyle {
  return {
    id: row.id,
    templateId: row.templateId,
    name: row.name,
    styleType: row.styleType,
    fontFamily: row.fontFamily,
    fontSize: row.fontSize,
    color: row.color,
    alignment: row.alignment,
    properties: row.properties,
    signature: row.signature,
    signatureTruncated: row.signatureTruncated,
    version: row.version,
    context: row.formattingContext,
    directFormatPatterns: patterns
      .filter((p) => p.textStyleId === row.id)
      .sort(bySortOrder)
      .map(rowToPattern),
    tabStops: tabs
      .filter((t) => t.textStyleId === row.id)
      .sort(bySortOrder)
      .map(rowToTabStop),
  };
}

export function rowToTemplate(row: TemplateRow, textStyles: TextStyle[]): Template {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    fileName: row.fileName,
    filePath: row.filePath,
    fileHash: row.fileHash,
    fileSize: row.fileSize,
    status: row.status,
    version: row.version,
    createdBy: row.createdBy,
    createdOn: row.createdOn,
    modifiedBy: row.modifiedBy,
    modifiedOn: row.modifiedOn,
    textStyles,
  };
}

// ── Verification Results ───────────────────────────────────────────

export function resultToRow(result: VerificationResult): VerificationResultInsert {
  return {
    runId: result.runId,
    templateId: result.templateId,
    templateName: result.templateName,
    templateVersion: result.templateVersion,
    documentName: result.documentName,
    documentPath: result.documentPath,
    status: result.status,
    verifiedAt: result.verifiedAt,
    totalMismatches: result.totalMismatches,
    errorMessage: result.errorMessage,
    warnings: [...result.warnings],
    reportDigest: result.reportDigest,
    createdBy: result.createdBy,
    createdOn: result.createdOn,
  };
}

export function mismatchToRow(
  mismatch: Mismatch,
  verificationResultId: number,
  sortOrder: number,
): MismatchInsert {
  return {
    verificationResultId,
    sortOrder,
    contextKey: mismatch.contextKey,
    location: mismatch.location,
    structuralRole: mismatch.structuralRole,
    category: mismatch.category,
    fields: [...mismatch.fields],
    mismatchFields: mismatch.mismatchFields,
    expected: mismatch.expected,
    actual: mismatch.actual,
    sampleText: mismatch.sampleText,
    severity: mismatch.severity,
    recommendedAction: mismatch.recommendedAction,
    warnings: [...mismatch.warnings],
    detectedAt: mismatch.detectedAt,
  };
}

export function rowToMismatch(row: MismatchRow): Mismatch {
  return {
    id: row.id,
    contextKey: row.contextKey,
    location: row.location,
    structuralRole: row.structuralRole,
    category: row.category,
    fields: row.fields,
    mismatchFields: row.mismatchFields,
    expected: row.expected,
    actual: row.actual,
    sampleText: row.sampleText,
    severity: row.severity,
    recommendedAction: row.recommendedAction,
    warnings: row.warnings,
    detectedAt: row.detectedAt,
  };
}

export function rowToResult(
  row: VerificationResultRow,
  mismatchRows: readonly MismatchRow[],
): VerificationResult {
  return {
    id: row.id,
    runId: row.runId,
    templateId: row.templateId,
    templateName: row.templateName,
    templateVersion: row.templateVersion,
    documentName: row.documentName,
    documentPath: row.documentPath,
    status: row.status,
    verifiedAt: row.verifiedAt,
    totalMismatches: row.totalMismatches,
    errorMessage: row.errorMessage,
    warnings: row.warnings,
    reportDigest: row.reportDigest,
    createdBy: row.createdBy,
    createdOn: row.createdOn,
    mismatches: mismatchRows
      .filter((m) => m.verificationResultId === row.id)
      .sort(bySortOrder)
      .map(rowToMismatch),
  };
}
