/**
 * DrizzleStyleRepository — StyleRepository on PostgreSQL through
 * drizzle-orm. Multi-table writes run in a transaction.
 */

import { and, asc, count, desc, eq, gte, inArray, lte } from "drizzle-orm";
import type { StyleDatabase } from "../db/connection.js";
import * as schema from "../db/schema.js";
import {
  TemplateInUseError,
  TemplateInactiveError,
  TemplateNotFoundError,
} from "../shared/errors.js";
import type {
  Template,
  TemplateDraft,
  TemplateFilter,
  TextStyle,
  VerificationResult,
  VerificationResultFilter,
} from "../shared/types.js";
import {
  mismatchToRow,
  patternsToRows,
  resultToRow,
  rowToResult,
  rowToTemplate,
  rowToTextStyle,
  tabStopsToRows,
  textStyleToRow,
  type TemplateRow,
} from "./mappers.js";
import type { RepositoryOptions, StyleRepository } from "./types.js";

export class DrizzleStyleRepository implements StyleRepository {
  private readonly now: () => Date;

  constructor(
    private readonly db: StyleDatabase,
    options: RepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private async hydrate(row: TemplateRow): Promise<Template> {
    const styleRows = await this.db
      .select()
      .from(schema.textStyles)
      .where(eq(schema.textStyles.templateId, row.id))
      .orderBy(asc(schema.textStyles.id));

    const styleIds = styleRows.map((s) => s.id);
    if (styleIds.length === 0) return rowToTemplate(row, []);

    const patternRows = await this.db
      .select()
      .from(schema.directFormatPatterns)
      .where(inArray(schema.directFormatPatterns.textStyleId, styleIds));
    const tabRows = await this.db
      .select()
      .from(schema.tabStops)
      .where(inArray(schema.tabStops.textStyleId, styleIds));

    const styles: TextStyle[] = styleRows.map((s) => rowToTextStyle(s, patternRows, tabRows));
    return rowToTemplate(row, styles);
  }

  async loadActiveTemplate(name: string): Promise<Template> {
    const versions = await this.db
      .select()
      .from(schema.templates)
      .where(eq(schema.templates.name, name))
      .orderBy(desc(schema.templates.version));

    if (versions.length === 0) throw new TemplateNotFoundError(name);
    const active = versions.find((t) => t.status === "Active");
    if (!active) throw new TemplateInactiveError(name, versions[0].status);
    return this.hydrate(active);
  }

  async saveTemplate(draft: TemplateDraft): Promise<Template> {
    const templateId = await this.db.transaction(async (tx) => {
      const versions = await tx
        .select()
        .from(schema.templates)
        .where(eq(schema.templates.name, draft.name))
        .orderBy(desc(schema.templates.version));

      const current = versions.find((t) => t.status === "Active");
      if (current && current.fileHash === draft.fileHash) return current.id;

      const timestamp = this.now();
      if (current) {
        await tx
          .update(schema.templates)
          .set({ status: "Archived", modifiedBy: draft.createdBy, modifiedOn: timestamp })
          .where(eq(schema.templates.id, current.id));
      }

      const version = (versions[0]?.version ?? 0) + 1;
      const [inserted] = await tx
        .insert(schema.templates)
        .values({
          name: draft.name,
          description: draft.description,
          fileName: draft.fileName,
          filePath: draft.filePath,
          fileHash: draft.fileHash,
          fileSize: draft.fileSize,
          status: "Active",
          version,
          createdBy: draft.createdBy,
          createdOn: timestamp,
        })
        .returning({ id: schema.templates.id });

      for (const style of draft.textStyles) {
        const [styleRow] = await tx
          .insert(schema.textStyles)
          .values(textStyleToRow({ ...style, templateId: inserted.id, version }))
          .returning({ id: schema.textStyles.id });

        const patterns = patternsToRows(styleRow.id, style.directFormatPatterns);
        if (patterns.length > 0) await tx.insert(schema.directFormatPatterns).values(patterns);
        const tabs = tabStopsToRows(styleRow.id, style.tabStops);
        if (tabs.length > 0) await tx.insert(schema.tabStops).values(tabs);
      }

      return inserted.id;
    });

    const [row] = await this.db
      .select()
      .from(schema.templates)
      .where(eq(schema.templates.id, templateId));
    return this.hydrate(row);
  }

  async listTemplates(filter: TemplateFilter = {}): Promise<Template[]> {
    const t = schema.templates;
    const rows = await this.db
      .select()
      .from(t)
      .where(
        and(
          filter.name !== undefined ? eq(t.name, filter.name) : undefined,
          filter.status !== undefined ? eq(t.status, filter.status) : undefined,
        ),
      )
      .orderBy(asc(t.name), desc(t.version));

    const templates: Template[] = [];
    for (const row of rows) templates.push(await this.hydrate(row));
    return templates;
  }

  async deleteTemplate(id: number): Promise<void> {
    const [{ value }] = await this.db
      .select({ value: count() })
      .from(schema.verificationResults)
      .where(eq(schema.verificationResults.templateId, id));
    if (value > 0) throw new TemplateInUseError(id, value);
    await this.db.delete(schema.templates).where(eq(schema.templates.id, id));
  }

  async saveVerificationResult(result: VerificationResult): Promise<number> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(schema.verificationResults)
        .values(resultToRow(result))
        .returning({ id: schema.verificationResults.id });

      const mismatchRows = result.mismatches.map((m, sortOrder) =>
        mismatchToRow(m, row.id, sortOrder),
      );
      if (mismatchRows.length > 0) await tx.insert(schema.mismatches).values(mismatchRows);
      return row.id;
    });
  }

  async getVerificationResult(id: number): Promise<VerificationResult | null> {
    const [row] = await this.db
      .select()
      .from(schema.verificationResults)
      .where(eq(schema.verificationResults.id, id));
    if (!row) return null;

    const mismatchRows = await this.db
      .select()
      .from(schema.mismatches)
      .where(eq(schema.mismatches.verificationResultId, id))
      .orderBy(asc(schema.mismatches.sortOrder));
    return rowToResult(row, mismatchRows);
  }

  async deleteVerificationResult(id: number): Promise<boolean> {
    // mismatches go with it through ON DELETE CASCADE
    const deleted = await this.db
      .delete(schema.verificationResults)
      .where(eq(schema.verificationResults.id, id))
      .returning({ id: schema.verificationResults.id });
    return deleted.length > 0;
  }

  async listVerificationResults(
    filter: VerificationResultFilter = {},
  ): Promise<VerificationResult[]> {
    const t = schema.verificationResults;
    const rows = await this.db
      .select()
      .from(t)
      .where(
        and(
          filter.templateId !== undefined ? eq(t.templateId, filter.templateId) : undefined,
          filter.status !== undefined ? eq(t.status, filter.status) : undefined,
          filter.from ? gte(t.verifiedAt, filter.from) : undefined,
          filter.to ? lte(t.verifiedAt, filter.to) : undefined,
        ),
      )
      .orderBy(desc(t.verifiedAt), desc(t.id));

    if (rows.length === 0) return [];
    const mismatchRows = await this.db
      .select()
      .from(schema.mismatches)
      .where(
        inArray(
          schema.mismatches.verificationResultId,
          rows.map((r) => r.id),
        ),
      );
    return rows.map((row) => rowToResult(row, mismatchRows));
  }
}
