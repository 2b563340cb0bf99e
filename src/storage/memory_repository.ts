/**
 * InMemoryStyleRepository — process-local StyleRepository used by the
 * CLI without `--db` and by tests. Values are cloned on the way in and
 * out so callers never share state with the store.
 */

import {
  TemplateInUseError,
  TemplateInactiveError,
  TemplateNotFoundError,
} from "../shared/errors.js";
import type {
  Template,
  TemplateDraft,
  TemplateFilter,
  VerificationResult,
  VerificationResultFilter,
} from "../shared/types.js";
import type { RepositoryOptions, StyleRepository } from "./types.js";

export function matchesFilter(
  result: VerificationResult,
  filter: VerificationResultFilter,
): boolean {
  if (filter.templateId !== undefined && result.templateId !== filter.templateId) return false;
  if (filter.status !== undefined && result.status !== filter.status) return false;
  if (filter.from && result.verifiedAt.getTime() < filter.from.getTime()) return false;
  if (filter.to && result.verifiedAt.getTime() > filter.to.getTime()) return false;
  return true;
}

export function newestFirst(a: VerificationResult, b: VerificationResult): number {
  const byTime = b.verifiedAt.getTime() - a.verifiedAt.getTime();
  if (byTime !== 0) return byTime;
  return (b.id ?? 0) - (a.id ?? 0);
}

export function templateOrder(a: Template, b: Template): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return b.version - a.version;
}

export class InMemoryStyleRepository implements StyleRepository {
  private templates = new Map<number, Template>();
  private results = new Map<number, VerificationResult>();
  private nextTemplateId = 1;
  private nextStyleId = 1;
  private nextResultId = 1;
  private nextMismatchId = 1;
  private readonly now: () => Date;

  constructor(options: RepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  private versionsOf(name: string): Template[] {
    return [...this.templates.values()]
      .filter((t) => t.name === name)
      .sort((a, b) => b.version - a.version);
  }

  async loadActiveTemplate(name: string): Promise<Template> {
    const versions = this.versionsOf(name);
    if (versions.length === 0) throw new TemplateNotFoundError(name);
    const active = versions.find((t) => t.status === "Active");
    if (!active) throw new TemplateInactiveError(name, versions[0].status);
    return structuredClone(active);
  }

  async saveTemplate(draft: TemplateDraft): Promise<Template> {
    const current = this.versionsOf(draft.name).find((t) => t.status === "Active");
    if (current && current.fileHash === draft.fileHash) {
      return structuredClone(current);
    }

    const timestamp = this.now();
    if (current) {
      this.templates.set(current.id, {
        ...current,
        status: "Archived",
        modifiedBy: draft.createdBy,
        modifiedOn: timestamp,
      });
    }

    const id = this.nextTemplateId++;
    const version = (this.versionsOf(draft.name)[0]?.version ?? 0) + 1;
    const template: Template = {
      id,
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
      modifiedBy: null,
      modifiedOn: null,
      textStyles: draft.textStyles.map((style) => ({
        ...structuredClone(style),
        id: this.nextStyleId++,
        templateId: id,
        version,
      })),
    };
    this.templates.set(id, template);
    return structuredClone(template);
  }

  async listTemplates(filter: TemplateFilter = {}): Promise<Template[]> {
    return [...this.templates.values()]
      .filter((t) => filter.name === undefined || t.name === filter.name)
      .filter((t) => filter.status === undefined || t.status === filter.status)
      .sort(templateOrder)
      .map((t) => structuredClone(t));
  }

  async deleteTemplate(id: number): Promise<void> {
    const referencing = [...this.results.values()].filter((r) => r.templateId === id).length;
    if (referencing > 0) throw new TemplateInUseError(id, referencing);
    this.templates.delete(id);
  }

  async saveVerificationResult(result: VerificationResult): Promise<number> {
    const id = this.nextResultId++;
    this.results.set(id, {
      ...structuredClone(result),
      id,
      mismatches: result.mismatches.map((m) => ({
        ...structuredClone(m),
        id: this.nextMismatchId++,
      })),
    });
    return id;
  }

  async getVerificationResult(id: number): Promise<VerificationResult | null> {
    const result = this.results.get(id);
    return result ? structuredClone(result) : null;
  }

  async deleteVerificationResult(id: number): Promise<boolean> {
    return this.results.delete(id);
  }

  async listVerificationResults(
    filter: VerificationResultFilter = {},
  ): Promise<VerificationResult[]> {
    return [...this.results.values()]
      .filter((r) => matchesFilter(r, filter))
      .sort(newestFirst)
      .map((r) => structuredClone(r));
  }
}
