/**
 * Storage collaborator contract.
 *
 * Templates are immutable snapshots once stored: a changed definition
 * (different file hash) becomes a new version and the previous active
 * version is archived.
 */

import type {
  Template,
  TemplateDraft,
  TemplateFilter,
  VerificationResult,
  VerificationResultFilter,
} from "../shared/types.js";

export interface StyleRepository {
  /**
   * Newest active version of the named template.
   * Throws `TemplateNotFoundError` when no version exists and
   * `TemplateInactiveError` when every version is archived.
   */
  loadActiveTemplate(name: string): Promise<Template>;
  /** Store a definition; an unchanged file hash returns the current version. */
  saveTemplate(draft: TemplateDraft): Promise<Template>;
  /** Every stored version matching the filter, by name then newest version first. */
  listTemplates(filter?: TemplateFilter): Promise<Template[]>;
  /** Throws `TemplateInUseError` while verification results reference it. */
  deleteTemplate(id: number): Promise<void>;
  saveVerificationResult(result: VerificationResult): Promise<number>;
  getVerificationResult(id: number): Promise<VerificationResult | null>;
  /** Deletes the result with its mismatches; false when it does not exist. */
  deleteVerificationResult(id: number): Promise<boolean>;
  /** Newest first. */
  listVerificationResults(filter?: VerificationResultFilter): Promise<VerificationResult[]>;
}

export interface RepositoryOptions {
  /** Clock for audit timestamps. */
  now?: () => Date;
}
