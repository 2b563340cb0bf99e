/** Mismatch severity, lowest to highest. */
export const SEVERITIES = ["Low", "Medium", "High"] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Template lifecycle status */
export const TEMPLATE_STATUSES = ["Active", "Archived"] as const;
export type TemplateStatus = (typeof TEMPLATE_STATUSES)[number];

/** Verification run status */
export const VERIFICATION_STATUSES = ["Pending", "Running", "Completed", "Failed"] as const;
export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

export const STYLE_TYPES = ["paragraph", "character", "table"] as const;
export type StyleType = (typeof STYLE_TYPES)[number];

export const TAB_ALIGNMENTS = ["left", "center", "right", "decimal", "bar"] as const;
export type TabAlignment = (typeof TAB_ALIGNMENTS)[number];

export const TAB_LEADERS = ["none", "dot", "hyphen", "underscore", "heavy", "middleDot"] as const;
export type TabLeader = (typeof TAB_LEADERS)[number];

/** Mismatch categories produced by the matcher and the dimension comparators */
export const MISMATCH_CATEGORIES = [
  "MissingInDocument",
  "UnexpectedInDocument",
  "StyleMismatch",
  "DirectFormatMismatch",
  "TabStopMismatch",
] as const;
export type MismatchCategory = (typeof MISMATCH_CATEGORIES)[number];

/** Warning codes attached to results; never thrown. */
export const WARNING_CODES = ["SignatureTruncated"] as const;
export type VerificationWarningCode = (typeof WARNING_CODES)[number];

// ── Property Bags ──────────────────────────────────────────────────

/** A single formatting value as it arrives from upstream. */
export type PropertyValue = string | number | boolean | null;

/** Open, string-keyed formatting properties (bold, spacingBefore, ...). */
export type PropertyBag = Readonly<Record<string, PropertyValue | undefined>>;

/** Canonical, default-free property map produced by the signature builder. */
export type CanonicalProperties = Readonly<Record<string, string | number | boolean>>;

// ── Formatting Context ─────────────────────────────────────────────

/** Zero-based position of an element in the document tree. */
export interface ContextLocation {
  section?: number;
  table?: number;
  row?: number;
  cell?: number;
  paragraph?: number;
  run?: number;
}

export interface FormattingContext {
  elementType: string;
  /** Join key between template-side and document-side contexts. */
  contextKey: string;
  structuralRole: string;
  contentControlProperties: Readonly<Record<string, string>>;
  styleName?: string;
  sampleText?: string;
  location?: ContextLocation;
}

// ── Style Components ───────────────────────────────────────────────

export interface DirectFormatPattern {
  patternName: string;
  /** Structural context string the override was observed or allowed in. */
  context: string;
  properties: PropertyBag;
  sampleText?: string;
  occurrenceCount?: number;
}

export interface TabStop {
  /** Position in points; optional upstream. */
  position?: number | null;
  alignment: TabAlignment;
  leader: TabLeader;
}

/**
 * The formatting a style carries, independent of where it was stored.
 * Template styles and extracted document contexts both reduce to this.
 */
export interface StyleSnapshot {
  name: string;
  styleType: StyleType;
  fontFamily?: string | null;
  fontSize?: number | null;
  color?: string | null;
  alignment?: string | null;
  properties: PropertyBag;
  directFormatPatterns: DirectFormatPattern[];
  tabStops: TabStop[];
  context: FormattingContext;
}

export interface TextStyle extends StyleSnapshot {
  id: number;
  templateId: number;
  signature: string;
  signatureTruncated: boolean;
  version: number;
}

// ── Template ───────────────────────────────────────────────────────

export interface AuditFields {
  createdBy: string;
  createdOn: Date;
  modifiedBy?: string | null;
  modifiedOn?: Date | null;
}

export interface Template extends AuditFields {
  id: number;
  name: string;
  description: string;
  fileName: string;
  filePath: string;
  fileHash: string;
  fileSize: number;
  status: TemplateStatus;
  version: number;
  textStyles: TextStyle[];
}

/** A template definition ready to be stored; ids are assigned by the repository. */
export interface TemplateDraft {
  name: string;
  description: string;
  fileName: string;
  filePath: string;
  fileHash: string;
  fileSize: number;
  createdBy: string;
  textStyles: Array<Omit<TextStyle, "id" | "templateId" | "version">>;
}

// ── Document Side ──────────────────────────────────────────────────

/** One formatting context extracted from a candidate document. */
export type ExtractedContext = StyleSnapshot;

// ── Discrepancies & Mismatches ─────────────────────────────────────

export type DiscrepancyValue = string | number | boolean | null;

/** One (field, expected, actual) tuple reported by a comparator. */
export interface FieldMismatch {
  field: string;
  expected: DiscrepancyValue;
  actual: DiscrepancyValue;
  /** Sequence index for ordered dimensions such as tab stops. */
  index?: number;
}

/** Comparator or matcher output before severity, dedup and ordering. */
export interface RawDiscrepancy {
  contextKey: string;
  location: string;
  structuralRole: string;
  category: MismatchCategory;
  fields: FieldMismatch[];
  sampleText: string;
  warnings: VerificationWarningCode[];
}

export interface Mismatch {
  id?: number;
  contextKey: string;
  location: string;
  structuralRole: string;
  category: MismatchCategory;
  /** Sorted, unique field names. */
  fields: readonly string[];
  /** `fields` joined with commas. */
  mismatchFields: string;
  expected: Record<string, DiscrepancyValue>;
  actual: Record<string, DiscrepancyValue>;
  sampleText: string;
  severity: Severity;
  /** What to change in the document to clear this mismatch. */
  recommendedAction: string;
  warnings: readonly VerificationWarningCode[];
  detectedAt: Date;
}

export interface VerificationWarning {
  code: VerificationWarningCode;
  contextKey: string;
  styleName: string;
  side: "template" | "document";
}

// ── Verification Result ────────────────────────────────────────────

export interface VerificationResult {
  id?: number;
  runId: string;
  templateId: number;
  templateName: string;
  templateVersion: number;
  documentName: string;
  documentPath: string;
  status: VerificationStatus;
  verifiedAt: Date;
  totalMismatches: number;
  errorMessage: string;
  warnings: readonly VerificationWarning[];
  /** SHA-256 over the mismatch list without timestamps. */
  reportDigest: string;
  createdBy: string;
  createdOn: Date;
  mismatches: readonly Mismatch[];
}

export interface TemplateFilter {
  name?: string;
  status?: TemplateStatus;
}

/** Per-template composition figures. */
export interface TemplateStats {
  templateId: number;
  templateName: string;
  version: number;
  status: TemplateStatus;
  totalStyles: number;
  styleTypeBreakdown: Partial<Record<StyleType, number>>;
  directFormatPatternsCount: number;
  tabStopsCount: number;
  fileSize: number;
  lastProcessed: Date;
}

export interface VerificationResultFilter {
  templateId?: number;
  status?: VerificationStatus;
  from?: Date;
  to?: Date;
}

export interface VerificationSummary {
  totalVerifications: number;
  completedVerifications: number;
  failedVerifications: number;
  totalMismatches: number;
  mismatchesBySeverity: Record<Severity, number>;
  mismatchesByCategory: Partial<Record<MismatchCategory, number>>;
  recentVerifications: VerificationResult[];
}
