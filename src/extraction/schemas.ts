/**
 * JSON schemas for extracted formatting data, shared by the document
 * extractor and template ingestion.
 */
import { z } from "zod";
import { STYLE_TYPES, TAB_ALIGNMENTS, TAB_LEADERS } from "../shared/types.js";

const PropertyValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const PropertyBagSchema = z.record(PropertyValueSchema);

const IndexSchema = z.number().int().nonnegative();

export const ContextLocationSchema = z.object({
  section: IndexSchema.optional(),
  table: IndexSchema.optional(),
  row: IndexSchema.optional(),
  cell: IndexSchema.optional(),
  paragraph: IndexSchema.optional(),
  run: IndexSchema.optional(),
});

export const FormattingContextSchema = z.object({
  elementType: z.string().min(1),
  contextKey: z.string().min(1),
  structuralRole: z.string().default(""),
  contentControlProperties: z.record(z.string()).default({}),
  styleName: z.string().optional(),
  sampleText: z.string().optional(),
  location: ContextLocationSchema.optional(),
});

export const DirectFormatPatternSchema = z.object({
  patternName: z.string().min(1),
  context: z.string(),
  properties: PropertyBagSchema.default({}),
  sampleText: z.string().optional(),
  occurrenceCount: z.number().int().nonnegative().optional(),
});

export const TabStopSchema = z.object({
  position: z.number().nullable().optional(),
  alignment: z.enum(TAB_ALIGNMENTS),
  leader: z.enum(TAB_LEADERS).default("none"),
});

export const StyleSnapshotSchema = z.object({
  name: z.string().min(1),
  styleType: z.enum(STYLE_TYPES).default("paragraph"),
  fontFamily: z.string().nullable().optional(),
  fontSize: z.number().positive().nullable().optional(),
  color: z.string().nullable().optional(),
  alignment: z.string().nullable().optional(),
  properties: PropertyBagSchema.default({}),
  directFormatPatterns: z.array(DirectFormatPatternSchema).default([]),
  tabStops: z.array(TabStopSchema).default([]),
  context: FormattingContextSchema,
});

/** Upstream extractor export: `{ contexts: [...] }`, or the bare context list. */
export const DocumentExportSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { contexts: value } : value),
  z.object({
    documentName: z.string().optional(),
    contexts: z.array(StyleSnapshotSchema),
  }),
);

export type StyleSnapshotInput = z.input<typeof StyleSnapshotSchema>;
