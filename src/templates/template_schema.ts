/**
 * Template Definition Schema — the JSON a template is ingested from.
 *
 * A definition is the template-side extraction of a reference document:
 * its name plus one style entry per formatting context.
 */
import { z } from "zod";
import { StyleSnapshotSchema } from "../extraction/schemas.js";

export const TemplateDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  styles: z.array(StyleSnapshotSchema).min(1),
});

export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;
