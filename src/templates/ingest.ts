/**
 * Template Ingestion — turn a template definition file into a
 * TemplateDraft ready for the repository.
 *
 * Signatures are computed here and stored with each style; the file
 * hash drives versioning in the repository.
 */

import { parseJsonBytes } from "../extraction/json_extractor.js";
import { sha256Bytes } from "../shared/hash.js";
import type { TemplateDraft } from "../shared/types.js";
import { signatureOfStyle } from "../verify/signature.js";
import { TemplateDefinitionSchema } from "./template_schema.js";

export interface IngestOptions {
  /** Where the definition was read from; stored for reference only. */
  filePath?: string;
  signatureMaxLength?: number;
}

export function ingestTemplateDefinition(
  bytes: Uint8Array,
  fileName: string,
  createdBy: string,
  options: IngestOptions = {},
): TemplateDraft {
  const definition = parseJsonBytes(bytes, TemplateDefinitionSchema, "Template definition");

  const textStyles = definition.styles.map((style) => {
    const signature = signatureOfStyle(style, { maxLength: options.signatureMaxLength });
    return {
      ...style,
      signature: signature.value,
      signatureTruncated: signature.truncated,
    };
  });

  return {
    name: definition.name,
    description: definition.description,
    fileName,
    filePath: options.filePath ?? "",
    fileHash: sha256Bytes(bytes),
    fileSize: bytes.byteLength,
    createdBy,
    textStyles,
  };
}
