import type { ZodType, ZodTypeDef } from "zod";
import { ExtractionFailedError, errorMessage } from "../shared/errors.js";
import type { ExtractedContext } from "../shared/types.js";
import { DocumentExportSchema } from "./schemas.js";

/** Extraction collaborator: document bytes → formatting contexts. */
export interface ContextExtractor {
  extractContexts(documentBytes: Uint8Array): Promise<ExtractedContext[]>;
}

/**
 * Decode UTF-8 JSON bytes and validate them against `schema`. Every
 * failure surfaces as `ExtractionFailedError`.
 */
export function parseJsonBytes<T>(
  bytes: Uint8Array,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string,
): T {
  const text = Buffer.from(bytes).toString("utf8").replace(/^\uFEFF/, "");

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ExtractionFailedError(`${label} is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ExtractionFailedError(`${label} failed validation: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/** Reads the JSON export written by the upstream document extractor. */
export class JsonContextExtractor implements ContextExtractor {
  async extractContexts(documentBytes: Uint8Array): Promise<ExtractedContext[]> {
    return parseJsonBytes(documentBytes, DocumentExportSchema, "Document export").contexts;
  }
}
