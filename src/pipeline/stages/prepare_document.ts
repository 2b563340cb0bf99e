/**
 * PREPARE_DOCUMENT Stage — signatures for the extracted document contexts.
 *
 * An empty extraction fails the run; contexts of an ignored style type
 * are dropped after that check.
 */

import { ExtractionFailedError } from "../../shared/errors.js";
import type { VerificationWarning } from "../../shared/types.js";
import { signatureOfStyle } from "../../verify/signature.js";
import type { PreparedDocumentContext, StageHandler } from "../types.js";

export const handlePrepareDocument: StageHandler = async (_input, store, config) => {
  if (config.documentContexts.length === 0) {
    throw new ExtractionFailedError("Document contains no formatting contexts");
  }

  const prepared: PreparedDocumentContext[] = [];
  const warnings: VerificationWarning[] = [];

  for (const context of config.documentContexts) {
    if (config.ignoreStyleTypes.includes(context.styleType)) continue;
    const signature = signatureOfStyle(context, { maxLength: config.signatureMaxLength });
    prepared.push({ context, prepared: { style: context, signature } });
    if (signature.truncated) {
      warnings.push({
        code: "SignatureTruncated",
        contextKey: context.context.contextKey,
        styleName: context.name,
        side: "document",
      });
    }
  }

  return [
    store.set("document_styles", config.runId, prepared),
    store.set("warnings", "document", warnings),
  ];
};
