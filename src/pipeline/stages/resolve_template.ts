/**
 * RESOLVE_TEMPLATE Stage — signatures for the template snapshot's styles.
 *
 * Signatures are recomputed with the run's maximum length rather than
 * trusted from storage, so both sides of every comparison agree. Styles
 * of an ignored type are dropped here.
 */

import { signatureOfStyle } from "../../verify/signature.js";
import type { VerificationWarning } from "../../shared/types.js";
import type { PreparedTemplateStyle, StageHandler } from "../types.js";

export const handleResolveTemplate: StageHandler = async (_input, store, config) => {
  const prepared: PreparedTemplateStyle[] = [];
  const warnings: VerificationWarning[] = [];

  for (const style of config.template.textStyles) {
    if (config.ignoreStyleTypes.includes(style.styleType)) continue;
    const signature = signatureOfStyle(style, { maxLength: config.signatureMaxLength });
    prepared.push({ style, prepared: { style, signature } });
    if (signature.truncated) {
      warnings.push({
        code: "SignatureTruncated",
        contextKey: style.context.contextKey,
        styleName: style.name,
        side: "template",
      });
    }
  }

  return [
    store.set("template_styles", config.runId, prepared),
    store.set("warnings", "template", warnings),
  ];
};
