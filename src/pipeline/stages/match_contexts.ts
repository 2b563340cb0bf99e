/**
 * MATCH_CONTEXTS Stage — sequential greedy pairing, plus the structural
 * discrepancies for contexts left unmatched on either side.
 */

import type { RawDiscrepancy } from "../../shared/types.js";
import { describeLocation } from "../../verify/location.js";
import { matchContexts } from "../../verify/matcher.js";
import type { StageHandler } from "../types.js";

export const handleMatchContexts: StageHandler = async (_input, store, config) => {
  const templateStyles = store.get("template_styles", config.runId).map((t) => t.style);
  const documentContexts = store.get("document_styles", config.runId).map((d) => d.context);

  const outcome = matchContexts(templateStyles, documentContexts);
  const structural: RawDiscrepancy[] = [];

  for (const style of outcome.missing) {
    structural.push({
      contextKey: style.context.contextKey,
      location: describeLocation(style.context),
      structuralRole: style.context.structuralRole,
      category: "MissingInDocument",
      fields: [{ field: "MissingInDocument", expected: style.name, actual: null }],
      sampleText: style.context.sampleText ?? "",
      warnings: [],
    });
  }

  for (const { document } of outcome.unexpected) {
    structural.push({
      contextKey: document.context.contextKey,
      location: describeLocation(document.context),
      structuralRole: document.context.structuralRole,
      category: "UnexpectedInDocument",
      fields: [{ field: "UnexpectedInDocument", expected: null, actual: document.name }],
      sampleText: document.context.sampleText ?? "",
      warnings: [],
    });
  }

  return [
    store.set("match_outcome", config.runId, outcome),
    store.set("raw_discrepancies", "structural", structural),
  ];
};
