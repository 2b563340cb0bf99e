/**
 * COMPARE_PAIRS Stage — runs every comparator over every matched pair.
 *
 * Pairs fan out through the bounded worker pool; results are collected
 * per pair index and flattened only after the pool has drained, so the
 * aggregator always sees the same input order.
 */

import { mapWithConcurrency } from "../../shared/concurrency.js";
import { ComparatorDefectError } from "../../shared/errors.js";
import type {
  FieldMismatch,
  RawDiscrepancy,
  TextStyle,
  VerificationWarningCode,
} from "../../shared/types.js";
import type { PreparedStyle } from "../../verify/comparators/types.js";
import { describeLocation } from "../../verify/location.js";
import type { StageHandler } from "../types.js";

export const handleComparePairs: StageHandler = async (_input, store, config) => {
  const templates = new Map<TextStyle, PreparedStyle>(
    store.get("template_styles", config.runId).map((t) => [t.style, t.prepared]),
  );
  const documents = store.get("document_styles", config.runId);
  const { matched } = store.get("match_outcome", config.runId);

  const perPair = await mapWithConcurrency(
    matched,
    config.concurrency,
    (pair): RawDiscrepancy[] => {
      const template = templates.get(pair.template);
      const document = documents[pair.documentIndex]?.prepared;
      if (!template || !document) {
        throw new Error(`Matched pair for "${pair.template.context.contextKey}" was not prepared`);
      }

      const docContext = pair.document.context;
      const warnings: VerificationWarningCode[] =
        template.signature.truncated || document.signature.truncated ? ["SignatureTruncated"] : [];
      const discrepancies: RawDiscrepancy[] = [];

      for (const comparator of config.comparators) {
        let fields: FieldMismatch[];
        try {
          fields = comparator.compare(template, document);
        } catch (err) {
          throw new ComparatorDefectError(comparator.name, docContext.contextKey, err);
        }
        if (fields.length === 0) continue;
        discrepancies.push({
          contextKey: docContext.contextKey,
          location: describeLocation(docContext),
          structuralRole: pair.template.context.structuralRole || docContext.structuralRole,
          category: comparator.category,
          fields,
          sampleText: docContext.sampleText ?? pair.template.context.sampleText ?? "",
          warnings,
        });
      }
      return discrepancies;
    },
    config.signal,
  );

  return [store.set("raw_discrepancies", "pairs", perPair.flat())];
};
