/**
 * Context Matcher — pairs template contexts with document contexts.
 *
 * Priority:
 *   1. exact context key
 *   2. element type + structural role, when no unclaimed document
 *      context carries the same key
 *
 * One greedy pass: template contexts are visited by TextStyle id
 * ascending and each claims its best unclaimed candidate (key match,
 * else element type + role), ties broken by document insertion order.
 * Each side is claimed at most once. Runs sequentially: the pairing is
 * order-sensitive.
 */

import type { ExtractedContext, FormattingContext, TextStyle } from "../shared/types.js";

export type MatchBasis = "contextKey" | "elementRole";

export interface MatchedPair {
  template: TextStyle;
  document: ExtractedContext;
  /** Insertion index of the document context. */
  documentIndex: number;
  matchedBy: MatchBasis;
}

export interface UnmatchedDocumentContext {
  document: ExtractedContext;
  documentIndex: number;
}

export interface MatchOutcome {
  matched: MatchedPair[];
  missing: TextStyle[];
  unexpected: UnmatchedDocumentContext[];
}

function normalizeToken(value: string): string {
  return value.trim().toLowerCase();
}

function sameElementAndRole(a: FormattingContext, b: FormattingContext): boolean {
  return (
    normalizeToken(a.elementType) === normalizeToken(b.elementType) &&
    normalizeToken(a.structuralRole) === normalizeToken(b.structuralRole)
  );
}

export function matchContexts(
  templateStyles: readonly TextStyle[],
  documentContexts: readonly ExtractedContext[],
): MatchOutcome {
  const ordered = [...templateStyles].sort((a, b) => a.id - b.id);
  const claimed = new Set<number>();
  const matched: MatchedPair[] = [];
  const missing: TextStyle[] = [];

  const firstUnclaimed = (accepts: (candidate: ExtractedContext) => boolean): number => {
    for (let index = 0; index < documentContexts.length; index++) {
      if (!claimed.has(index) && accepts(documentContexts[index])) return index;
    }
    return -1;
  };

  for (const template of ordered) {
    const key = template.context.contextKey.trim();
    let basis: MatchBasis = "contextKey";
    let index = firstUnclaimed((candidate) => candidate.context.contextKey.trim() === key);
    if (index < 0) {
      basis = "elementRole";
      index = firstUnclaimed((candidate) => sameElementAndRole(template.context, candidate.context));
    }
    if (index < 0) {
      missing.push(template);
      continue;
    }
    claimed.add(index);
    matched.push({ template, document: documentContexts[index], documentIndex: index, matchedBy: basis });
  }

  const unexpected: UnmatchedDocumentContext[] = [];
  documentContexts.forEach((document, documentIndex) => {
    if (!claimed.has(documentIndex)) unexpected.push({ document, documentIndex });
  });

  return { matched, missing, unexpected };
}
