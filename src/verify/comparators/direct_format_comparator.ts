import { buildStyleSignature } from "../signature.js";
import type { DirectFormatPattern, FieldMismatch } from "../../shared/types.js";
import type { ComparatorOptions, DimensionComparator, PreparedStyle } from "./types.js";

/** First pattern per context string, in declaration order. */
function firstByContext(patterns: readonly DirectFormatPattern[]): Map<string, DirectFormatPattern> {
  const byContext = new Map<string, DirectFormatPattern>();
  for (const pattern of patterns) {
    const context = pattern.context.trim();
    if (!byContext.has(context)) byContext.set(context, pattern);
  }
  return byContext;
}

/**
 * Checks that every template direct-format pattern has an equivalent
 * pattern (same context string, equal property signature) in the
 * document. Document patterns in contexts the template never declares
 * are reported as unexpected.
 */
export class DirectFormatComparator implements DimensionComparator {
  readonly name = "directFormat";
  readonly category = "DirectFormatMismatch" as const;

  constructor(private readonly options: ComparatorOptions = {}) {}

  private signatureOf(pattern: DirectFormatPattern): string {
    return buildStyleSignature(
      { properties: pattern.properties },
      { maxLength: this.options.signatureMaxLength },
    ).value;
  }

  compare(template: PreparedStyle, document: PreparedStyle): FieldMismatch[] {
    const expectedPatterns = firstByContext(template.style.directFormatPatterns);
    const actualPatterns = firstByContext(document.style.directFormatPatterns);
    const mismatches: FieldMismatch[] = [];

    for (const [context, pattern] of expectedPatterns) {
      const expected = this.signatureOf(pattern);
      const counterpart = actualPatterns.get(context);
      const actual = counterpart ? this.signatureOf(counterpart) : null;
      if (actual !== expected) {
        mismatches.push({ field: `DirectFormat:${pattern.patternName}`, expected, actual });
      }
    }

    for (const [context, pattern] of actualPatterns) {
      if (expectedPatterns.has(context)) continue;
      mismatches.push({
        field: `UnexpectedDirectFormat:${pattern.patternName}`,
        expected: null,
        actual: this.signatureOf(pattern),
      });
    }

    return mismatches;
  }
}
