import { diffCanonicalProperties } from "../signature.js";
import type { FieldMismatch } from "../../shared/types.js";
import type { DimensionComparator, PreparedStyle } from "./types.js";

/**
 * Equal iff the signatures are byte-equal. On a difference, re-derives
 * which canonical properties differ rather than reporting the signature
 * itself; the bare `signature` field is only reported when the maps agree
 * but the strings do not (possible only after truncation).
 */
export class SignatureComparator implements DimensionComparator {
  readonly name = "signature";
  readonly category = "StyleMismatch" as const;

  compare(template: PreparedStyle, document: PreparedStyle): FieldMismatch[] {
    if (template.signature.value === document.signature.value) return [];

    const expected = template.signature.properties;
    const actual = document.signature.properties;
    const differing = diffCanonicalProperties(expected, actual);

    if (differing.length === 0) {
      return [
        {
          field: "signature",
          expected: template.signature.value,
          actual: document.signature.value,
        },
      ];
    }

    return differing.map((field) => ({
      field,
      expected: expected[field] ?? null,
      actual: actual[field] ?? null,
    }));
  }
}
