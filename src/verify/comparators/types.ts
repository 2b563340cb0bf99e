/**
 * Dimension comparator contract.
 *
 * A comparator inspects one matched (template, document) pair along a
 * single formatting dimension and returns zero or more
 * (field, expected, actual) tuples. It never throws for a well-formed
 * pair; absent data is itself a comparable value.
 */

import type { FieldMismatch, MismatchCategory, StyleSnapshot } from "../../shared/types.js";
import type { StyleSignature } from "../signature.js";

/** A style together with its signature, computed once per run. */
export interface PreparedStyle {
  style: StyleSnapshot;
  signature: StyleSignature;
}

export interface DimensionComparator {
  readonly name: string;
  readonly category: MismatchCategory;
  compare(template: PreparedStyle, document: PreparedStyle): FieldMismatch[];
}

export interface ComparatorOptions {
  signatureMaxLength?: number;
}
