/**
 * Style Signature Builder
 *
 * Reduces a style's formatting properties to a canonical map and a
 * signature string. Two property sets are equivalent iff their
 * signatures are byte-equal, so every downstream equality check goes
 * through here.
 *
 * Canonical form:
 *   - keys: `IsBold` / `isBold` / `Bold` → `bold`
 *   - values: trimmed strings, `#RRGGBB` colors, aliased alignments,
 *     numbers rounded to two decimals; "true"/"false" and numeric
 *     strings are read as booleans and numbers
 *   - defaults (null, "", "auto" color, false, 0, lineSpacing 1,
 *     alignment "left") are omitted, so explicit-default and omitted
 *     serialize identically
 */

import { sha256String } from "../shared/hash.js";
import type {
  CanonicalProperties,
  PropertyBag,
  PropertyValue,
  StyleSnapshot,
  StyleType,
} from "../shared/types.js";

export const DEFAULT_SIGNATURE_MAX_LENGTH = 500;

/** "~" followed by a 64-char SHA-256 hex digest. */
const TRUNCATION_SUFFIX_LENGTH = 65;

const NUMERIC_DEFAULTS: Readonly<Record<string, number>> = {
  lineSpacing: 1,
};

const ALIGNMENT_ALIASES: Readonly<Record<string, string>> = {
  both: "justify",
  justified: "justify",
  distribute: "justify",
  start: "left",
  end: "right",
  centre: "center",
};

export interface SignatureInput {
  styleType?: StyleType | null;
  fontFamily?: string | null;
  fontSize?: number | null;
  color?: string | null;
  alignment?: string | null;
  properties?: PropertyBag;
  /** Direct-format overrides layered over the style's own properties. */
  overrides?: PropertyBag;
}

export interface SignatureOptions {
  maxLength?: number;
}

export interface StyleSignature {
  value: string;
  truncated: boolean;
  properties: CanonicalProperties;
}

export function canonicalKey(raw: string): string {
  const trimmed = raw.trim().replace(/^[Ii]s(?=[A-Z])/, "");
  if (trimmed.length === 0) return trimmed;
  return trimmed.charAt(0).toLowerCase() + trimmed.slice(1);
}

function isColorKey(key: string): boolean {
  return key === "color" || key.endsWith("Color");
}

function canonicalColor(value: string): string | undefined {
  const raw = value.trim().replace(/^#/, "");
  if (raw.length === 0 || raw.toLowerCase() === "auto") return undefined;
  if (/^[0-9a-f]{3}$/i.test(raw)) {
    const expanded = raw
      .split("")
      .map((c) => c + c)
      .join("");
    return `#${expanded.toUpperCase()}`;
  }
  if (/^[0-9a-f]{6}$/i.test(raw)) return `#${raw.toUpperCase()}`;
  return raw.toUpperCase();
}

const NUMERIC_STRING = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/** Booleans and numbers that arrived as text; colors and other strings pass through. */
function coerceText(key: string, value: string): string | number | boolean {
  if (isColorKey(key) || key === "alignment" || key === "styleType") return value;
  const lowered = value.toLowerCase();
  if (lowered === "true") return true;
  if (lowered === "false") return false;
  if (NUMERIC_STRING.test(value)) return Number(value);
  return value;
}

function canonicalAlignment(value: string): string | undefined {
  const lowered = value.trim().toLowerCase();
  const aliased = ALIGNMENT_ALIASES[lowered] ?? lowered;
  return aliased === "left" ? undefined : aliased;
}

/**
 * Canonical value for one property, or `undefined` when the value is
 * absent or equal to its default.
 */
export function canonicalValue(
  key: string,
  value: PropertyValue | undefined,
): string | number | boolean | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string") {
    const coerced = coerceText(key, value.trim());
    if (typeof coerced !== "string") return canonicalValue(key, coerced);
  }

  if (typeof value === "boolean") return value ? true : undefined;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return undefined;
    const rounded = Math.round(value * 100) / 100;
    const fallback = NUMERIC_DEFAULTS[key] ?? 0;
    return rounded === fallback ? undefined : rounded;
  }

  const trimmed = value.trim().replace(/\s+/g, " ");
  if (trimmed.length === 0) return undefined;
  if (isColorKey(key)) return canonicalColor(trimmed);
  if (key === "alignment") return canonicalAlignment(trimmed);
  if (key === "styleType") return trimmed.toLowerCase();
  return trimmed;
}

/**
 * Merge one layer of raw properties into the accumulator. Raw keys are
 * visited in sorted order so colliding spellings (`IsBold`, `bold`)
 * resolve the same way whatever order they arrived in.
 */
function mergeLayer(
  target: Map<string, PropertyValue>,
  layer: PropertyBag | undefined,
): void {
  if (!layer) return;
  for (const rawKey of Object.keys(layer).sort()) {
    const value = layer[rawKey];
    if (value === undefined || value === null) continue;
    const key = canonicalKey(rawKey);
    if (key.length === 0) continue;
    target.set(key, value);
  }
}

export function canonicalizeProperties(input: SignatureInput): CanonicalProperties {
  const merged = new Map<string, PropertyValue>();
  mergeLayer(merged, input.properties);
  mergeLayer(merged, {
    styleType: input.styleType ?? undefined,
    fontFamily: input.fontFamily ?? undefined,
    fontSize: input.fontSize ?? undefined,
    color: input.color ?? undefined,
    alignment: input.alignment ?? undefined,
  });
  mergeLayer(merged, input.overrides);

  const canonical: Record<string, string | number | boolean> = {};
  for (const key of [...merged.keys()].sort()) {
    const value = canonicalValue(key, merged.get(key));
    if (value !== undefined) canonical[key] = value;
  }
  return canonical;
}

export function serializeCanonical(properties: CanonicalProperties): string {
  return Object.keys(properties)
    .sort()
    .map((key) => `${key}=${JSON.stringify(properties[key])}`)
    .join(";");
}

/**
 * Build the signature for a property set. Pure and total: the only
 * non-ordinary outcome is `truncated`, when the serialization exceeds
 * `maxLength` and is cut and suffixed with a digest of the full text.
 */
export function buildStyleSignature(
  input: SignatureInput,
  options: SignatureOptions = {},
): StyleSignature {
  const maxLength = options.maxLength ?? DEFAULT_SIGNATURE_MAX_LENGTH;
  const properties = canonicalizeProperties(input);
  const full = serializeCanonical(properties);

  if (full.length <= maxLength) {
    return { value: full, truncated: false, properties };
  }

  const keep = Math.max(0, maxLength - TRUNCATION_SUFFIX_LENGTH);
  return {
    value: `${full.slice(0, keep)}~${sha256String(full)}`,
    truncated: true,
    properties,
  };
}

export function signatureOfStyle(
  style: StyleSnapshot,
  options: SignatureOptions = {},
): StyleSignature {
  return buildStyleSignature(
    {
      styleType: style.styleType,
      fontFamily: style.fontFamily,
      fontSize: style.fontSize,
      color: style.color,
      alignment: style.alignment,
      properties: style.properties,
    },
    options,
  );
}

/** Keys whose canonical values differ; a key on one side only counts. */
export function diffCanonicalProperties(
  expected: CanonicalProperties,
  actual: CanonicalProperties,
): string[] {
  const keys = new Set([...Object.keys(expected), ...Object.keys(actual)]);
  return [...keys].filter((key) => expected[key] !== actual[key]).sort();
}
