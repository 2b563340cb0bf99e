import type { ContextLocation, FormattingContext } from "../shared/types.js";

const LOCATION_PARTS: Array<[keyof ContextLocation, string]> = [
  ["section", "Section"],
  ["table", "Table"],
  ["row", "Row"],
  ["cell", "Cell"],
  ["paragraph", "Paragraph"],
  ["run", "Run"],
];

/**
 * Human-readable location, e.g. "Section 1, Paragraph 3, Run 2".
 * Indices are zero-based upstream and one-based here; negative or
 * missing indices are skipped.
 */
export function describeLocation(context: FormattingContext): string {
  const parts: string[] = [];
  for (const [key, label] of LOCATION_PARTS) {
    const index = context.location?.[key];
    if (typeof index === "number" && index >= 0) parts.push(`${label} ${index + 1}`);
  }
  if (parts.length > 0) return parts.join(", ");
  return `${context.elementType || "element"} ${context.contextKey}`.trim();
}
