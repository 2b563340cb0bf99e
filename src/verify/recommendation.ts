/**
 * Recommended Actions
 *
 * One sentence per mismatch telling the author what to change, derived
 * from the category and the field tuples only.
 */

import type { DiscrepancyValue, FieldMismatch, MismatchCategory } from "../shared/types.js";

function quoted(value: DiscrepancyValue): string {
  return `'${value === null ? "" : String(value)}'`;
}

/** First tuple per field name, keyed in field-name order. */
function firstByField(fields: readonly FieldMismatch[]): Map<string, FieldMismatch> {
  const sorted = [...fields].sort((a, b) => (a.field < b.field ? -1 : a.field > b.field ? 1 : 0));
  const byField = new Map<string, FieldMismatch>();
  for (const tuple of sorted) {
    if (!byField.has(tuple.field)) byField.set(tuple.field, tuple);
  }
  return byField;
}

function propertyAction(names: readonly string[]): string {
  if (names.length === 1) return `Correct the ${names[0]} property to match the template`;
  return `Correct the following properties to match the template: ${names.join(", ")}`;
}

function directFormatAction(tuple: FieldMismatch): string {
  const [kind, ...rest] = tuple.field.split(":");
  const pattern = `'${rest.join(":")}'`;
  if (kind === "UnexpectedDirectFormat") {
    return `Remove the unexpected direct formatting pattern ${pattern}`;
  }
  if (kind === "DirectFormat") {
    return tuple.actual === null
      ? `Apply the missing direct formatting pattern ${pattern}`
      : `Correct the direct formatting pattern ${pattern} to match the template`;
  }
  return propertyAction([tuple.field]);
}

export function recommendAction(
  category: MismatchCategory,
  fields: readonly FieldMismatch[],
): string {
  const byField = firstByField(fields);
  const [first] = [...byField.values()];

  switch (category) {
    case "MissingInDocument":
      return `Apply the expected style ${quoted(first?.expected ?? null)} to this location`;
    case "UnexpectedInDocument":
      return `Remove the unexpected style ${quoted(first?.actual ?? null)} from this location`;
    case "DirectFormatMismatch":
      return [...byField.values()].map(directFormatAction).join("; ");
    case "TabStopMismatch":
      return byField.has("TabStopCountMismatch")
        ? "Add or remove tab stops so the count matches the template"
        : "Correct the tab stop alignment, leader and position to match the template";
    case "StyleMismatch":
      return propertyAction([...byField.keys()]);
  }
}
