import type { FieldMismatch, TabStop } from "../../shared/types.js";
import type { DimensionComparator, PreparedStyle } from "./types.js";

function roundPosition(position: number): number {
  return Math.round(position * 100) / 100;
}

export function describeTabStop(tab: TabStop): string {
  const base = `${tab.alignment}/${tab.leader}`;
  return typeof tab.position === "number" ? `${base}@${roundPosition(tab.position)}` : base;
}

/** Positions are only compared when both sides carry one. */
function sameTabStop(expected: TabStop, actual: TabStop): boolean {
  if (expected.alignment !== actual.alignment || expected.leader !== actual.leader) return false;
  if (typeof expected.position !== "number" || typeof actual.position !== "number") return true;
  return roundPosition(expected.position) === roundPosition(actual.position);
}

/**
 * Compares tab stops as an ordered sequence, index by index over the
 * common prefix. A length difference is reported once as
 * `TabStopCountMismatch`.
 */
export class TabStopComparator implements DimensionComparator {
  readonly name = "tabStops";
  readonly category = "TabStopMismatch" as const;

  compare(template: PreparedStyle, document: PreparedStyle): FieldMismatch[] {
    const expected = template.style.tabStops;
    const actual = document.style.tabStops;
    const mismatches: FieldMismatch[] = [];

    if (expected.length !== actual.length) {
      mismatches.push({
        field: "TabStopCountMismatch",
        expected: expected.length,
        actual: actual.length,
      });
    }

    const common = Math.min(expected.length, actual.length);
    for (let index = 0; index < common; index++) {
      if (sameTabStop(expected[index], actual[index])) continue;
      mismatches.push({
        field: "TabStopMismatch",
        expected: describeTabStop(expected[index]),
        actual: describeTabStop(actual[index]),
        index,
      });
    }

    return mismatches;
  }
}
