/**
 * Comparator Barrel Export
 */

import { DirectFormatComparator } from "./direct_format_comparator.js";
import { SignatureComparator } from "./signature_comparator.js";
import { TabStopComparator } from "./tab_stop_comparator.js";
import type { ComparatorOptions, DimensionComparator } from "./types.js";

export { DirectFormatComparator } from "./direct_format_comparator.js";
export { SignatureComparator } from "./signature_comparator.js";
export { TabStopComparator, describeTabStop } from "./tab_stop_comparator.js";
export type { ComparatorOptions, DimensionComparator, PreparedStyle } from "./types.js";

/** The fixed comparator set used when a run does not supply its own. */
export function createDefaultComparators(options: ComparatorOptions = {}): DimensionComparator[] {
  return [
    new SignatureComparator(),
    new DirectFormatComparator(options),
    new TabStopComparator(),
  ];
}
