/**
 * Template Stats — per-template counts for listings.
 */

import type { StyleType, Template, TemplateStats } from "../shared/types.js";

export function templateStats(template: Template): TemplateStats {
  const styleTypeBreakdown: Partial<Record<StyleType, number>> = {};
  let directFormatPatternsCount = 0;
  let tabStopsCount = 0;

  for (const style of template.textStyles) {
    styleTypeBreakdown[style.styleType] = (styleTypeBreakdown[style.styleType] ?? 0) + 1;
    directFormatPatternsCount += style.directFormatPatterns.length;
    tabStopsCount += style.tabStops.length;
  }

  return {
    templateId: template.id,
    templateName: template.name,
    version: template.version,
    status: template.status,
    totalStyles: template.textStyles.length,
    styleTypeBreakdown,
    directFormatPatternsCount,
    tabStopsCount,
    fileSize: template.fileSize,
    // archiving stamps modifiedOn
    lastProcessed: template.modifiedOn ?? template.createdOn,
  };
}
