/**
 * Stage Registry — the verification DAG and its topological execution order.
 */

import type { StageDefinition, VerifyStageType } from "./types.js";
import {
  handleAggregateMismatches,
  handleComparePairs,
  handleMatchContexts,
  handlePrepareDocument,
  handleResolveTemplate,
} from "./stages/index.js";

export const STAGE_DEFINITIONS: StageDefinition[] = [
  {
    stageType: "RESOLVE_TEMPLATE",
    handler: handleResolveTemplate,
    dependsOn: [],
  },
  {
    stageType: "PREPARE_DOCUMENT",
    handler: handlePrepareDocument,
    dependsOn: [],
  },
  {
    stageType: "MATCH_CONTEXTS",
    handler: handleMatchContexts,
    dependsOn: ["RESOLVE_TEMPLATE", "PREPARE_DOCUMENT"],
  },
  {
    stageType: "COMPARE_PAIRS",
    handler: handleComparePairs,
    dependsOn: ["MATCH_CONTEXTS"],
  },
  {
    stageType: "AGGREGATE_MISMATCHES",
    handler: handleAggregateMismatches,
    dependsOn: ["COMPARE_PAIRS"],
  },
];

/**
 * Topological execution order over `definitions`: dependencies come
 * before dependents, otherwise declaration order is kept.
 */
export function getExecutionOrder(
  definitions: readonly StageDefinition[] = STAGE_DEFINITIONS,
): VerifyStageType[] {
  const defMap = new Map(definitions.map((d) => [d.stageType, d]));
  const visited = new Set<VerifyStageType>();
  const visiting = new Set<VerifyStageType>();
  const order: VerifyStageType[] = [];

  function visit(stageType: VerifyStageType): void {
    if (visited.has(stageType)) return;
    if (visiting.has(stageType)) throw new Error(`Stage dependency cycle at ${stageType}`);
    const def = defMap.get(stageType);
    if (!def) throw new Error(`Unknown stage type: ${stageType}`);
    visiting.add(stageType);
    for (const dep of def.dependsOn) {
      visit(dep);
    }
    visiting.delete(stageType);
    visited.add(stageType);
    order.push(stageType);
  }

  for (const def of definitions) {
    visit(def.stageType);
  }

  return order;
}

export function getStageDefinition(
  stageType: VerifyStageType,
  definitions: readonly StageDefinition[] = STAGE_DEFINITIONS,
): StageDefinition {
  const def = definitions.find((d) => d.stageType === stageType);
  if (!def) throw new Error(`Unknown stage type: ${stageType}`);
  return def;
}
