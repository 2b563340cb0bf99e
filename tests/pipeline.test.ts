import { describe, it, expect } from "vitest";
import { STAGE_DEFINITIONS, getExecutionOrder } from "../src/pipeline/registry.js";
import { StageRuntime } from "../src/pipeline/runtime.js";
import { InMemoryStageStore } from "../src/pipeline/store.js";
import type { StageConfig, StageDefinition } from "../src/pipeline/types.js";
import { contentHash } from "../src/shared/hash.js";
import { createDefaultComparators } from "../src/verify/comparators/index.js";
import { DEFAULT_SEVERITY_POLICY } from "../src/verify/policy.js";
import { FIXED_NOW, docStyle, template, textStyle } from "./helpers.js";

function stageConfig(overrides: Partial<StageConfig> = {}): StageConfig {
  return {
    runId: "run-1",
    template: template([textStyle(1, "p1")]),
    documentContexts: [docStyle("p1")],
    comparators: createDefaultComparators(),
    policy: DEFAULT_SEVERITY_POLICY,
    concurrency: 2,
    signatureMaxLength: 500,
    ignoreStyleTypes: [],
    detectedAt: FIXED_NOW,
    ...overrides,
  };
}

describe("Stage registry", () => {
  it("orders the verification stages topologically", () => {
    expect(getExecutionOrder()).toEqual([
      "RESOLVE_TEMPLATE",
      "PREPARE_DOCUMENT",
      "MATCH_CONTEXTS",
      "COMPARE_PAIRS",
      "AGGREGATE_MISMATCHES",
    ]);
  });

  it("places dependencies first whatever the declaration order", () => {
    const reversed = [...STAGE_DEFINITIONS].reverse();
    const order = getExecutionOrder(reversed);
    expect(order.indexOf("MATCH_CONTEXTS")).toBeGreaterThan(order.indexOf("PREPARE_DOCUMENT"));
    expect(order.indexOf("MATCH_CONTEXTS")).toBeGreaterThan(order.indexOf("RESOLVE_TEMPLATE"));
    expect(order[order.length - 1]).toBe("AGGREGATE_MISMATCHES");
  });

  it("rejects dependency cycles", () => {
    const handler: StageDefinition["handler"] = async () => [];
    expect(() =>
      getExecutionOrder([
        { stageType: "MATCH_CONTEXTS", handler, dependsOn: ["COMPARE_PAIRS"] },
        { stageType: "COMPARE_PAIRS", handler, dependsOn: ["MATCH_CONTEXTS"] },
      ]),
    ).toThrow("Stage dependency cycle at MATCH_CONTEXTS");
  });
});

describe("InMemoryStageStore", () => {
  it("hashes values on set and returns typed values", () => {
    const store = new InMemoryStageStore();
    const ref = store.set("raw_discrepancies", "pairs", []);
    expect(ref).toEqual({ kind: "raw_discrepancies", id: "pairs", hash: contentHash([]) });
    expect(store.get("raw_discrepancies", "pairs")).toEqual([]);
    expect(store.has("raw_discrepancies", "pairs")).toBe(true);
    expect(store.size).toBe(1);
  });

  it("throws for a missing key and empties on clear", () => {
    const store = new InMemoryStageStore();
    store.set("warnings", "template", []);
    store.clear();
    expect(store.size).toBe(0);
    expect(() => store.get("warnings", "template")).toThrow(
      "StageStore: key not found: warnings::template",
    );
  });
});

describe("StageRuntime", () => {
  it("runs every stage and leaves the report in the store", async () => {
    const result = await new StageRuntime(stageConfig()).execute();
    expect(result.failure).toBeUndefined();
    expect([...result.stageResults.keys()]).toHaveLength(5);
    expect(result.store.get("mismatches", "run-1")).toEqual([]);
  });

  it("halts on the first failing stage", async () => {
    const result = await new StageRuntime(stageConfig({ documentContexts: [] })).execute();
    expect(result.failure?.stageType).toBe("PREPARE_DOCUMENT");
    expect(result.stageResults.get("PREPARE_DOCUMENT")?.status).toBe("failed");
    expect(result.stageResults.has("MATCH_CONTEXTS")).toBe(false);
  });

  it("records produced references per stage", async () => {
    const result = await new StageRuntime(stageConfig()).execute();
    const matchStage = result.stageResults.get("MATCH_CONTEXTS");
    expect(matchStage?.output.producedRefs.map((r) => `${r.kind}:${r.id}`)).toEqual([
      "match_outcome:run-1",
      "raw_discrepancies:structural",
    ]);
  });
});
