/**
 * StageRuntime — runs one verification as a sequence of ephemeral stages.
 *
 * Creates a fresh InMemoryStageStore per run, executes stages in
 * topological order, collects results, and halts on the first failure.
 * The abort signal is checked before every stage.
 */

import { v4 as uuidv4 } from "uuid";
import { VerificationCancelledError } from "../shared/errors.js";
import { InMemoryStageStore } from "./store.js";
import { STAGE_DEFINITIONS, getExecutionOrder, getStageDefinition } from "./registry.js";
import type {
  PipelineRunResult,
  StageConfig,
  StageDefinition,
  StageInputBundle,
  StageResult,
  VerifyStageType,
} from "./types.js";

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class StageRuntime {
  constructor(
    private readonly config: StageConfig,
    private readonly definitions: readonly StageDefinition[] = STAGE_DEFINITIONS,
  ) {}

  async execute(): Promise<PipelineRunResult> {
    const { runId } = this.config;
    const store = new InMemoryStageStore();
    const stageResults = new Map<VerifyStageType, StageResult>();
    const t0 = Date.now();

    for (const stageType of getExecutionOrder(this.definitions)) {
      const def = getStageDefinition(stageType, this.definitions);
      const input: StageInputBundle = { stageType, stageId: uuidv4(), runId };
      const startedAt = new Date();

      let producedRefs: StageResult["output"]["producedRefs"] = [];
      let failure: Error | undefined;
      try {
        if (this.config.signal?.aborted) throw new VerificationCancelledError();
        producedRefs = await def.handler(input, store, this.config);
      } catch (err) {
        failure = toError(err);
      }

      const completedAt = new Date();
      const output = {
        stageType,
        stageId: input.stageId,
        runId,
        producedRefs,
        timing: {
          startedAt,
          completedAt,
          durationMs: completedAt.getTime() - startedAt.getTime(),
        },
        status: failure ? ("failed" as const) : ("success" as const),
      };

      if (failure) {
        stageResults.set(stageType, { status: "failed", output, error: failure });
        return {
          runId,
          stageResults,
          store,
          failure: { stageType, error: failure },
          totalDurationMs: Date.now() - t0,
        };
      }
      stageResults.set(stageType, { status: "success", output });
    }

    return {
      runId,
      stageResults,
      store,
      totalDurationMs: Date.now() - t0,
    };
  }
}
