import crypto from "node:crypto";
import { logger } from "../config/logger.js";
import type { TextGenerator } from "../llm/types.js";
import { stageUnits } from "./composer.js";
import { PipelineExecutionError } from "./errors.js";
import { ExecutionResult } from "./executionResult.js";
import type { RecordedOutcome } from "./executionResult.js";
import type { EvaluationPolicy, JudgeUnit } from "./judgeUnit.js";
import { runBounded } from "./workerPool.js";
import type {
  InputRecord,
  Pipeline,
  RunDiagnostics,
  RunOptions,
  StageContext,
  UnitDiagnostic,
  UnitOutcome,
} from "./types.js";

export const DEFAULT_RETRIES = 1;
export const DEFAULT_TIMEOUT_MS = 60_000;
/** Largest delay a Node timer honors; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface PipelineRun {
  readonly result: ExecutionResult;
  readonly diagnostics: RunDiagnostics;
}

interface TimedOutcome {
  readonly unit: JudgeUnit;
  readonly outcome: UnitOutcome;
  readonly durationMs: number;
}

/**
 * Runs every stage in order with a barrier between stages. Members of a layer
 * share one {@link StageContext} and run on a pool of `maxWorkers`.
 *
 * In graceful mode (the default) unit failures are recorded and the run
 * carries on; otherwise the first failure rejects with
 * {@link PipelineExecutionError} and no result is produced.
 */
export async function runPipeline(
  pipeline: Pipeline,
  input: InputRecord,
  generator: TextGenerator,
  options: RunOptions = {},
): Promise<PipelineRun> {
  const graceful = options.graceful ?? true;
  const maxWorkers = options.maxWorkers ?? 1;
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new RangeError(`maxWorkers must be an integer >= 1, got: ${String(maxWorkers)}`);
  }
  const retries = options.retries ?? DEFAULT_RETRIES;
  if (!Number.isInteger(retries) || retries < 0) {
    throw new RangeError(`retries must be a non-negative integer, got: ${String(retries)}`);
  }
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(
      `timeoutMs must be an integer between 1 and ${String(MAX_TIMEOUT_MS)}, got: ${String(timeoutMs)}`,
    );
  }

  const runId = options.runId ?? crypto.randomUUID().slice(0, 8);
  const source: InputRecord = Object.freeze({ ...input });
  const startedAt = Date.now();

  logger.info(
    { runId, pipeline: pipeline.name, stages: pipeline.stages.length, graceful, maxWorkers },
    "Pipeline run started",
  );

  const recorded: RecordedOutcome[] = [];
  const diagnostics: UnitDiagnostic[] = [];
  let previousExplanation: string | null = null;

  for (const [stageIndex, stage] of pipeline.stages.entries()) {
    const context: StageContext = { source, previousExplanation };
    const policy: EvaluationPolicy = {
      generator,
      retries,
      timeoutMs,
      logContext: { runId, pipeline: pipeline.name, stageIndex },
    };

    const timed = await runBounded(stageUnits(stage), maxWorkers, async (unit) => {
      const unitStart = Date.now();
      const outcome = await unit.evaluate(context, policy);
      if (!graceful && outcome.status === "failure") {
        logger.error(
          { runId, pipeline: pipeline.name, stageIndex, unit: unit.name, kind: outcome.kind },
          "Unit failed, aborting pipeline",
        );
        throw new PipelineExecutionError(pipeline.name, stageIndex, unit.name, outcome);
      }
      const result: TimedOutcome = { unit, outcome, durationMs: Date.now() - unitStart };
      return result;
    });

    for (const { unit, outcome, durationMs } of timed) {
      recorded.push({
        address: {
          pipeline: pipeline.name,
          stageIndex,
          inLayer: stage.kind === "layer",
          unitKind: unit.kind,
          unitName: unit.name,
        },
        outcome,
      });
      diagnostics.push(toDiagnostic(unit.name, stageIndex, outcome, durationMs));

      if (outcome.status === "failure") {
        logger.error(
          {
            runId,
            pipeline: pipeline.name,
            stageIndex,
            unit: unit.name,
            kind: outcome.kind,
            attempts: outcome.attempts,
            reason: outcome.reason,
          },
          "Unit failed, recorded and continuing",
        );
      }
    }

    previousExplanation = combineExplanations(timed);
  }

  const durationMs = Date.now() - startedAt;
  const failedCount = diagnostics.filter((d) => d.status === "failure").length;
  logger.info(
    { runId, pipeline: pipeline.name, units: diagnostics.length, failed: failedCount, durationMs },
    "Pipeline run finished",
  );

  return {
    result: new ExecutionResult(recorded),
    diagnostics: { runId, pipeline: pipeline.name, durationMs, units: diagnostics },
  };
}

/**
 * The single channel between stages. One unit: its explanation verbatim.
 * Several: each successful member's explanation headed by its name.
 */
export function combineExplanations(
  stageOutcomes: readonly { readonly unit: JudgeUnit; readonly outcome: UnitOutcome }[],
): string | null {
  const explained = stageOutcomes.flatMap(({ unit, outcome }) =>
    outcome.status === "success" ? [{ name: unit.name, explanation: outcome.explanation }] : [],
  );

  if (explained.length === 0) return null;
  if (stageOutcomes.length === 1) return explained[0].explanation;

  return explained.map(({ name, explanation }) => `[${name}]\n${explanation}`).join("\n\n");
}

function toDiagnostic(
  unitName: string,
  stageIndex: number,
  outcome: UnitOutcome,
  durationMs: number,
): UnitDiagnostic {
  if (outcome.status === "success") {
    return { unitName, stageIndex, status: "success", attempts: outcome.attempts, durationMs };
  }
  return {
    unitName,
    stageIndex,
    status: "failure",
    attempts: outcome.attempts,
    durationMs,
    failureKind: outcome.kind,
    failureReason: outcome.reason,
  };
}
