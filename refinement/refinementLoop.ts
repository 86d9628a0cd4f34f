import { logger } from "../config/logger.js";
import type { TextGenerator } from "../llm/types.js";
import { PipelineExecutionError } from "../pipeline/errors.js";
import type { ExecutionResult } from "../pipeline/executionResult.js";
import { runPipeline } from "../pipeline/executor.js";
import { addressOf, addressesOf } from "../pipeline/resultKeys.js";
import type { InputRecord, Pipeline, RunOptions } from "../pipeline/types.js";
import type { ContentImprover } from "./contentImprover.js";

export type RefinementPhase = "EVALUATING" | "REGENERATING" | "PASSED" | "EXHAUSTED" | "ABORTED";

export type AbortReason = "evaluation_failed" | "unexpected_verdict" | "improvement_failed";

export interface RefinementCycle {
  readonly iteration: number;
  readonly content: string;
  readonly verdict: string | null;
  readonly explanation: string | null;
}

interface RefinementProgress {
  readonly iterations: number;
  readonly regenerations: number;
  readonly history: readonly RefinementCycle[];
}

export interface RefinementPassed extends RefinementProgress {
  readonly status: "passed";
  readonly content: string;
  readonly verdict: string;
  readonly explanation: string;
  readonly result: ExecutionResult;
}

export interface RefinementExhausted extends RefinementProgress {
  readonly status: "exhausted";
  readonly content: string;
  readonly verdict: string;
  readonly explanation: string;
  readonly result: ExecutionResult;
}

export interface RefinementAborted extends RefinementProgress {
  readonly status: "aborted";
  readonly reason: AbortReason;
  readonly detail: string;
  readonly result: null;
}

export type RefinementOutcome = RefinementPassed | RefinementExhausted | RefinementAborted;

export interface RefinementLoopOptions {
  readonly pipeline: Pipeline;
  readonly generator: TextGenerator;
  readonly improver: ContentImprover;
  readonly buildInput: (content: string) => InputRecord;
  readonly maxIterations?: number;
  readonly acceptLabel?: string;
  readonly reviseLabel?: string;
  /** Unit whose label drives the loop. Defaults to the last unit of the last stage. */
  readonly verdictUnit?: string;
  readonly runOptions?: Omit<RunOptions, "maxWorkers" | "runId">;
}

interface RefinementState {
  iteration: number;
  currentContent: string;
}

type Evaluation =
  | { readonly ok: true; readonly result: ExecutionResult; readonly verdict: string; readonly explanation: string }
  | { readonly ok: false; readonly detail: string };

export const DEFAULT_MAX_ITERATIONS = 3;

/**
 * Evaluate → (pass | regenerate) → re-evaluate, bounded by `maxIterations`.
 * Runs strictly sequentially; every cycle either terminates or hands fresh
 * content to the next one.
 */
export class RefinementLoopController {
  private readonly pipeline: Pipeline;
  private readonly generator: TextGenerator;
  private readonly improver: ContentImprover;
  private readonly buildInput: (content: string) => InputRecord;
  private readonly maxIterations: number;
  private readonly acceptLabel: string;
  private readonly reviseLabel: string;
  private readonly verdictUnit: string;
  private readonly runOptions: Omit<RunOptions, "maxWorkers" | "runId">;

  constructor(options: RefinementLoopOptions) {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be an integer >= 1, got: ${String(maxIterations)}`);
    }

    this.pipeline = options.pipeline;
    this.generator = options.generator;
    this.improver = options.improver;
    this.buildInput = options.buildInput;
    this.maxIterations = maxIterations;
    this.acceptLabel = options.acceptLabel ?? "pass";
    this.reviseLabel = options.reviseLabel ?? "revise";
    this.verdictUnit = options.verdictUnit ?? lastUnitName(options.pipeline);
    this.runOptions = options.runOptions ?? {};

    this.assertVerdictLabels();
  }

  async run(content: string): Promise<RefinementOutcome> {
    const state: RefinementState = { iteration: 0, currentContent: content };
    const history: RefinementCycle[] = [];
    let regenerations = 0;

    const progress = (): RefinementProgress => ({
      iterations: state.iteration,
      regenerations,
      history: [...history],
    });

    while (state.iteration < this.maxIterations) {
      state.iteration++;
      this.logPhase("EVALUATING", state);

      const evaluation = await this.evaluate(state);
      if (!evaluation.ok) {
        history.push({ iteration: state.iteration, content: state.currentContent, verdict: null, explanation: null });
        this.logPhase("ABORTED", state, { reason: "evaluation_failed", detail: evaluation.detail });
        return { status: "aborted", reason: "evaluation_failed", detail: evaluation.detail, result: null, ...progress() };
      }

      const { verdict, explanation } = evaluation;
      history.push({ iteration: state.iteration, content: state.currentContent, verdict, explanation });

      if (verdict === this.acceptLabel) {
        this.logPhase("PASSED", state);
        return {
          status: "passed",
          content: state.currentContent,
          verdict,
          explanation,
          result: evaluation.result,
          ...progress(),
        };
      }

      if (verdict !== this.reviseLabel) {
        const detail = `Verdict "${verdict}" is neither "${this.acceptLabel}" nor "${this.reviseLabel}"`;
        this.logPhase("ABORTED", state, { reason: "unexpected_verdict", detail });
        return { status: "aborted", reason: "unexpected_verdict", detail, result: null, ...progress() };
      }

      if (state.iteration >= this.maxIterations) {
        this.logPhase("EXHAUSTED", state, { maxIterations: this.maxIterations });
        return {
          status: "exhausted",
          content: state.currentContent,
          verdict,
          explanation,
          result: evaluation.result,
          ...progress(),
        };
      }

      this.logPhase("REGENERATING", state);
      regenerations++;
      const improved = await this.regenerate(state, explanation);
      if (improved === null) {
        const detail = "Improvement step produced no content";
        this.logPhase("ABORTED", state, { reason: "improvement_failed" });
        return { status: "aborted", reason: "improvement_failed", detail, result: null, ...progress() };
      }

      state.currentContent = improved;
    }

    // maxIterations >= 1 guarantees a return from inside the loop.
    throw new Error("Refinement loop ended without a terminal state");
  }

  private async evaluate(state: RefinementState): Promise<Evaluation> {
    let result: ExecutionResult;
    try {
      const run = await runPipeline(this.pipeline, this.buildInput(state.currentContent), this.generator, {
        ...this.runOptions,
        maxWorkers: 1,
        runId: `refine-${String(state.iteration)}`,
      });
      result = run.result;
    } catch (error) {
      if (!(error instanceof PipelineExecutionError)) throw error;
      return { ok: false, detail: error.message };
    }

    const outcome = result.outcomeOf(this.verdictUnit);
    if (!outcome) {
      return { ok: false, detail: `No outcome recorded for "${this.verdictUnit}"` };
    }
    if (outcome.status === "failure") {
      return { ok: false, detail: `${outcome.kind}: ${outcome.reason}` };
    }

    return { ok: true, result, verdict: outcome.label, explanation: outcome.explanation };
  }

  private async regenerate(state: RefinementState, feedback: string): Promise<string | null> {
    try {
      const improved = await this.improver.improve(state.currentContent, feedback);
      if (improved === null || improved.trim().length === 0) return null;
      return improved;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ iteration: state.iteration, error: message }, "Content improvement failed");
      return null;
    }
  }

  private assertVerdictLabels(): void {
    const address = addressOf(this.pipeline, this.verdictUnit);
    const stage = this.pipeline.stages[address.stageIndex];
    const unit = stage.kind === "unit" ? stage.unit : stage.units.find((u) => u.name === this.verdictUnit);

    for (const label of [this.acceptLabel, this.reviseLabel]) {
      if (!unit?.labels.includes(label)) {
        throw new RangeError(`Unit "${this.verdictUnit}" has no "${label}" label`);
      }
    }
  }

  private logPhase(phase: RefinementPhase, state: RefinementState, extra: Record<string, unknown> = {}): void {
    const fields = {
      pipeline: this.pipeline.name,
      phase,
      iteration: state.iteration,
      maxIterations: this.maxIterations,
      ...extra,
    };
    if (phase === "ABORTED") {
      logger.error(fields, "Refinement loop aborted");
    } else if (phase === "EXHAUSTED") {
      logger.warn(fields, "Refinement loop exhausted its iteration budget");
    } else {
      logger.info(fields, `Refinement ${phase.toLowerCase()}`);
    }
  }
}

function lastUnitName(pipeline: Pipeline): string {
  const last = addressesOf(pipeline).at(-1);
  if (!last) {
    throw new RangeError(`Pipeline "${pipeline.name}" has no units to take a verdict from`);
  }
  return last.unitName;
}
