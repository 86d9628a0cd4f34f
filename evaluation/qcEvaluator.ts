import { logger } from "../config/logger.js";
import { loadJudge } from "../judges/judgeLoader.js";
import type { TextGenerator } from "../llm/types.js";
import { createPipeline } from "../pipeline/composer.js";
import type { ExecutionResult } from "../pipeline/executionResult.js";
import { PipelineExecutionError } from "../pipeline/errors.js";
import { runPipeline } from "../pipeline/executor.js";
import type { PipelineRun } from "../pipeline/executor.js";
import type { JudgeUnit } from "../pipeline/judgeUnit.js";
import { keyFor } from "../pipeline/resultKeys.js";
import type { Pipeline, RunDiagnostics, RunOptions } from "../pipeline/types.js";

export const QC_EVALUATOR_PIPELINE = "QCEvaluator";
export const META_JUDGE = "MetaJudge";
export const FAILURE_ANALYZER = "FailureAnalyzer";
export const RELIABLE_VERDICT = "reliable";

export interface QcEvaluationInput {
  readonly content: string;
  readonly qcAssessment: string;
  readonly qcDecision: string;
  readonly requirements: string;
}

export interface MetaEvaluation {
  readonly verdict: string;
  readonly explanation: string;
}

export interface FailureAnalysis {
  readonly type: string;
  readonly explanation: string;
}

export interface QcEvaluationReport {
  readonly metaEvaluation: MetaEvaluation;
  /** Null only when the FailureAnalyzer unit itself failed. */
  readonly failureAnalysis: FailureAnalysis | null;
  /** Stage 2 always runs; its output matters only when stage 1 is not "reliable". */
  readonly failureAnalysisRelevant: boolean;
  readonly result: ExecutionResult;
  readonly diagnostics: RunDiagnostics;
}

export interface QcJudges {
  readonly metaJudge?: JudgeUnit;
  readonly failureAnalyzer?: JudgeUnit;
}

/**
 * Two sequential single-member layers. FailureAnalyzer reads MetaJudge's
 * explanation and always runs, whatever MetaJudge decided.
 */
export function createQcEvaluationPipeline(judges: QcJudges = {}): Pipeline {
  const metaJudge = judges.metaJudge ?? loadJudge("meta-judge");
  const failureAnalyzer = judges.failureAnalyzer ?? loadJudge("failure-analyzer");

  return createPipeline(QC_EVALUATOR_PIPELINE).layer([metaJudge]).layer([failureAnalyzer]).build();
}

export async function evaluateQcSystem(
  input: QcEvaluationInput,
  generator: TextGenerator,
  options: Omit<RunOptions, "maxWorkers"> & QcJudges = {},
): Promise<QcEvaluationReport | null> {
  const pipeline = createQcEvaluationPipeline(options);

  let run: PipelineRun;
  try {
    run = await runPipeline(
      pipeline,
      {
        content: input.content,
        qc_assessment: input.qcAssessment,
        qc_decision: input.qcDecision,
        requirements: input.requirements,
      },
      generator,
      { ...options, maxWorkers: 1 },
    );
  } catch (error) {
    if (!(error instanceof PipelineExecutionError)) throw error;
    logger.error(
      { unit: error.unitName, stageIndex: error.stageIndex, kind: error.failure.kind, reason: error.failure.reason },
      "QC evaluation aborted",
    );
    return null;
  }
  const { result, diagnostics } = run;

  const metaVerdict = result.get(keyFor(pipeline, META_JUDGE, "choice"));
  const metaExplanation = result.get(keyFor(pipeline, META_JUDGE, "explanation"));

  if (metaVerdict === undefined || metaExplanation === undefined) {
    logger.error({ runId: diagnostics.runId, availableKeys: result.keys() }, "Meta-evaluation produced no verdict");
    return null;
  }

  const failureType = result.get(keyFor(pipeline, FAILURE_ANALYZER, "choice"));
  const failureExplanation = result.get(keyFor(pipeline, FAILURE_ANALYZER, "explanation"));
  const failureAnalysis =
    failureType !== undefined && failureExplanation !== undefined
      ? { type: failureType, explanation: failureExplanation }
      : null;

  const failureAnalysisRelevant = metaVerdict !== RELIABLE_VERDICT;

  logger.info(
    {
      runId: diagnostics.runId,
      metaVerdict,
      failureType: failureAnalysis?.type ?? "unavailable",
      failureAnalysisRelevant,
    },
    "QC system evaluated",
  );

  return {
    metaEvaluation: { verdict: metaVerdict, explanation: metaExplanation },
    failureAnalysis,
    failureAnalysisRelevant,
    result,
    diagnostics,
  };
}
