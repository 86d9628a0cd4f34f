import { logger } from "../config/logger.js";
import { loadJudge } from "../judges/judgeLoader.js";
import type { TextGenerator } from "../llm/types.js";
import { createPipeline } from "../pipeline/composer.js";
import type { JudgeUnit } from "../pipeline/judgeUnit.js";
import type { InputRecord, Pipeline, RunOptions } from "../pipeline/types.js";
import type { ContentImprover } from "./contentImprover.js";
import { RefinementLoopController } from "./refinementLoop.js";
import type { RefinementOutcome } from "./refinementLoop.js";

export const QUALITY_CONTROL_PIPELINE = "QualityControl";
export const QUALITY_JUDGE = "QualityJudge";

export interface QualityControlInput {
  readonly requirements: string;
  readonly contentType?: string;
}

export interface QualityControlOptions {
  readonly generator: TextGenerator;
  readonly improver: ContentImprover;
  readonly maxIterations?: number;
  readonly runOptions?: Omit<RunOptions, "maxWorkers" | "runId">;
  readonly judge?: JudgeUnit;
}

export function createQualityControlPipeline(judge: JudgeUnit = loadJudge("quality-judge")): Pipeline {
  return createPipeline(QUALITY_CONTROL_PIPELINE).layer([judge]).build();
}

export function buildQualityControlInput(content: string, input: QualityControlInput): InputRecord {
  return {
    content,
    requirements: input.requirements,
    content_type: input.contentType ?? "text",
  };
}

/**
 * Drives content through the QualityJudge until it passes or the iteration
 * budget runs out.
 */
export async function improveContent(
  content: string,
  input: QualityControlInput,
  options: QualityControlOptions,
): Promise<RefinementOutcome> {
  const pipeline = createQualityControlPipeline(options.judge);

  const controller = new RefinementLoopController({
    pipeline,
    generator: options.generator,
    improver: options.improver,
    buildInput: (current) => buildQualityControlInput(current, input),
    maxIterations: options.maxIterations,
    acceptLabel: "pass",
    reviseLabel: "revise",
    verdictUnit: QUALITY_JUDGE,
    runOptions: options.runOptions,
  });

  const outcome = await controller.run(content);
  logger.info(
    { status: outcome.status, iterations: outcome.iterations, regenerations: outcome.regenerations },
    "Content improvement finished",
  );
  return outcome;
}
