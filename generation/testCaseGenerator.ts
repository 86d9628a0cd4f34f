import { logger } from "../config/logger.js";
import { loadJudge } from "../judges/judgeLoader.js";
import type { TextGenerator } from "../llm/types.js";
import { createPipeline } from "../pipeline/composer.js";
import { runPipeline } from "../pipeline/executor.js";
import type { JudgeUnit } from "../pipeline/judgeUnit.js";
import { keyFor } from "../pipeline/resultKeys.js";
import type { Pipeline, RunOptions } from "../pipeline/types.js";

export const TEST_GENERATOR_PIPELINE = "TestGenerator";
export const GENERATOR_UNIT = "Generator";
export const DEFAULT_SCENARIO =
  "Create a math problem that tests fraction addition but has subtle conceptual gaps";

export interface GeneratedTestCase {
  readonly scenario: string;
  readonly testCase: string;
  readonly validity: string;
}

export function createTestGenerationPipeline(generatorUnit: JudgeUnit = loadJudge("test-generator")): Pipeline {
  return createPipeline(TEST_GENERATOR_PIPELINE).unit(generatorUnit).build();
}

/**
 * Produces an educational test case with deliberately subtle issues. The
 * Generator's explanation carries the test case itself.
 */
export async function generateTestCase(
  scenario: string,
  generator: TextGenerator,
  options: Omit<RunOptions, "maxWorkers" | "graceful"> & { readonly generatorUnit?: JudgeUnit } = {},
): Promise<GeneratedTestCase | null> {
  const pipeline = createTestGenerationPipeline(options.generatorUnit);
  logger.info({ scenario }, "Processing scenario");

  const { result } = await runPipeline(pipeline, { scenario }, generator, {
    ...options,
    maxWorkers: 1,
    graceful: true,
  });

  const explanation = result.get(keyFor(pipeline, GENERATOR_UNIT, "explanation"));
  const choice = result.get(keyFor(pipeline, GENERATOR_UNIT, "choice"));

  if (!explanation || !choice) {
    const outcome = result.outcomeOf(GENERATOR_UNIT);
    logger.error(
      {
        availableKeys: result.keys(),
        failure: outcome?.status === "failure" ? outcome.reason : undefined,
      },
      "Failed to generate test case",
    );
    return null;
  }

  logger.info({ validity: choice }, "Successfully generated test case");
  return { scenario, testCase: explanation, validity: choice };
}
