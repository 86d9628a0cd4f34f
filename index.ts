export { createPipeline, PipelineBuilder, validatePipeline } from "./pipeline/composer.js";
export { runPipeline, combineExplanations } from "./pipeline/executor.js";
export type { PipelineRun } from "./pipeline/executor.js";
export { ExecutionResult } from "./pipeline/executionResult.js";
export { JudgeUnit, CATEGORICAL_JUDGE_KIND } from "./pipeline/judgeUnit.js";
export type { JudgeUnitOptions, EvaluationPolicy } from "./pipeline/judgeUnit.js";
export { resultKey, unitPath, addressOf, addressesOf, keyFor } from "./pipeline/resultKeys.js";
export {
  PipelineCompositionError,
  PipelineExecutionError,
  MissingResultError,
  GenerationTimeoutError,
} from "./pipeline/errors.js";
export type * from "./pipeline/types.js";
export type { TextGenerator, GenerationRequest } from "./llm/types.js";
export { createLLMConfig, createLLMGenerator, callLLM } from "./llm/client.js";
export { loadJudge, loadJudgeDefinition } from "./judges/judgeLoader.js";
export { validateJudgeDefinition, JudgeDefinitionError } from "./judges/judge.schema.js";
export { RefinementLoopController } from "./refinement/refinementLoop.js";
export type { RefinementOutcome, RefinementCycle, AbortReason } from "./refinement/refinementLoop.js";
export { createLlmContentImprover } from "./refinement/contentImprover.js";
export type { ContentImprover } from "./refinement/contentImprover.js";
export { improveContent, createQualityControlPipeline } from "./refinement/qualityControl.js";
export { evaluateQcSystem, createQcEvaluationPipeline } from "./evaluation/qcEvaluator.js";
export type { QcEvaluationReport, QcEvaluationInput } from "./evaluation/qcEvaluator.js";
export { generateTestCase, createTestGenerationPipeline } from "./generation/testCaseGenerator.js";
export { loadRuntimeConfig, ConfigValidationError } from "./config/runtime.js";
