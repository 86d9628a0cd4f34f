import type { UnitFailure } from "./types.js";

export class PipelineCompositionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineCompositionError";
  }
}

export class PipelineExecutionError extends Error {
  constructor(
    readonly pipeline: string,
    readonly stageIndex: number,
    readonly unitName: string,
    readonly failure: UnitFailure,
  ) {
    super(
      `Unit "${unitName}" failed at stage ${String(stageIndex)} of pipeline "${pipeline}" (${failure.kind}): ${failure.reason}`,
    );
    this.name = "PipelineExecutionError";
  }
}

export class MissingResultError extends Error {
  constructor(readonly key: string) {
    super(`No result recorded under "${key}"`);
    this.name = "MissingResultError";
  }
}

export class GenerationTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Generation timed out after ${String(timeoutMs)}ms`);
    this.name = "GenerationTimeoutError";
  }
}
