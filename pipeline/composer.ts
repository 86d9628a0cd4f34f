import { PipelineCompositionError } from "./errors.js";
import type { JudgeUnit } from "./judgeUnit.js";
import type { Pipeline, Stage } from "./types.js";

const PIPELINE_NAME_REGEX = /^[A-Za-z][A-Za-z0-9_-]*$/;

export class PipelineBuilder {
  private readonly stages: Stage[] = [];

  constructor(private readonly name: string) {
    if (!PIPELINE_NAME_REGEX.test(name)) {
      throw new PipelineCompositionError(
        `Pipeline name must start with a letter and contain only letters, digits, "_" or "-": "${name}"`,
      );
    }
  }

  /** Appends a sequential stage holding a single judge. */
  unit(unit: JudgeUnit): this {
    this.stages.push({ kind: "unit", unit });
    return this;
  }

  /** Appends a stage whose judges all read the same upstream context. */
  layer(units: readonly JudgeUnit[]): this {
    if (units.length === 0) {
      throw new PipelineCompositionError(
        `Layer at stage ${String(this.stages.length)} of "${this.name}" has no units`,
      );
    }
    this.stages.push({ kind: "layer", units: Object.freeze([...units]) });
    return this;
  }

  build(): Pipeline {
    const pipeline: Pipeline = {
      name: this.name,
      stages: Object.freeze(this.stages.map((stage) => Object.freeze({ ...stage }))),
    };
    validatePipeline(pipeline);
    return Object.freeze(pipeline);
  }
}

export function createPipeline(name: string): PipelineBuilder {
  return new PipelineBuilder(name);
}

export function stageUnits(stage: Stage): readonly JudgeUnit[] {
  return stage.kind === "unit" ? [stage.unit] : stage.units;
}

export function validatePipeline(pipeline: Pipeline): void {
  const seen = new Set<string>();

  pipeline.stages.forEach((stage, stageIndex) => {
    const units = stageUnits(stage);
    if (units.length === 0) {
      throw new PipelineCompositionError(
        `Stage ${String(stageIndex)} of "${pipeline.name}" has no units`,
      );
    }

    for (const unit of units) {
      if (seen.has(unit.name)) {
        throw new PipelineCompositionError(
          `Unit name "${unit.name}" appears more than once in "${pipeline.name}"`,
        );
      }
      seen.add(unit.name);

      if (unit.references.usesPreviousExplanation) {
        validatePreviousReference(pipeline, stageIndex, unit.name);
      }
    }
  });
}

function validatePreviousReference(pipeline: Pipeline, stageIndex: number, unitName: string): void {
  if (stageIndex === 0) {
    throw new PipelineCompositionError(
      `Unit "${unitName}" reads {previous.explanation} but sits in the first stage of "${pipeline.name}"`,
    );
  }

  const silent = stageUnits(pipeline.stages[stageIndex - 1]).filter((u) => !u.producesExplanation);
  if (silent.length > 0) {
    throw new PipelineCompositionError(
      `Unit "${unitName}" reads {previous.explanation} but ${silent.map((u) => `"${u.name}"`).join(", ")} produce none`,
    );
  }
}
