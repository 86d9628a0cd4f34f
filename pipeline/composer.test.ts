import { describe, it, expect } from "vitest";
import { createPipeline, validatePipeline } from "./composer.js";
import { PipelineCompositionError } from "./errors.js";
import { JudgeUnit } from "./judgeUnit.js";

function buildJudge(name: string, prompt = "Review {source.content}", explanation = true): JudgeUnit {
  return new JudgeUnit({ name, labels: ["yes", "no"], prompt, explanation });
}

describe("createPipeline", () => {
  it("should keep stages in declaration order", () => {
    const pipeline = createPipeline("Review")
      .unit(buildJudge("First"))
      .layer([buildJudge("Left"), buildJudge("Right")])
      .build();

    expect(pipeline.name).toBe("Review");
    expect(pipeline.stages.map((s) => s.kind)).toEqual(["unit", "layer"]);
    expect(Object.isFrozen(pipeline)).toBe(true);
    expect(Object.isFrozen(pipeline.stages)).toBe(true);
  });

  it("should build a pipeline with zero stages", () => {
    expect(createPipeline("Empty").build().stages).toEqual([]);
  });

  it("should reject an invalid pipeline name", () => {
    expect(() => createPipeline("quality control")).toThrow(PipelineCompositionError);
  });

  it("should reject duplicate unit names across stages", () => {
    const builder = createPipeline("Review").unit(buildJudge("Judge")).layer([buildJudge("Judge")]);

    expect(() => builder.build()).toThrow('Unit name "Judge" appears more than once in "Review"');
  });

  it("should reject an empty layer", () => {
    expect(() => createPipeline("Review").layer([])).toThrow("Layer at stage 0 of \"Review\" has no units");
  });

  it("should reject a previous-explanation reference in the first stage", () => {
    const builder = createPipeline("Review").layer([buildJudge("Analyzer", "Prior: {previous.explanation}")]);

    expect(() => builder.build()).toThrow(
      'Unit "Analyzer" reads {previous.explanation} but sits in the first stage of "Review"',
    );
  });

  it("should reject reading the explanation of a stage that produces none", () => {
    const builder = createPipeline("Review")
      .layer([buildJudge("Quiet", "Review {source.content}", false), buildJudge("Loud")])
      .unit(buildJudge("Analyzer", "Prior: {previous.explanation}"));

    expect(() => builder.build()).toThrow(
      'Unit "Analyzer" reads {previous.explanation} but "Quiet" produce none',
    );
  });

  it("should not be affected by stages added after build", () => {
    const builder = createPipeline("Review").unit(buildJudge("First"));
    const pipeline = builder.build();
    builder.unit(buildJudge("Second"));

    expect(pipeline.stages).toHaveLength(1);
  });
});

describe("validatePipeline", () => {
  it("should accept a hand-built pipeline that chains explanations", () => {
    expect(() =>
      validatePipeline({
        name: "Chain",
        stages: [
          { kind: "unit", unit: buildJudge("Meta") },
          { kind: "unit", unit: buildJudge("Analyzer", "{previous.explanation}") },
        ],
      }),
    ).not.toThrow();
  });
});
