import { describe, it, expect } from "vitest";
import { MissingResultError } from "./errors.js";
import { ExecutionResult } from "./executionResult.js";
import type { RecordedOutcome } from "./executionResult.js";
import type { UnitAddress } from "./types.js";

const META: UnitAddress = {
  pipeline: "QCEvaluator",
  stageIndex: 0,
  inLayer: true,
  unitKind: "CategoricalJudge",
  unitName: "MetaJudge",
};

const ANALYZER: UnitAddress = { ...META, stageIndex: 1, unitName: "FailureAnalyzer" };

const META_CHOICE = "QCEvaluator_root.block.layer[0].unit[CategoricalJudge MetaJudge]_choice";
const META_EXPLANATION = "QCEvaluator_root.block.layer[0].unit[CategoricalJudge MetaJudge]_explanation";

function buildResult(): ExecutionResult {
  const recorded: RecordedOutcome[] = [
    {
      address: META,
      outcome: { status: "success", label: "questionable", explanation: "Missed a unit error.", attempts: 1 },
    },
    {
      address: ANALYZER,
      outcome: { status: "failure", kind: "timeout", reason: "Generation timed out after 10ms", attempts: 2 },
    },
  ];
  return new ExecutionResult(recorded);
}

describe("ExecutionResult", () => {
  it("should store choice and explanation for successful units only", () => {
    const result = buildResult();

    expect(result.size).toBe(2);
    expect(result.keys()).toEqual([META_CHOICE, META_EXPLANATION]);
    expect(result.get(META_CHOICE)).toBe("questionable");
    expect(result.read(META, "explanation")).toBe("Missed a unit error.");
    expect(result.has("QCEvaluator_root.block.layer[1].unit[CategoricalJudge FailureAnalyzer]_choice")).toBe(false);
  });

  it("should throw a MissingResultError when a required key is absent", () => {
    const result = buildResult();

    expect(() => result.read(ANALYZER, "choice")).toThrow(MissingResultError);
    expect(() => result.require("nope")).toThrow('No result recorded under "nope"');
  });

  it("should keep the tagged outcome of failed units", () => {
    const result = buildResult();

    expect(result.outcomeOf("FailureAnalyzer")).toEqual({
      status: "failure",
      kind: "timeout",
      reason: "Generation timed out after 10ms",
      attempts: 2,
    });
    expect(result.outcomeAt("QCEvaluator_root.block.layer[0].unit[CategoricalJudge MetaJudge]")?.status).toBe(
      "success",
    );
    expect(result.succeeded()).toEqual(["MetaJudge"]);
    expect(result.failures().map((f) => f.address.unitName)).toEqual(["FailureAnalyzer"]);
  });

  it("should export a plain record and stay frozen", () => {
    const result = buildResult();

    expect(result.toRecord()).toEqual({
      [META_CHOICE]: "questionable",
      [META_EXPLANATION]: "Missed a unit error.",
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("should reject a unit recorded twice", () => {
    const outcome = { status: "success", label: "reliable", explanation: "ok", attempts: 1 } as const;

    expect(() => new ExecutionResult([{ address: META, outcome }, { address: META, outcome }])).toThrow(
      'Outcome for unit "MetaJudge" recorded twice',
    );
  });

  it("should be empty when nothing ran", () => {
    expect(ExecutionResult.empty().size).toBe(0);
    expect(ExecutionResult.empty().toRecord()).toEqual({});
  });
});
