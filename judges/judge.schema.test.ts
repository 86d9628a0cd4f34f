import { describe, it, expect } from "vitest";
import { JudgeDefinitionError, validateJudgeDefinition } from "./judge.schema.js";

describe("validateJudgeDefinition", () => {
  it("should default explanation to true and normalize labels", () => {
    expect(validateJudgeDefinition({ name: "QualityJudge", labels: ["Pass", " revise "] })).toEqual({
      name: "QualityJudge",
      labels: ["pass", "revise"],
      explanation: true,
      model: undefined,
      retries: undefined,
    });
  });

  it("should accept categories as an alias for labels", () => {
    expect(validateJudgeDefinition({ name: "MetaJudge", categories: ["reliable", "failure"] }).labels).toEqual([
      "reliable",
      "failure",
    ]);
  });

  it("should read model, retries and explanation", () => {
    const definition = validateJudgeDefinition({
      name: "Generator",
      labels: ["valid", "invalid"],
      explanation: false,
      model: " gpt-4o ",
      retries: "2",
    });

    expect(definition).toMatchObject({ explanation: false, model: "gpt-4o", retries: 2 });
  });

  it("should reject a missing name", () => {
    expect(() => validateJudgeDefinition({ labels: ["a"] })).toThrow("name must be a non-empty string");
  });

  it("should reject empty and duplicate labels", () => {
    expect(() => validateJudgeDefinition({ name: "J", labels: [] })).toThrow("labels must be a non-empty list");
    expect(() => validateJudgeDefinition({ name: "J", labels: ["yes", "YES"] })).toThrow(
      'labels contains "yes" more than once',
    );
  });

  it("should reject labels that are not single words", () => {
    expect(() => validateJudgeDefinition({ name: "J", labels: ["needs work"] })).toThrow(
      'labels[0] must be a lowercase word. Got: "needs work"',
    );
  });

  it("should reject retries outside 0 to 5", () => {
    expect(() => validateJudgeDefinition({ name: "J", labels: ["a"], retries: 9 })).toThrow(
      'retries must be an integer between 0 and 5. Got: "9"',
    );
  });

  it("should reject a non-object definition", () => {
    expect(() => validateJudgeDefinition("QualityJudge")).toThrow(JudgeDefinitionError);
  });
});
