import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { JudgeDefinitionError } from "./judge.schema.js";
import { loadJudge, loadJudgeDefinition, loadPromptTemplate } from "./judgeLoader.js";

describe("built-in judge catalogue", () => {
  it.each([
    ["quality-judge", "QualityJudge", ["pass", "revise"]],
    ["meta-judge", "MetaJudge", ["reliable", "questionable", "failure"]],
    ["failure-analyzer", "FailureAnalyzer", ["systematic", "contextual", "random"]],
    ["test-generator", "Generator", ["valid", "invalid"]],
  ])("should load %s", (dir, name, labels) => {
    const judge = loadJudge(dir);

    expect(judge.name).toBe(name);
    expect(judge.labels).toEqual(labels);
    expect(judge.producesExplanation).toBe(true);
  });

  it("should let only the failure analyzer read the previous explanation", () => {
    expect(loadJudge("failure-analyzer").references.usesPreviousExplanation).toBe(true);
    expect(loadJudge("meta-judge").references.sourceFields).toEqual([
      "content",
      "qc_assessment",
      "qc_decision",
      "requirements",
    ]);
  });

  it("should return the same unit on repeated loads", () => {
    expect(loadJudge("quality-judge")).toBe(loadJudge("quality-judge"));
  });
});

describe("loading judges from a directory", () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "judges-"));
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  function writeJudge(dir: string, yaml: string, prompt?: string): void {
    fs.mkdirSync(path.join(baseDir, dir));
    fs.writeFileSync(path.join(baseDir, dir, "judge.yaml"), yaml);
    if (prompt !== undefined) fs.writeFileSync(path.join(baseDir, dir, "PROMPT.md"), prompt);
  }

  it("should build a unit from judge.yaml and PROMPT.md", () => {
    writeJudge("tone", "name: ToneJudge\nlabels: [formal, casual]\nexplanation: false\nmodel: gpt-4o\n", "Tone of {source.text}?");

    const judge = loadJudge("tone", baseDir);

    expect(judge.name).toBe("ToneJudge");
    expect(judge.model).toBe("gpt-4o");
    expect(judge.producesExplanation).toBe(false);
    expect(judge.references.sourceFields).toEqual(["text"]);
  });

  it("should prefix validation errors with the definition path", () => {
    writeJudge("broken", "name: Broken\nlabels: []\n", "x");
    const definitionPath = path.join(baseDir, "broken", "judge.yaml");

    expect(() => loadJudgeDefinition("broken", baseDir)).toThrow(
      `${definitionPath}: labels must be a non-empty list`,
    );
  });

  it("should report a missing definition", () => {
    expect(() => loadJudgeDefinition("absent", baseDir)).toThrow(JudgeDefinitionError);
  });

  it("should reject a missing or blank prompt", () => {
    writeJudge("silent", "name: Silent\nlabels: [a]\n");
    expect(() => loadJudge("silent", baseDir)).toThrow("Prompt template not found at");

    const blank = path.join(baseDir, "blank.md");
    fs.writeFileSync(blank, "  \n");
    expect(() => loadPromptTemplate(blank)).toThrow(`Prompt template at ${blank} is empty`);
  });
});
