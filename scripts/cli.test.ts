import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi } from "vitest";
import { ExecutionResult } from "../pipeline/executionResult.js";
import type { RefinementOutcome } from "../refinement/refinementLoop.js";
import { readFlag, refinementExitCode } from "./cli.js";

const PROGRESS = { iterations: 3, regenerations: 2, history: [] };

describe("refinementExitCode", () => {
  it("should succeed when the content passed", () => {
    const outcome: RefinementOutcome = {
      status: "passed",
      content: "Final",
      verdict: "pass",
      explanation: "Accurate.",
      result: ExecutionResult.empty(),
      ...PROGRESS,
    };

    expect(refinementExitCode(outcome)).toBe(0);
  });

  it("should succeed when the iteration budget ran out", () => {
    const outcome: RefinementOutcome = {
      status: "exhausted",
      content: "Draft 3",
      verdict: "revise",
      explanation: "Still vague.",
      result: ExecutionResult.empty(),
      ...PROGRESS,
    };

    expect(refinementExitCode(outcome)).toBe(0);
  });

  it("should fail when the loop aborted", () => {
    const outcome: RefinementOutcome = {
      status: "aborted",
      reason: "improvement_failed",
      detail: "Improvement step produced no content",
      result: null,
      ...PROGRESS,
    };

    expect(refinementExitCode(outcome)).toBe(1);
  });
});

describe("SAMPLES_DIR", () => {
  it("should point at the bundled samples whatever the working directory", async () => {
    const cwd = process.cwd();
    process.chdir(os.tmpdir());
    try {
      vi.resetModules();
      const { SAMPLES_DIR: samplesDir } = await import("./cli.js");

      expect(fs.existsSync(path.join(samplesDir, "photosynthesis.md"))).toBe(true);
      expect(fs.existsSync(path.join(samplesDir, "chemistry-qc.yaml"))).toBe(true);
    } finally {
      process.chdir(cwd);
    }
  });
});

describe("readFlag", () => {
  it("should return the value after the flag", () => {
    expect(readFlag(["--input", "qc.yaml"], "--input")).toBe("qc.yaml");
  });

  it("should return undefined for a flag without a value", () => {
    expect(readFlag(["--input"], "--input")).toBeUndefined();
  });
});
