import { describe, it, expect } from "vitest";
import { ConfigValidationError, loadRuntimeConfig } from "./runtime.js";

describe("loadRuntimeConfig", () => {
  it("should fall back to defaults when nothing is set", () => {
    expect(loadRuntimeConfig({})).toEqual({
      judgeRetries: 1,
      judgeTimeoutMs: 60_000,
      graceful: true,
      maxIterations: 5,
    });
  });

  it("should read every variable", () => {
    expect(
      loadRuntimeConfig({
        JUDGE_RETRIES: "3",
        JUDGE_TIMEOUT_MS: "15000",
        PIPELINE_GRACEFUL: "FALSE",
        REFINEMENT_MAX_ITERATIONS: "2",
      }),
    ).toEqual({
      judgeRetries: 3,
      judgeTimeoutMs: 15_000,
      graceful: false,
      maxIterations: 2,
    });
  });

  it("should treat blank values as unset", () => {
    expect(loadRuntimeConfig({ JUDGE_TIMEOUT_MS: "  " }).judgeTimeoutMs).toBe(60_000);
  });

  it("should accept 1 and 0 as booleans", () => {
    expect(loadRuntimeConfig({ PIPELINE_GRACEFUL: "0" }).graceful).toBe(false);
    expect(loadRuntimeConfig({ PIPELINE_GRACEFUL: "1" }).graceful).toBe(true);
  });

  it("should reject out-of-range integers", () => {
    expect(() => loadRuntimeConfig({ REFINEMENT_MAX_ITERATIONS: "0" })).toThrow(
      'REFINEMENT_MAX_ITERATIONS must be an integer between 1 and 20. Got: "0"',
    );
    expect(() => loadRuntimeConfig({ JUDGE_RETRIES: "1.5" })).toThrow(ConfigValidationError);
  });

  it("should cap the judge timeout at the largest delay a timer honors", () => {
    expect(loadRuntimeConfig({ JUDGE_TIMEOUT_MS: "2147483647" }).judgeTimeoutMs).toBe(2_147_483_647);
    expect(() => loadRuntimeConfig({ JUDGE_TIMEOUT_MS: "3000000000" })).toThrow(
      'JUDGE_TIMEOUT_MS must be an integer between 1 and 2147483647. Got: "3000000000"',
    );
  });

  it("should reject unrecognized booleans", () => {
    expect(() => loadRuntimeConfig({ PIPELINE_GRACEFUL: "maybe" })).toThrow(
      'PIPELINE_GRACEFUL must be "true" or "false". Got: "maybe"',
    );
  });
});
