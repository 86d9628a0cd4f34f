import { MAX_TIMEOUT_MS } from "../pipeline/executor.js";

export interface RuntimeConfig {
  readonly judgeRetries: number;
  readonly judgeTimeoutMs: number;
  readonly graceful: boolean;
  readonly maxIterations: number;
}

const MAX_JUDGE_RETRIES = 5;
const MAX_ITERATIONS_LIMIT = 20;

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    judgeRetries: readInteger(env, "JUDGE_RETRIES", 1, 0, MAX_JUDGE_RETRIES),
    judgeTimeoutMs: readInteger(env, "JUDGE_TIMEOUT_MS", 60_000, 1, MAX_TIMEOUT_MS),
    graceful: readBoolean(env, "PIPELINE_GRACEFUL", true),
    maxIterations: readInteger(env, "REFINEMENT_MAX_ITERATIONS", 5, 1, MAX_ITERATIONS_LIMIT),
  };
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigValidationError(
      `${name} must be an integer between ${String(min)} and ${String(max)}. Got: "${raw}"`,
    );
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return fallback;

  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;

  throw new ConfigValidationError(`${name} must be "true" or "false". Got: "${raw}"`);
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}
