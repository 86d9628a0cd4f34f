import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "../config/logger.js";
import { loadRuntimeConfig } from "../config/runtime.js";
import type { RuntimeConfig } from "../config/runtime.js";
import { createLLMConfig, createLLMGenerator, resolveApiKey } from "../llm/client.js";
import type { TextGenerator } from "../llm/types.js";
import type { RefinementOutcome } from "../refinement/refinementLoop.js";

export const SAMPLES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "samples");

export interface ScriptContext {
  readonly generator: TextGenerator;
  readonly runtime: RuntimeConfig;
}

export function readFlag(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index !== -1 && index + 1 < args.length ? args[index + 1] : undefined;
}

export function readTextFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    logger.error({ filePath }, "Input file not found");
    process.exit(1);
  }
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Exits with status 1 when no API key is configured, before anything is
 * generated.
 */
export function bootstrap(): ScriptContext {
  if (!resolveApiKey()) {
    logger.error("Error: LLM_API_KEY (or OPENAI_API_KEY) environment variable is not set");
    process.exit(1);
  }

  return {
    generator: createLLMGenerator(createLLMConfig()),
    runtime: loadRuntimeConfig(),
  };
}

export function printReport(report: string): void {
  process.stdout.write(`\n${report}\n`);
}

/** Exhausting the iteration budget is a reported outcome; only an abort fails the run. */
export function refinementExitCode(outcome: RefinementOutcome): number {
  return outcome.status === "aborted" ? 1 : 0;
}
