import path from "node:path";
import { parse as parseYaml } from "yaml";
import { logger } from "../config/logger.js";
import { validateQcEvaluationInput } from "../evaluation/qcEvaluationInput.js";
import { evaluateQcSystem } from "../evaluation/qcEvaluator.js";
import { formatQcEvaluationReport } from "../reporting/reportFormatter.js";
import { SAMPLES_DIR, bootstrap, printReport, readFlag, readTextFile } from "./cli.js";

const args = process.argv.slice(2);
const { generator, runtime } = bootstrap();

const inputPath = readFlag(args, "--input") ?? path.join(SAMPLES_DIR, "chemistry-qc.yaml");
const input = validateQcEvaluationInput(parseYaml(readTextFile(inputPath)));

logger.info({ inputPath }, "Evaluating quality control system");

const report = await evaluateQcSystem(input, generator, {
  graceful: runtime.graceful,
  retries: runtime.judgeRetries,
  timeoutMs: runtime.judgeTimeoutMs,
});

printReport(formatQcEvaluationReport(report));

if (!report) {
  process.exitCode = 1;
}
