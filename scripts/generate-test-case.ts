import { logger } from "../config/logger.js";
import { DEFAULT_SCENARIO, generateTestCase } from "../generation/testCaseGenerator.js";
import { formatTestCaseReport } from "../reporting/reportFormatter.js";
import { bootstrap, printReport, readFlag } from "./cli.js";

const args = process.argv.slice(2);
const { generator, runtime } = bootstrap();

const scenario = readFlag(args, "--scenario") ?? DEFAULT_SCENARIO;
logger.info("Generating educational test case...");

const testCase = await generateTestCase(scenario, generator, {
  retries: runtime.judgeRetries,
  timeoutMs: runtime.judgeTimeoutMs,
});

printReport(formatTestCaseReport(testCase));

if (!testCase) {
  logger.error("No test case was generated. Check the logs for detailed error information.");
  process.exitCode = 1;
}
