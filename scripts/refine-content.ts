import path from "node:path";
import { logger } from "../config/logger.js";
import { createLlmContentImprover } from "../refinement/contentImprover.js";
import { improveContent } from "../refinement/qualityControl.js";
import { formatRefinementReport } from "../reporting/reportFormatter.js";
import { SAMPLES_DIR, bootstrap, printReport, readFlag, readTextFile, refinementExitCode } from "./cli.js";

const args = process.argv.slice(2);
const { generator, runtime } = bootstrap();

const content = readTextFile(readFlag(args, "--content") ?? path.join(SAMPLES_DIR, "photosynthesis.md"));
const requirements = readTextFile(
  readFlag(args, "--requirements") ?? path.join(SAMPLES_DIR, "photosynthesis-requirements.md"),
);

logger.info({ maxIterations: runtime.maxIterations }, "Starting content improvement process");

const outcome = await improveContent(
  content,
  { requirements, contentType: readFlag(args, "--content-type") ?? "text" },
  {
    generator,
    improver: createLlmContentImprover(generator),
    maxIterations: runtime.maxIterations,
    runOptions: {
      graceful: runtime.graceful,
      retries: runtime.judgeRetries,
      timeoutMs: runtime.judgeTimeoutMs,
    },
  },
);

printReport(formatRefinementReport(outcome));

process.exitCode = refinementExitCode(outcome);
