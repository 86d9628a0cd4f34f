import type { QcEvaluationReport } from "../evaluation/qcEvaluator.js";
import type { GeneratedTestCase } from "../generation/testCaseGenerator.js";
import type { RefinementOutcome } from "../refinement/refinementLoop.js";

const RULE = "=".repeat(50);
const SUB_RULE = "=".repeat(30);

export const NO_RESULT_MESSAGE = "No result produced.";

export function formatRefinementReport(outcome: RefinementOutcome): string {
  const cycles = outcome.history.flatMap((cycle) => [
    `Iteration ${String(cycle.iteration)}`,
    `- Verdict: ${cycle.verdict ?? "unavailable"}`,
    ...(cycle.explanation ? ["- Feedback:", cycle.explanation] : []),
    "",
  ]);

  if (outcome.status === "aborted") {
    return [
      RULE,
      ...cycles,
      `Refinement aborted (${outcome.reason}): ${outcome.detail}`,
      NO_RESULT_MESSAGE,
      RULE,
    ].join("\n");
  }

  const headline =
    outcome.status === "passed"
      ? `Content meets quality standards after ${String(outcome.iterations)} iteration(s).`
      : `Hit max iterations (${String(outcome.iterations)}) without reaching quality standards.`;

  return [
    RULE,
    ...cycles,
    headline,
    "",
    outcome.status === "passed" ? "Final Improved Content:" : "Last Evaluated Content:",
    SUB_RULE,
    outcome.content,
    "",
    "Final Quality Assessment:",
    outcome.explanation,
    RULE,
  ].join("\n");
}

export function formatQcEvaluationReport(report: QcEvaluationReport | null): string {
  if (!report) return NO_RESULT_MESSAGE;

  const lines = [
    "Meta-Evaluation Results:",
    SUB_RULE,
    `Verdict: ${report.metaEvaluation.verdict}`,
    "",
    "Detailed Analysis:",
    report.metaEvaluation.explanation,
  ];

  if (report.failureAnalysisRelevant) {
    lines.push("", "Failure Analysis:", SUB_RULE);
    if (report.failureAnalysis) {
      lines.push(
        `Failure Type: ${report.failureAnalysis.type}`,
        "",
        "Failure Details:",
        report.failureAnalysis.explanation,
      );
    } else {
      lines.push("Failure analysis unavailable.");
    }
  }

  return lines.join("\n");
}

export function formatTestCaseReport(testCase: GeneratedTestCase | null): string {
  if (!testCase) return NO_RESULT_MESSAGE;

  return [
    "Generated Test Case:",
    "",
    `Scenario: ${testCase.scenario}`,
    `Validity: ${testCase.validity}`,
    "",
    "Test Case Details:",
    testCase.testCase,
    RULE,
  ].join("\n");
}
