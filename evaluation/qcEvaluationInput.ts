import type { QcEvaluationInput } from "./qcEvaluator.js";

export function validateQcEvaluationInput(raw: unknown): QcEvaluationInput {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new QcInputValidationError("QC evaluation input must be a non-null object");
  }

  const record = raw as Record<string, unknown>;

  return {
    content: validateText(record["content"], "content"),
    qcAssessment: validateText(record["qc_assessment"] ?? record["qcAssessment"], "qc_assessment"),
    qcDecision: validateText(record["qc_decision"] ?? record["qcDecision"], "qc_decision"),
    requirements: validateText(record["requirements"], "requirements"),
  };
}

function validateText(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new QcInputValidationError(`${field} must be a non-empty string`);
  }
  return value.trim();
}

export class QcInputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QcInputValidationError";
  }
}
