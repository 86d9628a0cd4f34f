export interface JudgeDefinition {
  readonly name: string;
  readonly labels: readonly string[];
  readonly explanation: boolean;
  readonly model?: string;
  readonly retries?: number;
}

const JUDGE_NAME_REGEX = /^[A-Za-z][A-Za-z0-9_-]*$/;
const LABEL_REGEX = /^[a-z][a-z0-9_-]*$/;
const MAX_RETRIES = 5;

export function validateJudgeDefinition(raw: unknown): JudgeDefinition {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new JudgeDefinitionError("Judge definition must be a non-null object");
  }

  const record = raw as Record<string, unknown>;

  const name = validateName(record["name"]);
  const labels = validateLabels(record["labels"] ?? record["categories"]);
  const explanation = validateExplanation(record["explanation"]);
  const model = validateModel(record["model"]);
  const retries = validateRetries(record["retries"]);

  return { name, labels, explanation, model, retries };
}

function validateName(value: unknown): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new JudgeDefinitionError("name must be a non-empty string");
  }

  const name = value.trim();
  if (!JUDGE_NAME_REGEX.test(name)) {
    throw new JudgeDefinitionError(
      `name must start with a letter and contain only letters, digits, "_" or "-": "${name}"`,
    );
  }
  return name;
}

function validateLabels(value: unknown): readonly string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new JudgeDefinitionError("labels must be a non-empty list");
  }

  const labels: string[] = [];
  for (const [index, item] of value.entries()) {
    if (typeof item !== "string" || !LABEL_REGEX.test(item.trim().toLowerCase())) {
      throw new JudgeDefinitionError(
        `labels[${String(index)}] must be a lowercase word. Got: "${String(item)}"`,
      );
    }
    const label = item.trim().toLowerCase();
    if (labels.includes(label)) {
      throw new JudgeDefinitionError(`labels contains "${label}" more than once`);
    }
    labels.push(label);
  }
  return labels;
}

function validateExplanation(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value !== "boolean") {
    throw new JudgeDefinitionError(`explanation must be a boolean. Got: "${String(value)}"`);
  }
  return value;
}

function validateModel(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new JudgeDefinitionError(`model must be a non-empty string. Got: "${String(value)}"`);
  }
  return value.trim();
}

function validateRetries(value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isInteger(num) || num < 0 || num > MAX_RETRIES) {
    throw new JudgeDefinitionError(
      `retries must be an integer between 0 and ${String(MAX_RETRIES)}. Got: "${String(value)}"`,
    );
  }
  return num;
}

export class JudgeDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JudgeDefinitionError";
  }
}
