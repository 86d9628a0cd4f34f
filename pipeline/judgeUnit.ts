import { logger } from "../config/logger.js";
import type { GenerationRequest, TextGenerator } from "../llm/types.js";
import { GenerationTimeoutError, PipelineCompositionError } from "./errors.js";
import { parseJudgeOutput } from "./judgeOutputParser.js";
import { parseTemplateReferences, renderTemplate } from "./promptTemplate.js";
import type { RenderResult, TemplateReferences } from "./promptTemplate.js";
import type { StageContext, UnitFailure, UnitOutcome } from "./types.js";

export const CATEGORICAL_JUDGE_KIND = "CategoricalJudge";

export interface JudgeUnitOptions {
  readonly name: string;
  readonly labels: readonly string[];
  readonly prompt: string;
  /** Defaults to true. */
  readonly explanation?: boolean;
  readonly model?: string;
  /** Overrides the retry count of the run that executes this unit. */
  readonly retries?: number;
}

export interface EvaluationPolicy {
  readonly generator: TextGenerator;
  readonly retries: number;
  readonly timeoutMs: number;
  readonly logContext?: Readonly<Record<string, unknown>>;
}

const UNIT_NAME_REGEX = /^[A-Za-z][A-Za-z0-9_-]*$/;

export class JudgeUnit {
  readonly kind = CATEGORICAL_JUDGE_KIND;
  readonly name: string;
  readonly labels: readonly string[];
  readonly template: string;
  readonly producesExplanation: boolean;
  readonly model: string | undefined;
  readonly retries: number | undefined;
  readonly references: TemplateReferences;

  constructor(options: JudgeUnitOptions) {
    if (!UNIT_NAME_REGEX.test(options.name)) {
      throw new PipelineCompositionError(
        `Judge name must start with a letter and contain only letters, digits, "_" or "-": "${options.name}"`,
      );
    }
    validateLabels(options.name, options.labels);
    if (options.prompt.trim().length === 0) {
      throw new PipelineCompositionError(`Judge "${options.name}" has an empty prompt`);
    }
    if (options.retries !== undefined && (!Number.isInteger(options.retries) || options.retries < 0)) {
      throw new PipelineCompositionError(
        `Judge "${options.name}" retries must be a non-negative integer, got: ${String(options.retries)}`,
      );
    }

    this.name = options.name;
    this.labels = Object.freeze([...options.labels]);
    this.template = options.prompt;
    this.producesExplanation = options.explanation ?? true;
    this.model = options.model;
    this.retries = options.retries;
    this.references = parseTemplateReferences(options.prompt);
    Object.freeze(this);
  }

  buildPrompt(context: StageContext): RenderResult {
    const rendered = renderTemplate(this.template, context);
    if (!rendered.ok) return rendered;
    return { ok: true, text: `${rendered.text.trim()}\n\n${this.responseInstructions()}` };
  }

  async evaluate(context: StageContext, policy: EvaluationPolicy): Promise<UnitOutcome> {
    const rendered = this.buildPrompt(context);
    if (!rendered.ok) {
      const failure: UnitFailure = {
        status: "failure",
        kind: "missing_input",
        reason: `Unresolved prompt references: ${rendered.missing.join(", ")}`,
        attempts: 0,
      };
      logger.error({ ...policy.logContext, unit: this.name, missing: rendered.missing }, "Judge input missing");
      return failure;
    }

    const maxAttempts = (this.retries ?? policy.retries) + 1;
    let lastFailure: UnitFailure | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let text: string;
      try {
        text = await generateWithTimeout(
          policy.generator,
          { prompt: rendered.text, model: this.model },
          policy.timeoutMs,
        );
      } catch (error) {
        const timedOut = error instanceof GenerationTimeoutError;
        const message = error instanceof Error ? error.message : String(error);
        lastFailure = {
          status: "failure",
          kind: timedOut ? "timeout" : "generation",
          reason: message,
          attempts: attempt,
        };
        logger.warn(
          { ...policy.logContext, unit: this.name, attempt, maxAttempts, error: message },
          timedOut ? "Judge generation timed out" : "Judge generation failed",
        );
        continue;
      }

      const parsed = parseJudgeOutput(text, this.labels, this.producesExplanation);
      if (!parsed.ok) {
        logger.warn(
          { ...policy.logContext, unit: this.name, attempt, kind: parsed.kind, reason: parsed.reason },
          "Judge output rejected",
        );
        return { status: "failure", kind: parsed.kind, reason: parsed.reason, attempts: attempt };
      }

      return { status: "success", label: parsed.label, explanation: parsed.explanation, attempts: attempt };
    }

    return lastFailure ?? {
      status: "failure",
      kind: "generation",
      reason: "No generation attempt was made",
      attempts: 0,
    };
  }

  private responseInstructions(): string {
    const choices = this.labels.join(", ");
    if (!this.producesExplanation) {
      return [
        "Respond with a single JSON object and nothing else:",
        `{"choice": "<one of: ${choices}>"}`,
      ].join("\n");
    }
    return [
      "First explain your reasoning, then classify.",
      "Respond with a single JSON object and nothing else, with the explanation before the choice:",
      `{"explanation": "<your reasoning>", "choice": "<one of: ${choices}>"}`,
    ].join("\n");
  }
}

function validateLabels(name: string, labels: readonly string[]): void {
  if (labels.length === 0) {
    throw new PipelineCompositionError(`Judge "${name}" must declare at least one label`);
  }

  const seen = new Set<string>();
  for (const label of labels) {
    const normalized = label.trim().toLowerCase();
    if (normalized.length === 0 || normalized !== label.toLowerCase()) {
      throw new PipelineCompositionError(`Judge "${name}" has an invalid label: "${label}"`);
    }
    if (seen.has(normalized)) {
      throw new PipelineCompositionError(`Judge "${name}" declares label "${label}" twice`);
    }
    seen.add(normalized);
  }
}

async function generateWithTimeout(
  generator: TextGenerator,
  request: GenerationRequest,
  timeoutMs: number,
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Settle first so the race reports the timeout, not the aborted call.
      reject(new GenerationTimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      generator.generate({ ...request, signal: controller.signal }),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
