import path from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "../config/logger.js";
import { loadPromptTemplate } from "../judges/judgeLoader.js";
import type { TextGenerator } from "../llm/types.js";
import { renderTemplate } from "../pipeline/promptTemplate.js";

const IMPROVE_PROMPT_PATH = path.join(path.dirname(fileURLToPath(import.meta.url)), "IMPROVE.md");

/**
 * Rewrites content from a judge's feedback. `null` means no usable content
 * was produced; implementations may also throw.
 */
export interface ContentImprover {
  improve(content: string, feedback: string): Promise<string | null>;
}

export interface LlmContentImproverOptions {
  readonly model?: string;
  readonly template?: string;
}

let cachedTemplate: string | null = null;

function loadImproveTemplate(): string {
  if (!cachedTemplate) {
    cachedTemplate = loadPromptTemplate(IMPROVE_PROMPT_PATH);
  }
  return cachedTemplate;
}

export function buildImprovementPrompt(content: string, feedback: string, template?: string): string {
  const rendered = renderTemplate(template ?? loadImproveTemplate(), {
    source: { content, feedback },
    previousExplanation: null,
  });
  if (!rendered.ok) {
    throw new Error(`Improvement template references unknown fields: ${rendered.missing.join(", ")}`);
  }
  return rendered.text.trim();
}

export function createLlmContentImprover(
  generator: TextGenerator,
  options: LlmContentImproverOptions = {},
): ContentImprover {
  return {
    async improve(content: string, feedback: string): Promise<string | null> {
      const prompt = buildImprovementPrompt(content, feedback, options.template);

      try {
        const text = await generator.generate({ prompt, model: options.model });
        const improved = text.trim();
        if (improved.length === 0) {
          logger.warn("Improvement returned empty content");
          return null;
        }
        return improved;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ error: message }, "Error generating improved content");
        return null;
      }
    },
  };
}
