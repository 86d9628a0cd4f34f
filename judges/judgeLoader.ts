import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { logger } from "../config/logger.js";
import { JudgeUnit } from "../pipeline/judgeUnit.js";
import { JudgeDefinitionError, validateJudgeDefinition } from "./judge.schema.js";
import type { JudgeDefinition } from "./judge.schema.js";

const JUDGES_DIR = path.dirname(fileURLToPath(import.meta.url));
const DEFINITION_FILENAME = "judge.yaml";
const PROMPT_FILENAME = "PROMPT.md";

const cachedJudges = new Map<string, JudgeUnit>();

export function loadJudgeDefinition(judgeDir: string, baseDir: string = JUDGES_DIR): JudgeDefinition {
  const definitionPath = path.resolve(baseDir, judgeDir, DEFINITION_FILENAME);

  if (!fs.existsSync(definitionPath)) {
    throw new JudgeDefinitionError(`Judge definition not found for "${judgeDir}" at ${definitionPath}`);
  }

  const raw = fs.readFileSync(definitionPath, "utf-8");
  const parsed: unknown = parseYaml(raw);

  try {
    return validateJudgeDefinition(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new JudgeDefinitionError(`${definitionPath}: ${message}`);
  }
}

export function loadPromptTemplate(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new JudgeDefinitionError(`Prompt template not found at ${filePath}`);
  }

  const template = fs.readFileSync(filePath, "utf-8");
  if (template.trim().length === 0) {
    throw new JudgeDefinitionError(`Prompt template at ${filePath} is empty`);
  }
  return template;
}

/**
 * Builds a {@link JudgeUnit} from `<judgeDir>/judge.yaml` and
 * `<judgeDir>/PROMPT.md`. Units are immutable, so the built-in catalogue is
 * read once per process.
 */
export function loadJudge(judgeDir: string, baseDir: string = JUDGES_DIR): JudgeUnit {
  const cacheKey = path.resolve(baseDir, judgeDir);
  const cached = cachedJudges.get(cacheKey);
  if (cached) return cached;

  const definition = loadJudgeDefinition(judgeDir, baseDir);
  const prompt = loadPromptTemplate(path.join(cacheKey, PROMPT_FILENAME));

  const unit = new JudgeUnit({
    name: definition.name,
    labels: definition.labels,
    prompt,
    explanation: definition.explanation,
    model: definition.model,
    retries: definition.retries,
  });

  logger.debug(
    { judge: unit.name, labels: unit.labels, sourceFields: unit.references.sourceFields },
    "Judge loaded",
  );

  cachedJudges.set(cacheKey, unit);
  return unit;
}
