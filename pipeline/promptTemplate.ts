import type { StageContext } from "./types.js";

const PLACEHOLDER_REGEX = /\{(source\.([A-Za-z_][A-Za-z0-9_]*)|previous\.explanation)\}/g;
const PREVIOUS_EXPLANATION = "previous.explanation";

export interface TemplateReferences {
  readonly sourceFields: readonly string[];
  readonly usesPreviousExplanation: boolean;
}

export type RenderResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly missing: readonly string[] };

export function parseTemplateReferences(template: string): TemplateReferences {
  const sourceFields = new Set<string>();
  let usesPreviousExplanation = false;

  for (const match of template.matchAll(PLACEHOLDER_REGEX)) {
    if (match[1] === PREVIOUS_EXPLANATION) {
      usesPreviousExplanation = true;
    } else if (match[2]) {
      sourceFields.add(match[2]);
    }
  }

  return { sourceFields: [...sourceFields], usesPreviousExplanation };
}

/**
 * Substitutes `{source.<field>}` and `{previous.explanation}`. Any other brace
 * text (JSON examples in a prompt, for instance) is left as written.
 */
export function renderTemplate(template: string, context: StageContext): RenderResult {
  const missing: string[] = [];

  const text = template.replace(PLACEHOLDER_REGEX, (placeholder, ref: string, field?: string) => {
    if (ref === PREVIOUS_EXPLANATION) {
      if (context.previousExplanation === null) {
        missing.push(PREVIOUS_EXPLANATION);
        return placeholder;
      }
      return context.previousExplanation;
    }

    if (field === undefined || !Object.hasOwn(context.source, field)) {
      missing.push(ref);
      return placeholder;
    }
    return context.source[field];
  });

  if (missing.length > 0) {
    return { ok: false, missing: [...new Set(missing)] };
  }
  return { ok: true, text };
}
