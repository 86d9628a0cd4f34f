export type ParsedJudgeOutput =
  | { readonly ok: true; readonly label: string; readonly explanation: string }
  | {
      readonly ok: false;
      readonly kind: "invalid_label" | "invalid_output";
      readonly reason: string;
    };

const PREVIEW_CHARS = 100;

export function matchLabel(candidate: string, labels: readonly string[]): string | null {
  const normalized = candidate.trim().toLowerCase();
  return labels.find((label) => label.toLowerCase() === normalized) ?? null;
}

/**
 * Reads `{"explanation": "...", "choice": "..."}` out of raw model text. The
 * object may be wrapped in prose or a code fence. A unit without explanation
 * may also answer with the bare label.
 */
export function parseJudgeOutput(
  text: string,
  labels: readonly string[],
  producesExplanation: boolean,
): ParsedJudgeOutput {
  const trimmed = text.trim();

  if (!producesExplanation) {
    const bare = matchLabel(trimmed, labels);
    if (bare) return { ok: true, label: bare, explanation: "" };
  }

  const record = extractJsonObject(trimmed);
  if (!record) {
    return {
      ok: false,
      kind: "invalid_output",
      reason: `Judge response is not a JSON object: ${trimmed.slice(0, PREVIEW_CHARS)}`,
    };
  }

  const choice = record["choice"];
  if (typeof choice !== "string") {
    return {
      ok: false,
      kind: "invalid_output",
      reason: `Judge response "choice" must be a string, got: ${typeof choice}`,
    };
  }

  const label = matchLabel(choice, labels);
  if (!label) {
    return {
      ok: false,
      kind: "invalid_label",
      reason: `"${choice}" is not one of: ${labels.join(", ")}`,
    };
  }

  if (!producesExplanation) {
    return { ok: true, label, explanation: "" };
  }

  const explanation = record["explanation"];
  if (typeof explanation !== "string" || explanation.trim().length === 0) {
    return {
      ok: false,
      kind: "invalid_output",
      reason: "Judge response \"explanation\" must be a non-empty string",
    };
  }

  return { ok: true, label, explanation: explanation.trim() };
}

function extractJsonObject(text: string): Record<string, unknown> | null {
  const jsonStart = text.indexOf("{");
  const jsonEnd = text.lastIndexOf("}");
  if (jsonStart === -1 || jsonEnd <= jsonStart) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(jsonStart, jsonEnd + 1));
  } catch {
    return null;
  }

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return null;
  return parsed as Record<string, unknown>;
}
