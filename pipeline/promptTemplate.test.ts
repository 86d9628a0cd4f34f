import { describe, it, expect } from "vitest";
import { parseTemplateReferences, renderTemplate } from "./promptTemplate.js";

describe("parseTemplateReferences", () => {
  it("should collect source fields once and detect the previous explanation", () => {
    const refs = parseTemplateReferences(
      "A: {source.content}\nB: {source.qc_assessment}\nC: {source.content}\nD: {previous.explanation}",
    );

    expect(refs.sourceFields).toEqual(["content", "qc_assessment"]);
    expect(refs.usesPreviousExplanation).toBe(true);
  });

  it("should ignore braces that are not placeholders", () => {
    const refs = parseTemplateReferences('Answer as {"choice": "x"} about {source.topic}');

    expect(refs.sourceFields).toEqual(["topic"]);
    expect(refs.usesPreviousExplanation).toBe(false);
  });
});

describe("renderTemplate", () => {
  it("should substitute source fields and the previous explanation", () => {
    const result = renderTemplate("Content: {source.content}\nPrior: {previous.explanation}", {
      source: { content: "Plants make food." },
      previousExplanation: "Missing oxygen.",
    });

    expect(result).toEqual({ ok: true, text: "Content: Plants make food.\nPrior: Missing oxygen." });
  });

  it("should leave JSON examples untouched", () => {
    const result = renderTemplate('Reply {"choice": "pass"} for {source.content}', {
      source: { content: "x" },
      previousExplanation: null,
    });

    expect(result).toEqual({ ok: true, text: 'Reply {"choice": "pass"} for x' });
  });

  it("should report every missing reference", () => {
    const result = renderTemplate("{source.content} {source.requirements} {previous.explanation}", {
      source: { content: "x" },
      previousExplanation: null,
    });

    expect(result).toEqual({ ok: false, missing: ["source.requirements", "previous.explanation"] });
  });

  it("should not resolve inherited object properties as fields", () => {
    const result = renderTemplate("{source.constructor}", { source: {}, previousExplanation: null });

    expect(result).toEqual({ ok: false, missing: ["source.constructor"] });
  });

  it("should accept an empty string as a present value", () => {
    const result = renderTemplate("[{source.notes}]", { source: { notes: "" }, previousExplanation: null });

    expect(result).toEqual({ ok: true, text: "[]" });
  });
});
