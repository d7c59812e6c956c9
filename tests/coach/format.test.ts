import { describe, expect, it } from "vitest";
import { formatRetrievedSection, parseEvaluation, postprocessMathMarkdown } from "../../src/coach/format.js";
import { makeLesson } from "../helpers.js";

describe("formatRetrievedSection", () => {
  it("says so when nothing was retrieved", () => {
    expect(formatRetrievedSection([])).toBe("Retrieved documents: none available.");
  });

  it("lists id, topic, subject, similarity and truncated content", () => {
    const item = { lesson: makeLesson({ id: "L1", content: "abcdef" }), distance: 1, similarity: 0.5 };
    expect(formatRetrievedSection([item], { maxChars: 3 })).toBe(
      "Retrieved documents:\nID: L1\nTopic: Forces\nSubject: Physics\nSimilarity: 0.5000\nabc\n---"
    );
  });

  it("can leave the subject out", () => {
    const item = { lesson: makeLesson({ id: "L2", content: "xy" }), distance: 0, similarity: 1 };
    expect(formatRetrievedSection([item], { withSubject: false })).toBe(
      "Retrieved documents:\nID: L2\nTopic: Forces\nSimilarity: 1.0000\nxy\n---"
    );
  });
});

describe("postprocessMathMarkdown", () => {
  it("turns bracketed math into a display block", () => {
    expect(postprocessMathMarkdown("The law is [ F = ma ] here")).toBe("The law is \n\n$$\nF = ma\n$$\n\n here");
  });

  it("leaves brackets without math alone", () => {
    expect(postprocessMathMarkdown("See [notes] above")).toBe("See [notes] above");
  });

  it("turns short parenthesized math into inline math", () => {
    expect(postprocessMathMarkdown("where ( x = 5 ) holds")).toBe("where $x = 5$ holds");
    expect(postprocessMathMarkdown("the side ( c ) is")).toBe("the side $c$ is");
  });

  it("leaves prose in parentheses alone", () => {
    expect(postprocessMathMarkdown("as shown (see above)")).toBe("as shown (see above)");
  });
});

describe("parseEvaluation", () => {
  it("reads score, multi-line feedback, model answer and citations", () => {
    const text = [
      "Score: 7/10",
      "Feedback: Good use of the second law.",
      "It misses units.",
      "Model answer (grounded): Force equals mass times acceleration.",
      "Citations: abc, def",
    ].join("\n");
    expect(parseEvaluation(text)).toEqual({
      score: 7,
      feedback: "Good use of the second law.\nIt misses units.",
      modelAnswer: "Force equals mass times acceleration.",
      citations: ["abc", "def"],
      insufficientMaterial: false,
    });
  });

  it("treats 'none' as no citations", () => {
    expect(parseEvaluation("Score: 3/10\nCitations: none").citations).toEqual([]);
  });

  it("drops scores outside 0-10", () => {
    expect(parseEvaluation("Score: 12/10").score).toBeNull();
  });

  it("flags insufficient material", () => {
    const result = parseEvaluation("INSUFFICIENT_MATERIAL_TO_GRADE");
    expect(result.insufficientMaterial).toBe(true);
    expect(result.score).toBeNull();
    expect(result.feedback).toBeNull();
  });
});
