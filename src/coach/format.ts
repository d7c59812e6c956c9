import type { RetrievedLesson } from "../retrieval/retrieve.js";

export interface RetrievedSectionOptions {
  /** Lesson content is cut to this many characters. */
  maxChars?: number;
  withSubject?: boolean;
}

export function formatRetrievedSection(items: RetrievedLesson[], options: RetrievedSectionOptions = {}): string {
  const { maxChars = 900, withSubject = true } = options;
  if (items.length === 0) return "Retrieved documents: none available.";

  const blocks = items.map(({ lesson, similarity }) => {
    const lines = [`ID: ${lesson.id}`, `Topic: ${lesson.topic ?? ""}`];
    if (withSubject) lines.push(`Subject: ${lesson.subject ?? ""}`);
    lines.push(`Similarity: ${similarity.toFixed(4)}`, (lesson.content ?? "").slice(0, maxChars), "---");
    return lines.join("\n");
  });
  return `Retrieved documents:\n${blocks.join("\n")}`;
}

const DISPLAY_MATH_TOKENS = ["=", "^", "\\sqrt", "\\frac", "+", "-", "*", "/", "\\", "_"];
const INLINE_MATH_TOKENS = ["=", "^", "\\", "_"];

/**
 * Rewrite the bracket notation models fall back to into Markdown math:
 * `[ a^2 + b^2 = c^2 ]` becomes a `$$` block and a short `( x = 5 )` becomes `$x = 5$`.
 */
export function postprocessMathMarkdown(text: string): string {
  if (!text) return text;

  const withDisplay = text.replace(/\[\s*([^\]]+?)\s*\]/g, (whole: string, group: string) => {
    const inner = group.trim();
    if (!inner || !DISPLAY_MATH_TOKENS.some((t) => inner.includes(t))) return whole;
    if (inner.startsWith("$$") && inner.endsWith("$$")) return whole;
    return `\n\n$$\n${inner}\n$$\n\n`;
  });

  return withDisplay.replace(/\(\s*([^)]+?)\s*\)/g, (whole: string, group: string) => {
    const inner = group.trim();
    if (!inner || inner.length > 40) return whole;
    if (!/^[A-Za-z0-9\s=+\-*/^_\\{}.]+$/.test(inner)) return whole;
    if (!INLINE_MATH_TOKENS.some((t) => inner.includes(t)) && !/^[A-Za-z]$/.test(inner)) return whole;
    return "$" + inner + "$";
  });
}

export interface Evaluation {
  /** Score out of 10, or null when the grader gave none. */
  score: number | null;
  feedback: string | null;
  modelAnswer: string | null;
  citations: string[];
  insufficientMaterial: boolean;
}

type Section = "score" | "feedback" | "modelAnswer" | "citations";

const SECTION_LABEL = /^\s*(score|feedback|model answer(?:\s*\(grounded\))?|citations)\s*:\s*(.*)$/i;

function sectionOf(label: string): Section {
  const l = label.toLowerCase();
  if (l === "score") return "score";
  if (l === "feedback") return "feedback";
  if (l === "citations") return "citations";
  return "modelAnswer";
}

/** Parse the grader's plain-text reply (`Score:`, `Feedback:`, `Model answer (grounded):`, `Citations:`). */
export function parseEvaluation(text: string): Evaluation {
  const sections: Partial<Record<Section, string[]>> = {};
  let current: Section | null = null;
  for (const line of text.split(/\r?\n/)) {
    const m = SECTION_LABEL.exec(line);
    if (m) {
      current = sectionOf(m[1]);
      sections[current] = [m[2]];
    } else if (current) {
      sections[current]?.push(line);
    }
  }
  const read = (s: Section): string | null => {
    const value = sections[s]?.join("\n").trim();
    return value ? value : null;
  };

  const scoreMatch = /(\d+(?:\.\d+)?)/.exec(read("score") ?? "");
  const score = scoreMatch ? Number(scoreMatch[1]) : null;
  const citationText = read("citations");
  const citations =
    citationText && !/^'?none'?\.?$/i.test(citationText)
      ? citationText
          .split(",")
          .map((c) => c.trim())
          .filter((c) => c.length > 0)
      : [];

  return {
    score: score !== null && score >= 0 && score <= 10 ? score : null,
    feedback: read("feedback"),
    modelAnswer: read("modelAnswer"),
    citations,
    insufficientMaterial: text.includes("INSUFFICIENT_MATERIAL_TO_GRADE"),
  };
}
