/**
 * Prompts for the coach flows. Every flow grounds the model in the retrieved lessons.
 */

export const IMAGE_KINDS = ["general", "math", "diagram", "handwritten"] as const;

export type ImageKind = (typeof IMAGE_KINDS)[number];

const MATH_FORMAT_RULE =
  "When writing math/science equations, format them in LaTeX. " +
  "Use $$ ... $$ for standalone centered equations and $ ... $ for inline math.";

export const EXPLAIN_SYSTEM_PROMPT =
  "You are an expert learning coach with advanced visual analysis capabilities. " +
  "Use the retrieved documents to ground answers and cite document IDs when relevant. " +
  MATH_FORMAT_RULE;

export const PRACTICE_SYSTEM_PROMPT =
  "You are a learning coach. You must ONLY use the retrieved documents as your source of truth. " +
  "Do not introduce concepts, facts, or terminology that are not present in the retrieved documents. " +
  "If the retrieved documents are insufficient to create a good question, say: INSUFFICIENT_MATERIAL. " +
  MATH_FORMAT_RULE;

export const GRADER_SYSTEM_PROMPT =
  "You are a strict grader. Grade ONLY against the retrieved documents. " +
  "Do not reward knowledge that is not present in the retrieved documents. " +
  "If the retrieved documents do not contain enough information to grade reliably, " +
  "say: INSUFFICIENT_MATERIAL_TO_GRADE. " +
  MATH_FORMAT_RULE;

/** Query used when an image arrives without any text. */
export const IMAGE_KIND_QUERIES: Record<ImageKind, string> = {
  general:
    "Please analyze this image and provide an explanation of any educational or academic content visible, " +
    "including text, diagrams, equations, or concepts from any subject area.",
  math:
    "This image contains mathematical equations and formulas. Carefully analyze the mathematical symbols, " +
    "variables, and relationships shown. Explain the mathematical concepts, solve any equations visible, and " +
    "provide step-by-step reasoning. Identify what branch of mathematics this relates to (algebra, geometry, " +
    "calculus, etc.) and explain the underlying principles.",
  diagram:
    "This image contains a diagram, chart, or visual representation. Analyze the visual elements, labels, " +
    "relationships, and data shown. Explain what concepts are being illustrated, how the visual elements " +
    "represent relationships, and what educational principles or processes are being demonstrated.",
  handwritten:
    "This image contains handwritten notes about educational concepts. Carefully examine the writing, symbols, " +
    "and content. Explain the concepts mentioned, any formulas or diagrams shown, and provide a clear educational " +
    "explanation of the subject matter covered in these notes. Determine the academic subject (mathematics, " +
    "science, etc.) and explain the key principles.",
};

export const SUBJECT_KEYWORDS: Record<string, string[]> = {
  mathematics: ["math", "algebra", "geometry", "calculus", "equation", "formula", "theorem", "proof"],
  physics: ["physics", "force", "mass", "acceleration", "velocity", "energy", "motion", "newton", "law"],
  biology: ["biology", "cell", "photosynthesis", "organism", "life", "dna", "protein", "evolution"],
  chemistry: ["chemistry", "atom", "molecule", "reaction", "acid", "base", "compound", "element"],
};

/**
 * Extra retrieval terms for image queries that found too little.
 * `subjects` are the lowercased subjects of the caller's lessons.
 */
export function boostTerms(kind: ImageKind, subjects: Iterable<string>): string[] {
  const known = [...new Set(subjects)].filter((s) => Object.hasOwn(SUBJECT_KEYWORDS, s)).sort();
  switch (kind) {
    case "math": {
      const terms = ["mathematics algebra geometry calculus equation formula"];
      if (known.includes("physics")) terms.push("physics mechanics kinematics");
      return terms;
    }
    case "handwritten":
      return known.map((s) => `${s} ${SUBJECT_KEYWORDS[s].slice(0, 5).join(" ")}`);
    case "diagram":
      return [
        "diagram chart graph visual representation illustration",
        ...known.map((s) => `${s} diagram ${SUBJECT_KEYWORDS[s].slice(0, 3).join(" ")}`),
      ];
    default:
      return [];
  }
}

export function explainPrompt(retrievedSection: string, query: string): string {
  return (
    `${retrievedSection}\n\n` +
    `Question: ${query}\n\n` +
    "Provide a clear, educational explanation that directly uses the retrieved documents."
  );
}

export function practicePrompt(retrievedSection: string, topic: string): string {
  return (
    `${retrievedSection}\n\n` +
    "Task: Create ONE practice question that can be answered using ONLY the retrieved documents.\n" +
    `Target topic label: ${topic}\n\n` +
    "Requirements:\n" +
    "- The question must be tightly grounded in the lesson wording and scope.\n" +
    "- Avoid broad/general textbook questions not covered in the documents.\n" +
    "- Provide only the question text (no explanation, no answer)."
  );
}

export function gradingPrompt(retrievedSection: string, question: string, answer: string, reference: string): string {
  return (
    `${retrievedSection}\n\n` +
    "Task: Evaluate the student's answer using ONLY the retrieved documents.\n" +
    `Question: ${question}\n` +
    `Student answer: ${answer}\n` +
    `Instructor reference (optional, may be incomplete): ${reference}\n\n` +
    "Output format (plain text):\n" +
    "Score: <0-10>/10\n" +
    "Feedback: <2-6 sentences>\n" +
    "Model answer (grounded): <1-5 sentences>\n" +
    "Citations: <comma-separated document IDs used, or 'none'>"
  );
}
