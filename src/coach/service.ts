import { errorMessage, ValidationError } from "../lib/errors.js";
import { toDataUrl, type ImageInput } from "../lib/images.js";
import { createLogger } from "../lib/log.js";
import type { LLMClient, LLMContentPart } from "../llm/client.js";
import type { EmbeddingClient } from "../llm/embedding.js";
import { createIngestor } from "../retrieval/ingest.js";
import { createRetriever, type RetrievedLesson } from "../retrieval/retrieve.js";
import type { KnowledgeStore } from "../storage/knowledgeStore.js";
import { identityUserId } from "../storage/types.js";
import { uploadImage } from "./attachments.js";
import { formatRetrievedSection, parseEvaluation, postprocessMathMarkdown, type Evaluation } from "./format.js";
import {
  boostTerms,
  EXPLAIN_SYSTEM_PROMPT,
  explainPrompt,
  GRADER_SYSTEM_PROMPT,
  gradingPrompt,
  IMAGE_KIND_QUERIES,
  PRACTICE_SYSTEM_PROMPT,
  practicePrompt,
  type ImageKind,
} from "./prompts.js";

const log = createLogger("coach");

const PRACTICE_MAX_TOKENS = 256;
const PRACTICE_TEMPERATURE = 0.8;
const GRADING_MAX_TOKENS = 512;
const REFERENCE_MAX_CHARS = 600;
const MAX_BOOST_QUERIES = 3;
const MATH_SUBJECT_BOOST = 1.3;

export interface QueryInput {
  text?: string;
  image?: ImageInput;
  imageKind?: ImageKind;
}

export interface ProcessedQuery {
  /** Text actually used for retrieval and generation. */
  query: string;
  lessons: RetrievedLesson[];
}

export interface Explanation extends ProcessedQuery {
  answer: string;
  /** Stored user query, or null for anonymous callers or when storing failed. */
  queryId: string | null;
}

export interface PracticeQuestion {
  question: string;
  lessonId: string | null;
  questionId: string | null;
  lessons: RetrievedLesson[];
}

export interface AnswerInput {
  question: string;
  answer: string;
  reference?: string;
  questionId?: string | null;
}

export interface GradedAnswer extends Evaluation {
  evaluation: string;
  answerId: string | null;
  lessons: RetrievedLesson[];
}

export interface CoachService {
  findRelevant(query: string, k?: number): Promise<RetrievedLesson[]>;
  processQuery(input: QueryInput): Promise<ProcessedQuery>;
  explain(input: QueryInput): Promise<Explanation>;
  generatePracticeQuestion(topic: string): Promise<PracticeQuestion>;
  evaluateAnswer(input: AnswerInput): Promise<GradedAnswer>;
}

export interface CoachDeps {
  llm: LLMClient;
  embedder: EmbeddingClient;
  /** Store bound to the caller's identity. */
  store: KnowledgeStore;
  topK: number;
  /** Bucket for anonymous uploads. */
  defaultBucket: string;
}

function isMathSubject(item: RetrievedLesson): boolean {
  return (item.lesson.subject ?? "").toLowerCase().includes("math");
}

const bySimilarity = (a: RetrievedLesson, b: RetrievedLesson): number => b.similarity - a.similarity;

/**
 * Merge first-pass and boosted results: one entry per topic, math lessons lifted for math images.
 * Math and handwritten images keep at most `topK - 1` subject-relevant lessons (every lesson is
 * relevant to handwritten notes) and fill the rest with others; other kinds keep the best `topK`.
 */
export function rankBoosted(items: RetrievedLesson[], kind: ImageKind, topK: number): RetrievedLesson[] {
  const seen = new Set<string>();
  const unique: RetrievedLesson[] = [];
  for (const item of items) {
    const key = (item.lesson.topic ?? "").trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(
      kind === "math" && isMathSubject(item)
        ? { ...item, similarity: Math.min(item.similarity * MATH_SUBJECT_BOOST, 1) }
        : item
    );
  }

  if (kind !== "math" && kind !== "handwritten") return unique.sort(bySimilarity).slice(0, topK);

  const isRelevant = (item: RetrievedLesson): boolean => kind === "handwritten" || isMathSubject(item);
  const relevant = unique.filter(isRelevant).sort(bySimilarity);
  const other = unique.filter((item) => !isRelevant(item)).sort(bySimilarity);
  const relevantCount = Math.min(relevant.length, topK - 1);
  const otherCount = Math.min(other.length, topK - relevantCount);
  return [...relevant.slice(0, relevantCount), ...other.slice(0, otherCount)];
}

export function createCoachService(deps: CoachDeps): CoachService {
  const { llm, embedder, store, topK, defaultBucket } = deps;
  const userId = identityUserId(store.identity);
  const retriever = createRetriever({ embedder, store, defaultTopK: topK });
  const ingestor = createIngestor({ embedder, store });

  async function findRelevant(query: string, k = topK): Promise<RetrievedLesson[]> {
    const results = await retriever.retrieve(query, k);
    return userId ? results.filter((r) => r.lesson.ownerId === userId) : results;
  }

  async function boost(query: string, kind: ImageKind, lessons: RetrievedLesson[]): Promise<RetrievedLesson[]> {
    const subjects = (await store.listLessons())
      .map((l) => (l.subject ?? "").trim().toLowerCase())
      .filter((s) => s.length > 0);
    const terms = boostTerms(kind, subjects).slice(0, MAX_BOOST_QUERIES);
    if (terms.length === 0) return lessons;

    const merged = [...lessons];
    for (const term of terms) {
      merged.push(...(await findRelevant(`${query} ${term}`, topK)));
    }
    return rankBoosted(merged, kind, topK);
  }

  async function processQuery(input: QueryInput): Promise<ProcessedQuery> {
    const text = input.text?.trim() ?? "";
    if (!text && !input.image) throw new ValidationError("Provide a question, an image, or both");
    const kind = input.imageKind ?? "general";
    const query = text || IMAGE_KIND_QUERIES[kind];

    let lessons = await findRelevant(query, topK);
    const needsBoost =
      input.image !== undefined &&
      ((lessons.length < 2 && kind !== "general") || (lessons.length > 0 && lessons.length < topK));
    if (needsBoost) lessons = await boost(query, kind, lessons);
    return { query, lessons };
  }

  /** Best effort: a failure is logged and the query id comes back null. */
  async function storeUserQuery(text: string, image: ImageInput | undefined): Promise<string | null> {
    if (!userId) return null;
    try {
      const attachmentIds: string[] = [];
      if (image) {
        const attachment = await uploadImage(store, image, { ownerId: userId, defaultBucket });
        attachmentIds.push(attachment.id);
      }
      const stored = await store.insertUserQuery({ userId, textQuery: text, imageAttachmentIds: attachmentIds });

      for (const [index, id] of attachmentIds.entries()) {
        try {
          await store.updateAttachment(id, {
            queryId: stored.id,
            metadata: {
              source: "user_query",
              query_id: stored.id,
              user_id: userId,
              index,
              content_type: image?.contentType ?? null,
            },
          });
        } catch (err) {
          log.warn(`attachment ${id} not linked to query ${stored.id}: ${errorMessage(err)}`);
        }
      }

      await ingestor.indexSource("user_queries", stored.id, text, { source: "user_query" });
      return stored.id;
    } catch (err) {
      log.warn(`storing user query failed: ${errorMessage(err)}`);
      return null;
    }
  }

  return {
    findRelevant,
    processQuery,

    async explain(input) {
      const { query, lessons } = await processQuery(input);
      const section = formatRetrievedSection(lessons, { maxChars: Number.POSITIVE_INFINITY, withSubject: false });

      const content: LLMContentPart[] = [];
      if (input.image) content.push({ type: "image_url", url: toDataUrl(input.image) });
      content.push({ type: "text", text: explainPrompt(section, query) });

      const reply = await llm.complete([
        { role: "system", content: EXPLAIN_SYSTEM_PROMPT },
        { role: "user", content },
      ]);
      const queryId = await storeUserQuery(query, input.image);
      return { query, lessons, answer: postprocessMathMarkdown(reply), queryId };
    },

    async generatePracticeQuestion(topic) {
      const label = topic.trim();
      if (!label) throw new ValidationError("topic is required");

      const match = (await store.listLessons()).find(
        (l) =>
          (l.topic ?? "").trim().toLowerCase() === label.toLowerCase() && (!userId || l.ownerId === userId)
      );
      const lessons = await findRelevant(match?.content || label, topK);

      const reply = await llm.complete(
        [
          { role: "system", content: PRACTICE_SYSTEM_PROMPT },
          { role: "user", content: [{ type: "text", text: practicePrompt(formatRetrievedSection(lessons, { maxChars: 1200 }), label) }] },
        ],
        { maxTokens: PRACTICE_MAX_TOKENS, temperature: PRACTICE_TEMPERATURE }
      );
      const question = postprocessMathMarkdown(reply);

      let questionId: string | null = null;
      if (userId) {
        try {
          const stored = await store.insertGeneratedQuestion({
            lessonId: match?.id ?? null,
            queryId: null,
            authorModel: llm.model,
            questionText: question,
          });
          questionId = stored.id;
        } catch (err) {
          log.warn(`storing generated question failed: ${errorMessage(err)}`);
        }
      }
      return { question, lessonId: match?.id ?? null, questionId, lessons };
    },

    async evaluateAnswer(input) {
      const question = input.question.trim();
      const answer = input.answer.trim();
      if (!question || !answer) throw new ValidationError("question and answer are required");

      const lessons = await findRelevant(`Question: ${question}\nStudent answer: ${answer}`, topK);
      const reference = (input.reference ?? "").slice(0, REFERENCE_MAX_CHARS);

      const reply = await llm.complete(
        [
          { role: "system", content: GRADER_SYSTEM_PROMPT },
          {
            role: "user",
            content: [{ type: "text", text: gradingPrompt(formatRetrievedSection(lessons, { maxChars: 1400 }), question, answer, reference) }],
          },
        ],
        { maxTokens: GRADING_MAX_TOKENS }
      );
      const evaluation = postprocessMathMarkdown(reply);
      const parsed = parseEvaluation(evaluation);

      let answerId: string | null = null;
      if (userId) {
        try {
          const stored = await store.insertAnswer({
            questionId: input.questionId ?? null,
            userId,
            userAnswer: answer,
            modelAnswer: parsed.modelAnswer ?? evaluation,
            grade: parsed.score !== null ? `${parsed.score}/10` : null,
            feedback: parsed.feedback,
          });
          answerId = stored.id;
        } catch (err) {
          log.warn(`storing answer failed: ${errorMessage(err)}`);
        }
      }
      return { ...parsed, evaluation, answerId, lessons };
    },
  };
}
