import { randomUUID } from "crypto";
import { AccessDenied, DimensionMismatch, NotFoundError, ValidationError } from "../lib/errors.js";
import { matchesFilter, type KnowledgeStore, type StoreFactory } from "./knowledgeStore.js";
import type {
  Answer,
  Attachment,
  GeneratedQuestion,
  Identity,
  Lesson,
  LessonMatch,
  SourceTable,
  UserQuery,
} from "./types.js";
import { cosineDistance } from "./vector.js";

interface EmbeddingRow {
  id: string;
  sourceTable: SourceTable;
  sourceId: string;
  embedding: number[];
  metadata: Record<string, unknown>;
  lessonId: string | null;
  queryId: string | null;
  generatedQuestionId: string | null;
  createdAt: string;
}

interface Tables {
  lessons: Map<string, Lesson>;
  attachments: Map<string, Attachment>;
  userQueries: Map<string, UserQuery>;
  generatedQuestions: Map<string, GeneratedQuestion>;
  answers: Map<string, Answer>;
  embeddings: Map<string, EmbeddingRow>;
  objects: Map<string, { bytes: Uint8Array; contentType: string }>;
}

export interface MemoryDatabase {
  readonly dimension: number;
  storeFor: StoreFactory;
  /** Row counts per table, for diagnostics and tests. */
  counts(): Record<keyof Tables, number>;
}

function now(): string {
  return new Date().toISOString();
}

/** Owner policy of the lessons table: `owner_id = auth.uid()`, bypassed by the service role. */
function canAccessLesson(identity: Identity, ownerId: string | null): boolean {
  if (identity.kind === "service") return true;
  if (identity.kind === "anonymous") return false;
  return ownerId !== null && ownerId === identity.userId;
}

/**
 * In-process store with the same contract as the Supabase backend: exact linear cosine scan,
 * the owner policy on lessons and the schema's foreign-key rules.
 */
export function createMemoryDatabase(options: { dimension: number }): MemoryDatabase {
  const { dimension } = options;
  const tables: Tables = {
    lessons: new Map(),
    attachments: new Map(),
    userQueries: new Map(),
    generatedQuestions: new Map(),
    answers: new Map(),
    embeddings: new Map(),
    objects: new Map(),
  };

  function checkVector(vector: number[]): void {
    if (vector.length !== dimension) throw new DimensionMismatch(dimension, vector.length);
    if (vector.some((x) => !Number.isFinite(x))) throw new ValidationError("Vector contains non-finite values");
  }

  function visibleLesson(identity: Identity, id: string): Lesson | undefined {
    const lesson = tables.lessons.get(id);
    return lesson && canAccessLesson(identity, lesson.ownerId) ? lesson : undefined;
  }

  /** Hidden rows and missing rows differ here only in the error raised. */
  function writableLesson(identity: Identity, id: string): Lesson {
    const lesson = tables.lessons.get(id);
    if (!lesson) throw new NotFoundError(`Lesson ${id} not found`);
    if (!canAccessLesson(identity, lesson.ownerId)) throw new AccessDenied(`Lesson ${id} belongs to another user`);
    return lesson;
  }

  function checkRef(table: Map<string, unknown>, id: string | null | undefined, label: string): void {
    if (id != null && !table.has(id)) throw new ValidationError(`Referenced ${label} ${id} does not exist`);
  }

  function cascadeLessonDelete(id: string): void {
    for (const [key, row] of tables.embeddings) {
      if (row.lessonId === id) tables.embeddings.delete(key);
    }
    for (const attachment of tables.attachments.values()) {
      if (attachment.lessonId === id) attachment.lessonId = null;
    }
    for (const question of tables.generatedQuestions.values()) {
      if (question.lessonId === id) question.lessonId = null;
    }
  }

  function storeFor(identity: Identity): KnowledgeStore {
    const userId = identity.kind === "user" ? identity.userId : null;

    return {
      backend: "memory",
      identity,
      dimension,

      async listLessons(filter = {}) {
        const skip = Math.max(0, filter.skip ?? 0);
        const limit = filter.limit ?? Number.POSITIVE_INFINITY;
        return [...tables.lessons.values()]
          .filter((l) => canAccessLesson(identity, l.ownerId))
          .filter((l) => matchesFilter(l.subject, filter.subject) && matchesFilter(l.level, filter.level))
          .slice(skip, skip + limit)
          .map((l) => ({ ...l }));
      },

      async getLesson(id) {
        const lesson = visibleLesson(identity, id);
        return lesson ? { ...lesson } : null;
      },

      async insertLesson(input) {
        if (!canAccessLesson(identity, input.ownerId)) {
          throw new AccessDenied("Lessons can only be created for the authenticated owner");
        }
        const lesson: Lesson = {
          id: randomUUID(),
          ownerId: input.ownerId,
          title: input.title ?? input.topic,
          topic: input.topic,
          subject: input.subject ?? null,
          level: input.level ?? null,
          content: input.content,
          visibility: input.visibility ?? "private",
          createdAt: now(),
        };
        tables.lessons.set(lesson.id, lesson);
        return { ...lesson };
      },

      async updateLesson(id, patch) {
        const lesson = writableLesson(identity, id);
        const updated: Lesson = { ...lesson };
        if (patch.title !== undefined) updated.title = patch.title;
        if (patch.topic !== undefined) updated.topic = patch.topic;
        if (patch.subject !== undefined) updated.subject = patch.subject;
        if (patch.level !== undefined) updated.level = patch.level;
        if (patch.content !== undefined) updated.content = patch.content;
        if (patch.visibility !== undefined) updated.visibility = patch.visibility;
        tables.lessons.set(id, updated);
        return { ...updated };
      },

      async deleteLesson(id) {
        writableLesson(identity, id);
        tables.lessons.delete(id);
        cascadeLessonDelete(id);
      },

      async insertEmbedding(input) {
        checkVector(input.embedding);
        const row: EmbeddingRow = {
          id: randomUUID(),
          sourceTable: input.sourceTable,
          sourceId: input.sourceId,
          embedding: [...input.embedding],
          metadata: input.metadata ?? {},
          lessonId: null,
          queryId: null,
          generatedQuestionId: null,
          createdAt: now(),
        };
        if (input.sourceTable === "lessons") {
          if (!tables.lessons.has(input.sourceId)) throw new ValidationError(`No lesson ${input.sourceId} to embed`);
          row.lessonId = input.sourceId;
        } else if (input.sourceTable === "user_queries") {
          if (!tables.userQueries.has(input.sourceId)) throw new ValidationError(`No user query ${input.sourceId} to embed`);
          row.queryId = input.sourceId;
        } else {
          if (!tables.generatedQuestions.has(input.sourceId)) {
            throw new ValidationError(`No generated question ${input.sourceId} to embed`);
          }
          row.generatedQuestionId = input.sourceId;
        }
        tables.embeddings.set(row.id, row);
        return row.id;
      },

      async deleteEmbeddings(sourceTable, sourceId, keepId) {
        let removed = 0;
        for (const [key, row] of tables.embeddings) {
          if (row.sourceTable === sourceTable && row.sourceId === sourceId && row.id !== keepId) {
            tables.embeddings.delete(key);
            removed++;
          }
        }
        return removed;
      },

      async matchLessons(vector, count) {
        checkVector(vector);
        if (count <= 0) return [];
        const matches: LessonMatch[] = [];
        for (const row of tables.embeddings.values()) {
          if (row.sourceTable !== "lessons") continue;
          const lesson = visibleLesson(identity, row.sourceId);
          if (!lesson) continue;
          matches.push({ lesson: { ...lesson }, distance: cosineDistance(vector, row.embedding) });
        }
        matches.sort((a, b) => a.distance - b.distance);
        return matches.slice(0, count);
      },

      async putObject(bucket, path, bytes, contentType) {
        const key = `${bucket}/${path}`;
        if (tables.objects.has(key)) throw new ValidationError(`Object ${key} already exists`);
        tables.objects.set(key, { bytes: Uint8Array.from(bytes), contentType });
        return { bucket, path, signedUrl: `memory://${key}` };
      },

      async insertAttachment(input) {
        checkRef(tables.lessons, input.lessonId, "lesson");
        checkRef(tables.userQueries, input.queryId, "user query");
        const attachment: Attachment = {
          id: randomUUID(),
          ownerId: input.ownerId,
          bucket: input.bucket,
          path: input.path,
          publicUrl: input.publicUrl,
          metadata: input.metadata ?? {},
          lessonId: input.lessonId ?? null,
          queryId: input.queryId ?? null,
          createdAt: now(),
        };
        tables.attachments.set(attachment.id, attachment);
        return { ...attachment };
      },

      async updateAttachment(id, patch) {
        const attachment = tables.attachments.get(id);
        if (!attachment) throw new NotFoundError(`Attachment ${id} not found`);
        checkRef(tables.lessons, patch.lessonId, "lesson");
        checkRef(tables.userQueries, patch.queryId, "user query");
        const updated: Attachment = { ...attachment };
        if (patch.metadata !== undefined) updated.metadata = patch.metadata;
        if (patch.lessonId !== undefined) updated.lessonId = patch.lessonId;
        if (patch.queryId !== undefined) updated.queryId = patch.queryId;
        if (patch.publicUrl !== undefined) updated.publicUrl = patch.publicUrl;
        tables.attachments.set(id, updated);
        return { ...updated };
      },

      async insertUserQuery(input) {
        const query: UserQuery = {
          id: randomUUID(),
          userId: input.userId ?? userId,
          textQuery: input.textQuery,
          imageAttachmentIds: [...(input.imageAttachmentIds ?? [])],
          createdAt: now(),
        };
        tables.userQueries.set(query.id, query);
        return { ...query, imageAttachmentIds: [...query.imageAttachmentIds] };
      },

      async insertGeneratedQuestion(input) {
        checkRef(tables.lessons, input.lessonId, "lesson");
        checkRef(tables.userQueries, input.queryId, "user query");
        const question: GeneratedQuestion = {
          id: randomUUID(),
          lessonId: input.lessonId ?? null,
          queryId: input.queryId ?? null,
          authorModel: input.authorModel ?? "",
          questionText: input.questionText,
          createdAt: now(),
        };
        tables.generatedQuestions.set(question.id, question);
        return { ...question };
      },

      async insertAnswer(input) {
        checkRef(tables.generatedQuestions, input.questionId, "generated question");
        const answer: Answer = {
          id: randomUUID(),
          questionId: input.questionId ?? null,
          userId: input.userId,
          userAnswer: input.userAnswer,
          modelAnswer: input.modelAnswer ?? null,
          grade: input.grade ?? null,
          feedback: input.feedback ?? null,
          createdAt: now(),
        };
        tables.answers.set(answer.id, answer);
        return { ...answer };
      },
    };
  }

  return {
    dimension,
    storeFor,
    counts() {
      return {
        lessons: tables.lessons.size,
        attachments: tables.attachments.size,
        userQueries: tables.userQueries.size,
        generatedQuestions: tables.generatedQuestions.size,
        answers: tables.answers.size,
        embeddings: tables.embeddings.size,
        objects: tables.objects.size,
      };
    },
  };
}
