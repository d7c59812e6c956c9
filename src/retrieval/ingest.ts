import { embedOne, type EmbeddingClient } from "../llm/embedding.js";
import { createLogger } from "../lib/log.js";
import type { KnowledgeStore } from "../storage/knowledgeStore.js";
import type { Lesson, LessonPatch, NewLesson, SourceTable } from "../storage/types.js";

const log = createLogger("ingest");

export interface Ingestor {
  /** Replace the embedding of one source row with a fresh one computed from `text`. */
  indexSource(sourceTable: SourceTable, sourceId: string, text: string, metadata?: Record<string, unknown>): Promise<string>;
  indexLesson(lesson: Lesson): Promise<string>;
  removeSource(sourceTable: SourceTable, sourceId: string): Promise<number>;
  /** Insert and index a lesson; the lesson is removed again if indexing fails. */
  createLesson(input: NewLesson): Promise<Lesson>;
  updateLesson(id: string, patch: LessonPatch): Promise<Lesson>;
  deleteLesson(id: string): Promise<void>;
}

export interface IngestorDeps {
  embedder: EmbeddingClient;
  store: KnowledgeStore;
  /** Handle used for embedding rows; defaults to `store`. */
  embeddingStore?: KnowledgeStore;
}

export function lessonMetadata(lesson: Lesson): Record<string, unknown> {
  return { topic: lesson.topic, subject: lesson.subject, owner_id: lesson.ownerId };
}

function previousFields(before: Lesson, patch: LessonPatch): LessonPatch {
  const restore: LessonPatch = {};
  if (patch.title !== undefined) restore.title = before.title;
  if (patch.topic !== undefined) restore.topic = before.topic;
  if (patch.subject !== undefined) restore.subject = before.subject;
  if (patch.level !== undefined) restore.level = before.level;
  if (patch.content !== undefined) restore.content = before.content;
  if (patch.visibility !== undefined) restore.visibility = before.visibility;
  return restore;
}

export function createIngestor(deps: IngestorDeps): Ingestor {
  const { embedder, store } = deps;
  const vectors = deps.embeddingStore ?? store;

  async function indexSource(
    sourceTable: SourceTable,
    sourceId: string,
    text: string,
    metadata: Record<string, unknown> = {}
  ): Promise<string> {
    const embedding = await embedOne(embedder, text, "search_document", vectors.dimension);
    return replaceEmbedding(sourceTable, sourceId, embedding, metadata);
  }

  /** Inserts the new row, then drops the source's older rows. */
  async function replaceEmbedding(
    sourceTable: SourceTable,
    sourceId: string,
    embedding: number[],
    metadata: Record<string, unknown>
  ): Promise<string> {
    const id = await vectors.insertEmbedding({ sourceTable, sourceId, embedding, metadata });
    await vectors.deleteEmbeddings(sourceTable, sourceId, id);
    return id;
  }

  async function indexLesson(lesson: Lesson): Promise<string> {
    const text = lesson.content ?? lesson.topic ?? "";
    return indexSource("lessons", lesson.id, text, lessonMetadata(lesson));
  }

  return {
    indexSource,
    indexLesson,

    removeSource(sourceTable, sourceId) {
      return vectors.deleteEmbeddings(sourceTable, sourceId);
    },

    async createLesson(input) {
      const lesson = await store.insertLesson(input);
      try {
        await indexLesson(lesson);
      } catch (err) {
        log.warn(`indexing lesson ${lesson.id} failed, removing it`);
        try {
          await store.deleteLesson(lesson.id);
        } catch (cleanupErr) {
          log.error(`removing unindexed lesson ${lesson.id} failed`, cleanupErr);
        }
        throw err;
      }
      log.info(`lesson ${lesson.id} created and indexed`);
      return lesson;
    },

    async updateLesson(id, patch) {
      const before = await store.getLesson(id);
      const { content } = patch;
      // hidden or missing lessons fail in the store with the matching error
      if (!before || content === undefined || content === before.content) return store.updateLesson(id, patch);

      // embedded before the write, so a provider failure leaves the lesson untouched
      const embedding = await embedOne(embedder, content ?? patch.topic ?? before.topic ?? "", "search_document", vectors.dimension);
      const lesson = await store.updateLesson(id, patch);
      try {
        await replaceEmbedding("lessons", lesson.id, embedding, lessonMetadata(lesson));
      } catch (err) {
        log.warn(`re-indexing lesson ${id} failed, restoring its previous fields`);
        try {
          await store.updateLesson(id, previousFields(before, patch));
        } catch (restoreErr) {
          log.error(`restoring lesson ${id} failed`, restoreErr);
        }
        throw err;
      }
      return lesson;
    },

    async deleteLesson(id) {
      await store.deleteLesson(id);
      // the foreign key already cascades; this clears rows written without it
      await vectors.deleteEmbeddings("lessons", id);
    },
  };
}
