import type { StoreBackend } from "../lib/config.js";
import type {
  Answer,
  Attachment,
  AttachmentPatch,
  GeneratedQuestion,
  Identity,
  Lesson,
  LessonFilter,
  LessonMatch,
  LessonPatch,
  NewAnswer,
  NewAttachment,
  NewEmbedding,
  NewGeneratedQuestion,
  NewLesson,
  NewUserQuery,
  SourceTable,
  StoredObject,
  UserQuery,
} from "./types.js";

/**
 * Tables, object storage and the nearest-neighbour function, bound to one caller identity.
 * Lessons follow the owner policy: rows of other owners are invisible to select, and
 * insert/update/delete on them fail with AccessDenied (or NotFound when the backend cannot tell).
 */
export interface KnowledgeStore {
  readonly backend: StoreBackend;
  readonly identity: Identity;
  /** Length every stored and queried vector must have. */
  readonly dimension: number;

  listLessons(filter?: LessonFilter): Promise<Lesson[]>;
  getLesson(id: string): Promise<Lesson | null>;
  insertLesson(input: NewLesson): Promise<Lesson>;
  updateLesson(id: string, patch: LessonPatch): Promise<Lesson>;
  /** Deletes the lesson; its embeddings cascade, attachments and generated questions lose the link. */
  deleteLesson(id: string): Promise<void>;

  /** Fails with DimensionMismatch (and writes nothing) when the vector length is wrong. */
  insertEmbedding(input: NewEmbedding): Promise<string>;
  /** Deletes the source's embedding rows, except `keepId` when given. */
  deleteEmbeddings(sourceTable: SourceTable, sourceId: string, keepId?: string): Promise<number>;
  /** Up to `count` lessons ordered by ascending cosine distance to `vector`. */
  matchLessons(vector: number[], count: number): Promise<LessonMatch[]>;

  putObject(bucket: string, path: string, bytes: Uint8Array, contentType: string): Promise<StoredObject>;
  insertAttachment(input: NewAttachment): Promise<Attachment>;
  updateAttachment(id: string, patch: AttachmentPatch): Promise<Attachment>;

  insertUserQuery(input: NewUserQuery): Promise<UserQuery>;
  insertGeneratedQuestion(input: NewGeneratedQuestion): Promise<GeneratedQuestion>;
  insertAnswer(input: NewAnswer): Promise<Answer>;
}

export type StoreFactory = (identity: Identity) => KnowledgeStore;

/** Per-user storage bucket used for uploads made on a user's behalf. */
export function userBucket(ownerId: string): string {
  return `user-${ownerId.toLowerCase()}`;
}

/** Case-insensitive substring match, the API's `ilike '%value%'` filter. */
export function matchesFilter(value: string | null, filter: string | undefined): boolean {
  if (!filter) return true;
  return (value ?? "").toLowerCase().includes(filter.toLowerCase());
}
