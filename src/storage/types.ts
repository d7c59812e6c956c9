/** Tables whose rows can own an embedding. */
export const SOURCE_TABLES = ["lessons", "user_queries", "generated_questions"] as const;

export type SourceTable = (typeof SOURCE_TABLES)[number];

/**
 * Who the store acts for. `user` is subject to the owner policy on lessons;
 * `service` bypasses row policies (server-side writes).
 */
export type Identity =
  | { kind: "anonymous" }
  | { kind: "user"; userId: string; accessToken: string }
  | { kind: "service" };

export const ANONYMOUS: Identity = { kind: "anonymous" };
export const SERVICE: Identity = { kind: "service" };

export function identityUserId(identity: Identity): string | null {
  return identity.kind === "user" ? identity.userId : null;
}

export interface Lesson {
  id: string;
  ownerId: string | null;
  title: string | null;
  topic: string | null;
  subject: string | null;
  level: string | null;
  content: string | null;
  visibility: string;
  createdAt: string;
}

export interface NewLesson {
  ownerId: string | null;
  title?: string | null;
  topic: string;
  subject?: string | null;
  level?: string | null;
  content: string;
  visibility?: string;
}

export type LessonPatch = Partial<Pick<Lesson, "title" | "topic" | "subject" | "level" | "content" | "visibility">>;

export interface LessonFilter {
  subject?: string;
  level?: string;
  skip?: number;
  limit?: number;
}

/** One row of the nearest-neighbour function: a lesson and its cosine distance to the query vector. */
export interface LessonMatch {
  lesson: Lesson;
  distance: number;
}

export interface Attachment {
  id: string;
  ownerId: string | null;
  bucket: string;
  path: string;
  publicUrl: string;
  metadata: Record<string, unknown>;
  lessonId: string | null;
  queryId: string | null;
  createdAt: string;
}

export interface NewAttachment {
  ownerId: string | null;
  bucket: string;
  path: string;
  publicUrl: string;
  metadata?: Record<string, unknown>;
  lessonId?: string | null;
  queryId?: string | null;
}

export type AttachmentPatch = Partial<Pick<Attachment, "metadata" | "lessonId" | "queryId" | "publicUrl">>;

export interface StoredObject {
  bucket: string;
  path: string;
  /** Signed URL valid for an hour, or "" when the backend could not sign one. */
  signedUrl: string;
}

export interface UserQuery {
  id: string;
  userId: string | null;
  textQuery: string;
  imageAttachmentIds: string[];
  createdAt: string;
}

export interface NewUserQuery {
  userId: string | null;
  textQuery: string;
  imageAttachmentIds?: string[];
}

export interface GeneratedQuestion {
  id: string;
  lessonId: string | null;
  queryId: string | null;
  authorModel: string;
  questionText: string;
  createdAt: string;
}

export interface NewGeneratedQuestion {
  lessonId?: string | null;
  queryId?: string | null;
  authorModel?: string;
  questionText: string;
}

export interface Answer {
  id: string;
  questionId: string | null;
  userId: string | null;
  userAnswer: string;
  modelAnswer: string | null;
  grade: string | null;
  feedback: string | null;
  createdAt: string;
}

export interface NewAnswer {
  questionId?: string | null;
  userId: string | null;
  userAnswer: string;
  modelAnswer?: string | null;
  grade?: string | null;
  feedback?: string | null;
}

export interface NewEmbedding {
  sourceTable: SourceTable;
  sourceId: string;
  embedding: number[];
  metadata?: Record<string, unknown>;
}
