import { createClient, type PostgrestError, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { AppConfig, VectorSearchMode } from "../lib/config.js";
import {
  AccessDenied,
  CoachError,
  DimensionMismatch,
  NotFoundError,
  StoreError,
  ValidationError,
} from "../lib/errors.js";
import { createLogger } from "../lib/log.js";
import type { KnowledgeStore, StoreFactory } from "./knowledgeStore.js";
import type {
  Answer,
  Attachment,
  AttachmentPatch,
  GeneratedQuestion,
  Identity,
  Lesson,
  LessonPatch,
  SourceTable,
  UserQuery,
} from "./types.js";
import { toVectorLiteral } from "./vector.js";

const log = createLogger("supabase");

const SIGNED_URL_TTL_SECONDS = 3600;

const lessonRow = z.object({
  id: z.string(),
  owner_id: z.string().nullable(),
  title: z.string().nullable(),
  topic: z.string().nullable(),
  subject: z.string().nullable(),
  level: z.string().nullable(),
  content: z.string().nullable(),
  visibility: z.string().nullable(),
  created_at: z.string(),
});

const matchRow = lessonRow.extend({ distance: z.coerce.number() });

const attachmentRow = z.object({
  id: z.string(),
  owner_id: z.string().nullable(),
  bucket: z.string().nullable(),
  path: z.string().nullable(),
  public_url: z.string().nullable(),
  metadata: z.record(z.unknown()).nullable(),
  lesson_id: z.string().nullable().optional(),
  query_id: z.string().nullable().optional(),
  created_at: z.string(),
});

const userQueryRow = z.object({
  id: z.string(),
  user_id: z.string().nullable(),
  text_query: z.string().nullable(),
  image_attachment_ids: z.array(z.string()).nullable(),
  created_at: z.string(),
});

const generatedQuestionRow = z.object({
  id: z.string(),
  lesson_id: z.string().nullable(),
  query_id: z.string().nullable(),
  author_model: z.string().nullable(),
  question_text: z.string().nullable(),
  created_at: z.string(),
});

const answerRow = z.object({
  id: z.string(),
  question_id: z.string().nullable(),
  user_id: z.string().nullable(),
  user_answer: z.string().nullable(),
  model_answer: z.string().nullable(),
  grade: z.string().nullable(),
  feedback: z.string().nullable(),
  created_at: z.string(),
});

const idRow = z.object({ id: z.string() });

function toLesson(row: z.infer<typeof lessonRow>): Lesson {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    topic: row.topic,
    subject: row.subject,
    level: row.level,
    content: row.content,
    visibility: row.visibility ?? "private",
    createdAt: row.created_at,
  };
}

function toAttachment(row: z.infer<typeof attachmentRow>): Attachment {
  return {
    id: row.id,
    ownerId: row.owner_id,
    bucket: row.bucket ?? "",
    path: row.path ?? "",
    publicUrl: row.public_url ?? "",
    metadata: row.metadata ?? {},
    lessonId: row.lesson_id ?? null,
    queryId: row.query_id ?? null,
    createdAt: row.created_at,
  };
}

function toUserQuery(row: z.infer<typeof userQueryRow>): UserQuery {
  return {
    id: row.id,
    userId: row.user_id,
    textQuery: row.text_query ?? "",
    imageAttachmentIds: row.image_attachment_ids ?? [],
    createdAt: row.created_at,
  };
}

function toGeneratedQuestion(row: z.infer<typeof generatedQuestionRow>): GeneratedQuestion {
  return {
    id: row.id,
    lessonId: row.lesson_id,
    queryId: row.query_id,
    authorModel: row.author_model ?? "",
    questionText: row.question_text ?? "",
    createdAt: row.created_at,
  };
}

function toAnswer(row: z.infer<typeof answerRow>): Answer {
  return {
    id: row.id,
    questionId: row.question_id,
    userId: row.user_id,
    userAnswer: row.user_answer ?? "",
    modelAnswer: row.model_answer,
    grade: row.grade,
    feedback: row.feedback,
    createdAt: row.created_at,
  };
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, action: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new StoreError(`${action}: unexpected row shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
  return parsed.data;
}

function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, action: string): T[] {
  return parseRow(z.array(schema), data ?? [], action);
}

const DIMENSION_PATTERNS = [/expected (\d+) dimensions, not (\d+)/i, /different vector dimensions (\d+) and (\d+)/i];

/** Map a PostgREST error to the error kinds the rest of the service handles. */
export function mapPostgrestError(error: PostgrestError, action: string): CoachError {
  if (error.code === "42501") return new AccessDenied(`${action}: ${error.message}`);
  if (error.code === "PGRST116") return new NotFoundError(`${action}: no matching row`);
  if (error.code === "22P02" || error.code === "23503" || error.code === "23502") {
    return new ValidationError(`${action}: ${error.message}`);
  }
  for (const pattern of DIMENSION_PATTERNS) {
    const m = pattern.exec(error.message);
    if (m) return new DimensionMismatch(Number(m[1]), Number(m[2]));
  }
  return new StoreError(`${action}: ${error.message}`, { cause: error });
}

function lessonPatchRow(patch: LessonPatch): Record<string, string | null> {
  const row: Record<string, string | null> = {};
  if (patch.title !== undefined) row.title = patch.title;
  if (patch.topic !== undefined) row.topic = patch.topic;
  if (patch.subject !== undefined) row.subject = patch.subject;
  if (patch.level !== undefined) row.level = patch.level;
  if (patch.content !== undefined) row.content = patch.content;
  if (patch.visibility !== undefined) row.visibility = patch.visibility;
  return row;
}

function attachmentPatchRow(patch: AttachmentPatch): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  if (patch.metadata !== undefined) row.metadata = patch.metadata;
  if (patch.lessonId !== undefined) row.lesson_id = patch.lessonId;
  if (patch.queryId !== undefined) row.query_id = patch.queryId;
  if (patch.publicUrl !== undefined) row.public_url = patch.publicUrl;
  return row;
}

/** Direct foreign-key column filled alongside `source_table`/`source_id` so deletes cascade. */
const SOURCE_FK_COLUMN: Record<SourceTable, string> = {
  lessons: "lesson_id",
  user_queries: "query_id",
  generated_questions: "generated_question_id",
};

export interface SupabaseStoreOptions {
  url: string;
  anonKey: string;
  serviceRoleKey: string | null;
  dimension: number;
  searchMode: VectorSearchMode;
  /** Replaces the global fetch for every client created here. */
  fetch?: typeof fetch;
}

export interface SupabaseBackend {
  storeFor: StoreFactory;
  anonClient: SupabaseClient;
  serviceClient: SupabaseClient | null;
}

export function supabaseOptionsFromConfig(config: AppConfig): SupabaseStoreOptions {
  const { url, anonKey, serviceRoleKey } = config.supabase;
  if (!url || !anonKey) throw new Error("SUPABASE_URL and SUPABASE_ANON_KEY must be set");
  return {
    url,
    anonKey,
    serviceRoleKey,
    dimension: config.embeddingDimension,
    searchMode: config.searchMode,
  };
}

/**
 * Supabase backend: PostgREST tables, Storage and the `match_lessons` RPC.
 * A user identity gets an anon-key client carrying the user's JWT, so the lessons policy
 * applies server-side; the service identity uses the service-role key.
 */
export function createSupabaseBackend(options: SupabaseStoreOptions): SupabaseBackend {
  const { url, anonKey, serviceRoleKey, dimension, searchMode } = options;

  function makeClient(key: string, accessToken?: string): SupabaseClient {
    return createClient(url, key, {
      auth: { persistSession: false, autoRefreshToken: false, detectSessionInUrl: false },
      global: {
        headers: accessToken ? { Authorization: `Bearer ${accessToken}` } : {},
        ...(options.fetch ? { fetch: options.fetch } : {}),
      },
    });
  }

  const anonClient = makeClient(anonKey);
  const serviceClient = serviceRoleKey ? makeClient(serviceRoleKey) : null;
  const rpcName = searchMode === "exact" ? "match_lessons_exact" : "match_lessons";

  function clientFor(identity: Identity): SupabaseClient {
    if (identity.kind === "service") {
      if (!serviceClient) throw new StoreError("SUPABASE_SERVICE_ROLE_KEY is required for server-side writes");
      return serviceClient;
    }
    if (identity.kind === "user") return makeClient(anonKey, identity.accessToken);
    return anonClient;
  }

  function storeFor(identity: Identity): KnowledgeStore {
    const db = clientFor(identity);
    // tables without row policies and storage are written with the service role when it is configured
    const writer = serviceClient ?? db;

    /** Zero rows touched: the row is missing, or the owner policy hid it. */
    async function hiddenOrMissing(id: string, action: string): Promise<CoachError> {
      if (!serviceClient || identity.kind === "service") return new NotFoundError(`${action}: lesson ${id} not found`);
      const { data, error } = await serviceClient.from("lessons").select("id").eq("id", id).maybeSingle();
      if (error) return mapPostgrestError(error, action);
      return data ? new AccessDenied(`${action}: lesson ${id} belongs to another user`) : new NotFoundError(`${action}: lesson ${id} not found`);
    }

    return {
      backend: "supabase",
      identity,
      dimension,

      async listLessons(filter = {}) {
        let query = db.from("lessons").select("*").order("created_at", { ascending: true });
        if (filter.subject) query = query.ilike("subject", `%${filter.subject}%`);
        if (filter.level) query = query.ilike("level", `%${filter.level}%`);
        const skip = Math.max(0, filter.skip ?? 0);
        const { data, error } =
          filter.limit !== undefined ? await query.range(skip, skip + filter.limit - 1) : skip > 0 ? await query.range(skip, skip + 4999) : await query.limit(5000);
        if (error) throw mapPostgrestError(error, "list lessons");
        return parseRows(lessonRow, data, "list lessons").map(toLesson);
      },

      async getLesson(id) {
        const { data, error } = await db.from("lessons").select("*").eq("id", id).maybeSingle();
        if (error) {
          if (error.code === "22P02") return null;
          throw mapPostgrestError(error, "get lesson");
        }
        return data ? toLesson(parseRow(lessonRow, data, "get lesson")) : null;
      },

      async insertLesson(input) {
        const record = {
          owner_id: input.ownerId,
          title: input.title ?? input.topic,
          topic: input.topic,
          subject: input.subject ?? null,
          level: input.level ?? null,
          content: input.content,
          visibility: input.visibility ?? "private",
        };
        const { data, error } = await db.from("lessons").insert(record).select("*").single();
        if (error) throw mapPostgrestError(error, "insert lesson");
        return toLesson(parseRow(lessonRow, data, "insert lesson"));
      },

      async updateLesson(id, patch) {
        const { data, error } = await db.from("lessons").update(lessonPatchRow(patch)).eq("id", id).select("*");
        if (error) throw mapPostgrestError(error, "update lesson");
        const rows = parseRows(lessonRow, data, "update lesson");
        if (rows.length === 0) throw await hiddenOrMissing(id, "update lesson");
        return toLesson(rows[0]);
      },

      async deleteLesson(id) {
        const { data, error } = await db.from("lessons").delete().eq("id", id).select("id");
        if (error) throw mapPostgrestError(error, "delete lesson");
        if (parseRows(idRow, data, "delete lesson").length === 0) throw await hiddenOrMissing(id, "delete lesson");
      },

      async insertEmbedding(input) {
        if (input.embedding.length !== dimension) throw new DimensionMismatch(dimension, input.embedding.length);
        const record: Record<string, unknown> = {
          source_table: input.sourceTable,
          source_id: input.sourceId,
          embedding: toVectorLiteral(input.embedding),
          metadata: input.metadata ?? {},
          [SOURCE_FK_COLUMN[input.sourceTable]]: input.sourceId,
        };
        const { data, error } = await writer.from("embeddings").insert(record).select("id").single();
        if (error) throw mapPostgrestError(error, "insert embedding");
        return parseRow(idRow, data, "insert embedding").id;
      },

      async deleteEmbeddings(sourceTable, sourceId, keepId) {
        let query = writer.from("embeddings").delete().eq("source_table", sourceTable).eq("source_id", sourceId);
        if (keepId) query = query.neq("id", keepId);
        const { data, error } = await query.select("id");
        if (error) throw mapPostgrestError(error, "delete embeddings");
        return parseRows(idRow, data, "delete embeddings").length;
      },

      async matchLessons(vector, count) {
        if (vector.length !== dimension) throw new DimensionMismatch(dimension, vector.length);
        if (count <= 0) return [];
        const { data, error } = await db.rpc(rpcName, {
          query_embedding: toVectorLiteral(vector),
          match_count: count,
        });
        if (error) throw mapPostgrestError(error, rpcName);
        return parseRows(matchRow, data, rpcName).map((row) => ({ lesson: toLesson(row), distance: row.distance }));
      },

      async putObject(bucket, path, bytes, contentType) {
        const created = await writer.storage.createBucket(bucket, { public: false });
        if (created.error && !/already exists/i.test(created.error.message)) {
          log.warn(`create bucket ${bucket}: ${created.error.message}`);
        }
        const uploaded = await writer.storage.from(bucket).upload(path, bytes, { contentType, upsert: false });
        if (uploaded.error) throw new StoreError(`upload ${bucket}/${path}: ${uploaded.error.message}`, { cause: uploaded.error });

        const signed = await writer.storage.from(bucket).createSignedUrl(path, SIGNED_URL_TTL_SECONDS);
        if (signed.error) log.warn(`sign ${bucket}/${path}: ${signed.error.message}`);
        return { bucket, path, signedUrl: signed.data?.signedUrl ?? "" };
      },

      async insertAttachment(input) {
        const record = {
          owner_id: input.ownerId,
          bucket: input.bucket,
          path: input.path,
          public_url: input.publicUrl,
          metadata: input.metadata ?? {},
          lesson_id: input.lessonId ?? null,
          query_id: input.queryId ?? null,
        };
        const { data, error } = await writer.from("attachments").insert(record).select("*").single();
        if (error) throw mapPostgrestError(error, "insert attachment");
        return toAttachment(parseRow(attachmentRow, data, "insert attachment"));
      },

      async updateAttachment(id, patch) {
        const { data, error } = await writer.from("attachments").update(attachmentPatchRow(patch)).eq("id", id).select("*");
        if (error) throw mapPostgrestError(error, "update attachment");
        const rows = parseRows(attachmentRow, data, "update attachment");
        if (rows.length === 0) throw new NotFoundError(`update attachment: ${id} not found`);
        return toAttachment(rows[0]);
      },

      async insertUserQuery(input) {
        const record = {
          user_id: input.userId,
          text_query: input.textQuery,
          image_attachment_ids: input.imageAttachmentIds ?? [],
        };
        const { data, error } = await writer.from("user_queries").insert(record).select("*").single();
        if (error) throw mapPostgrestError(error, "insert user query");
        return toUserQuery(parseRow(userQueryRow, data, "insert user query"));
      },

      async insertGeneratedQuestion(input) {
        const record = {
          lesson_id: input.lessonId ?? null,
          query_id: input.queryId ?? null,
          author_model: input.authorModel ?? "",
          question_text: input.questionText,
        };
        const { data, error } = await writer.from("generated_questions").insert(record).select("*").single();
        if (error) throw mapPostgrestError(error, "insert generated question");
        return toGeneratedQuestion(parseRow(generatedQuestionRow, data, "insert generated question"));
      },

      async insertAnswer(input) {
        const record = {
          question_id: input.questionId ?? null,
          user_id: input.userId,
          user_answer: input.userAnswer,
          model_answer: input.modelAnswer ?? null,
          grade: input.grade ?? null,
          feedback: input.feedback ?? null,
        };
        const { data, error } = await writer.from("answers").insert(record).select("*").single();
        if (error) throw mapPostgrestError(error, "insert answer");
        return toAnswer(parseRow(answerRow, data, "insert answer"));
      },
    };
  }

  return { storeFor, anonClient, serviceClient };
}
