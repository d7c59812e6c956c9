import type { ErrorRequestHandler, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { identityFromHeader, type Authenticator } from "../auth/authenticator.js";
import { createCoachService, type CoachService } from "../coach/service.js";
import type { AppConfig } from "../lib/config.js";
import { CoachError, Unauthorized, ValidationError } from "../lib/errors.js";
import { createLogger } from "../lib/log.js";
import type { LLMClient } from "../llm/client.js";
import type { EmbeddingClient } from "../llm/embedding.js";
import { createIngestor, type Ingestor } from "../retrieval/ingest.js";
import type { RetrievedLesson } from "../retrieval/retrieve.js";
import type { KnowledgeStore, StoreFactory } from "../storage/knowledgeStore.js";
import type { Identity, Lesson } from "../storage/types.js";

const log = createLogger("http");

export interface AppDeps {
  config: AppConfig;
  storeFor: StoreFactory;
  auth: Authenticator;
  llm: LLMClient;
  embedder: EmbeddingClient;
  llmConfigured: boolean;
  embeddingsConfigured: boolean;
}

export interface RequestContext {
  identity: Identity;
  store: KnowledgeStore;
  ingestor: Ingestor;
  coach: CoachService;
}

/** Per-request store, ingestor and coach, all bound to the caller's identity. */
export function contextFor(deps: AppDeps, identity: Identity): RequestContext {
  const store = deps.storeFor(identity);
  return {
    identity,
    store,
    ingestor: createIngestor({ embedder: deps.embedder, store }),
    coach: createCoachService({
      llm: deps.llm,
      embedder: deps.embedder,
      store,
      topK: deps.config.topK,
      defaultBucket: deps.config.supabase.storageBucket,
    }),
  };
}

export async function requestContext(deps: AppDeps, req: Request): Promise<RequestContext> {
  return contextFor(deps, await identityFromHeader(deps.auth, req.header("authorization")));
}

export function requireUserId(identity: Identity): string {
  if (identity.kind !== "user") throw new Unauthorized("Sign in to manage lessons");
  return identity.userId;
}

/** Forward rejections to the error middleware (Express 4 does not await handlers). */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw new ValidationError(problems.join("; "));
  }
  return parsed.data;
}

export function lessonJson(lesson: Lesson) {
  return {
    id: lesson.id,
    owner_id: lesson.ownerId,
    title: lesson.title,
    topic: lesson.topic,
    subject: lesson.subject,
    level: lesson.level,
    content: lesson.content,
    visibility: lesson.visibility,
    created_at: lesson.createdAt,
  };
}

export function retrievedJson(item: RetrievedLesson) {
  return { ...lessonJson(item.lesson), distance: item.distance, similarity: item.similarity };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof CoachError) {
    if (err.status >= 500) log.error(`${err.code}`, err);
    res.status(err.status).json({ ok: false, error: err.message, code: err.code });
    return;
  }
  // body-parser failures (malformed JSON, oversized body) carry their own 4xx status
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" && err.status < 500) {
    const message = err instanceof Error ? err.message : "Bad request";
    res.status(err.status).json({ ok: false, error: message, code: "bad_request" });
    return;
  }
  log.error("unhandled error", err);
  res.status(500).json({ ok: false, error: "Internal server error", code: "internal_error" });
};
