import { timingSafeEqual } from "crypto";
import { Router, type RequestHandler } from "express";
import { z } from "zod";
import { uploadImage } from "../coach/attachments.js";
import { decodeImage } from "../lib/images.js";
import { getRecentLog } from "../lib/log.js";
import { SERVICE, SOURCE_TABLES } from "../storage/types.js";
import { asyncRoute, contextFor, lessonJson, parseInput, type AppDeps } from "./http.js";

const lessonBody = z.object({
  owner_id: z.string().uuid(),
  title: z.string().nullish(),
  topic: z.string().trim().min(1),
  subject: z.string().nullish(),
  level: z.string().nullish(),
  content: z.string().trim().min(1),
  visibility: z.string().min(1).optional(),
});

const embeddingBody = z.object({
  source_table: z.enum(SOURCE_TABLES),
  source_id: z.string().uuid(),
  embedding: z.array(z.number().finite()).min(1),
  metadata: z.record(z.unknown()).optional(),
});

const attachmentBody = z.object({
  owner_id: z.string().uuid().nullish(),
  image: z.string().min(1),
  bucket: z.string().min(1).optional(),
  lesson_id: z.string().uuid().nullish(),
  query_id: z.string().uuid().nullish(),
  metadata: z.record(z.unknown()).optional(),
});

const generatedQuestionBody = z.object({
  lesson_id: z.string().uuid().nullish(),
  query_id: z.string().uuid().nullish(),
  author_model: z.string().optional(),
  question_text: z.string().trim().min(1),
});

const answerBody = z.object({
  question_id: z.string().uuid().nullish(),
  user_id: z.string().uuid(),
  user_answer: z.string().min(1),
  model_answer: z.string().nullish(),
  grade: z.string().nullish(),
  feedback: z.string().nullish(),
});

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Rejects requests without the configured `x-service-key`; with no key configured every request is rejected. */
export function requireServiceKey(serviceKey: string | null): RequestHandler {
  return (req, res, next) => {
    const given = req.header("x-service-key");
    if (!serviceKey || !given || !sameKey(given, serviceKey)) {
      res.status(403).json({ ok: false, error: "Invalid or missing service key", code: "access_denied" });
      return;
    }
    next();
  };
}

/** Server-side writes with the service identity, which bypasses row policies. */
export function createProtectedRouter(deps: AppDeps): Router {
  const router = Router();
  router.use(requireServiceKey(deps.config.serviceKey));

  router.post(
    "/lessons",
    asyncRoute(async (req, res) => {
      const { owner_id, ...fields } = parseInput(lessonBody, req.body);
      const { ingestor } = contextFor(deps, SERVICE);
      const lesson = await ingestor.createLesson({ ...fields, ownerId: owner_id });
      res.status(201).json({ ok: true, lesson: lessonJson(lesson) });
    })
  );

  router.post(
    "/embeddings",
    asyncRoute(async (req, res) => {
      const body = parseInput(embeddingBody, req.body);
      const { store } = contextFor(deps, SERVICE);
      const id = await store.insertEmbedding({
        sourceTable: body.source_table,
        sourceId: body.source_id,
        embedding: body.embedding,
        metadata: body.metadata,
      });
      res.status(201).json({ ok: true, id });
    })
  );

  router.post(
    "/attachments",
    asyncRoute(async (req, res) => {
      const body = parseInput(attachmentBody, req.body);
      const image = decodeImage(body.image, deps.config.images);
      const { store } = contextFor(deps, SERVICE);
      const attachment = await uploadImage(store, image, {
        ownerId: body.owner_id ?? null,
        defaultBucket: deps.config.supabase.storageBucket,
        bucket: body.bucket,
        metadata: body.metadata,
        lessonId: body.lesson_id,
        queryId: body.query_id,
      });
      res.status(201).json({
        ok: true,
        attachment: {
          id: attachment.id,
          owner_id: attachment.ownerId,
          bucket: attachment.bucket,
          path: attachment.path,
          public_url: attachment.publicUrl,
          metadata: attachment.metadata,
          lesson_id: attachment.lessonId,
          query_id: attachment.queryId,
          created_at: attachment.createdAt,
        },
      });
    })
  );

  router.post(
    "/generated_questions",
    asyncRoute(async (req, res) => {
      const body = parseInput(generatedQuestionBody, req.body);
      const { store } = contextFor(deps, SERVICE);
      const question = await store.insertGeneratedQuestion({
        lessonId: body.lesson_id,
        queryId: body.query_id,
        authorModel: body.author_model,
        questionText: body.question_text,
      });
      res.status(201).json({ ok: true, id: question.id });
    })
  );

  router.post(
    "/answers",
    asyncRoute(async (req, res) => {
      const body = parseInput(answerBody, req.body);
      const { store } = contextFor(deps, SERVICE);
      const answer = await store.insertAnswer({
        questionId: body.question_id,
        userId: body.user_id,
        userAnswer: body.user_answer,
        modelAnswer: body.model_answer,
        grade: body.grade,
        feedback: body.feedback,
      });
      res.status(201).json({ ok: true, id: answer.id });
    })
  );

  router.get("/logs", (_req, res) => {
    res.json({ ok: true, lines: getRecentLog() });
  });

  return router;
}
