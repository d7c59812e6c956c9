import { Router } from "express";
import { z } from "zod";
import { NotFoundError } from "../lib/errors.js";
import { matchesFilter } from "../storage/knowledgeStore.js";
import type { Lesson } from "../storage/types.js";
import { asyncRoute, lessonJson, parseInput, requestContext, requireUserId, retrievedJson, type AppDeps } from "./http.js";

const listQuery = z.object({
  subject: z.string().optional(),
  level: z.string().optional(),
  skip: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

const lessonBody = z.object({
  title: z.string().nullish(),
  topic: z.string().trim().min(1),
  subject: z.string().nullish(),
  level: z.string().nullish(),
  content: z.string().trim().min(1),
  visibility: z.string().min(1).optional(),
});

const lessonPatch = z
  .object({
    title: z.string().nullable(),
    topic: z.string().trim().min(1),
    subject: z.string().nullable(),
    level: z.string().nullable(),
    content: z.string().trim().min(1),
    visibility: z.string().min(1),
  })
  .partial()
  .strict();

const searchBody = z.object({
  query: z.string(),
  top_k: z.number().int().min(1).max(50).optional(),
  subject_filter: z.string().optional(),
  level_filter: z.string().optional(),
});

function distinctSorted(values: (string | null)[]): string[] {
  return [...new Set(values.filter((v): v is string => !!v && v.trim().length > 0))].sort();
}

function countBy(lessons: Lesson[], key: "subject" | "level"): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const lesson of lessons) {
    const value = lesson[key];
    if (value) counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

/** Lesson CRUD, semantic search and lesson aggregates for the signed-in user. */
export function createLessonsRouter(deps: AppDeps): Router {
  const router = Router();

  router.get(
    "/lessons",
    asyncRoute(async (req, res) => {
      const filter = parseInput(listQuery, req.query);
      const { store } = await requestContext(deps, req);
      const lessons = await store.listLessons(filter);
      res.json({ ok: true, lessons: lessons.map(lessonJson) });
    })
  );

  router.get(
    "/lessons/:id",
    asyncRoute(async (req, res) => {
      const { store } = await requestContext(deps, req);
      const lesson = await store.getLesson(req.params.id);
      if (!lesson) throw new NotFoundError(`Lesson ${req.params.id} not found`);
      res.json({ ok: true, lesson: lessonJson(lesson) });
    })
  );

  router.post(
    "/lessons",
    asyncRoute(async (req, res) => {
      const body = parseInput(lessonBody, req.body);
      const { identity, ingestor } = await requestContext(deps, req);
      const lesson = await ingestor.createLesson({ ...body, ownerId: requireUserId(identity) });
      res.status(201).json({ ok: true, lesson: lessonJson(lesson) });
    })
  );

  router.put(
    "/lessons/:id",
    asyncRoute(async (req, res) => {
      const patch = parseInput(lessonPatch, req.body);
      const { identity, ingestor } = await requestContext(deps, req);
      requireUserId(identity);
      const lesson = await ingestor.updateLesson(req.params.id, patch);
      res.json({ ok: true, lesson: lessonJson(lesson) });
    })
  );

  router.delete(
    "/lessons/:id",
    asyncRoute(async (req, res) => {
      const { identity, ingestor } = await requestContext(deps, req);
      requireUserId(identity);
      await ingestor.deleteLesson(req.params.id);
      res.json({ ok: true, deleted: req.params.id });
    })
  );

  router.post(
    "/search",
    asyncRoute(async (req, res) => {
      const body = parseInput(searchBody, req.body);
      const { store, coach } = await requestContext(deps, req);
      const topK = body.top_k ?? deps.config.topK;
      const filtering = Boolean(body.subject_filter || body.level_filter);
      // with a filter, rank every visible lesson so the cut to top_k happens after filtering
      const candidates = filtering ? Math.max(topK, (await store.listLessons()).length) : topK;
      const results = (await coach.findRelevant(body.query, candidates))
        .filter((r) => matchesFilter(r.lesson.subject, body.subject_filter) && matchesFilter(r.lesson.level, body.level_filter))
        .slice(0, topK);
      res.json({ ok: true, query: body.query, results: results.map(retrievedJson) });
    })
  );

  router.get(
    "/subjects",
    asyncRoute(async (req, res) => {
      const { store } = await requestContext(deps, req);
      const lessons = await store.listLessons();
      res.json({ ok: true, subjects: distinctSorted(lessons.map((l) => l.subject)) });
    })
  );

  router.get(
    "/levels",
    asyncRoute(async (req, res) => {
      const { store } = await requestContext(deps, req);
      const lessons = await store.listLessons();
      res.json({ ok: true, levels: distinctSorted(lessons.map((l) => l.level)) });
    })
  );

  router.get(
    "/stats",
    asyncRoute(async (req, res) => {
      const { store } = await requestContext(deps, req);
      const lessons = await store.listLessons();
      res.json({
        ok: true,
        total_lessons: lessons.length,
        subjects: countBy(lessons, "subject"),
        levels: countBy(lessons, "level"),
      });
    })
  );

  return router;
}
