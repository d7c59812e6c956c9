import { Router } from "express";
import { z } from "zod";
import { IMAGE_KINDS } from "../coach/prompts.js";
import { decodeImage } from "../lib/images.js";
import { asyncRoute, parseInput, requestContext, retrievedJson, type AppDeps } from "./http.js";

const imageKind = z.enum(IMAGE_KINDS);

const askBody = z.object({
  query: z.string().optional(),
  image: z.string().optional(),
  image_kind: imageKind.optional(),
});

const questionBody = z.object({ topic: z.string().trim().min(1) });

const evaluateBody = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
  reference: z.string().optional(),
  question_id: z.string().uuid().nullish(),
});

export function createCoachRouter(deps: AppDeps): Router {
  const router = Router();

  router.post(
    "/ask",
    asyncRoute(async (req, res) => {
      const body = parseInput(askBody, req.body);
      const image = body.image ? decodeImage(body.image, deps.config.images) : undefined;
      const { coach } = await requestContext(deps, req);
      const result = await coach.explain({ text: body.query, image, imageKind: body.image_kind });
      res.json({
        ok: true,
        query: result.query,
        answer: result.answer,
        query_id: result.queryId,
        sources: result.lessons.map(retrievedJson),
      });
    })
  );

  router.post(
    "/practice/question",
    asyncRoute(async (req, res) => {
      const { topic } = parseInput(questionBody, req.body);
      const { coach } = await requestContext(deps, req);
      const result = await coach.generatePracticeQuestion(topic);
      res.json({
        ok: true,
        question: result.question,
        lesson_id: result.lessonId,
        question_id: result.questionId,
        sources: result.lessons.map(retrievedJson),
      });
    })
  );

  router.post(
    "/practice/evaluate",
    asyncRoute(async (req, res) => {
      const body = parseInput(evaluateBody, req.body);
      const { coach } = await requestContext(deps, req);
      const result = await coach.evaluateAnswer({
        question: body.question,
        answer: body.answer,
        reference: body.reference,
        questionId: body.question_id,
      });
      res.json({
        ok: true,
        evaluation: result.evaluation,
        score: result.score,
        feedback: result.feedback,
        model_answer: result.modelAnswer,
        citations: result.citations,
        insufficient_material: result.insufficientMaterial,
        answer_id: result.answerId,
        sources: result.lessons.map(retrievedJson),
      });
    })
  );

  return router;
}
