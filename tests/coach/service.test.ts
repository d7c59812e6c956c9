import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IMAGE_KIND_QUERIES, EXPLAIN_SYSTEM_PROMPT } from "../../src/coach/prompts.js";
import { createCoachService, rankBoosted } from "../../src/coach/service.js";
import { ValidationError } from "../../src/lib/errors.js";
import { createIngestor } from "../../src/retrieval/ingest.js";
import { createMemoryDatabase, type MemoryDatabase } from "../../src/storage/memoryStore.js";
import { ANONYMOUS, type Identity } from "../../src/storage/types.js";
import { ALICE, fakeEmbedder, fakeLLM, makeLesson, pngBytes, user, userText, type FakeEmbedder, type FakeLLM } from "../helpers.js";

describe("coach service", () => {
  let db: MemoryDatabase;
  let embedder: FakeEmbedder;
  let llm: FakeLLM;
  const ids: Record<string, string> = {};

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    db = createMemoryDatabase({ dimension: 3 });
    embedder = fakeEmbedder({
      "F = ma": [1, 0, 0],
      "cells divide": [0, 1, 0],
      "what is force?": [1, 0, 0],
    });
    llm = fakeLLM("Use [ F = ma ].");
    const ingestor = createIngestor({ embedder, store: db.storeFor(user(ALICE)) });
    const forces = await ingestor.createLesson({ ownerId: ALICE, topic: "Forces", subject: "Physics", content: "F = ma" });
    const cells = await ingestor.createLesson({ ownerId: ALICE, topic: "Cells", subject: "Biology", content: "cells divide" });
    ids.forces = forces.id;
    ids.cells = cells.id;
    embedder.calls.length = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function service(identity: Identity = user(ALICE), topK = 2) {
    return createCoachService({ llm, embedder, store: db.storeFor(identity), topK, defaultBucket: "attachments" });
  }

  describe("explain", () => {
    it("grounds the answer in retrieved lessons and stores the query", async () => {
      const result = await service().explain({ text: "what is force?" });

      expect(result.lessons.map((l) => l.lesson.id)).toEqual([ids.forces, ids.cells]);
      expect(result.answer).toBe("Use \n\n$$\nF = ma\n$$\n\n.");
      expect(result.queryId).not.toBeNull();

      const [call] = llm.calls;
      expect(call.messages[0]).toEqual({ role: "system", content: EXPLAIN_SYSTEM_PROMPT });
      const prompt = userText(call.messages);
      expect(prompt).toContain(`ID: ${ids.forces}\nTopic: Forces\nSimilarity: 1.0000\nF = ma\n---`);
      expect(prompt).toContain("Question: what is force?");

      expect(db.counts()).toMatchObject({ userQueries: 1, embeddings: 3 });
    });

    it("does not store queries for anonymous callers", async () => {
      const result = await service(ANONYMOUS).explain({ text: "what is force?" });
      expect(result.lessons).toEqual([]);
      expect(result.queryId).toBeNull();
      expect(userText(llm.calls[0].messages)).toContain("Retrieved documents: none available.");
      expect(db.counts().userQueries).toBe(0);
    });

    it("sends the image and uploads it as an attachment of the query", async () => {
      const image = { bytes: pngBytes(300, 300), contentType: "image/png" as const };
      const result = await service().explain({ text: "what is force?", image });

      const content = llm.calls[0].messages[1].content;
      expect(Array.isArray(content) ? content[0] : null).toMatchObject({ type: "image_url" });
      expect(result.queryId).not.toBeNull();
      expect(db.counts()).toMatchObject({ attachments: 1, objects: 1, userQueries: 1 });
    });
  });

  describe("processQuery", () => {
    it("needs text or an image", async () => {
      await expect(service().processQuery({ text: "  " })).rejects.toBeInstanceOf(ValidationError);
    });

    it("uses the image-kind prompt and boosts math lessons for math images", async () => {
      const ingestor = createIngestor({ embedder, store: db.storeFor(user(ALICE)) });
      const algebra = await ingestor.createLesson({
        ownerId: ALICE,
        topic: "Algebra",
        subject: "Mathematics",
        content: "x + 1 = 2",
      });
      embedder.calls.length = 0;

      const image = { bytes: pngBytes(300, 300), contentType: "image/png" as const };
      const result = await service(user(ALICE), 4).processQuery({ image, imageKind: "math" });

      expect(result.query).toBe(IMAGE_KIND_QUERIES.math);
      // first pass plus one query per boost term (mathematics, physics)
      expect(embedder.calls).toHaveLength(3);
      expect(embedder.calls[1].texts).toEqual([`${IMAGE_KIND_QUERIES.math} mathematics algebra geometry calculus equation formula`]);
      expect(result.lessons[0].lesson.id).toBe(algebra.id);
      // exact match on the image query, boost capped at 1
      expect(result.lessons[0].similarity).toBe(1);
      expect(result.lessons.map((l) => l.lesson.topic)).toEqual(["Algebra", "Forces", "Cells"]);
    });
  });

  describe("generatePracticeQuestion", () => {
    it("retrieves with the matching lesson's content and stores the question", async () => {
      llm = fakeLLM("What is ( F ) when ( m = 2 )?");
      const result = await service().generatePracticeQuestion("forces");

      expect(embedder.calls[0]).toEqual({ texts: ["F = ma"], inputType: "search_query" });
      expect(llm.calls[0].options).toEqual({ maxTokens: 256, temperature: 0.8 });
      expect(userText(llm.calls[0].messages)).toContain("Target topic label: forces");
      expect(result.question).toBe("What is $F$ when $m = 2$?");
      expect(result.lessonId).toBe(ids.forces);
      expect(result.questionId).not.toBeNull();
      expect(db.counts().generatedQuestions).toBe(1);
    });

    it("falls back to the topic label when no lesson matches", async () => {
      await service().generatePracticeQuestion("Optics");
      expect(embedder.calls[0].texts).toEqual(["Optics"]);
    });
  });

  describe("evaluateAnswer", () => {
    it("parses the grade, truncates the reference and stores the answer", async () => {
      llm = fakeLLM(`Score: 8/10\nFeedback: Solid.\nModel answer (grounded): Force is mass times acceleration.\nCitations: ${ids.forces}`);
      const result = await service().evaluateAnswer({
        question: "What is force?",
        answer: "mass times acceleration",
        reference: "x".repeat(700),
      });

      expect(result).toMatchObject({
        score: 8,
        feedback: "Solid.",
        modelAnswer: "Force is mass times acceleration.",
        citations: [ids.forces],
        insufficientMaterial: false,
      });
      expect(result.answerId).not.toBeNull();
      expect(llm.calls[0].options).toEqual({ maxTokens: 512 });
      const prompt = userText(llm.calls[0].messages);
      expect(prompt).toContain(`Instructor reference (optional, may be incomplete): ${"x".repeat(600)}\n\n`);
      expect(prompt).not.toContain("x".repeat(601));
      expect(db.counts().answers).toBe(1);
    });

    it("still returns the grade when storing the answer fails", async () => {
      llm = fakeLLM("Score: 5/10");
      const result = await service().evaluateAnswer({ question: "Q", answer: "A", questionId: "missing" });
      expect(result.score).toBe(5);
      expect(result.answerId).toBeNull();
      expect(console.warn).toHaveBeenCalledWith(expect.stringContaining("storing answer failed"));
    });
  });
});

describe("rankBoosted", () => {
  const item = (id: string, topic: string | null, subject: string, similarity: number) => ({
    lesson: makeLesson({ id, topic, subject }),
    distance: 1 / similarity - 1,
    similarity,
  });

  it("keeps one entry per topic and the best topK by similarity", () => {
    const ranked = rankBoosted(
      [item("a", "Forces", "Physics", 0.6), item("b", "forces ", "Physics", 0.9), item("c", "Cells", "Biology", 0.7), item("d", null, "x", 1)],
      "diagram",
      5
    );
    expect(ranked.map((r) => r.lesson.id)).toEqual(["c", "a"]);
  });

  it("keeps a slot for a non-math lesson on math images", () => {
    const ranked = rankBoosted(
      [item("m1", "Algebra", "Mathematics", 0.5), item("m2", "Geometry", "Math", 0.6), item("p", "Forces", "Physics", 0.4)],
      "math",
      2
    );
    expect(ranked.map((r) => r.lesson.id)).toEqual(["m2", "p"]);
    expect(ranked[0].similarity).toBeCloseTo(0.78, 10);
  });

  it("keeps topK - 1 lessons for handwritten notes", () => {
    const ranked = rankBoosted(
      [item("a", "Forces", "Physics", 0.6), item("b", "Cells", "Biology", 0.9), item("c", "Algebra", "Mathematics", 0.7)],
      "handwritten",
      3
    );
    expect(ranked.map((r) => r.lesson.id)).toEqual(["b", "c"]);
    expect(ranked[1].similarity).toBe(0.7);
  });
});
