import { once } from "events";
import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createApp } from "../../src/app.js";
import { createMemoryAuthenticator } from "../../src/auth/memoryAuth.js";
import { loadConfig } from "../../src/lib/config.js";
import { createMemoryDatabase } from "../../src/storage/memoryStore.js";
import { base64, fakeEmbedder, fakeLLM, pngBytes } from "../helpers.js";

const SERVICE_KEY = "test-secret";

const sessionResponse = z.object({
  user: z.object({ id: z.string() }),
  session: z.object({ access_token: z.string() }),
});

const lessonResponse = z.object({
  lesson: z.object({ id: z.string(), topic: z.string(), content: z.string() }),
});

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;
  const db = createMemoryDatabase({ dimension: 3 });
  const llm = fakeLLM("Force is [ F = ma ].");

  async function call(method: string, path: string, options: { body?: unknown; token?: string; serviceKey?: string } = {}) {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (options.token) headers.Authorization = `Bearer ${options.token}`;
    if (options.serviceKey) headers["x-service-key"] = options.serviceKey;
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const body: unknown = await res.json();
    return { status: res.status, body };
  }

  async function createLesson(token: string, body: Record<string, unknown>): Promise<string> {
    const res = await call("POST", "/api/v1/lessons", { token, body });
    return lessonResponse.parse(res.body).lesson.id;
  }

  async function signUp(email: string): Promise<{ token: string; userId: string }> {
    const res = await call("POST", "/api/v1/auth/sign-up", { body: { email, password: "test-secret" } });
    const { user, session } = sessionResponse.parse(res.body);
    return { token: session.access_token, userId: user.id };
  }

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const app = createApp({
      config: loadConfig({ PGVECTOR_DIMENSION: "3", TOP_K: "2", SERVICE_API_KEY: SERVICE_KEY }),
      storeFor: db.storeFor,
      auth: createMemoryAuthenticator(),
      llm,
      embedder: fakeEmbedder({ "F = ma": [1, 0, 0], "Cells divide.": [0, 1, 0] }),
      llmConfigured: true,
      embeddingsConfigured: true,
    });
    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    baseUrl = `http://127.0.0.1:${typeof address === "object" && address ? address.port : 0}`;
  });

  afterAll(async () => {
    server.close();
    await once(server, "close");
    vi.restoreAllMocks();
  });

  it("reports health", async () => {
    expect(await call("GET", "/health")).toEqual({
      status: 200,
      body: { status: "healthy", store: "memory", llmConfigured: true, embeddingsConfigured: true },
    });
  });

  it("creates, searches, updates and deletes a lesson for its owner", async () => {
    const { token, userId } = await signUp("owner@example.test");

    const created = await call("POST", "/api/v1/lessons", {
      token,
      body: { topic: "Forces", subject: "Physics", level: "Beginner", content: "F = ma" },
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ lesson: { owner_id: userId, title: "Forces", visibility: "private" } });
    const id = lessonResponse.parse(created.body).lesson.id;

    const search = await call("POST", "/api/v1/search", { token, body: { query: "F = ma", top_k: 1 } });
    expect(search.body).toMatchObject({ results: [{ id, distance: 0, similarity: 1 }] });

    const updated = await call("PUT", `/api/v1/lessons/${id}`, { token, body: { content: "Cells divide." } });
    expect(lessonResponse.parse(updated.body).lesson.content).toBe("Cells divide.");
    const moved = await call("POST", "/api/v1/search", { token, body: { query: "Cells divide.", top_k: 1 } });
    expect(moved.body).toMatchObject({ results: [{ id, distance: 0 }] });

    expect(await call("GET", "/api/v1/subjects", { token })).toEqual({ status: 200, body: { ok: true, subjects: ["Physics"] } });
    expect((await call("GET", "/api/v1/stats", { token })).body).toEqual({
      ok: true,
      total_lessons: 1,
      subjects: { Physics: 1 },
      levels: { Beginner: 1 },
    });

    expect(await call("DELETE", `/api/v1/lessons/${id}`, { token })).toEqual({ status: 200, body: { ok: true, deleted: id } });
    expect((await call("GET", `/api/v1/lessons/${id}`, { token })).status).toBe(404);
  });

  it("keeps lessons private to their owner", async () => {
    const owner = await signUp("first@example.test");
    const other = await signUp("second@example.test");
    const id = await createLesson(owner.token, { topic: "Secret", content: "F = ma" });

    expect((await call("GET", `/api/v1/lessons/${id}`, { token: other.token })).status).toBe(404);
    expect((await call("GET", "/api/v1/lessons", { token: other.token })).body).toEqual({ ok: true, lessons: [] });
    expect(await call("DELETE", `/api/v1/lessons/${id}`, { token: other.token })).toEqual({
      status: 403,
      body: { ok: false, error: `Lesson ${id} belongs to another user`, code: "access_denied" },
    });
    expect((await call("GET", "/api/v1/lessons")).body).toEqual({ ok: true, lessons: [] });
  });

  it("requires sign-in to create lessons", async () => {
    const res = await call("POST", "/api/v1/lessons", { body: { topic: "T", content: "C" } });
    expect(res).toEqual({ status: 401, body: { ok: false, error: "Sign in to manage lessons", code: "unauthorized" } });
  });

  it("rejects an invalid token", async () => {
    expect((await call("GET", "/api/v1/lessons", { token: "bogus" })).status).toBe(401);
  });

  it("validates request bodies", async () => {
    const { token } = await signUp("validator@example.test");
    const res = await call("PUT", "/api/v1/lessons/any", { token, body: { colour: "red" } });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ ok: false, code: "validation_error" });
    expect((await call("POST", "/api/v1/ask", { body: {} })).body).toEqual({
      ok: false,
      error: "Provide a question, an image, or both",
      code: "validation_error",
    });
  });

  it("answers malformed JSON with 400", async () => {
    const res = await fetch(`${baseUrl}/api/v1/search`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, code: "bad_request" });
  });

  it("explains a question with the retrieved sources", async () => {
    const { token } = await signUp("asker@example.test");
    await createLesson(token, { topic: "Forces", content: "F = ma" });
    const res = await call("POST", "/api/v1/ask", {
      token,
      body: { query: "F = ma", image: base64(pngBytes(300, 300)), image_kind: "math" },
    });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      ok: true,
      query: "F = ma",
      answer: "Force is \n\n$$\nF = ma\n$$\n\n.",
      query_id: expect.any(String),
      sources: [{ topic: "Forces", distance: 0 }],
    });
  });

  it("rejects an image that is too small", async () => {
    const res = await call("POST", "/api/v1/ask", { body: { query: "q", image: base64(pngBytes(10, 10)) } });
    expect(res.status).toBe(400);
  });

  describe("protected routes", () => {
    it("require the service key", async () => {
      expect((await call("GET", "/api/v1/protected/logs")).status).toBe(403);
      expect((await call("GET", "/api/v1/protected/logs", { serviceKey: "wrong" })).status).toBe(403);
      const res = await call("GET", "/api/v1/protected/logs", { serviceKey: SERVICE_KEY });
      expect(res).toEqual({ status: 200, body: { ok: true, lines: expect.any(Array) } });
    });

    it("create a lesson for an owner and reject wrong-length embeddings", async () => {
      const { userId, token } = await signUp("service-owner@example.test");
      const created = await call("POST", "/api/v1/protected/lessons", {
        serviceKey: SERVICE_KEY,
        body: { owner_id: userId, topic: "Waves", content: "F = ma" },
      });
      expect(created.status).toBe(201);
      const id = lessonResponse.parse(created.body).lesson.id;
      expect((await call("GET", `/api/v1/lessons/${id}`, { token })).body).toMatchObject({ lesson: { topic: "Waves" } });

      const res = await call("POST", "/api/v1/protected/embeddings", {
        serviceKey: SERVICE_KEY,
        body: { source_table: "lessons", source_id: id, embedding: [1, 2] },
      });
      expect(res).toEqual({
        status: 422,
        body: { ok: false, error: "Expected a vector of 3 dimensions, got 2", code: "dimension_mismatch" },
      });
    });

    it("store an uploaded image in the owner's bucket", async () => {
      const { userId } = await signUp("uploader@example.test");
      const res = await call("POST", "/api/v1/protected/attachments", {
        serviceKey: SERVICE_KEY,
        body: { owner_id: userId, image: base64(pngBytes(300, 300)) },
      });
      expect(res).toMatchObject({
        status: 201,
        body: {
          attachment: {
            owner_id: userId,
            bucket: `user-${userId}`,
            path: expect.stringMatching(/^attachments\/[0-9a-f-]{36}\.png$/),
            metadata: { content_type: "image/png", size: 33 },
          },
        },
      });
    });
  });

  it("filters search candidates before taking the top results", async () => {
    const { token } = await signUp("filter@example.test");
    await createLesson(token, { topic: "Forces", subject: "Physics", level: "Beginner", content: "F = ma" });
    const cells = await createLesson(token, { topic: "Cells", subject: "Biology", level: "Advanced", content: "Cells divide." });

    const unfiltered = await call("POST", "/api/v1/search", { token, body: { query: "F = ma", top_k: 1 } });
    expect(unfiltered.body).toMatchObject({ results: [{ topic: "Forces" }] });

    const bySubject = await call("POST", "/api/v1/search", {
      token,
      body: { query: "F = ma", top_k: 1, subject_filter: "bio" },
    });
    expect(bySubject.body).toMatchObject({ results: [{ id: cells, subject: "Biology", distance: 1, similarity: 0.5 }] });

    const byLevel = await call("POST", "/api/v1/search", {
      token,
      body: { query: "F = ma", top_k: 1, level_filter: "ADV" },
    });
    expect(byLevel.body).toMatchObject({ results: [{ id: cells }] });

    const none = await call("POST", "/api/v1/search", { token, body: { query: "F = ma", subject_filter: "chemistry" } });
    expect(none.body).toEqual({ ok: true, query: "F = ma", results: [] });
  });

  it("answers unknown paths with 404", async () => {
    expect(await call("GET", "/nope")).toEqual({ status: 404, body: { ok: false, error: "Not found", code: "not_found" } });
  });
});
