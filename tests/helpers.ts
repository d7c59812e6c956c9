import type { CompletionOptions, LLMClient, LLMMessage } from "../src/llm/client.js";
import type { EmbeddingClient, EmbeddingInputType } from "../src/llm/embedding.js";
import type { Identity, Lesson } from "../src/storage/types.js";

export const DIM = 3;

export function user(userId: string): Identity {
  return { kind: "user", userId, accessToken: `token-${userId}` };
}

export const ALICE = "11111111-1111-4111-8111-111111111111";
export const BOB = "22222222-2222-4222-8222-222222222222";

export interface FakeEmbedder extends EmbeddingClient {
  calls: { texts: string[]; inputType: EmbeddingInputType }[];
  fail: Error | null;
}

/** Vectors come from `vectors` by exact text; unknown text maps to [1, 1, 1]. */
export function fakeEmbedder(vectors: Record<string, number[]> = {}, dimension = DIM): FakeEmbedder {
  const embedder: FakeEmbedder = {
    model: "fake-embed",
    calls: [],
    fail: null,
    async embed(texts, inputType) {
      embedder.calls.push({ texts, inputType });
      if (embedder.fail) throw embedder.fail;
      return texts.map((t) => vectors[t] ?? new Array<number>(dimension).fill(1));
    },
  };
  return embedder;
}

export interface FakeLLM extends LLMClient {
  calls: { messages: LLMMessage[]; options?: CompletionOptions }[];
}

export function fakeLLM(reply: string | ((messages: LLMMessage[]) => string)): FakeLLM {
  const llm: FakeLLM = {
    model: "fake-model",
    calls: [],
    async complete(messages, options) {
      llm.calls.push({ messages, options });
      return typeof reply === "string" ? reply : reply(messages);
    },
  };
  return llm;
}

/** Text of the last user message, joining its text parts. */
export function userText(messages: LLMMessage[]): string {
  const last = messages[messages.length - 1];
  if (typeof last.content === "string") return last.content;
  return last.content.map((p) => (p.type === "text" ? p.text : `[image ${p.url.slice(0, 22)}]`)).join("\n");
}

export function makeLesson(overrides: Partial<Lesson> = {}): Lesson {
  return {
    id: "L1",
    ownerId: ALICE,
    title: "Forces",
    topic: "Forces",
    subject: "Physics",
    level: "Beginner",
    content: "Force equals mass times acceleration.",
    visibility: "private",
    createdAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

/** Minimal PNG: signature plus an IHDR chunk carrying the size. */
export function pngBytes(width: number, height: number): Uint8Array {
  const bytes = new Uint8Array(33);
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 13, 0x49, 0x48, 0x44, 0x52]);
  new DataView(bytes.buffer).setUint32(16, width);
  new DataView(bytes.buffer).setUint32(20, height);
  return bytes;
}

export function base64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}
