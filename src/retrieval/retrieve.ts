import { ValidationError } from "../lib/errors.js";
import { embedOne, type EmbeddingClient } from "../llm/embedding.js";
import type { KnowledgeStore } from "../storage/knowledgeStore.js";
import type { Lesson } from "../storage/types.js";
import { similarityFromDistance } from "../storage/vector.js";

export interface RetrievedLesson {
  lesson: Lesson;
  /** Cosine distance in [0, 2]; smaller is closer. */
  distance: number;
  similarity: number;
}

export interface Retriever {
  retrieve(query: string, k?: number): Promise<RetrievedLesson[]>;
}

export interface RetrieverDeps {
  embedder: EmbeddingClient;
  /** Store handle already bound to the caller's identity. */
  store: KnowledgeStore;
  defaultTopK: number;
}

/**
 * Embed the query, ask the store for the k nearest lessons, and return them closest first.
 * Provider failures and wrong vector lengths surface as EmbeddingUnavailable; nothing is retried.
 */
export function createRetriever(deps: RetrieverDeps): Retriever {
  const { embedder, store, defaultTopK } = deps;

  return {
    async retrieve(query, k = defaultTopK) {
      const text = query.trim();
      if (!text) throw new ValidationError("Query text is required");
      if (!Number.isInteger(k) || k < 1) throw new ValidationError("k must be a positive integer");

      const vector = await embedOne(embedder, text, "search_query", store.dimension);
      const matches = await store.matchLessons(vector, k);

      return matches
        .filter((m) => m.lesson.id)
        .sort((a, b) => a.distance - b.distance)
        .slice(0, k)
        .map((m) => ({
          lesson: m.lesson,
          distance: m.distance,
          similarity: similarityFromDistance(m.distance),
        }));
    },
  };
}
