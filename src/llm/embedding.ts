import { DimensionMismatch, EmbeddingUnavailable } from "../lib/errors.js";

/** `search_document` for stored text, `search_query` for the text being looked up. */
export type EmbeddingInputType = "search_document" | "search_query";

export interface EmbeddingClient {
  readonly model: string;
  embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]>;
}

/**
 * Embed a single text and check the vector length against the store's column dimension.
 * Any provider failure or a wrong length surfaces as EmbeddingUnavailable.
 */
export async function embedOne(
  client: EmbeddingClient,
  text: string,
  inputType: EmbeddingInputType,
  dimension: number
): Promise<number[]> {
  let vectors: number[][];
  try {
    vectors = await client.embed([text], inputType);
  } catch (err) {
    if (err instanceof EmbeddingUnavailable) throw err;
    throw new EmbeddingUnavailable(`Embedding request failed: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  const vector = vectors[0];
  if (!vector || vector.length === 0) throw new EmbeddingUnavailable("Embedding provider returned no vector");
  if (vector.length !== dimension) {
    throw new EmbeddingUnavailable(
      `Embedding model ${client.model} returned ${vector.length} dimensions; the store expects ${dimension}`,
      { cause: new DimensionMismatch(dimension, vector.length) }
    );
  }
  return vector;
}

export function unavailableEmbeddingClient(reason: string): EmbeddingClient {
  return {
    model: "",
    async embed() {
      throw new EmbeddingUnavailable(reason);
    },
  };
}
