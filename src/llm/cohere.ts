import OpenAI from "openai";
import type { AppConfig } from "../lib/config.js";
import { EmbeddingUnavailable } from "../lib/errors.js";
import type { EmbeddingClient, EmbeddingInputType } from "./embedding.js";

const MAX_INPUT_CHARS = 8000;
const MAX_BATCH_SIZE = 96;

type CohereEmbeddingParams = OpenAI.EmbeddingCreateParams & { input_type: EmbeddingInputType };

/**
 * Cohere embed models through Cohere's OpenAI-compatible endpoint.
 * v3 models need `input_type`, which the endpoint takes as an extra body field.
 */
export function createCohereEmbeddingClient(config: AppConfig): EmbeddingClient {
  const { cohere } = config;
  if (!cohere.apiKey) throw new Error("COHERE_API_KEY is not set");

  const openai = new OpenAI({ apiKey: cohere.apiKey, baseURL: cohere.apiUrl, maxRetries: 0 });

  return {
    model: cohere.model,
    async embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
      const out: number[][] = [];
      for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
        const batch = texts.slice(i, i + MAX_BATCH_SIZE).map((t) => t.slice(0, MAX_INPUT_CHARS));
        const params: CohereEmbeddingParams = {
          model: cohere.model,
          input: batch,
          encoding_format: "float",
          input_type: inputType,
        };
        let response: OpenAI.CreateEmbeddingResponse;
        try {
          response = await openai.embeddings.create(params);
        } catch (err) {
          throw new EmbeddingUnavailable(
            `Cohere embed request failed: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err }
          );
        }
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        if (ordered.length !== batch.length) {
          throw new EmbeddingUnavailable(`Cohere returned ${ordered.length} embeddings for ${batch.length} inputs`);
        }
        for (const item of ordered) out.push(item.embedding);
      }
      return out;
    },
  };
}
