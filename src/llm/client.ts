import { ProviderError } from "../lib/errors.js";

/**
 * Generic chat completion interface so the generation provider can be swapped.
 */
export type LLMContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; url: string };

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string | LLMContentPart[];
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface LLMClient {
  readonly model: string;
  complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string>;
}

/** Stand-in used when no generation provider is configured; every call fails with 503. */
export function unavailableLLMClient(reason: string): LLMClient {
  return {
    model: "",
    async complete() {
      throw new ProviderError(reason, { code: "llm_unavailable", status: 503 });
    },
  };
}
