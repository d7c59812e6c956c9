import OpenAI from "openai";
import type { AppConfig } from "../lib/config.js";
import { ProviderError } from "../lib/errors.js";
import type { CompletionOptions, LLMClient, LLMContentPart, LLMMessage } from "./client.js";

function textOf(content: LLMMessage["content"]): string {
  if (typeof content === "string") return content;
  return content
    .filter((part): part is Extract<LLMContentPart, { type: "text" }> => part.type === "text")
    .map((part) => part.text)
    .join("\n");
}

function toChatMessage(message: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  if (message.role === "system") return { role: "system", content: textOf(message.content) };
  if (message.role === "assistant") return { role: "assistant", content: textOf(message.content) };
  if (typeof message.content === "string") return { role: "user", content: message.content };
  const parts: OpenAI.Chat.ChatCompletionContentPart[] = message.content.map((part) =>
    part.type === "text"
      ? { type: "text", text: part.text }
      : { type: "image_url", image_url: { url: part.url } }
  );
  return { role: "user", content: parts };
}

/**
 * Mistral chat completions through its OpenAI-compatible endpoint.
 * No retries: provider failures surface to the caller as ProviderError.
 */
export function createMistralClient(config: AppConfig): LLMClient {
  const { mistral, generation } = config;
  if (!mistral.apiKey) throw new Error("MISTRAL_API_KEY is not set");

  const openai = new OpenAI({
    apiKey: mistral.apiKey,
    baseURL: `${mistral.apiUrl}/v1`,
    timeout: mistral.timeoutSeconds * 1000,
    maxRetries: 0,
  });

  return {
    model: mistral.model,
    async complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string> {
      let response: OpenAI.Chat.ChatCompletion;
      try {
        response = await openai.chat.completions.create({
          model: mistral.model,
          messages: messages.map(toChatMessage),
          max_tokens: options?.maxTokens ?? generation.maxTokens,
          temperature: options?.temperature ?? generation.temperature,
          top_p: generation.topP,
          frequency_penalty: generation.frequencyPenalty,
          presence_penalty: generation.presencePenalty,
        });
      } catch (err) {
        const status = err instanceof OpenAI.APIError && err.status ? ` (${err.status})` : "";
        throw new ProviderError(`Generation request failed${status}: ${err instanceof Error ? err.message : String(err)}`, {
          cause: err,
        });
      }
      const content = response.choices[0]?.message?.content;
      if (content == null) throw new ProviderError("Empty LLM response");
      return content;
    },
  };
}
