import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { existsSync } from "fs";
import { createApp } from "./app.js";
import type { Authenticator } from "./auth/authenticator.js";
import { createMemoryAuthenticator } from "./auth/memoryAuth.js";
import { createSupabaseAuthenticator } from "./auth/supabaseAuth.js";
import { loadConfig, type AppConfig } from "./lib/config.js";
import { createLogger } from "./lib/log.js";
import { unavailableLLMClient } from "./llm/client.js";
import { createCohereEmbeddingClient } from "./llm/cohere.js";
import { unavailableEmbeddingClient } from "./llm/embedding.js";
import { createMistralClient } from "./llm/mistral.js";
import type { StoreFactory } from "./storage/knowledgeStore.js";
import { createMemoryDatabase } from "./storage/memoryStore.js";
import { createSupabaseBackend, supabaseOptionsFromConfig } from "./storage/supabaseStore.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const log = createLogger("server");

function findEnvPath(startDir: string): string {
  // src/ under tsx, dist/src/ after a build
  const candidates = [path.resolve(startDir, "..", ".env"), path.resolve(startDir, "..", "..", ".env")];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  return path.resolve(startDir, "..", ".env");
}

function createBackend(config: AppConfig): { storeFor: StoreFactory; auth: Authenticator } {
  if (config.storeBackend === "supabase") {
    const backend = createSupabaseBackend(supabaseOptionsFromConfig(config));
    if (!backend.serviceClient) log.warn("SUPABASE_SERVICE_ROLE_KEY is not set; embeddings and uploads use the caller's client.");
    return { storeFor: backend.storeFor, auth: createSupabaseAuthenticator(backend.anonClient) };
  }
  log.warn("No Supabase configured; using the in-memory store. Data is lost on restart.");
  const db = createMemoryDatabase({ dimension: config.embeddingDimension });
  return { storeFor: db.storeFor, auth: createMemoryAuthenticator() };
}

dotenv.config({ path: findEnvPath(__dirname) });
const config = loadConfig();
const { storeFor, auth } = createBackend(config);

const llmConfigured = config.mistral.apiKey !== null;
const embeddingsConfigured = config.cohere.apiKey !== null;
if (!llmConfigured) log.warn("MISTRAL_API_KEY is not set. Add it to .env to enable explanations and grading.");
if (!embeddingsConfigured) log.warn("COHERE_API_KEY is not set. Add it to .env to enable search and lesson indexing.");

const app = createApp({
  config,
  storeFor,
  auth,
  llm: llmConfigured ? createMistralClient(config) : unavailableLLMClient("Generation provider is not configured (MISTRAL_API_KEY)"),
  embedder: embeddingsConfigured
    ? createCohereEmbeddingClient(config)
    : unavailableEmbeddingClient("Embedding provider is not configured (COHERE_API_KEY)"),
  llmConfigured,
  embeddingsConfigured,
});

app.listen(config.port, () => {
  log.info(`Learning coach API at http://localhost:${config.port} (store: ${config.storeBackend}, search: ${config.searchMode})`);
});
