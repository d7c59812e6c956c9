import { z } from "zod";

export type StoreBackend = "supabase" | "memory";
export type VectorSearchMode = "approximate" | "exact";

export interface AppConfig {
  port: number;
  topK: number;
  generation: {
    temperature: number;
    topP: number;
    maxTokens: number;
    frequencyPenalty: number;
    presencePenalty: number;
  };
  images: {
    minPixels: number;
    maxPixels: number;
    maxBytes: number;
  };
  mistral: {
    apiUrl: string;
    apiKey: string | null;
    model: string;
    timeoutSeconds: number;
  };
  cohere: {
    apiUrl: string;
    apiKey: string | null;
    model: string;
  };
  embeddingDimension: number;
  searchMode: VectorSearchMode;
  storeBackend: StoreBackend;
  supabase: {
    url: string | null;
    anonKey: string | null;
    serviceRoleKey: string | null;
    storageBucket: string;
  };
  serviceKey: string | null;
}

const flag = z
  .string()
  .trim()
  .transform((v) => ["1", "true", "yes"].includes(v.toLowerCase()));

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : null));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  TOP_K: z.coerce.number().int().positive().default(3),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  TOP_P: z.coerce.number().gt(0).max(1).default(0.9),
  MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  DO_SAMPLE: flag.default("true"),
  FREQUENCY_PENALTY: z.coerce.number().min(-2).max(2).default(0),
  PRESENCE_PENALTY: z.coerce.number().min(-2).max(2).default(0),
  MIN_PIXELS: z.coerce.number().int().positive().default(224 * 224),
  MAX_PIXELS: z.coerce.number().int().positive().default(1280 * 1280),
  MISTRAL_API_URL: z.string().url().default("https://api.mistral.ai"),
  MISTRAL_API_KEY: optionalString,
  MODEL_NAME: z.string().min(1).default("mistral-medium-2508"),
  MISTRAL_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(60),
  MISTRAL_IMAGE_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  COHERE_API_URL: z.string().url().default("https://api.cohere.ai/compatibility/v1"),
  COHERE_API_KEY: optionalString,
  COHERE_MODEL: z.string().min(1).default("embed-multilingual-light-v3.0"),
  PGVECTOR_DIMENSION: z.coerce.number().int().positive().default(384),
  VECTOR_SEARCH_MODE: z.enum(["approximate", "exact"]).default("approximate"),
  STORE_BACKEND: z.enum(["supabase", "memory"]).optional(),
  SUPABASE_URL: optionalString,
  SUPABASE_ANON_KEY: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  SUPABASE_STORAGE_BUCKET: z.string().min(1).default("attachments"),
  SERVICE_API_KEY: optionalString,
});

/**
 * Build the typed config from environment variables. Blank values count as unset.
 * Throws with the offending variable names when a value does not parse.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  const e = parsed.data;

  const storeBackend: StoreBackend = e.STORE_BACKEND ?? (e.SUPABASE_URL ? "supabase" : "memory");
  if (storeBackend === "supabase" && (!e.SUPABASE_URL || !e.SUPABASE_ANON_KEY)) {
    throw new Error("Invalid configuration: STORE_BACKEND=supabase needs SUPABASE_URL and SUPABASE_ANON_KEY");
  }

  return {
    port: e.PORT,
    topK: e.TOP_K,
    generation: {
      temperature: e.DO_SAMPLE ? e.TEMPERATURE : 0,
      topP: e.TOP_P,
      maxTokens: e.MAX_TOKENS,
      frequencyPenalty: e.FREQUENCY_PENALTY,
      presencePenalty: e.PRESENCE_PENALTY,
    },
    images: {
      minPixels: e.MIN_PIXELS,
      maxPixels: e.MAX_PIXELS,
      maxBytes: e.MISTRAL_IMAGE_MAX_BYTES,
    },
    mistral: {
      apiUrl: e.MISTRAL_API_URL.replace(/\/+$/, ""),
      apiKey: e.MISTRAL_API_KEY,
      model: e.MODEL_NAME,
      timeoutSeconds: e.MISTRAL_TIMEOUT_SECONDS,
    },
    cohere: {
      apiUrl: e.COHERE_API_URL.replace(/\/+$/, ""),
      apiKey: e.COHERE_API_KEY,
      model: e.COHERE_MODEL,
    },
    embeddingDimension: e.PGVECTOR_DIMENSION,
    searchMode: e.VECTOR_SEARCH_MODE,
    storeBackend,
    supabase: {
      url: e.SUPABASE_URL,
      anonKey: e.SUPABASE_ANON_KEY,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      storageBucket: e.SUPABASE_STORAGE_BUCKET,
    },
    serviceKey: e.SERVICE_API_KEY ?? e.SUPABASE_SERVICE_ROLE_KEY,
  };
}
