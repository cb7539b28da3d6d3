import { env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, parseEnv } from "./env.js";
export { env };

export type Config = Readonly<typeof env>;
export const config: Config = Object.freeze({ ...env });

/** Settings worth logging at boot; connection strings and keys are reduced to presence flags. */
export const describeConfig = (settings: Config): Record<string, unknown> => ({
  mode: settings.APP_MODE,
  embeddings: settings.OPENAI_API_KEY ? settings.OPENAI_EMBEDDING_MODEL : "hashing",
  postgres_configured: Boolean(settings.POSTGRES_URL),
  vector_store: settings.QDRANT_URL ? "qdrant" : "local",
  collection: settings.QDRANT_COLLECTION,
  chunking: { max_chars: settings.CHUNK_MAX_CHARS, overlap_chars: settings.CHUNK_OVERLAP_CHARS },
  search: {
    min_relevance: settings.SEARCH_MIN_RELEVANCE,
    default_limit: settings.SEARCH_DEFAULT_LIMIT,
    timeout_ms: settings.SEARCH_TIMEOUT_MS
  },
  clarification: { max_rounds: settings.CLARIFICATION_MAX_ROUNDS, threshold: settings.AMBIGUITY_THRESHOLD }
});
