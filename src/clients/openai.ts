import OpenAI from "openai";
import { config } from "../config/index.js";
import { withRetries, withTimeout } from "../lib/async.js";
import { tokenize } from "../modules/extraction/text-normalizer.js";
import type { EmbeddingFunction } from "../modules/indexing/embedding.js";
import { logInfo } from "../observability/logger.js";

type HealthStatus = "ok" | "error";

export interface OpenAISingleton {
  mode: "openai" | "hashing";
  embed: EmbeddingFunction;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const HEALTH_TIMEOUT_MS = 7000;
const HEALTH_RETRIES = 2;
const HEALTH_RETRY_DELAY_MS = 300;
export const HASHING_EMBEDDING_DIMENSION = 256;

let singleton: OpenAISingleton | null = null;

const useHashingEmbeddings = (): boolean =>
  process.env.MOCK_INFRA_CLIENTS === "1" || (config.APP_MODE === "local" && !config.OPENAI_API_KEY);

const fnv1a = (value: string): number => {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

/**
 * Deterministic signed bag-of-words vectors. Lets local runs and mocked
 * infrastructure index and search without an embedding provider.
 */
export const hashingEmbedding: EmbeddingFunction = async (text) => {
  const vector = new Array<number>(HASHING_EMBEDDING_DIMENSION).fill(0);
  for (const token of tokenize(text)) {
    const hash = fnv1a(token);
    const slot = hash % HASHING_EMBEDDING_DIMENSION;
    vector[slot] = (vector[slot] ?? 0) + ((hash & 0x80000000) === 0 ? 1 : -1);
  }
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    vector[0] = 1;
    return vector;
  }
  return vector.map((value) => value / norm);
};

function initialize(): OpenAISingleton {
  if (useHashingEmbeddings()) {
    logInfo("clients.openai.initialized", {}, { mode: "hashing", dimension: HASHING_EMBEDDING_DIMENSION });
    return {
      mode: "hashing",
      embed: hashingEmbedding,
      async healthCheck() {
        return { status: "ok", details: "local hashing embeddings" };
      }
    };
  }

  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    // Retries and per-call deadlines are applied by the ingestion pipeline.
    maxRetries: 0,
    timeout: config.EMBEDDING_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {}, { mode: "openai", model: config.OPENAI_EMBEDDING_MODEL });

  return {
    mode: "openai",
    async embed(text, signal) {
      const response = await client.embeddings.create(
        { model: config.OPENAI_EMBEDDING_MODEL, input: text },
        { signal }
      );
      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new Error("Embedding response missing vector payload.");
      }
      return embedding;
    },
    async healthCheck() {
      try {
        await withRetries(
          () =>
            withTimeout(async (signal) => {
              await client.models.retrieve(config.OPENAI_EMBEDDING_MODEL, { signal });
            }, HEALTH_TIMEOUT_MS),
          { attempts: HEALTH_RETRIES, delayMs: HEALTH_RETRY_DELAY_MS }
        );
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
