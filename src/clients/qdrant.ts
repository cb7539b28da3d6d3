import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { withRetries } from "../lib/async.js";
import type { VectorCollectionClient } from "../modules/indexing/chunk-store.js";
import { logInfo } from "../observability/logger.js";
import { createLocalVectorStoreClient, resolveStorePath } from "./local-vector-store.js";

type HealthStatus = "ok" | "error";

export interface QdrantSingleton {
  mode: "qdrant" | "local-file" | "memory";
  client: VectorCollectionClient;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

async function initialize(): Promise<QdrantSingleton> {
  // Without a Qdrant server, local mode keeps vectors in a JSON file and
  // mocked infrastructure keeps them in memory.
  if (process.env.MOCK_INFRA_CLIENTS === "1" || (config.APP_MODE === "local" && !config.QDRANT_URL)) {
    const inMemory = process.env.MOCK_INFRA_CLIENTS === "1";
    const filePath = inMemory ? null : resolveStorePath(config.LOCAL_VECTOR_STORE_FILE);
    const localClient = createLocalVectorStoreClient({ filePath });
    logInfo("clients.qdrant.initialized", {}, { mode: inMemory ? "memory" : "local-file", file_path: filePath });
    return {
      mode: inMemory ? "memory" : "local-file",
      client: localClient,
      async healthCheck() {
        try {
          await localClient.getCollections();
          return { status: "ok", details: inMemory ? "in-memory vector store" : "local file vector store" };
        } catch (error) {
          const details = error instanceof Error ? error.message : "unknown error";
          return { status: "error", details };
        }
      }
    };
  }

  const url = config.QDRANT_URL;
  if (!url) {
    throw new Error("QDRANT_URL is required outside local mode.");
  }

  const client = new QdrantClient({
    url,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(() => client.getCollections(), {
    attempts: REQUEST_RETRIES,
    delayMs: REQUEST_RETRY_DELAY_MS
  });

  logInfo("clients.qdrant.initialized", {}, { mode: "qdrant" });

  return {
    mode: "qdrant",
    client,
    async healthCheck() {
      try {
        await client.collectionExists(config.QDRANT_COLLECTION);
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize();
  }

  try {
    singleton = await initPromise;
  } catch (error) {
    initPromise = null;
    throw error;
  }
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  logInfo("clients.qdrant.shutdown", {});
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
