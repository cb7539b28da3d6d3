import { getOpenAIClient } from "../clients/openai.js";
import { isPostgresConfigured } from "../clients/postgres.js";
import { getQdrantClient } from "../clients/qdrant.js";
import { config, type Config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { CourtSearchService } from "./court-search-service.js";
import { PostgresDocumentRepository } from "./documents/document-repository.js";
import { InMemoryDocumentRepository } from "./documents/in-memory-document-repository.js";
import type { DocumentRepositoryPort } from "./documents/types.js";
import { QdrantChunkStore, type ChunkStorePort } from "./indexing/chunk-store.js";
import type { EmbeddingFunction } from "./indexing/embedding.js";
import { FacetCache } from "./indexing/facet-cache.js";
import { IngestionPipeline } from "./indexing/ingestion-service.js";
import { InMemoryVectorIndex, type VectorIndex } from "./indexing/vector-index.js";
import { HybridSearchEngine } from "./search/hybrid-search.js";

export interface CourtSearchComponents {
  repository: DocumentRepositoryPort;
  chunkStore: ChunkStorePort;
  embed: EmbeddingFunction;
  index?: VectorIndex;
  facets?: FacetCache;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/** Wires the pipeline, the engine and the dialogue settings around shared index state. */
export function assembleCourtSearchService(
  components: CourtSearchComponents,
  settings: Config = config
): CourtSearchService {
  const index = components.index ?? new InMemoryVectorIndex();
  const facets = components.facets ?? new FacetCache();

  const pipeline = new IngestionPipeline({
    repository: components.repository,
    chunkStore: components.chunkStore,
    index,
    facets,
    embed: components.embed,
    now: components.now,
    sleep: components.sleep,
    settings: {
      maxChars: settings.CHUNK_MAX_CHARS,
      overlapChars: settings.CHUNK_OVERLAP_CHARS,
      embeddingTimeoutMs: settings.EMBEDDING_TIMEOUT_MS,
      embeddingMaxAttempts: settings.EMBEDDING_MAX_ATTEMPTS,
      embeddingConcurrency: settings.EMBEDDING_CONCURRENCY
    }
  });

  const engine = new HybridSearchEngine({
    index,
    embedQuery: components.embed,
    settings: {
      minRelevance: settings.SEARCH_MIN_RELEVANCE,
      timeoutMs: settings.SEARCH_TIMEOUT_MS,
      defaultLimit: settings.SEARCH_DEFAULT_LIMIT
    }
  });

  return new CourtSearchService({
    pipeline,
    engine,
    repository: components.repository,
    index,
    facets,
    now: components.now,
    ingestConcurrency: settings.INGEST_CONCURRENCY,
    dialogue: {
      maxClarificationRounds: settings.CLARIFICATION_MAX_ROUNDS,
      ambiguityThreshold: settings.AMBIGUITY_THRESHOLD
    }
  });
}

let singleton: CourtSearchService | null = null;
let initPromise: Promise<CourtSearchService> | null = null;

async function initialize(): Promise<CourtSearchService> {
  const [openai, qdrant] = await Promise.all([getOpenAIClient(), getQdrantClient()]);
  const usePostgres = isPostgresConfigured();
  const repository = usePostgres ? new PostgresDocumentRepository() : new InMemoryDocumentRepository();

  logInfo("service.initialized", {}, {
    repository: usePostgres ? "postgres" : "memory",
    vector_store: qdrant.mode,
    embeddings: openai.mode
  });

  return assembleCourtSearchService({
    repository,
    chunkStore: new QdrantChunkStore(qdrant.client, config.QDRANT_COLLECTION),
    embed: openai.embed
  });
}

export async function getCourtSearchService(): Promise<CourtSearchService> {
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

export function resetCourtSearchServiceForTests(): void {
  singleton = null;
  initPromise = null;
}
