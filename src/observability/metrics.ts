import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface IngestionCounters {
  documents: number;
  indexedChunks: number;
  skippedChunks: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  ingestionLatency: LatencySummary;
  embeddingLatency: LatencySummary;
  searchLatency: LatencySummary;
  ingestion: IngestionCounters;
  searchOutcomes: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createIngestionCounters = (): IngestionCounters => ({
  documents: 0,
  indexedChunks: 0,
  skippedChunks: 0
});

const state: MetricsState = {
  requestLatency: createLatencySummary(),
  ingestionLatency: createLatencySummary(),
  embeddingLatency: createLatencySummary(),
  searchLatency: createLatencySummary(),
  ingestion: createIngestionCounters(),
  searchOutcomes: {},
  errorRates: {}
};

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordEmbeddingLatency = (durationMs: number): void => {
  recordLatency(state.embeddingLatency, durationMs);
};

export const recordIngestion = (report: {
  durationMs: number;
  indexedChunks: number;
  skippedChunks: number;
}): void => {
  recordLatency(state.ingestionLatency, report.durationMs);
  state.ingestion.documents += 1;
  state.ingestion.indexedChunks += report.indexedChunks;
  state.ingestion.skippedChunks += report.skippedChunks;
};

export const recordSearch = (outcome: string, durationMs: number): void => {
  recordLatency(state.searchLatency, durationMs);
  state.searchOutcomes[outcome] = (state.searchOutcomes[outcome] ?? 0) + 1;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  ingestion_latency: serializeLatency(state.ingestionLatency),
  embedding_latency: serializeLatency(state.embeddingLatency),
  search_latency: serializeLatency(state.searchLatency),
  ingestion: {
    documents: state.ingestion.documents,
    indexed_chunks: state.ingestion.indexedChunks,
    skipped_chunks: state.ingestion.skippedChunks
  },
  search_outcomes: state.searchOutcomes,
  error_rates: state.errorRates
});

export const resetMetrics = (): void => {
  state.requestLatency = createLatencySummary();
  state.ingestionLatency = createLatencySummary();
  state.embeddingLatency = createLatencySummary();
  state.searchLatency = createLatencySummary();
  state.ingestion = createIngestionCounters();
  state.searchOutcomes = {};
  state.errorRates = {};
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });

  app.addHook("onError", async (_request, reply) => {
    recordErrorRate(`http_${reply.statusCode || 500}`);
  });
};
