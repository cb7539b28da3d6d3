import { TimeoutError, withTimeout } from "../../lib/async.js";
import { logInfo, type CorrelationContext } from "../../observability/logger.js";
import { recordSearch } from "../../observability/metrics.js";
import { isMetadataField, readMetadataValues, type MetadataField, type MetadataRecord } from "../documents/types.js";
import { foldText } from "../extraction/text-normalizer.js";
import {
  QueryEmbeddingError,
  validateEmbedding,
  type EmbeddingFunction
} from "../indexing/embedding.js";
import { cosineSimilarity, type IndexedDocument, type VectorIndex } from "../indexing/vector-index.js";

export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 100;
export const AMBIGUITY_PENALTY = 0.05;
const EXCERPT_MAX_CHARS = 320;

export type SearchFilters = Partial<Record<MetadataField, string>>;

export interface SearchRequest {
  query: string;
  filters?: SearchFilters;
  limit?: number;
  offset?: number;
}

export interface SearchHit {
  documentId: string;
  chunkId: string | null;
  excerpt: string;
  metadata: MetadataRecord;
  /** Composite score for semantic results; null when browsing. */
  score: number | null;
  partiallyAmbiguous: boolean;
}

export type SearchOutcome =
  | {
      status: "ok";
      mode: "semantic" | "browse";
      hits: SearchHit[];
      totalMatches: number;
      elapsedMs: number;
    }
  | { status: "no_results"; elapsedMs: number }
  | { status: "no_relevant_results"; bestScore: number | null; elapsedMs: number }
  | { status: "timeout"; elapsedMs: number; budgetMs: number };

export type SearchStatus = SearchOutcome["status"];

export interface SearchSettings {
  minRelevance: number;
  timeoutMs: number;
  defaultLimit?: number;
  ambiguityPenalty?: number;
}

export interface HybridSearchDependencies {
  index: VectorIndex;
  embedQuery: EmbeddingFunction;
  settings: SearchSettings;
  now?: () => number;
  recordSearch?: typeof recordSearch;
  logInfo?: typeof logInfo;
}

const resolveDependencies = (dependencies: HybridSearchDependencies) => ({
  index: dependencies.index,
  embedQuery: dependencies.embedQuery,
  minRelevance: dependencies.settings.minRelevance,
  timeoutMs: dependencies.settings.timeoutMs,
  defaultLimit: dependencies.settings.defaultLimit ?? DEFAULT_SEARCH_LIMIT,
  ambiguityPenalty: dependencies.settings.ambiguityPenalty ?? AMBIGUITY_PENALTY,
  now: dependencies.now ?? Date.now,
  recordSearch: dependencies.recordSearch ?? recordSearch,
  logInfo: dependencies.logInfo ?? logInfo
});

type ResolvedDependencies = ReturnType<typeof resolveDependencies>;

/** Conjunction over fields; a multi-valued field matches when any of its values does. */
export const matchesFilters = (metadata: MetadataRecord, filters: SearchFilters): boolean => {
  for (const [field, expected] of Object.entries(filters)) {
    if (expected === undefined) {
      continue;
    }
    const key = foldText(expected);
    if (key.length === 0) {
      continue;
    }
    if (!isMetadataField(field)) {
      return false;
    }
    const values = readMetadataValues(metadata, field).map(foldText);
    if (!values.includes(key)) {
      return false;
    }
  }
  return true;
};

export const clampLimit = (limit: number | undefined, defaultLimit: number): number => {
  if (limit === undefined || !Number.isFinite(limit)) {
    return defaultLimit;
  }
  return Math.max(1, Math.min(MAX_SEARCH_LIMIT, Math.trunc(limit)));
};

const clampOffset = (offset: number | undefined): number =>
  offset === undefined || !Number.isFinite(offset) ? 0 : Math.max(0, Math.trunc(offset));

const compareIds = (left: string, right: string): number => (left < right ? -1 : left > right ? 1 : 0);

/** Decision date when known, otherwise the year's first day; unknown sorts last. */
export const recencyKey = (metadata: MetadataRecord): string | null => {
  if (metadata.decisionDate) {
    return metadata.decisionDate;
  }
  return metadata.year ? `${metadata.year}-00-00` : null;
};

export const compareByRecency = (left: IndexedDocument, right: IndexedDocument): number => {
  const leftKey = recencyKey(left.metadata);
  const rightKey = recencyKey(right.metadata);
  if (leftKey !== rightKey) {
    if (leftKey === null) {
      return 1;
    }
    if (rightKey === null) {
      return -1;
    }
    return leftKey < rightKey ? 1 : -1;
  }
  return compareIds(left.documentId, right.documentId);
};

export const buildExcerpt = (text: string): string => {
  if (text.length <= EXCERPT_MAX_CHARS) {
    return text;
  }
  const cut = text.slice(0, EXCERPT_MAX_CHARS);
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > EXCERPT_MAX_CHARS / 2 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
};

const browse = (candidates: IndexedDocument[]): SearchHit[] =>
  [...candidates].sort(compareByRecency).map((unit) => {
    const first = unit.chunks[0];
    return {
      documentId: unit.documentId,
      chunkId: first?.chunkId ?? null,
      excerpt: first ? buildExcerpt(first.text) : "",
      metadata: unit.metadata,
      score: null,
      partiallyAmbiguous: unit.metadata.partiallyAmbiguous
    };
  });

interface RankedHits {
  hits: SearchHit[];
  bestScore: number | null;
}

const rank = (candidates: IndexedDocument[], queryVector: readonly number[], deps: ResolvedDependencies): RankedHits => {
  let bestScore: number | null = null;
  const hits: SearchHit[] = [];

  for (const unit of candidates) {
    let bestChunk: { chunkId: string; text: string; similarity: number } | null = null;
    for (const chunk of unit.chunks) {
      const similarity = cosineSimilarity(queryVector, chunk.embedding);
      if (bestScore === null || similarity > bestScore) {
        bestScore = similarity;
      }
      if (similarity < deps.minRelevance) {
        continue;
      }
      if (!bestChunk || similarity > bestChunk.similarity) {
        bestChunk = { chunkId: chunk.chunkId, text: chunk.text, similarity };
      }
    }
    if (!bestChunk) {
      continue;
    }
    const penalty = unit.metadata.partiallyAmbiguous ? deps.ambiguityPenalty : 0;
    hits.push({
      documentId: unit.documentId,
      chunkId: bestChunk.chunkId,
      excerpt: buildExcerpt(bestChunk.text),
      metadata: unit.metadata,
      score: bestChunk.similarity - penalty,
      partiallyAmbiguous: unit.metadata.partiallyAmbiguous
    });
  }

  hits.sort((left, right) => (right.score ?? 0) - (left.score ?? 0) || compareIds(left.documentId, right.documentId));
  return { hits, bestScore };
};

/**
 * Filters first, then ranks by semantic similarity (or recency for an empty
 * query). Never widens the filter set when nothing matches.
 */
export class HybridSearchEngine {
  private readonly deps: ResolvedDependencies;

  constructor(dependencies: HybridSearchDependencies) {
    this.deps = resolveDependencies(dependencies);
  }

  async search(request: SearchRequest, context: CorrelationContext = {}): Promise<SearchOutcome> {
    const startedAt = this.deps.now();
    const outcome = await this.execute(request, startedAt);
    this.deps.recordSearch(outcome.status, outcome.elapsedMs);
    this.deps.logInfo("search.completed", context, {
      status: outcome.status,
      mode: outcome.status === "ok" ? outcome.mode : null,
      hits: outcome.status === "ok" ? outcome.hits.length : 0,
      filter_fields: Object.keys(request.filters ?? {}),
      elapsed_ms: outcome.elapsedMs
    });
    return outcome;
  }

  private async execute(request: SearchRequest, startedAt: number): Promise<SearchOutcome> {
    const elapsed = (): number => Math.max(0, this.deps.now() - startedAt);
    const filters = request.filters ?? {};
    const limit = clampLimit(request.limit, this.deps.defaultLimit);
    const offset = clampOffset(request.offset);

    // One snapshot for the whole query; concurrent publishes are not observed.
    const snapshot = this.deps.index.snapshot();
    const candidates = [...snapshot.values()].filter((unit) => matchesFilters(unit.metadata, filters));
    if (candidates.length === 0) {
      return { status: "no_results", elapsedMs: elapsed() };
    }

    const query = request.query.trim();
    if (query.length === 0) {
      const hits = browse(candidates);
      return {
        status: "ok",
        mode: "browse",
        hits: hits.slice(offset, offset + limit),
        totalMatches: hits.length,
        elapsedMs: elapsed()
      };
    }

    if (!candidates.some((unit) => unit.chunks.length > 0)) {
      return { status: "no_relevant_results", bestScore: null, elapsedMs: elapsed() };
    }

    let queryVector: number[];
    try {
      const remainingMs = Math.max(1, this.deps.timeoutMs - elapsed());
      const vector = await withTimeout((signal) => this.deps.embedQuery(query, signal), remainingMs);
      queryVector = validateEmbedding(vector, this.deps.index.dimension());
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { status: "timeout", elapsedMs: elapsed(), budgetMs: this.deps.timeoutMs };
      }
      const reason = error instanceof Error ? error.message : "unknown error";
      throw new QueryEmbeddingError(`Query embedding failed: ${reason}`, { cause: error });
    }

    const ranked = rank(candidates, queryVector, this.deps);
    if (elapsed() > this.deps.timeoutMs) {
      return { status: "timeout", elapsedMs: elapsed(), budgetMs: this.deps.timeoutMs };
    }
    if (ranked.hits.length === 0) {
      return { status: "no_relevant_results", bestScore: ranked.bestScore, elapsedMs: elapsed() };
    }

    return {
      status: "ok",
      mode: "semantic",
      hits: ranked.hits.slice(offset, offset + limit),
      totalMatches: ranked.hits.length,
      elapsedMs: elapsed()
    };
  }
}
