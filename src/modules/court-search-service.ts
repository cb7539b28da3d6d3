import { mapWithConcurrency } from "../lib/async.js";
import { logInfo, logWarn, serializeError, type CorrelationContext } from "../observability/logger.js";
import {
  buildCourtSuggestion,
  buildJudgeSuggestion,
  CANNED_QUERY_SUGGESTIONS
} from "../prompts/index.js";
import {
  analyze,
  type AnalysisResult,
  type ConversationState,
  type DialogueSettings
} from "./dialogue/dialogue-controller.js";
import {
  DocumentNotFoundError,
  type CourtDocument,
  type DocumentIntake,
  type DocumentRepositoryPort,
  type ListDocumentsInput,
  type ListDocumentsResult,
  type MetadataField,
  type MetadataPatch
} from "./documents/types.js";
import { foldText } from "./extraction/text-normalizer.js";
import type { FacetCache, FacetSnapshot } from "./indexing/facet-cache.js";
import type { HydrationReport, IngestionPipeline, IngestionReport } from "./indexing/ingestion-service.js";
import type { VectorIndex } from "./indexing/vector-index.js";
import type { HybridSearchEngine, SearchOutcome, SearchRequest } from "./search/hybrid-search.js";

export type BatchIngestionItem =
  | { status: "ingested"; documentId: string; report: IngestionReport }
  | { status: "failed"; documentId: string; error: string };

export interface ConversationTurn {
  analysis: AnalysisResult;
  /** Present once the conversation is ready to search. */
  outcome: SearchOutcome | null;
}

export interface ServiceStats {
  documents: number;
  chunks: number;
  dimension: number | null;
  facetValues: Record<MetadataField, number>;
}

export interface ReindexReport {
  documents: number;
  facetValues: Record<MetadataField, number>;
}

export interface CourtSearchServiceDependencies {
  pipeline: IngestionPipeline;
  engine: HybridSearchEngine;
  repository: DocumentRepositoryPort;
  index: VectorIndex;
  facets: FacetCache;
  dialogue: DialogueSettings;
  ingestConcurrency: number;
  now?: () => Date;
}

const DEFAULT_SUGGESTION_LIMIT = 8;
const FACET_SUGGESTIONS_PER_FIELD = 3;

export class CourtSearchService {
  private readonly now: () => Date;

  constructor(private readonly dependencies: CourtSearchServiceDependencies) {
    this.now = dependencies.now ?? (() => new Date());
  }

  ingest(intake: DocumentIntake, context: CorrelationContext = {}): Promise<IngestionReport> {
    return this.dependencies.pipeline.ingest(intake, context);
  }

  /** Ingests several documents with bounded concurrency; one failure does not stop the rest. */
  async ingestMany(intakes: readonly DocumentIntake[], context: CorrelationContext = {}): Promise<BatchIngestionItem[]> {
    return mapWithConcurrency(intakes, this.dependencies.ingestConcurrency, async (intake): Promise<BatchIngestionItem> => {
      try {
        const report = await this.dependencies.pipeline.ingest(intake, context);
        return { status: "ingested", documentId: report.documentId, report };
      } catch (error) {
        logWarn("ingestion.batch.item_failed", { ...context, documentId: intake.documentId }, serializeError(error));
        return {
          status: "failed",
          documentId: intake.documentId,
          error: error instanceof Error ? error.message : "unknown error"
        };
      }
    });
  }

  search(request: SearchRequest, context: CorrelationContext = {}): Promise<SearchOutcome> {
    return this.dependencies.engine.search(request, context);
  }

  facets(): FacetSnapshot {
    return this.dependencies.facets.snapshot();
  }

  analyze(utterance: string, state: ConversationState): AnalysisResult {
    return analyze(utterance, state, {
      facets: this.dependencies.facets,
      settings: this.dependencies.dialogue,
      now: this.now()
    });
  }

  async converse(
    utterance: string,
    state: ConversationState,
    options: { limit?: number; offset?: number } = {},
    context: CorrelationContext = {}
  ): Promise<ConversationTurn> {
    const analysis = this.analyze(utterance, state);
    logInfo("dialogue.analyzed", context, {
      next_state: analysis.nextState.status,
      filter_fields: Object.keys(analysis.filters),
      clarification_field: analysis.clarificationField,
      clarification_rounds: analysis.nextState.clarificationRounds,
      best_effort: analysis.bestEffort
    });
    if (analysis.nextState.status !== "ready-to-search") {
      return { analysis, outcome: null };
    }
    const outcome = await this.search(
      {
        query: analysis.residualQuery,
        filters: analysis.filters,
        limit: options.limit,
        offset: options.offset
      },
      context
    );
    return { analysis, outcome };
  }

  correctMetadata(documentId: string, patch: MetadataPatch, context: CorrelationContext = {}): Promise<CourtDocument> {
    return this.dependencies.pipeline.correctMetadata(documentId, patch, context);
  }

  removeDocument(documentId: string, context: CorrelationContext = {}): Promise<void> {
    return this.dependencies.pipeline.remove(documentId, context);
  }

  async getDocument(documentId: string): Promise<CourtDocument> {
    const document = await this.dependencies.repository.findById(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return document;
  }

  listDocuments(input?: ListDocumentsInput): Promise<ListDocumentsResult> {
    return this.dependencies.repository.list(input);
  }

  /** Rebuilds the facet cache from what the index currently serves. */
  reindex(context: CorrelationContext = {}): ReindexReport {
    const { facets, index } = this.dependencies;
    facets.rebuild(index.snapshot().values());
    const report = { documents: facets.documentCount(), facetValues: this.countFacetValues() };
    logInfo("facets.reindexed", context, { documents: report.documents });
    return report;
  }

  hydrate(context: CorrelationContext = {}): Promise<HydrationReport> {
    return this.dependencies.pipeline.hydrate(context);
  }

  stats(): ServiceStats {
    const indexStats = this.dependencies.index.stats();
    return {
      documents: indexStats.documents,
      chunks: indexStats.chunks,
      dimension: indexStats.dimension,
      facetValues: this.countFacetValues()
    };
  }

  /** Example queries containing `partial`, including ones built from the busiest judges and courts. */
  suggestQueries(partial: string, limit = DEFAULT_SUGGESTION_LIMIT): string[] {
    const { facets } = this.dependencies;
    const busiest = (field: MetadataField): string[] =>
      [...facets.values(field)]
        .sort((left, right) => right.documentCount - left.documentCount)
        .slice(0, FACET_SUGGESTIONS_PER_FIELD)
        .map((entry) => entry.value);

    const suggestions = [
      ...busiest("judge").map(buildJudgeSuggestion),
      ...busiest("courtName").map(buildCourtSuggestion),
      ...CANNED_QUERY_SUGGESTIONS
    ];
    const needle = foldText(partial);
    const seen = new Set<string>();
    const matches: string[] = [];
    for (const suggestion of suggestions) {
      const key = foldText(suggestion);
      if (seen.has(key) || (needle.length > 0 && !key.includes(needle))) {
        continue;
      }
      seen.add(key);
      matches.push(suggestion);
    }
    return matches.slice(0, Math.max(0, limit));
  }

  private countFacetValues(): Record<MetadataField, number> {
    const count = (field: MetadataField): number => this.dependencies.facets.values(field).length;
    return {
      courtName: count("courtName"),
      caseNumber: count("caseNumber"),
      judge: count("judge"),
      clerk: count("clerk"),
      caseType: count("caseType"),
      district: count("district"),
      decisionType: count("decisionType"),
      year: count("year"),
      decisionDate: count("decisionDate"),
      parties: count("parties")
    };
  }
}
