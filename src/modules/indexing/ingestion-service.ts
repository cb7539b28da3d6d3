import { randomUUID } from "node:crypto";
import { KeyedMutex, mapWithConcurrency } from "../../lib/async.js";
import {
  logDebug,
  logInfo,
  logWarn,
  serializeError,
  type CorrelationContext
} from "../../observability/logger.js";
import { recordEmbeddingLatency, recordIngestion } from "../../observability/metrics.js";
import {
  DocumentNotFoundError,
  SCALAR_METADATA_FIELDS,
  type CourtDocument,
  type DocumentIntake,
  type DocumentRepositoryPort,
  type MetadataPatch,
  type MetadataRecord
} from "../documents/types.js";
import { extractMetadata, reconcileMetadata } from "../extraction/metadata-extractor.js";
import { normalizeText } from "../extraction/text-normalizer.js";
import type { ChunkStorePort } from "./chunk-store.js";
import { chunkText, type TextChunk } from "./chunker.js";
import { EmbeddingError, embedWithRetry, type EmbeddingFunction } from "./embedding.js";
import type { FacetCache } from "./facet-cache.js";
import { buildChunkId, createIndexedDocument, type VectorIndex } from "./vector-index.js";

export interface IngestionSettings {
  maxChars: number;
  overlapChars: number;
  embeddingTimeoutMs: number;
  embeddingMaxAttempts: number;
  embeddingConcurrency: number;
  embeddingRetryDelayMs?: number;
}

export interface IngestionReport {
  documentId: string;
  indexedChunks: number;
  skippedChunks: number;
  warnings: string[];
  metadata: MetadataRecord;
  replacedPrevious: boolean;
}

export interface HydrationReport {
  documents: number;
  chunks: number;
  failedDocuments: string[];
}

export interface IngestionDependencies {
  repository: DocumentRepositoryPort;
  chunkStore: ChunkStorePort;
  index: VectorIndex;
  facets: FacetCache;
  embed: EmbeddingFunction;
  settings: IngestionSettings;
  now?: () => Date;
  createGeneration?: () => string;
  sleep?: (ms: number) => Promise<void>;
}

interface EmbeddedChunk extends TextChunk {
  embedding: number[];
}

const HYDRATION_PAGE_SIZE = 100;

const trimToNull = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

/**
 * Applies a manual correction. A corrected year or date drops the earlier
 * conflict flag, then the merged record goes through the same year/date
 * reconciliation as extraction, so a conflict the correction introduces is flagged again.
 */
export const applyMetadataPatch = (metadata: MetadataRecord, patch: MetadataPatch, now: Date): MetadataRecord => {
  const next: MetadataRecord = { ...metadata, ambiguities: [...metadata.ambiguities] };
  for (const field of SCALAR_METADATA_FIELDS) {
    if (!(field in patch)) {
      continue;
    }
    if (field === "decisionType") {
      next.decisionType = patch.decisionType ?? null;
    } else {
      next[field] = trimToNull(patch[field]);
    }
  }
  if ("parties" in patch) {
    const parties = (patch.parties ?? []).map((party) => party.trim()).filter((party) => party.length > 0);
    next.parties = parties.length > 0 ? parties : null;
  }
  if ("year" in patch || "decisionDate" in patch) {
    next.ambiguities = next.ambiguities.filter((field) => field !== "year");
  }
  return reconcileMetadata(next, now);
};

/**
 * Owns every write to the index, the chunk store, the document repository
 * and the facet cache. Writes for one document id are serialized; different
 * ids proceed concurrently.
 */
export class IngestionPipeline {
  private readonly locks = new KeyedMutex();
  private readonly now: () => Date;
  private readonly createGeneration: () => string;

  constructor(private readonly dependencies: IngestionDependencies) {
    this.now = dependencies.now ?? (() => new Date());
    this.createGeneration = dependencies.createGeneration ?? randomUUID;
  }

  async ingest(intake: DocumentIntake, context: CorrelationContext = {}): Promise<IngestionReport> {
    const documentId = intake.documentId.trim();
    if (!documentId) {
      throw new Error("documentId is required");
    }
    return this.locks.runExclusive(documentId, () =>
      this.ingestExclusive({ ...intake, documentId }, { ...context, documentId })
    );
  }

  private async embedChunks(
    documentId: string,
    chunks: readonly TextChunk[],
    context: CorrelationContext,
    warnings: string[]
  ): Promise<EmbeddedChunk[]> {
    const { embed, settings, index } = this.dependencies;
    let dimension = index.dimension();

    const results = await mapWithConcurrency(chunks, settings.embeddingConcurrency, async (chunk) => {
      const chunkId = buildChunkId(documentId, chunk.sequence);
      const startedAt = Date.now();
      try {
        const embedding = await embedWithRetry(embed, chunk.text, {
          timeoutMs: settings.embeddingTimeoutMs,
          maxAttempts: settings.embeddingMaxAttempts,
          retryDelayMs: settings.embeddingRetryDelayMs,
          expectedDimension: () => dimension,
          sleep: this.dependencies.sleep,
          onAttemptFailed: (error, attempt) => {
            logDebug("ingestion.embedding.attempt_failed", context, {
              chunk_id: chunkId,
              attempt,
              ...serializeError(error)
            });
          }
        });
        recordEmbeddingLatency(Date.now() - startedAt);
        dimension ??= embedding.length;
        return { ...chunk, embedding };
      } catch (error) {
        const attempts = error instanceof EmbeddingError ? error.attempts : settings.embeddingMaxAttempts;
        warnings.push(`Chunk ${chunkId} was skipped after ${attempts} failed embedding attempt(s).`);
        logWarn("ingestion.chunk.skipped", context, {
          chunk_id: chunkId,
          attempts,
          ...serializeError(error)
        });
        return null;
      }
    });

    return results.filter((chunk): chunk is EmbeddedChunk => chunk !== null);
  }

  private async ingestExclusive(intake: DocumentIntake, context: CorrelationContext): Promise<IngestionReport> {
    const { repository, chunkStore, index, facets, settings } = this.dependencies;
    const startedAt = Date.now();
    const { documentId } = intake;

    const normalizedText = normalizeText(intake.rawText);
    const metadata = extractMetadata(normalizedText, { now: this.now, context });
    const chunks = chunkText(normalizedText, { maxChars: settings.maxChars, overlapChars: settings.overlapChars });
    const previous = await repository.findById(documentId);

    const warnings: string[] = [];
    const embedded = await this.embedChunks(documentId, chunks, context, warnings);
    const generation = this.createGeneration();

    // New chunks become durable before anything points at them.
    const [firstEmbedded] = embedded;
    if (firstEmbedded) {
      await chunkStore.ensureReady(firstEmbedded.embedding.length);
      await chunkStore.write(
        embedded.map((chunk) => ({
          chunkId: buildChunkId(documentId, chunk.sequence),
          documentId,
          sequence: chunk.sequence,
          text: chunk.text,
          embedding: chunk.embedding,
          generation
        }))
      );
    }

    const document: CourtDocument = {
      documentId,
      sourceFilename: intake.sourceFilename,
      rawText: intake.rawText,
      normalizedText,
      metadata,
      ingestedAt: this.now().toISOString(),
      indexGeneration: generation
    };
    await repository.save(document);

    const replaced = index.publish(createIndexedDocument({ documentId, generation, metadata, chunks: embedded }));
    facets.update(documentId, metadata);
    const replacedPrevious = previous !== null || replaced !== null;

    if (replacedPrevious) {
      await this.deleteStaleChunks(documentId, generation, context);
    }

    const report: IngestionReport = {
      documentId,
      indexedChunks: embedded.length,
      skippedChunks: chunks.length - embedded.length,
      warnings,
      metadata,
      replacedPrevious
    };

    const durationMs = Date.now() - startedAt;
    recordIngestion({ durationMs, indexedChunks: report.indexedChunks, skippedChunks: report.skippedChunks });
    logInfo("ingestion.completed", context, {
      source_filename: intake.sourceFilename,
      indexed_chunks: report.indexedChunks,
      skipped_chunks: report.skippedChunks,
      replaced_previous: replacedPrevious,
      partially_ambiguous: metadata.partiallyAmbiguous,
      duration_ms: durationMs
    });

    return report;
  }

  // Superseded generations are invisible once the new one is published; a
  // failed cleanup only leaves orphans that the next ingestion removes.
  private async deleteStaleChunks(documentId: string, generation: string, context: CorrelationContext): Promise<void> {
    try {
      await this.dependencies.chunkStore.deleteDocument(documentId, { keepGeneration: generation });
    } catch (error) {
      logWarn("ingestion.cleanup.failed", context, serializeError(error));
    }
  }

  async correctMetadata(
    documentId: string,
    patch: MetadataPatch,
    context: CorrelationContext = {}
  ): Promise<CourtDocument> {
    const scoped = { ...context, documentId };
    return this.locks.runExclusive(documentId, async () => {
      const { repository, index, facets } = this.dependencies;
      const existing = await repository.findById(documentId);
      if (!existing) {
        throw new DocumentNotFoundError(documentId);
      }

      const updated: CourtDocument = { ...existing, metadata: applyMetadataPatch(existing.metadata, patch, this.now()) };
      await repository.save(updated);

      // Until this republish, published chunks still carry the previous snapshot.
      const current = index.get(documentId);
      if (current) {
        index.publish(
          createIndexedDocument({
            documentId,
            generation: current.generation,
            metadata: updated.metadata,
            chunks: current.chunks
          })
        );
      }
      facets.update(documentId, updated.metadata);

      logInfo("metadata.corrected", scoped, { fields: Object.keys(patch) });
      return updated;
    });
  }

  async remove(documentId: string, context: CorrelationContext = {}): Promise<void> {
    const scoped = { ...context, documentId };
    await this.locks.runExclusive(documentId, async () => {
      const { repository, chunkStore, index, facets } = this.dependencies;
      const existing = await repository.findById(documentId);
      if (!existing && !index.get(documentId)) {
        throw new DocumentNotFoundError(documentId);
      }

      index.remove(documentId);
      facets.remove(documentId);
      await repository.remove(documentId);
      try {
        await chunkStore.deleteDocument(documentId);
      } catch (error) {
        logWarn("document.remove.chunk_cleanup_failed", scoped, serializeError(error));
      }
      logInfo("document.removed", scoped);
    });
  }

  /**
   * Loads persisted documents and the chunk generation each one records, then
   * rebuilds the facet cache. A document whose chunks cannot be loaded stays
   * visible to metadata filtering.
   */
  async hydrate(context: CorrelationContext = {}): Promise<HydrationReport> {
    const { repository, chunkStore, index, facets } = this.dependencies;
    const report: HydrationReport = { documents: 0, chunks: 0, failedDocuments: [] };
    const knownDocumentIds = new Set<string>();
    let cursor: string | null = null;

    do {
      const page = await repository.list({ cursor, limit: HYDRATION_PAGE_SIZE });
      for (const document of page.items) {
        knownDocumentIds.add(document.documentId);
        const scoped = { ...context, documentId: document.documentId };
        let chunks: Array<{ sequence: number; text: string; embedding: number[] }> = [];
        if (document.indexGeneration) {
          try {
            chunks = await chunkStore.loadGeneration(document.documentId, document.indexGeneration);
          } catch (error) {
            report.failedDocuments.push(document.documentId);
            logWarn("hydration.chunks.failed", scoped, serializeError(error));
          }
        }
        index.publish(
          createIndexedDocument({
            documentId: document.documentId,
            generation: document.indexGeneration ?? this.createGeneration(),
            metadata: document.metadata,
            chunks
          })
        );
        report.documents += 1;
        report.chunks += chunks.length;
      }
      cursor = page.nextCursor;
    } while (cursor !== null);

    const orphanedDocuments = await this.removeOrphanedChunks(knownDocumentIds, context);
    facets.rebuild(index.snapshot().values());
    logInfo("hydration.completed", context, {
      documents: report.documents,
      chunks: report.chunks,
      failed_documents: report.failedDocuments.length,
      orphaned_documents: orphanedDocuments
    });
    return report;
  }

  /**
   * Deletes chunks left by documents the repository no longer knows, such as
   * after the repository was reset while the chunk store kept its files.
   * Each candidate is re-checked under its document lock so a concurrent
   * ingestion keeps the chunks it has just written.
   */
  private async removeOrphanedChunks(knownDocumentIds: ReadonlySet<string>, context: CorrelationContext): Promise<number> {
    const { repository, chunkStore } = this.dependencies;
    let storedDocumentIds: string[];
    try {
      storedDocumentIds = await chunkStore.listDocumentIds();
    } catch (error) {
      logWarn("hydration.orphans.list_failed", context, serializeError(error));
      return 0;
    }

    let removed = 0;
    for (const documentId of storedDocumentIds) {
      if (knownDocumentIds.has(documentId)) {
        continue;
      }
      const scoped = { ...context, documentId };
      await this.locks.runExclusive(documentId, async () => {
        if ((await repository.findById(documentId)) !== null) {
          return;
        }
        try {
          await chunkStore.deleteDocument(documentId);
          removed += 1;
          logInfo("hydration.orphans.removed", scoped);
        } catch (error) {
          logWarn("hydration.orphans.cleanup_failed", scoped, serializeError(error));
        }
      });
    }
    return removed;
  }
}
