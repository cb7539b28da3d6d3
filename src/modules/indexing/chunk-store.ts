import { createHash } from "node:crypto";

export interface StoredChunk {
  chunkId: string;
  documentId: string;
  sequence: number;
  text: string;
  embedding: number[];
  generation: string;
}

/** Durable home of chunk vectors; the in-memory index is rebuilt from it. */
export interface ChunkStorePort {
  ensureReady(dimension: number): Promise<void>;
  write(chunks: readonly StoredChunk[]): Promise<void>;
  /** Deletes a document's chunks, optionally keeping one generation. */
  deleteDocument(documentId: string, options?: { keepGeneration?: string }): Promise<void>;
  loadGeneration(documentId: string, generation: string): Promise<StoredChunk[]>;
  /** Every document id that still owns at least one chunk. */
  listDocumentIds(): Promise<string[]>;
}

export class ChunkStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ChunkStoreError";
  }
}

export interface PayloadCondition {
  key: string;
  match: { value: string };
}

export interface PointFilter {
  must?: PayloadCondition[];
  must_not?: PayloadCondition[];
}

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface ScrolledPoint {
  id: string | number;
  payload?: Record<string, unknown> | null;
  vector?: unknown;
}

/** The slice of the Qdrant REST client this store relies on. */
export interface VectorCollectionClient {
  collectionExists(collectionName: string): Promise<{ exists: boolean }>;
  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: "Cosine" } }
  ): Promise<boolean>;
  upsert(collectionName: string, args: { wait?: boolean; points: VectorPoint[] }): Promise<unknown>;
  delete(collectionName: string, args: { wait?: boolean; filter: PointFilter }): Promise<unknown>;
  scroll(
    collectionName: string,
    args: {
      filter?: PointFilter;
      limit?: number;
      offset?: string | number | null;
      with_payload?: boolean;
      with_vector?: boolean;
    }
  ): Promise<{ points: ScrolledPoint[]; next_page_offset?: unknown }>;
}

/** Qdrant point ids must be UUIDs; derive a stable one per chunk and generation. */
export const toPointId = (generation: string, chunkId: string): string => {
  const hex = createHash("sha1").update(`${generation}:${chunkId}`).digest("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
};

const SCROLL_PAGE_SIZE = 256;

const readVector = (value: unknown): number[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }
  const vector: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number") {
      return null;
    }
    vector.push(entry);
  }
  return vector;
};

const toStoredChunk = (point: ScrolledPoint): StoredChunk | null => {
  const payload = point.payload ?? {};
  const { chunk_id: chunkId, doc_id: documentId, sequence, text, generation } = payload;
  const embedding = readVector(point.vector);
  if (
    typeof chunkId !== "string" ||
    typeof documentId !== "string" ||
    typeof sequence !== "number" ||
    typeof text !== "string" ||
    typeof generation !== "string" ||
    embedding === null
  ) {
    return null;
  }
  return { chunkId, documentId, sequence, text, embedding, generation };
};

export class QdrantChunkStore implements ChunkStorePort {
  private readyDimension: number | null = null;

  constructor(
    private readonly client: VectorCollectionClient,
    private readonly collectionName: string
  ) {}

  async ensureReady(dimension: number): Promise<void> {
    if (this.readyDimension === dimension) {
      return;
    }
    try {
      const { exists } = await this.client.collectionExists(this.collectionName);
      if (!exists) {
        await this.client.createCollection(this.collectionName, {
          vectors: { size: dimension, distance: "Cosine" }
        });
      }
      this.readyDimension = dimension;
    } catch (error) {
      throw new ChunkStoreError(`Could not prepare collection ${this.collectionName}.`, { cause: error });
    }
  }

  async write(chunks: readonly StoredChunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }
    try {
      await this.client.upsert(this.collectionName, {
        wait: true,
        points: chunks.map((chunk) => ({
          id: toPointId(chunk.generation, chunk.chunkId),
          vector: chunk.embedding,
          payload: {
            chunk_id: chunk.chunkId,
            doc_id: chunk.documentId,
            sequence: chunk.sequence,
            text: chunk.text,
            generation: chunk.generation
          }
        }))
      });
    } catch (error) {
      throw new ChunkStoreError(`Could not write ${chunks.length} chunk(s).`, { cause: error });
    }
  }

  async deleteDocument(documentId: string, options: { keepGeneration?: string } = {}): Promise<void> {
    const filter: PointFilter = { must: [{ key: "doc_id", match: { value: documentId } }] };
    if (options.keepGeneration) {
      filter.must_not = [{ key: "generation", match: { value: options.keepGeneration } }];
    }
    try {
      await this.client.delete(this.collectionName, { wait: true, filter });
    } catch (error) {
      throw new ChunkStoreError(`Could not delete chunks of document ${documentId}.`, { cause: error });
    }
  }

  async loadGeneration(documentId: string, generation: string): Promise<StoredChunk[]> {
    const filter: PointFilter = {
      must: [
        { key: "doc_id", match: { value: documentId } },
        { key: "generation", match: { value: generation } }
      ]
    };
    const chunks: StoredChunk[] = [];
    let offset: string | number | null = null;

    try {
      do {
        const page: Awaited<ReturnType<VectorCollectionClient["scroll"]>> = await this.client.scroll(
          this.collectionName,
          { filter, limit: SCROLL_PAGE_SIZE, offset, with_payload: true, with_vector: true }
        );
        for (const point of page.points) {
          const chunk = toStoredChunk(point);
          if (chunk) {
            chunks.push(chunk);
          }
        }
        const next = page.next_page_offset;
        offset = typeof next === "string" || typeof next === "number" ? next : null;
      } while (offset !== null);
    } catch (error) {
      throw new ChunkStoreError(`Could not load chunks of document ${documentId}.`, { cause: error });
    }

    return chunks.sort((left, right) => left.sequence - right.sequence);
  }

  async listDocumentIds(): Promise<string[]> {
    const documentIds = new Set<string>();
    let offset: string | number | null = null;

    try {
      do {
        const page: Awaited<ReturnType<VectorCollectionClient["scroll"]>> = await this.client.scroll(
          this.collectionName,
          { limit: SCROLL_PAGE_SIZE, offset, with_payload: true, with_vector: false }
        );
        for (const point of page.points) {
          const documentId = point.payload?.doc_id;
          if (typeof documentId === "string") {
            documentIds.add(documentId);
          }
        }
        const next = page.next_page_offset;
        offset = typeof next === "string" || typeof next === "number" ? next : null;
      } while (offset !== null);
    } catch (error) {
      throw new ChunkStoreError(`Could not list documents in ${this.collectionName}.`, { cause: error });
    }

    return [...documentIds];
  }
}
