import type { MetadataRecord } from "../documents/types.js";

export interface IndexedChunk {
  chunkId: string;
  documentId: string;
  sequence: number;
  text: string;
  embedding: readonly number[];
  /** Document metadata at publish time. */
  metadata: MetadataRecord;
}

/** Everything the index holds for one document; replaced as a whole, never edited. */
export interface IndexedDocument {
  documentId: string;
  generation: string;
  metadata: MetadataRecord;
  chunks: readonly IndexedChunk[];
}

export type IndexSnapshot = ReadonlyMap<string, IndexedDocument>;

export interface VectorIndexStats {
  documents: number;
  chunks: number;
  dimension: number | null;
}

export interface VectorIndex {
  /** Makes `unit` visible and returns the unit it replaced, if any. */
  publish(unit: IndexedDocument): IndexedDocument | null;
  remove(documentId: string): IndexedDocument | null;
  get(documentId: string): IndexedDocument | null;
  /** Immutable view; later publishes do not affect a snapshot already taken. */
  snapshot(): IndexSnapshot;
  dimension(): number | null;
  stats(): VectorIndexStats;
  clear(): void;
}

export const buildChunkId = (documentId: string, sequence: number): string => `${documentId}:${sequence}`;

export const createIndexedDocument = (input: {
  documentId: string;
  generation: string;
  metadata: MetadataRecord;
  chunks: ReadonlyArray<{ sequence: number; text: string; embedding: readonly number[] }>;
}): IndexedDocument => {
  const metadata = Object.freeze({ ...input.metadata });
  const chunks = [...input.chunks]
    .sort((left, right) => left.sequence - right.sequence)
    .map((chunk) =>
      Object.freeze({
        chunkId: buildChunkId(input.documentId, chunk.sequence),
        documentId: input.documentId,
        sequence: chunk.sequence,
        text: chunk.text,
        embedding: Object.freeze([...chunk.embedding]),
        metadata
      })
    );
  return Object.freeze({
    documentId: input.documentId,
    generation: input.generation,
    metadata,
    chunks: Object.freeze(chunks)
  });
};

export const cosineSimilarity = (left: readonly number[], right: readonly number[]): number => {
  if (left.length === 0 || left.length !== right.length) {
    return 0;
  }
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
};

/**
 * Copy-on-write map of published documents. Each write swaps in a new map,
 * so readers iterate a consistent set while ingestion continues.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private units: IndexSnapshot = new Map();

  publish(unit: IndexedDocument): IndexedDocument | null {
    const previous = this.units.get(unit.documentId) ?? null;
    const next = new Map(this.units);
    next.set(unit.documentId, unit);
    this.units = next;
    return previous;
  }

  remove(documentId: string): IndexedDocument | null {
    const previous = this.units.get(documentId) ?? null;
    if (!previous) {
      return null;
    }
    const next = new Map(this.units);
    next.delete(documentId);
    this.units = next;
    return previous;
  }

  get(documentId: string): IndexedDocument | null {
    return this.units.get(documentId) ?? null;
  }

  snapshot(): IndexSnapshot {
    return this.units;
  }

  dimension(): number | null {
    for (const unit of this.units.values()) {
      const first = unit.chunks[0];
      if (first) {
        return first.embedding.length;
      }
    }
    return null;
  }

  stats(): VectorIndexStats {
    let chunks = 0;
    for (const unit of this.units.values()) {
      chunks += unit.chunks.length;
    }
    return { documents: this.units.size, chunks, dimension: this.dimension() };
  }

  clear(): void {
    this.units = new Map();
  }
}
