import type {
  CourtDocument,
  DocumentRepositoryPort,
  ListDocumentsInput,
  ListDocumentsResult
} from "./types.js";

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 500;

const cloneDocument = (document: CourtDocument): CourtDocument => ({
  ...document,
  metadata: {
    ...document.metadata,
    parties: document.metadata.parties ? [...document.metadata.parties] : null,
    ambiguities: [...document.metadata.ambiguities]
  }
});

/** Process-local document store for local runs without Postgres. */
export class InMemoryDocumentRepository implements DocumentRepositoryPort {
  private readonly documents = new Map<string, CourtDocument>();

  async save(document: CourtDocument): Promise<void> {
    this.documents.set(document.documentId, cloneDocument(document));
  }

  async findById(documentId: string): Promise<CourtDocument | null> {
    const document = this.documents.get(documentId.trim());
    return document ? cloneDocument(document) : null;
  }

  async list(input?: ListDocumentsInput): Promise<ListDocumentsResult> {
    const cursor = input?.cursor?.trim() || null;
    const limit = Math.max(1, Math.min(MAX_LIST_LIMIT, Math.trunc(input?.limit ?? DEFAULT_LIST_LIMIT)));
    const ids = [...this.documents.keys()]
      .filter((documentId) => cursor === null || documentId > cursor)
      .sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));
    const pageIds = ids.slice(0, limit);
    const items = pageIds.flatMap((documentId) => {
      const document = this.documents.get(documentId);
      return document ? [cloneDocument(document)] : [];
    });
    return {
      items,
      nextCursor: ids.length > limit ? pageIds[pageIds.length - 1] ?? null : null
    };
  }

  async remove(documentId: string): Promise<boolean> {
    return this.documents.delete(documentId.trim());
  }
}
