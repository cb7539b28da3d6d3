import { getPostgresClient } from "../../clients/postgres.js";
import { parseStoredMetadata } from "./metadata-schema.js";
import type {
  CourtDocument,
  DocumentRepositoryPort,
  ListDocumentsInput,
  ListDocumentsResult
} from "./types.js";

interface CourtDocumentRow {
  document_id: string;
  source_filename: string;
  raw_text: string;
  normalized_text: string;
  metadata: unknown;
  index_generation: string | null;
  ingested_at: Date;
}

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 500;

const SELECT_COLUMNS = `
  document_id,
  source_filename,
  raw_text,
  normalized_text,
  metadata,
  index_generation,
  ingested_at
`;

const normalizeRequiredDocumentId = (value: string): string => {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error("document_id is required");
  }
  return trimmed;
};

const toCourtDocument = (row: CourtDocumentRow): CourtDocument => ({
  documentId: row.document_id,
  sourceFilename: row.source_filename,
  rawText: row.raw_text,
  normalizedText: row.normalized_text,
  metadata: parseStoredMetadata(row.metadata),
  indexGeneration: row.index_generation,
  ingestedAt: row.ingested_at.toISOString()
});

export class PostgresDocumentRepository implements DocumentRepositoryPort {
  async save(document: CourtDocument): Promise<void> {
    const { pool } = await getPostgresClient();
    await pool.query(
      `
        INSERT INTO court_documents (
          document_id,
          source_filename,
          raw_text,
          normalized_text,
          metadata,
          index_generation,
          ingested_at
        )
        VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7)
        ON CONFLICT (document_id) DO UPDATE
        SET source_filename = EXCLUDED.source_filename,
            raw_text = EXCLUDED.raw_text,
            normalized_text = EXCLUDED.normalized_text,
            metadata = EXCLUDED.metadata,
            index_generation = EXCLUDED.index_generation,
            ingested_at = EXCLUDED.ingested_at,
            updated_at = NOW()
      `,
      [
        normalizeRequiredDocumentId(document.documentId),
        document.sourceFilename,
        document.rawText,
        document.normalizedText,
        JSON.stringify(document.metadata),
        document.indexGeneration,
        document.ingestedAt
      ]
    );
  }

  async findById(documentId: string): Promise<CourtDocument | null> {
    const { pool } = await getPostgresClient();
    const result = await pool.query<CourtDocumentRow>(
      `
        SELECT ${SELECT_COLUMNS}
        FROM court_documents
        WHERE document_id = $1
        LIMIT 1
      `,
      [normalizeRequiredDocumentId(documentId)]
    );

    const row = result.rows[0];
    return row ? toCourtDocument(row) : null;
  }

  async list(input?: ListDocumentsInput): Promise<ListDocumentsResult> {
    const { pool } = await getPostgresClient();
    const cursor = input?.cursor?.trim() || null;
    const limit = Math.max(1, Math.min(MAX_LIST_LIMIT, Math.trunc(input?.limit ?? DEFAULT_LIST_LIMIT)));
    const result = await pool.query<CourtDocumentRow>(
      `
        SELECT ${SELECT_COLUMNS}
        FROM court_documents
        WHERE ($1::text IS NULL OR document_id > $1)
        ORDER BY document_id ASC
        LIMIT $2
      `,
      [cursor, limit + 1]
    );

    const rows = result.rows;
    const hasNext = rows.length > limit;
    const pageRows = hasNext ? rows.slice(0, limit) : rows;

    return {
      items: pageRows.map(toCourtDocument),
      nextCursor: hasNext ? pageRows[pageRows.length - 1]?.document_id ?? null : null
    };
  }

  async remove(documentId: string): Promise<boolean> {
    const { pool } = await getPostgresClient();
    const result = await pool.query("DELETE FROM court_documents WHERE document_id = $1", [
      normalizeRequiredDocumentId(documentId)
    ]);
    return (result.rowCount ?? 0) > 0;
  }
}
