export const DECISION_TYPES = ["QƏTNAMƏ", "QƏRAR", "QƏRARNAMƏ"] as const;

export type DecisionType = (typeof DECISION_TYPES)[number];

export const isDecisionType = (value: string): value is DecisionType =>
  DECISION_TYPES.some((type) => type === value);

export const SCALAR_METADATA_FIELDS = [
  "courtName",
  "caseNumber",
  "judge",
  "clerk",
  "caseType",
  "district",
  "decisionType",
  "year",
  "decisionDate"
] as const;

export type ScalarMetadataField = (typeof SCALAR_METADATA_FIELDS)[number];

export type MetadataField = ScalarMetadataField | "parties";

export const METADATA_FIELDS: readonly MetadataField[] = [...SCALAR_METADATA_FIELDS, "parties"];

export const isMetadataField = (value: string): value is MetadataField =>
  METADATA_FIELDS.some((field) => field === value);

/**
 * Structured case attributes of one ruling. `null` is the explicit "unknown";
 * extraction never stores an empty string.
 */
export interface MetadataRecord {
  courtName: string | null;
  caseNumber: string | null;
  judge: string | null;
  clerk: string | null;
  caseType: string | null;
  district: string | null;
  decisionType: DecisionType | null;
  /** Four digits, within the plausible range checked by the extractor. */
  year: string | null;
  /** ISO calendar date, `YYYY-MM-DD`. */
  decisionDate: string | null;
  parties: string[] | null;
  /** Set when extracted fields disagreed and one of them was overridden. */
  partiallyAmbiguous: boolean;
  ambiguities: string[];
}

export const createUnknownMetadata = (): MetadataRecord => ({
  courtName: null,
  caseNumber: null,
  judge: null,
  clerk: null,
  caseType: null,
  district: null,
  decisionType: null,
  year: null,
  decisionDate: null,
  parties: null,
  partiallyAmbiguous: false,
  ambiguities: []
});

export const readMetadataValues = (metadata: MetadataRecord, field: MetadataField): string[] => {
  if (field === "parties") {
    return metadata.parties ?? [];
  }
  const value = metadata[field];
  return value === null ? [] : [value];
};

export interface CourtDocument {
  documentId: string;
  sourceFilename: string;
  rawText: string;
  normalizedText: string;
  metadata: MetadataRecord;
  ingestedAt: string;
  /** Identifier of the chunk set currently published for this document. */
  indexGeneration: string | null;
}

export interface DocumentIntake {
  documentId: string;
  rawText: string;
  sourceFilename: string;
}

export type MetadataPatch = Partial<{
  [K in ScalarMetadataField]: MetadataRecord[K];
}> & {
  parties?: string[] | null;
};

export interface ListDocumentsInput {
  cursor?: string | null;
  limit?: number;
}

export interface ListDocumentsResult {
  items: CourtDocument[];
  nextCursor: string | null;
}

export interface DocumentRepositoryPort {
  save(document: CourtDocument): Promise<void>;
  findById(documentId: string): Promise<CourtDocument | null>;
  list(input?: ListDocumentsInput): Promise<ListDocumentsResult>;
  remove(documentId: string): Promise<boolean>;
}

export class DocumentNotFoundError extends Error {
  readonly documentId: string;

  constructor(documentId: string) {
    super(`Document ${documentId} was not found.`);
    this.name = "DocumentNotFoundError";
    this.documentId = documentId;
  }
}
