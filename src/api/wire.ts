import { z } from "zod";
import {
  createConversationState,
  CONVERSATION_STATUSES,
  type AnalysisResult,
  type ConversationState,
  type PendingClarification
} from "../modules/dialogue/dialogue-controller.js";
import { ISO_DATE_PATTERN, YEAR_PATTERN } from "../modules/documents/metadata-schema.js";
import {
  DECISION_TYPES,
  isMetadataField,
  METADATA_FIELDS,
  type CourtDocument,
  type MetadataField,
  type MetadataPatch,
  type MetadataRecord
} from "../modules/documents/types.js";
import { YEAR_MIN, isCalendarDate, isPlausibleYear } from "../modules/extraction/metadata-extractor.js";
import type { FacetSnapshot } from "../modules/indexing/facet-cache.js";
import type { IngestionReport } from "../modules/indexing/ingestion-service.js";
import type { SearchFilters, SearchHit, SearchOutcome } from "../modules/search/hybrid-search.js";
import { BEST_EFFORT_NOTICE } from "../prompts/index.js";

export const UNKNOWN_VALUE = "unknown";

export const FIELD_WIRE_NAMES: Record<MetadataField, string> = {
  courtName: "court_name",
  caseNumber: "case_number",
  judge: "judge",
  clerk: "clerk",
  caseType: "case_type",
  district: "district",
  decisionType: "decision_type",
  year: "year",
  decisionDate: "decision_date",
  parties: "parties"
};

export const fieldFromWireName = (wireName: string): MetadataField | null =>
  METADATA_FIELDS.find((field) => FIELD_WIRE_NAMES[field] === wireName) ?? null;

const filterValue = z.string().trim().min(1).max(300).optional();

export const searchFiltersSchema = z
  .object({
    court_name: filterValue,
    case_number: filterValue,
    judge: filterValue,
    clerk: filterValue,
    case_type: filterValue,
    district: filterValue,
    decision_type: filterValue,
    year: filterValue,
    decision_date: filterValue,
    parties: filterValue
  })
  .strict();

export type WireSearchFilters = z.infer<typeof searchFiltersSchema>;

export const toSearchFilters = (wire: WireSearchFilters | undefined): SearchFilters => {
  const filters: SearchFilters = {};
  if (!wire) {
    return filters;
  }
  for (const field of METADATA_FIELDS) {
    const value = readWireFilter(wire, field);
    if (value !== undefined) {
      filters[field] = value;
    }
  }
  return filters;
};

const readWireFilter = (wire: WireSearchFilters, field: MetadataField): string | undefined => {
  switch (field) {
    case "courtName":
      return wire.court_name;
    case "caseNumber":
      return wire.case_number;
    case "caseType":
      return wire.case_type;
    case "decisionType":
      return wire.decision_type;
    case "decisionDate":
      return wire.decision_date;
    default:
      return wire[field];
  }
};

export const toWireFilters = (filters: SearchFilters): Record<string, string> => {
  const wire: Record<string, string> = {};
  for (const field of METADATA_FIELDS) {
    const value = filters[field];
    if (value !== undefined) {
      wire[FIELD_WIRE_NAMES[field]] = value;
    }
  }
  return wire;
};

export const toWireMetadata = (metadata: MetadataRecord) => ({
  court_name: metadata.courtName ?? UNKNOWN_VALUE,
  case_number: metadata.caseNumber ?? UNKNOWN_VALUE,
  judge: metadata.judge ?? UNKNOWN_VALUE,
  clerk: metadata.clerk ?? UNKNOWN_VALUE,
  case_type: metadata.caseType ?? UNKNOWN_VALUE,
  district: metadata.district ?? UNKNOWN_VALUE,
  decision_type: metadata.decisionType ?? UNKNOWN_VALUE,
  year: metadata.year ?? UNKNOWN_VALUE,
  decision_date: metadata.decisionDate ?? UNKNOWN_VALUE,
  parties: metadata.parties ?? [],
  partially_ambiguous: metadata.partiallyAmbiguous,
  ambiguities: metadata.ambiguities.map((field) => (isMetadataField(field) ? FIELD_WIRE_NAMES[field] : field))
});

export const toWireReport = (report: IngestionReport) => ({
  document_id: report.documentId,
  indexed_chunks: report.indexedChunks,
  skipped_chunks: report.skippedChunks,
  warnings: report.warnings,
  replaced_previous: report.replacedPrevious,
  metadata: toWireMetadata(report.metadata)
});

export const toWireDocumentSummary = (document: CourtDocument) => ({
  document_id: document.documentId,
  source_filename: document.sourceFilename,
  ingested_at: document.ingestedAt,
  metadata: toWireMetadata(document.metadata)
});

export const toWireDocument = (document: CourtDocument) => ({
  ...toWireDocumentSummary(document),
  normalized_text: document.normalizedText,
  raw_text: document.rawText
});

const toWireHit = (hit: SearchHit) => ({
  document_id: hit.documentId,
  chunk_id: hit.chunkId,
  excerpt: hit.excerpt,
  score: hit.score === null ? null : Math.round(hit.score * 10000) / 10000,
  partially_ambiguous: hit.partiallyAmbiguous,
  metadata: toWireMetadata(hit.metadata)
});

export const toWireOutcome = (outcome: SearchOutcome) => {
  switch (outcome.status) {
    case "ok":
      return {
        status: outcome.status,
        mode: outcome.mode,
        total_matches: outcome.totalMatches,
        elapsed_ms: outcome.elapsedMs,
        hits: outcome.hits.map(toWireHit)
      };
    case "no_results":
      return { status: outcome.status, elapsed_ms: outcome.elapsedMs, hits: [] };
    case "no_relevant_results":
      return { status: outcome.status, best_score: outcome.bestScore, elapsed_ms: outcome.elapsedMs, hits: [] };
    case "timeout":
      return { status: outcome.status, elapsed_ms: outcome.elapsedMs, budget_ms: outcome.budgetMs, hits: [] };
  }
};

export const toWireFacets = (snapshot: FacetSnapshot): Record<string, string[]> => {
  const wire: Record<string, string[]> = {};
  for (const field of METADATA_FIELDS) {
    wire[FIELD_WIRE_NAMES[field]] = snapshot[field];
  }
  return wire;
};

export const toWireFieldCounts = (counts: Record<MetadataField, number>): Record<string, number> => {
  const wire: Record<string, number> = {};
  for (const field of METADATA_FIELDS) {
    wire[FIELD_WIRE_NAMES[field]] = counts[field];
  }
  return wire;
};

const wireFieldSchema = z
  .string()
  .transform((value, ctx): MetadataField => {
    const field = fieldFromWireName(value);
    if (!field) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown metadata field: ${value}` });
      return z.NEVER;
    }
    return field;
  });

const pendingSchema = z.object({
  field: wireFieldSchema,
  candidates: z.array(z.string()).min(1)
});

export const conversationStateSchema = z.object({
  status: z.enum(CONVERSATION_STATUSES),
  clarification_rounds: z.number().int().nonnegative(),
  pending: pendingSchema.nullable().default(null),
  queued: z.array(pendingSchema).default([]),
  filters: searchFiltersSchema.default({}),
  residual_query: z.string().default(""),
  best_effort: z.boolean().default(false)
});

export type WireConversationState = z.infer<typeof conversationStateSchema>;

export const fromWireState = (wire: WireConversationState | undefined): ConversationState => {
  if (!wire) {
    return createConversationState();
  }
  return {
    status: wire.status,
    clarificationRounds: wire.clarification_rounds,
    pending: wire.pending,
    queued: wire.queued,
    filters: toSearchFilters(wire.filters),
    residualQuery: wire.residual_query,
    bestEffort: wire.best_effort
  };
};

const toWirePending = (pending: PendingClarification) => ({
  field: FIELD_WIRE_NAMES[pending.field],
  candidates: pending.candidates
});

export const toWireState = (state: ConversationState) => ({
  status: state.status,
  clarification_rounds: state.clarificationRounds,
  pending: state.pending ? toWirePending(state.pending) : null,
  queued: state.queued.map(toWirePending),
  filters: toWireFilters(state.filters),
  residual_query: state.residualQuery,
  best_effort: state.bestEffort
});

export const toWireAnalysis = (analysis: AnalysisResult) => ({
  filters: toWireFilters(analysis.filters),
  residual_query: analysis.residualQuery,
  next_state: toWireState(analysis.nextState),
  clarification_prompt: analysis.clarificationPrompt,
  clarification_field: analysis.clarificationField ? FIELD_WIRE_NAMES[analysis.clarificationField] : null,
  candidates: analysis.candidates,
  best_effort: analysis.bestEffort,
  notice: analysis.bestEffort ? BEST_EFFORT_NOTICE : null
});

const nullableText = z.string().trim().max(500).nullable().optional();

export const metadataPatchSchema = z
  .object({
    court_name: nullableText,
    case_number: nullableText,
    judge: nullableText,
    clerk: nullableText,
    case_type: nullableText,
    district: nullableText,
    decision_type: z.enum(DECISION_TYPES).nullable().optional(),
    year: z
      .string()
      .regex(YEAR_PATTERN, "year must be four digits")
      .refine((value) => !YEAR_PATTERN.test(value) || isPlausibleYear(value, new Date()), {
        message: `year must be between ${YEAR_MIN} and next year`
      })
      .nullable()
      .optional(),
    decision_date: z
      .string()
      .regex(ISO_DATE_PATTERN, "decision_date must be YYYY-MM-DD")
      .refine(
        (value) =>
          !ISO_DATE_PATTERN.test(value) || (isCalendarDate(value) && isPlausibleYear(value.slice(0, 4), new Date())),
        { message: `decision_date must be a calendar date between ${YEAR_MIN} and next year` }
      )
      .nullable()
      .optional(),
    parties: z.array(z.string().trim().min(1).max(300)).max(50).nullable().optional()
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided"
  });

export const toMetadataPatch = (wire: z.infer<typeof metadataPatchSchema>): MetadataPatch => {
  const patch: MetadataPatch = {};
  if (wire.court_name !== undefined) patch.courtName = wire.court_name;
  if (wire.case_number !== undefined) patch.caseNumber = wire.case_number;
  if (wire.judge !== undefined) patch.judge = wire.judge;
  if (wire.clerk !== undefined) patch.clerk = wire.clerk;
  if (wire.case_type !== undefined) patch.caseType = wire.case_type;
  if (wire.district !== undefined) patch.district = wire.district;
  if (wire.decision_type !== undefined) patch.decisionType = wire.decision_type;
  if (wire.year !== undefined) patch.year = wire.year;
  if (wire.decision_date !== undefined) patch.decisionDate = wire.decision_date;
  if (wire.parties !== undefined) patch.parties = wire.parties;
  return patch;
};
