import { z } from "zod";
import { DECISION_TYPES, type MetadataRecord } from "./types.js";

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const YEAR_PATTERN = /^\d{4}$/;

/** Shape of metadata persisted as JSON; used when reading rows back. */
export const metadataRecordSchema = z.object({
  courtName: z.string().nullable().default(null),
  caseNumber: z.string().nullable().default(null),
  judge: z.string().nullable().default(null),
  clerk: z.string().nullable().default(null),
  caseType: z.string().nullable().default(null),
  district: z.string().nullable().default(null),
  decisionType: z.enum(DECISION_TYPES).nullable().default(null),
  year: z.string().regex(YEAR_PATTERN).nullable().default(null),
  decisionDate: z.string().regex(ISO_DATE_PATTERN).nullable().default(null),
  parties: z.array(z.string()).nullable().default(null),
  partiallyAmbiguous: z.boolean().default(false),
  ambiguities: z.array(z.string()).default([])
});

export const parseStoredMetadata = (value: unknown): MetadataRecord => metadataRecordSchema.parse(value);
