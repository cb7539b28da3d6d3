import { logWarn, serializeError, type CorrelationContext } from "../../observability/logger.js";
import {
  createUnknownMetadata,
  isDecisionType,
  type MetadataRecord,
  type ScalarMetadataField
} from "../documents/types.js";
import { FIELD_STRATEGIES, toIsoDate, type FieldStrategy } from "./field-strategies.js";
import { foldText } from "./text-normalizer.js";

export const YEAR_MIN = 1900;

export interface ExtractMetadataOptions {
  strategies?: readonly FieldStrategy[];
  now?: () => Date;
  context?: CorrelationContext;
}

interface Occurrence {
  index: number;
  value: string;
}

function* scanOccurrences(pattern: RegExp, text: string): Generator<Occurrence> {
  const scanner = new RegExp(pattern.source, `${pattern.flags.replace("g", "")}g`);
  let match = scanner.exec(text);
  while (match !== null) {
    const captured = match.groups?.value ?? match[1];
    if (captured !== undefined) {
      yield { index: match.index, value: captured };
    }
    // Restart just after the match start: a rejected capture may overlap the next label.
    scanner.lastIndex = match.index + 1;
    match = scanner.exec(text);
  }
}

const firstValue = (strategy: FieldStrategy, text: string): string | null => {
  for (const pattern of strategy.patterns) {
    for (const occurrence of scanOccurrences(pattern, text)) {
      const normalized = strategy.normalize(occurrence.value);
      if (normalized !== null) {
        return normalized;
      }
    }
  }
  return null;
};

const allValues = (strategy: FieldStrategy, text: string): string[] | null => {
  const found: Occurrence[] = [];
  for (const pattern of strategy.patterns) {
    for (const occurrence of scanOccurrences(pattern, text)) {
      const normalized = strategy.normalize(occurrence.value);
      if (normalized !== null) {
        found.push({ index: occurrence.index, value: normalized });
      }
    }
  }

  const seen = new Set<string>();
  const values: string[] = [];
  for (const { value } of found.sort((left, right) => left.index - right.index)) {
    const key = foldText(value);
    if (!seen.has(key)) {
      seen.add(key);
      values.push(value);
    }
  }
  return values.length > 0 ? values : null;
};

export const isPlausibleYear = (year: string, now: Date): boolean => {
  if (!/^\d{4}$/.test(year)) {
    return false;
  }
  const numeric = Number(year);
  return numeric >= YEAR_MIN && numeric <= now.getUTCFullYear() + 1;
};

/** `YYYY-MM-DD` naming a day that exists, such as 2024-02-29 but not 2023-02-31. */
export const isCalendarDate = (value: string): boolean => {
  const parts = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  return parts !== null && toIsoDate(Number(parts[1]), Number(parts[2]), Number(parts[3])) === value;
};

/** Cross-field checks: the year implied by the decision date wins over a stated year. */
export const reconcileMetadata = (record: MetadataRecord, now: Date): MetadataRecord => {
  const ambiguities = [...record.ambiguities];
  let year = record.year !== null && isPlausibleYear(record.year, now) ? record.year : null;
  const decisionDate =
    record.decisionDate !== null &&
    isCalendarDate(record.decisionDate) &&
    isPlausibleYear(record.decisionDate.slice(0, 4), now)
      ? record.decisionDate
      : null;

  if (decisionDate !== null) {
    const dateYear = decisionDate.slice(0, 4);
    if (year !== null && year !== dateYear && !ambiguities.includes("year")) {
      ambiguities.push("year");
    }
    year = dateYear;
  }

  return {
    ...record,
    year,
    decisionDate,
    partiallyAmbiguous: ambiguities.length > 0,
    ambiguities
  };
};

/**
 * Fills a metadata record from normalized ruling text. Fields are evaluated
 * independently; one failing strategy leaves only its own field unknown.
 */
export const extractMetadata = (normalizedText: string, options: ExtractMetadataOptions = {}): MetadataRecord => {
  const strategies = options.strategies ?? FIELD_STRATEGIES;
  const now = options.now?.() ?? new Date();
  const scalars: Partial<Record<ScalarMetadataField, string>> = {};
  const record = createUnknownMetadata();

  for (const strategy of strategies) {
    try {
      if (strategy.field === "parties") {
        record.parties = allValues(strategy, normalizedText);
        continue;
      }
      const value = firstValue(strategy, normalizedText);
      if (value !== null) {
        scalars[strategy.field] = value;
      }
    } catch (error) {
      logWarn("extraction.field.failed", options.context ?? {}, {
        field: strategy.field,
        ...serializeError(error)
      });
    }
  }

  const decisionType = scalars.decisionType;
  return reconcileMetadata(
    {
      ...record,
      courtName: scalars.courtName ?? null,
      caseNumber: scalars.caseNumber ?? null,
      judge: scalars.judge ?? null,
      clerk: scalars.clerk ?? null,
      caseType: scalars.caseType ?? null,
      district: scalars.district ?? null,
      decisionType: decisionType !== undefined && isDecisionType(decisionType) ? decisionType : null,
      year: scalars.year ?? null,
      decisionDate: scalars.decisionDate ?? null
    },
    now
  );
};
