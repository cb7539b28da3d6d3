import { buildClarificationPrompt } from "../../prompts/index.js";
import type { MetadataField } from "../documents/types.js";
import { foldText } from "../extraction/text-normalizer.js";
import type { SearchFilters } from "../search/hybrid-search.js";
import {
  dropDominated,
  groupedEntries,
  matchValueTokens,
  readUtteranceTokens,
  recognizeHints,
  type FacetLookup,
  type HintCandidate
} from "./query-analyzer.js";

export const CONVERSATION_STATUSES = ["awaiting-query", "awaiting-clarification", "ready-to-search"] as const;

export type ConversationStatus = (typeof CONVERSATION_STATUSES)[number];

export interface PendingClarification {
  field: MetadataField;
  /** Best guess first. */
  candidates: string[];
}

/** Immutable; every call to `analyze` returns a new state for the caller to keep. */
export interface ConversationState {
  status: ConversationStatus;
  clarificationRounds: number;
  pending: PendingClarification | null;
  queued: PendingClarification[];
  filters: SearchFilters;
  residualQuery: string;
  bestEffort: boolean;
}

export interface DialogueSettings {
  maxClarificationRounds: number;
  ambiguityThreshold: number;
}

export interface AnalyzeContext {
  facets: FacetLookup;
  settings: DialogueSettings;
  now?: Date;
}

export interface AnalysisResult {
  filters: SearchFilters;
  residualQuery: string;
  nextState: ConversationState;
  clarificationPrompt: string | null;
  clarificationField: MetadataField | null;
  candidates: string[];
  bestEffort: boolean;
}

export const DEFAULT_DIALOGUE_SETTINGS: DialogueSettings = {
  maxClarificationRounds: 2,
  ambiguityThreshold: 1
};

export const createConversationState = (): ConversationState => ({
  status: "awaiting-query",
  clarificationRounds: 0,
  pending: null,
  queued: [],
  filters: {},
  residualQuery: "",
  bestEffort: false
});

interface Progress {
  filters: SearchFilters;
  queue: PendingClarification[];
  residualQuery: string;
  rounds: number;
  bestEffort: boolean;
}

/**
 * Asks about the next ambiguous field while rounds remain; once they are
 * spent, takes the best guess for every remaining field.
 */
const advance = (progress: Progress, settings: DialogueSettings): AnalysisResult => {
  const filters: SearchFilters = { ...progress.filters };
  const queue = [...progress.queue];
  let bestEffort = progress.bestEffort;

  let next = queue.shift();
  while (next) {
    if (progress.rounds < settings.maxClarificationRounds) {
      const rounds = progress.rounds + 1;
      return {
        filters,
        residualQuery: progress.residualQuery,
        nextState: {
          status: "awaiting-clarification",
          clarificationRounds: rounds,
          pending: next,
          queued: queue,
          filters,
          residualQuery: progress.residualQuery,
          bestEffort
        },
        clarificationPrompt: buildClarificationPrompt(next.field, next.candidates),
        clarificationField: next.field,
        candidates: next.candidates,
        bestEffort
      };
    }
    const guess = next.candidates[0];
    if (guess !== undefined) {
      filters[next.field] = guess;
      bestEffort = true;
    }
    next = queue.shift();
  }

  return {
    filters,
    residualQuery: progress.residualQuery,
    nextState: {
      status: "ready-to-search",
      clarificationRounds: progress.rounds,
      pending: null,
      queued: [],
      filters,
      residualQuery: progress.residualQuery,
      bestEffort
    },
    clarificationPrompt: null,
    clarificationField: null,
    candidates: [],
    bestEffort
  };
};

const startQuery = (utterance: string, state: ConversationState, context: AnalyzeContext): AnalysisResult => {
  const hints = recognizeHints(utterance, context.facets, context.now);
  const filters: SearchFilters = {};
  const queue: PendingClarification[] = [];

  for (const [field, candidates] of groupedEntries(hints.candidates)) {
    if (candidates.length > context.settings.ambiguityThreshold) {
      queue.push({ field, candidates: candidates.map((candidate) => candidate.value) });
      continue;
    }
    const top = candidates[0];
    if (top) {
      filters[field] = top.value;
    }
  }

  return advance(
    {
      filters,
      queue,
      residualQuery: hints.residualQuery,
      rounds: state.clarificationRounds,
      bestEffort: false
    },
    context.settings
  );
};

/** Ordinal, exact value, or a token match that singles out one pending candidate. */
export const resolveClarificationReply = (reply: string, pending: PendingClarification): string | null => {
  const trimmed = reply.trim().replace(/[.)]$/, "");
  if (/^\d+$/.test(trimmed)) {
    return pending.candidates[Number(trimmed) - 1] ?? null;
  }

  const folded = foldText(reply);
  const exact = pending.candidates.find((candidate) => foldText(candidate) === folded);
  if (exact !== undefined) {
    return exact;
  }

  const tokens = readUtteranceTokens(reply);
  const matched: HintCandidate[] = pending.candidates
    .map((value) => ({
      field: pending.field,
      value,
      matchedTokens: matchValueTokens(value, tokens),
      documentCount: 0
    }))
    .filter((candidate) => candidate.matchedTokens.size > 0);
  const surviving = dropDominated(matched);
  return surviving.length === 1 ? surviving[0]?.value ?? null : null;
};

const continueClarification = (utterance: string, state: ConversationState, context: AnalyzeContext): AnalysisResult => {
  const pending = state.pending;
  if (!pending) {
    return startQuery(utterance, state, context);
  }

  const resolved = resolveClarificationReply(utterance, pending);
  const filters: SearchFilters = { ...state.filters };
  if (resolved !== null) {
    filters[pending.field] = resolved;
  }
  const progress: Progress = {
    filters,
    queue: resolved === null ? [pending, ...state.queued] : state.queued,
    residualQuery: state.residualQuery,
    rounds: state.clarificationRounds,
    bestEffort: state.bestEffort
  };
  return advance(progress, context.settings);
};

/**
 * Turns one utterance into search filters and a residual query, or into a
 * clarification question when a field has several plausible values.
 */
export const analyze = (utterance: string, state: ConversationState, context: AnalyzeContext): AnalysisResult =>
  state.status === "awaiting-clarification"
    ? continueClarification(utterance, state, context)
    : startQuery(utterance, state, context);
