import { METADATA_FIELDS, type MetadataField } from "../documents/types.js";
import { YEAR_MIN } from "../extraction/metadata-extractor.js";
import { baseFoldText, foldText, tokenize } from "../extraction/text-normalizer.js";
import type { FacetValueCount } from "../indexing/facet-cache.js";

/** Read-only facet view the analyzer needs; `FacetCache` satisfies it. */
export interface FacetLookup {
  values(field: MetadataField): FacetValueCount[];
  documentsWith(field: MetadataField, value: string): ReadonlySet<string>;
}

export interface HintCandidate {
  field: MetadataField;
  value: string;
  /** Positions of the utterance tokens this value accounts for. */
  matchedTokens: ReadonlySet<number>;
  documentCount: number;
}

export type HintCandidates = Partial<Record<MetadataField, HintCandidate[]>>;

export interface RecognizedHints {
  candidates: HintCandidates;
  residualQuery: string;
}

const TOKEN_HINT_FIELDS: readonly MetadataField[] = [
  "courtName",
  "judge",
  "clerk",
  "caseType",
  "district",
  "decisionType",
  "parties"
];

const MIN_HINT_TOKEN_LENGTH = 3;

// Base-folded case and plural endings, longest first.
const CASE_SUFFIXES = [
  "larin",
  "lerin",
  "lari",
  "leri",
  "nin",
  "nun",
  "dan",
  "den",
  "tan",
  "ten",
  "lar",
  "ler",
  "in",
  "un",
  "da",
  "de",
  "ta",
  "te",
  "ya",
  "ye",
  "ni",
  "nu",
  "a",
  "e",
  "i",
  "u"
];

// Words that name a kind of thing rather than a value, and request fillers.
const GENERIC_WORDS = new Set([
  "mehkeme",
  "mehkemesi",
  "rayon",
  "rayonu",
  "seher",
  "seheri",
  "respublika",
  "respublikasi",
  "azerbaycan",
  "qerar",
  "hokm",
  "hakim",
  "katib",
  "oglu",
  "qizi",
  "uzre",
  "ile",
  "haqqinda",
  "barede",
  "olan",
  "butun",
  "goster",
  "tap",
  "axtar",
  "siyahi",
  "siyahisi"
]);

const collator = new Intl.Collator("az");

/** The token itself plus up to two layers of stripped case endings. */
export const stemVariants = (token: string): string[] => {
  const variants = new Set<string>([token]);
  const strip = (value: string): string[] =>
    CASE_SUFFIXES.filter(
      (suffix) => value.endsWith(suffix) && value.length - suffix.length >= MIN_HINT_TOKEN_LENGTH
    ).map((suffix) => value.slice(0, -suffix.length));

  for (const first of strip(token)) {
    variants.add(first);
    for (const second of strip(first)) {
      variants.add(second);
    }
  }
  return [...variants];
};

export const isGenericWord = (token: string): boolean => stemVariants(token).some((variant) => GENERIC_WORDS.has(variant));

const hintTokens = (value: string): string[] =>
  tokenize(value)
    .map(baseFoldText)
    .filter((token) => token.length >= MIN_HINT_TOKEN_LENGTH && !isGenericWord(token));

export interface UtteranceTokens {
  folded: string[];
  variants: string[][];
}

export const readUtteranceTokens = (utterance: string): UtteranceTokens => {
  const folded = tokenize(utterance);
  return { folded, variants: folded.map((token) => stemVariants(baseFoldText(token))) };
};

/** Utterance positions matched by any of the value's distinctive tokens. */
export const matchValueTokens = (value: string, utterance: UtteranceTokens): Set<number> => {
  const matched = new Set<number>();
  for (const valueToken of hintTokens(value)) {
    utterance.variants.forEach((variants, position) => {
      if (variants.includes(valueToken)) {
        matched.add(position);
      }
    });
  }
  return matched;
};

const isStrictSubset = (inner: ReadonlySet<number>, outer: ReadonlySet<number>): boolean =>
  inner.size < outer.size && [...inner].every((position) => outer.has(position));

/** Drops candidates whose matched tokens another candidate fully covers and extends. */
export const dropDominated = (candidates: HintCandidate[]): HintCandidate[] =>
  candidates.filter(
    (candidate) => !candidates.some((other) => other !== candidate && isStrictSubset(candidate.matchedTokens, other.matchedTokens))
  );

export const rankCandidates = (candidates: HintCandidate[]): HintCandidate[] =>
  [...candidates].sort(
    (left, right) => right.documentCount - left.documentCount || collator.compare(left.value, right.value)
  );

const yearCandidates = (utterance: UtteranceTokens, facets: FacetLookup, now: Date): HintCandidate[] => {
  const maxYear = now.getUTCFullYear() + 1;
  const candidates: HintCandidate[] = [];
  utterance.folded.forEach((token, position) => {
    if (!/^\d{4}$/.test(token)) {
      return;
    }
    const year = Number(token);
    if (year < YEAR_MIN || year > maxYear || candidates.some((candidate) => candidate.value === token)) {
      return;
    }
    candidates.push({
      field: "year",
      value: token,
      matchedTokens: new Set([position]),
      documentCount: facets.documentsWith("year", token).size
    });
  });
  return candidates;
};

const caseNumberCandidates = (utterance: string, tokens: UtteranceTokens, facets: FacetLookup): HintCandidate[] => {
  const folded = foldText(utterance);
  return facets
    .values("caseNumber")
    .filter((entry) => folded.includes(foldText(entry.value)))
    .map((entry): HintCandidate => {
      const valueTokens = new Set(tokenize(entry.value));
      const matched = new Set<number>();
      tokens.folded.forEach((token, position) => {
        if (valueTokens.has(token)) {
          matched.add(position);
        }
      });
      return { field: "caseNumber", value: entry.value, matchedTokens: matched, documentCount: entry.documentCount };
    });
};

const documentsFor = (facets: FacetLookup, candidate: HintCandidate): ReadonlySet<string> =>
  facets.documentsWith(candidate.field, candidate.value);

const coOccurs = (left: ReadonlySet<string>, right: ReadonlySet<string>): boolean => {
  for (const documentId of left) {
    if (right.has(documentId)) {
      return true;
    }
  }
  return false;
};

/**
 * Keeps the candidates of an ambiguous field that share a document with at
 * least one candidate of every other recognized field. Falls back to the
 * unnarrowed set when nothing survives.
 */
export const narrowByCoOccurrence = (grouped: HintCandidates, facets: FacetLookup): HintCandidates => {
  const narrowed: HintCandidates = {};
  for (const [field, candidates] of groupedEntries(grouped)) {
    if (candidates.length <= 1) {
      narrowed[field] = candidates;
      continue;
    }
    const others = groupedEntries(grouped).filter(([otherField, list]) => otherField !== field && list.length > 0);
    const kept = candidates.filter((candidate) => {
      const documents = documentsFor(facets, candidate);
      return others.every(([, list]) => list.some((other) => coOccurs(documents, documentsFor(facets, other))));
    });
    narrowed[field] = kept.length > 0 ? kept : candidates;
  }
  return narrowed;
};

export const groupedEntries = (grouped: HintCandidates): Array<[MetadataField, HintCandidate[]]> => {
  const entries: Array<[MetadataField, HintCandidate[]]> = [];
  for (const field of METADATA_FIELDS) {
    const list = grouped[field];
    if (list && list.length > 0) {
      entries.push([field, list]);
    }
  }
  return entries;
};

/**
 * Matches utterance tokens against known facet values and year mentions.
 * What no surviving candidate accounts for becomes the residual query.
 */
export const recognizeHints = (utterance: string, facets: FacetLookup, now: Date = new Date()): RecognizedHints => {
  const tokens = readUtteranceTokens(utterance);
  const found: HintCandidate[] = [];

  for (const field of TOKEN_HINT_FIELDS) {
    for (const entry of facets.values(field)) {
      const matchedTokens = matchValueTokens(entry.value, tokens);
      if (matchedTokens.size > 0) {
        found.push({ field, value: entry.value, matchedTokens, documentCount: entry.documentCount });
      }
    }
  }
  found.push(...caseNumberCandidates(utterance, tokens, facets));
  found.push(...yearCandidates(tokens, facets, now));

  const surviving = dropDominated(found.filter((candidate) => candidate.matchedTokens.size > 0));
  const grouped: HintCandidates = {};
  for (const candidate of surviving) {
    grouped[candidate.field] = [...(grouped[candidate.field] ?? []), candidate];
  }
  const narrowed = narrowByCoOccurrence(grouped, facets);
  const ranked: HintCandidates = {};
  for (const [field, list] of groupedEntries(narrowed)) {
    ranked[field] = rankCandidates(list);
  }

  const consumed = new Set<number>();
  for (const candidate of surviving) {
    candidate.matchedTokens.forEach((position) => consumed.add(position));
  }
  const residualQuery = tokens.folded
    .filter((token, position) => !consumed.has(position) && !isGenericWord(baseFoldText(token)))
    .join(" ");

  return { candidates: ranked, residualQuery };
};
