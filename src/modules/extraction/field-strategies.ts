import type { MetadataField } from "../documents/types.js";
import {
  FREE_VALUE,
  LEFT_BOUNDARY,
  RIGHT_BOUNDARY,
  STRICT_SEPARATOR,
  fuzzyAnchor,
  labelPattern,
  upperAnchor
} from "./anchors.js";
import { KNOWN_COURTS, KNOWN_DISTRICTS, canonicalizeInstitution } from "./institutions.js";
import { baseFoldText, foldText } from "./text-normalizer.js";

export type FieldNormalizer = (value: string) => string | null;

/**
 * One row of the extraction table. Patterns are tried in order and every
 * occurrence of a pattern is offered to `normalize` until one yields a value.
 * Each pattern exposes the captured region as the `value` group. The
 * `parties` row collects every normalized occurrence instead.
 */
export interface FieldStrategy {
  field: MetadataField;
  patterns: readonly RegExp[];
  normalize: FieldNormalizer;
}

const LABELS = {
  courtName: ["Məhkəmənin adı"],
  caseNumber: ["İşin nömrəsi", "İş nömrəsi"],
  judge: ["Sədrlik edən hakim", "Sədrlik edən", "Hakim"],
  clerk: ["Məhkəmə iclasının katibi", "İclas katibi", "Katib"],
  caseType: ["İşin növü", "İşin kateqoriyası"],
  district: ["Rayon", "Ərazi"],
  decisionType: ["Məhkəmə aktı", "Aktın növü"],
  year: ["İl"],
  decisionDate: ["Qərarın tarixi", "Tarix"],
  parties: ["İddiaçı", "Ərizəçi", "Cavabdeh", "Təqsirləndirilən şəxs", "Təqsirləndirilən", "Məhkum", "Şikayətçi"]
} satisfies Record<MetadataField, readonly string[]>;

const CASE_NUMBER_ANCHOR = `${fuzzyAnchor("İş")}\\s*(?:№|N[oO0]?\\.?)`;

const byLengthDesc = (values: readonly string[]): string[] => [...values].sort((a, b) => b.length - a.length);

const STOP_PATTERN = new RegExp(
  `${LEFT_BOUNDARY}(?:(?:${byLengthDesc(Object.values(LABELS).flat()).map(fuzzyAnchor).join("|")})${RIGHT_BOUNDARY}${STRICT_SEPARATOR}|${CASE_NUMBER_ANCHOR})`,
  "u"
);

/** Truncates a captured region where the next labelled field begins. */
export const cutAtNextLabel = (value: string): string => {
  const index = value.search(STOP_PATTERN);
  return index >= 0 ? value.slice(0, index) : value;
};

const LETTERS = /\p{L}/gu;

const hasLetters = (value: string, minimum: number): boolean => (value.match(LETTERS)?.length ?? 0) >= minimum;

const collapse = (value: string): string => value.replace(/\s+/g, " ").trim();

/** Label-bounded, paragraph-bounded, sentence-bounded free text. */
const freeText = (raw: string, maxLength: number): string | null => {
  let text = cutAtNextLabel(raw).trimStart();
  const paragraphEnd = text.indexOf("\n\n");
  if (paragraphEnd >= 0) {
    text = text.slice(0, paragraphEnd);
  }
  const sentenceEnd = text.search(/[.;](?:\s|$)/u);
  if (sentenceEnd >= 0) {
    text = text.slice(0, sentenceEnd);
  }
  text = collapse(text).replace(/^["',:\-\s]+|["',:\-\s]+$/gu, "");
  if (text.length > maxLength) {
    const cut = text.slice(0, maxLength);
    const lastSpace = cut.lastIndexOf(" ");
    text = lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
  }
  return hasLetters(text, 2) ? text : null;
};

const NAME_WORD = /^\p{Lu}[\p{L}'.\-]*$/u;
const PATRONYMICS = new Set(["oğlu", "qızı"]);
const NON_NAME_WORDS = new Set(
  [
    "İl",
    "Tarix",
    "Katib",
    "Rayon",
    "İş",
    "İşin",
    "Məhkəmə",
    "Məhkəməsi",
    "Hakim",
    "İddiaçı",
    "Ərizəçi",
    "Cavabdeh",
    "Qətnamə",
    "Qərar",
    "Qərarnamə",
    "Azərbaycan",
    "Respublikası"
  ].map(foldText)
);

export const normalizePersonName: FieldNormalizer = (raw) => {
  const words = collapse(cutAtNextLabel(raw)).split(" ");
  const taken: string[] = [];
  for (const word of words) {
    const cleaned = word.replace(/[,;:)]+$/u, "");
    const folded = foldText(cleaned);
    const isPatronymic = taken.length > 0 && PATRONYMICS.has(folded);
    if (!isPatronymic && (!NAME_WORD.test(cleaned) || NON_NAME_WORDS.has(folded.replace(/\.$/, "")))) {
      break;
    }
    const endsSentence = cleaned.endsWith(".") && cleaned.length > 2;
    taken.push(endsSentence ? cleaned.slice(0, -1) : cleaned);
    if (endsSentence || cleaned !== word || taken.length === 5) {
      break;
    }
  }
  const name = taken.join(" ");
  return hasLetters(name, 2) ? name : null;
};

export const normalizeCaseNumber: FieldNormalizer = (raw) => {
  const match = /^[№#]?\s*(?<number>[\p{L}\p{N}]*\p{N}[\p{L}\p{N}()/.\-]*)/u.exec(cutAtNextLabel(raw).trimStart());
  const number = match?.groups?.number?.replace(/[.\-]+$/u, "");
  return number && /\p{N}/u.test(number) ? number : null;
};

const CASE_TYPE_CATEGORIES: ReadonlyArray<readonly [string, string]> = [
  ["inzibati xeta", "İnzibati xəta"],
  ["inzibati", "İnzibati"],
  ["mulki", "Mülki"],
  ["cinayet", "Cinayət"],
  ["kommersiya", "Kommersiya"],
  ["iqtisadi", "Kommersiya"]
];

export const normalizeCaseType: FieldNormalizer = (raw) => {
  const text = freeText(raw, 80);
  if (text === null) {
    return null;
  }
  const key = baseFoldText(text);
  let best: { index: number; canonical: string } | null = null;
  for (const [stem, canonical] of CASE_TYPE_CATEGORIES) {
    const index = key.indexOf(stem);
    if (index >= 0 && (best === null || index < best.index)) {
      best = { index, canonical };
    }
  }
  return best?.canonical ?? text;
};

const PROPER_NOUN_PHRASE = /^\p{Lu}[\p{L}\-]*(?:\s\p{Lu}[\p{L}\-]*){0,2}$/u;
const DISTRICT_SUFFIX = new RegExp(`\\s+(?:${["rayonu", "rayon", "şəhəri", "şəhər"].map(fuzzyAnchor).join("|")})$`, "u");

export const normalizeDistrict: FieldNormalizer = (raw) => {
  const text = freeText(raw, 60);
  if (text === null) {
    return null;
  }
  const stripped = text.replace(DISTRICT_SUFFIX, "");
  return canonicalizeInstitution(stripped, KNOWN_DISTRICTS) ?? (PROPER_NOUN_PHRASE.test(stripped) ? stripped : null);
};

const COURT_SUFFIX_END = new RegExp(`^[\\s\\S]*?${fuzzyAnchor("məhkəməsi")}`, "u");
const STATE_PREFIX = new RegExp(`^${fuzzyAnchor("Azərbaycan Respublikası")}(?:${fuzzyAnchor("nın")})?\\s*`, "u");

export const normalizeCourtName: FieldNormalizer = (raw) => {
  let text = collapse(cutAtNextLabel(raw).split("\n\n")[0] ?? "");
  const throughSuffix = COURT_SUFFIX_END.exec(text);
  if (throughSuffix) {
    text = throughSuffix[0];
  } else {
    text = freeText(text, 120) ?? "";
  }
  const withoutPrefix = text.replace(STATE_PREFIX, "");
  const known =
    canonicalizeInstitution(text, KNOWN_COURTS) ?? canonicalizeInstitution(withoutPrefix, KNOWN_COURTS);
  if (known) {
    return known;
  }
  return hasLetters(withoutPrefix, 2) ? withoutPrefix : null;
};

const DECISION_TYPE_KEYS: Record<string, string> = {
  qerarname: "QƏRARNAMƏ",
  qetname: "QƏTNAMƏ",
  qerar: "QƏRAR"
};

export const normalizeDecisionType: FieldNormalizer = (raw) => {
  const firstWord = collapse(raw).split(" ")[0] ?? "";
  const key = baseFoldText(firstWord).replace(/[^\p{L}]/gu, "");
  return DECISION_TYPE_KEYS[key] ?? null;
};

export const normalizeYear: FieldNormalizer = (raw) => {
  const match = /^\s*(\d{4})(?!\d)/.exec(raw);
  return match?.[1] ?? null;
};

const MONTHS: Record<string, number> = {
  yanvar: 1,
  fevral: 2,
  mart: 3,
  aprel: 4,
  may: 5,
  iyun: 6,
  iyul: 7,
  avqust: 8,
  sentyabr: 9,
  oktyabr: 10,
  noyabr: 11,
  dekabr: 12
};

const NUMERIC_DATE = "\\d{1,2}\\s?[./\\-]\\s?\\d{1,2}\\s?[./\\-]\\s?\\d{4}";
const TEXTUAL_DATE = `\\d{1,2}\\s+(?:${Object.keys(MONTHS).map(fuzzyAnchor).join("|")})\\s+\\d{4}`;

export const toIsoDate = (year: number, month: number, day: number): string | null => {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
};

export const normalizeDate: FieldNormalizer = (raw) => {
  const text = raw.trim();
  const numeric = /^(\d{1,2})\s?[./\-]\s?(\d{1,2})\s?[./\-]\s?(\d{4})/.exec(text);
  if (numeric) {
    return toIsoDate(Number(numeric[3]), Number(numeric[2]), Number(numeric[1]));
  }
  const textual = /^(\d{1,2})\s+(\p{L}+)\s+(\d{4})/u.exec(text);
  if (textual) {
    const month = MONTHS[baseFoldText(textual[2] ?? "")];
    return month === undefined ? null : toIsoDate(Number(textual[3]), month, Number(textual[1]));
  }
  return null;
};

export const normalizeParty: FieldNormalizer = (raw) => {
  const text = freeText(raw, 100);
  if (text === null) {
    return null;
  }
  const party = text.split(/[,;]/u)[0]?.trim() ?? "";
  return hasLetters(party, 3) ? party : null;
};

const alternation = (values: readonly string[], anchor: (value: string) => string): string =>
  byLengthDesc(values).map(anchor).join("|");

const NAME_IN_GENITIVE =
  "(?<value>\\p{Lu}[\\p{L}.]*(?:\\s+\\p{Lu}[\\p{L}.]*){0,3}?(?:\\s+(?:oğlu|qızı))?)n?[ıiuü]n";

export const FIELD_STRATEGIES: readonly FieldStrategy[] = [
  {
    field: "courtName",
    patterns: [
      labelPattern(LABELS.courtName),
      new RegExp(`${LEFT_BOUNDARY}(?<value>${alternation(KNOWN_COURTS, fuzzyAnchor)})${RIGHT_BOUNDARY}`, "u"),
      new RegExp(
        `${LEFT_BOUNDARY}(?<value>(?:\\p{Lu}[\\p{L}\\-]*\\s+){1,4}(?:(?:${fuzzyAnchor("rayon")}|${fuzzyAnchor("şəhər")})\\s+)?${fuzzyAnchor("məhkəməsi")})${RIGHT_BOUNDARY}`,
        "u"
      )
    ],
    normalize: normalizeCourtName
  },
  {
    field: "caseNumber",
    patterns: [
      labelPattern(LABELS.caseNumber),
      new RegExp(`${LEFT_BOUNDARY}${CASE_NUMBER_ANCHOR}\\s*[:.]?\\s*(?<value>[\\s\\S]{1,60})`, "u"),
      new RegExp(`(?<![\\p{L}\\p{N}])№\\s*(?<value>[\\p{L}\\p{N}()\\-.]*\\d[\\p{L}\\p{N}()\\-.]*\\/\\d{2,4})`, "u")
    ],
    normalize: normalizeCaseNumber
  },
  {
    field: "judge",
    patterns: [
      labelPattern(LABELS.judge, { strictSeparator: true }),
      new RegExp(`${LEFT_BOUNDARY}${fuzzyAnchor("hakim")}\\s+${NAME_IN_GENITIVE}\\s+${fuzzyAnchor("sədrliyi")}`, "u"),
      labelPattern(LABELS.judge)
    ],
    normalize: normalizePersonName
  },
  {
    field: "clerk",
    patterns: [
      labelPattern(LABELS.clerk, { strictSeparator: true }),
      new RegExp(`${LEFT_BOUNDARY}${fuzzyAnchor("katibi")}\\s+${NAME_IN_GENITIVE}\\s+${fuzzyAnchor("iştirakı")}`, "u"),
      labelPattern(LABELS.clerk)
    ],
    normalize: normalizePersonName
  },
  {
    field: "caseType",
    patterns: [
      labelPattern(LABELS.caseType),
      new RegExp(
        `${LEFT_BOUNDARY}(?<value>${alternation(["inzibati xəta", "inzibati", "mülki", "cinayət", "kommersiya"], fuzzyAnchor)})\\s+${fuzzyAnchor("iş")}`,
        "u"
      )
    ],
    normalize: normalizeCaseType
  },
  {
    field: "district",
    patterns: [
      labelPattern(LABELS.district, { strictSeparator: true }),
      new RegExp(
        `${LEFT_BOUNDARY}(?<value>${alternation(KNOWN_DISTRICTS, fuzzyAnchor)})\\s*(?:${fuzzyAnchor("rayon")}|${fuzzyAnchor("şəhər")})`,
        "u"
      )
    ],
    normalize: normalizeDistrict
  },
  {
    field: "decisionType",
    patterns: [
      labelPattern(LABELS.decisionType),
      new RegExp(`${LEFT_BOUNDARY}(?<value>${alternation(["QƏRARNAMƏ", "QƏTNAMƏ", "QƏRAR"], upperAnchor)})${RIGHT_BOUNDARY}`, "u")
    ],
    normalize: normalizeDecisionType
  },
  {
    field: "year",
    patterns: [
      labelPattern(LABELS.year, { strictSeparator: true, value: "\\d{4}(?!\\d)" }),
      new RegExp(`${LEFT_BOUNDARY}(?<value>\\d{4})\\s*-?\\s*c[iıuü]\\s+${fuzzyAnchor("il")}${RIGHT_BOUNDARY}`, "u")
    ],
    normalize: normalizeYear
  },
  {
    field: "decisionDate",
    patterns: [
      labelPattern(LABELS.decisionDate, { value: `${NUMERIC_DATE}|${TEXTUAL_DATE}` }),
      new RegExp(`(?<!\\d)(?<value>${NUMERIC_DATE})(?!\\d)`, "u"),
      new RegExp(`(?<!\\d)(?<value>${TEXTUAL_DATE})(?!\\d)`, "u")
    ],
    normalize: normalizeDate
  },
  {
    field: "parties",
    patterns: [labelPattern(LABELS.parties, { strictSeparator: true, value: FREE_VALUE })],
    normalize: normalizeParty
  }
];
