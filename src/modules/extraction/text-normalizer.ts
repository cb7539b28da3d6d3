// Lookalike code points that OCR engines and word processors emit for Azerbaijani text.
const CHARACTER_REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[\u04D9\u01DD]/g, "\u0259"],
  [/[\u04D8\u018E]/g, "\u018F"],
  [/[\u2018\u2019\u201A\u02BC`\u00B4]/g, "'"],
  [/[\u201C\u201D\u201E\u00AB\u00BB]/g, '"'],
  [/[\u2010-\u2015\u2212]/g, "-"],
  [/[\u00A0\u2007\u2009\u200A\u202F]/g, " "],
  [/[\u200B-\u200D\uFEFF\u00AD]/g, ""],
  [/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, ""]
];

const PARAGRAPH_BREAK = /\n\s*\n/;

/**
 * Canonical Unicode form, unified punctuation, collapsed whitespace inside
 * paragraphs and `\n\n` between them. Idempotent.
 */
export const normalizeText = (raw: string): string => {
  let text = raw.normalize("NFC").replace(/\r\n?/g, "\n");
  for (const [pattern, replacement] of CHARACTER_REPLACEMENTS) {
    text = text.replace(pattern, replacement);
  }

  return text
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.replace(/\s+/g, " ").trim())
    .filter((paragraph) => paragraph.length > 0)
    .join("\n\n");
};

/**
 * Case- and whitespace-insensitive comparison key. Dotted and dotless i are
 * merged because OCR output does not keep them apart reliably.
 */
export const foldText = (value: string): string =>
  value
    .normalize("NFC")
    .toLocaleLowerCase("az")
    .replace(/\u0307/g, "")
    .replace(/ı/g, "i")
    .replace(/\s+/g, " ")
    .trim();

const DIACRITIC_BASES: Record<string, string> = {
  ə: "e",
  ö: "o",
  ü: "u",
  ş: "s",
  ç: "c",
  ğ: "g"
};

/** `foldText` with Azerbaijani diacritics dropped, for OCR-tolerant lookups. */
export const baseFoldText = (value: string): string =>
  foldText(value).replace(/[əöüşçğ]/g, (char) => DIACRITIC_BASES[char] ?? char);

export const tokenize = (value: string): string[] =>
  foldText(value)
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
