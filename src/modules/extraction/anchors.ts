// Characters OCR engines commonly substitute for a given lowercase letter.
const OCR_CONFUSIONS: Record<string, string> = {
  i: "iİIı1l",
  ı: "ıIi1l",
  l: "lI1i",
  o: "oO0",
  ə: "əƏeE",
  e: "eEəƏ",
  ş: "şŞsS",
  ç: "çÇcC",
  ğ: "ğĞgG",
  ü: "üÜuU",
  ö: "öÖoO0"
};

const LETTER = /\p{L}/u;

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");

const escapeClassChar = (char: string): string => (/[\\\]^-]/.test(char) ? `\\${char}` : char);

const letterClass = (char: string, allowNonLetters: boolean): string => {
  const lower = char.toLocaleLowerCase("az");
  const variants = new Set<string>([
    char,
    lower,
    char.toLocaleUpperCase("az"),
    lower.toLocaleUpperCase("az")
  ]);
  for (const variant of OCR_CONFUSIONS[lower] ?? "") {
    if (allowNonLetters || LETTER.test(variant)) {
      variants.add(variant);
    }
  }
  return `[${[...variants].map(escapeClassChar).join("")}]`;
};

const upperLetterClass = (char: string): string => {
  const upper = char.toLocaleUpperCase("az");
  const variants = new Set<string>([upper]);
  for (const variant of OCR_CONFUSIONS[char.toLocaleLowerCase("az")] ?? "") {
    if (LETTER.test(variant) && variant === variant.toLocaleUpperCase("az")) {
      variants.add(variant);
    }
  }
  return `[${[...variants].map(escapeClassChar).join("")}]`;
};

// One stray non-letter between two letters of a label is tolerated.
const NOISE = "[^\\p{L}\\s]?";

const buildWord = (word: string, charClass: (char: string, index: number) => string): string =>
  [...word]
    .map((char, index) => (LETTER.test(char) ? charClass(char, index) : escapeRegExp(char)))
    .join(NOISE);

/**
 * Regex source matching `label` case-insensitively with OCR-confusable
 * letters, optional stray punctuation and any run of whitespace (including
 * none) between words. The first letter never matches a digit.
 */
export const fuzzyAnchor = (label: string): string =>
  label
    .trim()
    .split(/\s+/)
    .map((word, wordIndex) =>
      buildWord(word, (char, index) => letterClass(char, wordIndex > 0 || index > 0))
    )
    .join("\\s*");

/** Like `fuzzyAnchor` but only matches upper-case renderings. */
export const upperAnchor = (label: string): string =>
  label
    .trim()
    .split(/\s+/)
    .map((word) => buildWord(word, (char) => upperLetterClass(char)))
    .join("\\s*");

export const LEFT_BOUNDARY = "(?<![\\p{L}\\p{N}])";
export const RIGHT_BOUNDARY = "(?![\\p{L}])";
export const LOOSE_SEPARATOR = "\\s*[:.\\-]?\\s*";
export const STRICT_SEPARATOR = "\\s*[:\\-]\\s*";
export const FREE_VALUE = "[\\s\\S]{1,160}";

export interface LabelPatternOptions {
  strictSeparator?: boolean;
  value?: string;
}

export const labelPattern = (labels: readonly string[], options: LabelPatternOptions = {}): RegExp => {
  const separator = options.strictSeparator ? STRICT_SEPARATOR : LOOSE_SEPARATOR;
  const anchors = labels.map(fuzzyAnchor).join("|");
  return new RegExp(
    `${LEFT_BOUNDARY}(?:${anchors})${RIGHT_BOUNDARY}${separator}(?<value>${options.value ?? FREE_VALUE})`,
    "u"
  );
};
