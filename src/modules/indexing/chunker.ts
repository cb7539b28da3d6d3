export interface ChunkingOptions {
  maxChars: number;
  overlapChars: number;
}

export interface TextChunk {
  sequence: number;
  text: string;
}

/** How far the overlap may reach back to avoid starting mid-word. */
export const OVERLAP_WORD_EXTENSION = 32;

const PARAGRAPH_SEPARATOR = "\n\n";
const SENTENCE_BOUNDARY = /(?<=[.!?;])\s+/u;

interface Unit {
  text: string;
  /** Separator placed before this unit when it joins preceding text. */
  separator: string;
}

const hardSplit = (text: string, budget: number): string[] => {
  const pieces: string[] = [];
  let current = "";
  for (const word of text.split(" ")) {
    if (word.length > budget) {
      if (current) {
        pieces.push(current);
        current = "";
      }
      for (let offset = 0; offset < word.length; offset += budget) {
        pieces.push(word.slice(offset, offset + budget));
      }
      continue;
    }
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > budget) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) {
    pieces.push(current);
  }
  return pieces;
};

const toUnits = (text: string, budget: number): Unit[] => {
  const units: Unit[] = [];
  for (const paragraph of text.split(PARAGRAPH_SEPARATOR)) {
    if (paragraph.length <= budget) {
      units.push({ text: paragraph, separator: PARAGRAPH_SEPARATOR });
      continue;
    }
    let separator = PARAGRAPH_SEPARATOR;
    for (const sentence of paragraph.split(SENTENCE_BOUNDARY)) {
      const pieces = sentence.length <= budget ? [sentence] : hardSplit(sentence, budget);
      for (const piece of pieces) {
        units.push({ text: piece, separator });
        separator = " ";
      }
    }
  }
  return units.filter((unit) => unit.text.length > 0);
};

/** Trailing `overlapChars` of `chunk`, moved back to a word start when one is near. */
export const overlapTail = (chunk: string, overlapChars: number): string => {
  if (overlapChars <= 0) {
    return "";
  }
  if (chunk.length <= overlapChars) {
    return chunk;
  }
  const base = chunk.length - overlapChars;
  let start = base;
  while (start > 0 && base - start < OVERLAP_WORD_EXTENSION && !/\s/u.test(chunk[start - 1] ?? " ")) {
    start -= 1;
  }
  if (start > 0 && !/\s/u.test(chunk[start - 1] ?? " ")) {
    start = base;
  }
  return chunk.slice(start);
};

/**
 * Splits normalized text into bounded chunks on paragraph, then sentence,
 * then word boundaries. Every chunk is at most `maxChars` long and begins
 * with the overlap tail of the previous chunk. Always yields at least one chunk.
 */
export const chunkText = (text: string, options: ChunkingOptions): TextChunk[] => {
  const { maxChars, overlapChars } = options;
  const budget = maxChars - overlapChars - OVERLAP_WORD_EXTENSION - PARAGRAPH_SEPARATOR.length;
  if (overlapChars < 0 || budget < 1) {
    throw new RangeError(
      `maxChars (${maxChars}) leaves no room for new text after an overlap of ${overlapChars} characters.`
    );
  }

  if (text.length <= maxChars) {
    return [{ sequence: 0, text }];
  }

  const chunks: string[] = [];
  let current = "";
  for (const unit of toUnits(text, budget)) {
    const candidate = current ? `${current}${unit.separator}${unit.text}` : unit.text;
    if (candidate.length <= maxChars) {
      current = candidate;
      continue;
    }
    chunks.push(current);
    const tail = overlapTail(current, overlapChars);
    current = tail ? `${tail}${unit.separator}${unit.text}` : unit.text;
  }
  if (current) {
    chunks.push(current);
  }

  return chunks.map((body, sequence) => ({ sequence, text: body }));
};
