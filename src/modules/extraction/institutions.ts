import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { baseFoldText } from "./text-normalizer.js";

const institutionsFile = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../resources/institutions.json"
);

const institutionListsSchema = z.object({
  courts: z.array(z.string().min(1)),
  districts: z.array(z.string().min(1))
});

const institutionLists = institutionListsSchema.parse(JSON.parse(readFileSync(institutionsFile, "utf8")));

export const KNOWN_COURTS: readonly string[] = institutionLists.courts;

export const KNOWN_DISTRICTS: readonly string[] = institutionLists.districts;

const institutionKey = (value: string): string => baseFoldText(value).replace(/[^\p{L}\p{N}]/gu, "");

export const editDistance = (left: string, right: string): number => {
  let previous = Array.from({ length: right.length + 1 }, (_, index) => index);
  for (let i = 1; i <= left.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= right.length; j += 1) {
      const substitution = (previous[j - 1] ?? 0) + (left[i - 1] === right[j - 1] ? 0 : 1);
      current.push(Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, substitution));
    }
    previous = current;
  }
  return previous[right.length] ?? 0;
};

/**
 * Maps whitespace, case, diacritic and small OCR variants of a known name to
 * its canonical spelling. Returns null when nothing is close enough.
 */
export const canonicalizeInstitution = (value: string, known: readonly string[]): string | null => {
  const key = institutionKey(value);
  if (key.length === 0) {
    return null;
  }

  let best: { name: string; distance: number } | null = null;
  for (const name of known) {
    const candidateKey = institutionKey(name);
    if (candidateKey === key) {
      return name;
    }
    // One edit per ten characters, only for names long enough to stay distinct.
    const tolerance = Math.floor(candidateKey.length / 10);
    if (tolerance === 0 || Math.abs(candidateKey.length - key.length) > tolerance) {
      continue;
    }
    const distance = editDistance(candidateKey, key);
    if (distance <= tolerance && (best === null || distance < best.distance)) {
      best = { name, distance };
    }
  }
  return best?.name ?? null;
};
