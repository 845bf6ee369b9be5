/**
 * Canonical form used for every phrase comparison: lower-cased, with
 * hyphens, underscores and apostrophes turned into spaces, everything else
 * that is not a letter, a digit or whitespace removed, and whitespace runs
 * collapsed to one space. Two strings are the same phrase iff their
 * normalized forms are equal.
 */
export type NormalizedText = string;

const JOINERS = /[-_'’]/g;
const STRIP = /[^\p{L}\p{N}\s]/gu;
const SPACES = /\s+/g;

export function normalize(text: string): NormalizedText {
  return text
    .toLowerCase()
    .replace(JOINERS, " ")
    .replace(STRIP, "")
    .replace(SPACES, " ")
    .trim();
}

export function splitWords(text: NormalizedText): string[] {
  return text.length ? text.split(" ") : [];
}
