import { IndexLookupMisuse } from "./errors";
import { normalize, splitWords, type NormalizedText } from "./normalizer";

export interface KeywordEntry {
  original: string;
  normalized: NormalizedText;
}

const EMPTY: ReadonlySet<NormalizedText> = new Set();

/**
 * Read-only searchable form of the keyword list. Phrases keep the position
 * of their first occurrence; when two keywords normalize identically the one
 * loaded last supplies the original text.
 */
export class PhraseIndex {
  private readonly originals: ReadonlyMap<NormalizedText, string>;
  private readonly byWord: ReadonlyMap<string, ReadonlySet<NormalizedText>>;
  readonly phrases: readonly NormalizedText[];
  /** Keywords whose normalized form collided with an earlier one. */
  readonly collisions: number;

  private constructor(
    originals: Map<NormalizedText, string>,
    byWord: Map<string, Set<NormalizedText>>,
    collisions: number
  ) {
    this.originals = originals;
    this.byWord = byWord;
    this.phrases = [...originals.keys()];
    this.collisions = collisions;
  }

  static build(keywords: Iterable<string>): PhraseIndex {
    const originals = new Map<NormalizedText, string>();
    const byWord = new Map<string, Set<NormalizedText>>();
    let collisions = 0;

    for (const keyword of keywords) {
      const phrase = normalize(keyword);
      if (!phrase) continue;
      if (originals.has(phrase)) collisions++;
      originals.set(phrase, keyword);

      for (const word of splitWords(phrase)) {
        const bucket = byWord.get(word) ?? new Set<NormalizedText>();
        bucket.add(phrase);
        byWord.set(word, bucket);
      }
    }
    return new PhraseIndex(originals, byWord, collisions);
  }

  static empty(): PhraseIndex {
    return PhraseIndex.build([]);
  }

  get size(): number {
    return this.phrases.length;
  }

  lookupByWord(word: NormalizedText): ReadonlySet<NormalizedText> {
    return this.byWord.get(word) ?? EMPTY;
  }

  originalOf(phrase: NormalizedText): string {
    const original = this.originals.get(phrase);
    if (original === undefined) throw new IndexLookupMisuse(phrase);
    return original;
  }

  entries(): KeywordEntry[] {
    return this.phrases.map(normalized => ({ normalized, original: this.originalOf(normalized) }));
  }
}
