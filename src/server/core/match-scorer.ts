import { normalize, splitWords, type NormalizedText } from "./normalizer";
import type { PhraseIndex } from "./phrase-index";
import type { PhraseLibrary } from "./phrase-library";
import { similarityRatio } from "./similarity";
import { scorerLogger as logger } from "../utils/logger";

export type MatchStrategy = "prefix" | "partial" | "similarity" | "padding";

export interface Candidate {
  phrase: NormalizedText;
  original: string;
  score: number;
  strategy: MatchStrategy;
}

export interface ScoreOptions {
  minSimilarity: number;
  enablePartial: boolean;
}

export interface ScorerLimits {
  /** Longest list ever returned. */
  maxSuggestions: number;
  /** Lists shorter than this are padded with unmatched phrases. */
  minSuggestions: number;
}

/** Partial-word matches never reach a prefix match. */
export const PARTIAL_WEIGHT = 0.9;

type Scored = Map<NormalizedText, { score: number; strategy: MatchStrategy }>;

function keepBest(scored: Scored, phrase: NormalizedText, score: number, strategy: MatchStrategy) {
  const seen = scored.get(phrase);
  if (!seen || score > seen.score) scored.set(phrase, { score, strategy });
}

function prefixMatches(index: PhraseIndex, query: NormalizedText, scored: Scored) {
  if (!query) return;
  for (const phrase of index.phrases) {
    if (phrase !== query && phrase.startsWith(query)) keepBest(scored, phrase, 1, "prefix");
  }
}

function partialMatches(index: PhraseIndex, query: NormalizedText, scored: Scored) {
  const queryWords = new Set(splitWords(query));
  if (queryWords.size === 0) return;

  const candidates = new Set<NormalizedText>();
  for (const word of queryWords) {
    for (const phrase of index.lookupByWord(word)) candidates.add(phrase);
  }

  for (const phrase of candidates) {
    if (phrase === query) continue;
    const phraseWords = new Set(splitWords(phrase));
    let shared = 0;
    for (const word of queryWords) if (phraseWords.has(word)) shared++;
    keepBest(scored, phrase, (shared / queryWords.size) * PARTIAL_WEIGHT, "partial");
  }
}

function similarityMatches(index: PhraseIndex, query: NormalizedText, scored: Scored) {
  for (const phrase of index.phrases) {
    if (phrase !== query) keepBest(scored, phrase, similarityRatio(query, phrase), "similarity");
  }
}

/**
 * Ranks indexed phrases against typed text with three strategies (literal
 * prefix, shared words, edit similarity) merged by best score per phrase.
 * Pure CPU work over one index snapshot; never throws.
 */
export class MatchScorer {
  private readonly library: PhraseLibrary;
  private readonly limits: ScorerLimits;

  constructor(library: PhraseLibrary, limits: ScorerLimits) {
    this.library = library;
    this.limits = limits;
  }

  /** Originals of the ranked phrases, best first. */
  score(query: string, minSimilarity: number, enablePartial: boolean): string[] {
    return this.rank(query, { minSimilarity, enablePartial }).map(c => c.original);
  }

  rank(query: string, options: ScoreOptions): Candidate[] {
    const index = this.library.current;
    const normalized = normalize(query);
    const order = new Map(index.phrases.map((phrase, position) => [phrase, position]));
    const scored: Scored = new Map();

    prefixMatches(index, normalized, scored);
    if (options.enablePartial) partialMatches(index, normalized, scored);
    similarityMatches(index, normalized, scored);

    const ranked: Candidate[] = [...scored]
      .filter(([, { score }]) => score >= options.minSimilarity)
      .sort(([a, x], [b, y]) =>
        y.score - x.score
        || a.length - b.length
        || (order.get(a) ?? 0) - (order.get(b) ?? 0))
      .slice(0, this.limits.maxSuggestions)
      .map(([phrase, { score, strategy }]) => ({
        phrase,
        original: index.originalOf(phrase),
        score,
        strategy,
      }));

    const wanted = Math.min(this.limits.minSuggestions, this.limits.maxSuggestions);
    if (ranked.length < wanted) {
      const taken = new Set(ranked.map(c => c.phrase));
      for (const phrase of index.phrases) {
        if (ranked.length >= wanted) break;
        if (phrase === normalized || taken.has(phrase)) continue;
        ranked.push({ phrase, original: index.originalOf(phrase), score: 0, strategy: "padding" });
      }
    }

    logger.trace({
      query: normalized,
      considered: scored.size,
      returned: ranked.length,
    }, 'Scored query');

    return ranked;
  }
}
