import { EventEmitter } from "events";
import { BoundedQueue } from "./bounded-queue";
import { classifyKey, type KeyEvent, type KeyKind } from "./keys";
import type { MatchScorer } from "./match-scorer";
import { normalize, type NormalizedText } from "./normalizer";
import type { Suggestion, SuggestionSession } from "./suggestion-session";
import type { TypingBuffer } from "./typing-buffer";
import { assemblerLogger as logger } from "../utils/logger";

/** Longest run of trailing words tried as one phrase. */
export const MAX_NGRAM = 4;

export interface AssemblerOptions {
  /** Shorter phrases (in characters) are never scored. */
  minPhraseLength: number;
  minSimilarity: number;
  enablePartialMatching: boolean;
  recentPhrasesSize: number;
}

export interface WordCommitted {
  word: string;
  window: string[];
}

export type SubmitResult =
  | { status: "offered"; suggestion: Suggestion }
  | { status: "suppressed" }
  | { status: "empty" };

export interface InputAssembler {
  on(event: "word", listener: (committed: WordCommitted) => void): this;
  on(event: "suggestion", listener: (suggestion: Suggestion) => void): this;
}

/**
 * Turns single key presses into words, keeps a sliding window of the latest
 * words and, at every word boundary, offers the longest trailing phrase that
 * scores against the keyword index.
 */
export class InputAssembler extends EventEmitter {
  private readonly scorer: MatchScorer;
  private readonly session: SuggestionSession;
  private readonly typing: TypingBuffer;
  private readonly options: AssemblerOptions;
  private readonly recent: BoundedQueue<NormalizedText>;
  private target?: string;

  private processedKeys = 0;
  private committedWords = 0;
  private offered = 0;
  private lastLogTime = Date.now();

  constructor(scorer: MatchScorer, session: SuggestionSession, typing: TypingBuffer, options: AssemblerOptions) {
    super();
    this.scorer = scorer;
    this.session = session;
    this.typing = typing;
    this.options = options;
    this.recent = new BoundedQueue(options.recentPhrasesSize);
  }

  get window(): string[] {
    return this.typing.window.toArray();
  }

  get pending(): string {
    return this.typing.pending;
  }

  /**
   * Process one key press
   * @returns how the key was treated
   */
  push(key: KeyEvent): KeyKind {
    const kind = classifyKey(key.name);
    if (key.target !== undefined) this.target = key.target;
    this.processedKeys++;

    logger.trace({ key: key.name, kind, bufferLength: this.typing.pending.length }, 'Processing key');

    switch (kind) {
      case "char":
        this.typing.type(key.name);
        break;
      case "digit":
        this.typing.discardWord();
        break;
      case "delete":
        this.typing.backspace();
        break;
      case "boundary":
        this.endWord();
        break;
      case "ignored":
        break;
    }

    this.logStatistics();
    return kind;
  }

  /**
   * Re-checks the current window even if a suggestion is pending. With an
   * empty window the request waits for the next completed word.
   */
  resubmit(): SubmitResult {
    this.session.requestResubmit();
    if (this.typing.window.length === 0) return { status: "empty" };
    return this.checkCombinations(this.session.consumeResubmit());
  }

  /** Scores one phrase and, unless debounced, offers the result. */
  submit(phrase: string, forced = false): SubmitResult {
    if (this.session.state === "pending" && !forced) {
      logger.trace({ phrase }, 'Suggestion pending; phrase suppressed');
      return { status: "suppressed" };
    }

    const ranked = this.scorer.score(phrase, this.options.minSimilarity, this.options.enablePartialMatching);
    if (ranked.length === 0) return { status: "empty" };

    const suggestion = this.session.offer(phrase, ranked, {
      words: this.typing.window.toArray(),
      target: this.target,
    });
    this.recent.push(normalize(phrase));
    this.offered++;

    logger.info({
      id: suggestion.id,
      phrase,
      suggestions: ranked.length,
      best: ranked[0],
      forced,
    }, 'Suggestion ready');

    this.emit("suggestion", suggestion);
    return { status: "offered", suggestion };
  }

  /** Forget everything typed so far, e.g. after the user moved the caret. */
  reset(): void {
    this.typing.clear();
  }

  private endWord(): void {
    const word = this.typing.commitWord();
    if (word === undefined) return;
    this.committedWords++;
    this.emit("word", { word, window: this.typing.window.toArray() } satisfies WordCommitted);

    const forced = this.session.consumeResubmit();
    if (!forced) this.session.supersede();
    this.checkCombinations(forced);
  }

  // scan longest → shortest so the most specific phrase wins
  private checkCombinations(forced: boolean): SubmitResult {
    const window = this.typing.window;
    for (let n = Math.min(MAX_NGRAM, window.length); n >= 1; n--) {
      const phrase = window.last(n).join(" ");
      if (phrase.length < this.options.minPhraseLength) continue;

      const normalized = normalize(phrase);
      if (!normalized) continue;
      if (!forced && this.recent.includes(normalized)) continue;

      const result = this.submit(phrase, forced);
      if (result.status !== "empty") return result;
    }
    return { status: "empty" };
  }

  private logStatistics(): void {
    if (Date.now() - this.lastLogTime <= 60_000) return;
    logger.info({
      processedKeys: this.processedKeys,
      committedWords: this.committedWords,
      suggestions: this.offered,
    }, 'Typing statistics');

    this.processedKeys = 0;
    this.committedWords = 0;
    this.offered = 0;
    this.lastLogTime = Date.now();
  }
}
