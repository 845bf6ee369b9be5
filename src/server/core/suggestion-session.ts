import { EventEmitter } from "events";
import { ApplicationError } from "./errors";
import type { TypingBuffer } from "./typing-buffer";
import { sessionLogger as logger, logError } from "../utils/logger";

export type SuggestionState = "idle" | "pending";

export type Resolution = "accepted" | "ignored" | "timeout" | "superseded";

/** Opaque to the engine; handed back to whoever applies the correction. */
export interface SuggestionContext {
  words: string[];
  target?: string;
}

export interface Suggestion {
  id: number;
  phrase: string;
  ranked: string[];
  context: SuggestionContext;
  createdAt: number;
}

export interface SuggestionResolved {
  id: number;
  phrase: string;
  resolution: Resolution;
}

export interface ApplyCorrection {
  original: string;
  correction: string;
  context: SuggestionContext;
}

/** Replaces text in the focused application. Rejects when that fails. */
export interface CorrectionApplier {
  apply(request: ApplyCorrection): Promise<void>;
}

export type AcceptOutcome = "applied" | "failed" | "stale" | "rejected";

export interface SessionOptions {
  /** Pending suggestions expire after this long; 0 keeps them until resolved. */
  timeoutMs: number;
}

export interface SuggestionSession {
  on(event: "resolved", listener: (resolved: SuggestionResolved) => void): this;
}

/**
 * Debounce gate between the assembler and the presentation side. At most one
 * suggestion is outstanding; accept, ignore, timeout and supersede each close
 * it, and whichever comes first wins.
 */
export class SuggestionSession extends EventEmitter {
  private outstanding?: Suggestion;
  private timer?: NodeJS.Timeout;
  private resubmitRequested = false;
  private nextId = 1;
  private readonly typing: TypingBuffer;
  private readonly applier: CorrectionApplier;
  private readonly options: SessionOptions;

  constructor(typing: TypingBuffer, applier: CorrectionApplier, options: SessionOptions) {
    super();
    this.typing = typing;
    this.applier = applier;
    this.options = options;
  }

  get state(): SuggestionState {
    return this.outstanding ? "pending" : "idle";
  }

  get current(): Suggestion | undefined {
    return this.outstanding;
  }

  get resubmitActive(): boolean {
    return this.resubmitRequested;
  }

  /** Lets the next combination check through even while a suggestion is pending. */
  requestResubmit(): void {
    this.resubmitRequested = true;
  }

  consumeResubmit(): boolean {
    const requested = this.resubmitRequested;
    this.resubmitRequested = false;
    return requested;
  }

  offer(phrase: string, ranked: string[], context: SuggestionContext): Suggestion {
    if (this.outstanding) this.settle("superseded");

    const suggestion: Suggestion = {
      id: this.nextId++,
      phrase,
      ranked,
      context,
      createdAt: Date.now(),
    };
    this.outstanding = suggestion;

    if (this.options.timeoutMs > 0) {
      this.timer = setTimeout(() => this.timeout(suggestion.id), this.options.timeoutMs);
    }

    logger.debug({ id: suggestion.id, phrase, suggestions: ranked.length }, 'Suggestion pending');
    return suggestion;
  }

  /**
   * Closes the suggestion and clears all typing context before handing the
   * correction on, so a failed replacement is not offered again.
   */
  async accept(id: number, correction: string): Promise<AcceptOutcome> {
    const suggestion = this.outstanding;
    if (!suggestion || suggestion.id !== id) {
      logger.debug({ id, outstanding: suggestion?.id }, 'Accept for a suggestion that is no longer pending');
      return "stale";
    }
    if (!suggestion.ranked.includes(correction)) {
      logger.warn({ id, correction }, 'Accepted correction was not among the suggestions');
      return "rejected";
    }

    this.settle("accepted");
    this.typing.clear();

    try {
      await this.applier.apply({ original: suggestion.phrase, correction, context: suggestion.context });
      logger.info({ id, original: suggestion.phrase, correction }, 'Correction applied');
      return "applied";
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logError(logger, new ApplicationError(id, reason, { cause: error }), { original: suggestion.phrase });
      return "failed";
    }
  }

  /** Drops the phrase's words from the window and closes the suggestion. */
  ignore(id: number): boolean {
    const suggestion = this.outstanding;
    if (!suggestion || suggestion.id !== id) return false;
    this.settle("ignored");
    const removed = this.typing.forget(suggestion.phrase);
    logger.debug({ id, removed }, 'Suggestion ignored');
    return true;
  }

  timeout(id: number): boolean {
    if (this.outstanding?.id !== id) return false;
    this.settle("timeout");
    return true;
  }

  /** A new word makes the outstanding suggestion stale. */
  supersede(): boolean {
    if (!this.outstanding) return false;
    this.settle("superseded");
    return true;
  }

  /** Cancels the timer; used when the keystroke source goes away. */
  close(): void {
    this.supersede();
    this.resubmitRequested = false;
  }

  private settle(resolution: Resolution): void {
    const suggestion = this.outstanding;
    if (!suggestion) return;
    clearTimeout(this.timer);
    this.timer = undefined;
    this.outstanding = undefined;
    this.emit("resolved", { id: suggestion.id, phrase: suggestion.phrase, resolution } satisfies SuggestionResolved);
  }
}
