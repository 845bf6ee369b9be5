import type { KeywordSource } from "../storage/keyword-source";
import { indexLogger as logger, logError } from "../utils/logger";
import { PhraseIndex } from "./phrase-index";

export interface ReloadResult {
  source: string;
  phrases: number;
  collisions: number;
  ok: boolean;
}

/**
 * Owner of the current PhraseIndex. A reload builds the replacement in full
 * and then swaps one reference, so a reader that grabbed `current` keeps a
 * consistent snapshot for as long as it holds it.
 */
export class PhraseLibrary {
  private index: PhraseIndex;
  private generation = 0;

  constructor(index: PhraseIndex = PhraseIndex.empty()) {
    this.index = index;
  }

  get current(): PhraseIndex {
    return this.index;
  }

  /** Swap in an index built from an explicit keyword list. */
  replace(keywords: Iterable<string>): PhraseIndex {
    this.generation++;
    this.index = PhraseIndex.build(keywords);
    return this.index;
  }

  /**
   * Load from `source` and swap. A failed or empty load leaves an empty
   * index behind; it never rejects. When reloads overlap, the one started
   * last wins.
   */
  async reload(source: KeywordSource): Promise<ReloadResult> {
    const generation = ++this.generation;
    const startTime = Date.now();
    let keywords: string[] = [];
    let ok = true;

    try {
      keywords = await source.load();
    } catch (error) {
      ok = false;
      logError(logger, error, { source: source.describe() });
    }

    const next = PhraseIndex.build(keywords);
    if (generation !== this.generation) {
      logger.debug({ source: source.describe() }, 'Discarding superseded keyword reload');
      return { source: source.describe(), phrases: this.index.size, collisions: this.index.collisions, ok };
    }
    this.index = next;

    if (next.size === 0) {
      logger.warn({ source: source.describe() }, 'No keywords loaded; suggestions disabled');
    }
    if (next.collisions > 0) {
      logger.warn({ collisions: next.collisions }, 'Keywords with identical normalized forms; last one kept');
    }
    logger.info({
      source: source.describe(),
      phrases: next.size,
      loadTime: Date.now() - startTime,
    }, 'Phrase index loaded');

    return { source: source.describe(), phrases: next.size, collisions: next.collisions, ok };
  }
}
