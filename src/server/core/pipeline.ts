import type { EngineConfig } from "../config";
import { InputAssembler } from "./input-assembler";
import { MatchScorer } from "./match-scorer";
import type { PhraseLibrary } from "./phrase-library";
import { SuggestionSession, type CorrectionApplier } from "./suggestion-session";
import { TypingBuffer } from "./typing-buffer";

export interface TypingPipeline {
  assembler: InputAssembler;
  session: SuggestionSession;
}

export function createScorer(library: PhraseLibrary, config: EngineConfig): MatchScorer {
  return new MatchScorer(library, {
    maxSuggestions: config.maxSuggestions,
    minSuggestions: config.minSuggestions,
  });
}

/** One keystroke source's buffers, window and suggestion state. */
export function createTypingPipeline(
  scorer: MatchScorer,
  config: EngineConfig,
  applier: CorrectionApplier
): TypingPipeline {
  const typing = new TypingBuffer(config.maxPhraseLength);
  const session = new SuggestionSession(typing, applier, { timeoutMs: config.suggestionTimeout });
  const assembler = new InputAssembler(scorer, session, typing, {
    minPhraseLength: config.minPhraseLength,
    minSimilarity: config.minSimilarity,
    enablePartialMatching: config.enablePartialMatching,
    recentPhrasesSize: config.recentPhrasesSize,
  });
  return { assembler, session };
}
