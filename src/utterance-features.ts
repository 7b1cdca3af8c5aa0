// Patient Dialogue Engine - Utterance Feature Extractor
// Derives the local signals (word count, fillers, trailing conjunction,
// hesitation markers, repetition, timing) that the fluency classifier and the
// turn-taking state machine consume. Pure: no state, no failure modes.

import type { LexiconConfig } from "./config.js";
import type { TranscriptWord, UtteranceFeatures } from "./types.js";
import { matchPhrases, tokenize } from "./utils.js";

export type FeatureLexicon = Pick<LexiconConfig, "fillers" | "conjunctions" | "repairMarkers">;

/** Only the most recent tokens contribute to the repetition score. */
const REPETITION_WINDOW = 10;

const ELLIPSIS = /\.{3,}|…/g;
const TERMINAL_PUNCTUATION = /[.!?]["')\]]*$/;

const EMPTY_FEATURES: Readonly<UtteranceFeatures> = {
  wordCount: 0,
  fillerCount: 0,
  fillerRatio: 0,
  endsWithConjunction: false,
  hesitationCount: 0,
  repairMarkerCount: 0,
  repetitionScore: 0,
  endsWithPunctuation: false,
  durationSeconds: 0,
};

/**
 * Share of repeated tokens among the last ten: (window - unique) / window.
 */
export function computeRepetitionScore(tokens: string[]): number {
  if (tokens.length === 0) return 0;
  const tail = tokens.slice(-REPETITION_WINDOW);
  const unique = new Set(tail).size;
  return (tail.length - unique) / tail.length;
}

/**
 * Hesitation markers: fillers, immediate word repeats ("the the") and
 * trailing-off ellipses.
 */
function countHesitations(text: string, tokens: string[], fillerCount: number): number {
  let repeats = 0;
  for (let i = 1; i < tokens.length; i++) {
    if (tokens[i] === tokens[i - 1]) repeats++;
  }
  const ellipses = text.match(ELLIPSIS)?.length ?? 0;
  return fillerCount + repeats + ellipses;
}

function spokenDuration(words: TranscriptWord[]): number {
  if (words.length === 0) return 0;
  return Math.max(0, words[words.length - 1].endTime - words[0].startTime);
}

/**
 * Extract utterance features from (raw or normalized) transcript text.
 *
 * @param words Word timings for the same text; only used for the duration.
 */
export function extractFeatures(
  text: string,
  lexicon: FeatureLexicon,
  words: TranscriptWord[] = [],
): UtteranceFeatures {
  const trimmed = (text ?? "").trim();
  const tokens = tokenize(trimmed);
  if (tokens.length === 0) {
    return { ...EMPTY_FEATURES };
  }

  const fillers = matchPhrases(tokens, lexicon.fillers);
  const repairMarkers = matchPhrases(tokens, lexicon.repairMarkers);
  const lastToken = tokens[tokens.length - 1];

  return {
    wordCount: tokens.length,
    fillerCount: fillers.phraseCount,
    fillerRatio: fillers.phraseCount / tokens.length,
    endsWithConjunction: lexicon.conjunctions.includes(lastToken),
    hesitationCount: countHesitations(trimmed, tokens, fillers.phraseCount),
    repairMarkerCount: repairMarkers.phraseCount,
    repetitionScore: computeRepetitionScore(tokens),
    endsWithPunctuation: TERMINAL_PUNCTUATION.test(trimmed),
    durationSeconds: spokenDuration(words),
  };
}
