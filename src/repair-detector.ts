// Patient Dialogue Engine - Repair Detector
// Classifies degenerate turns that get a canned repair instead of an LLM reply.
// Priority (first match wins):
//   NO_SPEECH > EXIT_REQUEST > VERY_SHORT > AFFIRMATION_ONLY > NONE
// VERY_SHORT never claims an affirmation or an exit, so "yes" is always
// AFFIRMATION_ONLY and "okay bye" is always EXIT_REQUEST.

import type { LexiconConfig, RepairConfig } from "./config.js";
import { FluencyLabel, RepairCase } from "./types.js";
import { canonicalPhrase, containsPhrase, matchPhrases, tokenize } from "./utils.js";

export type RepairLexicon = Pick<
  LexiconConfig,
  "affirmations" | "exitKeywords" | "exitPhrases" | "validShortAnswers"
>;

export interface RepairInput {
  normalizedText: string;
  label: FluencyLabel;
  elapsedSilenceMs: number;
  /** The turn ended on the absolute silence bound rather than a pause tier. */
  timedOut: boolean;
  /** The previous system utterance asked a question, so a short reply is an answer. */
  lastSystemAsked: boolean;
}

export interface RepairDecision {
  repairCase: RepairCase;
  reason: string;
}

export function isExitRequest(text: string, lexicon: RepairLexicon): boolean {
  const tokens = tokenize(text);
  if (tokens.length === 0) return false;

  const canonical = tokens.join(" ");
  if (lexicon.exitKeywords.includes(canonical)) return true;
  if (lexicon.exitPhrases.some((p) => containsPhrase(text, p))) return true;

  // "okay bye", "yes goodbye": nothing but courtesy words around an exit keyword.
  const exits = matchPhrases(tokens, lexicon.exitKeywords);
  if (exits.phraseCount === 0) return false;
  const courtesy = matchPhrases(tokens, [...lexicon.exitKeywords, ...lexicon.affirmations]);
  return courtesy.tokenCount === tokens.length;
}

/** True when every word belongs to an affirmation ("yes", "yeah okay", "of course"). */
export function isAffirmationOnly(text: string, lexicon: RepairLexicon): boolean {
  const tokens = tokenize(text);
  if (tokens.length === 0) return false;
  return matchPhrases(tokens, lexicon.affirmations).tokenCount === tokens.length;
}

export function detectRepair(
  input: RepairInput,
  lexicon: RepairLexicon,
  config: RepairConfig,
): RepairDecision {
  const text = input.normalizedText.trim();
  const wordCount = tokenize(text).length;

  if (wordCount === 0 || input.label === FluencyLabel.SILENT) {
    if (input.timedOut) {
      return { repairCase: RepairCase.NO_SPEECH, reason: "absolute silence bound reached" };
    }
    if (input.elapsedSilenceMs > config.maxWaitMs) {
      return { repairCase: RepairCase.NO_SPEECH, reason: "silence exceeded max wait" };
    }
    // Something was heard, but nothing survived filler removal.
    return { repairCase: RepairCase.VERY_SHORT, reason: "only fillers" };
  }

  if (isExitRequest(text, lexicon)) {
    return { repairCase: RepairCase.EXIT_REQUEST, reason: "exit keyword or phrase" };
  }

  const affirmation = isAffirmationOnly(text, lexicon);

  if (wordCount < config.veryShortFloor && !affirmation) {
    if (lexicon.validShortAnswers.includes(canonicalPhrase(text))) {
      return { repairCase: RepairCase.NONE, reason: "valid short answer" };
    }
    if (input.lastSystemAsked) {
      return { repairCase: RepairCase.NONE, reason: "short answer to a question" };
    }
    return { repairCase: RepairCase.VERY_SHORT, reason: `fewer than ${config.veryShortFloor} words` };
  }

  if (affirmation) {
    return { repairCase: RepairCase.AFFIRMATION_ONLY, reason: "affirmation only" };
  }

  return { repairCase: RepairCase.NONE, reason: "sufficient input" };
}
