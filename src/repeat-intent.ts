// Patient Dialogue Engine - Repeat-Intent Classifier
// Distinguishes "please say that again" from "stop repeating yourself".
// Complaints are checked first: "why do you keep repeating" contains the
// trigger word "repeat" but asks for the opposite.

import type { LexiconConfig } from "./config.js";
import { RepeatIntent } from "./types.js";
import { containsPhrase } from "./utils.js";

export type RepeatLexicon = Pick<LexiconConfig, "repeatTriggers" | "repeatComplaints" | "repeatQuestionCues">;

export interface RepeatIntentResult {
  intent: RepeatIntent;
  /** For REPEAT_REQUEST: the user referred to the question itself. */
  aboutQuestion: boolean;
}

export function classifyRepeatIntent(text: string, lexicon: RepeatLexicon): RepeatIntentResult {
  if (!text || text.trim().length === 0) {
    return { intent: RepeatIntent.NONE, aboutQuestion: false };
  }
  if (lexicon.repeatComplaints.some((p) => containsPhrase(text, p))) {
    return { intent: RepeatIntent.COMPLAINT, aboutQuestion: false };
  }
  if (!lexicon.repeatTriggers.some((p) => containsPhrase(text, p))) {
    return { intent: RepeatIntent.NONE, aboutQuestion: false };
  }
  return {
    intent: RepeatIntent.REPEAT_REQUEST,
    aboutQuestion: lexicon.repeatQuestionCues.some((p) => containsPhrase(text, p)),
  };
}
