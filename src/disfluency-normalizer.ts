// Patient Dialogue Engine - Disfluency Normalizer
// Cleans a transcript for downstream consumers (LLM prompt, logs):
//   1. removes filler tokens and phrases from the configured lexicon,
//   2. collapses immediately repeated tokens or short n-grams to one instance.
// Only removes; word order and surface forms of kept words are untouched.
// normalize(normalize(x)) === normalize(x).

import { matchPhrases, normalizeToken } from "./utils.js";

/** Longest repeated n-gram that is collapsed ("I went I went" → "I went"). */
const MAX_REPEAT_NGRAM = 3;

interface Token {
  surface: string;
  key: string;
}

function toTokens(text: string): Token[] {
  return text
    .split(/\s+/)
    .map((surface) => ({ surface, key: normalizeToken(surface) }))
    .filter((t) => t.key.length > 0);
}

function removeFillers(tokens: Token[], fillers: string[], keep: string[]): Token[] {
  if (fillers.length === 0) return tokens;
  const keys = tokens.map((t) => t.key);
  const kept = matchPhrases(keys, keep).matchedIndexes;
  const { matchedIndexes } = matchPhrases(keys, fillers);
  return tokens.filter((_, i) => kept.has(i) || !matchedIndexes.has(i));
}

function sameWindow(tokens: Token[], a: number, b: number, n: number): boolean {
  for (let k = 0; k < n; k++) {
    if (tokens[a + k].key !== tokens[b + k].key) return false;
  }
  return true;
}

/**
 * Collapse adjacent repeats, longest n-gram first. The first instance is kept,
 * so "I I I went" becomes "I went".
 */
function collapseRepeats(tokens: Token[]): Token[] {
  const out = [...tokens];
  let changed = true;
  while (changed) {
    changed = false;
    for (let n = MAX_REPEAT_NGRAM; n >= 1; n--) {
      let i = 0;
      while (i + 2 * n <= out.length) {
        if (sameWindow(out, i, i + n, n)) {
          out.splice(i + n, n);
          changed = true;
        } else {
          i++;
        }
      }
    }
  }
  return out;
}

/** Drop a dangling comma/semicolon/colon/dash left on the final word by a removed filler. */
function tidy(tokens: Token[]): string {
  if (tokens.length === 0) return "";
  const words = tokens.map((t) => t.surface);
  const last = words.length - 1;
  words[last] = words[last].replace(/[,;:\-–—]+$/, "");
  return words.join(" ");
}

/**
 * Normalize a transcript. Filler removal can bring new repeats together
 * ("went um went") and collapsing can bring a multi-word filler together
 * ("you um know"), so both steps run to a fixed point.
 *
 * @param fillers Filler lexicon (single words and multi-word phrases, lower-case).
 * @param keep Phrases whose words are never removed as fillers ("uh huh").
 */
export function normalizeTranscript(text: string, fillers: string[], keep: string[] = []): string {
  if (!text || text.trim().length === 0) return "";

  let tokens = toTokens(text);
  for (;;) {
    const next = collapseRepeats(removeFillers(tokens, fillers, keep));
    if (next.length === tokens.length) {
      tokens = next;
      break;
    }
    tokens = next;
  }
  return tidy(tokens);
}
