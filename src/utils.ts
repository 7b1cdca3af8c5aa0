// Shared text utilities for the Patient Dialogue Engine.
//
// Deterministic helpers used by the feature extractor, normalizer, repair
// detector and memory so that every component tokenizes text the same way.

// ─── Tokens ─────────────────────────────────────────────────────────────────────

/** Characters stripped from both ends of a word before comparison. */
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu;

/**
 * Lower-case a single word and strip leading/trailing punctuation.
 * Inner apostrophes survive ("don't" stays "don't").
 */
export function normalizeToken(word: string): string {
  return word.toLowerCase().replace(/[’‘]/g, "'").replace(EDGE_PUNCTUATION, "");
}

/**
 * Split text into comparable word tokens. Tokens that are pure punctuation
 * (e.g. a stray "—" or "...") are dropped.
 */
export function tokenize(text: string): string[] {
  if (!text) return [];
  return text
    .split(/\s+/)
    .map(normalizeToken)
    .filter((t) => t.length > 0);
}

/** The canonical token form of a phrase ("Of  course!" → "of course"). */
export function canonicalPhrase(text: string): string {
  return tokenize(text).join(" ");
}

/**
 * Count occurrences of multi-word or single-word phrases in a token list.
 * Longer phrases are matched first and consumed, so "you know" is never also
 * counted as "you". Returns the number of matched tokens and matched phrases.
 */
export function matchPhrases(
  tokens: string[],
  phrases: string[],
): { phraseCount: number; tokenCount: number; matchedIndexes: Set<number> } {
  const split = phrases
    .map((p) => tokenize(p))
    .filter((p) => p.length > 0)
    .sort((a, b) => b.length - a.length);
  const matchedIndexes = new Set<number>();
  let phraseCount = 0;

  let i = 0;
  while (i < tokens.length) {
    const hit = split.find((p) => p.every((word, k) => tokens[i + k] === word));
    if (hit) {
      for (let k = 0; k < hit.length; k++) matchedIndexes.add(i + k);
      phraseCount++;
      i += hit.length;
    } else {
      i++;
    }
  }
  return { phraseCount, tokenCount: matchedIndexes.size, matchedIndexes };
}

/**
 * True when `phrase` occurs in `text` on word boundaries (case-insensitive).
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const haystack = ` ${canonicalPhrase(text)} `;
  const needle = canonicalPhrase(phrase);
  return needle.length > 0 && haystack.includes(` ${needle} `);
}

// ─── Sentences ──────────────────────────────────────────────────────────────────

/**
 * Split text into sentences at `.`, `!` or `?` followed by whitespace or the
 * end of the text. Punctuation stays with its sentence; runs such as "?!" or
 * "..." stay together.
 */
export function splitSentences(text: string): string[] {
  if (!text || text.trim().length === 0) return [];
  const matches = text.match(/(?:[^.!?]|[.!?](?!\s|$))+(?:[.!?]+|$)/g) ?? [];
  return matches.map((s) => s.trim()).filter((s) => s.length > 0);
}

/** True when the text contains at least one question sentence. */
export function containsQuestion(text: string): boolean {
  return text.includes("?");
}

/**
 * The last sentence of `text` that ends with a question mark, or "" when the
 * text asks nothing.
 */
export function extractLastQuestion(text: string): string {
  const questions = splitSentences(text).filter((s) => s.endsWith("?"));
  return questions.length > 0 ? questions[questions.length - 1] : "";
}
