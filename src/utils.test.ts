import { describe, it, expect } from "vitest";
import {
  canonicalPhrase,
  containsPhrase,
  containsQuestion,
  extractLastQuestion,
  matchPhrases,
  normalizeToken,
  splitSentences,
  tokenize,
} from "./utils.js";

describe("normalizeToken", () => {
  it("should lower-case and strip edge punctuation", () => {
    expect(normalizeToken("Hello,")).toBe("hello");
    expect(normalizeToken("(garden)")).toBe("garden");
  });

  it("should keep inner apostrophes and fold curly quotes", () => {
    expect(normalizeToken("Don't")).toBe("don't");
    expect(normalizeToken("That’s")).toBe("that's");
  });

  it("should return an empty string for punctuation-only input", () => {
    expect(normalizeToken("...")).toBe("");
  });
});

describe("tokenize", () => {
  it("should return an empty array for empty text", () => {
    expect(tokenize("")).toEqual([]);
  });

  it("should drop punctuation-only tokens", () => {
    expect(tokenize("Well — I went... home.")).toEqual(["well", "i", "went", "home"]);
  });
});

describe("canonicalPhrase", () => {
  it("should collapse spacing, case and punctuation", () => {
    expect(canonicalPhrase("  Of   Course! ")).toBe("of course");
  });
});

describe("matchPhrases", () => {
  it("should match longer phrases first and not double count", () => {
    const tokens = tokenize("you know I mean it you");
    const result = matchPhrases(tokens, ["you", "you know", "i mean"]);
    expect(result.phraseCount).toBe(3);
    expect(result.tokenCount).toBe(5);
    expect([...result.matchedIndexes].sort()).toEqual([0, 1, 2, 3, 5]);
  });

  it("should return zero counts when nothing matches", () => {
    const result = matchPhrases(["the", "garden"], ["um"]);
    expect(result.phraseCount).toBe(0);
    expect(result.tokenCount).toBe(0);
  });
});

describe("containsPhrase", () => {
  it("should match on word boundaries only", () => {
    expect(containsPhrase("Let's stop here, shall we", "let's stop here")).toBe(true);
    expect(containsPhrase("the bus stopped", "stop")).toBe(false);
  });

  it("should never match an empty phrase", () => {
    expect(containsPhrase("anything", "  ")).toBe(false);
  });
});

describe("splitSentences", () => {
  it("should return an empty array for empty string", () => {
    expect(splitSentences("")).toEqual([]);
  });

  it("should return an empty array for whitespace-only string", () => {
    expect(splitSentences("   ")).toEqual([]);
  });

  it("should handle mixed punctuation", () => {
    expect(splitSentences("Really? Yes! It is true.")).toEqual(["Really?", "Yes!", "It is true."]);
  });

  it("should keep punctuation runs together", () => {
    expect(splitSentences("Wait... what?! Oh.")).toEqual(["Wait...", "what?!", "Oh."]);
  });

  it("should handle a single sentence with no trailing punctuation", () => {
    expect(splitSentences("Hello world")).toEqual(["Hello world"]);
  });

  it("should not split inside numbers", () => {
    expect(splitSentences("It cost 2.50 then. Cheap.")).toEqual(["It cost 2.50 then.", "Cheap."]);
  });
});

describe("questions", () => {
  it("should detect a question mark anywhere", () => {
    expect(containsQuestion("Lovely. Did you grow roses?")).toBe(true);
    expect(containsQuestion("Lovely.")).toBe(false);
  });

  it("should extract the last question sentence", () => {
    expect(extractLastQuestion("Was it cold? I imagine so. Did you wear a coat?")).toBe("Did you wear a coat?");
  });

  it("should return an empty string when nothing is asked", () => {
    expect(extractLastQuestion("That sounds lovely.")).toBe("");
  });
});
