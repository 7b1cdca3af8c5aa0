import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { computeRepetitionScore, extractFeatures } from "./utterance-features.js";

const { lexicon } = loadConfig({});

describe("extractFeatures", () => {
  it("should return all-zero features for empty text", () => {
    const f = extractFeatures("", lexicon);
    expect(f.wordCount).toBe(0);
    expect(f.fillerRatio).toBe(0);
    expect(f.endsWithConjunction).toBe(false);
    expect(f.hesitationCount).toBe(0);
  });

  it("should treat punctuation-only text as empty", () => {
    expect(extractFeatures(" ... — ", lexicon).wordCount).toBe(0);
  });

  it("should count fillers and compute the filler ratio", () => {
    const f = extractFeatures("Um, I went to the, uh, the market", lexicon);
    expect(f.wordCount).toBe(8);
    expect(f.fillerCount).toBe(2);
    expect(f.fillerRatio).toBe(0.25);
    expect(f.hesitationCount).toBe(2);
    expect(f.repetitionScore).toBe(0.125);
  });

  it("should count a multi-word filler once", () => {
    const f = extractFeatures("we lived you know near the sea", lexicon);
    expect(f.fillerCount).toBe(1);
    expect(f.wordCount).toBe(7);
  });

  it("should detect a trailing conjunction", () => {
    expect(extractFeatures("I was going to the shops and", lexicon).endsWithConjunction).toBe(true);
    expect(extractFeatures("I was going to the shops and,", lexicon).endsWithConjunction).toBe(true);
    expect(extractFeatures("Bread and butter", lexicon).endsWithConjunction).toBe(false);
  });

  it("should count immediate repeats and ellipses as hesitations", () => {
    const f = extractFeatures("We used to... to walk the dog...", lexicon);
    expect(f.wordCount).toBe(7);
    expect(f.hesitationCount).toBe(3);
  });

  it("should count repair markers", () => {
    expect(extractFeatures("My sister, sorry, my brother lived in Leeds", lexicon).repairMarkerCount).toBe(1);
  });

  it("should detect terminal punctuation", () => {
    expect(extractFeatures("We grew tomatoes.", lexicon).endsWithPunctuation).toBe(true);
    expect(extractFeatures('He said "hello."', lexicon).endsWithPunctuation).toBe(true);
    expect(extractFeatures("We grew tomatoes", lexicon).endsWithPunctuation).toBe(false);
  });

  it("should measure spoken duration from word timings", () => {
    const f = extractFeatures("hello there", lexicon, [
      { word: "hello", startTime: 1.0, endTime: 1.4, confidence: 0.9 },
      { word: "there", startTime: 2.0, endTime: 2.5, confidence: 0.9 },
    ]);
    expect(f.durationSeconds).toBe(1.5);
  });
});

describe("computeRepetitionScore", () => {
  it("should return 0 for no tokens", () => {
    expect(computeRepetitionScore([])).toBe(0);
  });

  it("should only consider the last ten tokens", () => {
    const tokens = ["a", "a", "a", "b", "c", "d", "e", "f", "g", "h", "i", "j"];
    // Window: a b c d e f g h i j → all unique
    expect(computeRepetitionScore(tokens)).toBe(0);
  });

  it("should score a fully repeated window close to 1", () => {
    expect(computeRepetitionScore(["the", "the", "the", "the"])).toBe(0.75);
  });
});
