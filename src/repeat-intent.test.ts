import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { classifyRepeatIntent } from "./repeat-intent.js";
import { RepeatIntent } from "./types.js";

const { lexicon } = loadConfig({});

describe("classifyRepeatIntent", () => {
  it("should return NONE for empty text", () => {
    expect(classifyRepeatIntent("", lexicon)).toEqual({ intent: RepeatIntent.NONE, aboutQuestion: false });
  });

  it("should detect a request to repeat the question", () => {
    expect(classifyRepeatIntent("Sorry, could you repeat the question?", lexicon)).toEqual({
      intent: RepeatIntent.REPEAT_REQUEST,
      aboutQuestion: true,
    });
  });

  it("should detect a plain repeat request", () => {
    expect(classifyRepeatIntent("Pardon?", lexicon)).toEqual({
      intent: RepeatIntent.REPEAT_REQUEST,
      aboutQuestion: false,
    });
  });

  it("should treat a complaint about repetition as a complaint even with the trigger word", () => {
    expect(classifyRepeatIntent("Why are you repeating yourself", lexicon)).toEqual({
      intent: RepeatIntent.COMPLAINT,
      aboutQuestion: false,
    });
    expect(classifyRepeatIntent("Please don't repeat that again", lexicon).intent).toBe(RepeatIntent.COMPLAINT);
  });

  it("should not match trigger words inside other words", () => {
    expect(classifyRepeatIntent("We repeated the trip every year", lexicon).intent).toBe(RepeatIntent.NONE);
  });
});
