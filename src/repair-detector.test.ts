import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { detectRepair, isAffirmationOnly, isExitRequest, type RepairInput } from "./repair-detector.js";
import { FluencyLabel, RepairCase } from "./types.js";

const { lexicon, repair } = loadConfig({});

function input(overrides: Partial<RepairInput>): RepairInput {
  return {
    normalizedText: "",
    label: FluencyLabel.FLUENT,
    elapsedSilenceMs: 0,
    timedOut: false,
    lastSystemAsked: false,
    ...overrides,
  };
}

describe("isExitRequest", () => {
  it("should match a bare exit keyword", () => {
    expect(isExitRequest("Goodbye.", lexicon)).toBe(true);
    expect(isExitRequest("good night", lexicon)).toBe(true);
  });

  it("should match an exit phrase inside a longer utterance", () => {
    expect(isExitRequest("Well, that's it for today I think", lexicon)).toBe(true);
  });

  it("should match an exit keyword wrapped in courtesy words", () => {
    expect(isExitRequest("okay bye", lexicon)).toBe(true);
    expect(isExitRequest("yes goodbye", lexicon)).toBe(true);
  });

  it("should not match an exit keyword inside ordinary speech", () => {
    expect(isExitRequest("The bus would stop by the church", lexicon)).toBe(false);
    expect(isExitRequest("I stopped at the shop", lexicon)).toBe(false);
  });

  it("should not match empty text", () => {
    expect(isExitRequest("", lexicon)).toBe(false);
  });
});

describe("isAffirmationOnly", () => {
  it("should accept single and multi-word affirmations", () => {
    expect(isAffirmationOnly("Yes.", lexicon)).toBe(true);
    expect(isAffirmationOnly("yeah, of course", lexicon)).toBe(true);
  });

  it("should reject affirmations followed by content", () => {
    expect(isAffirmationOnly("yes we did go there", lexicon)).toBe(false);
  });
});

describe("detectRepair", () => {
  it("should report NO_SPEECH when the turn timed out in silence", () => {
    const result = detectRepair(
      input({ label: FluencyLabel.SILENT, elapsedSilenceMs: 20000, timedOut: true }),
      lexicon,
      repair,
    );
    expect(result).toEqual({ repairCase: RepairCase.NO_SPEECH, reason: "absolute silence bound reached" });
  });

  it("should report NO_SPEECH when silence exceeded the max wait", () => {
    const result = detectRepair(input({ label: FluencyLabel.SILENT, elapsedSilenceMs: 16000 }), lexicon, repair);
    expect(result).toEqual({ repairCase: RepairCase.NO_SPEECH, reason: "silence exceeded max wait" });
  });

  it("should report VERY_SHORT when only fillers were heard", () => {
    const result = detectRepair(input({ label: FluencyLabel.HESITANT, elapsedSilenceMs: 3000 }), lexicon, repair);
    expect(result).toEqual({ repairCase: RepairCase.VERY_SHORT, reason: "only fillers" });
  });

  it("should report EXIT_REQUEST before any length check", () => {
    expect(detectRepair(input({ normalizedText: "bye" }), lexicon, repair).repairCase).toBe(RepairCase.EXIT_REQUEST);
  });

  it("should report AFFIRMATION_ONLY for a bare yes rather than VERY_SHORT", () => {
    expect(detectRepair(input({ normalizedText: "Yes." }), lexicon, repair)).toEqual({
      repairCase: RepairCase.AFFIRMATION_ONLY,
      reason: "affirmation only",
    });
  });

  it("should accept a valid short answer", () => {
    expect(detectRepair(input({ normalizedText: "No." }), lexicon, repair)).toEqual({
      repairCase: RepairCase.NONE,
      reason: "valid short answer",
    });
  });

  it("should accept a short answer to a question the system just asked", () => {
    expect(
      detectRepair(input({ normalizedText: "The garden", lastSystemAsked: true }), lexicon, repair),
    ).toEqual({ repairCase: RepairCase.NONE, reason: "short answer to a question" });
  });

  it("should report VERY_SHORT for a short reply that answers nothing", () => {
    expect(detectRepair(input({ normalizedText: "The garden" }), lexicon, repair)).toEqual({
      repairCase: RepairCase.VERY_SHORT,
      reason: "fewer than 3 words",
    });
  });

  it("should report NONE for a sufficient utterance", () => {
    expect(detectRepair(input({ normalizedText: "I stopped at the shop" }), lexicon, repair)).toEqual({
      repairCase: RepairCase.NONE,
      reason: "sufficient input",
    });
  });
});
