// Property-Based Tests for the Repair Detector

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { loadConfig } from "./config.js";
import { detectRepair } from "./repair-detector.js";
import { FluencyLabel, RepairCase } from "./types.js";

const { lexicon, repair } = loadConfig({});

describe("Repair detector properties", () => {
  it("an exit keyword next to an affirmation is always EXIT_REQUEST", () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...lexicon.exitKeywords),
        fc.constantFrom(...lexicon.affirmations),
        fc.boolean(),
        fc.constantFrom(FluencyLabel.FLUENT, FluencyLabel.HESITANT, FluencyLabel.FRAGMENTED),
        (exit, affirmation, exitFirst, label) => {
          const text = exitFirst ? `${exit}, ${affirmation}` : `${affirmation}, ${exit}`;
          const result = detectRepair(
            { normalizedText: text, label, elapsedSilenceMs: 0, timedOut: false, lastSystemAsked: false },
            lexicon,
            repair,
          );
          expect(result.repairCase).toBe(RepairCase.EXIT_REQUEST);
        },
      ),
    );
  });

  it("a turn that timed out without words is always NO_SPEECH", () => {
    fc.assert(
      fc.property(fc.nat({ max: 60000 }), fc.boolean(), (silence, asked) => {
        const result = detectRepair(
          {
            normalizedText: "",
            label: FluencyLabel.SILENT,
            elapsedSilenceMs: silence,
            timedOut: true,
            lastSystemAsked: asked,
          },
          lexicon,
          repair,
        );
        expect(result.repairCase).toBe(RepairCase.NO_SPEECH);
      }),
    );
  });

  it("an affirmation alone is never VERY_SHORT", () => {
    fc.assert(
      fc.property(fc.constantFrom(...lexicon.affirmations), (affirmation) => {
        const result = detectRepair(
          {
            normalizedText: affirmation,
            label: FluencyLabel.FRAGMENTED,
            elapsedSilenceMs: 0,
            timedOut: false,
            lastSystemAsked: false,
          },
          lexicon,
          repair,
        );
        expect(result.repairCase).toBe(RepairCase.AFFIRMATION_ONLY);
      }),
    );
  });
});
