import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { classifyFluency, explainFluency, FLUENCY_RULES } from "./fluency-classifier.js";
import { FluencyLabel } from "./types.js";
import { extractFeatures } from "./utterance-features.js";

const { lexicon, fluency } = loadConfig({});

function classify(text: string): { label: FluencyLabel; rule: string } {
  return explainFluency(extractFeatures(text, lexicon), fluency);
}

describe("classifyFluency", () => {
  it("should expose the rule order", () => {
    expect(FLUENCY_RULES.map((r) => r.name)).toEqual([
      "no_words",
      "short_fragment",
      "filler_heavy",
      "hesitation_markers",
      "abandoned_clause",
      "self_repair",
    ]);
  });

  it("should label empty text SILENT", () => {
    expect(classify("")).toEqual({ label: FluencyLabel.SILENT, rule: "no_words" });
  });

  it("should label a short complete utterance FRAGMENTED", () => {
    expect(classify("Yes.")).toEqual({ label: FluencyLabel.FRAGMENTED, rule: "short_fragment" });
  });

  it("should not treat a short utterance ending in a conjunction as a fragment", () => {
    expect(classify("and")).toEqual({ label: FluencyLabel.HESITANT, rule: "abandoned_clause" });
  });

  it("should label filler-heavy speech HESITANT", () => {
    expect(classify("Um, I went to the, uh, the market")).toEqual({
      label: FluencyLabel.HESITANT,
      rule: "filler_heavy",
    });
  });

  it("should label speech with many hesitation markers HESITANT", () => {
    expect(classify("We used to... to walk the dog...")).toEqual({
      label: FluencyLabel.HESITANT,
      rule: "hesitation_markers",
    });
  });

  it("should label a trailing conjunction HESITANT", () => {
    expect(classify("I was going to the shops and")).toEqual({
      label: FluencyLabel.HESITANT,
      rule: "abandoned_clause",
    });
  });

  it("should label a self-repair HESITANT", () => {
    expect(classify("My sister, sorry, my brother lived in Leeds")).toEqual({
      label: FluencyLabel.HESITANT,
      rule: "self_repair",
    });
  });

  it("should label clean complete speech FLUENT", () => {
    expect(classify("We grew tomatoes in the back garden every summer.")).toEqual({
      label: FluencyLabel.FLUENT,
      rule: "default",
    });
  });

  it("classifyFluency should return the label only", () => {
    expect(classifyFluency(extractFeatures("We grew tomatoes every summer", lexicon), fluency)).toBe(
      FluencyLabel.FLUENT,
    );
  });
});
