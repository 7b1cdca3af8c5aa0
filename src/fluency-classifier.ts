// Patient Dialogue Engine - Fluency Classifier
// Ordered rule cascade, first match wins. The order is the tie-break for
// overlapping conditions and is exported so it can be inspected and tested.

import type { FluencyConfig } from "./config.js";
import { FluencyLabel, type UtteranceFeatures } from "./types.js";

export interface FluencyRule {
  name: string;
  label: FluencyLabel;
  matches(features: UtteranceFeatures, config: FluencyConfig): boolean;
}

export const FLUENCY_RULES: readonly FluencyRule[] = [
  {
    name: "no_words",
    label: FluencyLabel.SILENT,
    matches: (f) => f.wordCount === 0,
  },
  {
    // A trailing conjunction means the speaker is mid-clause, not done.
    name: "short_fragment",
    label: FluencyLabel.FRAGMENTED,
    matches: (f, c) => f.wordCount < c.shortUtteranceWords && !f.endsWithConjunction,
  },
  {
    name: "filler_heavy",
    label: FluencyLabel.HESITANT,
    matches: (f, c) => f.fillerRatio > c.maxFillerRatio,
  },
  {
    name: "hesitation_markers",
    label: FluencyLabel.HESITANT,
    matches: (f, c) => f.hesitationCount > c.maxHesitations,
  },
  {
    name: "abandoned_clause",
    label: FluencyLabel.HESITANT,
    matches: (f) => f.endsWithConjunction,
  },
  {
    name: "self_repair",
    label: FluencyLabel.HESITANT,
    matches: (f, c) => f.repairMarkerCount > 0 || f.repetitionScore >= c.maxRepetitionScore,
  },
];

export interface FluencyDecision {
  label: FluencyLabel;
  /** Name of the rule that fired, or "default" for FLUENT. */
  rule: string;
}

export function explainFluency(features: UtteranceFeatures, config: FluencyConfig): FluencyDecision {
  for (const rule of FLUENCY_RULES) {
    if (rule.matches(features, config)) {
      return { label: rule.label, rule: rule.name };
    }
  }
  return { label: FluencyLabel.FLUENT, rule: "default" };
}

export function classifyFluency(features: UtteranceFeatures, config: FluencyConfig): FluencyLabel {
  return explainFluency(features, config).label;
}
