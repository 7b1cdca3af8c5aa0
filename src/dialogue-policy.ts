// Patient Dialogue Engine - Dialogue Policy Engine
// The single gate that decides whether the language model is consulted at
// all. decide() walks an ordered rule list (first match wins) and emits
// exactly one dialogue act per finalized turn; commit() applies the turn's
// consequences to ConversationMemory once the act has been produced.

import type { PolicyConfig } from "./config.js";
import type { ConversationMemory } from "./conversation-memory.js";
import { nudgeText, selectNudge } from "./nudge-selector.js";
import type { RepairDecision } from "./repair-detector.js";
import type { RepeatIntentResult } from "./repeat-intent.js";
import {
  DialogueAct,
  FluencyLabel,
  RepairCase,
  RepeatIntent,
  type ActHint,
  type GenerationRequest,
  type NudgeTopic,
} from "./types.js";
import { containsQuestion } from "./utils.js";

// ─── Canned Utterances ──────────────────────────────────────────────────────────

export const CANNED_TEXT = {
  greeting: "Hello, it's lovely to talk with you. How are you feeling today?",
  farewell: "Thank you for talking with me today. Take good care, goodbye.",
  noSpeech: "Take all the time you need. I'm right here whenever you'd like to talk.",
  veryShort: "Mm, tell me a little more about that, whenever you're ready.",
  affirmation: "Lovely. Please go on, I'm listening.",
  reAskPrefix: "Of course. I asked:",
  rephraseOffer: "Of course. Let me try to say that more simply.",
  complaintApology: "I'm sorry, I didn't mean to repeat myself.",
  complaintOpenFloor: "Please tell me whatever is on your mind.",
  exhaustedClose: "We've had a lovely chat today. Thank you, and take good care.",
  generationFailed: "I'm sorry, I lost my train of thought for a moment. Could you say that once more?",
} as const;

// ─── Decisions ──────────────────────────────────────────────────────────────────

export type PolicyRuleName =
  | "exit"
  | "silent_streak"
  | "repair"
  | "repeat_request"
  | "repetition_complaint"
  | "handoff";

/** Everything the policy needs to know about one finalized turn. */
export interface PolicyTurn {
  normalizedText: string;
  /** Text forwarded to the model (may keep discourse markers the normalizer removes). */
  promptText: string;
  label: FluencyLabel;
  repair: RepairDecision;
  repeat: RepeatIntentResult;
}

/** A fixed utterance spoken without consulting the model. */
export interface CannedDecision {
  kind: "canned";
  act: Exclude<DialogueAct, DialogueAct.HANDOFF_TO_LLM>;
  rule: PolicyRuleName | "generation_failed";
  text: string;
  hint: ActHint | null;
  nudgeTopicId: string | null;
  banTopicId: string | null;
  endsConversation: boolean;
}

export interface HandoffDecision {
  kind: "handoff";
  act: DialogueAct.HANDOFF_TO_LLM;
  rule: "handoff";
  hint: ActHint;
  request: GenerationRequest;
}

export type PolicyDecision = CannedDecision | HandoffDecision;

export interface CommitOutcome {
  userText: string;
  label: FluencyLabel;
  /** What was actually spoken for this turn. */
  systemText: string;
}

interface PolicyRule {
  name: PolicyRuleName;
  apply(turn: PolicyTurn): PolicyDecision | null;
}

function canned(
  act: CannedDecision["act"],
  rule: CannedDecision["rule"],
  text: string,
  extra: Partial<Pick<CannedDecision, "hint" | "nudgeTopicId" | "banTopicId" | "endsConversation">> = {},
): CannedDecision {
  return {
    kind: "canned",
    act,
    rule,
    text,
    hint: extra.hint ?? null,
    nudgeTopicId: extra.nudgeTopicId ?? null,
    banTopicId: extra.banTopicId ?? null,
    endsConversation: extra.endsConversation ?? false,
  };
}

// ─── DialoguePolicy ─────────────────────────────────────────────────────────────

export class DialoguePolicy {
  private readonly rules: readonly PolicyRule[];

  constructor(
    private readonly memory: ConversationMemory,
    private readonly config: PolicyConfig,
    private readonly repertoire: readonly NudgeTopic[],
  ) {
    this.rules = [
      { name: "exit", apply: (t) => this.exitRule(t) },
      { name: "silent_streak", apply: (t) => this.silentStreakRule(t) },
      { name: "repair", apply: (t) => this.repairRule(t) },
      { name: "repeat_request", apply: (t) => this.repeatRequestRule(t) },
      { name: "repetition_complaint", apply: (t) => this.complaintRule(t) },
      { name: "handoff", apply: (t) => this.handoffRule(t) },
    ];
  }

  /** Rule names in evaluation order. */
  ruleOrder(): PolicyRuleName[] {
    return this.rules.map((r) => r.name);
  }

  decide(turn: PolicyTurn): PolicyDecision {
    for (const rule of this.rules) {
      const decision = rule.apply(turn);
      if (decision) return decision;
    }
    // handoffRule always matches; kept for exhaustiveness.
    return this.handoffRule(turn);
  }

  /** Apply a turn's consequences to memory. Called exactly once per decided turn. */
  commit(decision: PolicyDecision, outcome: CommitOutcome): void {
    if (decision.kind === "canned") {
      if (decision.banTopicId) this.memory.banTopic(decision.banTopicId);
      if (decision.nudgeTopicId) this.memory.recordTopic(decision.nudgeTopicId);
    }

    this.memory.recordTurn({
      userText: outcome.userText,
      label: outcome.label,
      systemText: outcome.systemText,
    });

    if (decision.kind === "canned") {
      if (decision.act === DialogueAct.ASK) this.memory.consumeQuestionBudget();
    } else {
      if (decision.hint === DialogueAct.ASK && containsQuestion(outcome.systemText)) {
        this.memory.consumeQuestionBudget();
      }
      if (decision.request.changeTopic) {
        this.memory.resetTopicCounter();
      }
    }
  }

  /** Replacement act when the model call fails or misses its deadline. */
  generationFailed(): CannedDecision {
    return canned(DialogueAct.REPAIR, "generation_failed", CANNED_TEXT.generationFailed);
  }

  /** Opening line of a conversation; tracked like any other system utterance. */
  openConversation(): string {
    this.memory.recordSystemText(CANNED_TEXT.greeting);
    return CANNED_TEXT.greeting;
  }

  // ── Rules ───────────────────────────────────────────────────────────────────

  private exitRule(turn: PolicyTurn): PolicyDecision | null {
    if (turn.repair.repairCase !== RepairCase.EXIT_REQUEST) return null;
    return canned(DialogueAct.CLOSE, "exit", CANNED_TEXT.farewell, { endsConversation: true });
  }

  /** A run of silent turns means the speaker is stuck: offer a topic. */
  private silentStreakRule(turn: PolicyTurn): PolicyDecision | null {
    if (this.memory.silentStreakWith(turn.label) < this.config.nudgeAfterSilentTurns) return null;
    return this.nudge("silent_streak", "");
  }

  private repairRule(turn: PolicyTurn): PolicyDecision | null {
    switch (turn.repair.repairCase) {
      case RepairCase.NO_SPEECH:
        return canned(DialogueAct.REPAIR, "repair", CANNED_TEXT.noSpeech);
      case RepairCase.VERY_SHORT:
        return canned(DialogueAct.REPAIR, "repair", CANNED_TEXT.veryShort);
      case RepairCase.AFFIRMATION_ONLY:
        return canned(DialogueAct.REPAIR, "repair", CANNED_TEXT.affirmation);
      default:
        return null;
    }
  }

  private repeatRequestRule(turn: PolicyTurn): PolicyDecision | null {
    if (turn.repeat.intent !== RepeatIntent.REPEAT_REQUEST) return null;
    const question = this.memory.lastSystemQuestion();
    if (question && this.questionsAllowed()) {
      return canned(DialogueAct.ASK, "repeat_request", `${CANNED_TEXT.reAskPrefix} ${question}`, {
        hint: DialogueAct.ASK,
      });
    }
    return canned(DialogueAct.CONFIRM, "repeat_request", CANNED_TEXT.rephraseOffer, {
      hint: DialogueAct.CONFIRM,
    });
  }

  private complaintRule(turn: PolicyTurn): PolicyDecision | null {
    if (turn.repeat.intent !== RepeatIntent.COMPLAINT) return null;
    const current = this.memory.activeTopic();
    const decision = this.nudge("repetition_complaint", CANNED_TEXT.complaintApology, current);
    if (decision.kind === "canned" && decision.act === DialogueAct.CLOSE) {
      // Nothing fresh left to offer; apologize and hand the floor over instead of ending.
      return canned(
        DialogueAct.REPAIR,
        "repetition_complaint",
        `${CANNED_TEXT.complaintApology} ${CANNED_TEXT.complaintOpenFloor}`,
        { banTopicId: current },
      );
    }
    return { ...decision, banTopicId: current };
  }

  private handoffRule(turn: PolicyTurn): HandoffDecision {
    const hint = this.selectHint(turn.label);
    const snapshot = this.memory.snapshot();
    return {
      kind: "handoff",
      act: DialogueAct.HANDOFF_TO_LLM,
      rule: "handoff",
      hint,
      request: {
        text: turn.promptText || turn.normalizedText,
        hint,
        constraints: this.memory.constraints(),
        changeTopic: this.memory.shouldChangeTopic(),
        maxSentences: this.config.maxSentences,
        questionBudgetRemaining: snapshot.questionBudgetRemaining,
        summary: snapshot.summary,
        history: this.memory.recentHistory(),
      },
    };
  }

  // ── Helpers ─────────────────────────────────────────────────────────────────

  /** ASK for fluent speech, CONFIRM otherwise; ASK is downgraded when questions are unwelcome. */
  private selectHint(label: FluencyLabel): ActHint {
    if (label !== FluencyLabel.FLUENT) return DialogueAct.CONFIRM;
    return this.questionsAllowed() ? DialogueAct.ASK : DialogueAct.CONFIRM;
  }

  private questionsAllowed(): boolean {
    return !this.memory.isBudgetExhausted() && this.memory.questionPressure() < this.config.questionPressureLimit;
  }

  /**
   * NUDGE with the next available topic, or the configured fallback when the
   * repertoire is exhausted. `exclude` is never offered (a topic about to be banned).
   */
  private nudge(rule: PolicyRuleName, prefix: string, exclude: string | null = null): CannedDecision {
    const availability = {
      isAvailable: (id: string) => id !== exclude && this.memory.isAvailable(id),
    };
    const selection = selectNudge(availability, this.repertoire, this.config.nudgePriority);
    const withPrefix = (text: string) => (prefix ? `${prefix} ${text}` : text);

    if (selection.status === "selected") {
      const text = nudgeText(selection.topic, this.questionsAllowed());
      return canned(DialogueAct.NUDGE, rule, withPrefix(text), { nudgeTopicId: selection.topic.topicId });
    }

    if (this.config.nudgeExhaustedFallback === "repeat") {
      const earliest = this.memory
        .constraints()
        .discussed.filter((id) => id !== exclude && !this.memory.isBanned(id))
        .map((id) => this.repertoire.find((t) => t.topicId === id))
        .find((t): t is NudgeTopic => t !== undefined);
      if (earliest) {
        const text = nudgeText(earliest, this.questionsAllowed());
        return canned(DialogueAct.NUDGE, rule, withPrefix(text), { nudgeTopicId: earliest.topicId });
      }
    }

    return canned(DialogueAct.CLOSE, rule, CANNED_TEXT.exhaustedClose, { endsConversation: true });
  }
}
