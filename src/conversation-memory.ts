// Patient Dialogue Engine - Conversation Memory
// Session-scoped conversational state: discussed and banned topics, the
// question budget, streak counters and a short rolling history. Pure
// in-memory state with a single owner (the dialogue policy engine).
//
// Invariants:
//   - discussed topics only grow within a session
//   - the remaining question budget never goes below zero and never increases

import { FluencyLabel, type ConversationExchange, type TopicConstraints } from "./types.js";
import { containsPhrase, containsQuestion, extractLastQuestion } from "./utils.js";

// ─── Options ────────────────────────────────────────────────────────────────────

export interface ConversationMemoryOptions {
  /** Session question ceiling; null disables budgeting. */
  questionBudget: number | null;
  allowTopicRepetition: boolean;
  topicChangeAfterTurns: number;
  /** Number of user/system exchanges kept for the generation history. */
  historyTurns: number;
  /** topicId → keywords used to spot the topic in system utterances. */
  topicKeywords: Record<string, string[]>;
}

/** System turns considered when measuring question pressure. */
export const QUESTION_PRESSURE_WINDOW = 3;

/** Rolling user summary is capped to this many trailing characters. */
export const SUMMARY_MAX_CHARS = 900;

// ─── Result Types ───────────────────────────────────────────────────────────────

export interface BudgetResult {
  /** Remaining questions after the call, or null when budgeting is off. */
  remaining: number | null;
  exhausted: boolean;
}

export interface TurnRecord {
  /** Normalized user text ("" for a silent turn). */
  userText: string;
  label: FluencyLabel;
  /** What the system said in reply ("" when nothing was spoken). */
  systemText: string;
}

export interface MemorySnapshot {
  turnIndex: number;
  discussed: readonly string[];
  banned: readonly string[];
  questionBudgetRemaining: number | null;
  questionBudgetCeiling: number | null;
  silentStreak: number;
  fluentStreak: number;
  lastLabel: FluencyLabel | null;
  labelCounts: Readonly<Record<FluencyLabel, number>>;
  currentTopic: string | null;
  turnsOnTopic: number;
  lastQuestion: string;
  summary: string;
}

// ─── ConversationMemory ─────────────────────────────────────────────────────────

export class ConversationMemory {
  private readonly discussed: string[] = [];
  private readonly banned = new Set<string>();
  private readonly ceiling: number | null;
  private remaining: number | null;

  private turnIndex = 0;
  private silentStreak = 0;
  private fluentStreak = 0;
  private lastLabel: FluencyLabel | null = null;
  private readonly labelCounts: Record<FluencyLabel, number> = {
    [FluencyLabel.FLUENT]: 0,
    [FluencyLabel.HESITANT]: 0,
    [FluencyLabel.FRAGMENTED]: 0,
    [FluencyLabel.SILENT]: 0,
  };

  private recentQuestions: boolean[] = [];
  private currentTopic: string | null = null;
  private turnsOnTopic = 0;
  private summary = "";
  private lastQuestion = "";
  private history: ConversationExchange[] = [];

  constructor(private readonly options: ConversationMemoryOptions) {
    this.ceiling = options.questionBudget === null ? null : Math.max(0, options.questionBudget);
    this.remaining = this.ceiling;
  }

  // ── Topics ──────────────────────────────────────────────────────────────────

  /** Appends the topic if it has not been discussed yet. */
  recordTopic(topicId: string): void {
    if (!this.discussed.includes(topicId)) {
      this.discussed.push(topicId);
    }
    if (this.currentTopic !== topicId) {
      this.currentTopic = topicId;
      this.turnsOnTopic = 0;
    }
  }

  banTopic(topicId: string): void {
    this.banned.add(topicId);
    if (this.currentTopic === topicId) {
      this.currentTopic = null;
      this.turnsOnTopic = 0;
    }
  }

  isAvailable(topicId: string): boolean {
    if (this.banned.has(topicId)) return false;
    return this.options.allowTopicRepetition || !this.discussed.includes(topicId);
  }

  isBanned(topicId: string): boolean {
    return this.banned.has(topicId);
  }

  /** The topic the conversation is on, falling back to the latest discussed, unbanned one. */
  activeTopic(): string | null {
    if (this.currentTopic) return this.currentTopic;
    const open = this.discussed.filter((id) => !this.banned.has(id));
    return open[open.length - 1] ?? null;
  }

  /** Topic ids whose keywords appear in `text`, in keyword-file order. */
  detectTopics(text: string): string[] {
    if (!text) return [];
    return Object.entries(this.options.topicKeywords)
      .filter(([, keywords]) => keywords.some((k) => containsPhrase(text, k)))
      .map(([topicId]) => topicId);
  }

  constraints(): TopicConstraints {
    return { discussed: [...this.discussed], banned: [...this.banned] };
  }

  shouldChangeTopic(): boolean {
    return this.currentTopic !== null && this.turnsOnTopic >= this.options.topicChangeAfterTurns;
  }

  resetTopicCounter(): void {
    this.turnsOnTopic = 0;
  }

  // ── Question budget ─────────────────────────────────────────────────────────

  /** Spends one question. A no-op when no ceiling is configured or nothing is left. */
  consumeQuestionBudget(): BudgetResult {
    if (this.remaining === null) {
      return { remaining: null, exhausted: false };
    }
    if (this.remaining > 0) {
      this.remaining--;
    }
    return { remaining: this.remaining, exhausted: this.remaining === 0 };
  }

  isBudgetExhausted(): boolean {
    return this.remaining !== null && this.remaining <= 0;
  }

  questionBudgetRemaining(): number | null {
    return this.remaining;
  }

  /** Questions asked over the last few system turns. */
  questionPressure(): number {
    return this.recentQuestions.filter(Boolean).length;
  }

  // ── Turns ───────────────────────────────────────────────────────────────────

  /** Consecutive SILENT turns, including a pending turn with `label`. */
  silentStreakWith(label: FluencyLabel): number {
    return label === FluencyLabel.SILENT ? this.silentStreak + 1 : 0;
  }

  /**
   * Record a completed exchange. Topics named in the system text are recorded
   * as discussed; the question-pressure window and history advance.
   */
  recordTurn(turn: TurnRecord): void {
    this.turnIndex++;
    this.labelCounts[turn.label]++;
    this.lastLabel = turn.label;
    this.silentStreak = turn.label === FluencyLabel.SILENT ? this.silentStreak + 1 : 0;
    this.fluentStreak = turn.label === FluencyLabel.FLUENT ? this.fluentStreak + 1 : 0;

    const userText = turn.userText.trim();
    if (userText) {
      const joined = this.summary ? `${this.summary} ${userText}` : userText;
      this.summary = joined.length > SUMMARY_MAX_CHARS ? joined.slice(-SUMMARY_MAX_CHARS) : joined;
    }

    this.recordSystemText(turn.systemText);

    if (userText) this.history.push({ role: "user", content: userText });
    if (turn.systemText) this.history.push({ role: "assistant", content: turn.systemText });
    const keep = this.options.historyTurns * 2;
    if (this.history.length > keep) {
      this.history = this.history.slice(-keep);
    }
  }

  /**
   * Track a system utterance that is not tied to a user turn (the greeting).
   */
  recordSystemText(systemText: string): void {
    const asked = containsQuestion(systemText);
    this.recentQuestions.push(asked);
    if (this.recentQuestions.length > QUESTION_PRESSURE_WINDOW) {
      this.recentQuestions = this.recentQuestions.slice(-QUESTION_PRESSURE_WINDOW);
    }
    if (asked) {
      this.lastQuestion = extractLastQuestion(systemText);
    }

    const topics = this.detectTopics(systemText);
    for (const topicId of topics) {
      if (!this.banned.has(topicId)) this.recordTopic(topicId);
    }
    this.turnsOnTopic++;
  }

  /** The most recent question the system asked, or "" if none. */
  lastSystemQuestion(): string {
    return this.lastQuestion;
  }

  /** True when the most recent system utterance contained a question. */
  lastSystemAsked(): boolean {
    return this.recentQuestions[this.recentQuestions.length - 1] ?? false;
  }

  recentHistory(): ConversationExchange[] {
    return this.history.map((e) => ({ ...e }));
  }

  snapshot(): MemorySnapshot {
    return {
      turnIndex: this.turnIndex,
      discussed: [...this.discussed],
      banned: [...this.banned],
      questionBudgetRemaining: this.remaining,
      questionBudgetCeiling: this.ceiling,
      silentStreak: this.silentStreak,
      fluentStreak: this.fluentStreak,
      lastLabel: this.lastLabel,
      labelCounts: { ...this.labelCounts },
      currentTopic: this.currentTopic,
      turnsOnTopic: this.turnsOnTopic,
      lastQuestion: this.lastQuestion,
      summary: this.summary,
    };
  }
}
