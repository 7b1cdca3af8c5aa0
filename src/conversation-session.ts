// Patient Dialogue Engine - Conversation Session
// The single owning actor for one conversation. Every recognizer event, timer
// expiry and playback report is queued on one promise chain, so the state
// machine and memory are only ever touched by one task at a time.
//
// Turn lifecycle:
//   fragments → TurnTakingStateMachine → FinalizedTurn
//   → normalize + features + fluency + repair + repeat intent
//   → DialoguePolicy.decide → (LLM) → TTS → client playback
//   → DialoguePolicy.commit → TurnSummary → listening again

import { v4 as uuidv4 } from "uuid";
import type { AppConfig } from "./config.js";
import { ConversationMemory } from "./conversation-memory.js";
import { DialoguePolicy, type PolicyDecision } from "./dialogue-policy.js";
import { normalizeTranscript } from "./disfluency-normalizer.js";
import { CollaboratorError, errorMessage } from "./errors.js";
import { explainFluency } from "./fluency-classifier.js";
import { createLogger, type Logger } from "./logger.js";
import { detectRepair, type RepairDecision } from "./repair-detector.js";
import { classifyRepeatIntent, type RepeatIntentResult } from "./repeat-intent.js";
import type { ReplyGenerator } from "./response-generator.js";
import { nullSummarySink, type TurnSummarySink } from "./session-log.js";
import type { SpeechRecognizer } from "./transcription-engine.js";
import { voiceForTier, type SpeechSynthesizer } from "./tts-engine.js";
import { selectPauseTier, TurnTakingStateMachine } from "./turn-taking.js";
import {
  DialogueAct,
  FluencyLabel,
  PauseTier,
  RepairCase,
  RepeatIntent,
  TurnState,
  type Deferred,
  type FinalizedTurn,
  type ServerMessage,
  type TranscriptFragment,
  type TurnResult,
  type TurnSummary,
} from "./types.js";
import { extractFeatures } from "./utterance-features.js";
import { systemClock, type Clock } from "./utils/clock.js";
import { createDeferred } from "./utils/deferred.js";

// ─── Dependencies ───────────────────────────────────────────────────────────────

/** Outbound channel to the client (the WebSocket in production). */
export interface ConversationTransport {
  send(message: ServerMessage): void;
  sendAudio(audio: Buffer): void;
}

export interface ConversationSessionDeps {
  config: AppConfig;
  recognizer: SpeechRecognizer;
  synthesizer: SpeechSynthesizer;
  generator: ReplyGenerator;
  transport: ConversationTransport;
  sink?: TurnSummarySink;
  logger?: Logger;
  clock?: Clock;
  sessionId?: string;
}

export type EndReason = "closed" | "user_ended" | "stt_closed";

type PlaybackResult = "completed" | "interrupted";

/** Everything known about a finalized user turn before the act is spoken. */
interface AnalyzedTurn {
  turn: FinalizedTurn;
  normalizedText: string;
  label: FluencyLabel;
  repair: RepairDecision;
  repeat: RepeatIntentResult;
}

/** A system utterance waiting for the client to finish playing it. */
interface PendingUtterance {
  utteranceId: number;
  playback: Deferred<PlaybackResult>;
  /** Absent for the greeting, which belongs to no user turn. */
  turn: {
    analyzed: AnalyzedTurn;
    decision: PolicyDecision;
    systemText: string;
    result: TurnResult;
    actEmittedAt: Date;
  } | null;
  endsConversation: boolean;
}

// ─── ConversationSession ────────────────────────────────────────────────────────

export class ConversationSession {
  readonly id: string;

  private readonly config: AppConfig;
  private readonly deps: ConversationSessionDeps;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sink: TurnSummarySink;
  private readonly memory: ConversationMemory;
  private readonly policy: DialoguePolicy;
  private readonly turnTaking: TurnTakingStateMachine;

  private queue: Promise<void> = Promise.resolve();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pending: PendingUtterance | null = null;
  private inflight: AbortController | null = null;
  private nextUtteranceId = 1;
  private turnIndex = 0;
  private started = false;
  /** Set by end(); queued work stops producing speech from here on. */
  private endRequested = false;
  private endReason: EndReason | null = null;
  private readonly endedDeferred = createDeferred<EndReason>();

  constructor(deps: ConversationSessionDeps) {
    this.deps = deps;
    this.config = deps.config;
    this.id = deps.sessionId ?? uuidv4();
    this.logger = deps.logger ?? createLogger("ConversationSession");
    this.clock = deps.clock ?? systemClock;
    this.sink = deps.sink ?? nullSummarySink;

    this.memory = new ConversationMemory({
      questionBudget: this.config.policy.questionBudget,
      allowTopicRepetition: this.config.policy.allowTopicRepetition,
      topicChangeAfterTurns: this.config.policy.topicChangeAfterTurns,
      historyTurns: this.config.policy.historyTurns,
      topicKeywords: this.config.topicKeywords,
    });
    this.policy = new DialoguePolicy(this.memory, this.config.policy, this.config.nudgeTopics);
    this.turnTaking = new TurnTakingStateMachine(
      this.config.turnTaking,
      {
        onTurnEnd: (turn) => this.onTurnEnd(turn),
        onStateChange: (state) => this.send({ type: "turn_state", state }),
        onBargeIn: () => this.onBargeIn(),
      },
      this.clock,
    );
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  get ended(): boolean {
    return this.endReason !== null;
  }

  /** Resolves with the reason once the conversation has ended. */
  whenEnded(): Promise<EndReason> {
    return this.endedDeferred.promise;
  }

  /** Resolves once every queued event has been processed. */
  idle(): Promise<void> {
    return this.queue;
  }

  getTurnState(): TurnState {
    return this.turnTaking.getState();
  }

  getMemory(): ReturnType<ConversationMemory["snapshot"]> {
    return this.memory.snapshot();
  }

  /** Open the recognizer and speak the greeting. */
  start(): Promise<void> {
    return this.enqueue(async () => {
      if (this.started || this.ended) return;
      this.started = true;
      this.deps.recognizer.start({
        onFragment: (fragment) => {
          void this.enqueue(() => this.onFragment(fragment));
        },
        onError: (error) => {
          this.logger.error(`Recognizer error in session ${this.id}: ${error.message}`);
          this.send({ type: "error", message: error.message, recoverable: error.recoverable });
        },
        onClose: () => {
          this.logger.warn(`Recognizer closed unexpectedly in session ${this.id}`);
          void this.end("stt_closed");
        },
      });
      this.logger.info(`Conversation ${this.id} started`);
      const greeting = this.policy.openConversation();
      await this.speak(greeting, DialogueAct.ASK, PauseTier.MEDIUM, null, false);
    });
  }

  feedAudio(chunk: Buffer): void {
    if (!this.started || this.ended) return;
    try {
      this.deps.recognizer.feedAudio(chunk);
    } catch (err) {
      this.logger.warn(`Dropping audio chunk for session ${this.id}: ${errorMessage(err)}`);
    }
  }

  /** The client finished playing utterance `utteranceId`. */
  playbackComplete(utteranceId: number): void {
    const pending = this.pending;
    if (!pending || pending.utteranceId !== utteranceId) {
      this.logger.warn(`Ignoring playback report for unknown utterance ${utteranceId}`);
      return;
    }
    pending.playback.resolve("completed");
  }

  /** End the conversation. Idempotent; an in-flight model call is abandoned. */
  end(reason: EndReason): Promise<void> {
    this.endRequested = true;
    this.inflight?.abort();
    return this.enqueue(() => this.finish(reason));
  }

  // ── Actor ───────────────────────────────────────────────────────────────────

  private enqueue(task: () => void | Promise<void>): Promise<void> {
    const run = this.queue.then(async () => {
      if (this.ended) return;
      await task();
      this.rearmTimer();
    });
    this.queue = run.catch((err: unknown) => {
      this.logger.error(`Unhandled error in session ${this.id}: ${errorMessage(err)}`);
      this.send({ type: "error", message: errorMessage(err), recoverable: false });
      return this.finish("closed");
    });
    return this.queue;
  }

  private rearmTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.ended) return;
    const deadline = this.turnTaking.nextDeadline();
    if (deadline === null) return;
    const delay = Math.max(0, deadline - this.clock.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.enqueue(() => {
        this.turnTaking.poll();
      });
    }, delay);
  }

  // ── Events ──────────────────────────────────────────────────────────────────

  private onFragment(fragment: TranscriptFragment): void {
    this.send({ type: "transcript_update", fragment });
    this.turnTaking.handleFragment(fragment);
  }

  private onBargeIn(): void {
    const pending = this.pending;
    if (!pending) return;
    this.logger.info(`Barge-in during utterance ${pending.utteranceId}`);
    this.send({ type: "stop_playback" });
    pending.playback.resolve("interrupted");
  }

  /** Called synchronously by the state machine inside an actor task. */
  private onTurnEnd(turn: FinalizedTurn): void {
    const analyzed = this.analyze(turn);
    this.logger.debug(
      `Turn ${this.turnIndex + 1}: ${turn.outcome}, label=${analyzed.label}, repair=${analyzed.repair.repairCase}`,
    );
    // Queued behind the current task so the state machine callback stays synchronous.
    void this.enqueue(() => this.respond(analyzed));
  }

  private analyze(turn: FinalizedTurn): AnalyzedTurn {
    const lexicon = this.config.lexicon;
    const normalizedText = normalizeTranscript(turn.text, lexicon.fillers, lexicon.affirmations);
    const features = extractFeatures(turn.text, lexicon, turn.words);
    const { label } = explainFluency(features, this.config.fluency);
    const repair = detectRepair(
      {
        normalizedText,
        label,
        elapsedSilenceMs: turn.elapsedSilenceMs,
        timedOut: turn.outcome === "timed_out",
        lastSystemAsked: this.memory.lastSystemAsked(),
      },
      lexicon,
      this.config.repair,
    );
    const repeat: RepeatIntentResult =
      repair.repairCase === RepairCase.NONE
        ? classifyRepeatIntent(normalizedText, lexicon)
        : { intent: RepeatIntent.NONE, aboutQuestion: false };
    return { turn, normalizedText, label, repair, repeat };
  }

  private async respond(analyzed: AnalyzedTurn): Promise<void> {
    const promptText = this.config.generation.preserveDiscourseMarkers
      ? normalizeTranscript(analyzed.turn.text, this.config.lexicon.acousticFillers, this.config.lexicon.affirmations)
      : analyzed.normalizedText;

    let decision: PolicyDecision = this.policy.decide({
      normalizedText: analyzed.normalizedText,
      promptText,
      label: analyzed.label,
      repair: analyzed.repair,
      repeat: analyzed.repeat,
    });

    let systemText: string;
    let result: TurnResult = "ok";

    if (decision.kind === "handoff") {
      const controller = new AbortController();
      this.inflight = controller;
      try {
        systemText = await this.deps.generator.generate(decision.request, { signal: controller.signal });
      } catch (err) {
        const timedOut = err instanceof CollaboratorError && err.timedOut;
        result = timedOut ? "llm_timeout" : "llm_failed";
        this.logger.warn(`Reply generation failed (${result}): ${errorMessage(err)}`);
        if (this.endRequested) return;
        decision = this.policy.generationFailed();
        systemText = decision.text;
      } finally {
        this.inflight = null;
      }
    } else {
      systemText = decision.text;
    }
    if (this.endRequested) return;

    const label = analyzed.label;
    const fluentStreak = label === FluencyLabel.FLUENT ? this.memory.snapshot().fluentStreak + 1 : 0;
    const nextTier = selectPauseTier(label, fluentStreak, this.config.turnTaking);
    const act = decision.kind === "handoff" ? decision.hint : decision.act;
    const endsConversation = decision.kind === "canned" && decision.endsConversation;

    await this.speak(systemText, act, nextTier, {
      analyzed,
      decision,
      systemText,
      result,
      actEmittedAt: new Date(),
    }, endsConversation);
  }

  // ── Speaking ────────────────────────────────────────────────────────────────

  /**
   * Synthesize and send one utterance, then park until the client reports
   * playback. A synthesis failure skips playback and finishes the turn.
   * `nextTier` is the tier of the turn that follows; it also sets the voice speed.
   */
  private async speak(
    text: string,
    act: DialogueAct,
    nextTier: PauseTier,
    turn: PendingUtterance["turn"],
    endsConversation: boolean,
  ): Promise<void> {
    this.turnTaking.markSystemSpeaking(nextTier);
    const voice = voiceForTier(this.config.speech, nextTier);
    const utteranceId = this.nextUtteranceId++;

    let audio: Buffer;
    try {
      audio = await this.deps.synthesizer.synthesize(text, voice);
    } catch (err) {
      const recoverable = !(err instanceof CollaboratorError) || err.recoverable;
      this.logger.error(`Speech synthesis failed for utterance ${utteranceId}: ${errorMessage(err)}`);
      this.send({ type: "error", message: errorMessage(err), recoverable });
      const failedTurn = turn ? { ...turn, result: "tts_failed" as const } : null;
      await this.completeUtterance(failedTurn, endsConversation, null, false);
      return;
    }
    if (this.endRequested) return;

    const playback = createDeferred<PlaybackResult>();
    const pending: PendingUtterance = { utteranceId, playback, turn, endsConversation };
    this.pending = pending;

    this.send({ type: "system_utterance", utteranceId, text, act, voice });
    this.deps.transport.sendAudio(audio);

    playback.promise.then(
      (outcome) => {
        void this.enqueue(() => this.onPlaybackSettled(pending, outcome));
      },
      (err: unknown) => {
        this.logger.debug(`Playback of utterance ${utteranceId} abandoned: ${errorMessage(err)}`);
      },
    );
  }

  private async onPlaybackSettled(pending: PendingUtterance, outcome: PlaybackResult): Promise<void> {
    if (this.pending !== pending) return;
    this.pending = null;
    const turn = pending.turn && outcome === "interrupted" ? { ...pending.turn, result: "interrupted" as const } : pending.turn;
    await this.completeUtterance(turn, pending.endsConversation, new Date(), outcome === "interrupted");
  }

  /**
   * Commit the turn to memory, log its summary, then either end the
   * conversation or open the next turn.
   */
  private async completeUtterance(
    turn: PendingUtterance["turn"],
    endsConversation: boolean,
    playbackDoneAt: Date | null,
    interrupted: boolean,
  ): Promise<void> {
    if (turn) {
      const spoken = turn.result === "tts_failed" ? "" : turn.systemText;
      this.policy.commit(turn.decision, {
        userText: turn.analyzed.normalizedText,
        label: turn.analyzed.label,
        systemText: spoken,
      });
      await this.writeSummary(turn, playbackDoneAt);
    }

    if (endsConversation) {
      await this.finish("closed");
      return;
    }

    // On barge-in the state machine already opened the next turn.
    if (!interrupted || !this.turnTaking.isOpen()) {
      const snapshot = this.memory.snapshot();
      this.turnTaking.beginListening(snapshot.lastLabel, snapshot.fluentStreak);
    }
  }

  private async writeSummary(turn: NonNullable<PendingUtterance["turn"]>, playbackDoneAt: Date | null): Promise<void> {
    this.turnIndex++;
    const { analyzed, decision } = turn;
    const summary: TurnSummary = {
      sessionId: this.id,
      turnIndex: this.turnIndex,
      rawTranscript: analyzed.turn.text,
      normalizedTranscript: analyzed.normalizedText,
      fluencyLabel: analyzed.label,
      repairCase: analyzed.repair.repairCase,
      repairReason: analyzed.repair.reason,
      repeatIntent: analyzed.repeat.intent,
      dialogueAct: decision.act,
      actHint: decision.hint,
      pauseTier: analyzed.turn.pauseTier,
      nudgeTopicId: decision.kind === "canned" ? decision.nudgeTopicId : null,
      systemText: turn.systemText,
      questionBudgetRemaining: this.memory.questionBudgetRemaining(),
      result: turn.result,
      turnStartedAt: this.toIso(analyzed.turn.startedAt),
      turnEndedAt: this.toIso(analyzed.turn.endedAt),
      actEmittedAt: turn.actEmittedAt.toISOString(),
      playbackDoneAt: playbackDoneAt ? playbackDoneAt.toISOString() : null,
    };

    this.send({ type: "turn_summary", summary });
    try {
      await this.sink.write(summary);
    } catch (err) {
      this.logger.warn(`Failed to write turn summary ${summary.turnIndex}: ${errorMessage(err)}`);
    }
  }

  /** State-machine clock readings are epoch milliseconds under the system clock. */
  private toIso(clockMs: number): string {
    return new Date(clockMs).toISOString();
  }

  // ── Ending ──────────────────────────────────────────────────────────────────

  private async finish(reason: EndReason): Promise<void> {
    if (this.ended) return;
    this.endReason = reason;
    this.endRequested = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const pending = this.pending;
    this.pending = null;
    pending?.playback.reject(new Error("conversation ended"));

    try {
      this.deps.recognizer.stop();
    } catch (err) {
      this.logger.warn(`Recognizer stop failed: ${errorMessage(err)}`);
    }
    this.send({ type: "conversation_ended", reason });
    this.logger.info(`Conversation ${this.id} ended (${reason})`);
    this.endedDeferred.resolve(reason);
  }

  private send(message: ServerMessage): void {
    if (this.ended && message.type !== "conversation_ended") return;
    this.deps.transport.send(message);
  }
}
