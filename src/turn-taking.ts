// Patient Dialogue Engine - Turn-Taking / Pause-Tier State Machine
// Decides when the user has finished speaking. Explicit state plus deadlines
// evaluated against an injected clock; the owner arms one timer for
// nextDeadline() and calls poll() when it fires.
//
//   LISTENING ──(quiet for pauseDetectMs)──▶ GRACE_WAIT
//   GRACE_WAIT ──(speech)──▶ LISTENING            (grace restarts from that speech)
//   GRACE_WAIT ──(lastActivity + tier, minListen met)──▶ TURN_COMPLETE
//   LISTENING / GRACE_WAIT ──(maxSilenceMs without speech)──▶ TIMED_OUT
//   TURN_COMPLETE / TIMED_OUT ──markSystemSpeaking()──▶ SPEAKING ──beginListening()──▶ LISTENING

import type { TurnTakingConfig } from "./config.js";
import {
  FluencyLabel,
  PauseTier,
  TurnState,
  type FinalizedTurn,
  type TranscriptFragment,
  type TranscriptWord,
  type TurnOutcome,
} from "./types.js";
import { systemClock, type Clock } from "./utils/clock.js";

// ─── Tier Selection ─────────────────────────────────────────────────────────────

/**
 * Pause tier for the next turn, from the previous turn's label. The turn in
 * progress cannot be classified yet, so the last known label stands in.
 */
export function selectPauseTier(
  previousLabel: FluencyLabel | null,
  fluentStreak: number,
  config: Pick<TurnTakingConfig, "fastTierAfterFluentTurns">,
): PauseTier {
  switch (previousLabel) {
    case FluencyLabel.FLUENT:
      return fluentStreak >= config.fastTierAfterFluentTurns ? PauseTier.SHORT : PauseTier.MEDIUM;
    case FluencyLabel.HESITANT:
    case FluencyLabel.FRAGMENTED:
    case FluencyLabel.SILENT:
      return PauseTier.LONG;
    default:
      return PauseTier.MEDIUM;
  }
}

// ─── State Machine ──────────────────────────────────────────────────────────────

export interface TurnTakingCallbacks {
  onTurnEnd: (turn: FinalizedTurn) => void;
  onStateChange?: (state: TurnState) => void;
  /** User speech arrived while system speech was playing (barge-in enabled only). */
  onBargeIn?: () => void;
}

function hasSpeech(fragment: TranscriptFragment): boolean {
  return fragment.text.trim().length > 0 || fragment.words.length > 0;
}

export class TurnTakingStateMachine {
  private state: TurnState = TurnState.SPEAKING;
  private tier: PauseTier = PauseTier.MEDIUM;
  private startedAt = 0;
  private lastActivityAt: number | null = null;
  private finals: TranscriptFragment[] = [];
  private interim: TranscriptFragment | null = null;

  constructor(
    private readonly config: TurnTakingConfig,
    private readonly callbacks: TurnTakingCallbacks,
    private readonly clock: Clock = systemClock,
  ) {}

  getState(): TurnState {
    return this.state;
  }

  getPauseTier(): PauseTier {
    return this.tier;
  }

  /** True while a user turn is open (LISTENING or GRACE_WAIT). */
  isOpen(): boolean {
    return this.state === TurnState.LISTENING || this.state === TurnState.GRACE_WAIT;
  }

  /**
   * Open a new turn. The tier comes from the previous turn's label.
   * @returns the tier in force for this turn
   */
  beginListening(previousLabel: FluencyLabel | null, fluentStreak = previousLabel === FluencyLabel.FLUENT ? 1 : 0): PauseTier {
    this.open(selectPauseTier(previousLabel, fluentStreak, this.config));
    return this.tier;
  }

  /**
   * System speech is about to play; no turn is open until beginListening().
   * `nextTier` is the tier a barge-in opens with, chosen from the turn just answered.
   */
  markSystemSpeaking(nextTier: PauseTier = this.tier): void {
    this.reset();
    this.tier = nextTier;
    this.setState(TurnState.SPEAKING);
  }

  /**
   * Feed one recognizer result. Interim and final fragments both count as
   * speech activity; the turn text is built from finals plus the latest interim.
   */
  handleFragment(fragment: TranscriptFragment): FinalizedTurn | null {
    if (!hasSpeech(fragment)) return null;

    if (this.state === TurnState.SPEAKING) {
      if (!this.config.bargeIn) return null;
      this.open(this.tier);
      this.callbacks.onBargeIn?.();
      if (!this.isOpen()) return null;
    }

    // Deadlines that passed before this fragment arrived win.
    const expired = this.poll();
    if (expired || !this.isOpen()) return expired;

    this.lastActivityAt = this.clock.now();
    if (fragment.isFinal) {
      this.finals.push(fragment);
      this.interim = null;
    } else {
      this.interim = fragment;
    }
    if (this.state === TurnState.GRACE_WAIT) {
      this.setState(TurnState.LISTENING);
    }
    return null;
  }

  /** Evaluate deadlines at the current clock reading. */
  poll(): FinalizedTurn | null {
    if (!this.isOpen()) return null;
    const now = this.clock.now();

    if (now - this.startedAt >= this.config.maxTurnMs) {
      return this.finalize(this.lastActivityAt === null ? "timed_out" : "complete", now);
    }

    if (this.lastActivityAt === null) {
      if (now - this.startedAt >= this.config.maxSilenceMs) {
        return this.finalize("timed_out", now);
      }
      return null;
    }

    const quiet = now - this.lastActivityAt;
    if (quiet >= this.config.maxSilenceMs) {
      return this.finalize("timed_out", now);
    }
    if (this.state === TurnState.LISTENING && quiet >= this.config.pauseDetectMs) {
      this.setState(TurnState.GRACE_WAIT);
    }
    if (this.state === TurnState.GRACE_WAIT) {
      const graceOver = now >= this.lastActivityAt + this.config.pauseTiersMs[this.tier];
      const listenedLongEnough = now - this.startedAt >= this.config.minListenMs;
      if (graceOver && listenedLongEnough) {
        return this.finalize("complete", now);
      }
    }
    return null;
  }

  /** Clock reading at which poll() next has something to decide, or null when idle. */
  nextDeadline(): number | null {
    if (!this.isOpen()) return null;
    const deadlines = [this.startedAt + this.config.maxTurnMs];

    if (this.lastActivityAt === null) {
      deadlines.push(this.startedAt + this.config.maxSilenceMs);
    } else {
      deadlines.push(this.lastActivityAt + this.config.maxSilenceMs);
      if (this.state === TurnState.LISTENING) {
        deadlines.push(this.lastActivityAt + this.config.pauseDetectMs);
      } else {
        deadlines.push(
          Math.max(
            this.lastActivityAt + this.config.pauseTiersMs[this.tier],
            this.startedAt + this.config.minListenMs,
          ),
        );
      }
    }
    return Math.min(...deadlines);
  }

  /** Text heard so far in the open turn. */
  currentText(): string {
    return this.collectFragments()
      .map((f) => f.text.trim())
      .filter((t) => t.length > 0)
      .join(" ");
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private open(tier: PauseTier): void {
    this.reset();
    this.tier = tier;
    this.startedAt = this.clock.now();
    this.setState(TurnState.LISTENING);
  }

  private reset(): void {
    this.finals = [];
    this.interim = null;
    this.lastActivityAt = null;
  }

  private collectFragments(): TranscriptFragment[] {
    return this.interim ? [...this.finals, this.interim] : [...this.finals];
  }

  private finalize(outcome: TurnOutcome, now: number): FinalizedTurn {
    const words: TranscriptWord[] = this.collectFragments().flatMap((f) => f.words);
    const turn: FinalizedTurn = {
      outcome,
      text: this.currentText(),
      words,
      pauseTier: this.tier,
      elapsedSilenceMs: now - (this.lastActivityAt ?? this.startedAt),
      startedAt: this.startedAt,
      endedAt: now,
    };
    this.setState(outcome === "complete" ? TurnState.TURN_COMPLETE : TurnState.TIMED_OUT);
    this.callbacks.onTurnEnd(turn);
    return turn;
  }

  private setState(next: TurnState): void {
    if (this.state === next) return;
    this.state = next;
    this.callbacks.onStateChange?.(next);
  }
}
