// Patient Dialogue Engine - Shared TypeScript interfaces and types
// Type barrel only: runtime helpers live in their own modules.

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptWord {
  word: string;
  startTime: number; // seconds from stream start
  endTime: number; // seconds from stream start
  confidence: number;
}

/**
 * One incremental result from the speech recognizer. Interim fragments are
 * superseded by later ones; final fragments are immutable.
 */
export interface TranscriptFragment {
  text: string;
  startTime: number;
  endTime: number;
  words: TranscriptWord[];
  isFinal: boolean;
}

// ─── Utterance Features ─────────────────────────────────────────────────────────

export interface UtteranceFeatures {
  wordCount: number;
  fillerCount: number;
  fillerRatio: number; // fillerCount / wordCount, 0 when empty
  endsWithConjunction: boolean;
  hesitationCount: number;
  repairMarkerCount: number;
  repetitionScore: number; // 0..1 over the last ten tokens
  endsWithPunctuation: boolean;
  durationSeconds: number;
}

// ─── Labels and Cases ───────────────────────────────────────────────────────────

export enum FluencyLabel {
  FLUENT = "FLUENT",
  HESITANT = "HESITANT",
  FRAGMENTED = "FRAGMENTED",
  SILENT = "SILENT",
}

export enum PauseTier {
  SHORT = "SHORT",
  MEDIUM = "MEDIUM",
  LONG = "LONG",
}

export enum RepairCase {
  NONE = "NONE",
  NO_SPEECH = "NO_SPEECH",
  VERY_SHORT = "VERY_SHORT",
  AFFIRMATION_ONLY = "AFFIRMATION_ONLY",
  EXIT_REQUEST = "EXIT_REQUEST",
}

export enum RepeatIntent {
  NONE = "NONE",
  REPEAT_REQUEST = "REPEAT_REQUEST",
  COMPLAINT = "COMPLAINT",
}

export enum DialogueAct {
  ASK = "ASK",
  CONFIRM = "CONFIRM",
  REPAIR = "REPAIR",
  NUDGE = "NUDGE",
  HANDOFF_TO_LLM = "HANDOFF_TO_LLM",
  CLOSE = "CLOSE",
}

/** Dialogue act the generated reply is asked to perform. */
export type ActHint = DialogueAct.ASK | DialogueAct.CONFIRM;

// ─── Turn-Taking ────────────────────────────────────────────────────────────────

export enum TurnState {
  LISTENING = "listening",
  GRACE_WAIT = "grace_wait",
  TURN_COMPLETE = "turn_complete",
  TIMED_OUT = "timed_out",
  SPEAKING = "speaking", // system speech playing; no turn open
}

export type TurnOutcome = "complete" | "timed_out";

export interface FinalizedTurn {
  outcome: TurnOutcome;
  text: string;
  words: TranscriptWord[];
  pauseTier: PauseTier;
  /** Silence between the last speech activity (or listening start) and finalization. */
  elapsedSilenceMs: number;
  startedAt: number; // clock ms when listening began
  endedAt: number; // clock ms when the turn was finalized
}

// ─── Nudges ─────────────────────────────────────────────────────────────────────

export interface NudgeTopic {
  topicId: string;
  /** Question form, used while the question budget allows. */
  prompt: string;
  /** Statement form, used once questions are no longer welcome. */
  statement?: string;
}

// ─── Generation ─────────────────────────────────────────────────────────────────

export interface TopicConstraints {
  discussed: string[];
  banned: string[];
}

export interface ConversationExchange {
  role: "user" | "assistant";
  content: string;
}

export interface GenerationRequest {
  text: string;
  hint: ActHint;
  constraints: TopicConstraints;
  changeTopic: boolean;
  maxSentences: number;
  questionBudgetRemaining: number | null;
  summary: string;
  history: ConversationExchange[];
}

// ─── Voice ──────────────────────────────────────────────────────────────────────

export type SpeechVoice = "alloy" | "echo" | "fable" | "onyx" | "nova" | "shimmer";

export interface VoiceConfig {
  voice: SpeechVoice;
  speed: number;
}

// ─── Per-turn Summary ───────────────────────────────────────────────────────────

export type TurnResult =
  | "ok"
  | "llm_failed"
  | "llm_timeout"
  | "tts_failed"
  | "interrupted";

/** Read-only per-turn record handed to the session log. */
export interface TurnSummary {
  sessionId: string;
  turnIndex: number;
  rawTranscript: string;
  normalizedTranscript: string;
  fluencyLabel: FluencyLabel;
  repairCase: RepairCase;
  repairReason: string;
  repeatIntent: RepeatIntent;
  dialogueAct: DialogueAct;
  actHint: ActHint | null;
  pauseTier: PauseTier;
  nudgeTopicId: string | null;
  systemText: string;
  questionBudgetRemaining: number | null;
  result: TurnResult;
  turnStartedAt: string; // ISO-8601
  turnEndedAt: string;
  actEmittedAt: string;
  playbackDoneAt: string | null;
}

// ─── Deferred ───────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | {
      type: "audio_format";
      channels: number;
      sampleRate: number;
      encoding: string;
    }
  | { type: "start_conversation" }
  | { type: "playback_complete"; utteranceId: number }
  | { type: "end_conversation" };

export type ServerMessage =
  | { type: "turn_state"; state: TurnState }
  | { type: "transcript_update"; fragment: TranscriptFragment }
  | {
      type: "system_utterance";
      utteranceId: number;
      text: string;
      act: DialogueAct;
      voice: VoiceConfig;
    }
  | { type: "stop_playback" }
  | { type: "turn_summary"; summary: TurnSummary }
  | { type: "conversation_ended"; reason: "closed" | "user_ended" | "stt_closed" }
  | { type: "error"; message: string; recoverable: boolean }
  | { type: "audio_format_error"; message: string };
