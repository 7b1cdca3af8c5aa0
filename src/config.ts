// Patient Dialogue Engine - Configuration
// Defaults, data files (lexicons, nudge repertoire, topic keywords) and
// environment overrides. Every threshold here is a tunable value, not a
// constant baked into the decision components.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { PauseTier, type NudgeTopic, type SpeechVoice } from "./types.js";

// ─── Config Shapes ──────────────────────────────────────────────────────────────

export interface LexiconConfig {
  fillers: string[];
  /** Non-lexical fillers only; the subset removed before prompting the LLM. */
  acousticFillers: string[];
  affirmations: string[];
  exitKeywords: string[];
  exitPhrases: string[];
  validShortAnswers: string[];
  conjunctions: string[];
  repairMarkers: string[];
  repeatTriggers: string[];
  repeatComplaints: string[];
  repeatQuestionCues: string[];
}

export interface FluencyConfig {
  /** Utterances shorter than this (in words) without a trailing conjunction are FRAGMENTED. */
  shortUtteranceWords: number;
  maxFillerRatio: number;
  maxHesitations: number;
  maxRepetitionScore: number;
}

export interface TurnTakingConfig {
  pauseTiersMs: Record<PauseTier, number>;
  /** Quiet interval after the last speech activity before GRACE_WAIT begins. */
  pauseDetectMs: number;
  /** A turn cannot complete earlier than this after listening began. */
  minListenMs: number;
  /** Absolute silence bound; exceeding it times the turn out. */
  maxSilenceMs: number;
  /** Hard cap on a single turn's length. */
  maxTurnMs: number;
  /** Consecutive fluent turns required before the SHORT tier is used. */
  fastTierAfterFluentTurns: number;
  bargeIn: boolean;
}

export interface RepairConfig {
  /** Zero-word turns whose silence reaches this are NO_SPEECH. */
  maxWaitMs: number;
  /** Word counts below this floor are VERY_SHORT (unless otherwise excused). */
  veryShortFloor: number;
}

export type NudgeExhaustedFallback = "close" | "repeat";

export interface PolicyConfig {
  /** Session question ceiling; null disables budgeting. */
  questionBudget: number | null;
  /** Questions over the last three system turns at which ASK is downgraded. */
  questionPressureLimit: number;
  nudgeAfterSilentTurns: number;
  nudgePriority: string[];
  nudgeExhaustedFallback: NudgeExhaustedFallback;
  allowTopicRepetition: boolean;
  topicChangeAfterTurns: number;
  maxSentences: number;
  historyTurns: number;
}

export interface GenerationConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  /**
   * Normalize the prompt text with the acoustic filler list only, so discourse
   * markers such as "you know" reach the model.
   */
  preserveDiscourseMarkers: boolean;
}

export interface SpeechConfig {
  model: string;
  voice: SpeechVoice;
  speedByTier: Record<PauseTier, number>;
}

export interface AppConfig {
  port: number;
  sessionLogDir: string | null;
  lexicon: LexiconConfig;
  fluency: FluencyConfig;
  turnTaking: TurnTakingConfig;
  repair: RepairConfig;
  policy: PolicyConfig;
  generation: GenerationConfig;
  speech: SpeechConfig;
  nudgeTopics: NudgeTopic[];
  topicKeywords: Record<string, string[]>;
}

// ─── Defaults ───────────────────────────────────────────────────────────────────

const DEFAULT_FLUENCY: FluencyConfig = {
  shortUtteranceWords: 3,
  maxFillerRatio: 0.2,
  maxHesitations: 2,
  maxRepetitionScore: 0.25,
};

const DEFAULT_TURN_TAKING: TurnTakingConfig = {
  pauseTiersMs: {
    [PauseTier.SHORT]: 2500,
    [PauseTier.MEDIUM]: 3500,
    [PauseTier.LONG]: 5500,
  },
  pauseDetectMs: 600,
  minListenMs: 3000,
  maxSilenceMs: 20000,
  maxTurnMs: 300000,
  fastTierAfterFluentTurns: 1,
  bargeIn: false,
};

const DEFAULT_REPAIR: RepairConfig = {
  maxWaitMs: 15000,
  veryShortFloor: 3,
};

const DEFAULT_POLICY: PolicyConfig = {
  questionBudget: 12,
  questionPressureLimit: 2,
  nudgeAfterSilentTurns: 3,
  nudgePriority: ["family", "childhood", "work", "hobbies"],
  nudgeExhaustedFallback: "close",
  allowTopicRepetition: false,
  topicChangeAfterTurns: 3,
  maxSentences: 2,
  historyTurns: 6,
};

const DEFAULT_GENERATION: GenerationConfig = {
  model: "gpt-4.1",
  temperature: 0.6,
  maxTokens: 180,
  timeoutMs: 8000,
  preserveDiscourseMarkers: true,
};

const DEFAULT_SPEECH: SpeechConfig = {
  model: "tts-1",
  voice: "nova",
  speedByTier: {
    [PauseTier.SHORT]: 1.05,
    [PauseTier.MEDIUM]: 0.98,
    [PauseTier.LONG]: 0.94,
  },
};

const SPEECH_VOICES: readonly SpeechVoice[] = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"];

/** data/ sits beside src/ and dist/, so one relative hop works for both. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../data", import.meta.url));

// ─── Data Files ─────────────────────────────────────────────────────────────────

function readJson(file: string): unknown {
  const raw = readFileSync(file, "utf-8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`Invalid JSON in ${file}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringArray(value: unknown, label: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new Error(`${label} must be an array of strings`);
  }
  return value.map((v) => v.toLowerCase().trim()).filter((v) => v.length > 0);
}

export function parseLexicon(value: unknown): LexiconConfig {
  if (!isRecord(value)) {
    throw new Error("Lexicon file must contain a JSON object");
  }
  return {
    fillers: toStringArray(value.fillers, "lexicon.fillers"),
    acousticFillers: toStringArray(value.acousticFillers, "lexicon.acousticFillers"),
    affirmations: toStringArray(value.affirmations, "lexicon.affirmations"),
    exitKeywords: toStringArray(value.exitKeywords, "lexicon.exitKeywords"),
    exitPhrases: toStringArray(value.exitPhrases, "lexicon.exitPhrases"),
    validShortAnswers: toStringArray(value.validShortAnswers, "lexicon.validShortAnswers"),
    conjunctions: toStringArray(value.conjunctions, "lexicon.conjunctions"),
    repairMarkers: toStringArray(value.repairMarkers, "lexicon.repairMarkers"),
    repeatTriggers: toStringArray(value.repeatTriggers, "lexicon.repeatTriggers"),
    repeatComplaints: toStringArray(value.repeatComplaints, "lexicon.repeatComplaints"),
    repeatQuestionCues: toStringArray(value.repeatQuestionCues, "lexicon.repeatQuestionCues"),
  };
}

export function parseNudgeTopics(value: unknown): NudgeTopic[] {
  if (!Array.isArray(value)) {
    throw new Error("Nudge repertoire must be a JSON array");
  }
  const seen = new Set<string>();
  return value.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.topicId !== "string" || typeof entry.prompt !== "string") {
      throw new Error(`Nudge topic at index ${index} needs string "topicId" and "prompt"`);
    }
    if (seen.has(entry.topicId)) {
      throw new Error(`Duplicate nudge topic "${entry.topicId}"`);
    }
    seen.add(entry.topicId);
    const topic: NudgeTopic = { topicId: entry.topicId, prompt: entry.prompt };
    if (typeof entry.statement === "string") {
      topic.statement = entry.statement;
    }
    return topic;
  });
}

export function parseTopicKeywords(value: unknown): Record<string, string[]> {
  if (!isRecord(value)) {
    throw new Error("Topic keyword file must contain a JSON object");
  }
  const result: Record<string, string[]> = {};
  for (const [topicId, keywords] of Object.entries(value)) {
    result[topicId] = toStringArray(keywords, `topicKeywords.${topicId}`);
  }
  return result;
}

// ─── Environment Overrides ──────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  int(name: string, fallback: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      this.problems.push(`${name} must be an integer (got "${raw}")`);
      return fallback;
    }
    return value;
  }

  float(name: string, fallback: number): number {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.problems.push(`${name} must be a number (got "${raw}")`);
      return fallback;
    }
    return value;
  }

  bool(name: string, fallback: boolean): boolean {
    const raw = this.env[name]?.trim().toLowerCase();
    if (raw === undefined || raw === "") return fallback;
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    this.problems.push(`${name} must be true or false (got "${raw}")`);
    return fallback;
  }

  string(name: string, fallback: string): string {
    const raw = this.env[name]?.trim();
    return raw ? raw : fallback;
  }

  list(name: string, fallback: string[]): string[] {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    return raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  }
}

function parseVoice(reader: EnvReader, raw: string): SpeechVoice {
  const voice = SPEECH_VOICES.find((v) => v === raw);
  if (!voice) {
    reader.problems.push(`TTS_VOICE must be one of ${SPEECH_VOICES.join(", ")} (got "${raw}")`);
    return DEFAULT_SPEECH.voice;
  }
  return voice;
}

function parseFallback(reader: EnvReader, raw: string): NudgeExhaustedFallback {
  if (raw === "close" || raw === "repeat") return raw;
  reader.problems.push(`NUDGE_EXHAUSTED_FALLBACK must be "close" or "repeat" (got "${raw}")`);
  return DEFAULT_POLICY.nudgeExhaustedFallback;
}

// ─── Validation ─────────────────────────────────────────────────────────────────

/**
 * Returns every problem found in the configuration (empty when valid).
 */
export function validateConfig(config: AppConfig): string[] {
  const problems: string[] = [];
  const tiers = config.turnTaking.pauseTiersMs;
  const tt = config.turnTaking;

  for (const tier of [PauseTier.SHORT, PauseTier.MEDIUM, PauseTier.LONG]) {
    if (tiers[tier] <= 0) problems.push(`Pause tier ${tier} must be positive`);
  }
  if (!(tiers.SHORT < tiers.MEDIUM && tiers.MEDIUM < tiers.LONG)) {
    problems.push("Pause tiers must satisfy SHORT < MEDIUM < LONG");
  }
  if (tiers.LONG > tt.maxSilenceMs) {
    problems.push("LONG pause tier must not exceed the absolute silence bound");
  }
  if (tt.pauseDetectMs <= 0 || tt.pauseDetectMs >= tiers.SHORT) {
    problems.push("pauseDetectMs must be positive and shorter than the SHORT tier");
  }
  if (tt.minListenMs < 0) problems.push("minListenMs must not be negative");
  if (tt.maxTurnMs <= tt.maxSilenceMs) problems.push("maxTurnMs must exceed maxSilenceMs");
  if (tt.fastTierAfterFluentTurns < 1) problems.push("fastTierAfterFluentTurns must be at least 1");

  if (config.repair.veryShortFloor < 1) problems.push("veryShortFloor must be at least 1");
  if (config.repair.maxWaitMs <= 0) problems.push("maxWaitMs must be positive");

  const f = config.fluency;
  if (f.shortUtteranceWords < 1) problems.push("shortUtteranceWords must be at least 1");
  if (f.maxFillerRatio < 0 || f.maxFillerRatio > 1) problems.push("maxFillerRatio must be within 0..1");
  if (f.maxHesitations < 0) problems.push("maxHesitations must not be negative");

  const p = config.policy;
  if (p.questionBudget !== null && p.questionBudget < 0) problems.push("questionBudget must not be negative");
  if (p.nudgeAfterSilentTurns < 1) problems.push("nudgeAfterSilentTurns must be at least 1");
  if (p.maxSentences < 1) problems.push("maxSentences must be at least 1");
  const known = new Set(config.nudgeTopics.map((t) => t.topicId));
  for (const id of p.nudgePriority) {
    if (!known.has(id)) problems.push(`Nudge priority names unknown topic "${id}"`);
  }

  const g = config.generation;
  if (g.timeoutMs <= 0) problems.push("LLM timeout must be positive");
  if (g.temperature < 0 || g.temperature > 2) problems.push("LLM temperature must be within 0..2");

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    problems.push("PORT must be an integer within 0..65535");
  }
  return problems;
}

// ─── Loader ─────────────────────────────────────────────────────────────────────

/**
 * Build the application configuration from the data files and environment.
 * @throws Error listing every problem when the result is invalid.
 */
export function loadConfig(env: Env = process.env, dataDir: string = DEFAULT_DATA_DIR): AppConfig {
  const lexicon = parseLexicon(readJson(path.join(dataDir, "lexicons.json")));
  const nudgeTopics = parseNudgeTopics(readJson(path.join(dataDir, "nudge-topics.json")));
  const topicKeywords = parseTopicKeywords(readJson(path.join(dataDir, "topic-keywords.json")));

  const r = new EnvReader(env);
  const budgetRaw = env.QUESTION_BUDGET?.trim().toLowerCase();

  const config: AppConfig = {
    port: r.int("PORT", 3000),
    sessionLogDir: env.SESSION_LOG_DIR?.trim() || null,
    lexicon,
    fluency: {
      shortUtteranceWords: r.int("SHORT_UTTERANCE_WORDS", DEFAULT_FLUENCY.shortUtteranceWords),
      maxFillerRatio: r.float("MAX_FILLER_RATIO", DEFAULT_FLUENCY.maxFillerRatio),
      maxHesitations: r.int("MAX_HESITATIONS", DEFAULT_FLUENCY.maxHesitations),
      maxRepetitionScore: r.float("MAX_REPETITION_SCORE", DEFAULT_FLUENCY.maxRepetitionScore),
    },
    turnTaking: {
      pauseTiersMs: {
        [PauseTier.SHORT]: r.int("PAUSE_TIER_SHORT_MS", DEFAULT_TURN_TAKING.pauseTiersMs.SHORT),
        [PauseTier.MEDIUM]: r.int("PAUSE_TIER_MEDIUM_MS", DEFAULT_TURN_TAKING.pauseTiersMs.MEDIUM),
        [PauseTier.LONG]: r.int("PAUSE_TIER_LONG_MS", DEFAULT_TURN_TAKING.pauseTiersMs.LONG),
      },
      pauseDetectMs: r.int("PAUSE_DETECT_MS", DEFAULT_TURN_TAKING.pauseDetectMs),
      minListenMs: r.int("MIN_LISTEN_MS", DEFAULT_TURN_TAKING.minListenMs),
      maxSilenceMs: r.int("MAX_SILENCE_MS", DEFAULT_TURN_TAKING.maxSilenceMs),
      maxTurnMs: r.int("MAX_TURN_MS", DEFAULT_TURN_TAKING.maxTurnMs),
      fastTierAfterFluentTurns: r.int("FAST_TIER_AFTER_FLUENT_TURNS", DEFAULT_TURN_TAKING.fastTierAfterFluentTurns),
      bargeIn: r.bool("BARGE_IN", DEFAULT_TURN_TAKING.bargeIn),
    },
    repair: {
      maxWaitMs: r.int("REPAIR_MAX_WAIT_MS", DEFAULT_REPAIR.maxWaitMs),
      veryShortFloor: r.int("VERY_SHORT_FLOOR", DEFAULT_REPAIR.veryShortFloor),
    },
    policy: {
      questionBudget:
        budgetRaw === "none" || budgetRaw === "off"
          ? null
          : r.int("QUESTION_BUDGET", DEFAULT_POLICY.questionBudget ?? 0),
      questionPressureLimit: r.int("QUESTION_PRESSURE_LIMIT", DEFAULT_POLICY.questionPressureLimit),
      nudgeAfterSilentTurns: r.int("NUDGE_AFTER_SILENT_TURNS", DEFAULT_POLICY.nudgeAfterSilentTurns),
      nudgePriority: r.list("NUDGE_PRIORITY", DEFAULT_POLICY.nudgePriority),
      nudgeExhaustedFallback: parseFallback(r, r.string("NUDGE_EXHAUSTED_FALLBACK", DEFAULT_POLICY.nudgeExhaustedFallback)),
      allowTopicRepetition: r.bool("ALLOW_TOPIC_REPETITION", DEFAULT_POLICY.allowTopicRepetition),
      topicChangeAfterTurns: r.int("TOPIC_CHANGE_AFTER_TURNS", DEFAULT_POLICY.topicChangeAfterTurns),
      maxSentences: r.int("MAX_SENTENCES", DEFAULT_POLICY.maxSentences),
      historyTurns: r.int("HISTORY_TURNS", DEFAULT_POLICY.historyTurns),
    },
    generation: {
      model: r.string("LLM_MODEL", DEFAULT_GENERATION.model),
      temperature: r.float("LLM_TEMPERATURE", DEFAULT_GENERATION.temperature),
      maxTokens: r.int("LLM_MAX_TOKENS", DEFAULT_GENERATION.maxTokens),
      timeoutMs: r.int("LLM_TIMEOUT_MS", DEFAULT_GENERATION.timeoutMs),
      preserveDiscourseMarkers: r.bool("PRESERVE_DISCOURSE_MARKERS", DEFAULT_GENERATION.preserveDiscourseMarkers),
    },
    speech: {
      model: r.string("TTS_MODEL", DEFAULT_SPEECH.model),
      voice: parseVoice(r, r.string("TTS_VOICE", DEFAULT_SPEECH.voice)),
      speedByTier: { ...DEFAULT_SPEECH.speedByTier },
    },
    nudgeTopics,
    topicKeywords,
  };

  const problems = [...r.problems, ...validateConfig(config)];
  if (problems.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
  }
  return config;
}
