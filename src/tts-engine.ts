// Patient Dialogue Engine - TTS Engine
// Renders system utterances to audio via the OpenAI speech API. Playback
// happens in the browser; completion is reported back over the WebSocket.
//
// Speaking rate follows the pause tier: a speaker who needs long pauses is
// also spoken to a little more slowly.

import type { SpeechConfig } from "./config.js";
import { CollaboratorError, errorMessage } from "./errors.js";
import type { PauseTier, SpeechVoice, VoiceConfig } from "./types.js";

// ─── OpenAI TTS client interface (for testability / dependency injection) ────────

/**
 * Minimal interface for the OpenAI audio speech API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITTSClient {
  audio: {
    speech: {
      create(params: {
        model: string;
        voice: SpeechVoice;
        input: string;
        speed?: number;
        response_format?: "mp3" | "opus" | "aac" | "flac" | "wav" | "pcm";
      }): Promise<Response>;
    };
  };
}

/** Speech synthesizer contract consumed by the conversation session. */
export interface SpeechSynthesizer {
  synthesize(text: string, voice: VoiceConfig): Promise<Buffer>;
}

/** The API accepts speeds within this range. */
const MIN_SPEED = 0.25;
const MAX_SPEED = 4.0;

/** Voice settings for an utterance spoken ahead of a turn with `tier`. */
export function voiceForTier(config: SpeechConfig, tier: PauseTier): VoiceConfig {
  return { voice: config.voice, speed: config.speedByTier[tier] };
}

// ─── TTSEngine ──────────────────────────────────────────────────────────────────

export class TTSEngine implements SpeechSynthesizer {
  private readonly openai: OpenAITTSClient;
  private readonly config: SpeechConfig;

  constructor(openaiClient: OpenAITTSClient, config: SpeechConfig) {
    this.openai = openaiClient;
    this.config = config;
  }

  /**
   * Synthesize `text` to mp3 audio.
   * @throws CollaboratorError (recoverable) when the API call fails.
   */
  async synthesize(text: string, voice: VoiceConfig): Promise<Buffer> {
    const input = text.trim();
    if (input.length === 0) {
      return Buffer.alloc(0);
    }

    try {
      const response = await this.openai.audio.speech.create({
        model: this.config.model,
        voice: voice.voice,
        input,
        speed: Math.min(MAX_SPEED, Math.max(MIN_SPEED, voice.speed)),
        response_format: "mp3",
      });
      const arrayBuffer = await response.arrayBuffer();
      return Buffer.from(arrayBuffer);
    } catch (err) {
      throw new CollaboratorError("tts", `Speech synthesis failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
