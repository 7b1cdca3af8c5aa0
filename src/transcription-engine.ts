// Patient Dialogue Engine - Transcription Engine
// Streams microphone audio to Deepgram live transcription and converts each
// interim or final result into a TranscriptFragment for the turn-taking state
// machine.
//
// Privacy: audio chunks are in-memory only, forwarded to Deepgram and never
// written to disk.

import type { LiveSchema } from "@deepgram/sdk";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import { CollaboratorError, errorMessage } from "./errors.js";
import type { TranscriptFragment, TranscriptWord } from "./types.js";

// ─── Recognizer contract ────────────────────────────────────────────────────────

export interface RecognizerHandlers {
  onFragment: (fragment: TranscriptFragment) => void;
  onError: (error: CollaboratorError) => void;
  /** The connection closed without stop() being called. */
  onClose: () => void;
}

/** Streaming speech recognizer consumed by the conversation session. */
export interface SpeechRecognizer {
  start(handlers: RecognizerHandlers): void;
  feedAudio(chunk: Buffer): void;
  stop(): void;
}

/**
 * Default Deepgram live configuration. Mono LINEAR16 at 16kHz per the audio
 * format handshake; filler words are kept because fluency depends on them.
 */
const DEFAULT_LIVE_CONFIG: LiveSchema = {
  model: "nova-2",
  language: "en",
  encoding: "linear16",
  sample_rate: 16000,
  channels: 1,
  interim_results: true,
  punctuate: true,
  smart_format: true,
  filler_words: true,
};

// ─── Deepgram client interface (for testability / dependency injection) ─────────

/** The slice of the SDK's ListenLiveClient we use. */
export interface LiveConnection {
  on(event: string, handler: (data: unknown) => void): void;
  send(data: ArrayBuffer): void;
  requestClose(): void;
}

/**
 * Minimal interface for the Deepgram client surface we use. The SDK's
 * DeepgramClient satisfies it; tests pass a mock.
 */
export interface DeepgramLiveClient {
  listen: {
    live(options: LiveSchema): LiveConnection;
  };
}

// ─── Deepgram event shape ───────────────────────────────────────────────────────

/**
 * Fields of a Deepgram live transcript event that we read. Defined locally to
 * avoid tight coupling with SDK internals.
 */
interface DeepgramTranscriptEvent {
  start: number;
  duration: number;
  is_final?: boolean;
  channel: {
    alternatives: Array<{
      transcript: string;
      words?: Array<{
        word: string;
        start: number;
        end: number;
        confidence: number;
        punctuated_word?: string;
      }>;
    }>;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isTranscriptEvent(value: unknown): value is DeepgramTranscriptEvent {
  if (!isRecord(value)) return false;
  if (typeof value.start !== "number" || typeof value.duration !== "number") return false;
  const channel = value.channel;
  return isRecord(channel) && Array.isArray(channel.alternatives);
}

/**
 * Convert a Deepgram transcript event into a fragment. Returns null for
 * events without any recognized text (Deepgram sends these during silence).
 */
export function toFragment(event: unknown): TranscriptFragment | null {
  if (!isTranscriptEvent(event)) return null;
  const alternative = event.channel.alternatives[0];
  if (!alternative || !alternative.transcript || alternative.transcript.trim().length === 0) {
    return null;
  }

  const words: TranscriptWord[] = (alternative.words ?? []).map((w) => ({
    word: w.punctuated_word ?? w.word,
    startTime: w.start,
    endTime: w.end,
    confidence: w.confidence,
  }));

  return {
    text: alternative.transcript,
    startTime: event.start,
    endTime: event.start + event.duration,
    words,
    isFinal: event.is_final === true,
  };
}

// ─── TranscriptionEngine ────────────────────────────────────────────────────────

/**
 * Live recognizer over one Deepgram WebSocket per conversation. No reconnect:
 * an unexpected close is reported and the session decides what to do.
 */
export class TranscriptionEngine implements SpeechRecognizer {
  private readonly deepgramClient: DeepgramLiveClient;
  private readonly liveConfig: LiveSchema;
  private liveClient: LiveConnection | null = null;
  private handlers: RecognizerHandlers | null = null;

  constructor(deepgramClient: DeepgramLiveClient, config?: Partial<LiveSchema>) {
    this.deepgramClient = deepgramClient;
    this.liveConfig = { ...DEFAULT_LIVE_CONFIG, ...config };
  }

  /**
   * Open the Deepgram connection and start emitting fragments.
   * @throws Error if a live session is already active.
   */
  start(handlers: RecognizerHandlers): void {
    if (this.liveClient) {
      throw new Error("Live transcription session already active. Call stop() first.");
    }

    this.handlers = handlers;
    const client = this.deepgramClient.listen.live(this.liveConfig);
    this.liveClient = client;

    client.on(LiveTranscriptionEvents.Transcript, (data: unknown) => {
      if (this.liveClient !== client) return;
      const fragment = toFragment(data);
      if (fragment) this.handlers?.onFragment(fragment);
    });

    client.on(LiveTranscriptionEvents.Error, (error: unknown) => {
      if (this.liveClient !== client) return;
      this.handlers?.onError(
        new CollaboratorError("stt", `Deepgram error: ${errorMessage(error)}`, { cause: error }),
      );
    });

    client.on(LiveTranscriptionEvents.Close, () => {
      // A close we did not request (liveClient still set) is an unexpected drop.
      if (this.liveClient !== client) return;
      const handlers = this.handlers;
      this.liveClient = null;
      this.handlers = null;
      handlers?.onClose();
    });
  }

  /**
   * Forward one audio chunk (16-bit mono PCM, 16kHz).
   * @throws Error if no live session is active.
   */
  feedAudio(chunk: Buffer): void {
    if (!this.liveClient) {
      throw new Error("No active live transcription session. Call start() first.");
    }
    // The SDK's SocketDataLike takes an ArrayBuffer, not a Node Buffer view.
    this.liveClient.send(chunk.buffer.slice(chunk.byteOffset, chunk.byteOffset + chunk.byteLength));
  }

  /** Close the connection. Safe to call when already stopped. */
  stop(): void {
    if (!this.liveClient) return;
    const client = this.liveClient;
    this.liveClient = null;
    this.handlers = null;
    client.requestClose();
  }

  get active(): boolean {
    return this.liveClient !== null;
  }
}
