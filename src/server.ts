// Patient Dialogue Engine - WebSocket Handler and Express Server
// Bridges one browser client to one ConversationSession: binary frames carry
// microphone audio in, JSON frames carry control messages both ways and
// synthesized speech goes out as binary frames.
//
// Privacy: Audio chunks are in-memory only, never written to disk.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { ConversationSession, ConversationTransport } from "./conversation-session.js";
import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { ClientMessage, ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Expected audio format for the handshake */
const EXPECTED_FORMAT = {
  channels: 1,
  sampleRate: 16000,
  encoding: "LINEAR16",
} as const;

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  connectionId: number;
  audioFormatValidated: boolean;
  session: ConversationSession | null;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

/** Builds a conversation bound to one client's transport. */
export type SessionFactory = (transport: ConversationTransport) => ConversationSession;

export interface CreateServerOptions {
  sessionFactory: SessionFactory;
  /** Directory to serve static files from. Defaults to "public" relative to cwd. */
  staticDir?: string;
  /** Custom logger. Defaults to the console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** The conversation currently in progress, if any. */
  activeSession(): ConversationSession | null;
  /** Start listening on the given port. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 * At most one conversation is active across all connections.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    sessionFactory,
    staticDir = path.resolve(process.cwd(), "public"),
    logger = createLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  let active: ConversationSession | null = null;
  let nextConnectionId = 1;

  app.use(express.static(staticDir));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", conversationActive: active !== null });
  });

  const wss = new WebSocketServer({ server: httpServer });

  const slot = {
    claim(session: ConversationSession): boolean {
      if (active) return false;
      active = session;
      session.whenEnded().then(
        () => {
          if (active === session) active = null;
        },
        (err: unknown) => logger.error(`Conversation ended abnormally: ${errorMessage(err)}`),
      );
      return true;
    },
  };

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, nextConnectionId++, sessionFactory, slot, logger);
  });

  return {
    app,
    httpServer,
    wss,
    activeSession: () => active,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    async close(): Promise<void> {
      if (active) {
        await active.end("user_ended");
      }
      await new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

interface SessionSlot {
  claim(session: ConversationSession): boolean;
}

function handleConnection(
  ws: WebSocket,
  connectionId: number,
  sessionFactory: SessionFactory,
  slot: SessionSlot,
  logger: Logger,
): void {
  const connState: ConnectionState = {
    connectionId,
    audioFormatValidated: false,
    session: null,
  };

  logger.info(`New WebSocket connection ${connectionId}`);

  ws.on("message", (raw: RawData, isBinary: boolean) => {
    const data = toBuffer(raw);
    try {
      if (isBinary) {
        handleBinaryMessage(ws, data, connState);
        return;
      }
      const message = parseClientMessage(data.toString("utf-8"));
      if (!message) {
        sendMessage(ws, { type: "error", message: "Malformed client message.", recoverable: true });
        return;
      }
      handleClientMessage(ws, message, connState, sessionFactory, slot, logger);
    } catch (err) {
      logger.error(`Error handling message on connection ${connectionId}: ${errorMessage(err)}`);
      sendMessage(ws, { type: "error", message: errorMessage(err), recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, connection ${connectionId}`);
    endConversation(connState, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error on connection ${connectionId}: ${err.message}`);
    endConversation(connState, logger);
  });
}

// ─── Client Message Parsing ─────────────────────────────────────────────────────

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Parse and shape-check one JSON control frame. Returns null when malformed. */
export function parseClientMessage(text: string): ClientMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(raw)) return null;

  switch (raw.type) {
    case "audio_format":
      if (
        typeof raw.channels !== "number" ||
        typeof raw.sampleRate !== "number" ||
        typeof raw.encoding !== "string"
      ) {
        return null;
      }
      return { type: "audio_format", channels: raw.channels, sampleRate: raw.sampleRate, encoding: raw.encoding };
    case "start_conversation":
      return { type: "start_conversation" };
    case "end_conversation":
      return { type: "end_conversation" };
    case "playback_complete":
      if (typeof raw.utteranceId !== "number" || !Number.isInteger(raw.utteranceId)) return null;
      return { type: "playback_complete", utteranceId: raw.utteranceId };
    default:
      return null;
  }
}

// ─── Binary Message Handler (Audio Chunks) ──────────────────────────────────────

function handleBinaryMessage(ws: WebSocket, data: Buffer, connState: ConnectionState): void {
  // Audio format must be validated before accepting audio chunks
  if (!connState.audioFormatValidated) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: "Audio format handshake required before sending audio chunks.",
    });
    return;
  }

  if (!connState.session || connState.session.ended) {
    sendMessage(ws, {
      type: "error",
      message: "Audio chunks rejected: no conversation in progress.",
      recoverable: true,
    });
    return;
  }

  // Validate chunk byte alignment (16-bit PCM = 2 bytes per sample)
  if (data.length % 2 !== 0) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: `Audio chunk byte length (${data.length}) is not a multiple of 2. Expected 16-bit aligned PCM data.`,
    });
    return;
  }

  connState.session.feedAudio(Buffer.from(data));
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionFactory: SessionFactory,
  slot: SessionSlot,
  logger: Logger,
): void {
  switch (message.type) {
    case "audio_format":
      handleAudioFormat(ws, message, connState, logger);
      break;

    case "start_conversation":
      handleStartConversation(ws, connState, sessionFactory, slot, logger);
      break;

    case "playback_complete":
      if (!connState.session) {
        sendMessage(ws, { type: "error", message: "No conversation in progress.", recoverable: true });
        return;
      }
      connState.session.playbackComplete(message.utteranceId);
      break;

    case "end_conversation":
      if (!connState.session) {
        sendMessage(ws, { type: "error", message: "No conversation in progress.", recoverable: true });
        return;
      }
      endConversation(connState, logger);
      break;

    default: {
      const exhaustiveCheck: never = message;
      logger.warn(`Unhandled client message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Audio Format Handshake ─────────────────────────────────────────────────────

function handleAudioFormat(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "audio_format" }>,
  connState: ConnectionState,
  logger: Logger,
): void {
  const errors: string[] = [];

  if (message.channels !== EXPECTED_FORMAT.channels) {
    errors.push(`Expected ${EXPECTED_FORMAT.channels} channel(s), got ${message.channels}`);
  }
  if (message.sampleRate !== EXPECTED_FORMAT.sampleRate) {
    errors.push(`Expected sample rate ${EXPECTED_FORMAT.sampleRate}, got ${message.sampleRate}`);
  }
  if (message.encoding !== EXPECTED_FORMAT.encoding) {
    errors.push(`Expected encoding "${EXPECTED_FORMAT.encoding}", got "${message.encoding}"`);
  }

  if (errors.length > 0) {
    const errorMsg = `Audio format validation failed: ${errors.join("; ")}`;
    logger.warn(`${errorMsg} (connection ${connState.connectionId})`);
    sendMessage(ws, { type: "audio_format_error", message: errorMsg });
    return;
  }

  connState.audioFormatValidated = true;
  logger.info(`Audio format validated for connection ${connState.connectionId}`);
}

// ─── Conversation Lifecycle ─────────────────────────────────────────────────────

function handleStartConversation(
  ws: WebSocket,
  connState: ConnectionState,
  sessionFactory: SessionFactory,
  slot: SessionSlot,
  logger: Logger,
): void {
  if (!connState.audioFormatValidated) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: "Audio format handshake required before starting a conversation.",
    });
    return;
  }
  if (connState.session && !connState.session.ended) {
    sendMessage(ws, { type: "error", message: "A conversation is already in progress.", recoverable: true });
    return;
  }

  const session = sessionFactory({
    send: (message) => sendMessage(ws, message),
    sendAudio: (audio) => sendAudio(ws, audio),
  });
  if (!slot.claim(session)) {
    sendMessage(ws, {
      type: "error",
      message: "Another conversation is already in progress on this server.",
      recoverable: true,
    });
    return;
  }

  connState.session = session;
  logger.info(`Conversation ${session.id} started on connection ${connState.connectionId}`);
  session.start().catch((err: unknown) => {
    logger.error(`Conversation ${session.id} failed to start: ${errorMessage(err)}`);
  });
}

function endConversation(connState: ConnectionState, logger: Logger): void {
  const session = connState.session;
  if (!session || session.ended) return;
  session.end("user_ended").catch((err: unknown) => {
    logger.error(`Failed to end conversation ${session.id}: ${errorMessage(err)}`);
  });
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/** Sends synthesized speech as one binary frame. */
export function sendAudio(ws: WebSocket, audio: Buffer): void {
  if (ws.readyState === WebSocket.OPEN && audio.length > 0) {
    ws.send(audio, { binary: true });
  }
}
