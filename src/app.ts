// Patient Dialogue Engine - Application wiring
// Builds one ConversationSession per started conversation from the shared
// collaborator clients. Kept apart from index.ts so it can be imported
// without starting a server.

import { v4 as uuidv4 } from "uuid";
import type { AppConfig } from "./config.js";
import { ConversationSession } from "./conversation-session.js";
import { createLogger } from "./logger.js";
import { ResponseGenerator, type OpenAIChatClient } from "./response-generator.js";
import type { SessionFactory } from "./server.js";
import { nullSummarySink, SessionLog } from "./session-log.js";
import { TranscriptionEngine, type DeepgramLiveClient } from "./transcription-engine.js";
import { TTSEngine, type OpenAITTSClient } from "./tts-engine.js";

export const APP_NAME = "Patient Dialogue Engine";
export const APP_VERSION = "0.1.0";

export interface CollaboratorClients {
  deepgram: DeepgramLiveClient;
  chat: OpenAIChatClient;
  speech: OpenAITTSClient;
}

/**
 * Session factory for the server. Each conversation gets its own Deepgram
 * connection and, when SESSION_LOG_DIR is set, its own JSONL turn log; the
 * model clients are shared.
 */
export function createSessionFactory(config: AppConfig, clients: CollaboratorClients): SessionFactory {
  const generator = new ResponseGenerator(clients.chat, config.generation);
  const synthesizer = new TTSEngine(clients.speech, config.speech);

  return (transport) => {
    const sessionId = uuidv4();
    const logger = createLogger(`Conversation ${sessionId.slice(0, 8)}`);
    const sink = config.sessionLogDir ? new SessionLog(config.sessionLogDir, sessionId) : nullSummarySink;
    if (sink instanceof SessionLog) {
      logger.info(`Writing turn log to ${sink.path}`);
    }
    return new ConversationSession({
      config,
      recognizer: new TranscriptionEngine(clients.deepgram),
      synthesizer,
      generator,
      transport,
      sink,
      logger,
      sessionId,
    });
  };
}
