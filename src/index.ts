// Patient Dialogue Engine - Entry point
// Wires up all collaborators and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { APP_NAME, APP_VERSION, createSessionFactory } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { OpenAIChatClient } from "./response-generator.js";
import { createAppServer } from "./server.js";
import type { OpenAITTSClient } from "./tts-engine.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}

logInit(
  `Pause tiers ${config.turnTaking.pauseTiersMs.SHORT}/${config.turnTaking.pauseTiersMs.MEDIUM}/` +
    `${config.turnTaking.pauseTiersMs.LONG}ms, question budget ${config.policy.questionBudget ?? "unlimited"}`,
);

// ─── Validate API keys ─────────────────────────────────────────────────────────

const deepgramKey = process.env.DEEPGRAM_API_KEY;
const openaiKey = process.env.OPENAI_API_KEY;

if (!deepgramKey) {
  logFatal("DEEPGRAM_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

if (!openaiKey) {
  logFatal("OPENAI_API_KEY is not set. Add it to your .env file.");
  process.exit(1);
}

logInit("API keys loaded");

// ─── Initialize API clients ─────────────────────────────────────────────────────

logInit("Creating Deepgram client...");
const deepgramClient = createDeepgramClient(deepgramKey);

logInit("Creating OpenAI client...");
const openaiClient = new OpenAI({ apiKey: openaiKey });

const chatClient: OpenAIChatClient = {
  chat: {
    completions: {
      create: (params, options) => openaiClient.chat.completions.create({ ...params, stream: false }, options),
    },
  },
};

const speechClient: OpenAITTSClient = {
  audio: {
    speech: {
      create: (params) => openaiClient.audio.speech.create(params),
    },
  },
};

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  sessionFactory: createSessionFactory(config, {
    deepgram: deepgramClient,
    chat: chatClient,
    speech: speechClient,
  }),
});

server.listen(config.port).then(
  (port) => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    logInit(`Pipeline: Deepgram → turn-taking → dialogue policy → ${config.generation.model} → TTS`);
    logInit("Ready for connections");
  },
  (err: unknown) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  },
);
