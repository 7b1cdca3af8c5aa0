// Unit tests for application wiring

import { afterEach, describe, it, expect, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { APP_NAME, APP_VERSION, createSessionFactory, type CollaboratorClients } from "./app.js";
import { loadConfig } from "./config.js";
import type { ServerMessage } from "./types.js";

function createClients(): CollaboratorClients {
  return {
    deepgram: {
      listen: {
        live: vi.fn().mockReturnValue({ on: vi.fn(), send: vi.fn(), requestClose: vi.fn() }),
      },
    },
    chat: { chat: { completions: { create: vi.fn() } } },
    speech: {
      audio: {
        speech: {
          create: vi.fn().mockResolvedValue({ arrayBuffer: () => Promise.resolve(new ArrayBuffer(4)) }),
        },
      },
    },
  };
}

describe("app", () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) await rm(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it("should expose the application name and version", () => {
    expect(APP_NAME).toBe("Patient Dialogue Engine");
    expect(APP_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it("should build a fresh session per conversation", () => {
    const factory = createSessionFactory(loadConfig({}), createClients());
    const transport = { send: vi.fn<[ServerMessage], void>(), sendAudio: vi.fn<[Buffer], void>() };

    const first = factory(transport);
    const second = factory(transport);

    expect(first.id).not.toBe(second.id);
    expect(first.ended).toBe(false);
  });

  it("should open a live recognizer connection and greet on start", async () => {
    const clients = createClients();
    const factory = createSessionFactory(loadConfig({}), clients);
    const send = vi.fn<[ServerMessage], void>();
    const session = factory({ send, sendAudio: vi.fn<[Buffer], void>() });

    await session.start();

    expect(clients.deepgram.listen.live).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith(expect.objectContaining({ type: "system_utterance", utteranceId: 1 }));
    await session.end("user_ended");
  });

  it("should create sessions when a turn log directory is configured", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "app-test-"));
    const factory = createSessionFactory(loadConfig({ SESSION_LOG_DIR: tempDir }), createClients());

    const session = factory({ send: vi.fn<[ServerMessage], void>(), sendAudio: vi.fn<[Buffer], void>() });

    expect(session.ended).toBe(false);
  });
});
