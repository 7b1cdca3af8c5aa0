// Unit tests for SessionLog

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { buildLogFileName, formatSummaryLine, nullSummarySink, SessionLog } from "./session-log.js";
import { DialogueAct, FluencyLabel, PauseTier, RepairCase, RepeatIntent, type TurnSummary } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function makeSummary(overrides: Partial<TurnSummary> = {}): TurnSummary {
  return {
    sessionId: "session-abc",
    turnIndex: 1,
    rawTranscript: "um we had a dog",
    normalizedTranscript: "we had a dog",
    fluencyLabel: FluencyLabel.HESITANT,
    repairCase: RepairCase.NONE,
    repairReason: "",
    repeatIntent: RepeatIntent.NONE,
    dialogueAct: DialogueAct.HANDOFF_TO_LLM,
    actHint: DialogueAct.CONFIRM,
    pauseTier: PauseTier.MEDIUM,
    nudgeTopicId: null,
    systemText: "A dog is fine company.",
    questionBudgetRemaining: 12,
    result: "ok",
    turnStartedAt: "2026-03-05T09:07:03.000Z",
    turnEndedAt: "2026-03-05T09:07:09.000Z",
    actEmittedAt: "2026-03-05T09:07:10.000Z",
    playbackDoneAt: "2026-03-05T09:07:12.000Z",
    ...overrides,
  };
}

describe("buildLogFileName", () => {
  it("should zero-pad the local start time and append the session id", () => {
    expect(buildLogFileName("session-abc", new Date(2026, 2, 5, 9, 7, 3))).toBe(
      "2026-03-05_09-07-03_session-abc.jsonl",
    );
  });
});

describe("formatSummaryLine", () => {
  it("should produce one newline-terminated JSON line", () => {
    const line = formatSummaryLine(makeSummary());
    expect(line.endsWith("\n")).toBe(true);
    expect(line.indexOf("\n")).toBe(line.length - 1);
    expect(JSON.parse(line)).toEqual(makeSummary());
  });
});

describe("SessionLog", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "session-log-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("should create the log directory on first write", async () => {
    const baseDir = join(tempDir, "logs", "nested");
    const log = new SessionLog(baseDir, "session-abc", new Date(2026, 2, 5, 9, 7, 3));

    await log.write(makeSummary());

    expect(await readdir(baseDir)).toEqual(["2026-03-05_09-07-03_session-abc.jsonl"]);
    expect(log.path).toBe(join(baseDir, "2026-03-05_09-07-03_session-abc.jsonl"));
  });

  it("should append one line per turn in order", async () => {
    const log = new SessionLog(tempDir, "session-abc");

    await log.write(makeSummary({ turnIndex: 1 }));
    await log.write(makeSummary({ turnIndex: 2, result: "interrupted", playbackDoneAt: null }));

    const lines = (await readFile(log.path, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0]).turnIndex).toBe(1);
    expect(JSON.parse(lines[1])).toMatchObject({ turnIndex: 2, result: "interrupted", playbackDoneAt: null });
  });

  it("should retry creating the directory after a failed write", async () => {
    const blocker = join(tempDir, "blocker");
    await writeFile(blocker, "not a directory", "utf-8");
    const baseDir = join(blocker, "logs");
    const log = new SessionLog(baseDir, "session-abc");

    await expect(log.write(makeSummary({ turnIndex: 1 }))).rejects.toThrow();

    await rm(blocker);
    await log.write(makeSummary({ turnIndex: 2 }));

    const lines = (await readFile(log.path, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).turnIndex).toBe(2);
  });

  it("should keep every line when writes overlap", async () => {
    const log = new SessionLog(tempDir, "session-abc");

    await Promise.all([log.write(makeSummary({ turnIndex: 1 })), log.write(makeSummary({ turnIndex: 2 }))]);

    const lines = (await readFile(log.path, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
  });
});

describe("nullSummarySink", () => {
  it("should accept summaries without writing anything", async () => {
    await expect(nullSummarySink.write(makeSummary())).resolves.toBeUndefined();
  });
});
