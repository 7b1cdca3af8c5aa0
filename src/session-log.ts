// Patient Dialogue Engine - Session Log
// Opt-in per-turn log: one JSON line per TurnSummary, appended to
// {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}.jsonl. The log is an output
// artifact only; nothing reads it back.

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { TurnSummary } from "./types.js";

/** Destination for per-turn summaries. */
export interface TurnSummarySink {
  write(summary: TurnSummary): Promise<void>;
}

/**
 * Log file name for a session.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}.jsonl`
 */
export function buildLogFileName(sessionId: string, startedAt: Date): string {
  const year = startedAt.getFullYear();
  const month = String(startedAt.getMonth() + 1).padStart(2, "0");
  const day = String(startedAt.getDate()).padStart(2, "0");
  const hours = String(startedAt.getHours()).padStart(2, "0");
  const minutes = String(startedAt.getMinutes()).padStart(2, "0");
  const seconds = String(startedAt.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${sessionId}.jsonl`;
}

export function formatSummaryLine(summary: TurnSummary): string {
  return `${JSON.stringify(summary)}\n`;
}

export class SessionLog implements TurnSummarySink {
  private readonly filePath: string;
  private dirReady: Promise<void> | null = null;

  constructor(
    private readonly baseDir: string,
    sessionId: string,
    startedAt: Date = new Date(),
  ) {
    this.filePath = join(baseDir, buildLogFileName(sessionId, startedAt));
  }

  get path(): string {
    return this.filePath;
  }

  async write(summary: TurnSummary): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.baseDir, { recursive: true }).then(
        () => undefined,
        (err: unknown) => {
          // Forget the failure so the next write tries again.
          this.dirReady = null;
          throw err;
        },
      );
    }
    await this.dirReady;
    await appendFile(this.filePath, formatSummaryLine(summary), "utf-8");
  }
}

/** Sink used when logging is not configured. */
export const nullSummarySink: TurnSummarySink = {
  write: () => Promise.resolve(),
};
