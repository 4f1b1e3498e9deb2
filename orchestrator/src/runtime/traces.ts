import fs from "fs/promises";
import path from "path";
import { HistoryEntry, SessionReport } from "../types/session";

export interface TraceSession {
  sessionId: string;
  sutName: string;
  game: string;
  runNumber: number;
  startedAt: string;
}

export interface TraceSink {
  recordSessionStart(session: TraceSession): Promise<void>;
  recordEntry(sessionId: string, entry: HistoryEntry): Promise<void>;
  recordScreenshot(sessionId: string, label: string, image: Buffer): Promise<void>;
  recordSessionEnd(report: SessionReport): Promise<void>;
}

export class InMemoryTraceSink implements TraceSink {
  readonly sessions = new Map<string, TraceSession>();
  readonly entries = new Map<string, HistoryEntry[]>();
  readonly screenshots = new Map<string, string[]>();
  readonly reports: SessionReport[] = [];

  async recordSessionStart(session: TraceSession): Promise<void> {
    this.sessions.set(session.sessionId, session);
    this.entries.set(session.sessionId, []);
  }

  async recordEntry(sessionId: string, entry: HistoryEntry): Promise<void> {
    const entries = this.entries.get(sessionId) ?? [];
    entries.push(entry);
    this.entries.set(sessionId, entries);
  }

  async recordScreenshot(sessionId: string, label: string, image: Buffer): Promise<void> {
    const labels = this.screenshots.get(sessionId) ?? [];
    labels.push(`${label}:${image.length}`);
    this.screenshots.set(sessionId, labels);
  }

  async recordSessionEnd(report: SessionReport): Promise<void> {
    this.reports.push(report);
  }
}

interface SessionFolder {
  dir: string;
  historyPath: string;
  screenshotsDir: string;
}

/**
 * One folder per session under `baseDir`:
 * `history.jsonl`, `report.json` and, when enabled, `screenshots/`.
 */
export class FileTraceSink implements TraceSink {
  private baseDir: string;
  private saveScreenshots: boolean;
  private folders = new Map<string, SessionFolder>();

  constructor(baseDir: string, options: { saveScreenshots?: boolean } = {}) {
    this.baseDir = baseDir;
    this.saveScreenshots = options.saveScreenshots ?? false;
  }

  async recordSessionStart(session: TraceSession): Promise<void> {
    const safeTimestamp = session.startedAt.replace(/[:.]/g, "-");
    const name = `${safeTimestamp}_${safeSegment(session.sutName)}_${safeSegment(session.game)}_run${session.runNumber}`;
    const dir = path.resolve(this.baseDir, name);
    const screenshotsDir = path.join(dir, "screenshots");

    await fs.mkdir(dir, { recursive: true });
    if (this.saveScreenshots) {
      await fs.mkdir(screenshotsDir, { recursive: true });
    }
    this.folders.set(session.sessionId, {
      dir,
      historyPath: path.join(dir, "history.jsonl"),
      screenshotsDir,
    });
  }

  async recordEntry(sessionId: string, entry: HistoryEntry): Promise<void> {
    const folder = this.folders.get(sessionId);
    if (!folder) {
      return;
    }
    await fs.appendFile(folder.historyPath, `${JSON.stringify(entry)}\n`, "utf-8");
  }

  async recordScreenshot(sessionId: string, label: string, image: Buffer): Promise<void> {
    const folder = this.folders.get(sessionId);
    if (!folder || !this.saveScreenshots) {
      return;
    }
    await fs.writeFile(path.join(folder.screenshotsDir, `${safeSegment(label)}.png`), image);
  }

  async recordSessionEnd(report: SessionReport): Promise<void> {
    const folder = this.folders.get(report.sessionId);
    if (!folder) {
      return;
    }
    const { history, ...summary } = report;
    const payload = JSON.stringify({ ...summary, entries: history.length }, null, 2);
    await fs.writeFile(path.join(folder.dir, "report.json"), payload, "utf-8");
    this.folders.delete(report.sessionId);
  }

  sessionDir(sessionId: string): string | undefined {
    return this.folders.get(sessionId)?.dir;
  }
}

function safeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "") || "unnamed";
}
