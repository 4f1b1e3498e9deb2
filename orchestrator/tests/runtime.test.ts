import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { createLogger, LogBuffer, LogLine } from "../src/logging";
import { ManualClock } from "../src/runtime/clock";
import { centerOf, findMatch, matchesFind } from "../src/runtime/matching";
import { PreviewEvent, PreviewPoller } from "../src/runtime/previewPoller";
import { defaultRetryPolicy, retryDelayMs } from "../src/runtime/retry";
import { ScreenshotCache } from "../src/runtime/screenshotCache";
import { FileTraceSink } from "../src/runtime/traces";
import { ConnectionError } from "../src/errors";
import { SessionReport } from "../src/types/session";
import { FakeAgent, element } from "./fakes";

describe("element matching", () => {
  it("matches text case-insensitively, exact or contained", () => {
    const play = element("  Play Now ");

    expect(matchesFind(play, { type: "any", text: "play", match: "contains" })).toBe(true);
    expect(matchesFind(play, { type: "any", text: "play", match: "exact" })).toBe(false);
    expect(matchesFind(play, { type: "any", text: "PLAY NOW", match: "exact" })).toBe(true);
  });

  it("filters by element type and region", () => {
    const label = element("Options", "text", 500, 500);

    expect(matchesFind(label, { type: "button", text: "options", match: "contains" })).toBe(false);
    expect(
      matchesFind(label, {
        type: "TEXT",
        text: "options",
        match: "contains",
        region: { x: 0, y: 0, width: 400, height: 400 },
      }),
    ).toBe(false);
    expect(
      matchesFind(label, {
        type: "text",
        text: "options",
        match: "contains",
        region: { x: 400, y: 400, width: 200, height: 200 },
      }),
    ).toBe(true);
  });

  it("returns the first match in detection order", () => {
    const elements = [element("Play", "text"), element("Play", "button", 10, 10)];

    expect(findMatch(elements, { type: "button", text: "play", match: "exact" })).toBe(elements[1]);
    expect(centerOf({ x: 10, y: 10, width: 5, height: 5 })).toEqual({ x: 13, y: 13 });
  });
});

describe("retry delays", () => {
  it("uses a fixed interval by default", () => {
    expect(retryDelayMs(defaultRetryPolicy, 1)).toBe(2_000);
    expect(retryDelayMs(defaultRetryPolicy, 4)).toBe(2_000);
  });

  it("doubles exponential delays up to the cap", () => {
    const policy = { retries: 5, delayMs: 1_000, backoff: "exponential" as const, maxDelayMs: 5_000 };

    expect([1, 2, 3, 4].map((retry) => retryDelayMs(policy, retry))).toEqual([1_000, 2_000, 4_000, 5_000]);
  });
});

describe("ScreenshotCache", () => {
  const observation = { image: Buffer.from("a"), elements: [], capturedAt: 0 };

  it("serves an observation only for the attempt that took it", async () => {
    const cache = new ScreenshotCache();
    let captures = 0;
    const capture = async () => {
      captures += 1;
      return observation;
    };

    await cache.getOrCapture("s1", 1, capture);
    await cache.getOrCapture("s1", 1, capture);
    await cache.getOrCapture("s1", 2, capture);

    expect(captures).toBe(2);
    expect(cache.captureCount("s1")).toBe(2);
    expect(cache.lookup("s1", 1)).toBeUndefined();
    expect(cache.lookup("s1", 2)).toBe(observation);
  });

  it("counts invalidations per reason and keeps sessions apart", () => {
    const cache = new ScreenshotCache();
    cache.store("s1", 1, observation);
    cache.store("s2", 1, observation);

    cache.invalidate("s1", "action");
    cache.invalidate("s1", "action");
    cache.invalidate("s1", "advance");

    expect(cache.lookup("s1", 1)).toBeUndefined();
    expect(cache.lookup("s2", 1)).toBe(observation);
    expect(cache.invalidationCounts("s1")).toEqual({ action: 2, advance: 1, refresh: 0 });

    cache.release("s1");
    expect(cache.invalidationCounts("s1")).toEqual({ action: 0, advance: 0, refresh: 0 });
  });
});

describe("FileTraceSink", () => {
  it("writes history lines and a report per session", async () => {
    const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "bench-traces-"));
    const sink = new FileTraceSink(baseDir, { saveScreenshots: true });

    await sink.recordSessionStart({
      sessionId: "s1",
      sutName: "Bench A",
      game: "Sample Racer",
      runNumber: 2,
      startedAt: "2024-05-01T10:00:00.000Z",
    });
    const dir = sink.sessionDir("s1") ?? "";
    await sink.recordEntry("s1", { kind: "launch", ok: true, at: 0, pid: 12 });
    await sink.recordScreenshot("s1", "1_1", Buffer.from("png"));
    const report: SessionReport = {
      sessionId: "s1",
      sutId: "a",
      game: "Sample Racer",
      engine: "steps",
      runNumber: 2,
      result: "Success",
      startedAt: "2024-05-01T10:00:00.000Z",
      endedAt: "2024-05-01T10:05:00.000Z",
      finalPointer: "6",
      retries: 0,
      history: [{ kind: "launch", ok: true, at: 0, pid: 12 }],
    };
    await sink.recordSessionEnd(report);

    expect(path.basename(dir)).toBe("2024-05-01T10-00-00-000Z_Bench-A_Sample-Racer_run2");
    expect(fs.readFileSync(path.join(dir, "history.jsonl"), "utf-8")).toBe(
      '{"kind":"launch","ok":true,"at":0,"pid":12}\n',
    );
    expect(fs.readFileSync(path.join(dir, "screenshots", "1_1.png"), "utf-8")).toBe("png");
    expect(JSON.parse(fs.readFileSync(path.join(dir, "report.json"), "utf-8"))).toMatchObject({
      result: "Success",
      finalPointer: "6",
      entries: 1,
    });
    expect(sink.sessionDir("s1")).toBeUndefined();
  });
});

describe("PreviewPoller", () => {
  it("emits frames and a disconnected event when capture fails", async () => {
    class FlakyAgent extends FakeAgent {
      async captureScreenshot(): Promise<Buffer> {
        if (this.screenshots === 1) {
          this.screenshots += 1;
          throw new ConnectionError("/screenshot timed out after 2000ms (http://10.0.0.9:8080)");
        }
        return super.captureScreenshot();
      }
    }
    const events: PreviewEvent[] = [];
    const poller = new PreviewPoller({
      sutId: "a",
      agent: new FlakyAgent(),
      intervalMs: 4_000,
      clock: new ManualClock(),
      logger: createLogger("preview:a", { console: false }),
    });
    const unsubscribe = poller.subscribe((event) => {
      events.push(event);
      if (events.length === 3) {
        void poller.stop();
      }
    });

    poller.start();
    expect(poller.running).toBe(true);
    await new Promise<void>((resolve) => setTimeout(resolve, 20));
    unsubscribe();

    expect(events.slice(0, 3).map((event) => `${event.type}@${event.at}`)).toEqual([
      "frame@0",
      "disconnected@4000",
      "frame@8000",
    ]);
    expect(poller.running).toBe(false);
    expect(poller.latest?.image.toString()).toBe("frame-3");
  });
});

describe("LogBuffer", () => {
  it("keeps the newest lines and notifies subscribers", () => {
    const buffer = new LogBuffer(2);
    const seen: LogLine[] = [];
    buffer.subscribe((line) => seen.push(line));
    const logger = createLogger("sut:a", { buffer, console: false, level: "info" });

    logger.debug("hidden");
    logger.info("one");
    logger.warn("two");
    logger.error("three");

    expect(buffer.snapshot().map((line) => `${line.level}:${line.message}`)).toEqual(["warn:two", "error:three"]);
    expect(seen).toHaveLength(3);
  });
});
