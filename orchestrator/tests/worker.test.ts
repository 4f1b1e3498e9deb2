import { describe, expect, it } from "vitest";
import { ActionExecutionError, ProcessLaunchError, SutBusyError } from "../src/errors";
import { silentLogger } from "../src/logging";
import { ManualClock } from "../src/runtime/clock";
import { ScreenshotCache } from "../src/runtime/screenshotCache";
import { InMemoryTraceSink } from "../src/runtime/traces";
import { FindSpec } from "../src/types/game";
import { HealthMonitor } from "../src/worker/healthMonitor";
import { SutWorker, SutWorkerDeps } from "../src/worker/sutWorker";
import { FakeAgent, ScriptedVision, element, runtimeConfig, step, stepGame, unreachable } from "./fakes";

const find = (text: string): FindSpec => ({ type: "any", text, match: "contains" });

function createWorker(overrides: Partial<SutWorkerDeps> = {}) {
  const agent = new FakeAgent();
  const clock = new ManualClock();
  const trace = new InMemoryTraceSink();
  const cache = new ScreenshotCache();
  const deps: SutWorkerDeps = {
    sut: { id: "sut-1", name: "Bench 1", host: "10.0.0.9", port: 8080 },
    agent,
    vision: new ScriptedVision([[element("Play")]]),
    cache,
    clock,
    trace,
    logger: silentLogger,
    runtime: runtimeConfig(),
    ...overrides,
  };
  return { worker: new SutWorker(deps), agent, clock, trace, cache };
}

describe("SutWorker", () => {
  it("runs a session and hands the report to the trace sink", async () => {
    const { worker, trace, cache } = createWorker();
    const game = stepGame([step(1, { find: find("Play") })]);

    const report = await worker.run({ game, sessionId: "session-7", runNumber: 2 });

    expect(report).toMatchObject({
      sessionId: "session-7",
      sutId: "sut-1",
      game: "Test Game",
      engine: "steps",
      runNumber: 2,
      result: "Success",
      finalPointer: "1",
      retries: 0,
    });
    expect(trace.sessions.get("session-7")).toMatchObject({ sutName: "Bench 1", runNumber: 2 });
    expect(trace.reports).toEqual([report]);
    expect(cache.captureCount("session-7")).toBe(0);
    expect(worker.busy).toBe(false);
  });

  it("fails the session when the agent stops answering health checks", async () => {
    const agent = new FakeAgent();
    agent.health = unreachable;
    const reasons: string[] = [];
    const { worker, clock } = createWorker({ agent, onDisconnected: (reason) => reasons.push(reason) });
    const game = stepGame([step(1, { find: find("Never shown"), timeoutMs: 60_000 })]);

    const report = await worker.run({ game });

    expect(report.result).toBe("Failed");
    expect(report.reason).toBe("SUT disconnected");
    expect(agent.healthChecks).toBe(3);
    expect(clock.now()).toBe(10_000);
    expect(reasons).toEqual(["/health unreachable at http://10.0.0.9:8080: connect ECONNREFUSED"]);
  });

  it("launches the game and waits for startup before the first step", async () => {
    const { worker, agent, clock } = createWorker();
    const game = stepGame([step(1, { action: { type: "key", key: "enter" } })], {
      path: "C:\\Games\\Test\\test.exe",
      startupWaitMs: 30_000,
    });

    const report = await worker.run({ game });

    expect(report.result).toBe("Success");
    expect(agent.launches).toEqual(["C:\\Games\\Test\\test.exe"]);
    expect(report.history[0]).toMatchObject({ kind: "launch", ok: true, pid: 4242 });
    expect(clock.now()).toBe(30_000);
  });

  it("uses the path override for a single run", async () => {
    const { worker, agent } = createWorker();
    const game = stepGame([step(1, { action: { type: "key", key: "enter" } })], { path: "C:\\Games\\a.exe" });

    await worker.run({ game, pathOverride: "D:\\Other\\b.exe" });

    expect(agent.launches).toEqual(["D:\\Other\\b.exe"]);
  });

  it("fails the session when the launch fails and kills leftovers", async () => {
    const agent = new FakeAgent();
    agent.launch = async () => {
      throw new ProcessLaunchError("Launch of Test Game failed: file not found");
    };
    const { worker } = createWorker({ agent });
    const game = stepGame([step(1)], { path: "C:\\Games\\missing.exe", processMarker: "missing" });

    const report = await worker.run({ game });

    expect(report.result).toBe("Failed");
    expect(report.reason).toBe("launch failed: Launch of Test Game failed: file not found");
    expect(report.history).toMatchObject([{ kind: "launch", ok: false }]);
    expect(agent.killed).toEqual(["missing"]);
  });

  it("kills the game after a step timeout", async () => {
    const { worker, agent } = createWorker();
    const game = stepGame([step(1, { find: find("Never shown"), timeoutMs: 3_000 })], {
      path: "C:\\Games\\Racer\\racer.exe",
      processMarker: "racer",
    });

    const report = await worker.run({ game });

    expect(report.result).toBe("Timeout");
    expect(agent.killed).toEqual(["racer"]);
  });

  it("leaves the game running on failure when kill is disabled", async () => {
    const agent = new FakeAgent();
    agent.failAction = () => new ActionExecutionError("Agent failed click: no window");
    const { worker } = createWorker({ agent, runtime: runtimeConfig({ killOnFailure: false }) });
    const game = stepGame([step(1)], { processMarker: "racer" });

    const report = await worker.run({ game });

    expect(report.result).toBe("Failed");
    expect(report.reason).toBe("step 1: Agent failed click: no window");
    expect(agent.killed).toEqual([]);
  });

  it("rejects a second session while one is running", async () => {
    const { worker } = createWorker();
    const game = stepGame([step(1, { find: find("Play") })]);

    const first = worker.run({ game });
    await expect(worker.run({ game })).rejects.toBeInstanceOf(SutBusyError);
    await first;
  });

  it("stops a running session and cancels a pending launch", async () => {
    const agent = new FakeAgent();
    let release: () => void = () => undefined;
    agent.launch = () =>
      new Promise((_resolve, reject) => {
        release = () => reject(new ProcessLaunchError("Launch of Test Game failed: cancelled"));
      });
    const { worker } = createWorker({ agent });
    const game = stepGame([step(1)], { path: "C:\\Games\\slow.exe", processMarker: "slow" });

    const running = worker.run({ game });
    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(worker.stop()).toBe(true);
    release();
    const report = await running;

    expect(report.result).toBe("Aborted");
    expect(report.reason).toBe("stopped");
    expect(agent.cancels).toBe(1);
    expect(agent.killed).toEqual(["slow"]);
    expect(worker.stop()).toBe(false);
  });
});

describe("HealthMonitor", () => {
  it("only checks once per interval and resets after a healthy answer", async () => {
    const agent = new FakeAgent();
    const clock = new ManualClock();
    const tripped: string[] = [];
    const monitor = new HealthMonitor(
      agent,
      clock,
      { intervalMs: 5_000, maxFailures: 2 },
      (error) => tripped.push(error.message),
      silentLogger,
    );

    agent.health = unreachable;
    await monitor.tick();
    clock.advance(1_000);
    await monitor.tick();
    expect(agent.healthChecks).toBe(1);
    expect(monitor.consecutiveFailures).toBe(1);

    agent.health = async () => true;
    clock.advance(4_000);
    await monitor.tick();
    expect(monitor.consecutiveFailures).toBe(0);

    agent.health = unreachable;
    clock.advance(5_000);
    await monitor.tick();
    clock.advance(5_000);
    await monitor.tick();
    clock.advance(5_000);
    await monitor.tick();

    expect(tripped).toHaveLength(1);
    expect(agent.healthChecks).toBe(4);
  });
});
