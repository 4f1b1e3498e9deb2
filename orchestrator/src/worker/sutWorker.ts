import { randomUUID } from "crypto";
import { RuntimeConfig } from "../config/defaults";
import { SutBusyError, errorMessage } from "../errors";
import { Logger } from "../logging";
import { AgentPort } from "../rpc/agentClient";
import { VisionClient } from "../rpc/visionClient";
import { Clock } from "../runtime/clock";
import { DecisionEngine } from "../runtime/decisionEngine";
import {
  AutomationEngine,
  AutomationSession,
  EngineContext,
  EngineOutcome,
  abortReason,
  record,
} from "../runtime/engine";
import { ScreenshotCache } from "../runtime/screenshotCache";
import { StepEngine } from "../runtime/stepEngine";
import { TraceSink } from "../runtime/traces";
import { EngineKind, GameConfig } from "../types/game";
import { SessionReport, SutInfo } from "../types/session";
import { HealthMonitor } from "./healthMonitor";

export interface SutWorkerDeps {
  sut: SutInfo;
  agent: AgentPort;
  vision: VisionClient;
  cache: ScreenshotCache;
  clock: Clock;
  trace: TraceSink;
  logger: Logger;
  runtime: RuntimeConfig;
  /** Called when the health monitor gives up on the agent. */
  onDisconnected?: (reason: string) => void;
}

export interface SessionRequest {
  game: GameConfig;
  sessionId?: string;
  runNumber?: number;
  /** Replaces `metadata.path` for this run only. */
  pathOverride?: string;
}

export function createEngine(kind: EngineKind): AutomationEngine {
  return kind === "steps" ? new StepEngine() : new DecisionEngine();
}

/** Runs one session at a time against a single SUT. */
export class SutWorker {
  private deps: SutWorkerDeps;
  private controller?: AbortController;
  private launching = false;
  private current?: AutomationSession;

  constructor(deps: SutWorkerDeps) {
    this.deps = deps;
  }

  get session(): AutomationSession | undefined {
    return this.current;
  }

  get busy(): boolean {
    return this.controller !== undefined;
  }

  async run(request: SessionRequest): Promise<SessionReport> {
    if (this.controller) {
      throw new SutBusyError(this.deps.sut.id);
    }
    const controller = new AbortController();
    this.controller = controller;

    const { clock, logger, trace, sut } = this.deps;
    const game = request.game;
    const runNumber = request.runNumber ?? 1;
    const session = new AutomationSession(
      request.sessionId ?? randomUUID(),
      sut.id,
      game.metadata.name,
      clock.now(),
    );
    this.current = session;
    const startedAt = new Date().toISOString();

    try {
      await trace.recordSessionStart({
        sessionId: session.id,
        sutName: sut.name,
        game: game.metadata.name,
        runNumber,
        startedAt,
      });
      logger.info(`session ${session.id} started: ${game.metadata.name} run ${runNumber} (${game.flow.kind})`);

      const outcome = this.finalize(await this.execute(session, request, controller.signal), controller.signal);
      session.result = outcome.result;

      if (outcome.result !== "Success" && this.deps.runtime.killOnFailure) {
        await this.killGame(game);
      }

      const report: SessionReport = {
        sessionId: session.id,
        sutId: sut.id,
        game: game.metadata.name,
        engine: game.flow.kind,
        runNumber,
        result: outcome.result,
        reason: outcome.reason,
        startedAt,
        endedAt: new Date().toISOString(),
        finalPointer: session.pointer,
        retries: session.retryCount,
        history: session.history,
      };
      await trace.recordSessionEnd(report);
      const suffix = outcome.reason ? `: ${outcome.reason}` : "";
      logger.info(`session ${session.id} finished ${outcome.result}${suffix}`);
      return report;
    } finally {
      this.deps.cache.release(session.id);
      this.controller = undefined;
      this.launching = false;
    }
  }

  /** Cooperative cancellation; returns false when nothing is running. */
  stop(reason = "stopped"): boolean {
    const controller = this.controller;
    if (!controller) {
      return false;
    }
    if (!controller.signal.aborted) {
      this.deps.logger.info(`stop requested (${reason})`);
      controller.abort(reason);
    }
    if (this.launching) {
      void this.deps.agent.cancelLaunch().catch((error: unknown) => {
        this.deps.logger.warn(`cancel launch failed: ${errorMessage(error)}`);
      });
    }
    return true;
  }

  private async execute(session: AutomationSession, request: SessionRequest, signal: AbortSignal): Promise<EngineOutcome> {
    const { agent, clock, logger, runtime } = this.deps;
    const game = request.game;

    const monitor = new HealthMonitor(
      agent,
      clock,
      { intervalMs: runtime.healthCheckIntervalMs, maxFailures: runtime.maxHealthFailures },
      (error) => {
        logger.error(`agent unreachable after ${runtime.maxHealthFailures} health checks: ${error.message}`);
        this.deps.onDisconnected?.(error.message);
        this.stop("disconnected");
      },
      logger,
    );

    const ctx: EngineContext = {
      session,
      game,
      agent,
      vision: this.deps.vision,
      cache: this.deps.cache,
      clock,
      trace: this.deps.trace,
      signal,
      logger,
      options: {
        pollIntervalMs: runtime.pollIntervalMs,
        maxSessionMs: runtime.maxSessionMs,
        actionSettleMs: runtime.defaultExpectedDelayMs,
      },
      heartbeat: () => monitor.tick(),
    };

    const launchPath = request.pathOverride ?? game.metadata.path;
    if (launchPath) {
      session.pointer = "launch";
      this.launching = true;
      try {
        const launched = await agent.launchProcess(game.metadata, request.pathOverride);
        await record(ctx, { kind: "launch", ok: true, at: clock.now(), pid: launched.pid });
        logger.info(`launched ${launched.processName ?? launchPath}${launched.pid ? ` (pid ${launched.pid})` : ""}`);
        if (launched.warning) {
          logger.warn(launched.warning);
        }
      } catch (error) {
        await record(ctx, { kind: "launch", ok: false, at: clock.now(), error: errorMessage(error) });
        if (signal.aborted) {
          return { result: "Aborted", reason: abortReason(signal) };
        }
        return { result: "Failed", reason: `launch failed: ${errorMessage(error)}` };
      } finally {
        this.launching = false;
      }

      if (game.metadata.startupWaitMs > 0) {
        logger.info(`waiting ${game.metadata.startupWaitMs}ms for startup`);
        await clock.sleep(game.metadata.startupWaitMs, signal);
      }
      if (signal.aborted) {
        return { result: "Aborted", reason: abortReason(signal) };
      }
    }

    return createEngine(game.flow.kind).run(ctx);
  }

  /** A disconnect cancels the engine, but the run counts as a failure. */
  private finalize(outcome: EngineOutcome, signal: AbortSignal): EngineOutcome {
    if (outcome.result === "Aborted" && signal.aborted && abortReason(signal) === "disconnected") {
      return { result: "Failed", reason: "SUT disconnected" };
    }
    return outcome;
  }

  private async killGame(game: GameConfig): Promise<void> {
    const marker = game.metadata.processMarker;
    if (!marker) {
      return;
    }
    try {
      const killed = await this.deps.agent.killProcess(marker);
      this.deps.logger.info(killed ? `killed ${marker}` : `${marker} was not running`);
    } catch (error) {
      this.deps.logger.warn(`kill ${marker} failed: ${errorMessage(error)}`);
    }
  }
}
