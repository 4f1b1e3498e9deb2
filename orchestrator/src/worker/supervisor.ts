import { randomUUID } from "crypto";
import { OrchestratorConfig } from "../config/defaults";
import { ConfigValidationError, SutBusyError, UnknownSutError, errorMessage } from "../errors";
import { LogBuffer, Logger, createLogger } from "../logging";
import { AgentClient, AgentPort } from "../rpc/agentClient";
import { VisionClient, createVisionClient } from "../rpc/visionClient";
import { Clock, systemClock } from "../runtime/clock";
import { ScreenshotCache } from "../runtime/screenshotCache";
import { InMemoryTraceSink, TraceSink } from "../runtime/traces";
import { GameConfig } from "../types/game";
import { SessionReport, SessionStatus, SutInfo, SutStatus } from "../types/session";
import { SutWorker } from "./sutWorker";

export interface SupervisorOptions {
  config: OrchestratorConfig;
  clock?: Clock;
  vision?: VisionClient;
  trace?: TraceSink;
  agentFactory?: (sut: SutInfo) => AgentPort;
  /** Mirror SUT log lines to the console. */
  console?: boolean;
}

export interface AssignOptions {
  runNumber?: number;
  pathOverride?: string;
}

export interface SessionHandle {
  sessionId: string;
  sutId: string;
  /** Settles with the report; never rejects. */
  done: Promise<SessionReport>;
}

export interface SutSummary extends SutInfo {
  status: SutStatus;
}

type StatusListener = (status: SessionStatus) => void;

interface SutSlot {
  info: SutInfo;
  status: SutStatus;
  agent: AgentPort;
  worker: SutWorker;
  logs: LogBuffer;
  logger: Logger;
  sessionStartedAt?: string;
  lastReport?: SessionReport;
}

/**
 * Registry of SUTs and their workers. Status changes happen synchronously, so
 * the Idle to Running check in `assign` cannot interleave with another call.
 */
export class Supervisor {
  private slots = new Map<string, SutSlot>();
  private listeners = new Set<StatusListener>();
  private config: OrchestratorConfig;
  private clock: Clock;
  private vision: VisionClient;
  private trace: TraceSink;
  private cache = new ScreenshotCache();
  private agentFactory: (sut: SutInfo) => AgentPort;
  private console: boolean;

  constructor(options: SupervisorOptions) {
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.vision = options.vision ?? createVisionClient(options.config.vision);
    this.trace = options.trace ?? new InMemoryTraceSink();
    this.agentFactory = options.agentFactory ?? ((sut) => new AgentClient(sut, options.config.agent));
    this.console = options.console ?? true;
  }

  register(sut: SutInfo): SutSummary {
    if (this.slots.has(sut.id)) {
      throw new ConfigValidationError("sut", [{ path: "id", message: `SUT ${sut.id} is already registered` }]);
    }
    const logs = new LogBuffer();
    const logger = createLogger(`sut:${sut.name}`, {
      level: this.config.logLevel,
      buffer: logs,
      console: this.console,
    });
    const agent = this.agentFactory(sut);
    const slot: SutSlot = {
      info: { ...sut },
      status: "Idle",
      agent,
      logs,
      logger,
      worker: new SutWorker({
        sut,
        agent,
        vision: this.vision,
        cache: this.cache,
        clock: this.clock,
        trace: this.trace,
        logger,
        runtime: this.config.runtime,
        onDisconnected: () => this.setStatus(slot, "Disconnected"),
      }),
    };
    this.slots.set(sut.id, slot);
    logger.info(`registered ${sut.host}:${sut.port}`);
    this.emit(slot);
    return { ...slot.info, status: slot.status };
  }

  remove(sutId: string): void {
    const slot = this.slot(sutId);
    if (slot.status === "Running" || slot.worker.busy) {
      throw new SutBusyError(sutId, "is running a session and cannot be removed");
    }
    this.slots.delete(sutId);
    slot.logger.info("removed");
  }

  assign(sutId: string, game: GameConfig, options: AssignOptions = {}): SessionHandle {
    const slot = this.slot(sutId);
    if (slot.status === "Running") {
      throw new SutBusyError(sutId);
    }
    if (slot.status !== "Idle") {
      throw new SutBusyError(sutId, `is ${slot.status}`);
    }
    slot.status = "Running";
    slot.sessionStartedAt = new Date().toISOString();
    const sessionId = randomUUID();

    const done = slot.worker
      .run({ game, sessionId, runNumber: options.runNumber, pathOverride: options.pathOverride })
      .then(
        (report) => {
          slot.lastReport = report;
          if (slot.status === "Running") {
            this.setStatus(slot, "Idle");
          } else {
            this.emit(slot);
          }
          return report;
        },
        (error: unknown) => {
          slot.logger.error(`worker crashed: ${errorMessage(error)}`);
          const now = new Date().toISOString();
          const report: SessionReport = {
            sessionId,
            sutId,
            game: game.metadata.name,
            engine: game.flow.kind,
            runNumber: options.runNumber ?? 1,
            result: "Failed",
            reason: `worker error: ${errorMessage(error)}`,
            startedAt: slot.sessionStartedAt ?? now,
            endedAt: now,
            finalPointer: slot.worker.session?.pointer ?? "",
            retries: slot.worker.session?.retryCount ?? 0,
            history: slot.worker.session?.history ?? [],
          };
          slot.lastReport = report;
          this.setStatus(slot, "Error");
          return report;
        },
      );

    this.emit(slot);
    return { sessionId, sutId, done };
  }

  stop(sutId: string): boolean {
    return this.slot(sutId).worker.stop("stopped");
  }

  status(sutId: string): SessionStatus {
    const slot = this.slot(sutId);
    const session = slot.status === "Running" ? slot.worker.session : undefined;
    return {
      sutId,
      status: slot.status,
      sessionId: session?.id,
      game: session?.game,
      pointer: session?.pointer,
      startedAt: session ? slot.sessionStartedAt : undefined,
      lastReport: slot.lastReport,
    };
  }

  list(): SutSummary[] {
    return [...this.slots.values()].map((slot) => ({ ...slot.info, status: slot.status }));
  }

  has(sutId: string): boolean {
    return this.slots.has(sutId);
  }

  info(sutId: string): SutInfo {
    return { ...this.slot(sutId).info };
  }

  logs(sutId: string): LogBuffer {
    return this.slot(sutId).logs;
  }

  logger(sutId: string): Logger {
    return this.slot(sutId).logger;
  }

  /** Health-checks a Disconnected or Error SUT and returns it to Idle when it answers. */
  async reconnect(sutId: string): Promise<SutStatus> {
    const slot = this.slot(sutId);
    if (slot.status === "Running" || slot.worker.busy) {
      throw new SutBusyError(sutId);
    }
    try {
      const healthy = await slot.agent.healthCheck();
      if (healthy) {
        this.setStatus(slot, "Idle");
        slot.logger.info("reconnected");
      } else {
        slot.logger.warn("agent answered but reports unhealthy");
      }
    } catch (error) {
      slot.logger.warn(`reconnect failed: ${errorMessage(error)}`);
      this.setStatus(slot, "Disconnected");
    }
    return slot.status;
  }

  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private slot(sutId: string): SutSlot {
    const slot = this.slots.get(sutId);
    if (!slot) {
      throw new UnknownSutError(sutId);
    }
    return slot;
  }

  private setStatus(slot: SutSlot, status: SutStatus): void {
    if (slot.status !== status) {
      slot.logger.debug(`status ${slot.status} -> ${status}`);
    }
    slot.status = status;
    this.emit(slot);
  }

  private emit(slot: SutSlot): void {
    if (!this.slots.has(slot.info.id)) {
      return;
    }
    const status = this.status(slot.info.id);
    for (const listener of this.listeners) {
      listener(status);
    }
  }
}
