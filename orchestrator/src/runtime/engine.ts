import { Logger } from "../logging";
import { AgentPort, Point } from "../rpc/agentClient";
import { VisionClient } from "../rpc/visionClient";
import { Action, EngineKind, GameConfig } from "../types/game";
import { HistoryEntry, Observation, SessionResult } from "../types/session";
import { Clock } from "./clock";
import { ScreenshotCache } from "./screenshotCache";
import { TraceSink } from "./traces";

export interface EngineOptions {
  pollIntervalMs: number;
  maxSessionMs: number;
  /** Pause after a state-machine action before the next observation. */
  actionSettleMs: number;
}

/** Mutable record of one run, shared by the worker and its engine. */
export class AutomationSession {
  readonly id: string;
  readonly sutId: string;
  readonly game: string;
  readonly startedAt: number;
  readonly history: HistoryEntry[] = [];
  pointer = "";
  retryCount = 0;
  result?: SessionResult;
  private cycle = 0;

  constructor(id: string, sutId: string, game: string, startedAt: number) {
    this.id = id;
    this.sutId = sutId;
    this.game = game;
    this.startedAt = startedAt;
  }

  /** Sequence number of the next poll cycle, used as the cache attempt key. */
  nextCycle(): number {
    this.cycle += 1;
    return this.cycle;
  }
}

export interface EngineContext {
  session: AutomationSession;
  game: GameConfig;
  agent: AgentPort;
  vision: VisionClient;
  cache: ScreenshotCache;
  clock: Clock;
  trace: TraceSink;
  signal: AbortSignal;
  logger: Logger;
  options: EngineOptions;
  /** Runs between poll cycles; may abort `signal`. */
  heartbeat(): Promise<void>;
}

export interface EngineOutcome {
  result: SessionResult;
  reason?: string;
}

export interface AutomationEngine {
  readonly kind: EngineKind;
  run(ctx: EngineContext): Promise<EngineOutcome>;
}

export async function record(ctx: EngineContext, entry: HistoryEntry): Promise<void> {
  ctx.session.history.push(entry);
  await ctx.trace.recordEntry(ctx.session.id, entry);
}

export function sessionExpired(ctx: EngineContext): boolean {
  return ctx.clock.now() - ctx.session.startedAt >= ctx.options.maxSessionMs;
}

export function abortedOutcome(ctx: EngineContext): EngineOutcome {
  return { result: "Aborted", reason: abortReason(ctx.signal) };
}

export function abortReason(signal: AbortSignal): string {
  return typeof signal.reason === "string" ? signal.reason : "stopped";
}

/** Screenshot plus detections for `cycle`, taken once and served from the cache after. */
export async function observe(ctx: EngineContext, cycle: number): Promise<Observation> {
  return ctx.cache.getOrCapture(ctx.session.id, cycle, async () => {
    const image = await ctx.agent.captureScreenshot();
    await ctx.trace.recordScreenshot(ctx.session.id, `${ctx.session.pointer}_${cycle}`, image);
    const elements = await ctx.vision.detect(image);
    return { image, elements, capturedAt: ctx.clock.now() };
  });
}

/** `wait` runs locally and stays cancellable; everything else goes to the agent. */
export async function performAction(ctx: EngineContext, action: Action, target?: Point): Promise<void> {
  if (action.type === "wait") {
    await ctx.clock.sleep(action.durationMs, ctx.signal);
    return;
  }
  await ctx.agent.sendAction(action, target);
}
