import { defaultConfig, OrchestratorConfig, RuntimeConfig } from "../src/config/defaults";
import { ConnectionError } from "../src/errors";
import { silentLogger } from "../src/logging";
import { AgentPort, LaunchResult, Point, ProcessStatus } from "../src/rpc/agentClient";
import { ActionResponse, AgentStatusResponse } from "../src/rpc/contracts";
import { VisionClient } from "../src/rpc/visionClient";
import { ManualClock } from "../src/runtime/clock";
import { AutomationSession, EngineContext, EngineOptions } from "../src/runtime/engine";
import { ScreenshotCache } from "../src/runtime/screenshotCache";
import { InMemoryTraceSink } from "../src/runtime/traces";
import { Action, GameConfig, GameMetadata, StateDefinition, Step } from "../src/types/game";
import { DetectedElement } from "../src/types/session";

export class FakeAgent implements AgentPort {
  actions: Array<{ action: Action; target?: Point }> = [];
  launches: string[] = [];
  killed: string[] = [];
  cancels = 0;
  screenshots = 0;
  healthChecks = 0;
  health: () => Promise<boolean> = async () => true;
  launch: (game: GameMetadata) => Promise<LaunchResult> = async () => ({ pid: 4242, foreground: true });
  failAction?: (action: Action) => Error | undefined;

  async captureScreenshot(): Promise<Buffer> {
    this.screenshots += 1;
    return Buffer.from(`frame-${this.screenshots}`);
  }

  async sendAction(action: Action, target?: Point): Promise<ActionResponse> {
    const failure = this.failAction?.(action);
    if (failure) {
      throw failure;
    }
    this.actions.push({ action, target });
    return { status: "success" };
  }

  async launchProcess(game: GameMetadata, pathOverride?: string): Promise<LaunchResult> {
    this.launches.push(pathOverride ?? game.path ?? "");
    return this.launch(game);
  }

  async queryProcessStatus(): Promise<ProcessStatus> {
    return { running: true, foregrounded: true };
  }

  async healthCheck(): Promise<boolean> {
    this.healthChecks += 1;
    return this.health();
  }

  async killProcess(marker: string): Promise<boolean> {
    this.killed.push(marker);
    return true;
  }

  async cancelLaunch(): Promise<void> {
    this.cancels += 1;
  }

  async getStatus(): Promise<AgentStatusResponse> {
    return { version: "test" };
  }
}

export const unreachable = async (): Promise<boolean> => {
  throw new ConnectionError("/health unreachable at http://10.0.0.9:8080: connect ECONNREFUSED");
};

/** Returns `frames` in order, one per detect call, then repeats the last. */
export class ScriptedVision implements VisionClient {
  calls = 0;

  constructor(private readonly frames: DetectedElement[][]) {}

  async detect(): Promise<DetectedElement[]> {
    const frame = this.frames[Math.min(this.calls, this.frames.length - 1)] ?? [];
    this.calls += 1;
    return frame;
  }
}

export function element(text: string, type = "button", x = 100, y = 200): DetectedElement {
  return { bbox: { x, y, width: 40, height: 20 }, text, confidence: 0.9, type };
}

export function metadata(overrides: Partial<GameMetadata> = {}): GameMetadata {
  return { name: "Test Game", startupWaitMs: 0, extra: {}, ...overrides };
}

export function step(id: number, overrides: Partial<Step> = {}): Step {
  return {
    id,
    description: `step ${id}`,
    action: { type: "click", button: "left" },
    timeoutMs: 20_000,
    expectedDelayMs: 0,
    optional: false,
    retry: { retries: 0, delayMs: 2_000, backoff: "fixed", maxDelayMs: 60_000 },
    ...overrides,
  };
}

export function stepGame(steps: Step[], meta: Partial<GameMetadata> = {}): GameConfig {
  return { source: "<test>", metadata: metadata(meta), flow: { kind: "steps", steps } };
}

export function state(id: string, overrides: Partial<StateDefinition> = {}): StateDefinition {
  return {
    id,
    rules: [],
    timeoutMs: 20_000,
    retry: { retries: 0, delayMs: 2_000, backoff: "fixed", maxDelayMs: 60_000 },
    result: "success",
    ...overrides,
  };
}

export function stateGame(initialState: string, states: StateDefinition[], targetState?: string): GameConfig {
  const byId: Record<string, StateDefinition> = {};
  for (const definition of states) {
    byId[definition.id] = definition;
  }
  return {
    source: "<test>",
    metadata: metadata(),
    flow: { kind: "state_machine", initialState, targetState, states: byId },
  };
}

export const engineOptions: EngineOptions = {
  pollIntervalMs: 1_000,
  maxSessionMs: 30 * 60_000,
  actionSettleMs: 0,
};

export interface ContextParts {
  game: GameConfig;
  agent?: FakeAgent;
  vision?: VisionClient;
  clock?: ManualClock;
  options?: Partial<EngineOptions>;
  controller?: AbortController;
  heartbeat?: () => Promise<void>;
}

export function engineContext(parts: ContextParts): EngineContext & {
  agent: FakeAgent;
  clock: ManualClock;
  cache: ScreenshotCache;
  trace: InMemoryTraceSink;
} {
  const clock = parts.clock ?? new ManualClock();
  return {
    session: new AutomationSession("session-1", "sut-1", parts.game.metadata.name, clock.now()),
    game: parts.game,
    agent: parts.agent ?? new FakeAgent(),
    vision: parts.vision ?? new ScriptedVision([[]]),
    cache: new ScreenshotCache(),
    clock,
    trace: new InMemoryTraceSink(),
    signal: (parts.controller ?? new AbortController()).signal,
    logger: silentLogger,
    options: { ...engineOptions, ...parts.options },
    heartbeat: parts.heartbeat ?? (async () => undefined),
  };
}

export function runtimeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    ...defaultConfig.runtime,
    pollIntervalMs: 1_000,
    defaultExpectedDelayMs: 0,
    healthCheckIntervalMs: 5_000,
    maxHealthFailures: 3,
    ...overrides,
  };
}

export function testConfig(runtime: Partial<RuntimeConfig> = {}): OrchestratorConfig {
  return {
    ...defaultConfig,
    vision: { kind: "static", elements: [] },
    runtime: runtimeConfig(runtime),
    scheduler: { ...defaultConfig.scheduler, delayBetweenGamesMs: 0 },
  };
}
