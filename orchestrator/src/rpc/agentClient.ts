import { fetch as undiciFetch, RequestInit, Response } from "undici";
import { z } from "zod";
import {
  ActionExecutionError,
  AgentError,
  ConnectionError,
  ProcessLaunchError,
  errorMessage,
} from "../errors";
import { Action, GameMetadata } from "../types/game";
import { SutInfo } from "../types/session";
import {
  ActionResponse,
  AgentRoute,
  AgentRoutes,
  AgentStatusResponse,
  LaunchRequest,
  actionResponseSchema,
  agentStatusResponseSchema,
  errorBodySchema,
  healthResponseSchema,
  launchResponseSchema,
  processStatusResponseSchema,
} from "./contracts";

export interface AgentClientConfig {
  requestTimeoutMs: number;
  screenshotTimeoutMs: number;
  launchTimeoutMs: number;
  healthTimeoutMs: number;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface Point {
  x: number;
  y: number;
}

export interface LaunchResult {
  pid?: number;
  processName?: string;
  foreground: boolean;
  warning?: string;
}

export interface ProcessStatus {
  running: boolean;
  foregrounded: boolean;
}

/** What the engines, worker and preview poller need from a SUT agent. */
export interface AgentPort {
  captureScreenshot(): Promise<Buffer>;
  sendAction(action: Action, target?: Point): Promise<ActionResponse>;
  launchProcess(game: GameMetadata, pathOverride?: string): Promise<LaunchResult>;
  queryProcessStatus(marker: string): Promise<ProcessStatus>;
  healthCheck(): Promise<boolean>;
  killProcess(marker: string): Promise<boolean>;
  cancelLaunch(): Promise<void>;
  getStatus(): Promise<AgentStatusResponse>;
}

interface RequestOptions {
  method?: "GET" | "POST";
  body?: unknown;
  query?: Record<string, string>;
  timeoutMs: number;
}

export class AgentClient implements AgentPort {
  private baseUrl: string;
  private config: AgentClientConfig;
  private fetchFn: FetchFn;

  constructor(sut: Pick<SutInfo, "host" | "port">, config: AgentClientConfig, fetchFn: FetchFn = undiciFetch) {
    this.baseUrl = `http://${sut.host}:${sut.port}`;
    this.config = config;
    this.fetchFn = fetchFn;
  }

  async captureScreenshot(): Promise<Buffer> {
    const response = await this.request(AgentRoutes.screenshot, {
      timeoutMs: this.config.screenshotTimeoutMs,
    });
    await this.ensureOk(response);
    const bytes = await this.readBody(AgentRoutes.screenshot, response, () => response.arrayBuffer());
    return Buffer.from(bytes);
  }

  async sendAction(action: Action, target?: Point): Promise<ActionResponse> {
    let response: Response;
    try {
      response = await this.request(AgentRoutes.action, {
        method: "POST",
        body: toWireAction(action, target),
        timeoutMs: this.config.requestTimeoutMs,
      });
      await this.ensureOk(response);
    } catch (error) {
      if (error instanceof AgentError) {
        throw new ActionExecutionError(`Agent rejected ${action.type}: ${error.reason}`, { cause: error });
      }
      throw error;
    }

    const ack = await this.parseJson(AgentRoutes.action, response, actionResponseSchema);
    if (ack.status === "error" || ack.ok === false) {
      throw new ActionExecutionError(`Agent failed ${action.type}: ${ack.error ?? "no reason given"}`);
    }
    return ack;
  }

  async launchProcess(game: GameMetadata, pathOverride?: string): Promise<LaunchResult> {
    const launchPath = pathOverride ?? game.path;
    if (!launchPath) {
      throw new ProcessLaunchError(`Game ${game.name} has no launch path`);
    }
    const payload: LaunchRequest = {
      path: launchPath,
      args: [],
      process_marker: game.processMarker,
      startup_wait: Math.round(game.startupWaitMs / 1000),
    };

    try {
      const response = await this.request(AgentRoutes.processLaunch, {
        method: "POST",
        body: payload,
        timeoutMs: this.config.launchTimeoutMs,
      });
      await this.ensureOk(response);
      const result = await this.parseJson(AgentRoutes.processLaunch, response, launchResponseSchema);
      if (result.status === "error") {
        throw new ProcessLaunchError(`Launch of ${game.name} failed: ${result.error ?? "no reason given"}`);
      }
      return {
        pid: result.game_process_pid ?? result.pid,
        processName: result.game_process_name,
        foreground: result.foreground_confirmed ?? false,
        warning: result.warning,
      };
    } catch (error) {
      if (error instanceof ProcessLaunchError) {
        throw error;
      }
      throw new ProcessLaunchError(`Launch of ${game.name} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async queryProcessStatus(marker: string): Promise<ProcessStatus> {
    const response = await this.request(AgentRoutes.processStatus, {
      query: { marker },
      timeoutMs: this.config.requestTimeoutMs,
    });
    await this.ensureOk(response);
    const status = await this.parseJson(AgentRoutes.processStatus, response, processStatusResponseSchema);
    return { running: status.running, foregrounded: status.foregrounded ?? false };
  }

  /**
   * False when the agent answers but reports itself unhealthy or sends a body
   * that is not JSON. Throws ConnectionError when it cannot be reached at all.
   */
  async healthCheck(): Promise<boolean> {
    const response = await this.request(AgentRoutes.health, {
      timeoutMs: this.config.healthTimeoutMs,
    });
    if (!response.ok) {
      await response.body?.cancel();
      return false;
    }
    let raw: unknown;
    try {
      raw = await this.readBody(AgentRoutes.health, response, () => response.json());
    } catch (error) {
      if (error instanceof AgentError) {
        return false;
      }
      throw error;
    }
    const body = healthResponseSchema.safeParse(raw);
    if (!body.success) {
      return false;
    }
    return body.data.ok === true || body.data.status === "ok" || body.data.status === "running";
  }

  async killProcess(marker: string): Promise<boolean> {
    const response = await this.request(AgentRoutes.processKill, {
      method: "POST",
      body: { marker },
      timeoutMs: this.config.requestTimeoutMs,
    });
    if (response.status === 404) {
      await response.body?.cancel();
      return false;
    }
    await this.ensureOk(response);
    return true;
  }

  async cancelLaunch(): Promise<void> {
    const response = await this.request(AgentRoutes.processCancel, {
      method: "POST",
      body: {},
      timeoutMs: this.config.requestTimeoutMs,
    });
    await this.ensureOk(response);
  }

  async getStatus(): Promise<AgentStatusResponse> {
    const response = await this.request(AgentRoutes.status, {
      timeoutMs: this.config.healthTimeoutMs,
    });
    await this.ensureOk(response);
    return this.parseJson(AgentRoutes.status, response, agentStatusResponseSchema);
  }

  private async request(route: AgentRoute, options: RequestOptions): Promise<Response> {
    const query = options.query ? `?${new URLSearchParams(options.query).toString()}` : "";
    const url = `${this.baseUrl}${route}${query}`;
    const init: RequestInit = {
      method: options.method ?? "GET",
      signal: AbortSignal.timeout(options.timeoutMs),
    };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
      init.headers = { "content-type": "application/json" };
    }

    try {
      return await this.fetchFn(url, init);
    } catch (error) {
      if (isTimeout(error)) {
        throw new ConnectionError(`${route} timed out after ${options.timeoutMs}ms (${this.baseUrl})`, {
          cause: error,
        });
      }
      throw new ConnectionError(`${route} unreachable at ${this.baseUrl}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async ensureOk(response: Response): Promise<void> {
    if (response.ok) {
      return;
    }
    let reason = response.statusText || "request failed";
    try {
      const text = await response.text();
      const parsed = errorBodySchema.safeParse(safeJson(text));
      if (parsed.success && (parsed.data.error || parsed.data.message)) {
        reason = parsed.data.error ?? parsed.data.message ?? reason;
      } else if (text.trim()) {
        reason = text.trim();
      }
    } catch (error) {
      reason = `${reason} (${errorMessage(error)})`;
    }
    throw new AgentError(response.status, reason);
  }

  private async parseJson<T>(route: AgentRoute, response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = await this.readBody(route, response, () => response.json());
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AgentError(response.status, `Malformed ${route} response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  /** A body that arrived but is not JSON is the agent's fault, not the link's. */
  private async readBody<T>(route: AgentRoute, response: Response, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      if (isTimeout(error)) {
        throw new ConnectionError(`${route} body timed out (${this.baseUrl})`, { cause: error });
      }
      if (error instanceof SyntaxError) {
        throw new AgentError(response.status, `Malformed ${route} response: ${error.message}`);
      }
      throw new ConnectionError(`${route} body could not be read: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Agent-side payload for `POST /action`. Durations travel in seconds. */
export function toWireAction(action: Action, target?: Point): Record<string, unknown> {
  switch (action.type) {
    case "click":
      return {
        type: "click",
        x: action.x ?? target?.x,
        y: action.y ?? target?.y,
        button: action.button,
        move_duration: action.moveDuration,
        click_delay: action.clickDelay,
      };
    case "double_click":
      return {
        type: "double_click",
        x: action.x ?? target?.x,
        y: action.y ?? target?.y,
        button: action.button,
      };
    case "key":
      return { type: "key", key: action.key };
    case "hotkey":
      return { type: "hotkey", keys: action.keys };
    case "text":
      return { type: "text", text: action.text, char_delay: action.charDelay };
    case "scroll":
      return {
        type: "scroll",
        x: target?.x,
        y: target?.y,
        direction: action.direction,
        clicks: action.clicks,
      };
    case "wait":
      return { type: "wait", duration: action.durationMs / 1000 };
    case "custom":
      return { ...action.params, type: action.name };
  }
}
