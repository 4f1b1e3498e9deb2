import { errorMessage } from "../errors";
import { Logger } from "../logging";
import { AgentPort } from "../rpc/agentClient";
import { Clock, systemClock } from "./clock";

export type PreviewEvent =
  | { type: "frame"; sutId: string; image: Buffer; at: number }
  | { type: "disconnected"; sutId: string; error: string; at: number };

type PreviewListener = (event: PreviewEvent) => void;

export interface PreviewPollerOptions {
  sutId: string;
  /** A client of its own, built with the short preview timeout. */
  agent: AgentPort;
  intervalMs: number;
  clock?: Clock;
  logger: Logger;
}

/**
 * Periodic low-rate screenshots for display. Runs beside any automation
 * session and never reads or fills the session screenshot cache.
 */
export class PreviewPoller {
  private options: PreviewPollerOptions;
  private clock: Clock;
  private listeners = new Set<PreviewListener>();
  private controller?: AbortController;
  private loop?: Promise<void>;
  private lastFrame?: Extract<PreviewEvent, { type: "frame" }>;

  constructor(options: PreviewPollerOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  get running(): boolean {
    return this.controller !== undefined;
  }

  get latest(): Extract<PreviewEvent, { type: "frame" }> | undefined {
    return this.lastFrame;
  }

  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.poll(controller.signal);
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    this.controller = undefined;
    controller.abort();
    await this.loop;
    this.loop = undefined;
  }

  subscribe(listener: PreviewListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async poll(signal: AbortSignal): Promise<void> {
    const { sutId, agent, intervalMs, logger } = this.options;
    let connected = true;

    while (!signal.aborted) {
      try {
        const image = await agent.captureScreenshot();
        if (signal.aborted) {
          break;
        }
        if (!connected) {
          logger.info("preview reconnected");
        }
        connected = true;
        this.lastFrame = { type: "frame", sutId, image, at: this.clock.now() };
        this.emit(this.lastFrame);
      } catch (error) {
        if (connected) {
          logger.warn(`preview capture failed: ${errorMessage(error)}`);
        }
        connected = false;
        this.emit({ type: "disconnected", sutId, error: errorMessage(error), at: this.clock.now() });
      }
      await this.clock.sleep(intervalMs, signal);
    }
  }

  private emit(event: PreviewEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.options.logger.warn(`preview listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
