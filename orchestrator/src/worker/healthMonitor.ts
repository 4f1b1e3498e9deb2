import { ConnectionError, errorMessage } from "../errors";
import { Logger } from "../logging";
import { AgentPort } from "../rpc/agentClient";
import { Clock } from "../runtime/clock";

export interface HealthMonitorOptions {
  intervalMs: number;
  maxFailures: number;
}

/**
 * Counts consecutive unreachable health checks and calls `onDisconnect` once
 * the limit is hit. `tick` is cheap between intervals, so engines can call it
 * every poll cycle.
 */
export class HealthMonitor {
  private lastCheckAt?: number;
  private failures = 0;
  private tripped = false;

  constructor(
    private readonly agent: AgentPort,
    private readonly clock: Clock,
    private readonly options: HealthMonitorOptions,
    private readonly onDisconnect: (error: ConnectionError) => void,
    private readonly logger: Logger,
  ) {}

  get consecutiveFailures(): number {
    return this.failures;
  }

  async tick(): Promise<void> {
    const now = this.clock.now();
    if (this.tripped || (this.lastCheckAt !== undefined && now - this.lastCheckAt < this.options.intervalMs)) {
      return;
    }
    this.lastCheckAt = now;

    try {
      const healthy = await this.agent.healthCheck();
      if (!healthy) {
        this.logger.warn("agent reports unhealthy");
      }
      this.failures = 0;
    } catch (error) {
      if (!(error instanceof ConnectionError)) {
        this.logger.warn(`health check failed: ${errorMessage(error)}`);
        return;
      }
      this.failures += 1;
      this.logger.warn(`health check ${this.failures}/${this.options.maxFailures} failed: ${error.message}`);
      if (this.failures >= this.options.maxFailures) {
        this.tripped = true;
        this.onDisconnect(error);
      }
    }
  }
}
