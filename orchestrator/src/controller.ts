import { toSutInfo } from "./config/campaign";
import { OrchestratorConfig, defaultConfig } from "./config/defaults";
import { loadGameConfig } from "./config/gameConfig";
import { LogLine, Logger, createLogger } from "./logging";
import { AgentClient, AgentClientConfig, AgentPort } from "./rpc/agentClient";
import { VisionClient } from "./rpc/visionClient";
import { Clock, systemClock } from "./runtime/clock";
import { PreviewEvent, PreviewPoller } from "./runtime/previewPoller";
import { FileTraceSink, TraceSink } from "./runtime/traces";
import { CampaignHandle, CampaignScheduler, GameLoader } from "./scheduler/campaignScheduler";
import { Campaign, CampaignStatus } from "./types/campaign";
import { SessionStatus, SutInfo, SutStatus } from "./types/session";
import { Supervisor, SutSummary } from "./worker/supervisor";

export interface SutRegistration {
  id: string;
  name?: string;
  host: string;
  port?: number;
}

export interface ControllerOptions {
  config?: OrchestratorConfig;
  clock?: Clock;
  vision?: VisionClient;
  trace?: TraceSink;
  agentFactory?: (sut: SutInfo, timeouts: AgentClientConfig) => AgentPort;
  loadGame?: GameLoader;
  console?: boolean;
}

export interface SutSessionStatus extends SessionStatus {
  campaign?: CampaignStatus;
}

/** Entry point for the CLI and the ui-server. */
export class BenchController {
  readonly config: OrchestratorConfig;
  readonly supervisor: Supervisor;
  readonly scheduler: CampaignScheduler;
  private previews = new Map<string, PreviewPoller>();
  private agentFactory: (sut: SutInfo, timeouts: AgentClientConfig) => AgentPort;
  private clock: Clock;
  private logger: Logger;
  private console: boolean;

  constructor(options: ControllerOptions = {}) {
    const config = options.config ?? defaultConfig;
    this.config = config;
    this.clock = options.clock ?? systemClock;
    this.agentFactory = options.agentFactory ?? ((sut, timeouts) => new AgentClient(sut, timeouts));
    this.console = options.console ?? true;
    this.logger = createLogger("scheduler", { level: config.logLevel, console: this.console });

    this.supervisor = new Supervisor({
      config,
      clock: this.clock,
      vision: options.vision,
      trace:
        options.trace ?? new FileTraceSink(config.artifacts.logsDir, { saveScreenshots: config.artifacts.saveScreenshots }),
      agentFactory: (sut) => this.agentFactory(sut, config.agent),
      console: this.console,
    });
    this.scheduler = new CampaignScheduler({
      supervisor: this.supervisor,
      defaults: config.scheduler,
      clock: this.clock,
      logger: this.logger,
      loadGame:
        options.loadGame ??
        ((ref) =>
          loadGameConfig(ref, {
            stepTimeoutMs: config.runtime.defaultStepTimeoutMs,
            expectedDelayMs: config.runtime.defaultExpectedDelayMs,
          })),
    });
  }

  registerSut(registration: SutRegistration): SutSummary {
    return this.supervisor.register(toSutInfo(registration, this.config.agent.defaultPort));
  }

  async removeSut(sutId: string): Promise<void> {
    this.supervisor.info(sutId);
    await this.stopPreview(sutId);
    this.supervisor.remove(sutId);
  }

  listSuts(): SutSummary[] {
    return this.supervisor.list();
  }

  startCampaign(sutId: string, campaign: Campaign): CampaignHandle {
    return this.scheduler.start(sutId, campaign);
  }

  startSharedCampaign(sutIds: string[], campaign: Campaign): CampaignHandle {
    return this.scheduler.startShared(sutIds, campaign);
  }

  stopSession(sutId: string): boolean {
    return this.supervisor.stop(sutId);
  }

  stopCampaign(campaignId: string): boolean {
    return this.scheduler.stop(campaignId);
  }

  campaignStatus(campaignId: string): CampaignStatus | undefined {
    return this.scheduler.status(campaignId);
  }

  getSessionStatus(sutId: string): SutSessionStatus {
    return {
      ...this.supervisor.status(sutId),
      campaign: this.scheduler.activeFor(sutId),
    };
  }

  reconnectSut(sutId: string): Promise<SutStatus> {
    return this.supervisor.reconnect(sutId);
  }

  logs(sutId: string): LogLine[] {
    return this.supervisor.logs(sutId).snapshot();
  }

  subscribeLogs(sutId: string, listener: (line: LogLine) => void): () => void {
    return this.supervisor.logs(sutId).subscribe(listener);
  }

  subscribeStatus(listener: (status: SessionStatus) => void): () => void {
    return this.supervisor.subscribe(listener);
  }

  startPreview(sutId: string): PreviewPoller {
    const existing = this.previews.get(sutId);
    if (existing) {
      return existing;
    }
    const sut = this.supervisor.info(sutId);
    const timeoutMs = this.config.preview.timeoutMs;
    const poller = new PreviewPoller({
      sutId,
      agent: this.agentFactory(sut, {
        requestTimeoutMs: timeoutMs,
        screenshotTimeoutMs: timeoutMs,
        launchTimeoutMs: timeoutMs,
        healthTimeoutMs: timeoutMs,
      }),
      intervalMs: this.config.preview.intervalMs,
      clock: this.clock,
      logger: createLogger(`preview:${sut.name}`, { level: this.config.logLevel, console: this.console }),
    });
    this.previews.set(sutId, poller);
    poller.start();
    return poller;
  }

  async stopPreview(sutId: string): Promise<void> {
    const poller = this.previews.get(sutId);
    if (!poller) {
      return;
    }
    this.previews.delete(sutId);
    await poller.stop();
  }

  subscribePreview(sutId: string, listener: (event: PreviewEvent) => void): () => void {
    return this.startPreview(sutId).subscribe(listener);
  }

  async shutdown(): Promise<void> {
    for (const sut of this.supervisor.list()) {
      this.supervisor.stop(sut.id);
    }
    await Promise.all([...this.previews.keys()].map((sutId) => this.stopPreview(sutId)));
  }
}
