import { randomUUID } from "crypto";
import { SchedulerConfig } from "../config/defaults";
import { ConfigValidationError, SutBusyError, UnknownSutError } from "../errors";
import { Logger, silentLogger } from "../logging";
import { Clock, systemClock } from "../runtime/clock";
import { Campaign, CampaignEntryState, CampaignState, CampaignStatus } from "../types/campaign";
import { GameConfig } from "../types/game";
import { SessionResult } from "../types/session";
import { SessionHandle, Supervisor } from "../worker/supervisor";

export type GameLoader = (ref: string) => GameConfig;

export interface CampaignSchedulerOptions {
  supervisor: Supervisor;
  loadGame: GameLoader;
  defaults: SchedulerConfig;
  clock?: Clock;
  logger?: Logger;
}

export interface CampaignHandle {
  id: string;
  done: Promise<CampaignStatus>;
}

interface QueuedEntry {
  state: CampaignEntryState;
  game: GameConfig;
  claimed: number;
}

interface CampaignRun {
  status: CampaignStatus;
  queue: QueuedEntry[];
  continueOnFailure: boolean;
  delayBetweenGamesMs: number;
  controller: AbortController;
  /** SUT id to the session id it is running for this campaign. */
  active: Map<string, string>;
  /** SUTs whose lane is still claiming runs. */
  lanes: Set<string>;
}

const emptyTotals = (): Record<SessionResult, number> => ({ Success: 0, Failed: 0, Timeout: 0, Aborted: 0 });

/**
 * Drives campaign queues over the supervisor. Every SUT in a campaign's pool
 * runs a lane that claims the next pending run from the shared queue, so a
 * per-SUT campaign is simply a pool of one.
 */
export class CampaignScheduler {
  private supervisor: Supervisor;
  private loadGame: GameLoader;
  private defaults: SchedulerConfig;
  private clock: Clock;
  private logger: Logger;
  private runs = new Map<string, CampaignRun>();

  constructor(options: CampaignSchedulerOptions) {
    this.supervisor = options.supervisor;
    this.loadGame = options.loadGame;
    this.defaults = options.defaults;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /** Sequential queue on one SUT, which must be Idle. */
  start(sutId: string, campaign: Campaign): CampaignHandle {
    return this.launch([sutId], campaign, true);
  }

  /**
   * One queue dispatched to whichever SUT of `sutIds` is free. A SUT that
   * cannot take a run leaves the pool; the campaign fails only when none is left.
   */
  startShared(sutIds: string[], campaign: Campaign): CampaignHandle {
    if (sutIds.length === 0) {
      throw new ConfigValidationError(campaign.name, [{ path: "suts", message: "a shared campaign needs at least one SUT" }]);
    }
    return this.launch([...new Set(sutIds)], campaign, false);
  }

  stop(campaignId: string): boolean {
    const run = this.runs.get(campaignId);
    if (!run || isFinished(run.status.state)) {
      return false;
    }
    run.controller.abort("stopped");
    for (const sutId of run.active.keys()) {
      this.supervisor.stop(sutId);
    }
    return true;
  }

  status(campaignId: string): CampaignStatus | undefined {
    const run = this.runs.get(campaignId);
    return run ? snapshot(run) : undefined;
  }

  list(): CampaignStatus[] {
    return [...this.runs.values()].map(snapshot);
  }

  /** The unfinished campaign that includes `sutId`, if any. */
  activeFor(sutId: string): CampaignStatus | undefined {
    for (const run of this.runs.values()) {
      if (!isFinished(run.status.state) && run.status.sutIds.includes(sutId)) {
        return snapshot(run);
      }
    }
    return undefined;
  }

  private launch(sutIds: string[], campaign: Campaign, requireIdle: boolean): CampaignHandle {
    for (const sutId of sutIds) {
      this.supervisor.info(sutId);
      const active = this.activeFor(sutId);
      if (active) {
        throw new SutBusyError(sutId, `already runs campaign ${active.name}`);
      }
      const { status } = this.supervisor.status(sutId);
      if (requireIdle && status !== "Idle") {
        throw new SutBusyError(sutId, status === "Running" ? undefined : `is ${status}`);
      }
    }

    const run: CampaignRun = {
      status: {
        id: randomUUID(),
        name: campaign.name,
        sutIds,
        state: "pending",
        queue: [],
        finished: [],
        totals: emptyTotals(),
      },
      queue: [],
      continueOnFailure: campaign.continueOnFailure ?? this.defaults.continueOnFailure,
      delayBetweenGamesMs: campaign.delayBetweenGamesMs ?? this.defaults.delayBetweenGamesMs,
      controller: new AbortController(),
      active: new Map(),
      lanes: new Set(sutIds),
    };

    // Every game config is loaded before the first session starts.
    for (const entry of campaign.entries) {
      const state: CampaignEntryState = {
        game: entry.game,
        runCount: entry.runCount,
        delayMs: entry.delayMs,
        remaining: entry.runCount,
        results: [],
      };
      try {
        const game = this.loadGame(entry.game);
        state.gameName = game.metadata.name;
        run.queue.push({ state, game, claimed: 0 });
      } catch (error) {
        if (!(error instanceof ConfigValidationError)) {
          throw error;
        }
        state.rejected = error.message;
        run.status.finished.push(state);
        this.logger.warn(`[campaign:${campaign.name}] rejected ${entry.game}: ${error.message}`);
      }
    }

    this.runs.set(run.status.id, run);
    return { id: run.status.id, done: this.execute(run) };
  }

  private async execute(run: CampaignRun): Promise<CampaignStatus> {
    const tag = `[campaign:${run.status.name}]`;
    if (run.queue.length === 0) {
      this.finish(run, "failed", "no valid entries");
      return snapshot(run);
    }

    run.status.state = "running";
    run.status.startedAt = new Date().toISOString();
    this.logger.info(`${tag} started on ${run.status.sutIds.join(", ")} with ${run.queue.length} game(s)`);

    await Promise.all(
      run.status.sutIds.map(async (sutId) => {
        try {
          await this.lane(run, sutId);
        } finally {
          run.lanes.delete(sutId);
        }
      }),
    );

    if (!isFinished(run.status.state)) {
      this.finish(run, run.controller.signal.aborted ? "aborted" : "completed");
    }
    const { Success, Failed, Timeout, Aborted } = run.status.totals;
    this.logger.info(
      `${tag} ${run.status.state}: ${Success} success, ${Failed} failed, ${Timeout} timeout, ${Aborted} aborted`,
    );
    return snapshot(run);
  }

  private async lane(run: CampaignRun, sutId: string): Promise<void> {
    const signal = run.controller.signal;

    for (;;) {
      if (signal.aborted || isFinished(run.status.state)) {
        return;
      }
      const entry = run.queue.find((queued) => queued.claimed < queued.state.runCount);
      if (!entry) {
        return;
      }
      entry.claimed += 1;
      const runNumber = entry.claimed;

      let handle: SessionHandle;
      try {
        handle = this.supervisor.assign(sutId, entry.game, { runNumber });
      } catch (error) {
        if (error instanceof SutBusyError || error instanceof UnknownSutError) {
          entry.claimed -= 1;
          this.leave(run, sutId, error.message);
          return;
        }
        throw error;
      }
      run.active.set(sutId, handle.sessionId);

      const report = await handle.done;
      run.active.delete(sutId);

      entry.state.results.push({
        runNumber,
        sutId,
        sessionId: report.sessionId,
        result: report.result,
        reason: report.reason,
      });
      run.status.totals[report.result] += 1;
      entry.state.remaining -= 1;

      let advanced = false;
      if (entry.state.remaining === 0) {
        run.queue.splice(run.queue.indexOf(entry), 1);
        run.status.finished.push(entry.state);
        advanced = true;
      }

      if (report.result === "Aborted") {
        this.halt(run, "aborted", `run ${runNumber} of ${entry.state.gameName ?? entry.state.game} was aborted`);
        return;
      }
      if (report.result !== "Success" && !run.continueOnFailure) {
        this.halt(run, "failed", `run ${runNumber} of ${entry.state.gameName ?? entry.state.game} ended ${report.result}`);
        return;
      }

      const next = run.queue.find((queued) => queued.claimed < queued.state.runCount);
      if (!next) {
        return;
      }
      const delay = advanced || next !== entry ? run.delayBetweenGamesMs : entry.state.delayMs;
      await this.clock.sleep(delay, signal);
    }
  }

  /** Takes `sutId` out of the pool; its run goes back to the queue for the others. */
  private leave(run: CampaignRun, sutId: string, reason: string): void {
    run.lanes.delete(sutId);
    this.logger.warn(`[campaign:${run.status.name}] ${sutId} left the pool: ${reason}`);
    if (run.lanes.size === 0) {
      this.halt(run, "failed", `dispatch to ${sutId} failed: ${reason}`);
    }
  }

  private halt(run: CampaignRun, state: CampaignState, reason: string): void {
    if (isFinished(run.status.state)) {
      return;
    }
    this.finish(run, state, reason);
    this.logger.warn(`[campaign:${run.status.name}] ${state}: ${reason}`);
    // Lanes still sleeping between runs wake up and exit.
    run.controller.abort(state);
  }

  private finish(run: CampaignRun, state: CampaignState, reason?: string): void {
    run.status.state = state;
    run.status.reason = reason;
    run.status.endedAt = new Date().toISOString();
  }
}

function isFinished(state: CampaignState): boolean {
  return state === "completed" || state === "failed" || state === "aborted";
}

function snapshot(run: CampaignRun): CampaignStatus {
  const copyEntry = (entry: CampaignEntryState): CampaignEntryState => ({ ...entry, results: [...entry.results] });
  return {
    ...run.status,
    sutIds: [...run.status.sutIds],
    queue: run.queue.map((queued) => copyEntry(queued.state)),
    finished: run.status.finished.map(copyEntry),
    totals: { ...run.status.totals },
  };
}
