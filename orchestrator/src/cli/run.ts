import { loadFleet } from "../config/campaign";
import { loadConfig } from "../config/defaults";
import { BenchController } from "../controller";
import { CampaignHandle } from "../scheduler/campaignScheduler";
import { CampaignStatus } from "../types/campaign";
import { countAttemptOutcomes } from "../types/session";
import { campaignMode, parseArgs, usage } from "./args";

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`Missing required argument: --${name}\n${usage}`);
  }
  return value;
}

function campaignFailed(status: CampaignStatus): boolean {
  if (status.state !== "completed") {
    return true;
  }
  return status.finished.some(
    (entry) => entry.rejected !== undefined || entry.results.some((run) => run.result !== "Success"),
  );
}

function printSummary(status: CampaignStatus): void {
  console.log(`[campaign:${status.name}] ${status.state}${status.reason ? ` (${status.reason})` : ""}`);
  for (const entry of [...status.finished, ...status.queue]) {
    const label = entry.gameName ?? entry.game;
    if (entry.rejected) {
      console.log(`  ${label}: rejected, ${entry.rejected}`);
      continue;
    }
    const results = entry.results.map((run) => `#${run.runNumber} ${run.result}`).join(", ");
    console.log(`  ${label}: ${results || "no runs"}`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(usage);
    return;
  }
  const fleetPath = requireArg(args.fleet, "fleet");
  const loaded = loadConfig(args.config);
  const config = args.out ? { ...loaded, artifacts: { ...loaded.artifacts, logsDir: args.out } } : loaded;
  const fleet = loadFleet(fleetPath, config.agent.defaultPort);

  const controller = new BenchController({ config });
  for (const { sut } of fleet.suts) {
    controller.registerSut(sut);
  }

  const reported = new Set<string>();
  const unsubscribe = controller.subscribeStatus((status) => {
    const report = status.lastReport;
    if (!report || reported.has(report.sessionId)) {
      return;
    }
    reported.add(report.sessionId);
    const attempts = countAttemptOutcomes(report.history);
    console.log(
      `[sut:${status.sutId}] ${report.game} run ${report.runNumber}: ${report.result} ` +
        `(${attempts.ok} ok, ${attempts.failed} failed, ${report.retries} retries)`,
    );
  });

  const handles: CampaignHandle[] = [];
  if (campaignMode(args.shared, config.scheduler, fleet) === "shared") {
    if (!fleet.shared) {
      throw new Error("Shared mode needs a `shared` campaign in the fleet file");
    }
    handles.push(controller.startSharedCampaign(fleet.suts.map((entry) => entry.sut.id), fleet.shared));
  } else {
    for (const { sut, campaign } of fleet.suts) {
      if (campaign) {
        handles.push(controller.startCampaign(sut.id, campaign));
      }
    }
  }
  if (handles.length === 0) {
    throw new Error(`Fleet ${fleetPath} defines no campaigns`);
  }

  const stopAll = () => {
    console.log("Stopping campaigns...");
    for (const handle of handles) {
      controller.stopCampaign(handle.id);
    }
  };
  process.once("SIGINT", stopAll);

  try {
    const results = await Promise.all(handles.map((handle) => handle.done));
    results.forEach(printSummary);
    if (results.some(campaignFailed)) {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener("SIGINT", stopAll);
    unsubscribe();
    await controller.shutdown();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
