import { Fleet } from "../config/campaign";
import { SchedulerConfig } from "../config/defaults";

export interface CliArgs {
  fleet?: string;
  config?: string;
  out?: string;
  /** Run the fleet's shared campaign across every SUT instead of per-SUT campaigns. */
  shared?: boolean;
  help?: boolean;
}

const valueFlags = ["fleet", "config", "out"] as const;
type ValueFlag = (typeof valueFlags)[number];

function isValueFlag(key: string): key is ValueFlag {
  return valueFlags.some((flag) => flag === key);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};
  let index = 0;

  while (index < argv.length) {
    const token = argv[index];
    if (!token.startsWith("--")) {
      index += 1;
      continue;
    }

    const key = token.slice(2);
    if (key === "shared") {
      args.shared = true;
      index += 1;
      continue;
    }
    if (key === "help") {
      args.help = true;
      index += 1;
      continue;
    }

    const value = argv[index + 1];
    const hasValue = value !== undefined && !value.startsWith("--");
    if (isValueFlag(key)) {
      args[key] = hasValue ? value : "";
    }
    index += hasValue ? 2 : 1;
  }

  return args;
}

export const usage = "usage: run --fleet <fleet.json> [--config <config.json>] [--out <logs dir>] [--shared]";

/**
 * `--shared` wins, then `scheduler.mode`; a fleet with only a shared campaign
 * runs shared either way.
 */
export function campaignMode(shared: boolean | undefined, scheduler: SchedulerConfig, fleet: Fleet): SchedulerConfig["mode"] {
  if (shared || scheduler.mode === "shared") {
    return "shared";
  }
  return fleet.shared !== undefined && fleet.suts.every((entry) => !entry.campaign) ? "shared" : "per-sut";
}
