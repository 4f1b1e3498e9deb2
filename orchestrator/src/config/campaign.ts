import fs from "fs";
import path from "path";
import yaml from "yaml";
import { z } from "zod";
import { ConfigValidationError, errorMessage } from "../errors";
import { Campaign } from "../types/campaign";
import { SutInfo } from "../types/session";
import { zodIssues } from "./issues";

const seconds = z.number().nonnegative();

export const campaignSchema = z.object({
  name: z.string().min(1).default("campaign"),
  entries: z
    .array(
      z.object({
        game: z.string().min(1),
        run_count: z.number().int().positive().default(3),
        delay: seconds.default(30),
      }),
    )
    .min(1),
  delay_between_games: seconds.optional(),
  continue_on_failure: z.boolean().optional(),
});

export const sutSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65_535).optional(),
});

const fleetSchema = z.object({
  suts: z.array(sutSchema.extend({ campaign: campaignSchema.optional() })).min(1),
  shared: campaignSchema.optional(),
});

export interface FleetSut {
  sut: SutInfo;
  campaign?: Campaign;
}

export interface Fleet {
  suts: FleetSut[];
  /** Dispatched to whichever SUT of the fleet is idle. */
  shared?: Campaign;
}

type RawCampaign = z.infer<typeof campaignSchema>;

/** Game references resolve against `baseDir`. */
function toCampaign(raw: RawCampaign, baseDir: string): Campaign {
  return {
    name: raw.name,
    entries: raw.entries.map((entry) => ({
      game: path.resolve(baseDir, entry.game),
      runCount: entry.run_count,
      delayMs: Math.round(entry.delay * 1000),
    })),
    delayBetweenGamesMs:
      raw.delay_between_games === undefined ? undefined : Math.round(raw.delay_between_games * 1000),
    continueOnFailure: raw.continue_on_failure,
  };
}

export function toSutInfo(raw: z.infer<typeof sutSchema>, defaultPort: number): SutInfo {
  return {
    id: raw.id,
    name: raw.name ?? raw.id,
    host: raw.host,
    port: raw.port ?? defaultPort,
  };
}

export function parseCampaign(value: unknown, source = "<inline>", baseDir = process.cwd()): Campaign {
  const parsed = campaignSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigValidationError(source, zodIssues(parsed.error));
  }
  return toCampaign(parsed.data, baseDir);
}

export function parseFleet(value: unknown, source: string, baseDir: string, defaultPort: number): Fleet {
  const parsed = fleetSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigValidationError(source, zodIssues(parsed.error));
  }
  const ids = new Set<string>();
  for (const sut of parsed.data.suts) {
    if (ids.has(sut.id)) {
      throw new ConfigValidationError(source, [{ path: "suts", message: `duplicate SUT id ${sut.id}` }]);
    }
    ids.add(sut.id);
  }
  return {
    suts: parsed.data.suts.map((entry) => ({
      sut: toSutInfo(entry, defaultPort),
      campaign: entry.campaign ? toCampaign(entry.campaign, baseDir) : undefined,
    })),
    shared: parsed.data.shared ? toCampaign(parsed.data.shared, baseDir) : undefined,
  };
}

/** Reads a JSON or YAML fleet file; game paths resolve next to it. */
export function loadFleet(fleetPath: string, defaultPort: number): Fleet {
  const resolved = path.resolve(fleetPath);
  let document: unknown;
  try {
    document = yaml.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ConfigValidationError(resolved, [{ path: "", message: errorMessage(error) }]);
  }
  return parseFleet(document, resolved, path.dirname(resolved), defaultPort);
}
