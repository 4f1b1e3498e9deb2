import { SessionResult } from "./session";

export interface CampaignEntrySpec {
  /** Path to the game's YAML config. */
  game: string;
  runCount: number;
  delayMs: number;
}

export interface Campaign {
  name: string;
  entries: CampaignEntrySpec[];
  delayBetweenGamesMs?: number;
  continueOnFailure?: boolean;
}

export interface RunRecord {
  runNumber: number;
  sutId: string;
  sessionId: string;
  result: SessionResult;
  reason?: string;
}

export interface CampaignEntryState {
  game: string;
  gameName?: string;
  runCount: number;
  delayMs: number;
  remaining: number;
  results: RunRecord[];
  rejected?: string;
}

export type CampaignState = "pending" | "running" | "completed" | "failed" | "aborted";

export interface CampaignStatus {
  id: string;
  name: string;
  /** One SUT for per-SUT campaigns, the pool for shared ones. */
  sutIds: string[];
  state: CampaignState;
  reason?: string;
  startedAt?: string;
  endedAt?: string;
  /** Entries still queued, head first. */
  queue: CampaignEntryState[];
  finished: CampaignEntryState[];
  totals: Record<SessionResult, number>;
}
