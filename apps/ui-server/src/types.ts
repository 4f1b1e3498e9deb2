import { EngineKind } from "@benchfleet/orchestrator";

export interface GameRecord {
  /** Path relative to the games directory; campaigns reference games by it. */
  ref: string;
  path: string;
  name?: string;
  engine?: EngineKind;
  /** Step count, or state count for state machines. */
  size?: number;
  error?: string;
}
