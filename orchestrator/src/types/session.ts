import { ActionType, EngineKind } from "./game";

export type SutStatus = "Idle" | "Running" | "Error" | "Disconnected";

export interface SutInfo {
  id: string;
  name: string;
  host: string;
  port: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DetectedElement {
  bbox: BoundingBox;
  text: string;
  confidence: number;
  type: string;
}

export interface Observation {
  image: Buffer;
  elements: DetectedElement[];
  capturedAt: number;
}

export type SessionResult = "Success" | "Failed" | "Timeout" | "Aborted";

export type HistoryEntry =
  | {
      /** One attempt of a linear step: the find and, when it matched, the action. */
      kind: "step";
      pointer: string;
      attempt: number;
      ok: boolean;
      at: number;
      matched?: DetectedElement;
      action?: ActionType;
      error?: string;
    }
  | {
      kind: "find";
      pointer: string;
      attempt: number;
      ok: boolean;
      at: number;
      matched?: DetectedElement;
      error?: string;
    }
  | {
      kind: "action";
      pointer: string;
      action: ActionType;
      ok: boolean;
      at: number;
      error?: string;
    }
  | {
      kind: "transition";
      from: string;
      to: string;
      cause: "rule" | "default";
      ruleIndex?: number;
      at: number;
    }
  | {
      kind: "launch";
      ok: boolean;
      at: number;
      pid?: number;
      error?: string;
    };

/** Successful and failed attempts: step entries for linear flows, find entries for state machines. */
export function countAttemptOutcomes(history: HistoryEntry[]): {
  ok: number;
  failed: number;
} {
  let ok = 0;
  let failed = 0;
  for (const entry of history) {
    if (entry.kind !== "step" && entry.kind !== "find") {
      continue;
    }
    if (entry.ok) {
      ok += 1;
    } else {
      failed += 1;
    }
  }
  return { ok, failed };
}

export interface SessionReport {
  sessionId: string;
  sutId: string;
  game: string;
  engine: EngineKind;
  runNumber: number;
  result: SessionResult;
  reason?: string;
  startedAt: string;
  endedAt: string;
  finalPointer: string;
  retries: number;
  history: HistoryEntry[];
}

export interface SessionStatus {
  sutId: string;
  status: SutStatus;
  sessionId?: string;
  game?: string;
  pointer?: string;
  startedAt?: string;
  lastReport?: SessionReport;
}
