import { Observation } from "../types/session";

export type InvalidationReason = "action" | "advance" | "refresh";

interface CacheEntry {
  attempt: number;
  observation: Observation;
}

export type InvalidationCounts = Record<InvalidationReason, number>;

/**
 * Latest screenshot and detections per session, keyed by the poll attempt
 * that produced them. A lookup for any other attempt is a miss, so an
 * observation never outlives the cycle it was taken in.
 */
export class ScreenshotCache {
  private entries = new Map<string, CacheEntry>();
  private invalidations = new Map<string, InvalidationCounts>();
  private captures = new Map<string, number>();

  lookup(sessionId: string, attempt: number): Observation | undefined {
    const entry = this.entries.get(sessionId);
    if (!entry || entry.attempt !== attempt) {
      return undefined;
    }
    return entry.observation;
  }

  store(sessionId: string, attempt: number, observation: Observation): void {
    this.entries.set(sessionId, { attempt, observation });
  }

  async getOrCapture(
    sessionId: string,
    attempt: number,
    capture: () => Promise<Observation>,
  ): Promise<Observation> {
    const cached = this.lookup(sessionId, attempt);
    if (cached) {
      return cached;
    }
    const observation = await capture();
    this.captures.set(sessionId, (this.captures.get(sessionId) ?? 0) + 1);
    this.store(sessionId, attempt, observation);
    return observation;
  }

  invalidate(sessionId: string, reason: InvalidationReason): void {
    this.entries.delete(sessionId);
    const counts = this.invalidations.get(sessionId) ?? { action: 0, advance: 0, refresh: 0 };
    counts[reason] += 1;
    this.invalidations.set(sessionId, counts);
  }

  invalidationCounts(sessionId: string): InvalidationCounts {
    return { action: 0, advance: 0, refresh: 0, ...this.invalidations.get(sessionId) };
  }

  captureCount(sessionId: string): number {
    return this.captures.get(sessionId) ?? 0;
  }

  /** Drops the entry and counters of a finished session. */
  release(sessionId: string): void {
    this.entries.delete(sessionId);
    this.invalidations.delete(sessionId);
    this.captures.delete(sessionId);
  }
}
