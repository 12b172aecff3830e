import type { SessionRow } from "./types.js";

/** The slice of the store the tracker writes through */
export interface SessionStore {
  latestSession(callsign: string): SessionRow | undefined;
  openSession(callsign: string, hex: string, ts: number): number;
  touchSession(sessionId: number, hex: string, ts: number): void;
}

export interface SessionTrackerOptions {
  timeoutMs: number;
  maxEntries: number;
}

export interface SessionAssignment {
  sessionId: number;
  opened: boolean;
}

interface IndexEntry {
  sessionId: number;
  lastSeen: number;
}

/**
 * Groups records sharing a callsign into sessions. A gap of up to `timeoutMs`
 * (inclusive) continues the open session; a longer gap opens a new one.
 *
 * The callsign index is an LRU map capped at `maxEntries`. On a miss the
 * latest session is read back from the store, so eviction never splits a
 * session that is still within the timeout.
 */
export class SessionTracker {
  private readonly index = new Map<string, IndexEntry>();
  private evicted = 0;

  constructor(
    private readonly store: SessionStore,
    private readonly options: SessionTrackerOptions
  ) {}

  track(callsign: string, hex: string, ts: number): SessionAssignment | null {
    const key = callsign.trim();
    if (!key) return null;

    const entry = this.index.get(key) ?? this.recall(key);

    if (entry && ts - entry.lastSeen <= this.options.timeoutMs) {
      // out-of-order records extend without moving last_seen back
      this.store.touchSession(entry.sessionId, hex, ts);
      this.remember(key, { sessionId: entry.sessionId, lastSeen: Math.max(entry.lastSeen, ts) });
      return { sessionId: entry.sessionId, opened: false };
    }

    const sessionId = this.store.openSession(key, hex, ts);
    this.remember(key, { sessionId, lastSeen: ts });
    return { sessionId, opened: true };
  }

  /** Drops the cached entry, e.g. after the write that created it rolled back */
  forget(callsign: string): void {
    this.index.delete(callsign.trim());
  }

  /** Removes entries whose session has already timed out at `now` */
  sweep(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.index) {
      if (now - entry.lastSeen > this.options.timeoutMs) {
        this.index.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.index.size;
  }

  get evictedCount(): number {
    return this.evicted;
  }

  private recall(key: string): IndexEntry | undefined {
    const row = this.store.latestSession(key);
    return row ? { sessionId: row.session_id, lastSeen: row.last_seen } : undefined;
  }

  private remember(key: string, entry: IndexEntry): void {
    // re-insert so iteration order is least recently used first
    this.index.delete(key);
    this.index.set(key, entry);

    while (this.index.size > this.options.maxEntries) {
      const oldest = this.index.keys().next();
      if (oldest.done) break;
      this.index.delete(oldest.value);
      this.evicted++;
    }
  }
}
