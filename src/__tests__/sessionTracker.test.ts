import { describe, expect, it } from "vitest";
import { SessionTracker, type SessionStore } from "../sessionTracker.js";
import type { SessionRow } from "../types.js";

const TIMEOUT = 1200 * 1000;

class FakeSessionStore implements SessionStore {
  readonly rows: SessionRow[] = [];
  lookups = 0;

  latestSession(callsign: string): SessionRow | undefined {
    this.lookups++;
    return this.rows
      .filter((r) => r.callsign === callsign)
      .sort((a, b) => b.last_seen - a.last_seen || b.session_id - a.session_id)[0];
  }

  openSession(callsign: string, hex: string, ts: number): number {
    const row = { session_id: this.rows.length + 1, callsign, hex, first_seen: ts, last_seen: ts };
    this.rows.push(row);
    return row.session_id;
  }

  touchSession(sessionId: number, hex: string, ts: number): void {
    const row = this.rows.find((r) => r.session_id === sessionId);
    if (row) {
      row.hex = hex;
      row.last_seen = Math.max(row.last_seen, ts);
    }
  }
}

function setup(maxEntries = 100) {
  const store = new FakeSessionStore();
  const tracker = new SessionTracker(store, { timeoutMs: TIMEOUT, maxEntries });
  return { store, tracker };
}

describe("SessionTracker", () => {
  it("skips records without a callsign", () => {
    const { store, tracker } = setup();
    expect(tracker.track("", "A1B2C3", 0)).toBeNull();
    expect(tracker.track("   ", "A1B2C3", 0)).toBeNull();
    expect(store.rows).toHaveLength(0);
  });

  it("opens a session on first sighting", () => {
    const { store, tracker } = setup();
    expect(tracker.track("UAL123", "A1B2C3", 1000)).toEqual({ sessionId: 1, opened: true });
    expect(store.rows[0]).toEqual({ session_id: 1, callsign: "UAL123", hex: "A1B2C3", first_seen: 1000, last_seen: 1000 });
  });

  it("continues the session when the gap equals the timeout", () => {
    const { store, tracker } = setup();
    tracker.track("UAL123", "A1B2C3", 0);
    expect(tracker.track("UAL123", "A1B2C3", TIMEOUT)).toEqual({ sessionId: 1, opened: false });
    expect(store.rows[0].last_seen).toBe(TIMEOUT);
  });

  it("opens a new session when the gap exceeds the timeout", () => {
    const { store, tracker } = setup();
    tracker.track("UAL123", "A1B2C3", 0);
    expect(tracker.track("UAL123", "A1B2C3", TIMEOUT + 1)).toEqual({ sessionId: 2, opened: true });
    expect(store.rows.map((r) => [r.first_seen, r.last_seen])).toEqual([
      [0, 0],
      [TIMEOUT + 1, TIMEOUT + 1],
    ]);
  });

  it("measures the gap from the last sighting, not the first", () => {
    const { tracker } = setup();
    tracker.track("UAL123", "A1B2C3", 0);
    tracker.track("UAL123", "A1B2C3", TIMEOUT);
    expect(tracker.track("UAL123", "A1B2C3", 2 * TIMEOUT)).toEqual({ sessionId: 1, opened: false });
  });

  it("does not move last_seen back for an out-of-order record", () => {
    const { store, tracker } = setup();
    tracker.track("UAL123", "A1B2C3", 10_000);
    tracker.track("UAL123", "A1B2C3", 5_000);
    expect(store.rows[0].last_seen).toBe(10_000);
    expect(tracker.track("UAL123", "A1B2C3", 10_000 + TIMEOUT)).toEqual({ sessionId: 1, opened: false });
  });

  it("keeps callsigns independent", () => {
    const { tracker } = setup();
    expect(tracker.track("UAL123", "A1B2C3", 0)?.sessionId).toBe(1);
    expect(tracker.track("DAL456", "ABCDEF", 0)?.sessionId).toBe(2);
    expect(tracker.track("UAL123", "A1B2C3", 60_000)?.sessionId).toBe(1);
  });

  it("evicts the least recently used callsign past the cap", () => {
    const { tracker } = setup(2);
    tracker.track("AAA1", "000001", 0);
    tracker.track("BBB2", "000002", 0);
    tracker.track("AAA1", "000001", 1000);
    tracker.track("CCC3", "000003", 2000);

    expect(tracker.size).toBe(2);
    expect(tracker.evictedCount).toBe(1);
  });

  it("recovers an evicted session from the store", () => {
    const { store, tracker } = setup(1);
    tracker.track("AAA1", "000001", 0);
    tracker.track("BBB2", "000002", 0);

    const lookupsBefore = store.lookups;
    expect(tracker.track("AAA1", "000001", 60_000)).toEqual({ sessionId: 1, opened: false });
    expect(store.lookups).toBe(lookupsBefore + 1);
  });

  it("only reads the store on an index miss", () => {
    const { store, tracker } = setup();
    tracker.track("UAL123", "A1B2C3", 0);
    tracker.track("UAL123", "A1B2C3", 1000);
    tracker.track("UAL123", "A1B2C3", 2000);
    expect(store.lookups).toBe(1);
  });

  it("sweeps entries that have timed out", () => {
    const { tracker } = setup();
    tracker.track("OLD1", "000001", 0);
    tracker.track("NEW2", "000002", TIMEOUT);

    expect(tracker.sweep(TIMEOUT)).toBe(0);
    expect(tracker.sweep(TIMEOUT + 1)).toBe(1);
    expect(tracker.size).toBe(1);
  });

  it("forget drops the cached entry", () => {
    const { store, tracker } = setup();
    tracker.track("UAL123", "A1B2C3", 0);
    tracker.forget("UAL123");
    expect(tracker.size).toBe(0);

    tracker.track("UAL123", "A1B2C3", 1000);
    expect(store.lookups).toBe(2);
  });
});
