import { CollectorError, DecodeError, StoreError, describeError } from "./errors.js";
import { decodeSbsLine, isStateUpdate, isValidHex, messageTimestamp, toAircraftUpdate } from "./sbs.js";
import type { SessionAssignment, SessionTracker } from "./sessionTracker.js";
import type { StateStore } from "./store.js";
import type { SbsMessage } from "./types.js";

export type IngestOutcome =
  | { status: "stored"; hex: string; timestamp: number; position: boolean; session: SessionAssignment | null }
  | { status: "ignored"; messageType: string }
  | { status: "rejected"; error: DecodeError }
  | { status: "failed"; error: StoreError };

export interface IngestorOptions {
  recordMessages: boolean;
  sweepEvery: number;
  debug?: boolean;
}

export interface IngestStats {
  stored: number;
  ignored: number;
  rejected: number;
  failed: number;
  positions: number;
  sessionsOpened: number;
}

/**
 * Turns one framed line into store writes. Decode and store failures end up
 * in `handleError`, which logs them and drops the record.
 */
export class Ingestor {
  readonly stats: IngestStats = { stored: 0, ignored: 0, rejected: 0, failed: 0, positions: 0, sessionsOpened: 0 };
  private processed = 0;
  private latestTs = 0;

  constructor(
    private readonly store: StateStore,
    private readonly sessions: SessionTracker,
    private readonly options: IngestorOptions
  ) {}

  handleLine(line: string, receivedAt = Date.now()): IngestOutcome {
    const msg = decodeSbsLine(line);

    let outcome: IngestOutcome;
    if (!isStateUpdate(msg)) {
      this.stats.ignored++;
      outcome = { status: "ignored", messageType: msg.messageType };
    } else {
      try {
        outcome = this.persist(msg, line, receivedAt);
      } catch (err) {
        outcome = this.handleError(err);
      }
    }

    this.afterRecord();
    return outcome;
  }

  private persist(msg: SbsMessage, line: string, receivedAt: number): IngestOutcome {
    if (!isValidHex(msg.hex)) {
      throw new DecodeError(`invalid aircraft identifier "${msg.hex}"`, line);
    }

    const hex = msg.hex;
    const ts = messageTimestamp(msg, receivedAt);
    const update = toAircraftUpdate(msg);

    let result: { position: boolean; session: SessionAssignment | null };
    try {
      result = this.store.transaction(() => {
        this.store.upsertAircraft(hex, update, ts);
        const position = this.store.appendPosition(hex, ts, update);
        const session = this.sessions.track(msg.callsign, hex, ts);
        if (this.options.recordMessages) {
          this.store.recordMessage(hex, session?.sessionId ?? null, msg, ts);
        }
        return { position, session };
      });
    } catch (err) {
      // the index may point at a session the rollback just removed
      this.sessions.forget(msg.callsign);
      throw new StoreError(`could not store record for ${hex}`, hex, { cause: err });
    }

    this.latestTs = Math.max(this.latestTs, ts);
    this.stats.stored++;
    if (result.position) this.stats.positions++;
    if (result.session?.opened) {
      this.stats.sessionsOpened++;
      if (this.options.debug) {
        console.log(`[SESSION] Opened #${result.session.sessionId} for ${msg.callsign} (${hex})`);
      }
    }

    return { status: "stored", hex, timestamp: ts, ...result };
  }

  private handleError(err: unknown): IngestOutcome {
    if (!(err instanceof CollectorError)) throw err;

    if (err instanceof DecodeError) {
      this.stats.rejected++;
      // counted in the periodic stats line; per-record detail only when debugging
      if (this.options.debug) {
        console.warn(`[INGEST] Skipping record: ${err.message}`);
        console.warn(`[INGEST]   ${err.line}`);
      }
      return { status: "rejected", error: err };
    }

    if (err instanceof StoreError) {
      this.stats.failed++;
      console.error(`[INGEST] Dropping record: ${describeError(err)}`);
      return { status: "failed", error: err };
    }

    throw err;
  }

  private afterRecord(): void {
    this.processed++;
    if (this.options.sweepEvery <= 0 || this.processed % this.options.sweepEvery !== 0) return;

    const swept = this.sessions.sweep(this.latestTs);
    const { stored, ignored, rejected, failed, positions } = this.stats;
    console.log(
      `[INGEST] ${this.processed} records: ${stored} stored, ${ignored} ignored, ${rejected} rejected, ${failed} failed, ` +
        `${positions} positions; session index ${this.sessions.size} (swept ${swept})`
    );
  }
}
