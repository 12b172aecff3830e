import type Database from "better-sqlite3";
import type { Db } from "./db.js";
import { hasPosition } from "./sbs.js";
import type { AircraftStateRow, AircraftUpdate, MessageRow, PositionSampleRow, SbsMessage, SessionRow } from "./types.js";

type AircraftParams = {
  hex: string;
  callsign: string | null;
  altitude: number | null;
  ground_speed: number | null;
  heading: number | null;
  lat: number | null;
  lon: number | null;
  vertical_rate: number | null;
  squawk: string | null;
  alert: number | null;
  emergency: number | null;
  spi: number | null;
  grounded: number | null;
  ts: number;
};

type PositionParams = Omit<PositionSampleRow, "id">;
type SessionParams = { callsign: string; hex: string; ts: number };
type TouchParams = { session_id: number; hex: string; ts: number };
type MessageParams = Omit<MessageRow, "id">;

type Statement<P extends unknown[], R = unknown> = Database.Statement<P, R>;

export type TrackPoint = Pick<PositionSampleRow, "lat" | "lon" | "altitude" | "heading" | "ground_speed" | "timestamp">;

export interface StoreStats {
  aircraft: number;
  positions: number;
  sessions: number;
  messages: number;
}

function bit(value: boolean | undefined): number | null {
  return value === undefined ? null : value ? 1 : 0;
}

/** Absent attributes bind NULL, and NULL never overwrites a stored value. */
function aircraftParams(hex: string, update: AircraftUpdate, ts: number): AircraftParams {
  return {
    hex,
    callsign: update.callsign ?? null,
    altitude: update.altitude ?? null,
    ground_speed: update.groundSpeed ?? null,
    heading: update.heading ?? null,
    lat: update.lat ?? null,
    lon: update.lon ?? null,
    vertical_rate: update.verticalRate ?? null,
    squawk: update.squawk ?? null,
    alert: bit(update.alert),
    emergency: bit(update.emergency),
    spi: bit(update.spi),
    grounded: bit(update.grounded),
    ts,
  };
}

/**
 * Current aircraft state, position history, sessions and the raw message log.
 * Writes for one record are grouped with `transaction`.
 */
export class StateStore {
  private readonly upsertAircraftStmt: Statement<[AircraftParams]>;
  private readonly insertPositionStmt: Statement<[PositionParams]>;
  private readonly insertSessionStmt: Statement<[SessionParams]>;
  private readonly touchSessionStmt: Statement<[TouchParams]>;
  private readonly latestSessionStmt: Statement<[string], SessionRow>;
  private readonly insertMessageStmt: Statement<[MessageParams]>;

  private readonly listAircraftStmt: Statement<[], AircraftStateRow>;
  private readonly getAircraftStmt: Statement<[string], AircraftStateRow>;
  private readonly trackStmt: Statement<[string, number], TrackPoint>;
  private readonly sessionsForHexStmt: Statement<[string, number], SessionRow>;
  private readonly messagesForHexStmt: Statement<[string, number], MessageRow>;
  private readonly countStmt: Statement<[], StoreStats>;

  constructor(private readonly db: Db) {
    this.upsertAircraftStmt = db.prepare<AircraftParams>(`
      INSERT INTO aircraft_state
        (hex, callsign, altitude, ground_speed, heading, lat, lon, vertical_rate, squawk,
         alert, emergency, spi, grounded, message_count, created_at, updated_at)
      VALUES
        (@hex, @callsign, @altitude, @ground_speed, @heading, @lat, @lon, @vertical_rate, @squawk,
         @alert, @emergency, @spi, @grounded, 1, @ts, @ts)
      ON CONFLICT(hex) DO UPDATE SET
        callsign      = COALESCE(excluded.callsign, callsign),
        altitude      = COALESCE(excluded.altitude, altitude),
        ground_speed  = COALESCE(excluded.ground_speed, ground_speed),
        heading       = COALESCE(excluded.heading, heading),
        lat           = COALESCE(excluded.lat, lat),
        lon           = COALESCE(excluded.lon, lon),
        vertical_rate = COALESCE(excluded.vertical_rate, vertical_rate),
        squawk        = COALESCE(excluded.squawk, squawk),
        alert         = COALESCE(excluded.alert, alert),
        emergency     = COALESCE(excluded.emergency, emergency),
        spi           = COALESCE(excluded.spi, spi),
        grounded      = COALESCE(excluded.grounded, grounded),
        message_count = message_count + 1,
        updated_at    = MAX(updated_at, excluded.updated_at)
    `);

    this.insertPositionStmt = db.prepare<PositionParams>(`
      INSERT INTO position_history (hex, timestamp, lat, lon, altitude, heading, ground_speed)
      VALUES (@hex, @timestamp, @lat, @lon, @altitude, @heading, @ground_speed)
    `);

    this.insertSessionStmt = db.prepare<SessionParams>(`
      INSERT INTO sessions (callsign, hex, first_seen, last_seen) VALUES (@callsign, @hex, @ts, @ts)
    `);
    this.touchSessionStmt = db.prepare<TouchParams>(`
      UPDATE sessions SET last_seen = MAX(last_seen, @ts), hex = @hex WHERE session_id = @session_id
    `);
    this.latestSessionStmt = db.prepare<[string], SessionRow>(`
      SELECT session_id, callsign, hex, first_seen, last_seen
      FROM sessions
      WHERE callsign = ?
      ORDER BY last_seen DESC, session_id DESC
      LIMIT 1
    `);

    this.insertMessageStmt = db.prepare<MessageParams>(`
      INSERT INTO messages (hex, session_id, fields, recorded_at)
      VALUES (@hex, @session_id, @fields, @recorded_at)
    `);

    this.listAircraftStmt = db.prepare<[], AircraftStateRow>(`
      SELECT * FROM aircraft_state
      WHERE lat IS NOT NULL AND lon IS NOT NULL
      ORDER BY hex
    `);
    this.getAircraftStmt = db.prepare<[string], AircraftStateRow>("SELECT * FROM aircraft_state WHERE hex = ?");
    this.trackStmt = db.prepare<[string, number], TrackPoint>(`
      SELECT lat, lon, altitude, heading, ground_speed, timestamp
      FROM position_history
      WHERE hex = ?
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `);
    this.sessionsForHexStmt = db.prepare<[string, number], SessionRow>(`
      SELECT session_id, callsign, hex, first_seen, last_seen
      FROM sessions
      WHERE hex = ?
      ORDER BY first_seen DESC, session_id DESC
      LIMIT ?
    `);
    this.messagesForHexStmt = db.prepare<[string, number], MessageRow>(`
      SELECT id, hex, session_id, fields, recorded_at
      FROM messages
      WHERE hex = ?
      ORDER BY recorded_at DESC, id DESC
      LIMIT ?
    `);
    this.countStmt = db.prepare<[], StoreStats>(`
      SELECT
        (SELECT COUNT(*) FROM aircraft_state)   AS aircraft,
        (SELECT COUNT(*) FROM position_history) AS positions,
        (SELECT COUNT(*) FROM sessions)         AS sessions,
        (SELECT COUNT(*) FROM messages)         AS messages
    `);
  }

  /** Runs `fn` in one transaction: every write inside persists, or none does */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  upsertAircraft(hex: string, update: AircraftUpdate, ts: number): void {
    this.upsertAircraftStmt.run(aircraftParams(hex, update, ts));
  }

  /** Appends a history row iff the update carries both lat and lon */
  appendPosition(hex: string, ts: number, update: AircraftUpdate): boolean {
    if (!hasPosition(update)) return false;

    this.insertPositionStmt.run({
      hex,
      timestamp: ts,
      lat: update.lat,
      lon: update.lon,
      altitude: update.altitude ?? null,
      heading: update.heading ?? null,
      ground_speed: update.groundSpeed ?? null,
    });
    return true;
  }

  openSession(callsign: string, hex: string, ts: number): number {
    const info = this.insertSessionStmt.run({ callsign, hex, ts });
    return Number(info.lastInsertRowid);
  }

  touchSession(sessionId: number, hex: string, ts: number): void {
    this.touchSessionStmt.run({ session_id: sessionId, hex, ts });
  }

  latestSession(callsign: string): SessionRow | undefined {
    return this.latestSessionStmt.get(callsign);
  }

  recordMessage(hex: string, sessionId: number | null, msg: SbsMessage, ts: number): void {
    this.insertMessageStmt.run({
      hex,
      session_id: sessionId,
      fields: JSON.stringify(msg),
      recorded_at: ts,
    });
  }

  // ---------- queries ----------

  listAircraftWithPosition(): AircraftStateRow[] {
    return this.listAircraftStmt.all();
  }

  getAircraft(hex: string): AircraftStateRow | undefined {
    return this.getAircraftStmt.get(hex.trim().toUpperCase());
  }

  /** Most recent `limit` samples, oldest first */
  getTrack(hex: string, limit: number): TrackPoint[] {
    return this.trackStmt.all(hex.trim().toUpperCase(), limit).reverse();
  }

  listSessions(hex: string, limit = 50): SessionRow[] {
    return this.sessionsForHexStmt.all(hex.trim().toUpperCase(), limit);
  }

  listMessages(hex: string, limit = 100): MessageRow[] {
    return this.messagesForHexStmt.all(hex.trim().toUpperCase(), limit);
  }

  getStats(): StoreStats {
    return this.countStmt.get() ?? { aircraft: 0, positions: 0, sessions: 0, messages: 0 };
  }
}
