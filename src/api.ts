import cors from "cors";
import { Router, type NextFunction, type Request, type Response } from "express";

import type { StateStore } from "./store.js";
import type { AircraftStateRow } from "./types.js";

export interface ApiOptions {
  trackLimit: number;
  maxTrackLimit?: number;
  /** Allowed browser origin(s) for CORS (default "*") */
  corsOrigin?: string;
}

function toFlight(row: AircraftStateRow) {
  return {
    hex: row.hex,
    callsign: row.callsign,
    alt: row.altitude,
    gspeed: row.ground_speed,
    heading: row.heading,
    lat: row.lat,
    lon: row.lon,
    grounded: row.grounded,
  };
}

function parseLimit(raw: unknown, fallback: number, max: number): number | null {
  if (raw === undefined) return fallback;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return null;
  const limit = Number(raw);
  return limit >= 1 && limit <= max ? limit : null;
}

/**
 * Read-only query surface over the store. Ingestion commits each record in
 * one synchronous transaction, so handlers only ever see committed rows.
 */
export function createApiRouter(
  store: StateStore,
  { trackLimit, maxTrackLimit = 5000, corsOrigin = "*" }: ApiOptions
): Router {
  const router = Router();
  router.use(cors({ origin: corsOrigin }));

  // ---------- flights ----------
  router.get("/flights", (_req: Request, res: Response) => {
    res.json(store.listAircraftWithPosition().map(toFlight));
  });

  router.get("/flights/:hex", (req: Request, res: Response) => {
    const row = store.getAircraft(req.params.hex);
    if (!row) {
      return res.json({ found: false });
    }

    res.json({
      found: true,
      flight: {
        hex: row.hex,
        callsign: row.callsign,
        lat: row.lat,
        lon: row.lon,
        alt: row.altitude,
        heading: row.heading,
        gspeed: row.ground_speed,
        vrate: row.vertical_rate,
        squawk: row.squawk,
        grounded: row.grounded,
        messages: row.message_count,
        firstSeen: new Date(row.created_at).toISOString(),
        lastSeen: new Date(row.updated_at).toISOString(),
      },
    });
  });

  // ---------- history ----------
  router.get("/track/:hex", (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit, trackLimit, maxTrackLimit);
    if (limit === null) {
      return res.status(400).json({ error: `limit must be an integer between 1 and ${maxTrackLimit}` });
    }

    res.json(store.getTrack(req.params.hex, limit));
  });

  router.get("/sessions/:hex", (req: Request, res: Response) => {
    const sessions = store.listSessions(req.params.hex).map((s) => ({
      ...s,
      firstSeenIso: new Date(s.first_seen).toISOString(),
      lastSeenIso: new Date(s.last_seen).toISOString(),
    }));
    res.json(sessions);
  });

  router.get("/messages/:hex", (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit, 100, maxTrackLimit);
    if (limit === null) {
      return res.status(400).json({ error: `limit must be an integer between 1 and ${maxTrackLimit}` });
    }

    const messages = store.listMessages(req.params.hex, limit).map((m) => {
      const fields: unknown = JSON.parse(m.fields);
      return { id: m.id, session_id: m.session_id, recordedAt: new Date(m.recorded_at).toISOString(), fields };
    });
    res.json(messages);
  });

  // ---------- stats ----------
  router.get("/stats", (_req: Request, res: Response) => {
    res.json(store.getStats());
  });

  router.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`[API] ${req.method} ${req.originalUrl} failed:`, err);
    res.status(500).json({ error: "Internal server error" });
  });

  return router;
}
