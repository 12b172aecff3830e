import type { AircraftUpdate, SbsMessage } from "./types.js";

export const SBS_FIELD_COUNT = 22;
export const STATE_UPDATE_TYPE = "MSG";

const HEX_PATTERN = /^[0-9A-F]{6}$/;

/**
 * Decodes one comma-separated SBS-1 record. Short records are padded with
 * blanks and anything past the 22nd field is ignored, so this never throws.
 */
export function decodeSbsLine(line: string): SbsMessage {
  const parts = line.split(",", SBS_FIELD_COUNT);
  const f = (i: number): string => (parts[i] ?? "").trim();

  return {
    messageType: f(0).toUpperCase(),
    transmissionType: f(1),
    sessionId: f(2),
    aircraftId: f(3),
    hex: f(4).toUpperCase(),
    flightId: f(5),
    generatedDate: f(6),
    generatedTime: f(7),
    loggedDate: f(8),
    loggedTime: f(9),
    callsign: f(10),
    altitude: f(11),
    groundSpeed: f(12),
    track: f(13),
    lat: f(14),
    lon: f(15),
    verticalRate: f(16),
    squawk: f(17),
    alert: f(18),
    emergency: f(19),
    spi: f(20),
    isOnGround: f(21),
  };
}

export function isStateUpdate(msg: SbsMessage): boolean {
  return msg.messageType === STATE_UPDATE_TYPE;
}

export function isValidHex(hex: string): boolean {
  return HEX_PATTERN.test(hex);
}

function parseNumber(value: string): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseInRange(value: string, limit: number): number | undefined {
  const parsed = parseNumber(value);
  return parsed !== undefined && Math.abs(parsed) <= limit ? parsed : undefined;
}

// dump1090 writes -1 for set flags, other feeds write 1
function parseFlag(value: string): boolean | undefined {
  if (!value) return undefined;
  if (value === "0") return false;
  if (value === "-1" || value === "1") return true;
  return undefined;
}

function text(value: string): string | undefined {
  return value === "" ? undefined : value;
}

/**
 * Maps a decoded record onto the attributes it actually carries. Blank or
 * unparseable fields are left undefined so the store keeps its prior value.
 */
export function toAircraftUpdate(msg: SbsMessage): AircraftUpdate {
  return {
    callsign: text(msg.callsign),
    altitude: parseNumber(msg.altitude),
    groundSpeed: parseNumber(msg.groundSpeed),
    heading: parseNumber(msg.track),
    lat: parseInRange(msg.lat, 90),
    lon: parseInRange(msg.lon, 180),
    verticalRate: parseNumber(msg.verticalRate),
    squawk: text(msg.squawk),
    alert: parseFlag(msg.alert),
    emergency: parseFlag(msg.emergency),
    spi: parseFlag(msg.spi),
    grounded: parseFlag(msg.isOnGround),
  };
}

export function hasPosition(update: AircraftUpdate): update is AircraftUpdate & { lat: number; lon: number } {
  return update.lat !== undefined && update.lon !== undefined;
}

function parseSbsDateTime(date: string, time: string): number | undefined {
  const d = date.match(/^(\d{4})\/(\d{2})\/(\d{2})$/);
  const t = time.match(/^(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3}))?$/);
  if (!d || !t) return undefined;

  const ms = t[4] ? Number(t[4].padEnd(3, "0")) : 0;
  const ts = Date.UTC(Number(d[1]), Number(d[2]) - 1, Number(d[3]), Number(t[1]), Number(t[2]), Number(t[3]), ms);
  return Number.isNaN(ts) ? undefined : ts;
}

/**
 * Epoch ms of a record: generated date/time (read as UTC), then logged
 * date/time, then `fallback` when the feed supplied neither.
 */
export function messageTimestamp(msg: SbsMessage, fallback: number): number {
  return (
    parseSbsDateTime(msg.generatedDate, msg.generatedTime) ??
    parseSbsDateTime(msg.loggedDate, msg.loggedTime) ??
    fallback
  );
}
