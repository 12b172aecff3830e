/**
 * One SBS-1 (BaseStation) record as emitted by dump1090 on port 30003.
 * Every field is the trimmed positional text; blank means "not supplied".
 */
export interface SbsMessage {
  messageType: string; // MSG, SEL, ID, AIR, STA, CLK
  transmissionType: string; // 1-8 for MSG
  sessionId: string;
  aircraftId: string;
  hex: string; // 24-bit ICAO address, uppercased
  flightId: string;
  generatedDate: string; // YYYY/MM/DD
  generatedTime: string; // HH:MM:SS.mmm
  loggedDate: string;
  loggedTime: string;
  callsign: string;
  altitude: string; // feet
  groundSpeed: string; // knots
  track: string; // degrees
  lat: string;
  lon: string;
  verticalRate: string; // ft/min
  squawk: string;
  alert: string;
  emergency: string;
  spi: string;
  isOnGround: string;
}

/** Sparse update: only the attributes present are written to the store. */
export interface AircraftUpdate {
  callsign?: string;
  altitude?: number;
  groundSpeed?: number;
  heading?: number;
  lat?: number;
  lon?: number;
  verticalRate?: number;
  squawk?: string;
  alert?: boolean;
  emergency?: boolean;
  spi?: boolean;
  grounded?: boolean;
}

export type AircraftStateRow = {
  id: number;
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
  message_count: number;
  created_at: number; // epoch ms
  updated_at: number; // epoch ms
};

export type PositionSampleRow = {
  id: number;
  hex: string;
  timestamp: number; // epoch ms
  lat: number;
  lon: number;
  altitude: number | null;
  heading: number | null;
  ground_speed: number | null;
};

export type SessionRow = {
  session_id: number;
  callsign: string;
  hex: string;
  first_seen: number;
  last_seen: number;
};

export type MessageRow = {
  id: number;
  hex: string;
  session_id: number | null;
  fields: string; // JSON of the decoded SbsMessage
  recorded_at: number;
};
