import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type Db = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS aircraft_state (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  hex           TEXT NOT NULL UNIQUE,
  callsign      TEXT,
  altitude      INTEGER,  -- feet
  ground_speed  REAL,     -- knots
  heading       REAL,     -- degrees
  lat           REAL,
  lon           REAL,
  vertical_rate INTEGER,  -- ft/min
  squawk        TEXT,
  alert         INTEGER,
  emergency     INTEGER,
  spi           INTEGER,
  grounded      INTEGER,
  message_count INTEGER NOT NULL DEFAULT 0,
  created_at    INTEGER NOT NULL, -- epoch ms
  updated_at    INTEGER NOT NULL  -- epoch ms
);

CREATE TABLE IF NOT EXISTS position_history (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  hex          TEXT NOT NULL,
  timestamp    INTEGER NOT NULL, -- epoch ms
  lat          REAL NOT NULL,
  lon          REAL NOT NULL,
  altitude     INTEGER,
  heading      REAL,
  ground_speed REAL,
  FOREIGN KEY(hex) REFERENCES aircraft_state(hex)
);

CREATE INDEX IF NOT EXISTS idx_position_history_hex_ts ON position_history(hex, timestamp);

CREATE TABLE IF NOT EXISTS sessions (
  session_id INTEGER PRIMARY KEY AUTOINCREMENT,
  callsign   TEXT NOT NULL,
  hex        TEXT NOT NULL,
  first_seen INTEGER NOT NULL,
  last_seen  INTEGER NOT NULL,
  FOREIGN KEY(hex) REFERENCES aircraft_state(hex)
);

CREATE INDEX IF NOT EXISTS idx_sessions_callsign ON sessions(callsign, last_seen);
CREATE INDEX IF NOT EXISTS idx_sessions_hex ON sessions(hex, first_seen);

CREATE TABLE IF NOT EXISTS messages (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  hex         TEXT NOT NULL,
  session_id  INTEGER,
  fields      TEXT NOT NULL, -- JSON of the decoded record
  recorded_at INTEGER NOT NULL,
  FOREIGN KEY(hex) REFERENCES aircraft_state(hex),
  FOREIGN KEY(session_id) REFERENCES sessions(session_id)
);
`;

/**
 * Opens (creating if needed) the collector database. WAL lets the query API
 * read committed state while ingestion keeps writing.
 */
export function openDatabase(dbPath: string): Db {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("synchronous = NORMAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");

  db.exec(SCHEMA);
  return db;
}
