import dotenv from "dotenv";

dotenv.config();

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export type ReconnectStrategy = "fixed" | "exponential";

function strategy(value: string | undefined): ReconnectStrategy {
  return value?.trim().toLowerCase() === "exponential" ? "exponential" : "fixed";
}

export const config = {
  feed: {
    host: process.env.FEED_HOST || "127.0.0.1",
    port: Number(process.env.FEED_PORT ?? 30003),
    connectTimeoutMs: Number(process.env.FEED_CONNECT_TIMEOUT_MS ?? 10000),
    idleTimeoutMs: Number(process.env.FEED_IDLE_MS ?? 30000),
    maxRecordBytes: Number(process.env.FEED_MAX_RECORD_BYTES ?? 4096),
  },
  dbPath: process.env.DB_PATH || "data/flights.db",
  reconnect: {
    strategy: strategy(process.env.RECONNECT_STRATEGY),
    delayMs: Number(process.env.RECONNECT_MS ?? 3000),
    maxDelayMs: Number(process.env.RECONNECT_MAX_MS ?? 60000),
  },
  session: {
    timeoutMs: Number(process.env.SESSION_TIMEOUT_S ?? 1200) * 1000,
    maxEntries: Number(process.env.SESSION_INDEX_MAX ?? 10000),
    sweepEvery: Number(process.env.SESSION_SWEEP_INTERVAL ?? 1000),
  },
  recordMessages: flag(process.env.RECORD_MESSAGES, false),
  api: {
    enabled: flag(process.env.API_ENABLED, true),
    port: Number(process.env.PORT ?? 8000),
    trackLimit: Number(process.env.TRACK_LIMIT ?? 300),
    corsOrigin: process.env.CORS_ORIGIN || "*",
  },
  debug: flag(process.env.DEBUG, false),
};
