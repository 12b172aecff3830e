import express from "express";
import { createServer } from "http";
import { createApiRouter } from "./api.js";
import { config } from "./config.js";
import { openDatabase } from "./db.js";
import { FeedClient } from "./feedClient.js";
import { Ingestor } from "./ingest.js";
import { exponentialBackoff, fixedDelay } from "./reconnectPolicy.js";
import { SessionTracker } from "./sessionTracker.js";
import { closeServices } from "./shutdown.js";
import { StateStore } from "./store.js";

const db = openDatabase(config.dbPath);
console.log(`[DB] Opened ${config.dbPath}`);

const store = new StateStore(db);
const sessions = new SessionTracker(store, config.session);
const ingestor = new Ingestor(store, sessions, {
  recordMessages: config.recordMessages,
  sweepEvery: config.session.sweepEvery,
  debug: config.debug,
});

const policy =
  config.reconnect.strategy === "exponential"
    ? exponentialBackoff({ baseMs: config.reconnect.delayMs, maxMs: config.reconnect.maxDelayMs })
    : fixedDelay(config.reconnect.delayMs);

const feed = new FeedClient({
  ...config.feed,
  policy,
  onLine: (line) => {
    ingestor.handleLine(line);
  },
});

const app = express();
const server = createServer(app);
app.use("/api", createApiRouter(store, { trackLimit: config.api.trackLimit, corsOrigin: config.api.corsOrigin }));
app.get("/health", (_req, res) => {
  res.json({
    feed: feed.getStatus(),
    ingest: ingestor.stats,
    sessionIndex: { size: sessions.size, evicted: sessions.evictedCount },
  });
});

if (config.api.enabled) {
  server.listen(config.api.port, () => console.log(`[API] Listening on :${config.api.port}`));
}

const shutdown = new AbortController();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    console.log(`Received ${signal}, shutting down`);
    shutdown.abort();
  });
}

feed
  .run(shutdown.signal)
  .catch((err) => {
    console.error("[FEED] Stopped unexpectedly:", err);
    process.exitCode = 1;
  })
  .finally(() =>
    closeServices(server, db).catch((err) => {
      console.error("[DB] Shutdown failed:", err);
      process.exitCode = 1;
    })
  );
