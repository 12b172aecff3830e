import type { Server } from "http";
import type { Db } from "./db.js";

/**
 * Stops accepting requests, waits for the ones in flight, then closes the
 * database they read from.
 */
export function closeServices(server: Server, db: Db): Promise<void> {
  const closeDatabase = () => {
    db.close();
    console.log("[DB] Closed");
  };

  if (!server.listening) {
    closeDatabase();
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    server.close((err) => {
      try {
        closeDatabase();
      } catch (closeErr) {
        reject(closeErr);
        return;
      }
      if (err) reject(err);
      else resolve();
    });
    server.closeIdleConnections();
  });
}
