import net from "net";
import { setTimeout as sleep } from "timers/promises";
import { TransportError, describeError } from "./errors.js";
import { frameLines } from "./lineFramer.js";
import type { ReconnectPolicy } from "./reconnectPolicy.js";

/** A connected byte source; `destroy` closes it and ends iteration */
export interface FeedConnection extends AsyncIterable<Buffer> {
  destroy(): void;
}

/** Opens a connection; must reject promptly once `signal` aborts */
export type FeedConnector = (host: string, port: number, signal: AbortSignal) => Promise<FeedConnection>;

export type LineHandler = (line: string) => void | Promise<void>;

export interface FeedClientOptions {
  host: string;
  port: number;
  policy: ReconnectPolicy;
  onLine: LineHandler;
  connect?: FeedConnector;
  /** Give up on a connect attempt after this long; 0 disables (default 10000) */
  connectTimeoutMs?: number;
  /** Treat the feed as dead after this long without data; 0 disables (default 30000) */
  idleTimeoutMs?: number;
  maxRecordBytes?: number;
}

function timedOut(signal: AbortSignal): boolean {
  return signal.reason instanceof Error && signal.reason.name === "TimeoutError";
}

export const tcpConnector: FeedConnector = (host, port, signal) =>
  new Promise((resolve, reject) => {
    const target = `${host}:${port}`;
    if (signal.aborted) {
      reject(new TransportError(`connect to ${target} aborted`));
      return;
    }

    const socket = net.createConnection({ host, port });

    const cleanup = () => {
      socket.off("error", onError);
      signal.removeEventListener("abort", onAbort);
    };
    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(new TransportError(`connect to ${target} failed`, { cause: err }));
    };
    const onAbort = () => {
      cleanup();
      socket.destroy();
      reject(new TransportError(`connect to ${target} ${timedOut(signal) ? "timed out" : "aborted"}`));
    };

    socket.once("error", onError);
    signal.addEventListener("abort", onAbort, { once: true });
    socket.once("connect", () => {
      cleanup();
      socket.setKeepAlive(true);
      resolve(socket);
    });
  });

async function* watchChunks(source: AsyncIterable<Buffer>, onChunk: () => void): AsyncGenerator<Buffer> {
  for await (const chunk of source) {
    onChunk();
    yield chunk;
  }
}

/**
 * Keeps a connection to the SBS feed open for as long as the process runs.
 * Every disconnect is logged and followed by a reconnect after the policy's
 * delay; only the abort signal ends `run`.
 */
export class FeedClient {
  private readonly connect: FeedConnector;
  private attempt = 0;
  private connected = false;
  private lastError: string | null = null;

  constructor(private readonly options: FeedClientOptions) {
    this.connect = options.connect ?? tcpConnector;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { host, port, policy } = this.options;
    console.log(`[FEED] Starting - ${host}:${port}, reconnect policy ${policy.name}`);

    while (!signal.aborted) {
      try {
        await this.readFeed(signal);
        this.lastError = "connection closed by peer";
      } catch (err) {
        this.lastError = describeError(err);
      }

      if (signal.aborted) break;

      this.attempt++;
      const delay = policy.nextDelay(this.attempt);
      console.warn(`[FEED] Disconnected: ${this.lastError}. Reconnecting in ${delay}ms (attempt ${this.attempt})`);

      try {
        await sleep(delay, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }

    console.log("[FEED] Stopped");
  }

  getStatus(): { connected: boolean; attempt: number; lastError: string | null } {
    return { connected: this.connected, attempt: this.attempt, lastError: this.lastError };
  }

  private async readFeed(signal: AbortSignal): Promise<void> {
    const { host, port, onLine, connectTimeoutMs = 10_000, idleTimeoutMs = 30_000, maxRecordBytes } = this.options;
    const connectSignal = connectTimeoutMs > 0 ? AbortSignal.any([signal, AbortSignal.timeout(connectTimeoutMs)]) : signal;
    const connection = await this.connect(host, port, connectSignal);

    if (signal.aborted) {
      connection.destroy();
      return;
    }

    this.attempt = 0;
    this.connected = true;
    console.log(`[FEED] Connected to ${host}:${port}`);

    const onAbort = () => connection.destroy();
    signal.addEventListener("abort", onAbort, { once: true });

    let idle = false;
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      if (idleTimeoutMs <= 0) return;
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        idle = true;
        connection.destroy();
      }, idleTimeoutMs);
    };

    armIdleTimer();
    try {
      const lines = frameLines(watchChunks(connection, armIdleTimer), {
        flushTail: false,
        maxRecordBytes,
        onDiscard: (bytes) => console.warn(`[FEED] Discarding ${bytes} bytes of an unterminated record`),
        onOversize: (bytes) => console.warn(`[FEED] Dropped an oversized record (${bytes} bytes)`),
      });
      // one record is fully handled before the next chunk is read
      for await (const line of lines) {
        await onLine(line);
      }
    } catch (err) {
      if (!idle) throw err;
    } finally {
      clearTimeout(idleTimer);
      this.connected = false;
      signal.removeEventListener("abort", onAbort);
      connection.destroy();
    }

    if (idle) {
      throw new TransportError(`no data from ${host}:${port} for ${idleTimeoutMs}ms`);
    }
  }
}
