/**
 * Decides how long to wait before reconnect attempt `attempt` (1-based).
 * Attempts are never capped; a policy only shapes the delay.
 */
export interface ReconnectPolicy {
  readonly name: string;
  nextDelay(attempt: number): number;
}

export function fixedDelay(delayMs: number): ReconnectPolicy {
  return {
    name: `fixed ${delayMs}ms`,
    nextDelay: () => delayMs,
  };
}

export interface ExponentialBackoffOptions {
  baseMs: number;
  maxMs: number;
  factor?: number;
}

export function exponentialBackoff({ baseMs, maxMs, factor = 2 }: ExponentialBackoffOptions): ReconnectPolicy {
  return {
    name: `exponential ${baseMs}ms x${factor} (max ${maxMs}ms)`,
    nextDelay(attempt: number): number {
      const exponent = Math.max(0, attempt - 1);
      return Math.min(maxMs, baseMs * factor ** exponent);
    },
  };
}
