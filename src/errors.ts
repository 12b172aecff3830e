/** Failures the collector expects and recovers from */
export abstract class CollectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connect failure, reset or EOF on the feed socket */
export class TransportError extends CollectorError {}

/** A state-update record that cannot be interpreted even after padding */
export class DecodeError extends CollectorError {
  constructor(
    message: string,
    readonly line: string
  ) {
    super(message);
  }
}

/** Constraint violation or I/O failure while writing a record */
export class StoreError extends CollectorError {
  constructor(
    message: string,
    readonly hex: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}
