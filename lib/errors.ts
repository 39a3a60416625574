export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration. */
export class ConfigError extends MonitorError {}

/** Upstream request failed, timed out or returned something other than JSON. */
export class NetworkError extends MonitorError {}

/** Unknown station id, missing allow-list or out-of-range request parameters. */
export class ValidationError extends MonitorError {}

/** Malformed reading record or timestamp. */
export class DataFormatError extends MonitorError {}

/** A timestamp the chart renderer cannot place on an axis. */
export class RenderFailure extends DataFormatError {}

/** A directory or file could not be created or written. */
export class IOFailure extends MonitorError {}

export function httpStatusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  return 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
