import type { SourceId } from "./types.js";

/** Base class for every error raised inside the alert pipeline. */
export class QuakeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid startup configuration. Fatal: nothing is ingested. */
export class ConfigError extends QuakeError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** A frame that is not JSON or lacks the structure its source requires. */
export class ParseError extends QuakeError {
  readonly source: SourceId;

  constructor(source: SourceId, message: string, options?: { cause?: unknown }) {
    super(`${source} parse error: ${message}`, options);
    this.source = source;
  }
}

/** Push endpoint unreachable, timed out, or answered with a non-2xx status. */
export class DeliveryError extends QuakeError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

/** Stream connect, keepalive or transport failure. Always retried by reconnect. */
export class ConnectionError extends QuakeError {
  readonly connector: string;

  constructor(connector: string, message: string, options?: { cause?: unknown }) {
    super(`${connector}: ${message}`, options);
    this.connector = connector;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
