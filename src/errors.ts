// --- Error taxonomy ---

/** Missing or invalid configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type FetchErrorKind = "http" | "network" | "timeout" | "parse";

/**
 * A failed read against the remote API (listing, identity, profile).
 * Mutations never surface this; they collapse to a boolean instead.
 */
export class FetchError extends Error {
  readonly operation: string;
  readonly kind: FetchErrorKind;
  readonly status: number | undefined;

  constructor(operation: string, kind: FetchErrorKind, detail: string, status?: number) {
    const where = status !== undefined ? ` (HTTP ${status})` : "";
    super(`${operation} failed${where}: ${detail}`);
    this.name = "FetchError";
    this.operation = operation;
    this.kind = kind;
    this.status = status;
  }
}

/** The record file could not be found or parsed. */
export class RecordFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(message);
    this.name = "RecordFileError";
    this.filePath = filePath;
  }
}

/** The operator interrupted the run (Ctrl+C). */
export class InterruptedError extends Error {
  constructor() {
    super("Operation interrupted by user");
    this.name = "InterruptedError";
  }
}
